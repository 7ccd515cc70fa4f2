import { createWriteStream, type WriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "pino";
import { summarizePayload } from "../capabilities/router.js";
import type { SessionEvent, SessionEventBus } from "./session-events.js";

const RESULT_PREVIEW_CHARS = 200;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local wall-clock time as HH:MM:SS. */
export function formatClock(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function sessionLogFileName(startedAt: Date): string {
  const day = `${startedAt.getFullYear()}${pad(startedAt.getMonth() + 1)}${pad(startedAt.getDate())}`;
  const time = `${pad(startedAt.getHours())}${pad(startedAt.getMinutes())}${pad(startedAt.getSeconds())}`;
  return `session-${day}-${time}.log`;
}

function formatArguments(args: Record<string, unknown>): string {
  return Object.entries(args)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(", ");
}

export function describeEvent(event: SessionEvent): { tag: string; text: string } | null {
  switch (event.type) {
    case "transcriptLine":
      if (event.speaker === "assistant") {
        return { tag: "model", text: event.text };
      }
      return { tag: event.source === "typed" ? "you" : "heard", text: event.text };
    case "toolCallStarted":
      return { tag: "tool", text: `${event.capabilityName}(${formatArguments(event.arguments)})` };
    case "toolCallFinished": {
      const { result } = event;
      if (result.success) {
        return {
          tag: "result",
          text: `${result.capabilityName}: ${summarizePayload(result.payload, RESULT_PREVIEW_CHARS)}`
        };
      }
      return { tag: "error", text: `${result.capabilityName}: ${result.error} ${result.message}` };
    }
    case "muteChanged":
      return { tag: "mic", text: `Microphone ${event.muted ? "MUTED" : "LIVE"}` };
    case "info":
      return { tag: "info", text: event.message };
    case "error":
      return { tag: "error", text: event.message };
    case "stateChange":
      return null;
  }
}

export function formatTranscriptLine(event: SessionEvent): string | null {
  const described = describeEvent(event);
  if (!described) {
    return null;
  }
  return `${formatClock(new Date(event.at))} [${described.tag}] ${described.text}`;
}

/** Append-only plain-text transcript of one session. */
export class SessionLogFile {
  readonly path: string;
  private stream: WriteStream;

  private constructor(path: string, stream: WriteStream) {
    this.path = path;
    this.stream = stream;
  }

  static async open(directory: string, startedAt: Date, logger: Logger): Promise<SessionLogFile> {
    await mkdir(directory, { recursive: true });
    const path = join(directory, sessionLogFileName(startedAt));
    const stream = createWriteStream(path, { flags: "a", encoding: "utf8" });
    stream.on("error", (error: Error) => {
      logger.warn({ path, error: error.message }, "session log write failed");
    });
    stream.write(`# voice-bridge session ${startedAt.toISOString()}\n`);
    return new SessionLogFile(path, stream);
  }

  write(event: SessionEvent): void {
    const line = formatTranscriptLine(event);
    if (line) {
      this.stream.write(`${line}\n`);
    }
  }

  attach(bus: SessionEventBus): () => void {
    return bus.subscribe((event) => this.write(event));
  }

  close(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.stream.end(() => resolve());
    });
  }
}

export type AppendSessionEvent = (sessionId: string, type: string, payload: unknown) => Promise<void>;

export function persistedEventType(event: SessionEvent): string {
  return `session.${event.type.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`)}`;
}

/**
 * Mirrors bus events into the event store in emission order. Store failures
 * are logged and do not reach the session.
 */
export function attachEventStore(
  bus: SessionEventBus,
  sessionId: string,
  append: AppendSessionEvent,
  logger: Logger
): { detach: () => void; flush: () => Promise<void> } {
  let chain = Promise.resolve();

  const detach = bus.subscribe((event) => {
    chain = chain
      .then(() => append(sessionId, persistedEventType(event), event))
      .catch((error: unknown) => {
        logger.warn({ error, event_type: event.type }, "session event persist failed");
      });
  });

  return {
    detach,
    flush: () => chain
  };
}
