import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { Logger } from "pino";
import type { CapabilityDescriptor } from "../capabilities/types.js";
import type { SessionSnapshot } from "./orchestrator.js";
import type { SessionEventBus } from "./session-events.js";
import { formatTranscriptLine } from "./session-log.js";
import type { CloseReason } from "./types.js";

export type ConsoleCommand =
  | { kind: "quit" }
  | { kind: "mute" }
  | { kind: "status" }
  | { kind: "tools" }
  | { kind: "help" }
  | { kind: "text"; text: string }
  | { kind: "unknown"; name: string }
  | { kind: "empty" };

export interface ConsoleSession {
  sendText(text: string): Promise<void>;
  toggleMute(): Promise<boolean>;
  quit(): Promise<CloseReason>;
  snapshot(): SessionSnapshot;
}

export interface OperatorConsoleOptions {
  session: ConsoleSession;
  events: SessionEventBus;
  listCapabilities: () => readonly CapabilityDescriptor[];
  input: Readable;
  output: Writable;
  logger: Logger;
}

const HELP_TEXT = "commands: /quit, /mute, /status, /tools, /help; any other line is sent as a typed turn";

export function parseConsoleLine(line: string): ConsoleCommand {
  const trimmed = line.trim();
  if (!trimmed) {
    return { kind: "empty" };
  }
  if (!trimmed.startsWith("/")) {
    return { kind: "text", text: trimmed };
  }

  const name = trimmed.slice(1).split(/\s+/)[0]?.toLowerCase() ?? "";
  switch (name) {
    case "quit":
    case "exit":
      return { kind: "quit" };
    case "mute":
      return { kind: "mute" };
    case "status":
      return { kind: "status" };
    case "tools":
      return { kind: "tools" };
    case "help":
      return { kind: "help" };
    default:
      return { kind: "unknown", name };
  }
}

export function formatStatus(snapshot: SessionSnapshot): string {
  const parts = [
    `state=${snapshot.state}`,
    `mic=${snapshot.muted ? "muted" : snapshot.micOpen ? "open" : "held"}`,
    `playback=${snapshot.playbackActive ? "active" : "idle"}`,
    `capabilities=${snapshot.capabilities.length}`
  ];
  if (snapshot.pendingCallId) {
    parts.push(`pending=${snapshot.pendingCallId}`);
  }
  return parts.join(" ");
}

export function formatCapabilityList(descriptors: readonly CapabilityDescriptor[]): string[] {
  if (descriptors.length === 0) {
    return ["no capabilities registered"];
  }
  return descriptors.map((descriptor) => {
    const description = descriptor.description ? `: ${descriptor.description}` : "";
    return `${descriptor.name} (${descriptor.ownerSessionId})${description}`;
  });
}

/** Line-oriented operator console: transcript out, commands in. */
export function startOperatorConsole(options: OperatorConsoleOptions): { close: () => void } {
  const { session, events, input, output, logger } = options;

  const print = (line: string) => {
    output.write(`${line}\n`);
  };

  const unsubscribe = events.subscribe((event) => {
    const line = formatTranscriptLine(event);
    if (line) {
      print(line);
    }
  });

  const handle = async (command: ConsoleCommand): Promise<void> => {
    switch (command.kind) {
      case "empty":
        return;
      case "quit":
        await session.quit();
        return;
      case "mute":
        await session.toggleMute();
        return;
      case "status":
        print(formatStatus(session.snapshot()));
        return;
      case "tools":
        formatCapabilityList(options.listCapabilities()).forEach(print);
        return;
      case "help":
        print(HELP_TEXT);
        return;
      case "unknown":
        print(`unknown command '/${command.name}'; ${HELP_TEXT}`);
        return;
      case "text":
        await session.sendText(command.text);
        return;
    }
  };

  const rl = createInterface({ input, terminal: false });
  rl.on("line", (line: string) => {
    handle(parseConsoleLine(line)).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ error: message }, "console command failed");
      print(`command failed: ${message}`);
    });
  });

  return {
    close: () => {
      unsubscribe();
      rl.close();
    }
  };
}
