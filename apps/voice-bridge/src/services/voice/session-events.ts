import type { Logger } from "pino";
import type { InvocationResult } from "../capabilities/types.js";
import type { SessionEventName } from "./session-state.js";
import type { SessionState } from "./types.js";

export type TranscriptSpeaker = "user" | "assistant";

export type SessionEventBody =
  | { type: "stateChange"; from: SessionState; to: SessionState; trigger: SessionEventName }
  | { type: "toolCallStarted"; callId: string; capabilityName: string; arguments: Record<string, unknown> }
  | { type: "toolCallFinished"; result: InvocationResult; durationMs: number }
  | { type: "transcriptLine"; speaker: TranscriptSpeaker; source: "typed" | "speech" | "text"; text: string }
  | { type: "muteChanged"; muted: boolean }
  | { type: "info"; message: string }
  | { type: "error"; message: string };

export type SessionEvent = SessionEventBody & { at: string };

export type SessionEventListener = (event: SessionEvent) => void;

const HISTORY_LIMIT = 200;

export class SessionEventBus {
  private listeners = new Set<SessionEventListener>();
  private history: SessionEvent[] = [];
  private logger: Logger;
  private now: () => Date;

  constructor(logger: Logger, now: () => Date = () => new Date()) {
    this.logger = logger;
    this.now = now;
  }

  subscribe(listener: SessionEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(body: SessionEventBody): SessionEvent {
    const event: SessionEvent = { ...body, at: this.now().toISOString() };

    this.history.push(event);
    if (this.history.length > HISTORY_LIMIT) {
      this.history.shift();
    }

    for (const listener of Array.from(this.listeners)) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn({ error, event_type: event.type }, "session event listener failed");
      }
    }
    return event;
  }

  recent(limit = HISTORY_LIMIT): SessionEvent[] {
    return this.history.slice(-limit);
  }
}
