import type { SessionState } from "./types.js";

export type SessionEventName =
  | "streamOpened"
  | "responseStarted"
  | "toolCallRequested"
  | "toolResultSent"
  | "audioReceived"
  | "turnComplete"
  | "close";

const transitions: Record<SessionState, Partial<Record<SessionEventName, SessionState>>> = {
  Idle: {
    streamOpened: "Listening"
  },
  Listening: {
    responseStarted: "AwaitingResponse"
  },
  AwaitingResponse: {
    toolCallRequested: "ToolPending",
    audioReceived: "Speaking",
    turnComplete: "Listening"
  },
  ToolPending: {
    toolResultSent: "AwaitingResponse"
  },
  Speaking: {
    // A spoken preamble may precede the call within the same turn.
    toolCallRequested: "ToolPending",
    turnComplete: "Listening"
  },
  Closed: {}
};

/** Returns the next state, or null when the event is not accepted in `state`. */
export function transition(state: SessionState, event: SessionEventName): SessionState | null {
  if (event === "close") {
    return state === "Closed" ? null : "Closed";
  }
  return transitions[state][event] ?? null;
}

/** States in which microphone audio may be forwarded, other holds permitting. */
export function acceptsMicrophone(state: SessionState): boolean {
  return state === "Listening" || state === "AwaitingResponse" || state === "Speaking";
}
