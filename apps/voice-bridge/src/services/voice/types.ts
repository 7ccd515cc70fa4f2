import type { GeminiFunctionDeclaration } from "../capabilities/schema.js";
import type { InvocationRequest, InvocationResult } from "../capabilities/types.js";

export type SessionState = "Idle" | "Listening" | "AwaitingResponse" | "ToolPending" | "Speaking" | "Closed";

export type CloseReason = "user_quit" | "transport_failure" | "peer_closed";

export interface PeerSessionConfig {
  systemInstruction: string;
  functionDeclarations: GeminiFunctionDeclaration[];
  googleSearch: boolean;
}

export interface PeerToolCall {
  request: InvocationRequest;
  /** Set when the peer's call could not be turned into a valid request. */
  malformed?: string;
}

export interface PeerCloseInfo {
  reason: Exclude<CloseReason, "user_quit">;
  detail: string;
}

export interface VoicePeerHooks {
  onAudio: (chunk: Buffer) => void;
  onText: (text: string) => void;
  onInputTranscript: (text: string) => void;
  onOutputTranscript: (text: string) => void;
  onTurnComplete: () => void;
  onInterrupted: () => void;
  onToolCall: (calls: PeerToolCall[]) => void;
  onToolCallCancellation: (callIds: string[]) => void;
  onClose: (info: PeerCloseInfo) => void;
}

export interface VoicePeer {
  provider: string;
  connect(config: PeerSessionConfig, hooks: VoicePeerHooks): Promise<void>;
  sendAudio(chunk: Buffer): void;
  sendText(text: string): void;
  sendToolResponses(results: InvocationResult[]): void;
  close(): Promise<void>;
}

export interface AudioCaptureHooks {
  onFrame: (frame: Buffer) => void;
  onError: (error: Error) => void;
}

export interface AudioCapture {
  device: string;
  start(hooks: AudioCaptureHooks): Promise<void>;
  stop(): Promise<void>;
}

export interface AudioPlayback {
  start(): Promise<void>;
  /** Resolves once the sink has accepted the chunk. */
  write(chunk: Buffer): Promise<void>;
  /** Drops anything buffered in the sink and stops the device. */
  stop(): Promise<void>;
}
