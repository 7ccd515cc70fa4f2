import type { Logger } from "pino";
import { failedResult } from "../capabilities/errors.js";
import type { CapabilityRegistry } from "../capabilities/registry.js";
import type { InvokeOptions } from "../capabilities/router.js";
import { GEMINI_LIVE_PROFILE, toFunctionDeclaration, type SchemaTargetProfile } from "../capabilities/schema.js";
import type { InvocationRequest, InvocationResult } from "../capabilities/types.js";
import { PlaybackQueue } from "./playback-queue.js";
import type { SessionEventBus } from "./session-events.js";
import { acceptsMicrophone, transition, type SessionEventName } from "./session-state.js";
import type {
  AudioCapture,
  AudioPlayback,
  CloseReason,
  PeerCloseInfo,
  PeerToolCall,
  SessionState,
  VoicePeer,
  VoicePeerHooks
} from "./types.js";

export interface CapabilityInvoker {
  invoke(request: InvocationRequest, options?: InvokeOptions): Promise<InvocationResult>;
}

export interface SessionOrchestratorOptions {
  peer: VoicePeer;
  capture: AudioCapture;
  playbackSink: AudioPlayback;
  registry: Pick<CapabilityRegistry, "list">;
  router: CapabilityInvoker;
  events: SessionEventBus;
  logger: Logger;
  systemInstruction: string;
  googleSearch: boolean;
  startMuted: boolean;
  outputSampleRateHz: number;
  drainGraceMs: number;
  schemaProfile?: SchemaTargetProfile;
}

export interface SessionSnapshot {
  state: SessionState;
  muted: boolean;
  micOpen: boolean;
  playbackActive: boolean;
  echoHold: boolean;
  pendingCallId: string | null;
  capabilities: string[];
}

interface ToolTurn {
  calls: PeerToolCall[];
  controllers: Map<string, AbortController>;
  cancelled: Set<string>;
  currentCallId: string | null;
}

/**
 * Owns one voice session. Every state change runs through a serial task
 * queue; capture only reads the derived `micOpen` predicate and tool
 * invocations run beside the queue, posting their results back into it.
 */
export class SessionOrchestrator {
  private options: SessionOrchestratorOptions;
  private logger: Logger;
  private playback: PlaybackQueue;
  private state: SessionState = "Idle";
  private muted: boolean;
  private echoHold = false;
  private quitRequested = false;
  private toolTurn: ToolTurn | null = null;
  private inputTranscript = "";
  private outputTranscript = "";
  private queue: Promise<void> = Promise.resolve();
  private resolveClosed: (reason: CloseReason) => void = () => undefined;

  readonly closed: Promise<CloseReason>;

  constructor(options: SessionOrchestratorOptions) {
    this.options = options;
    this.logger = options.logger;
    this.muted = options.startMuted;
    this.closed = new Promise<CloseReason>((resolve) => {
      this.resolveClosed = resolve;
    });
    this.playback = new PlaybackQueue({
      sink: options.playbackSink,
      bytesPerSecond: options.outputSampleRateHz * 2,
      drainGraceMs: options.drainGraceMs,
      logger: options.logger,
      onDrained: () => this.post("playback_drained", () => this.handlePlaybackDrained())
    });
  }

  get micOpen(): boolean {
    return acceptsMicrophone(this.state) && !this.muted && !this.playback.active && !this.echoHold;
  }

  start(): Promise<void> {
    return this.run("start", async () => {
      if (this.state !== "Idle") {
        throw new Error("session_already_started");
      }

      const profile = this.options.schemaProfile ?? GEMINI_LIVE_PROFILE;
      const functionDeclarations = this.options.registry.list().map((descriptor) => {
        const { declaration, losses } = toFunctionDeclaration(descriptor, profile);
        for (const loss of losses) {
          this.logger.warn(
            { capability: descriptor.name, path: loss.path, reason: loss.reason },
            "schema translation loss"
          );
        }
        return declaration;
      });

      try {
        await this.playback.start();
        await this.options.peer.connect(
          {
            systemInstruction: this.options.systemInstruction,
            functionDeclarations,
            googleSearch: this.options.googleSearch
          },
          this.peerHooks()
        );
      } catch (error) {
        if (this.quitRequested) {
          await this.shutdown("user_quit", "operator quit during connection setup");
          return;
        }
        const message = error instanceof Error ? error.message : "peer_connect_failed";
        this.options.events.emit({ type: "error", message: `voice peer connection failed: ${message}` });
        await this.shutdown("transport_failure", message);
        throw error;
      }

      this.applyTransition("streamOpened");
      this.options.events.emit({
        type: "info",
        message: `${this.options.peer.provider} session active with ${functionDeclarations.length} capabilities`
      });

      try {
        await this.options.capture.start({
          onFrame: (frame) => this.forwardMicrophoneFrame(frame),
          onError: (error) => this.post("capture_error", () => this.handleCaptureError(error))
        });
        this.options.events.emit({ type: "info", message: `microphone ready (${this.options.capture.device})` });
      } catch (error) {
        this.handleCaptureError(error instanceof Error ? error : new Error(String(error)));
      }

      if (this.muted) {
        this.options.events.emit({ type: "muteChanged", muted: true });
      }
    });
  }

  setMuted(muted: boolean): Promise<boolean> {
    return this.run("set_muted", () => this.applyMute(muted));
  }

  toggleMute(): Promise<boolean> {
    return this.run("toggle_mute", () => this.applyMute(!this.muted));
  }

  sendText(text: string): Promise<void> {
    return this.run("send_text", () => {
      const trimmed = text.trim();
      if (!trimmed) {
        throw new Error("empty_text");
      }
      if (this.state === "Closed" || this.state === "Idle") {
        throw new Error("session_not_active");
      }

      this.options.peer.sendText(trimmed);
      this.options.events.emit({ type: "transcriptLine", speaker: "user", source: "typed", text: trimmed });
      if (this.state === "Listening") {
        this.applyTransition("responseStarted");
      }
    });
  }

  quit(): Promise<CloseReason> {
    // In-flight invocations are aborted at once rather than behind queued tasks.
    this.quitRequested = true;
    this.abortToolTurn();
    if (this.state === "Idle") {
      // A connect still in progress would otherwise hold the queue until its setup timeout.
      void this.options.peer.close().catch((error: unknown) => {
        this.logger.warn({ error }, "peer close during setup failed");
      });
    }
    this.post("quit", () => this.shutdown("user_quit", "operator quit"));
    return this.closed;
  }

  snapshot(): SessionSnapshot {
    return {
      state: this.state,
      muted: this.muted,
      micOpen: this.micOpen,
      playbackActive: this.playback.active,
      echoHold: this.echoHold,
      pendingCallId: this.toolTurn?.currentCallId ?? null,
      capabilities: this.options.registry.list().map((descriptor) => descriptor.name)
    };
  }

  private post(label: string, task: () => Promise<void> | void): void {
    this.queue = this.queue.then(task).catch((error: unknown) => {
      this.logger.error({ error, task: label }, "session task failed");
    });
  }

  private run<T>(label: string, task: () => Promise<T> | T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.post(label, async () => {
        try {
          resolve(await task());
        } catch (error) {
          reject(error);
        }
      });
    });
  }

  private peerHooks(): VoicePeerHooks {
    return {
      onAudio: (chunk) => this.post("peer_audio", () => this.handlePeerAudio(chunk)),
      onText: (text) => this.post("peer_text", () => this.handlePeerText(text)),
      onInputTranscript: (text) =>
        this.post("input_transcript", () => {
          this.inputTranscript += text;
        }),
      onOutputTranscript: (text) =>
        this.post("output_transcript", () => {
          if (this.state !== "Closed") {
            this.beginResponse();
            this.outputTranscript += text;
          }
        }),
      onTurnComplete: () => this.post("turn_complete", () => this.handleTurnComplete()),
      onInterrupted: () => this.post("interrupted", () => this.handleInterrupted()),
      onToolCall: (calls) => this.post("tool_call", () => this.handleToolCall(calls)),
      onToolCallCancellation: (callIds) => this.post("tool_call_cancellation", () => this.handleCancellation(callIds)),
      onClose: (info: PeerCloseInfo) => this.post("peer_close", () => this.shutdown(info.reason, info.detail))
    };
  }

  private forwardMicrophoneFrame(frame: Buffer): void {
    if (this.micOpen) {
      this.options.peer.sendAudio(frame);
    }
  }

  private applyTransition(event: SessionEventName): boolean {
    const next = transition(this.state, event);
    if (!next) {
      this.logger.debug({ state: this.state, event }, "session event ignored in current state");
      return false;
    }

    const from = this.state;
    this.state = next;
    this.logger.debug({ from, to: next, event }, "session state changed");
    this.options.events.emit({ type: "stateChange", from, to: next, trigger: event });
    return true;
  }

  private beginResponse(): void {
    if (this.state === "Listening") {
      this.applyTransition("responseStarted");
    }
    this.flushInputTranscript();
  }

  private handlePeerAudio(chunk: Buffer): void {
    if (this.state === "Closed") {
      return;
    }
    this.beginResponse();
    if (this.state === "AwaitingResponse") {
      this.applyTransition("audioReceived");
    }
    this.playback.enqueue(chunk);
  }

  private handlePeerText(text: string): void {
    if (this.state === "Closed") {
      return;
    }
    this.beginResponse();
    this.options.events.emit({ type: "transcriptLine", speaker: "assistant", source: "text", text });
  }

  private handleTurnComplete(): void {
    if (this.state === "Closed") {
      return;
    }
    this.flushTranscripts();
    if (this.state === "Speaking" || this.state === "AwaitingResponse") {
      this.applyTransition("turnComplete");
    }
    if (this.echoHold && !this.toolTurn && !this.playback.active) {
      this.releaseEchoHold("turn_complete");
    }
  }

  private handleInterrupted(): void {
    if (this.state === "Closed") {
      return;
    }
    this.playback.clear();
    this.flushTranscripts();
    if (this.state === "Speaking" || this.state === "AwaitingResponse") {
      this.applyTransition("turnComplete");
    }
  }

  private handlePlaybackDrained(): void {
    if (this.echoHold && !this.toolTurn && this.state !== "ToolPending") {
      this.releaseEchoHold("playback_drained");
    }
  }

  private releaseEchoHold(trigger: string): void {
    this.echoHold = false;
    this.logger.debug({ trigger }, "echo hold released");
  }

  private handleToolCall(calls: PeerToolCall[]): void {
    if (this.state === "Closed") {
      return;
    }

    if (this.toolTurn) {
      const pending = this.toolTurn.currentCallId ?? "another call";
      this.answerImmediately(
        calls.map((call) =>
          failedResult(call.request, "ToolCallInProgress", `tool call '${pending}' is still running`)
        )
      );
      return;
    }

    this.beginResponse();
    this.flushOutputTranscript();
    if (!this.applyTransition("toolCallRequested")) {
      this.answerImmediately(
        calls.map((call) => failedResult(call.request, "CapabilityFailed", `session cannot run tools while ${this.state}`))
      );
      return;
    }

    this.echoHold = true;
    const turn: ToolTurn = {
      calls,
      controllers: new Map(),
      cancelled: new Set(),
      currentCallId: null
    };
    this.toolTurn = turn;

    this.executeToolTurn(turn).then(
      (results) => this.post("tool_results", () => this.finishToolTurn(turn, results)),
      (error: unknown) => {
        this.logger.error({ error }, "tool turn failed");
        const results = turn.calls.map((call) =>
          failedResult(call.request, "CapabilityFailed", error instanceof Error ? error.message : "tool_turn_failed")
        );
        this.post("tool_results", () => this.finishToolTurn(turn, results));
      }
    );
  }

  /** Runs a batch of calls one after another; never touches session state. */
  private async executeToolTurn(turn: ToolTurn): Promise<InvocationResult[]> {
    const results: InvocationResult[] = [];

    for (const call of turn.calls) {
      const { request } = call;
      turn.currentCallId = request.callId;
      this.options.events.emit({
        type: "toolCallStarted",
        callId: request.callId,
        capabilityName: request.capabilityName,
        arguments: request.arguments
      });

      const startedAt = Date.now();
      let result: InvocationResult;
      if (call.malformed) {
        result = failedResult(request, "InvalidArguments", call.malformed);
      } else if (turn.cancelled.has(request.callId)) {
        result = failedResult(request, "CapabilityCancelled", "invocation cancelled before dispatch");
      } else {
        const controller = new AbortController();
        turn.controllers.set(request.callId, controller);
        result = await this.options.router.invoke(request, { signal: controller.signal });
        turn.controllers.delete(request.callId);
      }

      this.options.events.emit({ type: "toolCallFinished", result, durationMs: Date.now() - startedAt });
      results.push(result);
    }

    turn.currentCallId = null;
    return results;
  }

  private finishToolTurn(turn: ToolTurn, results: InvocationResult[]): Promise<void> | void {
    if (this.toolTurn !== turn || this.state === "Closed") {
      return;
    }
    this.toolTurn = null;

    try {
      this.options.peer.sendToolResponses(results);
    } catch (error) {
      const message = error instanceof Error ? error.message : "tool_response_failed";
      this.logger.error({ error: message }, "tool response could not be sent");
      return this.shutdown("transport_failure", message);
    }

    this.applyTransition("toolResultSent");
  }

  private handleCancellation(callIds: string[]): void {
    const turn = this.toolTurn;
    if (!turn) {
      return;
    }
    for (const callId of callIds) {
      turn.cancelled.add(callId);
      turn.controllers.get(callId)?.abort();
    }
    this.logger.info({ call_ids: callIds }, "peer cancelled tool calls");
  }

  private answerImmediately(results: InvocationResult[]): void {
    for (const result of results) {
      this.options.events.emit({ type: "toolCallFinished", result, durationMs: 0 });
    }
    try {
      this.options.peer.sendToolResponses(results);
    } catch (error) {
      this.logger.warn({ error: error instanceof Error ? error.message : error }, "tool response could not be sent");
    }
  }

  private applyMute(muted: boolean): boolean {
    if (this.muted !== muted && this.state !== "Closed") {
      this.muted = muted;
      this.logger.info({ muted }, "microphone mute changed");
      this.options.events.emit({ type: "muteChanged", muted });
    }
    return this.muted;
  }

  private handleCaptureError(error: Error): void {
    if (this.state === "Closed") {
      return;
    }
    this.logger.error({ error: error.message }, "audio capture failed");
    this.options.events.emit({ type: "error", message: `microphone unavailable: ${error.message}` });
  }

  private flushInputTranscript(): void {
    const text = this.inputTranscript.trim();
    this.inputTranscript = "";
    if (text) {
      this.options.events.emit({ type: "transcriptLine", speaker: "user", source: "speech", text });
    }
  }

  private flushOutputTranscript(): void {
    const text = this.outputTranscript.trim();
    this.outputTranscript = "";
    if (text) {
      this.options.events.emit({ type: "transcriptLine", speaker: "assistant", source: "speech", text });
    }
  }

  private flushTranscripts(): void {
    this.flushInputTranscript();
    this.flushOutputTranscript();
  }

  private abortToolTurn(): void {
    const turn = this.toolTurn;
    if (!turn) {
      return;
    }
    for (const call of turn.calls) {
      turn.cancelled.add(call.request.callId);
    }
    for (const controller of turn.controllers.values()) {
      controller.abort();
    }
  }

  private async shutdown(reason: CloseReason, detail: string): Promise<void> {
    if (this.state === "Closed") {
      return;
    }

    this.abortToolTurn();
    this.toolTurn = null;
    this.echoHold = false;
    this.flushTranscripts();
    this.applyTransition("close");

    const steps: Array<[string, () => Promise<void>]> = [
      ["capture", () => this.options.capture.stop()],
      ["playback", () => this.playback.stop()],
      ["peer", () => this.options.peer.close()]
    ];
    const outcomes = await Promise.allSettled(steps.map(([, step]) => step()));
    outcomes.forEach((outcome, index) => {
      if (outcome.status === "rejected") {
        this.logger.warn({ resource: steps[index]?.[0], error: outcome.reason }, "session teardown step failed");
      }
    });

    this.logger.info({ reason, detail }, "voice session closed");
    this.options.events.emit({ type: "info", message: `session closed (${reason}): ${detail}` });
    this.resolveClosed(reason);
  }
}
