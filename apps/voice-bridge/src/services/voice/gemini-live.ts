import type { Logger } from "pino";
import { WebSocket, type RawData } from "ws";
import { z } from "zod";
import { TransportFailure } from "../capabilities/errors.js";
import type { InvocationResult } from "../capabilities/types.js";
import type { PeerSessionConfig, PeerToolCall, VoicePeer, VoicePeerHooks } from "./types.js";

const PartSchema = z
  .object({
    text: z.string().optional(),
    thought: z.boolean().optional(),
    inlineData: z
      .object({
        mimeType: z.string().optional(),
        data: z.string()
      })
      .optional()
  })
  .passthrough();

const TranscriptionSchema = z.object({ text: z.string().optional() }).passthrough();

const FunctionCallSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().default(""),
    args: z.unknown().optional()
  })
  .passthrough();

const ServerMessageSchema = z
  .object({
    setupComplete: z.object({}).passthrough().optional(),
    serverContent: z
      .object({
        modelTurn: z.object({ parts: z.array(PartSchema).default([]) }).passthrough().optional(),
        turnComplete: z.boolean().optional(),
        interrupted: z.boolean().optional(),
        inputTranscription: TranscriptionSchema.optional(),
        outputTranscription: TranscriptionSchema.optional()
      })
      .passthrough()
      .optional(),
    toolCall: z.object({ functionCalls: z.array(FunctionCallSchema).default([]) }).passthrough().optional(),
    toolCallCancellation: z.object({ ids: z.array(z.string()).default([]) }).passthrough().optional(),
    goAway: z.object({ timeLeft: z.string().optional() }).passthrough().optional()
  })
  .passthrough();

export type PeerEvent =
  | { type: "setupComplete" }
  | { type: "audio"; chunk: Buffer }
  | { type: "text"; text: string }
  | { type: "inputTranscript"; text: string }
  | { type: "outputTranscript"; text: string }
  | { type: "interrupted" }
  | { type: "turnComplete" }
  | { type: "toolCall"; calls: PeerToolCall[] }
  | { type: "toolCallCancellation"; callIds: string[] }
  | { type: "goAway"; timeLeft?: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toToolCall(call: z.infer<typeof FunctionCallSchema>): PeerToolCall {
  const request = {
    callId: call.id ?? "",
    capabilityName: call.name,
    arguments: isPlainObject(call.args) ? call.args : {}
  };

  if (call.args !== undefined && call.args !== null && !isPlainObject(call.args)) {
    return { request, malformed: "function call arguments must be an object" };
  }
  if (!call.name) {
    return { request, malformed: "function call has no name" };
  }
  return { request };
}

/** Maps one decoded server message to peer events, in the order they must be applied. */
export function decodeServerMessage(message: unknown): PeerEvent[] | null {
  const parsed = ServerMessageSchema.safeParse(message);
  if (!parsed.success) {
    return null;
  }

  const data = parsed.data;
  const events: PeerEvent[] = [];

  if (data.setupComplete) {
    events.push({ type: "setupComplete" });
  }

  const content = data.serverContent;
  if (content) {
    if (content.interrupted) {
      events.push({ type: "interrupted" });
    }
    if (content.inputTranscription?.text) {
      events.push({ type: "inputTranscript", text: content.inputTranscription.text });
    }
    for (const part of content.modelTurn?.parts ?? []) {
      if (part.inlineData && part.inlineData.mimeType?.startsWith("audio/") !== false) {
        events.push({ type: "audio", chunk: Buffer.from(part.inlineData.data, "base64") });
      } else if (part.text && !part.thought) {
        events.push({ type: "text", text: part.text });
      }
    }
    if (content.outputTranscription?.text) {
      events.push({ type: "outputTranscript", text: content.outputTranscription.text });
    }
    if (content.turnComplete) {
      events.push({ type: "turnComplete" });
    }
  }

  if (data.toolCall && data.toolCall.functionCalls.length > 0) {
    events.push({ type: "toolCall", calls: data.toolCall.functionCalls.map(toToolCall) });
  }

  if (data.toolCallCancellation && data.toolCallCancellation.ids.length > 0) {
    events.push({ type: "toolCallCancellation", callIds: data.toolCallCancellation.ids });
  }

  if (data.goAway) {
    events.push({ type: "goAway", timeLeft: data.goAway.timeLeft });
  }

  return events;
}

export function buildSetupMessage(model: string, config: PeerSessionConfig): Record<string, unknown> {
  const tools: Array<Record<string, unknown>> = [];
  if (config.functionDeclarations.length > 0) {
    tools.push({ functionDeclarations: config.functionDeclarations });
  }
  if (config.googleSearch) {
    tools.push({ googleSearch: {} });
  }

  return {
    setup: {
      model,
      generationConfig: { responseModalities: ["AUDIO"] },
      systemInstruction: { parts: [{ text: config.systemInstruction }] },
      ...(tools.length > 0 ? { tools } : {}),
      inputAudioTranscription: {},
      outputAudioTranscription: {}
    }
  };
}

export function buildAudioMessage(chunk: Buffer, sampleRateHz: number): Record<string, unknown> {
  return {
    realtimeInput: {
      audio: {
        mimeType: `audio/pcm;rate=${sampleRateHz}`,
        data: chunk.toString("base64")
      }
    }
  };
}

export function buildTextMessage(text: string): Record<string, unknown> {
  return {
    clientContent: {
      turns: [{ role: "user", parts: [{ text }] }],
      turnComplete: true
    }
  };
}

export function buildToolResponseMessage(results: InvocationResult[]): Record<string, unknown> {
  return {
    toolResponse: {
      functionResponses: results.map((result) => ({
        ...(result.callId ? { id: result.callId } : {}),
        name: result.capabilityName,
        response: result.success ? { result: result.payload } : { error: result.error, message: result.message }
      }))
    }
  };
}

function rawToText(raw: RawData): string {
  if (Buffer.isBuffer(raw)) {
    return raw.toString("utf8");
  }
  if (Array.isArray(raw)) {
    return Buffer.concat(raw).toString("utf8");
  }
  return Buffer.from(raw).toString("utf8");
}

export interface GeminiLivePeerOptions {
  url: string;
  apiKey: string;
  model: string;
  inputSampleRateHz: number;
  setupTimeoutMs: number;
  logger: Logger;
  /** Outbound audio is dropped while the socket buffers more than this. */
  maxBufferedBytes?: number;
}

export class GeminiLivePeer implements VoicePeer {
  provider = "gemini_live";
  private options: GeminiLivePeerOptions;
  private ws: WebSocket | null = null;
  private pending: WebSocket | null = null;
  private hooks: VoicePeerHooks | null = null;
  private closeNotified = false;
  private droppedFrames = 0;

  constructor(options: GeminiLivePeerOptions) {
    this.options = options;
  }

  async connect(config: PeerSessionConfig, hooks: VoicePeerHooks): Promise<void> {
    const url = `${this.options.url}?key=${encodeURIComponent(this.options.apiKey)}`;
    const ws = new WebSocket(url);
    // Until setup settles, close() aborts this socket.
    this.pending = ws;
    ws.on("error", (error: Error) => {
      this.options.logger.warn({ error: error.message }, "gemini websocket error");
    });

    try {
      await new Promise<void>((resolve, reject) => {
        const onOpen = () => {
          ws.off("error", onError);
          resolve();
        };
        const onError = (error: Error) => {
          ws.off("open", onOpen);
          reject(new TransportFailure("peer", "gemini_ws_connect_failed", { cause: error }));
        };
        ws.once("open", onOpen);
        ws.once("error", onError);
      });

      // Attached before setup so frames read together with setupComplete are kept.
      this.hooks = hooks;
      ws.on("message", (raw: RawData) => {
        this.handleMessage(raw);
      });

      ws.send(JSON.stringify(buildSetupMessage(this.options.model, config)));
      await this.awaitSetupComplete(ws);
    } catch (error) {
      this.hooks = null;
      throw error;
    } finally {
      if (this.pending === ws) {
        this.pending = null;
      }
    }

    this.ws = ws;
    ws.on("close", (code: number, reason: Buffer) => {
      const detail = `${code}${reason.length > 0 ? ` ${reason.toString("utf8")}` : ""}`;
      this.notifyClose(code === 1000 ? "peer_closed" : "transport_failure", detail);
    });
  }

  sendAudio(chunk: Buffer): void {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return;
    }

    const limit = this.options.maxBufferedBytes ?? 256 * 1024;
    if (ws.bufferedAmount > limit) {
      this.droppedFrames += 1;
      if (this.droppedFrames % 50 === 1) {
        this.options.logger.warn({ dropped_frames: this.droppedFrames }, "gemini socket backlogged, dropping audio");
      }
      return;
    }

    ws.send(JSON.stringify(buildAudioMessage(chunk, this.options.inputSampleRateHz)));
  }

  sendText(text: string): void {
    if (this.ws?.readyState === WebSocket.OPEN) {
      this.ws.send(JSON.stringify(buildTextMessage(text)));
    }
  }

  sendToolResponses(results: InvocationResult[]): void {
    if (results.length === 0) {
      return;
    }
    if (this.ws?.readyState !== WebSocket.OPEN) {
      throw new TransportFailure("peer", "gemini_ws_not_open");
    }
    this.ws.send(JSON.stringify(buildToolResponseMessage(results)));
  }

  async close(): Promise<void> {
    const pending = this.pending;
    this.pending = null;
    // Fails the connect() still waiting on it.
    pending?.terminate();

    const ws = this.ws;
    this.ws = null;
    this.hooks = null;
    if (!ws || ws.readyState === WebSocket.CLOSED) {
      return;
    }

    await new Promise<void>((resolve) => {
      const forceTimer = setTimeout(() => {
        ws.terminate();
        resolve();
      }, 1000);
      ws.once("close", () => {
        clearTimeout(forceTimer);
        resolve();
      });
      if (ws.readyState === WebSocket.OPEN) {
        ws.close(1000, "client_quit");
      } else {
        ws.terminate();
      }
    });
  }

  private awaitSetupComplete(ws: WebSocket): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        ws.off("message", onMessage);
        ws.off("error", onError);
        ws.off("close", onClose);
      };
      const timer = setTimeout(() => {
        cleanup();
        ws.terminate();
        reject(new TransportFailure("peer", "gemini_setup_timeout"));
      }, this.options.setupTimeoutMs);
      const onMessage = (raw: RawData) => {
        let events: PeerEvent[] | null;
        try {
          events = decodeServerMessage(JSON.parse(rawToText(raw)));
        } catch {
          this.options.logger.debug("gemini sent a non-JSON message during setup");
          return;
        }
        if (events?.some((event) => event.type === "setupComplete")) {
          cleanup();
          resolve();
        }
      };
      const onError = (error: Error) => {
        cleanup();
        ws.terminate();
        reject(new TransportFailure("peer", "gemini_setup_failed", { cause: error }));
      };
      const onClose = (code: number, reason: Buffer) => {
        cleanup();
        reject(new TransportFailure("peer", `gemini_setup_rejected: ${code} ${reason.toString("utf8")}`.trim()));
      };
      ws.on("message", onMessage);
      ws.once("error", onError);
      ws.once("close", onClose);
    });
  }

  private handleMessage(raw: RawData): void {
    const hooks = this.hooks;
    if (!hooks) {
      return;
    }

    let events: PeerEvent[] | null;
    try {
      events = decodeServerMessage(JSON.parse(rawToText(raw)));
    } catch {
      this.options.logger.warn("gemini sent a non-JSON message");
      return;
    }

    if (!events) {
      this.options.logger.warn("gemini sent an unrecognized message");
      return;
    }

    for (const event of events) {
      switch (event.type) {
        case "audio":
          hooks.onAudio(event.chunk);
          break;
        case "text":
          hooks.onText(event.text);
          break;
        case "inputTranscript":
          hooks.onInputTranscript(event.text);
          break;
        case "outputTranscript":
          hooks.onOutputTranscript(event.text);
          break;
        case "interrupted":
          hooks.onInterrupted();
          break;
        case "turnComplete":
          hooks.onTurnComplete();
          break;
        case "toolCall":
          hooks.onToolCall(event.calls);
          break;
        case "toolCallCancellation":
          hooks.onToolCallCancellation(event.callIds);
          break;
        case "goAway":
          this.options.logger.warn({ time_left: event.timeLeft }, "gemini announced session end");
          break;
        case "setupComplete":
          break;
      }
    }
  }

  private notifyClose(reason: "peer_closed" | "transport_failure", detail: string): void {
    const hooks = this.hooks;
    if (this.closeNotified || !hooks) {
      return;
    }
    this.closeNotified = true;
    this.hooks = null;
    this.ws = null;
    hooks.onClose({ reason, detail });
  }
}
