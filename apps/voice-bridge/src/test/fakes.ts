import { pino, type Logger } from "pino";
import type {
  BackendCallOptions,
  BackendCallOutcome,
  BackendCapability,
  BackendDisconnectListener,
  BackendSession
} from "../services/backends/types.js";
import type { InvocationResult } from "../services/capabilities/types.js";
import type {
  AudioCapture,
  AudioCaptureHooks,
  AudioPlayback,
  PeerSessionConfig,
  VoicePeer,
  VoicePeerHooks
} from "../services/voice/types.js";

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export type CallHandler = (
  name: string,
  args: Record<string, unknown>,
  options: BackendCallOptions
) => Promise<BackendCallOutcome>;

export class FakeBackendSession implements BackendSession {
  readonly id: string;
  connected = true;
  closed = false;
  capabilities: BackendCapability[];
  calls: Array<{ name: string; args: Record<string, unknown>; signal?: AbortSignal }> = [];
  handler: CallHandler;
  private listeners = new Set<BackendDisconnectListener>();

  constructor(id: string, capabilities: BackendCapability[] = [], handler?: CallHandler) {
    this.id = id;
    this.capabilities = capabilities;
    this.handler = handler ?? (async (name) => ({ isError: false, payload: { ran: name } }));
  }

  async listCapabilities(): Promise<BackendCapability[]> {
    return this.capabilities;
  }

  call(name: string, args: Record<string, unknown>, options: BackendCallOptions = {}): Promise<BackendCallOutcome> {
    this.calls.push({ name, args, signal: options.signal });
    return this.handler(name, args, options);
  }

  onDisconnect(listener: BackendDisconnectListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  disconnect(error?: Error): void {
    this.connected = false;
    for (const listener of Array.from(this.listeners)) {
      listener(error);
    }
    this.listeners.clear();
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.disconnect();
  }
}

export function objectSchema(properties: Record<string, unknown>, required: string[] = []): Record<string, unknown> {
  return { type: "object", properties, required };
}

export class FakePeer implements VoicePeer {
  provider = "fake_peer";
  config: PeerSessionConfig | null = null;
  audio: Buffer[] = [];
  texts: string[] = [];
  toolResponses: InvocationResult[][] = [];
  closed = false;
  connectError: Error | null = null;
  /** When set, connect() waits until close() is called and then fails. */
  holdConnect = false;
  private hooks: VoicePeerHooks | null = null;
  private abortConnect: ((error: Error) => void) | null = null;

  async connect(config: PeerSessionConfig, hooks: VoicePeerHooks): Promise<void> {
    if (this.connectError) {
      throw this.connectError;
    }
    if (this.holdConnect) {
      await new Promise<void>((_resolve, reject) => {
        this.abortConnect = reject;
      });
    }
    this.config = config;
    this.hooks = hooks;
  }

  get server(): VoicePeerHooks {
    if (!this.hooks) {
      throw new Error("peer not connected");
    }
    return this.hooks;
  }

  sendAudio(chunk: Buffer): void {
    this.audio.push(chunk);
  }

  sendText(text: string): void {
    this.texts.push(text);
  }

  sendToolResponses(results: InvocationResult[]): void {
    this.toolResponses.push(results);
  }

  async close(): Promise<void> {
    this.closed = true;
    this.abortConnect?.(new Error("peer closed during setup"));
    this.abortConnect = null;
  }
}

export class FakeCapture implements AudioCapture {
  device = "test-mic";
  stopped = false;
  private hooks: AudioCaptureHooks | null = null;

  async start(hooks: AudioCaptureHooks): Promise<void> {
    this.hooks = hooks;
  }

  frame(bytes = 4): void {
    this.hooks?.onFrame(Buffer.alloc(bytes, 1));
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.hooks = null;
  }
}

export class FakeSink implements AudioPlayback {
  writes: Buffer[] = [];
  starts = 0;
  stops = 0;

  async start(): Promise<void> {
    this.starts += 1;
  }

  async write(chunk: Buffer): Promise<void> {
    this.writes.push(chunk);
  }

  async stop(): Promise<void> {
    this.stops += 1;
  }
}
