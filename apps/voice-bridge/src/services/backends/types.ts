export interface BackendCapability {
  name: string;
  description: string;
  inputSchema: unknown;
}

export interface BackendCallOutcome {
  /** True when the backend ran the call and reported a failure. */
  isError: boolean;
  payload: unknown;
}

export interface BackendCallOptions {
  signal?: AbortSignal;
}

export type BackendDisconnectListener = (error?: Error) => void;

export interface BackendSession {
  readonly id: string;
  readonly connected: boolean;
  listCapabilities(): Promise<BackendCapability[]>;
  call(name: string, args: Record<string, unknown>, options?: BackendCallOptions): Promise<BackendCallOutcome>;
  /** Returns an unsubscribe function. */
  onDisconnect(listener: BackendDisconnectListener): () => void;
  close(): Promise<void>;
}
