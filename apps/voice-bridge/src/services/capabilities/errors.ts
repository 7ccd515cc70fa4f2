import type { CapabilityErrorCode, InvocationRequest, InvocationResult } from "./types.js";

export class TransportFailure extends Error {
  readonly source: "peer" | "backend";

  constructor(source: "peer" | "backend", message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportFailure";
    this.source = source;
  }
}

export function failedResult(
  request: Pick<InvocationRequest, "callId" | "capabilityName">,
  error: CapabilityErrorCode,
  message: string
): InvocationResult {
  return {
    callId: request.callId,
    capabilityName: request.capabilityName,
    success: false,
    error,
    message
  };
}
