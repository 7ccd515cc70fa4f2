import type { Logger } from "pino";
import type { BackendSession } from "../backends/types.js";
import { failedResult } from "./errors.js";
import { formatArgumentIssues, validateArguments } from "./json-schema.js";
import type { CapabilityRegistry } from "./registry.js";
import type { InvocationRequest, InvocationResult } from "./types.js";

export interface CapabilityRouterOptions {
  registry: CapabilityRegistry;
  logger: Logger;
  timeoutMs: number;
}

export interface InvokeOptions {
  signal?: AbortSignal;
}

interface AttachedSession {
  session: BackendSession;
  detach: () => void;
}

export function summarizePayload(payload: unknown, limit = 500): string {
  if (payload === null || payload === undefined) {
    return "no content";
  }

  const raw = typeof payload === "string" ? payload : JSON.stringify(payload);
  if (!raw) {
    return "no content";
  }
  return raw.length > limit ? `${raw.slice(0, limit)}...` : raw;
}

export class CapabilityRouter {
  private sessions = new Map<string, AttachedSession>();
  // Capability name -> owner, for capabilities withdrawn because the owner died.
  private departed = new Map<string, string>();
  private registry: CapabilityRegistry;
  private logger: Logger;
  private timeoutMs: number;

  constructor(options: CapabilityRouterOptions) {
    this.registry = options.registry;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs;
  }

  attachSession(session: BackendSession): void {
    this.sessions.get(session.id)?.detach();
    const detach = session.onDisconnect((error) => this.handleDisconnect(session.id, error));
    this.sessions.set(session.id, { session, detach });
  }

  detachSession(sessionId: string): void {
    this.sessions.get(sessionId)?.detach();
    this.sessions.delete(sessionId);
    // A deliberate withdrawal leaves the names unknown, not unavailable.
    for (const name of this.registry.unregister(sessionId)) {
      this.departed.delete(name);
    }
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Routes a call to the session that owns the capability. Never rejects:
   * every failure comes back as an error result carrying the request's callId.
   */
  async invoke(request: InvocationRequest, options: InvokeOptions = {}): Promise<InvocationResult> {
    const descriptor = this.registry.lookup(request.capabilityName);
    if (!descriptor) {
      const formerOwner = this.departed.get(request.capabilityName);
      if (formerOwner) {
        return failedResult(
          request,
          "BackendUnavailable",
          `backend '${formerOwner}' for '${request.capabilityName}' is not connected`
        );
      }
      return failedResult(request, "UnknownCapability", `unknown capability '${request.capabilityName}'`);
    }
    this.departed.delete(request.capabilityName);

    const attached = this.sessions.get(descriptor.ownerSessionId);
    if (!attached || !attached.session.connected) {
      this.handleDisconnect(descriptor.ownerSessionId);
      return failedResult(
        request,
        "BackendUnavailable",
        `backend '${descriptor.ownerSessionId}' for '${request.capabilityName}' is not connected`
      );
    }

    const issues = validateArguments(descriptor.inputSchema, request.arguments);
    if (issues.length > 0) {
      return failedResult(request, "InvalidArguments", formatArgumentIssues(issues));
    }

    if (options.signal?.aborted) {
      return failedResult(request, "CapabilityCancelled", "invocation cancelled before dispatch");
    }

    return this.dispatch(attached.session, request, options.signal);
  }

  async close(): Promise<void> {
    const attached = Array.from(this.sessions.values());
    this.sessions.clear();

    const results = await Promise.allSettled(
      attached.map(async ({ session, detach }) => {
        detach();
        await session.close();
      })
    );

    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.warn(
          { session_id: attached[index]?.session.id, error: result.reason },
          "backend session close failed"
        );
      }
    });
  }

  private dispatch(
    session: BackendSession,
    request: InvocationRequest,
    callerSignal: AbortSignal | undefined
  ): Promise<InvocationResult> {
    return new Promise<InvocationResult>((resolve) => {
      const controller = new AbortController();
      let settled = false;
      let timer: NodeJS.Timeout | undefined;
      let stopWatchingDisconnect = (): void => undefined;

      const onAbort = () => abandon(failedResult(request, "CapabilityCancelled", "invocation cancelled"));

      const finish = (result: InvocationResult) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        stopWatchingDisconnect();
        callerSignal?.removeEventListener("abort", onAbort);
        resolve(result);
      };

      // Losing paths also abort the backend request so the server can stop work.
      const abandon = (result: InvocationResult) => {
        if (settled) {
          return;
        }
        finish(result);
        controller.abort();
      };

      timer = setTimeout(() => {
        abandon(
          failedResult(request, "CapabilityTimeout", `'${request.capabilityName}' exceeded ${this.timeoutMs}ms`)
        );
      }, this.timeoutMs);

      callerSignal?.addEventListener("abort", onAbort, { once: true });

      stopWatchingDisconnect = session.onDisconnect(() => {
        abandon(failedResult(request, "BackendUnavailable", `backend '${session.id}' disconnected during the call`));
      });

      session.call(request.capabilityName, request.arguments, { signal: controller.signal }).then(
        (outcome) => {
          if (outcome.isError) {
            finish(failedResult(request, "CapabilityFailed", summarizePayload(outcome.payload)));
            return;
          }
          finish({
            callId: request.callId,
            capabilityName: request.capabilityName,
            success: true,
            payload: outcome.payload
          });
        },
        (error: unknown) => {
          const message = error instanceof Error ? error.message : "backend_call_failed";
          finish(
            session.connected
              ? failedResult(request, "CapabilityFailed", message)
              : failedResult(request, "BackendUnavailable", `backend '${session.id}' disconnected: ${message}`)
          );
        }
      );
    });
  }

  private handleDisconnect(sessionId: string, error?: Error): void {
    const attached = this.sessions.get(sessionId);
    if (attached) {
      attached.detach();
      this.sessions.delete(sessionId);
      this.logger.warn({ session_id: sessionId, error: error?.message }, "backend session disconnected");
    }
    for (const name of this.registry.unregister(sessionId)) {
      this.departed.set(name, sessionId);
    }
  }
}
