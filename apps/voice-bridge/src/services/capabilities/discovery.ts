import type { Logger } from "pino";
import type { BackendSession } from "../backends/types.js";
import type { CapabilityRegistry, RegistrationOutcome } from "./registry.js";
import type { CapabilityRouter } from "./router.js";
import { parseSchemaNode } from "./schema.js";
import type { CapabilityDescriptor } from "./types.js";

export interface DiscoveryReport {
  sessionId: string;
  outcome: RegistrationOutcome | null;
  error?: string;
}

export async function discoverCapabilities(
  session: BackendSession,
  registry: CapabilityRegistry,
  logger: Logger
): Promise<RegistrationOutcome> {
  const capabilities = await session.listCapabilities();

  const descriptors = capabilities.map((capability): CapabilityDescriptor => {
    const parsed = parseSchemaNode(capability.inputSchema);
    for (const loss of parsed.losses) {
      logger.warn(
        { session_id: session.id, capability: capability.name, path: loss.path, reason: loss.reason },
        "schema translation loss"
      );
    }

    return {
      name: capability.name,
      description: capability.description,
      inputSchema: capability.inputSchema,
      parameterSchema: parsed.node,
      ownerSessionId: session.id
    };
  });

  return registry.register(session.id, descriptors);
}

/**
 * Attaches every live session to the router and merges its capabilities, in
 * the order given: earlier sessions win name collisions. A session whose
 * listing fails is closed and left out.
 */
export async function registerBackendSessions(
  sessions: BackendSession[],
  registry: CapabilityRegistry,
  router: CapabilityRouter,
  logger: Logger
): Promise<DiscoveryReport[]> {
  const reports: DiscoveryReport[] = [];

  for (const session of sessions) {
    router.attachSession(session);
    try {
      const outcome = await discoverCapabilities(session, registry, logger);
      if (!session.connected) {
        // Disconnected while listing: its disconnect fired before registration.
        router.detachSession(session.id);
        reports.push({ sessionId: session.id, outcome: null, error: "backend_disconnected" });
        continue;
      }
      logger.info(
        { session_id: session.id, accepted: outcome.accepted, rejected: outcome.rejected.map((item) => item.name) },
        "backend capabilities registered"
      );
      reports.push({ sessionId: session.id, outcome });
    } catch (error) {
      const message = error instanceof Error ? error.message : "capability_listing_failed";
      logger.error({ session_id: session.id, error: message }, "backend capability listing failed");
      router.detachSession(session.id);
      await session.close().catch((closeError: unknown) => {
        logger.warn({ session_id: session.id, error: closeError }, "backend session close failed");
      });
      reports.push({ sessionId: session.id, outcome: null, error: message });
    }
  }

  return reports;
}
