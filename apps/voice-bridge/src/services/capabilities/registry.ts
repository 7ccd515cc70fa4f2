import type { Logger } from "pino";
import type { CapabilityDescriptor } from "./types.js";

export interface RejectedCapability {
  name: string;
  reason: "duplicate_name" | "owner_mismatch";
  existingOwner?: string;
}

export interface RegistrationOutcome {
  accepted: string[];
  rejected: RejectedCapability[];
}

/**
 * Merged capability namespace. The registry is the only writer of its table;
 * every mutation publishes a new frozen snapshot so readers never observe a
 * half-applied registration.
 */
export class CapabilityRegistry {
  private entries = new Map<string, CapabilityDescriptor>();
  private revision = 0;
  private snapshot: readonly CapabilityDescriptor[] = Object.freeze([]);
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  get version(): number {
    return this.revision;
  }

  register(sessionId: string, descriptors: CapabilityDescriptor[]): RegistrationOutcome {
    const outcome: RegistrationOutcome = { accepted: [], rejected: [] };

    for (const descriptor of descriptors) {
      if (descriptor.ownerSessionId !== sessionId) {
        outcome.rejected.push({ name: descriptor.name, reason: "owner_mismatch" });
        this.logger.warn(
          { capability: descriptor.name, session_id: sessionId, owner_session_id: descriptor.ownerSessionId },
          "capability rejected: descriptor belongs to another session"
        );
        continue;
      }

      const existing = this.entries.get(descriptor.name);
      if (existing) {
        outcome.rejected.push({
          name: descriptor.name,
          reason: "duplicate_name",
          existingOwner: existing.ownerSessionId
        });
        this.logger.warn(
          { capability: descriptor.name, session_id: sessionId, existing_owner: existing.ownerSessionId },
          "capability rejected: name already registered"
        );
        continue;
      }

      this.entries.set(descriptor.name, Object.freeze({ ...descriptor }));
      outcome.accepted.push(descriptor.name);
    }

    if (outcome.accepted.length > 0) {
      this.commit();
    }
    return outcome;
  }

  unregister(sessionId: string): string[] {
    const removed: string[] = [];
    for (const [name, descriptor] of this.entries) {
      if (descriptor.ownerSessionId === sessionId) {
        this.entries.delete(name);
        removed.push(name);
      }
    }

    if (removed.length > 0) {
      this.commit();
      this.logger.info({ session_id: sessionId, capabilities: removed }, "capabilities unregistered");
    }
    return removed;
  }

  lookup(name: string): CapabilityDescriptor | undefined {
    return this.entries.get(name);
  }

  list(): readonly CapabilityDescriptor[] {
    return this.snapshot;
  }

  private commit(): void {
    this.revision += 1;
    this.snapshot = Object.freeze(Array.from(this.entries.values()));
  }
}
