import type { FastifyInstance } from "fastify";
import type { CapabilityDescriptor } from "../services/capabilities/types.js";
import type { SessionSnapshot } from "../services/voice/orchestrator.js";
import type { SessionEventBus } from "../services/voice/session-events.js";
import type { CloseReason } from "../services/voice/types.js";
import { OperatorMuteSchema, OperatorTextSchema } from "../types.js";

export interface OperatorSession {
  snapshot(): SessionSnapshot;
  setMuted(muted: boolean): Promise<boolean>;
  toggleMute(): Promise<boolean>;
  sendText(text: string): Promise<void>;
  quit(): Promise<CloseReason>;
}

export interface SessionRouteDeps {
  session: OperatorSession;
  events: SessionEventBus;
  listCapabilities: () => readonly CapabilityDescriptor[];
}

export async function registerSessionRoutes(app: FastifyInstance, deps: SessionRouteDeps): Promise<void> {
  const { session, events } = deps;

  app.get("/session", async () => session.snapshot());

  app.get("/capabilities", async () => ({
    capabilities: deps.listCapabilities().map((descriptor) => ({
      name: descriptor.name,
      description: descriptor.description,
      owner_session_id: descriptor.ownerSessionId,
      input_schema: descriptor.inputSchema
    }))
  }));

  app.post("/session/mute", async (request) => {
    const body = OperatorMuteSchema.parse(request.body ?? {});
    const muted = body.muted === undefined ? await session.toggleMute() : await session.setMuted(body.muted);
    return { muted };
  });

  app.post("/session/text", async (request, reply) => {
    const body = OperatorTextSchema.parse(request.body);
    const { state } = session.snapshot();
    if (state === "Idle" || state === "Closed") {
      reply.code(409).send({ error: "session_not_active", message: `Session is ${state}` });
      return;
    }

    await session.sendText(body.text);
    reply.code(202).send({ accepted: true });
  });

  app.post("/session/quit", async () => {
    const reason = await session.quit();
    return { closed: true, reason };
  });

  app.get("/session/events", { websocket: true }, (socket, request) => {
    for (const event of events.recent()) {
      socket.send(JSON.stringify(event));
    }

    const unsubscribe = events.subscribe((event) => {
      if (socket.readyState === socket.OPEN) {
        socket.send(JSON.stringify(event));
      }
    });

    socket.on("close", () => {
      unsubscribe();
      request.log.debug("session events subscriber left");
    });
  });
}
