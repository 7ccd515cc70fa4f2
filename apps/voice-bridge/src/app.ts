import cors from "@fastify/cors";
import sensible from "@fastify/sensible";
import websocket from "@fastify/websocket";
import Fastify, { type FastifyBaseLogger } from "fastify";
import type { Logger } from "pino";
import { ZodError } from "zod";
import { operatorAuth } from "./middleware/auth.js";
import { registerSessionRoutes, type SessionRouteDeps } from "./routes/session.js";

export interface OperatorApiDeps extends SessionRouteDeps {
  logger: Logger;
  authToken?: string;
}

export function buildApp(deps: OperatorApiDeps) {
  const loggerInstance: FastifyBaseLogger = deps.logger;
  const app = Fastify({ loggerInstance });
  const authenticate = operatorAuth(deps.authToken);

  app.register(sensible);
  app.register(cors, { origin: true });
  app.register(websocket);

  app.addHook("preHandler", async (request, reply) => {
    if (request.url.startsWith("/health")) {
      return;
    }
    await authenticate(request, reply);
  });

  app.get("/health", async () => ({ ok: true, state: deps.session.snapshot().state }));
  app.register(async (instance) => registerSessionRoutes(instance, deps));

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof ZodError) {
      reply.code(400).send({
        error: "bad_request",
        message: "Validation failed",
        details: error.issues
      });
      return;
    }

    app.log.error(error);
    reply.code(500).send({ error: "internal_error", message: "Unexpected server error" });
  });

  return app;
}
