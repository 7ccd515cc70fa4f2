import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

const TokenQuerySchema = z.object({
  token: z.string().min(1).optional()
});

export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }
  const [scheme, token] = authHeader.split(" ");
  if (scheme?.toLowerCase() !== "bearer" || !token) {
    return null;
  }
  return token;
}

/**
 * Bearer-token guard for the operator API. WebSocket clients that cannot set
 * headers may pass `?token=` instead. No token configured means no guard.
 */
export function operatorAuth(expectedToken: string | undefined) {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    if (!expectedToken) {
      return;
    }

    const query = TokenQuerySchema.safeParse(request.query);
    const token = extractBearerToken(request.headers.authorization) ?? (query.success ? query.data.token : undefined);
    if (token !== expectedToken) {
      reply.code(401).send({
        error: "unauthorized",
        message: "Missing or invalid bearer token"
      });
    }
  };
}
