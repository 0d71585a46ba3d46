import type { FastifyRequest } from "fastify";

export const SESSION_HEADER = "x-session-id";

export function readSessionId(request: FastifyRequest): string | undefined {
  const value = request.headers[SESSION_HEADER];
  const sessionId = Array.isArray(value) ? value[0] : value;
  return sessionId?.trim() || undefined;
}
