import type { FastifyReply } from "fastify";
import { isApiError, type ApiErrorKind } from "@hc-bridge/driver-home-connect";

const STATUS_BY_KIND: Record<ApiErrorKind, number> = {
  "no-token": 503,
  cooldown: 429,
  unauthorized: 502,
  "not-found": 404,
  conflict: 409,
  "rate-limited": 429,
  unavailable: 503,
  network: 502,
  "invalid-response": 502,
  http: 502
};

export function httpStatusFor(kind: ApiErrorKind): number {
  return STATUS_BY_KIND[kind];
}

/** Maps vendor API failures onto replies; anything else goes to Fastify's error handler. */
export function sendApiError(reply: FastifyReply, err: unknown): FastifyReply {
  if (!isApiError(err)) {
    throw err;
  }
  return reply.status(httpStatusFor(err.kind)).send({ error: err.kind, message: err.message });
}
