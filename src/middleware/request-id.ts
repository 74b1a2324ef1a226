import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";

const MAX_INCOMING_LENGTH = 128;

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const incoming = c.req.header("x-request-id")?.trim();
  const requestId = incoming && incoming.length <= MAX_INCOMING_LENGTH ? incoming : randomUUID();
  c.header("x-request-id", requestId);
  await next();
};
