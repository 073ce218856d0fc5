/**
 * Tags every status request with an id, echoed in the `x-request-id` header
 * and in the JSON bodies. A caller's id is kept when it is a short token;
 * anything else is replaced with a fresh UUID.
 */
import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { z } from "zod";
import { createLogger } from "../../logger.js";

const log = createLogger("api");

const REQUEST_ID_HEADER = "x-request-id";

const RequestIdSchema = z.string().regex(/^[A-Za-z0-9._:-]{1,128}$/);

/**
 * Keep a well-formed incoming id, otherwise mint one.
 */
function resolveRequestId(incoming: string | undefined): string {
  const parsed = RequestIdSchema.safeParse(incoming);
  return parsed.success ? parsed.data : randomUUID();
}

export const requestContext: MiddlewareHandler = async (c, next) => {
  const requestId = resolveRequestId(c.req.header(REQUEST_ID_HEADER));
  c.set("requestId", requestId);
  c.header(REQUEST_ID_HEADER, requestId);

  const start = Date.now();
  await next();

  log.debug(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    },
    "Status request served",
  );
};

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
