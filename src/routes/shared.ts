import type {
  FastifyInstance,
  FastifyReply,
  RawReplyDefaultExpression,
  RawRequestDefaultExpression,
  RawServerDefault,
} from "fastify";
import { z } from "zod";
import type { ServiceConfig } from "../config.js";
import type { Services } from "../container.js";
import { AppError, errorMessage } from "../errors.js";
import type { Logger } from "../utils/logger.js";

export type App = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression<RawServerDefault>,
  RawReplyDefaultExpression<RawServerDefault>,
  Logger
>;

export interface RouteDeps {
  config: ServiceConfig;
  services: Services;
  logger: Logger;
}

/** Known errors keep their status; anything else is a 500 naming the action. */
export function sendFailure(reply: FastifyReply, logger: Logger, err: unknown, action: string) {
  if (err instanceof AppError) {
    logger.warn({ err: err.message }, `Invalid request while trying to ${action}`);
    return reply.code(err.statusCode).send({ error: err.message });
  }
  logger.error({ err: errorMessage(err) }, `Failed to ${action}`);
  return reply.code(500).send({ error: `Failed to ${action}: ${errorMessage(err)}` });
}

// Query strings arrive as strings (or repeated keys as arrays)
export const queryBoolean = z.preprocess(
  (v) => (v === "true" || v === "1" ? true : v === "false" || v === "0" ? false : v),
  z.boolean(),
);

export const queryList = z
  .union([z.string(), z.array(z.string())])
  .transform((v) =>
    (Array.isArray(v) ? v : [v])
      .flatMap((s) => s.split(","))
      .map((s) => s.trim())
      .filter(Boolean),
  );
