import Fastify, { type RawReplyDefaultExpression, type RawRequestDefaultExpression, type RawServerDefault } from "fastify";
import cors from "@fastify/cors";
import type { ServiceConfig } from "./config.js";
import type { Services } from "./container.js";
import type { Logger } from "./utils/logger.js";
import { registerAiRoutes } from "./routes/ai.js";
import { registerMetaRoutes } from "./routes/meta.js";
import { registerPlaylistRoutes } from "./routes/playlist.js";
import { registerVideoRoutes } from "./routes/video.js";
import type { App } from "./routes/shared.js";

export type { App } from "./routes/shared.js";

// Reachable without an API key
const PUBLIC_ROUTES = new Set(["/", "/health"]);

export interface BuildAppOptions {
  config: ServiceConfig;
  services: Services;
  logger: Logger;
}

export async function buildApp({ config, services, logger }: BuildAppOptions): Promise<App> {
  const app: App = Fastify<RawServerDefault, RawRequestDefaultExpression, RawReplyDefaultExpression, Logger>({
    logger,
    // scraping plus generation can outlast the default request timeout
    requestTimeout: 0,
  });

  await app.register(cors, {
    origin: config.corsOrigins.includes("*") ? true : config.corsOrigins,
    credentials: true,
  });

  app.addHook("preHandler", async (request, reply) => {
    if (!config.apiKey || PUBLIC_ROUTES.has(request.routeOptions.url ?? "")) return;
    const apiKey = request.headers["x-api-key"];
    if (apiKey !== config.apiKey) {
      return reply.code(401).send({ error: "Unauthorized: Invalid or missing API key" });
    }
  });

  const deps = { config, services, logger };
  registerMetaRoutes(app, deps);
  registerVideoRoutes(app, deps);
  registerPlaylistRoutes(app, deps);
  registerAiRoutes(app, deps);

  return app;
}
