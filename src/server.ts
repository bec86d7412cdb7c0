import { loadConfig } from "./config.js";
import { buildApp } from "./app.js";
import { createServices } from "./container.js";
import { createLogger } from "./utils/logger.js";

const cfg = loadConfig();
const logger = createLogger({ level: cfg.logLevel });
const app = await buildApp({ config: cfg, services: createServices(cfg, logger), logger });

const start = async () => {
  try {
    await app.listen({ port: cfg.port, host: cfg.host });
    app.log.info(`${cfg.serviceName} ${cfg.version} listening on ${cfg.host}:${cfg.port}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

const shutdown = (signal: string) => {
  app.log.info(`${signal} received, shutting down`);
  app.close().then(
    () => process.exit(0),
    (err: unknown) => {
      app.log.error(err);
      process.exit(1);
    },
  );
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

await start();
