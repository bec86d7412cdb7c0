#!/usr/bin/env node
import { scrapeCommand } from "./commands/scrape.js";
import { loadConfig } from "./config.js";
import { createServices } from "./container.js";
import { createCliLogger } from "./utils/logger.js";

const cfg = loadConfig();

const io = {
  out: (line: string) => process.stdout.write(`${line}\n`),
  err: (line: string) => process.stderr.write(`${line}\n`),
};

const program = scrapeCommand(
  (opts) => {
    return createServices(cfg, createCliLogger(opts.verbose ?? false));
  },
  io,
  (code) => {
    process.exitCode = code;
  },
).version(cfg.version);

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  io.err(message);
  process.exit(1);
});
