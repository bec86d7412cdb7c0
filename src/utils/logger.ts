import pino from "pino";

export type Logger = pino.Logger;

export interface LoggerConfig {
  level?: string;
  /** Bindings included in every line. */
  base?: Record<string, unknown>;
  /** Defaults to stdout. */
  destination?: pino.DestinationStream;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options = { level: config.level ?? "info", base: { service: "yt-script-scraper", ...config.base } };
  return config.destination ? pino(options, config.destination) : pino(options);
}

/** CLI logs go to stderr so stdout carries only command output. */
export function createCliLogger(verbose: boolean, destination: pino.DestinationStream = pino.destination(2)): Logger {
  return createLogger({ level: verbose ? "debug" : "warn", destination });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
