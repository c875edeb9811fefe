import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

/** Credential fields censored wherever a log record carries them. */
export const REDACT_PATHS = [
  "apiKey",
  "token",
  "*.apiKey",
  "*.token",
  "headers.Authorization",
  "*.headers.Authorization",
];

function prettyTransport(): pino.TransportSingleOptions {
  return {
    target: "pino-pretty",
    options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname,service" },
  };
}

/**
 * JSON lines go to `destination`, the configured file or stdout; otherwise
 * output is pretty-printed. Production defaults to JSON.
 */
export function createLogger(config?: LoggingConfig, destination?: pino.DestinationStream): Logger {
  const json = config?.json ?? process.env["NODE_ENV"] === "production";
  const options: pino.LoggerOptions = {
    level: config?.level ?? "info",
    base: { service: "tidepool" },
    redact: { paths: REDACT_PATHS, censor: "[redacted]" },
  };

  if (destination) return pino(options, destination);
  if (config?.file) return pino(options, pino.destination({ dest: config.file, mkdir: true }));
  if (json) return pino(options);
  return pino({ ...options, transport: prettyTransport() });
}
