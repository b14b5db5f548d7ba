import { destination as pinoDestination, pino, type DestinationStream, type Logger } from "pino";
import type { Env } from "./config.js";

export type { Logger };

/** stderr: stdout carries the CLI's JSON run summary. */
export function logDestination() {
  return pinoDestination(2);
}

export function createLogger(
  env: Pick<Env, "NODE_ENV" | "LOG_LEVEL">,
  destination: DestinationStream = logDestination()
): Logger {
  const level = env.LOG_LEVEL ?? (env.NODE_ENV === "test" ? "silent" : "info");
  return pino({ name: "insider-watch", level }, destination);
}

/** Quiet logger for tests and library callers that do not pass one. */
export const silentLogger: Logger = pino({ level: "silent" });
