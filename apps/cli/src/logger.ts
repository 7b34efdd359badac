import pino from "pino";
import type { Logger } from "pino";
import type { LogLevel } from "./config";

/** JSON lines on stderr, so stdout only ever carries generated items. */
export function createLogger(level: LogLevel): Logger {
  return pino({ name: "relicforge", level }, pino.destination({ dest: 2, sync: true }));
}
