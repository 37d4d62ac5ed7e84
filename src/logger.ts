import pino, { type Logger } from "pino";
import pretty from "pino-pretty";

/**
 * Logger
 * - Production: structured JSON logs
 * - Otherwise: pretty, colorized lines
 */
export function createLogger(level: string): Logger {
  return process.env.NODE_ENV === "production"
    ? pino({ level })
    : pino({ level }, pretty({ colorize: true, translateTime: "SYS:standard" }));
}
