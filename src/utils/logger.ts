/**
 * Structured logger using Winston.
 * Tags all messages with the emitting component.
 */

import winston from "winston";
import { config } from "../config/index.js";

const { combine, timestamp, printf, colorize, errors } = winston.format;

const logFormat = printf(({ level, message, timestamp, component, ...meta }) => {
  const tag = typeof component === "string" ? `[${component}]` : "[system]";
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(timestamp)} ${level} ${tag} ${String(message)}${metaStr}`;
});

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === "test",
  format: combine(
    errors({ stack: true }),
    timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), logFormat),
    }),
  ],
});

/** Create a child logger tagged with a component name */
export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}
