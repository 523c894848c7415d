import winston from "winston";
import { config } from "../config";

const { combine, timestamp, printf, colorize, errors } = winston.format;

/**
 * One console line: timestamp, service, level and message, then any
 * structured metadata as JSON and the stack on its own lines.
 */
export function formatLine({
  level,
  message,
  timestamp,
  stack,
  service,
  ...metadata
}: Record<string, unknown>): string {
  let msg = `${timestamp} [${service}] ${level}: ${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  if (stack) {
    msg += `\n${stack}`;
  }

  return msg;
}

const logFormat = printf((info) => formatLine(info));

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === "test",
  defaultMeta: { service: "shell-warden" },
  format: combine(
    errors({ stack: true }),
    timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    config.isDevelopment ? colorize() : winston.format.uncolorize(),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: ["error"],
    }),
  ],
});

export default logger;
