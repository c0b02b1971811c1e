import winston from "winston";

export const LOG_FORMATS: Record<string, winston.Logform.Format> = {
  json: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  simple: winston.format.combine(
    winston.format.colorize(),
    winston.format.simple()
  ),
  combined: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
      return `${String(timestamp)} - ${level.toUpperCase()} - ${String(message)}${extra}`;
    })
  ),
};

const level = (process.env.LOG_LEVEL || "info").toLowerCase();
const format = LOG_FORMATS[(process.env.LOG_FORMAT || "json").toLowerCase()] ?? LOG_FORMATS.json;

const logger = winston.createLogger({
  level,
  format,
  defaultMeta: { service: "image-format-bot" },
  transports: [new winston.transports.Console()],
  silent: process.env.NODE_ENV === "test",
});

export interface LoggerSettings {
  level: string;
  format: string;
}

/**
 * Applies validated settings to the shared logger.
 */
export function configureLogger(settings: LoggerSettings): void {
  logger.level = settings.level.toLowerCase();
  logger.format = LOG_FORMATS[settings.format.toLowerCase()] ?? LOG_FORMATS.json;
}

export default logger;
