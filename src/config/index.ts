import * as dotenv from "dotenv";
import os from "os";
import path from "path";

// Load environment variables from .env file
dotenv.config();

export type BotMode = "polling" | "webhook";

export interface Config {
  telegram: {
    token: string;
    apiUrl: string;
    mode: BotMode;
    webhookUrl?: string | undefined;
    webhookSecret?: string | undefined;
    pollTimeout: number;
  };
  admin: {
    userId?: string | undefined;
  };
  conversion: {
    maxFileSize: number;
    maxBatchSize: number;
    sessionTtlMinutes: number;
  };
  storage: {
    tempDir: string;
    statisticsFile: string;
  };
  processing: {
    retryAttempts: number;
    retryDelay: number;
  };
  logging: {
    level: string;
    format: string;
  };
  server: {
    port: number;
    host: string;
  };
}

export interface ValidationError {
  field: string;
  message: string;
}

export class ConfigurationError extends Error {
  public readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    const message = `Configuration validation failed:\n${errors
      .map((e) => `- ${e.field}: ${e.message}`)
      .join("\n")}`;
    super(message);
    this.name = "ConfigurationError";
    this.errors = errors;
  }
}

/**
 * Validates a Bot API token: `<bot id>:<secret>`
 */
function validateBotToken(token: string): boolean {
  return /^\d+:[A-Za-z0-9_-]+$/.test(token);
}

function validateHttpUrl(value: string, httpsOnly: boolean): boolean {
  try {
    const url = new URL(value);
    return httpsOnly
      ? url.protocol === "https:"
      : url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
}

/**
 * Validates log level
 */
function validateLogLevel(level: string): boolean {
  const validLevels = ["error", "warn", "info", "debug"];
  return validLevels.includes(level.toLowerCase());
}

function isWholeNumber(value: number): boolean {
  return Number.isInteger(value);
}

export interface LoadConfigOptions {
  /** Local commands (`convert`, `stats`) run without a bot token. */
  requireBotToken?: boolean;
}

/**
 * Validates configuration object
 */
export function validateConfig(config: Config, options: LoadConfigOptions = {}): ValidationError[] {
  const errors: ValidationError[] = [];
  const requireBotToken = options.requireBotToken ?? true;

  // Bot API configuration validation
  if ((requireBotToken || config.telegram.token) && !validateBotToken(config.telegram.token)) {
    errors.push({
      field: "telegram.token",
      message: "BOT_TOKEN is required and must look like <bot id>:<secret>",
    });
  }

  if (!validateHttpUrl(config.telegram.apiUrl, false)) {
    errors.push({
      field: "telegram.apiUrl",
      message: "Bot API URL must be an http(s) URL",
    });
  }

  if (config.telegram.mode === "webhook") {
    if (!config.telegram.webhookUrl || !validateHttpUrl(config.telegram.webhookUrl, true)) {
      errors.push({
        field: "telegram.webhookUrl",
        message: "WEBHOOK_URL must be an https URL when BOT_MODE is webhook",
      });
    }
  }

  if (
    config.telegram.webhookSecret !== undefined &&
    !/^[A-Za-z0-9_-]{1,256}$/.test(config.telegram.webhookSecret)
  ) {
    errors.push({
      field: "telegram.webhookSecret",
      message: "Webhook secret must be 1-256 characters of A-Z, a-z, 0-9, _ and -",
    });
  }

  if (
    !isWholeNumber(config.telegram.pollTimeout) ||
    config.telegram.pollTimeout < 0 ||
    config.telegram.pollTimeout > 50
  ) {
    errors.push({
      field: "telegram.pollTimeout",
      message: "Poll timeout must be between 0 and 50 seconds",
    });
  }

  if (config.admin.userId !== undefined && !/^\d+$/.test(config.admin.userId)) {
    errors.push({
      field: "admin.userId",
      message: "ADMIN_ID must be a numeric user id",
    });
  }

  // Conversion configuration validation
  if (!isWholeNumber(config.conversion.maxFileSize) || config.conversion.maxFileSize <= 0) {
    errors.push({
      field: "conversion.maxFileSize",
      message: "Maximum file size must be greater than 0",
    });
  }

  if (
    !isWholeNumber(config.conversion.maxBatchSize) ||
    config.conversion.maxBatchSize < 1 ||
    config.conversion.maxBatchSize > 500
  ) {
    errors.push({
      field: "conversion.maxBatchSize",
      message: "Maximum batch size must be between 1 and 500",
    });
  }

  if (
    !isWholeNumber(config.conversion.sessionTtlMinutes) ||
    config.conversion.sessionTtlMinutes < 1
  ) {
    errors.push({
      field: "conversion.sessionTtlMinutes",
      message: "Session TTL must be at least 1 minute",
    });
  }

  // Storage configuration validation
  if (!config.storage.tempDir) {
    errors.push({
      field: "storage.tempDir",
      message: "Temporary directory must not be empty",
    });
  }

  if (!config.storage.statisticsFile) {
    errors.push({
      field: "storage.statisticsFile",
      message: "Statistics file path must not be empty",
    });
  }

  // Processing configuration validation
  if (
    !isWholeNumber(config.processing.retryAttempts) ||
    config.processing.retryAttempts < 0 ||
    config.processing.retryAttempts > 10
  ) {
    errors.push({
      field: "processing.retryAttempts",
      message: "Retry attempts must be between 0 and 10",
    });
  }

  if (
    !isWholeNumber(config.processing.retryDelay) ||
    config.processing.retryDelay < 100 ||
    config.processing.retryDelay > 30000
  ) {
    errors.push({
      field: "processing.retryDelay",
      message: "Retry delay must be between 100ms and 30000ms",
    });
  }

  // Logging configuration validation
  if (!validateLogLevel(config.logging.level)) {
    errors.push({
      field: "logging.level",
      message: "Log level must be one of: error, warn, info, debug",
    });
  }

  const validFormats = ["json", "simple", "combined"];
  if (!validFormats.includes(config.logging.format)) {
    errors.push({
      field: "logging.format",
      message: "Log format must be one of: json, simple, combined",
    });
  }

  // Server configuration validation
  if (
    !isWholeNumber(config.server.port) ||
    config.server.port < 1 ||
    config.server.port > 65535
  ) {
    errors.push({
      field: "server.port",
      message: "Server port must be between 1 and 65535",
    });
  }

  return errors;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Loads configuration from environment variables with defaults
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadConfigOptions = {}
): Config {
  const modeValue = (env.BOT_MODE || "polling").toLowerCase();
  const config: Config = {
    telegram: {
      token: (env.BOT_TOKEN || "").trim(),
      apiUrl: (env.TELEGRAM_API_URL || "https://api.telegram.org").replace(/\/+$/, ""),
      mode: modeValue === "webhook" ? "webhook" : "polling",
      webhookUrl: optional(env.WEBHOOK_URL),
      webhookSecret: optional(env.WEBHOOK_SECRET),
      pollTimeout: parseInt(env.POLL_TIMEOUT || "30", 10),
    },
    admin: {
      userId: optional(env.ADMIN_ID),
    },
    conversion: {
      maxFileSize: parseInt(env.MAX_FILE_SIZE || "20971520", 10), // 20MB default
      maxBatchSize: parseInt(env.MAX_BATCH_SIZE || "50", 10),
      sessionTtlMinutes: parseInt(env.SESSION_TTL_MINUTES || "60", 10),
    },
    storage: {
      tempDir: env.TEMP_DIR || path.join(os.tmpdir(), "image-format-bot"),
      statisticsFile: env.STATS_FILE || path.join("data", "statistics.json"),
    },
    processing: {
      retryAttempts: parseInt(env.RETRY_ATTEMPTS || "3", 10),
      retryDelay: parseInt(env.RETRY_DELAY || "1000", 10), // 1 second default
    },
    logging: {
      level: (env.LOG_LEVEL || "info").toLowerCase(),
      format: (env.LOG_FORMAT || "json").toLowerCase(),
    },
    server: {
      port: parseInt(env.PORT || "3000", 10),
      host: env.HOST || "0.0.0.0",
    },
  };

  // Validate the configuration
  const errors = validateConfig(config, options);
  if (modeValue !== "polling" && modeValue !== "webhook") {
    errors.unshift({
      field: "telegram.mode",
      message: "Bot mode must be one of: polling, webhook",
    });
  }
  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }

  return config;
}

/**
 * Gets the current configuration instance
 */
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}
