import fs from "fs/promises";
import path from "path";
import { Config, ConfigurationError, getConfig } from "./config";
import {
  ArchiveEntry,
  BatchOutcome,
  BatchProgress,
  StagedImage,
  StatisticsQueryResult,
  StatisticsRecord,
  StatisticsScope,
  TargetFormat,
} from "./models";
import {
  BotController,
  ConversionPipeline,
  ExpressService,
  FileBasedStatisticsAggregator,
  HealthStatus,
  SessionStore,
  SharpImageCodec,
  TelegramClient,
  TempStorage,
  UpdatePoller,
  UpdateRouter,
  WEBHOOK_PATH,
  ZipArchiveCodec,
} from "./services";
import { errorMessage } from "./utils/error";
import { extensionOf } from "./utils/format";
import logger, { configureLogger } from "./utils/logger";

const SESSION_SWEEP_INTERVAL = 60 * 1000;

export interface ApplicationOptions {
  /** Overrides the configuration read from the environment. */
  config?: Config;
  skipValidation?: boolean;
  /** Leave process signal handling to the caller. */
  skipSignalHandlers?: boolean;
}

export interface LocalConversion {
  outcome: BatchOutcome;
  /** ZIP of the converted images; null when nothing converted. */
  archive: Buffer | null;
}

export class Application {
  private readonly config: Config;
  private readonly storage: TempStorage;
  private readonly statistics: FileBasedStatisticsAggregator;
  private readonly codec: SharpImageCodec;
  private readonly archives: ZipArchiveCodec;
  private readonly pipeline: ConversionPipeline;
  private readonly sessions: SessionStore;
  private readonly telegram: TelegramClient;
  private readonly controller: BotController;
  private readonly router: UpdateRouter;
  private readonly poller: UpdatePoller | null;
  private readonly expressService: ExpressService;
  private sweepTimer: NodeJS.Timeout | null = null;
  private isShuttingDown = false;
  private readonly skipValidation: boolean;

  constructor(options: ApplicationOptions = {}) {
    try {
      this.config = options.config ?? getConfig();
    } catch (error) {
      if (error instanceof ConfigurationError) {
        logger.error(error.message, { operation: "app.configuration" });
        process.exit(1);
      }
      throw error;
    }

    const config = this.config;
    configureLogger(config.logging);
    this.storage = new TempStorage(config.storage.tempDir);
    this.statistics = new FileBasedStatisticsAggregator(config.storage.statisticsFile);
    this.codec = new SharpImageCodec();
    this.archives = new ZipArchiveCodec({ maxEntrySize: config.conversion.maxFileSize });
    this.pipeline = new ConversionPipeline(this.codec, this.storage, this.statistics);
    this.sessions = new SessionStore(config.conversion.maxBatchSize);
    this.telegram = new TelegramClient({
      token: config.telegram.token,
      apiUrl: config.telegram.apiUrl,
      retryAttempts: config.processing.retryAttempts,
      retryDelay: config.processing.retryDelay,
    });
    this.controller = new BotController(
      {
        transport: this.telegram,
        sessions: this.sessions,
        storage: this.storage,
        codec: this.codec,
        archives: this.archives,
        pipeline: this.pipeline,
        statistics: this.statistics,
      },
      {
        maxFileSize: config.conversion.maxFileSize,
        maxBatchSize: config.conversion.maxBatchSize,
        adminUserId: config.admin.userId,
      }
    );
    this.router = new UpdateRouter(this.controller);

    const webhookMode = config.telegram.mode === "webhook";
    this.poller = webhookMode
      ? null
      : new UpdatePoller(this.telegram, this.router, {
          timeoutSeconds: config.telegram.pollTimeout,
          retryDelay: config.processing.retryDelay,
        });
    this.expressService = new ExpressService(
      {
        port: config.server.port,
        host: config.server.host,
        webhookSecret: config.telegram.webhookSecret,
      },
      this.telegram,
      webhookMode ? this.router : undefined
    );
    this.skipValidation = options.skipValidation || false;

    if (!options.skipSignalHandlers) {
      this.setupShutdownHandlers();
    }
  }

  /**
   * Prepares local state without touching the Bot API.
   */
  async initialize(): Promise<void> {
    await this.storage.init();
    await this.statistics.load();
    if (!this.skipValidation) {
      await this.codec.validateCodec();
    }
  }

  async start(): Promise<void> {
    if (this.isShuttingDown) {
      throw new Error("Cannot start application during shutdown");
    }

    await this.initialize();
    await this.expressService.startServer();

    const webhookUrl = this.config.telegram.webhookUrl;
    if (this.config.telegram.mode === "webhook" && webhookUrl) {
      await this.telegram.setWebhook(
        `${webhookUrl.replace(/\/+$/, "")}${WEBHOOK_PATH}`,
        this.config.telegram.webhookSecret
      );
    } else if (this.poller) {
      // getUpdates is refused while a webhook is registered
      await this.telegram.deleteWebhook();
      this.poller.start();
    }

    const maxAgeMs = this.config.conversion.sessionTtlMinutes * 60 * 1000;
    this.sweepTimer = setInterval(() => {
      this.controller.sweepIdleSessions(maxAgeMs).catch((error: unknown) => {
        logger.error(`Session sweep failed: ${errorMessage(error)}`, { operation: "app.sweep" });
      });
    }, SESSION_SWEEP_INTERVAL);
    this.sweepTimer.unref();

    logger.info(`Bot started in ${this.config.telegram.mode} mode`, {
      operation: "app.start",
      mode: this.config.telegram.mode,
    });
  }

  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    logger.info("Shutting down", { operation: "app.shutdown" });

    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    await this.poller?.stop();
    await this.expressService.stopServer();
    await this.router.idle();

    await this.controller.releaseAllSessions();
  }

  /**
   * Converts local files (images or ZIP archives) through the same pipeline
   * the bot uses.
   */
  async convertFiles(
    inputs: readonly string[],
    format: TargetFormat,
    onProgress?: (progress: BatchProgress) => void
  ): Promise<LocalConversion> {
    if (this.isShuttingDown) {
      throw new Error("Cannot run conversion during shutdown");
    }

    const batch: StagedImage[] = [];
    let outputRefs: string[] = [];
    try {
      for (const input of inputs) {
        for (const entry of await this.readInput(input)) {
          batch.push({
            storageRef: await this.storage.write(entry.data, path.basename(entry.name)),
            originalName: entry.name,
            size: entry.data.length,
            detectedFormat: await this.codec.probe(entry.data),
          });
        }
      }

      const outcome = await this.pipeline.run(batch, format, {
        onProgress,
        onItemFailed: (image, error) => {
          logger.warn(`Skipped ${image.originalName}: ${error.message}`, {
            operation: "app.convertItemFailed",
          });
        },
      });
      outputRefs = outcome.results.map((result) => result.outputRef);
      if (outcome.results.length === 0) {
        return { outcome, archive: null };
      }

      const entries: ArchiveEntry[] = [];
      for (const result of outcome.results) {
        const data = await this.storage.read(result.outputRef);
        if (data) {
          entries.push({ name: result.archiveName, data });
        }
      }
      return { outcome, archive: await this.archives.pack(entries) };
    } finally {
      await this.storage.releaseAll([...outputRefs, ...batch.map((image) => image.storageRef)]);
    }
  }

  queryStatistics(scope: StatisticsScope): StatisticsQueryResult {
    return this.statistics.query(scope);
  }

  statisticsRecord(): StatisticsRecord {
    return this.statistics.snapshot();
  }

  getHealthStatus(): Promise<HealthStatus> {
    return this.expressService.getHealthStatus();
  }

  private async readInput(input: string): Promise<ArchiveEntry[]> {
    const data = await fs.readFile(input);
    if (extensionOf(input) === "zip") {
      return (await this.archives.extract(data)).entries;
    }
    if (data.length > this.config.conversion.maxFileSize) {
      logger.warn(`Skipping ${input}: larger than the maximum file size`, {
        operation: "app.inputTooLarge",
        size: data.length,
      });
      return [];
    }
    return [{ name: path.basename(input), data }];
  }

  private setupShutdownHandlers(): void {
    const signals: NodeJS.Signals[] = ["SIGTERM", "SIGINT", "SIGUSR2"];

    signals.forEach((signal) => {
      process.on(signal, () => {
        this.shutdown()
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            logger.error(`Shutdown failed: ${errorMessage(error)}`, { operation: "app.shutdown" });
            process.exit(1);
          });
      });
    });

    // Handle uncaught exceptions
    process.on("uncaughtException", (error) => {
      logger.error(`Uncaught Exception: ${error.message}`, {
        operation: "app.uncaughtException",
        stack: error.stack,
      });
      process.exit(1);
    });

    // Handle unhandled promise rejections
    process.on("unhandledRejection", (reason) => {
      logger.error(`Unhandled Rejection: ${errorMessage(reason)}`, {
        operation: "app.unhandledRejection",
      });
      process.exit(1);
    });
  }

  getConfig(): Config {
    return this.config;
  }
}
