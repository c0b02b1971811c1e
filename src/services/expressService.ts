import { timingSafeEqual } from "crypto";
import express, { Application, Request, Response } from "express";
import fs from "fs/promises";
import { Server } from "http";
import os from "os";
import { TelegramUpdate, TelegramUser } from "../models";
import { errorMessage } from "../utils/error";
import logger from "../utils/logger";
import { UpdateSink } from "./updatePoller";

export const WEBHOOK_PATH = "/telegram/webhook";
export const SECRET_HEADER = "x-telegram-bot-api-secret-token";

type ComponentStatus = "healthy" | "unhealthy" | "degraded";

export interface BotApiProbe {
  getMe(): Promise<TelegramUser>;
}

export interface ExpressServiceOptions {
  port: number;
  host: string;
  /** Expected value of the secret header on webhook calls. */
  webhookSecret?: string;
}

export interface HealthStatus {
  status: ComponentStatus;
  timestamp: string;
  uptime: number;
  version: string;
  environment: string;
  services: {
    telegram: {
      status: "healthy" | "unhealthy";
      details: {
        reachable: boolean;
        username?: string;
      };
    };
    memory: {
      status: ComponentStatus;
      details: {
        used: number;
        total: number;
        percentage: number;
        heapUsed: number;
        heapTotal: number;
      };
    };
    disk: {
      status: ComponentStatus;
      details: {
        available: number;
        total: number;
        percentage: number;
      };
    };
  };
}

function isUpdate(value: unknown): value is TelegramUpdate {
  return (
    typeof value === "object" &&
    value !== null &&
    "update_id" in value &&
    typeof value.update_id === "number"
  );
}

function secretMatches(received: string | undefined, expected: string): boolean {
  if (received === undefined) {
    return false;
  }
  const a = Buffer.from(received);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * HTTP surface of the bot: `/health` always, the webhook route when an
 * update sink is given.
 */
export class ExpressService {
  private readonly app: Application;
  private readonly options: ExpressServiceOptions;
  private readonly botApi: BotApiProbe;
  private readonly sink: UpdateSink | undefined;
  private server: Server | null = null;
  private readonly startTime: number;

  constructor(options: ExpressServiceOptions, botApi: BotApiProbe, sink?: UpdateSink) {
    this.options = options;
    this.botApi = botApi;
    this.sink = sink;
    this.startTime = Date.now();
    this.app = express();

    this.setupMiddleware();
    this.setupRoutes();
  }

  /** Port actually bound, which differs from the configured one when that is 0. */
  get port(): number | null {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : null;
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: "1mb" }));
  }

  private setupRoutes(): void {
    this.app.get("/health", async (_req: Request, res: Response) => {
      try {
        const health = await this.getHealthStatus();
        const statusCode = health.status === "unhealthy" ? 503 : 200;
        res.status(statusCode).json(health);
      } catch (error) {
        logger.error(`Health check failed: ${errorMessage(error)}`, { operation: "server.health" });
        res.status(503).json({
          status: "unhealthy",
          timestamp: new Date().toISOString(),
          error: "Health check failed",
        });
      }
    });

    const sink = this.sink;
    if (!sink) {
      return;
    }
    this.app.post(WEBHOOK_PATH, (req: Request, res: Response) => {
      const secret = this.options.webhookSecret;
      if (secret && !secretMatches(req.get(SECRET_HEADER), secret)) {
        logger.warn("Rejected webhook call with a wrong secret", { operation: "server.webhookDenied" });
        res.sendStatus(401);
        return;
      }
      const update: unknown = req.body;
      if (!isUpdate(update)) {
        res.sendStatus(400);
        return;
      }

      // Acknowledge at once; the API resends updates that are not answered in time
      res.sendStatus(200);
      sink.dispatch(update).catch((error: unknown) => {
        logger.error(`Update ${update.update_id} failed: ${errorMessage(error)}`, {
          operation: "server.dispatchError",
          updateId: update.update_id,
        });
      });
    });
  }

  async startServer(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.options.port, this.options.host, () => {
        logger.info(`Express server started on port ${this.port ?? this.options.port}`, {
          operation: "server.start",
          host: this.options.host,
        });
        resolve();
      });
      server.on("error", (error: Error) => {
        reject(error);
      });
      this.server = server;
    });
  }

  async stopServer(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (server && server.listening) {
        server.close((err?: Error) => {
          if (err) {
            reject(err);
          } else {
            logger.info("Express server stopped", { operation: "server.stop" });
            this.server = null;
            resolve();
          }
        });
      } else {
        // Server is not running or already closed
        resolve();
      }
    });
  }

  async getHealthStatus(): Promise<HealthStatus> {
    const telegramHealth = await this.getTelegramStats();
    const memoryStats = this.getMemoryStats();
    const diskStats = await this.getDiskStats();

    let overallStatus: ComponentStatus = "healthy";
    if (
      telegramHealth.status === "unhealthy" ||
      memoryStats.status === "unhealthy" ||
      diskStats.status === "unhealthy"
    ) {
      overallStatus = "unhealthy";
    } else if (memoryStats.status === "degraded" || diskStats.status === "degraded") {
      overallStatus = "degraded";
    }

    return {
      status: overallStatus,
      timestamp: new Date().toISOString(),
      uptime: Date.now() - this.startTime,
      version: "1.0.0",
      environment: process.env.NODE_ENV || "development",
      services: {
        telegram: telegramHealth,
        memory: memoryStats,
        disk: diskStats,
      },
    };
  }

  private async getTelegramStats(): Promise<HealthStatus["services"]["telegram"]> {
    try {
      const me = await this.botApi.getMe();
      return { status: "healthy", details: { reachable: true, username: me.username } };
    } catch (error) {
      logger.warn(`Bot API unreachable: ${errorMessage(error)}`, { operation: "server.health" });
      return { status: "unhealthy", details: { reachable: false } };
    }
  }

  private getMemoryStats(): HealthStatus["services"]["memory"] {
    const memUsage = process.memoryUsage();
    const totalMemory = os.totalmem();
    const usedMemory = totalMemory - os.freemem();
    const percentage = (usedMemory / totalMemory) * 100;

    let status: ComponentStatus = "healthy";
    if (percentage > 90) {
      status = "unhealthy";
    } else if (percentage > 80) {
      status = "degraded";
    }

    return {
      status,
      details: {
        used: usedMemory,
        total: totalMemory,
        percentage,
        heapUsed: memUsage.heapUsed,
        heapTotal: memUsage.heapTotal,
      },
    };
  }

  private async getDiskStats(): Promise<HealthStatus["services"]["disk"]> {
    try {
      const stats = await fs.statfs("./");

      const total = stats.blocks * stats.bsize;
      const available = stats.bavail * stats.bsize;
      const percentage = total > 0 ? ((total - available) / total) * 100 : 0;

      let status: ComponentStatus = "healthy";
      if (percentage > 95) {
        status = "unhealthy";
      } else if (percentage > 85) {
        status = "degraded";
      }

      return { status, details: { available, total, percentage } };
    } catch (error) {
      logger.debug(`Disk statistics unavailable: ${errorMessage(error)}`, {
        operation: "server.health",
      });
      return { status: "healthy", details: { available: 0, total: 0, percentage: 0 } };
    }
  }
}
