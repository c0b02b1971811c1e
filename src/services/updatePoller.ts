import { setTimeout as sleep } from "timers/promises";
import { TelegramUpdate } from "../models";
import { errorMessage } from "../utils/error";
import logger from "../utils/logger";

export interface UpdateSource {
  getUpdates(offset: number, timeoutSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]>;
}

export interface UpdateSink {
  dispatch(update: TelegramUpdate): Promise<void>;
}

export interface UpdatePollerOptions {
  timeoutSeconds: number;
  /** Pause after a failed poll, doubled per consecutive failure. */
  retryDelay: number;
  maxRetryDelay?: number;
}

/**
 * Long-polling loop. Each update is handed to the sink without waiting for
 * it to finish; the sink keeps per-chat ordering.
 */
export class UpdatePoller {
  private readonly source: UpdateSource;
  private readonly sink: UpdateSink;
  private readonly options: UpdatePollerOptions;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private offset = 0;

  constructor(source: UpdateSource, sink: UpdateSink, options: UpdatePollerOptions) {
    this.source = source;
    this.sink = sink;
    this.options = options;
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    logger.info("Polling for updates", {
      operation: "poller.start",
      timeoutSeconds: this.options.timeoutSeconds,
    });
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    this.controller?.abort();
    if (loop) {
      await loop;
    }
    this.loop = null;
    this.controller = null;
    logger.info("Polling stopped", { operation: "poller.stop" });
  }

  private async run(signal: AbortSignal): Promise<void> {
    let failures = 0;
    while (!signal.aborted) {
      let updates: TelegramUpdate[];
      try {
        updates = await this.source.getUpdates(this.offset, this.options.timeoutSeconds, signal);
        failures = 0;
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        failures++;
        const delay = Math.min(
          this.options.retryDelay * 2 ** (failures - 1),
          this.options.maxRetryDelay ?? 30000
        );
        logger.warn(`Polling failed, retrying in ${delay}ms: ${errorMessage(error)}`, {
          operation: "poller.error",
          failures,
        });
        try {
          await sleep(delay, undefined, { signal });
        } catch {
          break;
        }
        continue;
      }

      for (const update of updates) {
        this.offset = Math.max(this.offset, update.update_id + 1);
        this.sink.dispatch(update).catch((error: unknown) => {
          logger.error(`Update ${update.update_id} failed: ${errorMessage(error)}`, {
            operation: "poller.dispatchError",
            updateId: update.update_id,
          });
        });
      }
    }
  }
}
