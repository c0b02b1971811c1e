import {
  BatchOutcome,
  BatchProgress,
  ConversionResult,
  StagedImage,
  TARGET_FORMATS,
  TargetFormat,
} from "../models";
import { EncodeError, toError } from "../utils/error";
import { extensionOf, replaceExtension } from "../utils/format";
import logger from "../utils/logger";
import { requiredColorMode } from "./colorMode";
import { ImageCodec } from "./imageCodec";
import { StatisticsAggregator } from "./statisticsAggregator";
import { TempStorage } from "./tempStorage";

export const PROGRESS_INTERVAL = 5;

export interface PipelineHooks {
  onItemFailed?(image: StagedImage, error: Error): Promise<void> | void;
  onProgress?(progress: BatchProgress): Promise<void> | void;
}

type ItemOutcome =
  | { status: "success"; result: ConversionResult }
  | { status: "skipped" }
  | { status: "failed"; error: Error };

/**
 * Converts a detached batch item by item, in input order. A failing item
 * never stops the batch. Input files are released as each item finishes;
 * output files belong to the caller through the returned results.
 */
export class ConversionPipeline {
  private readonly codec: ImageCodec;
  private readonly storage: TempStorage;
  private readonly statistics: StatisticsAggregator;

  constructor(codec: ImageCodec, storage: TempStorage, statistics: StatisticsAggregator) {
    this.codec = codec;
    this.storage = storage;
    this.statistics = statistics;
  }

  async run(
    batch: readonly StagedImage[],
    format: TargetFormat,
    hooks: PipelineHooks = {}
  ): Promise<BatchOutcome> {
    const startTime = Date.now();
    const outcome: BatchOutcome = {
      results: [],
      total: batch.length,
      processedCount: 0,
      failedCount: 0,
      skippedCount: 0,
      totalOriginalBytes: 0,
      totalConvertedBytes: 0,
      elapsedMs: 0,
    };
    const usedNames = new Set<string>();

    logger.info(`Preparing to convert ${batch.length} images to ${format}`, {
      operation: "batch.start",
      total: batch.length,
      format,
    });

    for (const [index, image] of batch.entries()) {
      const item = await this.processItem(image, format, usedNames);

      switch (item.status) {
        case "success":
          outcome.results.push(item.result);
          outcome.processedCount++;
          outcome.totalOriginalBytes += item.result.originalSize;
          outcome.totalConvertedBytes += item.result.convertedSize;
          break;
        case "skipped":
          outcome.skippedCount++;
          break;
        case "failed":
          outcome.failedCount++;
          await this.notify("onItemFailed", () => hooks.onItemFailed?.(image, item.error));
          break;
      }

      const isLast = index === batch.length - 1;
      const atInterval = item.status === "success" && outcome.processedCount % PROGRESS_INTERVAL === 0;
      if (atInterval || isLast) {
        const progress: BatchProgress = {
          processed: outcome.processedCount,
          total: outcome.total,
          originalBytes: outcome.totalOriginalBytes,
          convertedBytes: outcome.totalConvertedBytes,
        };
        await this.notify("onProgress", () => hooks.onProgress?.(progress));
      }
    }

    outcome.elapsedMs = Date.now() - startTime;

    logger.info("Batch conversion completed", {
      operation: "batch.complete",
      duration: outcome.elapsedMs,
      format,
      processed: outcome.processedCount,
      failed: outcome.failedCount,
      skipped: outcome.skippedCount,
      total: outcome.total,
      totalSizeBefore: outcome.totalOriginalBytes,
      totalSizeAfter: outcome.totalConvertedBytes,
    });

    return outcome;
  }

  private async processItem(
    image: StagedImage,
    format: TargetFormat,
    usedNames: Set<string>
  ): Promise<ItemOutcome> {
    let outputRef: string | null = null;
    try {
      const input = await this.storage.read(image.storageRef);
      if (!input || input.length === 0) {
        logger.warn(`Staged file ${image.storageRef} is missing or empty. Skipping.`, {
          operation: "conversion.skip",
          sourceKey: image.originalName,
          storageRef: image.storageRef,
        });
        return { status: "skipped" };
      }

      const decoded = await this.codec.decode(input);
      logger.debug(`Decoded ${image.originalName}`, {
        operation: "conversion.decoded",
        sourceKey: image.originalName,
        sourceFormat: decoded.sourceFormat,
        colorMode: decoded.colorMode,
        width: decoded.width,
        height: decoded.height,
      });

      const mode = requiredColorMode(decoded.colorMode, format);
      const prepared = mode ? await this.codec.convertColorMode(decoded, mode) : decoded;

      const output = await this.codec.encode(prepared, format);
      if (!output || output.length === 0) {
        throw new EncodeError(`${format} encoder produced no output`);
      }
      outputRef = await this.storage.write(output, TARGET_FORMATS[format]);
      const archiveName = this.reserveName(
        replaceExtension(image.originalName, TARGET_FORMATS[format]),
        usedNames
      );

      const result: ConversionResult = {
        outputRef,
        archiveName,
        originalSize: input.length,
        convertedSize: output.length,
      };
      await this.statistics.record(result.originalSize, result.convertedSize, format);

      logger.info(`Converted ${image.originalName} -> ${archiveName}`, {
        operation: "conversion.success",
        sourceKey: image.originalName,
        targetKey: archiveName,
        originalSize: result.originalSize,
        convertedSize: result.convertedSize,
      });
      return { status: "success", result };
    } catch (error) {
      if (outputRef) {
        await this.storage.release(outputRef);
      }
      const failure = toError(error);
      logger.error(`Error converting image ${image.originalName}`, {
        operation: "conversion.processingError",
        sourceKey: image.originalName,
        storageRef: image.storageRef,
        error: failure.message,
      });
      return { status: "failed", error: failure };
    } finally {
      await this.storage.release(image.storageRef);
    }
  }

  /**
   * Keeps archive member names unique within one batch: `a.webp`, `a_1.webp`...
   */
  private reserveName(name: string, usedNames: Set<string>): string {
    let candidate = name;
    const extension = extensionOf(name);
    const suffix = extension ? name.slice(-(extension.length + 1)) : "";
    const base = suffix ? name.slice(0, -suffix.length) : name;
    for (let counter = 1; usedNames.has(candidate); counter++) {
      candidate = `${base}_${counter}${suffix}`;
    }
    usedNames.add(candidate);
    return candidate;
  }

  private async notify(hook: keyof PipelineHooks, call: () => Promise<void> | void): Promise<void> {
    try {
      await call();
    } catch (error) {
      logger.warn(`Pipeline hook ${hook} failed`, {
        operation: "batch.hookError",
        hook,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
