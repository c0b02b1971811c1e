import fs from "fs/promises";
import path from "path";
import pLimit from "p-limit";
import {
  emptyCounters,
  emptyStatistics,
  StatisticsQueryResult,
  StatisticsRecord,
  StatisticsScope,
  UsageCounters,
} from "../models";
import { PersistenceError, toError } from "../utils/error";
import { dayKey, monthKey } from "../utils/format";
import logger from "../utils/logger";

export interface StatisticsAggregator {
  load(): Promise<void>;
  record(originalSize: number, convertedSize: number, format: string, now?: Date): Promise<void>;
  query(scope: StatisticsScope, now?: Date): StatisticsQueryResult;
  snapshot(): StatisticsRecord;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toCount(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : 0;
}

function toCounters(value: unknown): UsageCounters {
  if (!isObject(value)) {
    return emptyCounters();
  }
  return {
    images: toCount(value.images),
    originalBytes: toCount(value.originalBytes),
    convertedBytes: toCount(value.convertedBytes),
  };
}

function mapValues<T>(value: unknown, convert: (entry: unknown) => T): Record<string, T> {
  const result: Record<string, T> = {};
  if (isObject(value)) {
    for (const [key, entry] of Object.entries(value)) {
      result[key] = convert(entry);
    }
  }
  return result;
}

/**
 * Fills in whatever a hand-edited or older statistics file is missing.
 */
export function parseStatistics(raw: unknown): StatisticsRecord {
  if (!isObject(raw)) {
    return emptyStatistics();
  }
  return {
    totalImages: toCount(raw.totalImages),
    totalOriginalBytes: toCount(raw.totalOriginalBytes),
    totalConvertedBytes: toCount(raw.totalConvertedBytes),
    byFormat: mapValues(raw.byFormat, toCount),
    byDay: mapValues(raw.byDay, toCounters),
    byMonth: mapValues(raw.byMonth, toCounters),
  };
}

function cloneStatistics(record: StatisticsRecord): StatisticsRecord {
  return {
    totalImages: record.totalImages,
    totalOriginalBytes: record.totalOriginalBytes,
    totalConvertedBytes: record.totalConvertedBytes,
    byFormat: { ...record.byFormat },
    byDay: mapValues(record.byDay, toCounters),
    byMonth: mapValues(record.byMonth, toCounters),
  };
}

function addTo(counters: UsageCounters, originalSize: number, convertedSize: number): void {
  counters.images += 1;
  counters.originalBytes += originalSize;
  counters.convertedBytes += convertedSize;
}

/**
 * Counters kept in memory and rewritten to one JSON file after every
 * recorded conversion. Updates and writes go through a single-slot queue, so
 * concurrent sessions never lose an increment.
 */
export class FileBasedStatisticsAggregator implements StatisticsAggregator {
  private readonly statisticsFilePath: string;
  private readonly writeLimit = pLimit(1);
  private stats: StatisticsRecord = emptyStatistics();
  private isLoaded: boolean = false;

  constructor(statisticsFilePath: string = "data/statistics.json") {
    this.statisticsFilePath = statisticsFilePath;
  }

  async load(): Promise<void> {
    if (this.isLoaded) return;

    try {
      const data = await fs.readFile(this.statisticsFilePath, "utf-8");
      const raw: unknown = JSON.parse(data);
      this.stats = parseStatistics(raw);

      logger.info(`Loaded statistics for ${this.stats.totalImages} converted images`, {
        operation: "statistics.load",
        statisticsFile: this.statisticsFilePath,
        totalImages: this.stats.totalImages,
      });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
        logger.error("Error loading statistics, starting fresh", {
          operation: "statistics.loadError",
          statisticsFile: this.statisticsFilePath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      this.stats = emptyStatistics();
    }

    this.isLoaded = true;
  }

  async record(
    originalSize: number,
    convertedSize: number,
    format: string,
    now: Date = new Date()
  ): Promise<void> {
    await this.writeLimit(async () => {
      await this.load();

      const today = dayKey(now);
      const month = monthKey(now);
      const stats = this.stats;

      stats.totalImages += 1;
      stats.totalOriginalBytes += originalSize;
      stats.totalConvertedBytes += convertedSize;
      stats.byFormat[format] = (stats.byFormat[format] ?? 0) + 1;

      const daily = stats.byDay[today] ?? emptyCounters();
      addTo(daily, originalSize, convertedSize);
      stats.byDay[today] = daily;

      const monthly = stats.byMonth[month] ?? emptyCounters();
      addTo(monthly, originalSize, convertedSize);
      stats.byMonth[month] = monthly;

      try {
        await this.persist();
      } catch (error) {
        const failure = new PersistenceError(
          `Error saving statistics: ${error instanceof Error ? error.message : "Unknown error"}`,
          toError(error)
        );
        logger.error(failure.message, {
          operation: "statistics.saveError",
          statisticsFile: this.statisticsFilePath,
        });
      }
    });
  }

  query(scope: StatisticsScope, now: Date = new Date()): StatisticsQueryResult {
    switch (scope) {
      case "today": {
        const period = dayKey(now);
        return { scope, period, counters: toCounters(this.stats.byDay[period]) };
      }
      case "month": {
        const period = monthKey(now);
        return { scope, period, counters: toCounters(this.stats.byMonth[period]) };
      }
      case "all":
        return {
          scope,
          counters: {
            images: this.stats.totalImages,
            originalBytes: this.stats.totalOriginalBytes,
            convertedBytes: this.stats.totalConvertedBytes,
          },
          byFormat: { ...this.stats.byFormat },
        };
    }
  }

  snapshot(): StatisticsRecord {
    return cloneStatistics(this.stats);
  }

  /**
   * Writes the full structure to a sibling file and renames it over the
   * previous one.
   */
  private async persist(): Promise<void> {
    const directory = path.dirname(this.statisticsFilePath);
    await fs.mkdir(directory, { recursive: true });
    const pendingPath = `${this.statisticsFilePath}.tmp`;
    await fs.writeFile(pendingPath, JSON.stringify(this.stats), "utf-8");
    await fs.rename(pendingPath, this.statisticsFilePath);
  }
}
