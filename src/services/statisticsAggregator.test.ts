import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StatisticsRecord } from "../models";
import { FileBasedStatisticsAggregator, parseStatistics } from "./statisticsAggregator";

const OCT_19 = new Date(2026, 9, 19, 12, 0, 0);
const OCT_20 = new Date(2026, 9, 20, 8, 30, 0);
const NOV_02 = new Date(2026, 10, 2, 18, 0, 0);

async function readRecord(filePath: string): Promise<StatisticsRecord> {
  return parseStatistics(JSON.parse(await fs.readFile(filePath, "utf-8")));
}

describe("FileBasedStatisticsAggregator", () => {
  let workDir: string;
  let statsFile: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "stats-test-"));
    statsFile = path.join(workDir, "nested", "statistics.json");
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it("starts from zeroed counters when no file exists", async () => {
    const aggregator = new FileBasedStatisticsAggregator(statsFile);
    await aggregator.load();

    expect(aggregator.query("all", OCT_19)).toEqual({
      scope: "all",
      counters: { images: 0, originalBytes: 0, convertedBytes: 0 },
      byFormat: {},
    });
    expect(aggregator.query("today", OCT_19)).toEqual({
      scope: "today",
      period: "2026-10-19",
      counters: { images: 0, originalBytes: 0, convertedBytes: 0 },
    });
  });

  it("updates every counter family and rewrites the file", async () => {
    const aggregator = new FileBasedStatisticsAggregator(statsFile);
    await aggregator.load();

    await aggregator.record(51200, 20480, "WEBP", OCT_19);
    await aggregator.record(30720, 15360, "WEBP", OCT_20);
    await aggregator.record(1000, 900, "PNG", NOV_02);

    const expected: StatisticsRecord = {
      totalImages: 3,
      totalOriginalBytes: 82920,
      totalConvertedBytes: 36740,
      byFormat: { WEBP: 2, PNG: 1 },
      byDay: {
        "2026-10-19": { images: 1, originalBytes: 51200, convertedBytes: 20480 },
        "2026-10-20": { images: 1, originalBytes: 30720, convertedBytes: 15360 },
        "2026-11-02": { images: 1, originalBytes: 1000, convertedBytes: 900 },
      },
      byMonth: {
        "2026-10": { images: 2, originalBytes: 81920, convertedBytes: 35840 },
        "2026-11": { images: 1, originalBytes: 1000, convertedBytes: 900 },
      },
    };
    expect(aggregator.snapshot()).toEqual(expected);
    expect(await readRecord(statsFile)).toEqual(expected);
    await expect(fs.access(`${statsFile}.tmp`)).rejects.toThrow();

    expect(aggregator.query("month", OCT_20)).toEqual({
      scope: "month",
      period: "2026-10",
      counters: { images: 2, originalBytes: 81920, convertedBytes: 35840 },
    });
  });

  it("counts zero-byte conversions", async () => {
    const aggregator = new FileBasedStatisticsAggregator(statsFile);

    await aggregator.record(0, 0, "GIF", OCT_19);

    const all = aggregator.query("all", OCT_19);
    expect(all.counters.images).toBe(1);
    expect(all.scope === "all" && all.byFormat).toEqual({ GIF: 1 });
    expect(aggregator.query("today", OCT_19).counters.images).toBe(1);
  });

  it("returns identical results for repeated queries", async () => {
    const aggregator = new FileBasedStatisticsAggregator(statsFile);
    await aggregator.record(10, 5, "JPEG", OCT_19);

    const first = aggregator.query("all", OCT_19);
    const second = aggregator.query("all", OCT_19);

    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it("keeps every increment under concurrent updates", async () => {
    const aggregator = new FileBasedStatisticsAggregator(statsFile);
    await aggregator.load();

    await Promise.all(
      Array.from({ length: 25 }, (_, index) =>
        aggregator.record(100, 40, index % 2 === 0 ? "WEBP" : "AVIF", OCT_19)
      )
    );

    const record = await readRecord(statsFile);
    expect(record.totalImages).toBe(25);
    expect(record.totalOriginalBytes).toBe(2500);
    expect(record.byFormat).toEqual({ WEBP: 13, AVIF: 12 });
    expect(record.byDay["2026-10-19"].images).toBe(25);
  });

  it("loads counters persisted by an earlier run", async () => {
    const first = new FileBasedStatisticsAggregator(statsFile);
    await first.record(300, 100, "TIFF", OCT_19);

    const second = new FileBasedStatisticsAggregator(statsFile);
    await second.load();
    await second.record(200, 100, "TIFF", OCT_19);

    expect(second.query("today", OCT_19).counters).toEqual({
      images: 2,
      originalBytes: 500,
      convertedBytes: 200,
    });
  });

  it("starts fresh when the file is corrupt", async () => {
    await fs.mkdir(path.dirname(statsFile), { recursive: true });
    await fs.writeFile(statsFile, "{ not json", "utf-8");

    const aggregator = new FileBasedStatisticsAggregator(statsFile);
    await aggregator.load();

    expect(aggregator.snapshot().totalImages).toBe(0);
  });

  it("keeps counting in memory when the file cannot be written", async () => {
    const blocker = path.join(workDir, "blocker");
    await fs.writeFile(blocker, "a file where a directory should be", "utf-8");
    const aggregator = new FileBasedStatisticsAggregator(path.join(blocker, "statistics.json"));

    await expect(aggregator.record(10, 5, "BMP", OCT_19)).resolves.toBeUndefined();
    expect(aggregator.query("all", OCT_19).counters.images).toBe(1);
  });

  it("fills in missing fields of a partial file", () => {
    expect(
      parseStatistics({
        totalImages: 2,
        byFormat: { PNG: 2, JPEG: "many" },
        byDay: { "2026-10-19": { images: 2 } },
      })
    ).toEqual({
      totalImages: 2,
      totalOriginalBytes: 0,
      totalConvertedBytes: 0,
      byFormat: { PNG: 2, JPEG: 0 },
      byDay: { "2026-10-19": { images: 2, originalBytes: 0, convertedBytes: 0 } },
      byMonth: {},
    });
    expect(parseStatistics(null)).toEqual(parseStatistics([]));
  });
});
