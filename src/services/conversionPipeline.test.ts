import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BatchProgress, DecodedImage, StagedImage, TargetFormat } from "../models";
import { DecodeError } from "../utils/error";
import { NormalizedColorMode } from "./colorMode";
import { ConversionPipeline } from "./conversionPipeline";
import { ImageCodec } from "./imageCodec";
import { FileBasedStatisticsAggregator } from "./statisticsAggregator";
import { TempStorage } from "./tempStorage";

/**
 * Treats the input length as the image identity and maps it to a fixed
 * output length. Unknown lengths fail to decode.
 */
class FakeCodec implements ImageCodec {
  readonly colorConversions: NormalizedColorMode[] = [];

  constructor(private readonly outputSizes: Map<number, number>) {}

  async probe(): Promise<string | null> {
    return "PNG";
  }

  async decode(input: Buffer): Promise<DecodedImage> {
    if (!this.outputSizes.has(input.length)) {
      throw new DecodeError();
    }
    return {
      pixels: input,
      width: input.length,
      height: 1,
      channels: 4,
      colorMode: "rgba",
      sourceFormat: "PNG",
    };
  }

  async convertColorMode(image: DecodedImage, mode: NormalizedColorMode): Promise<DecodedImage> {
    this.colorConversions.push(mode);
    return { ...image, channels: mode === "rgb" ? 3 : 4, colorMode: mode };
  }

  async encode(image: DecodedImage, _format: TargetFormat): Promise<Buffer> {
    return Buffer.alloc(this.outputSizes.get(image.width) ?? 0, 1);
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

describe("ConversionPipeline", () => {
  let workDir: string;
  let storage: TempStorage;
  let statistics: FileBasedStatisticsAggregator;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "pipeline-test-"));
    storage = new TempStorage(path.join(workDir, "tmp"));
    statistics = new FileBasedStatisticsAggregator(path.join(workDir, "statistics.json"));
    await storage.init();
    await statistics.load();
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  async function stage(name: string, size: number): Promise<StagedImage> {
    return {
      storageRef: await storage.write(Buffer.alloc(size, 7), name),
      originalName: name,
      size,
      detectedFormat: "PNG",
    };
  }

  it("converts the good images and skips a corrupt one", async () => {
    const codec = new FakeCodec(
      new Map([
        [51200, 20480],
        [30720, 15360],
      ])
    );
    const pipeline = new ConversionPipeline(codec, storage, statistics);
    const batch = [
      await stage("a.png", 51200),
      await stage("b.jpg", 999),
      await stage("c.gif", 30720),
    ];
    const failed: string[] = [];
    const progress: BatchProgress[] = [];

    const outcome = await pipeline.run(batch, "WEBP", {
      onItemFailed: (image) => {
        failed.push(image.originalName);
      },
      onProgress: (update) => {
        progress.push(update);
      },
    });

    expect(outcome.results.map((result) => result.archiveName)).toEqual(["a.webp", "c.webp"]);
    expect(outcome.total).toBe(3);
    expect(outcome.processedCount).toBe(2);
    expect(outcome.failedCount).toBe(1);
    expect(outcome.skippedCount).toBe(0);
    expect(outcome.totalOriginalBytes).toBe(81920);
    expect(outcome.totalConvertedBytes).toBe(35840);
    expect(outcome.elapsedMs).toBeGreaterThanOrEqual(0);
    expect(failed).toEqual(["b.jpg"]);
    expect(progress).toEqual([
      { processed: 2, total: 3, originalBytes: 81920, convertedBytes: 35840 },
    ]);
    expect(codec.colorConversions).toEqual([]);

    const written = await fs.readFile(outcome.results[0].outputRef);
    expect(written.length).toBe(20480);
    for (const image of batch) {
      expect(await exists(image.storageRef)).toBe(false);
    }
  });

  it("records statistics for successful items only", async () => {
    const pipeline = new ConversionPipeline(
      new FakeCodec(new Map([[100, 40]])),
      storage,
      statistics
    );

    await pipeline.run([await stage("a.png", 100), await stage("b.png", 5)], "AVIF");

    const all = statistics.query("all");
    expect(all.counters).toEqual({ images: 1, originalBytes: 100, convertedBytes: 40 });
    expect(all.scope === "all" && all.byFormat).toEqual({ AVIF: 1 });
  });

  it("returns an empty outcome when every item fails", async () => {
    const pipeline = new ConversionPipeline(new FakeCodec(new Map()), storage, statistics);
    const progress: BatchProgress[] = [];

    const outcome = await pipeline.run(
      [await stage("a.png", 10), await stage("b.png", 20)],
      "PNG",
      { onProgress: (update) => void progress.push(update) }
    );

    expect(outcome.results).toEqual([]);
    expect(outcome.failedCount).toBe(2);
    expect(outcome.totalOriginalBytes).toBe(0);
    expect(progress).toEqual([{ processed: 0, total: 2, originalBytes: 0, convertedBytes: 0 }]);
    expect(statistics.query("all").counters.images).toBe(0);
  });

  it("skips staged files that have disappeared", async () => {
    const pipeline = new ConversionPipeline(
      new FakeCodec(new Map([[64, 32]])),
      storage,
      statistics
    );
    const failed: string[] = [];
    const missing: StagedImage = {
      storageRef: path.join(workDir, "tmp", "gone.png"),
      originalName: "gone.png",
      size: 64,
      detectedFormat: "PNG",
    };

    const outcome = await pipeline.run([missing, await stage("kept.png", 64)], "TIFF", {
      onItemFailed: (image) => void failed.push(image.originalName),
    });

    expect(outcome.skippedCount).toBe(1);
    expect(outcome.failedCount).toBe(0);
    expect(outcome.results.map((result) => result.archiveName)).toEqual(["kept.tiff"]);
    expect(failed).toEqual([]);
  });

  it("reports progress every five conversions and at the end", async () => {
    const pipeline = new ConversionPipeline(
      new FakeCodec(new Map([[10, 5]])),
      storage,
      statistics
    );
    const batch: StagedImage[] = [];
    for (let index = 0; index < 6; index++) {
      batch.push(await stage(`${index}.png`, 10));
    }
    const processed: number[] = [];

    await pipeline.run(batch, "GIF", {
      onProgress: (update) => void processed.push(update.processed),
    });

    expect(processed).toEqual([5, 6]);
  });

  it("keeps archive names unique within a batch", async () => {
    const pipeline = new ConversionPipeline(
      new FakeCodec(new Map([[10, 5]])),
      storage,
      statistics
    );

    const outcome = await pipeline.run(
      [await stage("photo.png", 10), await stage("photo.jpg", 10), await stage("photo", 10)],
      "WEBP"
    );

    expect(outcome.results.map((result) => result.archiveName)).toEqual([
      "photo.webp",
      "photo_1.webp",
      "photo_2.webp",
    ]);
  });

  it("normalizes colour mode before encoding JPEG", async () => {
    const codec = new FakeCodec(new Map([[10, 5]]));
    const pipeline = new ConversionPipeline(codec, storage, statistics);

    await pipeline.run([await stage("alpha.png", 10)], "JPEG");

    expect(codec.colorConversions).toEqual(["rgb"]);
  });

  it("treats an empty encoder output as a failure", async () => {
    const pipeline = new ConversionPipeline(new FakeCodec(new Map([[10, 0]])), storage, statistics);

    const outcome = await pipeline.run([await stage("a.png", 10)], "BMP");

    expect(outcome.failedCount).toBe(1);
    expect(outcome.results).toEqual([]);
  });

  it("keeps going when a hook throws", async () => {
    const pipeline = new ConversionPipeline(
      new FakeCodec(new Map([[10, 5]])),
      storage,
      statistics
    );

    const outcome = await pipeline.run([await stage("a.png", 10)], "PNG", {
      onProgress: () => {
        throw new Error("chat unavailable");
      },
    });

    expect(outcome.processedCount).toBe(1);
  });
});
