import {
  BatchOutcome,
  BatchProgress,
  StagedImage,
  StatisticsQueryResult,
  TARGET_FORMATS,
  TargetFormat,
  isTargetFormat,
} from "../models";
import { fileTimestamp, formatSize, sizeReductionPercent } from "../utils/format";

export const FORMAT_CHOICE_PREFIX = "convert_";
const CHOICES_PER_ROW = 2;

export interface FormatChoice {
  label: TargetFormat;
  token: string;
}

export interface ServiceLimits {
  maxFileSize: number;
  maxBatchSize: number;
}

export const MESSAGES = {
  imageError: "Sorry, there was an error processing your image. Please try again.",
  fileError: "Sorry, there was an error processing your file. Please try again.",
  notAnArchive: "Please send a ZIP file containing images or send images directly.",
  archiveUnreadable: "Sorry, the ZIP file could not be read. Please check it and try again.",
  archiveWithoutImages: "The ZIP file did not contain any supported image files.",
  nothingPending: "No images found to convert. Please send images first.",
  nothingConverted: "No images were successfully converted.",
  criticalError: "Sorry, a critical error occurred during conversion. Please try again.",
  statisticsForbidden: "You don't have permission to view statistics.",
  unknownFormat: "Unknown format. Please choose one of the buttons.",
} as const;

export function welcomeText(): string {
  return [
    "👋 Welcome to the Image Format Changer Bot!",
    "",
    "You can:",
    "1. Send me any image or multiple images",
    "2. Send a ZIP file containing images",
    "I'll detect the format and provide conversion options.",
    "",
    "Try sending an image now! 📸",
  ].join("\n");
}

export function helpText(limits: ServiceLimits): string {
  return [
    "🔍 Here's how to use this bot:",
    "",
    "1. Send any image or multiple images",
    "2. Or send a ZIP file containing images",
    "3. I'll detect the format automatically",
    "4. Choose the desired format from the inline buttons",
    "5. I'll convert and send back your image(s) in a ZIP file.",
    "",
    `Supported formats: ${Object.keys(TARGET_FORMATS).join(", ")}`,
    "",
    `Maximum file size: ${formatMegabytes(limits.maxFileSize)}`,
    `Maximum batch size: ${limits.maxBatchSize} images`,
  ].join("\n");
}

function formatMegabytes(bytes: number): string {
  const megabytes = bytes / (1024 * 1024);
  return Number.isInteger(megabytes) ? `${megabytes}MB` : formatSize(bytes);
}

/**
 * Target formats in display order, two per row, each with its callback token.
 */
export function formatChoices(): FormatChoice[][] {
  const rows: FormatChoice[][] = [];
  for (const format of Object.keys(TARGET_FORMATS)) {
    if (!isTargetFormat(format)) continue;
    const choice = { label: format, token: `${FORMAT_CHOICE_PREFIX}${format.toLowerCase()}` };
    const current = rows[rows.length - 1];
    if (current && current.length < CHOICES_PER_ROW) {
      current.push(choice);
    } else {
      rows.push([choice]);
    }
  }
  return rows;
}

export function parseFormatChoice(token: string): TargetFormat | null {
  if (!token.startsWith(FORMAT_CHOICE_PREFIX)) {
    return null;
  }
  const format = token.slice(FORMAT_CHOICE_PREFIX.length).toUpperCase();
  return isTargetFormat(format) ? format : null;
}

/**
 * Pending-batch summary shown above the format buttons.
 */
export function renderStatus(pending: readonly StagedImage[]): string {
  const totalSize = pending.reduce((sum, image) => sum + image.size, 0);
  const formats = new Map<string, number>();
  for (const image of pending) {
    if (image.detectedFormat) {
      formats.set(image.detectedFormat, (formats.get(image.detectedFormat) ?? 0) + 1);
    }
  }

  const lines = [`📸 Total images: ${pending.length} (${formatSize(totalSize)})`];
  if (formats.size === 0) {
    lines.push("- No image formats detected yet (or files are not images).");
  }
  for (const [format, count] of formats) {
    lines.push(`- ${format}: ${count} image${count > 1 ? "s" : ""}`);
  }
  lines.push("", "Select the format to convert all images:");
  return lines.join("\n");
}

export function renderFileTooLarge(maxFileSize: number): string {
  return `Sorry, this file is too large. Maximum file size: ${formatMegabytes(maxFileSize)}`;
}

export function renderBatchFull(rejectedCount: number, maxBatchSize: number): string {
  return (
    `⚠️ Maximum batch size of ${maxBatchSize} images reached. ` +
    `${rejectedCount} image${rejectedCount > 1 ? "s were" : " was"} not added.`
  );
}

export function renderPreparing(count: number, format: TargetFormat): string {
  return `Preparing to convert ${count} images to ${format}...`;
}

export function renderProgress(progress: BatchProgress): string {
  return (
    `Converting... ${progress.processed}/${progress.total} images processed.\n` +
    `Total size so far: ${formatSize(progress.originalBytes)} → ${formatSize(progress.convertedBytes)}`
  );
}

export function renderItemWarning(image: StagedImage): string {
  return `⚠️ Error converting ${image.originalName}. Skipping it.`;
}

export function renderSummary(outcome: BatchOutcome): string {
  const saved = outcome.totalOriginalBytes - outcome.totalConvertedBytes;
  const percent = sizeReductionPercent(outcome.totalOriginalBytes, outcome.totalConvertedBytes);
  return [
    "✅ Batch conversion completed!",
    `- Processed: ${outcome.processedCount}/${outcome.total} images`,
    `- Original total size: ${formatSize(outcome.totalOriginalBytes)}`,
    `- Converted total size: ${formatSize(outcome.totalConvertedBytes)}`,
    `- Space saved: ${formatSize(saved)} (${percent.toFixed(1)}%)`,
    `- Time taken: ${(outcome.elapsedMs / 1000).toFixed(1)} seconds`,
  ].join("\n");
}

export function renderCaption(count: number, format: TargetFormat): string {
  return `Converted ${count} images to ${format}.`;
}

export function outputArchiveName(now: Date = new Date()): string {
  return `converted_images_${fileTimestamp(now)}.zip`;
}

export function renderStatistics(result: StatisticsQueryResult): string {
  const { images, originalBytes, convertedBytes } = result.counters;
  switch (result.scope) {
    case "today":
    case "month":
      return [
        result.scope === "today" ? "📊 Today's Statistics:" : "📊 This Month's Statistics:",
        `Images processed: ${images}`,
        `Original size: ${formatSize(originalBytes)}`,
        `Converted size: ${formatSize(convertedBytes)}`,
        `Space saved: ${formatSize(originalBytes - convertedBytes)}`,
      ].join("\n");
    case "all":
      return [
        "📊 Overall Statistics:",
        `Total images processed: ${images}`,
        `Total original size: ${formatSize(originalBytes)}`,
        `Total converted size: ${formatSize(convertedBytes)}`,
        `Total space saved: ${formatSize(originalBytes - convertedBytes)}`,
        "",
        "Conversions by format:",
        ...Object.entries(result.byFormat).map(([format, count]) => `- ${format}: ${count} images`),
      ].join("\n");
  }
}
