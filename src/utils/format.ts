const SIZE_UNITS = ["B", "KB", "MB"] as const;

/**
 * Human readable size with one decimal, e.g. `1.5 MB`.
 */
export function formatSize(sizeBytes: number): string {
  let value = sizeBytes;
  for (const unit of SIZE_UNITS) {
    if (value < 1024) {
      return `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} GB`;
}

/**
 * Percentage saved between two totals; 0 when nothing was measured.
 */
export function sizeReductionPercent(originalBytes: number, convertedBytes: number): number {
  if (originalBytes <= 0) {
    return 0;
  }
  return ((originalBytes - convertedBytes) / originalBytes) * 100;
}

export function dayKey(date: Date): string {
  return `${monthKey(date)}-${pad(date.getDate())}`;
}

export function monthKey(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}`;
}

/**
 * Local timestamp used in archive names: `YYYYMMDD_HHMMSS`.
 */
export function fileTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Lower-cased extension without the dot, or an empty string. A leading dot
 * of the base name (`.hidden`) is not an extension.
 */
export function extensionOf(name: string): string {
  const baseStart = name.lastIndexOf("/") + 1;
  const lastDotIndex = name.lastIndexOf(".");
  if (lastDotIndex <= baseStart) {
    return "";
  }
  return name.substring(lastDotIndex + 1).toLowerCase();
}

export function replaceExtension(name: string, extension: string): string {
  const baseStart = name.lastIndexOf("/") + 1;
  const lastDotIndex = name.lastIndexOf(".");
  if (lastDotIndex <= baseStart) {
    // No extension found, just append
    return `${name}${extension}`;
  }
  return `${name.substring(0, lastDotIndex)}${extension}`;
}
