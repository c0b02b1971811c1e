export const TARGET_FORMATS = {
  JPEG: ".jpg",
  PNG: ".png",
  WEBP: ".webp",
  GIF: ".gif",
  TIFF: ".tiff",
  BMP: ".bmp",
  AVIF: ".avif",
} as const;
export type TargetFormat = keyof typeof TARGET_FORMATS;

export const SUPPORTED_EXTENSIONS = [
  "jpg",
  "jpeg",
  "png",
  "webp",
  "gif",
  "tiff",
  "bmp",
  "avif",
] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export function isTargetFormat(value: string): value is TargetFormat {
  return Object.prototype.hasOwnProperty.call(TARGET_FORMATS, value);
}

/**
 * Pixel layout of a decoded image. `palette` marks an indexed source whose
 * pixels have already been expanded to RGB or RGBA.
 */
export type ColorMode = "grey" | "grey-alpha" | "rgb" | "rgba" | "palette";

export type Channels = 1 | 2 | 3 | 4;

export interface DecodedImage {
  pixels: Buffer;
  width: number;
  height: number;
  channels: Channels;
  colorMode: ColorMode;
  sourceFormat: string;
}

export interface StagedImage {
  storageRef: string;
  originalName: string;
  size: number;
  /** Format name found by probing at arrival; null when unrecognised. */
  detectedFormat: string | null;
}

export interface ConversionResult {
  outputRef: string;
  archiveName: string;
  originalSize: number;
  convertedSize: number;
}

export interface BatchOutcome {
  results: ConversionResult[];
  total: number;
  processedCount: number;
  failedCount: number;
  skippedCount: number;
  totalOriginalBytes: number;
  totalConvertedBytes: number;
  elapsedMs: number;
}

export interface BatchProgress {
  processed: number;
  total: number;
  originalBytes: number;
  convertedBytes: number;
}

export interface ArchiveEntry {
  name: string;
  data: Buffer;
}
