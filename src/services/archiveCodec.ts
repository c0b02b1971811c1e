import JSZip from "jszip";
import { ArchiveEntry, SUPPORTED_EXTENSIONS } from "../models";
import { ArchiveError, toError } from "../utils/error";
import { extensionOf } from "../utils/format";
import logger from "../utils/logger";

export interface ExtractedArchive {
  entries: ArchiveEntry[];
  /** Supported entries left unread because a count or size cap was reached. */
  omitted: number;
}

export interface ArchiveCodec {
  extract(archive: Buffer, maxEntries?: number): Promise<ExtractedArchive>;
  pack(items: readonly ArchiveEntry[]): Promise<Buffer>;
}

export interface ZipArchiveOptions {
  maxEntrySize: number;
  /** Inflated bytes read from one archive; defaults to ten entries' worth. */
  maxTotalSize?: number;
  maxEntries?: number;
  supportedExtensions?: readonly string[];
}

export class ZipArchiveCodec implements ArchiveCodec {
  private readonly maxEntrySize: number;
  private readonly maxTotalSize: number;
  private readonly maxEntries: number;
  private readonly supportedExtensions: Set<string>;

  constructor(options: ZipArchiveOptions) {
    const extensions: readonly string[] = options.supportedExtensions ?? SUPPORTED_EXTENSIONS;
    this.maxEntrySize = options.maxEntrySize;
    this.maxTotalSize = options.maxTotalSize ?? options.maxEntrySize * 10;
    this.maxEntries = options.maxEntries ?? Number.POSITIVE_INFINITY;
    this.supportedExtensions = new Set(
      extensions.map(
        (extension) => extension.toLowerCase().replace(/^\./, "") // Remove leading dot if present
      )
    );
  }

  /**
   * Returns the supported image entries in archive order. Directories,
   * macOS resource forks and files with other extensions are skipped.
   * Entries are inflated as streams and abandoned as soon as they pass the
   * entry or total size cap; reading stops after `maxEntries` entries.
   */
  async extract(archive: Buffer, maxEntries: number = this.maxEntries): Promise<ExtractedArchive> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(archive);
    } catch (error) {
      throw new ArchiveError(
        `Unable to read archive: ${error instanceof Error ? error.message : "Unknown error"}`,
        toError(error)
      );
    }

    const candidates: JSZip.JSZipObject[] = [];
    zip.forEach((relativePath, file) => {
      if (file.dir) {
        return;
      }
      if (relativePath.startsWith("__MACOSX/") || !this.isImageFile(relativePath)) {
        logger.info(`Skipping non-image entry from archive: ${relativePath}`, {
          operation: "archive.skip",
          entry: relativePath,
        });
        return;
      }
      candidates.push(file);
    });

    const entries: ArchiveEntry[] = [];
    let totalSize = 0;
    let index = 0;
    for (; index < candidates.length && entries.length < maxEntries; index++) {
      const file = candidates[index];
      const budget = this.maxTotalSize - totalSize;
      const data = await this.readEntry(file, Math.min(this.maxEntrySize, budget));
      if (data) {
        totalSize += data.length;
        entries.push({ name: file.name, data });
        continue;
      }
      if (budget < this.maxEntrySize) {
        logger.warn(`Archive exceeds ${this.maxTotalSize} inflated bytes; stopped at ${file.name}`, {
          operation: "archive.totalExceeded",
          entry: file.name,
          maxTotalSize: this.maxTotalSize,
        });
        break;
      }
      logger.warn(`Skipping oversized archive entry: ${file.name}`, {
        operation: "archive.oversized",
        entry: file.name,
        maxEntrySize: this.maxEntrySize,
      });
    }

    const omitted = candidates.length - index;
    if (omitted > 0) {
      logger.info(`Left ${omitted} archive entries unread`, {
        operation: "archive.omitted",
        omitted,
        maxEntries,
      });
    }
    return { entries, omitted };
  }

  /**
   * Inflates one entry, or resolves null once more than `limit` bytes came out.
   */
  private readEntry(file: JSZip.JSZipObject, limit: number): Promise<Buffer | null> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let settled = false;
      const stream = file.internalStream("nodebuffer");
      stream
        .on("data", (chunk: Buffer) => {
          if (settled) {
            return;
          }
          size += chunk.length;
          if (size > limit) {
            settled = true;
            stream.pause();
            resolve(null);
            return;
          }
          chunks.push(chunk);
        })
        .on("error", (error: Error) => {
          if (settled) {
            return;
          }
          settled = true;
          reject(
            new ArchiveError(`Unable to read archive entry ${file.name}: ${error.message}`, error)
          );
        })
        .on("end", () => {
          if (settled) {
            return;
          }
          settled = true;
          resolve(Buffer.concat(chunks, size));
        })
        .resume();
    });
  }

  async pack(items: readonly ArchiveEntry[]): Promise<Buffer> {
    const zip = new JSZip();
    for (const item of items) {
      zip.file(item.name, item.data, { createFolders: false });
    }
    try {
      return await zip.generateAsync({
        type: "nodebuffer",
        compression: "DEFLATE",
      });
    } catch (error) {
      throw new ArchiveError(
        `Unable to build archive: ${error instanceof Error ? error.message : "Unknown error"}`,
        toError(error)
      );
    }
  }

  private isImageFile(name: string): boolean {
    const extension = extensionOf(name);
    return extension ? this.supportedExtensions.has(extension) : false;
  }
}
