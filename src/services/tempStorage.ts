import { randomUUID } from "crypto";
import fs from "fs/promises";
import path from "path";
import logger from "../utils/logger";

/**
 * Owns the bot's scratch directory. Every file handed out by `write` must be
 * given back through `release` (or `releaseAll`) on every exit path.
 */
export class TempStorage {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = rootDir;
  }

  async init(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });
  }

  async write(data: Buffer, suffix: string = ""): Promise<string> {
    await this.init();
    const safeSuffix = path.basename(suffix).replace(/[^A-Za-z0-9._-]/g, "_");
    const filePath = path.join(this.rootDir, `${randomUUID()}${safeSuffix ? `_${safeSuffix}` : ""}`);
    await fs.writeFile(filePath, data);
    return filePath;
  }

  /**
   * Returns the file contents, or null when the file no longer exists.
   */
  async read(filePath: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return null;
      }
      throw error;
    }
  }

  async release(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return;
      }
      logger.error("Failed to release temporary file", {
        operation: "storage.releaseError",
        filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async releaseAll(filePaths: Iterable<string>): Promise<void> {
    await Promise.all(Array.from(filePaths, (filePath) => this.release(filePath)));
  }
}
