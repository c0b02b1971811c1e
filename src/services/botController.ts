import path from "path";
import { ArchiveEntry, StagedImage, StatisticsScope } from "../models";
import { ArchiveError, CriticalError, errorMessage, toError } from "../utils/error";
import logger from "../utils/logger";
import { ArchiveCodec, ExtractedArchive } from "./archiveCodec";
import { ConversionPipeline } from "./conversionPipeline";
import { ImageCodec } from "./imageCodec";
import {
  formatChoices,
  helpText,
  MESSAGES,
  outputArchiveName,
  parseFormatChoice,
  renderBatchFull,
  renderCaption,
  renderFileTooLarge,
  renderItemWarning,
  renderPreparing,
  renderProgress,
  renderStatistics,
  renderStatus,
  renderSummary,
  welcomeText,
} from "./sessionPresenter";
import { ExpiredSession, MessageHandle, SessionStore } from "./sessionStore";
import { StatisticsAggregator } from "./statisticsAggregator";
import { ChatTransport } from "./telegramClient";
import { TempStorage } from "./tempStorage";

export const ZIP_MIME_TYPES = new Set(["application/zip", "application/x-zip-compressed"]);

export interface ChatContext {
  chatId: number;
  userId: number;
}

export interface IncomingPhoto {
  fileId: string;
  fileUniqueId: string;
  fileSize?: number;
}

export interface IncomingDocument {
  fileId: string;
  fileName?: string;
  mimeType?: string;
  fileSize?: number;
}

export interface BotControllerDependencies {
  transport: ChatTransport;
  sessions: SessionStore;
  storage: TempStorage;
  codec: ImageCodec;
  archives: ArchiveCodec;
  pipeline: ConversionPipeline;
  statistics: StatisticsAggregator;
}

export interface BotControllerOptions {
  maxFileSize: number;
  maxBatchSize: number;
  adminUserId?: string;
}

interface IncomingImage {
  name: string;
  data: Buffer;
}

/**
 * Handles inbound chat events. Every handler reports failures to the chat
 * and never rethrows, so one bad update cannot stop the update loop.
 */
export class BotController {
  private readonly transport: ChatTransport;
  private readonly sessions: SessionStore;
  private readonly storage: TempStorage;
  private readonly codec: ImageCodec;
  private readonly archives: ArchiveCodec;
  private readonly pipeline: ConversionPipeline;
  private readonly statistics: StatisticsAggregator;
  private readonly options: BotControllerOptions;

  constructor(dependencies: BotControllerDependencies, options: BotControllerOptions) {
    this.transport = dependencies.transport;
    this.sessions = dependencies.sessions;
    this.storage = dependencies.storage;
    this.codec = dependencies.codec;
    this.archives = dependencies.archives;
    this.pipeline = dependencies.pipeline;
    this.statistics = dependencies.statistics;
    this.options = options;
  }

  async onStart(ctx: ChatContext): Promise<void> {
    await this.reply(ctx.chatId, welcomeText());
  }

  async onHelp(ctx: ChatContext): Promise<void> {
    await this.reply(ctx.chatId, helpText(this.options));
  }

  async onStats(ctx: ChatContext, args: readonly string[]): Promise<void> {
    if (!this.options.adminUserId || String(ctx.userId) !== this.options.adminUserId) {
      logger.warn("Statistics requested by a non-admin user", {
        operation: "bot.statsDenied",
        userId: ctx.userId,
      });
      await this.reply(ctx.chatId, MESSAGES.statisticsForbidden);
      return;
    }

    const requested = args[0];
    const scope: StatisticsScope = requested === "today" || requested === "month" ? requested : "all";
    await this.reply(ctx.chatId, renderStatistics(this.statistics.query(scope)));
  }

  async onImage(ctx: ChatContext, photo: IncomingPhoto): Promise<void> {
    try {
      if (this.exceedsLimit(photo.fileSize)) {
        await this.reply(ctx.chatId, renderFileTooLarge(this.options.maxFileSize));
        return;
      }

      const data = await this.transport.downloadFile(photo.fileId);
      if (this.exceedsLimit(data.length)) {
        await this.reply(ctx.chatId, renderFileTooLarge(this.options.maxFileSize));
        return;
      }

      logger.info("Received image", {
        operation: "bot.image",
        userId: ctx.userId,
        size: data.length,
      });
      await this.stageAndReport(ctx, [{ name: `image_${photo.fileUniqueId}.jpg`, data }]);
    } catch (error) {
      logger.error(`Error handling image: ${errorMessage(error)}`, {
        operation: "bot.imageError",
        userId: ctx.userId,
      });
      await this.reply(ctx.chatId, MESSAGES.imageError);
    }
  }

  async onDocument(ctx: ChatContext, document: IncomingDocument): Promise<void> {
    if (!document.mimeType || !ZIP_MIME_TYPES.has(document.mimeType)) {
      await this.reply(ctx.chatId, MESSAGES.notAnArchive);
      return;
    }

    try {
      if (this.exceedsLimit(document.fileSize)) {
        await this.reply(ctx.chatId, renderFileTooLarge(this.options.maxFileSize));
        return;
      }

      const archive = await this.transport.downloadFile(document.fileId);
      if (this.exceedsLimit(archive.length)) {
        await this.reply(ctx.chatId, renderFileTooLarge(this.options.maxFileSize));
        return;
      }

      const room = this.options.maxBatchSize - (await this.sessions.snapshot(ctx.userId)).length;
      let extracted: ExtractedArchive;
      try {
        extracted = await this.archives.extract(archive, Math.max(0, room));
      } catch (error) {
        if (error instanceof ArchiveError) {
          logger.warn(error.message, { operation: "bot.archiveUnreadable", userId: ctx.userId });
          await this.reply(ctx.chatId, MESSAGES.archiveUnreadable);
          return;
        }
        throw error;
      }

      const { entries, omitted } = extracted;
      logger.info(`Extracted ${entries.length} images from ${document.fileName ?? "archive"}`, {
        operation: "bot.archive",
        userId: ctx.userId,
        entries: entries.length,
        omitted,
      });

      if (omitted > 0) {
        await this.reply(ctx.chatId, renderBatchFull(omitted, this.options.maxBatchSize));
      }
      if (entries.length === 0) {
        if (omitted === 0) {
          await this.reply(ctx.chatId, MESSAGES.archiveWithoutImages);
        }
        return;
      }
      await this.stageAndReport(ctx, entries);
    } catch (error) {
      logger.error(`Error handling document: ${errorMessage(error)}`, {
        operation: "bot.documentError",
        userId: ctx.userId,
      });
      await this.reply(ctx.chatId, MESSAGES.fileError);
    }
  }

  async onFormatChoice(ctx: ChatContext, callbackId: string, token: string): Promise<void> {
    try {
      await this.transport.answerCallback(callbackId);
    } catch (error) {
      logger.warn(`Could not answer callback: ${errorMessage(error)}`, {
        operation: "bot.answerCallback",
        userId: ctx.userId,
      });
    }

    const format = parseFormatChoice(token);
    if (!format) {
      await this.reply(ctx.chatId, MESSAGES.unknownFormat);
      return;
    }

    const batch = await this.sessions.take(ctx.userId);
    if (batch.length === 0) {
      await this.reply(ctx.chatId, MESSAGES.nothingPending);
      return;
    }

    let outputRefs: string[] = [];
    try {
      const progressHandle = await this.transport.sendText(
        ctx.chatId,
        renderPreparing(batch.length, format)
      );

      const outcome = await this.pipeline.run(batch, format, {
        onItemFailed: async (image) => {
          await this.transport.sendText(ctx.chatId, renderItemWarning(image));
        },
        onProgress: async (progress) => {
          await this.transport.editStatus(progressHandle, renderProgress(progress));
        },
      });
      outputRefs = outcome.results.map((result) => result.outputRef);

      if (outcome.results.length === 0) {
        await this.reply(ctx.chatId, MESSAGES.nothingConverted);
      } else {
        const entries: ArchiveEntry[] = [];
        for (const result of outcome.results) {
          const data = await this.storage.read(result.outputRef);
          if (data) {
            entries.push({ name: result.archiveName, data });
          }
        }
        const archive = await this.archives.pack(entries);
        await this.transport.sendDocument(
          ctx.chatId,
          outputArchiveName(),
          archive,
          renderCaption(outcome.processedCount, format)
        );
      }

      await this.showStatus(ctx.chatId, progressHandle, renderSummary(outcome));
    } catch (error) {
      const failure = new CriticalError("Batch conversion failed", toError(error));
      logger.error(`${failure.message}: ${errorMessage(error)}`, {
        operation: "bot.criticalError",
        userId: ctx.userId,
        format,
        images: batch.length,
      });
      await this.reply(ctx.chatId, MESSAGES.criticalError);
    } finally {
      await this.storage.releaseAll([...outputRefs, ...batch.map((image) => image.storageRef)]);
    }
  }

  /**
   * Drops abandoned sessions and releases their files.
   */
  async sweepIdleSessions(maxAgeMs: number): Promise<number> {
    return this.releaseSessions(await this.sessions.expireIdle(maxAgeMs));
  }

  /**
   * Drops every pending session, e.g. on shutdown.
   */
  async releaseAllSessions(): Promise<number> {
    return this.releaseSessions(await this.sessions.drain());
  }

  private async releaseSessions(expired: readonly ExpiredSession[]): Promise<number> {
    for (const session of expired) {
      await this.storage.releaseAll(session.images.map((image) => image.storageRef));
      logger.info(`Dropped session with ${session.images.length} pending images`, {
        operation: "bot.sessionDropped",
        userId: session.userId,
        chatId: session.chatId,
      });
    }
    return expired.length;
  }

  private async stageAndReport(ctx: ChatContext, images: readonly IncomingImage[]): Promise<void> {
    const staged: StagedImage[] = [];
    try {
      for (const image of images) {
        const storageRef = await this.storage.write(image.data, path.basename(image.name));
        staged.push({
          storageRef,
          originalName: image.name,
          size: image.data.length,
          detectedFormat: await this.codec.probe(image.data),
        });
      }
    } catch (error) {
      await this.storage.releaseAll(staged.map((image) => image.storageRef));
      throw error;
    }

    const { accepted, rejected, pending } = await this.sessions.add(ctx.userId, ctx.chatId, staged);
    if (rejected.length > 0) {
      await this.storage.releaseAll(rejected.map((image) => image.storageRef));
      await this.reply(ctx.chatId, renderBatchFull(rejected.length, this.options.maxBatchSize));
    }
    if (accepted.length === 0) {
      return;
    }

    const handle = await this.sessions.statusHandle(ctx.userId);
    const shown = await this.showStatus(ctx.chatId, handle, renderStatus(pending), true);
    await this.sessions.setStatusHandle(ctx.userId, shown);
  }

  /**
   * Edits the given message, or sends a new one when there is none or the
   * edit fails.
   */
  private async showStatus(
    chatId: number,
    handle: MessageHandle | null,
    text: string,
    withChoices: boolean = false
  ): Promise<MessageHandle> {
    const choices = withChoices ? formatChoices() : undefined;
    if (handle) {
      try {
        await this.transport.editStatus(handle, text, choices);
        return handle;
      } catch (error) {
        logger.warn(`Could not edit status message: ${errorMessage(error)}`, {
          operation: "bot.editStatus",
          chatId,
        });
      }
    }
    return this.transport.sendStatus(chatId, text, choices);
  }

  private exceedsLimit(size: number | undefined): boolean {
    return size !== undefined && size > this.options.maxFileSize;
  }

  private async reply(chatId: number, text: string): Promise<void> {
    try {
      await this.transport.sendText(chatId, text);
    } catch (error) {
      logger.error(`Failed to send message: ${errorMessage(error)}`, {
        operation: "bot.replyError",
        chatId,
      });
    }
  }
}
