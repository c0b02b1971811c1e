import { TelegramMessage, TelegramUpdate } from "../models";
import { errorMessage } from "../utils/error";
import { KeyedQueue } from "../utils/keyedQueue";
import logger from "../utils/logger";
import { BotController, ChatContext } from "./botController";

export type UpdateHandlers = Pick<
  BotController,
  "onStart" | "onHelp" | "onStats" | "onImage" | "onDocument" | "onFormatChoice"
>;

function chatIdOf(update: TelegramUpdate): number | null {
  if (update.message) {
    return update.message.chat.id;
  }
  if (update.callback_query) {
    return update.callback_query.message?.chat.id ?? update.callback_query.from.id;
  }
  return null;
}

/**
 * Turns raw updates into handler calls. Updates of one chat are handled one
 * at a time in arrival order; different chats proceed concurrently.
 */
export class UpdateRouter {
  private readonly handlers: UpdateHandlers;
  private readonly queue = new KeyedQueue<number>();
  private readonly inFlight = new Set<Promise<void>>();

  constructor(handlers: UpdateHandlers) {
    this.handlers = handlers;
  }

  dispatch(update: TelegramUpdate): Promise<void> {
    const chatId = chatIdOf(update);
    if (chatId === null) {
      logger.debug(`Ignoring update ${update.update_id} without a chat`, {
        operation: "router.ignore",
        updateId: update.update_id,
      });
      return Promise.resolve();
    }

    const task = this.queue.run(chatId, () => this.route(update));
    this.inFlight.add(task);
    return task.finally(() => {
      this.inFlight.delete(task);
    });
  }

  /**
   * Resolves once every dispatched update has been handled.
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  private async route(update: TelegramUpdate): Promise<void> {
    try {
      if (update.message) {
        await this.routeMessage(update.message);
        return;
      }

      const query = update.callback_query;
      if (query) {
        const ctx: ChatContext = {
          chatId: query.message?.chat.id ?? query.from.id,
          userId: query.from.id,
        };
        await this.handlers.onFormatChoice(ctx, query.id, query.data ?? "");
      }
    } catch (error) {
      logger.error(`Unhandled error for update ${update.update_id}: ${errorMessage(error)}`, {
        operation: "router.error",
        updateId: update.update_id,
      });
    }
  }

  private async routeMessage(message: TelegramMessage): Promise<void> {
    if (!message.from) {
      return;
    }
    const ctx: ChatContext = { chatId: message.chat.id, userId: message.from.id };

    if (message.text?.startsWith("/")) {
      const [command, ...args] = message.text.trim().split(/\s+/);
      // Group chats address commands as /name@botname
      const name = command.slice(1).split("@")[0].toLowerCase();
      switch (name) {
        case "start":
          await this.handlers.onStart(ctx);
          return;
        case "help":
          await this.handlers.onHelp(ctx);
          return;
        case "stats":
          await this.handlers.onStats(ctx, args);
          return;
        default:
          logger.debug(`Ignoring unknown command /${name}`, { operation: "router.ignore" });
          return;
      }
    }

    if (message.photo && message.photo.length > 0) {
      // Sizes are listed smallest first
      const largest = message.photo[message.photo.length - 1];
      await this.handlers.onImage(ctx, {
        fileId: largest.file_id,
        fileUniqueId: largest.file_unique_id,
        fileSize: largest.file_size,
      });
      return;
    }

    if (message.document) {
      await this.handlers.onDocument(ctx, {
        fileId: message.document.file_id,
        fileName: message.document.file_name,
        mimeType: message.document.mime_type,
        fileSize: message.document.file_size,
      });
    }
  }
}
