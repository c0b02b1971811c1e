import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from "axios";
import { setTimeout as sleep } from "timers/promises";
import {
  TelegramApiResponse,
  TelegramFile,
  TelegramInlineKeyboardButton,
  TelegramMessage,
  TelegramUpdate,
  TelegramUser,
} from "../models";
import { errorMessage, toError, TransportError } from "../utils/error";
import logger from "../utils/logger";
import { FormatChoice } from "./sessionPresenter";
import { MessageHandle } from "./sessionStore";

/**
 * Outbound side of a chat. The controller only talks to this interface.
 */
export interface ChatTransport {
  sendText(chatId: number, text: string): Promise<MessageHandle>;
  sendStatus(chatId: number, text: string, choices?: FormatChoice[][]): Promise<MessageHandle>;
  editStatus(handle: MessageHandle, text: string, choices?: FormatChoice[][]): Promise<void>;
  sendDocument(chatId: number, fileName: string, data: Buffer, caption?: string): Promise<void>;
  answerCallback(callbackId: string, text?: string): Promise<void>;
  downloadFile(fileId: string): Promise<Buffer>;
}

export interface TelegramClientOptions {
  token: string;
  apiUrl?: string;
  retryAttempts?: number;
  retryDelay?: number;
  requestTimeout?: number;
  /** Replaces the HTTP adapter; used by tests. */
  adapter?: AxiosAdapter;
}

interface CallOptions {
  retry?: boolean;
  /** Multipart body, rebuilt for every attempt. */
  form?: () => FormData;
  timeout?: number;
  signal?: AbortSignal;
}

const UPDATE_TYPES = ["message", "callback_query"];

export class TelegramClient implements ChatTransport {
  private readonly http: AxiosInstance;
  private readonly token: string;
  private readonly retryAttempts: number;
  private readonly retryDelay: number;

  constructor(options: TelegramClientOptions) {
    this.token = options.token;
    this.retryAttempts = options.retryAttempts ?? 3;
    this.retryDelay = options.retryDelay ?? 1000;
    this.http = axios.create({
      baseURL: options.apiUrl ?? "https://api.telegram.org",
      timeout: options.requestTimeout ?? 60000,
      adapter: options.adapter,
      // Status codes are inspected per call; the Bot API explains failures in the body
      validateStatus: () => true,
    });
  }

  async sendText(chatId: number, text: string): Promise<MessageHandle> {
    const message = await this.call<TelegramMessage>("sendMessage", { chat_id: chatId, text });
    return { chatId: message.chat.id, messageId: message.message_id };
  }

  async sendStatus(chatId: number, text: string, choices?: FormatChoice[][]): Promise<MessageHandle> {
    const message = await this.call<TelegramMessage>("sendMessage", {
      chat_id: chatId,
      text,
      reply_markup: choices ? toKeyboard(choices) : undefined,
    });
    return { chatId: message.chat.id, messageId: message.message_id };
  }

  async editStatus(handle: MessageHandle, text: string, choices?: FormatChoice[][]): Promise<void> {
    try {
      await this.call<TelegramMessage | boolean>("editMessageText", {
        chat_id: handle.chatId,
        message_id: handle.messageId,
        text,
        reply_markup: choices ? toKeyboard(choices) : undefined,
      });
    } catch (error) {
      // Editing to identical text is rejected by the API but leaves the message as wanted
      if (error instanceof TransportError && error.message.includes("message is not modified")) {
        return;
      }
      throw error;
    }
  }

  async sendDocument(chatId: number, fileName: string, data: Buffer, caption?: string): Promise<void> {
    await this.call<TelegramMessage>(
      "sendDocument",
      {},
      {
        form: () => {
          const form = new FormData();
          form.append("chat_id", String(chatId));
          form.append("document", new Blob([data], { type: "application/zip" }), fileName);
          if (caption) {
            form.append("caption", caption);
          }
          return form;
        },
      }
    );
  }

  async answerCallback(callbackId: string, text?: string): Promise<void> {
    await this.call<boolean>("answerCallbackQuery", { callback_query_id: callbackId, text });
  }

  async downloadFile(fileId: string): Promise<Buffer> {
    const file = await this.call<TelegramFile>("getFile", { file_id: fileId });
    if (!file.file_path) {
      throw new TransportError(`File ${fileId} is not available for download`);
    }
    const filePath = file.file_path;

    return this.withRetry("downloadFile", async () => {
      const response = await this.send(() =>
        this.http.get<ArrayBuffer>(`/file/bot${this.token}/${filePath}`, {
          responseType: "arraybuffer",
        })
      );
      if (response.status !== 200) {
        throw new TransportError(
          `File download failed with status ${response.status}`,
          undefined,
          isRetryableStatus(response.status)
        );
      }
      return Buffer.from(response.data);
    });
  }

  getMe(): Promise<TelegramUser> {
    return this.call<TelegramUser>("getMe", {});
  }

  /**
   * One long-poll request. Not retried here; the polling loop owns backoff.
   */
  getUpdates(offset: number, timeoutSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    return this.call<TelegramUpdate[]>(
      "getUpdates",
      { offset, timeout: timeoutSeconds, allowed_updates: UPDATE_TYPES },
      { retry: false, signal, timeout: (timeoutSeconds + 10) * 1000 }
    );
  }

  async setWebhook(url: string, secretToken?: string): Promise<void> {
    await this.call<boolean>("setWebhook", {
      url,
      secret_token: secretToken,
      allowed_updates: UPDATE_TYPES,
    });
    logger.info("Webhook registered", { operation: "telegram.setWebhook", url });
  }

  async deleteWebhook(): Promise<void> {
    await this.call<boolean>("deleteWebhook", {});
  }

  private async call<T>(
    method: string,
    payload: Record<string, unknown>,
    options: CallOptions = {}
  ): Promise<T> {
    const attempt = async (): Promise<T> => {
      const body = options.form ? options.form() : payload;
      const response = await this.send(() =>
        this.http.post<TelegramApiResponse<T>>(`/bot${this.token}/${method}`, body, {
          timeout: options.timeout,
          signal: options.signal,
        })
      );
      return this.unwrap(method, response);
    };

    return options.retry === false ? attempt() : this.withRetry(method, attempt);
  }

  private async send<R>(request: () => Promise<AxiosResponse<R>>): Promise<AxiosResponse<R>> {
    try {
      return await request();
    } catch (error) {
      if (axios.isCancel(error)) {
        throw new TransportError("Request cancelled", toError(error));
      }
      throw new TransportError(`Network error: ${errorMessage(error)}`, toError(error), true);
    }
  }

  private unwrap<T>(method: string, response: AxiosResponse<TelegramApiResponse<T>>): T {
    const body = response.data;
    if (response.status === 200 && body?.ok && body.result !== undefined) {
      return body.result;
    }

    const description = body?.description ?? `HTTP ${response.status}`;
    const retryAfter = body?.parameters?.retry_after;
    throw new TransportError(
      `Telegram ${method} failed: ${description}`,
      undefined,
      isRetryableStatus(response.status),
      retryAfter !== undefined ? retryAfter * 1000 : undefined
    );
  }

  private async withRetry<T>(operation: string, task: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await task();
      } catch (error) {
        if (!(error instanceof TransportError) || !error.retryable || attempt > this.retryAttempts) {
          throw error;
        }
        const delay = error.retryAfterMs ?? this.retryDelay * attempt;
        logger.warn(`Telegram ${operation} failed, retrying in ${delay}ms`, {
          operation: "telegram.retry",
          method: operation,
          attempt,
          error: error.message,
        });
        await sleep(delay);
      }
    }
  }
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function toKeyboard(choices: FormatChoice[][]): {
  inline_keyboard: TelegramInlineKeyboardButton[][];
} {
  return {
    inline_keyboard: choices.map((row) =>
      row.map((choice) => ({ text: choice.label, callback_data: choice.token }))
    ),
  };
}
