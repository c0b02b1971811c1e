import { AxiosAdapter, AxiosError, InternalAxiosRequestConfig } from "axios";
import { describe, expect, it } from "vitest";
import { TransportError } from "../utils/error";
import { TelegramClient } from "./telegramClient";

type ScriptedReply = { status: number; data: unknown } | Error;

function scriptedAdapter(replies: ScriptedReply[]): {
  adapter: AxiosAdapter;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const reply = replies.shift();
    if (!reply) {
      throw new Error(`Unexpected request to ${config.url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
  };
  return { adapter, requests };
}

const sentMessage = {
  ok: true,
  result: { message_id: 17, date: 0, chat: { id: 42, type: "private" } },
};

function client(adapter: AxiosAdapter, retryAttempts: number = 3): TelegramClient {
  return new TelegramClient({ token: "123:test-token", retryAttempts, retryDelay: 0, adapter });
}

describe("TelegramClient", () => {
  it("sends a status message with format buttons", async () => {
    const { adapter, requests } = scriptedAdapter([{ status: 200, data: sentMessage }]);

    const handle = await client(adapter).sendStatus(42, "Pick one", [
      [
        { label: "JPEG", token: "convert_jpeg" },
        { label: "PNG", token: "convert_png" },
      ],
    ]);

    expect(handle).toEqual({ chatId: 42, messageId: 17 });
    expect(requests[0].url).toBe("/bot123:test-token/sendMessage");
    expect(JSON.parse(requests[0].data)).toEqual({
      chat_id: 42,
      text: "Pick one",
      reply_markup: {
        inline_keyboard: [
          [
            { text: "JPEG", callback_data: "convert_jpeg" },
            { text: "PNG", callback_data: "convert_png" },
          ],
        ],
      },
    });
  });

  it("retries server errors", async () => {
    const { adapter, requests } = scriptedAdapter([
      { status: 502, data: { ok: false, description: "Bad Gateway" } },
      { status: 200, data: sentMessage },
    ]);

    await expect(client(adapter).sendText(42, "hello")).resolves.toEqual({
      chatId: 42,
      messageId: 17,
    });
    expect(requests).toHaveLength(2);
  });

  it("retries rate-limited calls", async () => {
    const { adapter, requests } = scriptedAdapter([
      {
        status: 429,
        data: {
          ok: false,
          error_code: 429,
          description: "Too Many Requests: retry after 0",
          parameters: { retry_after: 0 },
        },
      },
      { status: 200, data: { ok: true, result: true } },
    ]);

    await client(adapter).answerCallback("cb-1");

    expect(requests).toHaveLength(2);
    expect(JSON.parse(requests[1].data)).toEqual({ callback_query_id: "cb-1" });
  });

  it("does not retry client errors", async () => {
    const { adapter, requests } = scriptedAdapter([
      { status: 400, data: { ok: false, description: "Bad Request: chat not found" } },
    ]);

    const failure = client(adapter).sendText(42, "hello");

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toThrow("Telegram sendMessage failed: Bad Request: chat not found");
    expect(requests).toHaveLength(1);
  });

  it("gives up on network errors after the configured attempts", async () => {
    const { adapter, requests } = scriptedAdapter([
      new AxiosError("socket hang up", "ECONNRESET"),
      new AxiosError("socket hang up", "ECONNRESET"),
      new AxiosError("socket hang up", "ECONNRESET"),
    ]);

    await expect(client(adapter, 2).getMe()).rejects.toThrow("Network error: socket hang up");
    expect(requests).toHaveLength(3);
  });

  it("treats an unchanged status edit as done", async () => {
    const { adapter } = scriptedAdapter([
      {
        status: 400,
        data: {
          ok: false,
          description:
            "Bad Request: message is not modified: specified new message content and reply markup are exactly the same",
        },
      },
    ]);

    await expect(
      client(adapter).editStatus({ chatId: 42, messageId: 17 }, "same text")
    ).resolves.toBeUndefined();
  });

  it("downloads a file through its server path", async () => {
    const { adapter, requests } = scriptedAdapter([
      {
        status: 200,
        data: { ok: true, result: { file_id: "f1", file_unique_id: "u1", file_path: "photos/a.jpg" } },
      },
      { status: 200, data: Buffer.from([1, 2, 3]) },
    ]);

    const data = await client(adapter).downloadFile("f1");

    expect([...data]).toEqual([1, 2, 3]);
    expect(requests[1].url).toBe("/file/bot123:test-token/photos/a.jpg");
    expect(requests[1].method).toBe("get");
  });

  it("fails a download without a server path", async () => {
    const { adapter } = scriptedAdapter([
      { status: 200, data: { ok: true, result: { file_id: "f1", file_unique_id: "u1" } } },
    ]);

    await expect(client(adapter).downloadFile("f1")).rejects.toThrow(
      "File f1 is not available for download"
    );
  });

  it("leaves long-poll failures to the caller", async () => {
    const { adapter, requests } = scriptedAdapter([
      { status: 502, data: { ok: false, description: "Bad Gateway" } },
    ]);

    await expect(client(adapter).getUpdates(5, 30)).rejects.toThrow(
      "Telegram getUpdates failed: Bad Gateway"
    );
    expect(requests).toHaveLength(1);
    expect(JSON.parse(requests[0].data)).toEqual({
      offset: 5,
      timeout: 30,
      allowed_updates: ["message", "callback_query"],
    });
  });

  it("uploads documents as multipart form data", async () => {
    const { adapter, requests } = scriptedAdapter([{ status: 200, data: sentMessage }]);

    await client(adapter).sendDocument(42, "converted.zip", Buffer.from("zip"), "Converted 1 images to PNG.");

    const form = requests[0].data;
    expect(form).toBeInstanceOf(FormData);
    expect(form.get("chat_id")).toBe("42");
    expect(form.get("caption")).toBe("Converted 1 images to PNG.");
    expect(requests[0].url).toBe("/bot123:test-token/sendDocument");
  });
});
