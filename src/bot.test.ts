/**
 * Tests for the Bot facade
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Bot } from "./bot.js";
import type { BotOptions } from "./bot.js";
import { ConfigurationError, HandlerError } from "./errors.js";
import { MemoryLogger } from "./memory-logger.js";
import type { FetchRequest, UpdateTransport } from "./polling.js";
import { SqliteStateStorage } from "./state/sqlite-storage.js";
import { GROUP_CHAT, rawCallbackQuery, rawText, textUpdate } from "../test/helpers/fixtures.js";

function makeBot(options: Partial<BotOptions> = {}): Bot {
  return new Bot({
    token: "123:test-token",
    logger: new MemoryLogger(),
    ...options,
    config: { username: "test_bot", ...options.config },
  });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Bot construction", () => {
  it("validates the token", () => {
    expect(() => new Bot({ token: "test-token" })).toThrow("Bot token must be two parts separated by a colon");
    expect(() => new Bot({ token: "abc:def" })).toThrow("Bot token must start with the numeric bot id");
    expect(() => new Bot({})).toThrow(ConfigurationError);
  });

  it("rejects invalid config", () => {
    expect(() => makeBot({ config: { concurrency: { poolSize: 0 } } })).toThrow(
      "Invalid config: concurrency.poolSize"
    );
  });

  it("opens SQLite state storage when configured", () => {
    const dir = mkdtempSync(join(tmpdir(), "wirebot-bot-"));
    try {
      const bot = makeBot({ config: { state: { storage: "sqlite", path: join(dir, "state.db") } } });
      expect(bot.states).toBeInstanceOf(SqliteStateStorage);
      bot.dispose();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("Bot registration", () => {
  it("routes commands and hands the bot to the handler", async () => {
    const bot = makeBot();
    const seen: string[] = [];
    bot.command(["start", "help"], (message, context) => {
      expect(context.bot).toBe(bot);
      seen.push(`${context.update.updateId}:${message.text}`);
    });

    await bot.processUpdates([rawText(1, "/start"), rawText(2, "/help me"), rawText(3, "start")]);

    expect(seen).toEqual(["1:/start", "2:/help me"]);
  });

  it("ignores commands addressed to another bot", async () => {
    const bot = makeBot();
    const seen: number[] = [];
    bot.command("start", (_message, { update }) => {
      seen.push(update.updateId);
    });

    await bot.processUpdates([rawText(1, "/start@other_bot"), rawText(2, "/start@Test_Bot")]);

    expect(seen).toEqual([2]);
  });

  it("matches hears patterns case-insensitively", async () => {
    const bot = makeBot();
    const seen: number[] = [];
    bot.hears("hello", (_message, { update }) => {
      seen.push(update.updateId);
    });

    await bot.processUpdates([rawText(1, "Well HELLO there"), rawText(2, "bye")]);

    expect(seen).toEqual([1]);
  });

  it("routes callback queries by filter", async () => {
    const bot = makeBot();
    const answered: string[] = [];
    bot.onCallbackQuery({ func: (query) => query.data === "yes" }, (query) => {
      answered.push(query.id);
    });

    await bot.processUpdates([rawCallbackQuery(7, "yes"), rawCallbackQuery(8, "no")]);

    expect(answered).toEqual(["cb-7"]);
  });

  it("refuses a filter spec that does not fit the kind", () => {
    const bot = makeBot();
    expect(() => bot.on("callback_query", { commands: ["start"] }, () => {})).toThrow(
      "Filter 'commands' does not apply to callback_query updates"
    );
  });

  it("unregisters by handler and by handle", async () => {
    const bot = makeBot();
    const calls: string[] = [];
    const first = () => {
      calls.push("first");
    };
    bot.onMessage({}, first);
    bot.onMessage({}, first, { name: "again" });
    const handle = bot.onMessage({}, () => {
      calls.push("last");
    });

    expect(bot.unregister(first)).toBe(2);
    await bot.processUpdates([rawText(1, "x")]);
    expect(handle.remove()).toBe(true);
    expect(handle.remove()).toBe(false);
    await bot.processUpdates([rawText(2, "y")]);

    expect(calls).toEqual(["last"]);
  });

  it("matches the conversation state of the sender", async () => {
    const bot = makeBot();
    const seen: number[] = [];
    bot.onMessage({ state: "Signup:name" }, (_message, { update }) => {
      seen.push(update.updateId);
    });

    await bot.processUpdates([rawText(1, "Ada")]);
    await bot.state(42, 42).set("Signup:name");
    await bot.processUpdates([rawText(2, "Ada")]);

    expect(seen).toEqual([2]);
  });

  it("refuses middleware when disabled", () => {
    const bot = makeBot({ config: { middleware: { enabled: false } } });
    expect(() => bot.use({ preProcess: () => {} })).toThrow(
      "Middleware is disabled (middleware.enabled is false)"
    );
  });

  it("reports handler errors to onError", async () => {
    const bot = makeBot();
    const errors: HandlerError[] = [];
    bot.onError((error) => {
      errors.push(error);
    });
    bot.onMessage({}, function explode() {
      throw new Error("boom");
    });

    await bot.processUpdates([rawText(1, "x")]);

    expect(errors).toHaveLength(1);
    expect(errors[0].message).toBe("Handler explode failed on message #1: boom");
    expect(errors[0].update.updateId).toBe(1);
  });

  it("applies the standard custom filters without extra setup", async () => {
    const bot = makeBot();
    const seen: number[] = [];
    bot.onMessage({ text_contains: ["price", "cost"] }, (_message, { update }) => {
      seen.push(update.updateId);
    });

    await bot.processUpdates([rawText(1, "what is the price"), rawText(2, "hello"), rawText(3, "cost?")]);

    expect(seen).toEqual([1, 3]);
  });

  it("logs malformed records from processUpdates", async () => {
    const logger = new MemoryLogger();
    const bot = makeBot({ logger });

    await bot.processUpdates([{ update_id: 3 }]);

    expect(logger.lines("warn")).toEqual(["[Bot] Skipped Malformed update #3: no update kind present"]);
  });
});

describe("Bot next-step handlers", () => {
  it("hands the chat's next message to the step instead of the handlers", async () => {
    const bot = makeBot();
    const calls: string[] = [];
    bot.onMessage({}, (message) => {
      calls.push(`handler:${message.text}`);
    });
    bot.registerNextStepHandler(42, (message, context) => {
      expect(context.bot).toBe(bot);
      calls.push(`step:${message.text}`);
    });

    await bot.processUpdates([rawText(1, "Ada"), rawText(2, "again")]);

    expect(calls).toEqual(["step:Ada", "handler:again"]);
  });

  it("leaves other chats to the handlers", async () => {
    const bot = makeBot();
    const calls: string[] = [];
    bot.onMessage({}, (message) => {
      calls.push(`handler:${message.chat.id}`);
    });
    bot.registerNextStepHandler(42, (message) => {
      calls.push(`step:${message.chat.id}`);
    });

    await bot.processUpdates([rawText(1, "hi", { chat: GROUP_CHAT }), rawText(2, "hi")]);

    expect(calls).toEqual(["handler:-100123", "step:42"]);
  });

  it("runs steps in order and lets a step register the next one", async () => {
    const bot = makeBot();
    const answers: string[] = [];
    bot.registerNextStepHandler(42, (message) => {
      answers.push(`name:${message.text}`);
      bot.registerNextStepHandler(42, (next) => {
        answers.push(`age:${next.text}`);
      });
    });
    bot.registerNextStepHandler(42, (message) => {
      answers.push(`log:${message.text}`);
    });

    await bot.processUpdates([rawText(1, "Ada"), rawText(2, "36"), rawText(3, "done")]);

    expect(answers).toEqual(["name:Ada", "log:Ada", "age:36"]);
  });

  it("clears the pending steps of a chat", async () => {
    const bot = makeBot();
    const seen: string[] = [];
    bot.onMessage({}, (message) => {
      seen.push(`handler:${message.text}`);
    });
    bot.registerNextStepHandler(42, (message) => {
      seen.push(`step:${message.text}`);
    });

    expect(bot.clearStepHandlers(42)).toBe(true);
    expect(bot.clearStepHandlers(42)).toBe(false);
    await bot.processUpdates([rawText(1, "x")]);

    expect(seen).toEqual(["handler:x"]);
  });

  it("reports a failing step to onError", async () => {
    const bot = makeBot();
    const errors: HandlerError[] = [];
    bot.onError((error) => {
      errors.push(error);
    });
    bot.registerNextStepHandler(42, function askAge() {
      throw new Error("not a number");
    });

    await bot.processUpdates([rawText(7, "abc")]);

    expect(errors).toHaveLength(1);
    expect(errors[0].message).toBe("Handler askAge failed on message #7: not a number");
  });
});

describe("Bot update sources", () => {
  it("polls again on a fresh pool after a hard stop", async () => {
    const requests: FetchRequest[] = [];
    const batches: unknown[][] = [[rawText(1, "a")]];
    const transport: UpdateTransport = {
      fetchUpdates: async (request, signal) => {
        requests.push(request);
        const batch = batches.shift();
        if (batch) return batch;
        if (!signal) return [];
        return new Promise((_, reject) => {
          signal.addEventListener("abort", () => reject(new Error("aborted")));
        });
      },
    };
    const bot = makeBot({ transport, config: { concurrency: { mode: "pooled", poolSize: 1 } } });
    const seen: number[] = [];
    bot.onMessage({}, (_message, { update }) => {
      seen.push(update.updateId);
    });

    const first = bot.startPolling();
    await vi.waitFor(() => expect(seen).toEqual([1]));
    await bot.stop({ hard: true });
    await first;

    batches.push([rawText(2, "b")]);
    const second = bot.startPolling();
    await vi.waitFor(() => expect(seen).toEqual([1, 2]));
    await bot.stop();
    await second;

    expect(bot.isPolling).toBe(false);
  });

  it("rejects processUpdates once a hard stop closed the pool", async () => {
    const bot = makeBot({ config: { concurrency: { mode: "pooled", poolSize: 1 } } });

    await bot.stop({ hard: true });

    await expect(bot.processUpdates([rawText(1, "x")])).rejects.toThrow("Worker pool is closed");
  });

  it("polls through the transport until stopped", async () => {
    const requests: FetchRequest[] = [];
    const transport: UpdateTransport = {
      fetchUpdates: async (request, signal) => {
        requests.push(request);
        if (requests.length === 1) return [rawText(1, "/start")];
        if (!signal) return [];
        return new Promise((_, reject) => {
          signal.addEventListener("abort", () => reject(new Error("aborted")));
        });
      },
    };
    const bot = makeBot({ transport, config: { polling: { timeoutSeconds: 1 } } });
    const seen: number[] = [];
    bot.command("start", (_message, { update }) => {
      seen.push(update.updateId);
    });

    const polling = bot.startPolling();
    await vi.waitFor(() => expect(requests).toHaveLength(2));
    expect(bot.isPolling).toBe(true);
    await bot.stop();
    await polling;

    expect(seen).toEqual([1]);
    expect(bot.isPolling).toBe(false);
    expect(requests[0]).toEqual({ limit: 100, timeout: 1 });
  });

  it("shares one webhook receiver configured with the secret token", async () => {
    const bot = makeBot({ config: { webhook: { secretToken: "test-secret" } } });
    const seen: number[] = [];
    bot.onMessage({}, (_message, { update }) => {
      seen.push(update.updateId);
    });

    const receiver = bot.webhook();
    expect(bot.webhook()).toBe(receiver);
    expect((await receiver.receive(rawText(1, "x"))).status).toBe(401);
    expect(
      (await receiver.receive(rawText(2, "x"), { "X-Telegram-Bot-Api-Secret-Token": "test-secret" })).status
    ).toBe(200);
    expect(seen).toEqual([2]);
  });

  it("sets the webhook from config", async () => {
    const bot = makeBot({
      config: { webhook: { url: "https://example.com/hook", secretToken: "test-secret" } },
    });
    const spy = vi.spyOn(bot.client, "setWebhook").mockResolvedValue(true);

    await expect(bot.setWebhook()).resolves.toBe(true);
    expect(spy).toHaveBeenCalledWith("https://example.com/hook", {
      secret_token: "test-secret",
      drop_pending_updates: false,
      allowed_updates: undefined,
    });
  });

  it("needs a webhook URL", async () => {
    await expect(makeBot().setWebhook()).rejects.toThrow("No webhook URL given and webhook.url is not set");
  });

  it("replies to a message in its chat", async () => {
    const bot = makeBot();
    const spy = vi.spyOn(bot.client.api, "sendMessage").mockRejectedValue(new Error("offline"));

    await expect(bot.replyTo(textUpdate(9, "hi").payload, "hello")).rejects.toThrow(
      "Request 'sendMessage' failed: offline"
    );
    expect(spy).toHaveBeenCalledWith(42, "hello", { reply_parameters: { message_id: 9 } });
  });
});
