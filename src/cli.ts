#!/usr/bin/env node

/**
 * wirebot - CLI
 */

import { Command } from "commander";
import { Bot } from "./bot.js";
import { BotClient } from "./client.js";
import {
  DEFAULT_CONFIG,
  TOKEN_ENV_VAR,
  findConfigDir,
  getConfigPath,
  initConfig,
  loadBotToken,
  loadConfig,
  validateToken,
} from "./config.js";
import type { BotConfig } from "./config.js";
import { registerEchoHandlers } from "./echo.js";
import { describeError } from "./errors.js";
import { ConsoleLogger } from "./logger.js";
import { ShutdownController } from "./shutdown.js";
import { getVersionString } from "./version.js";

function fail(err: unknown): never {
  console.error(`Error: ${describeError(err)}`);
  process.exit(1);
}

/** Config from .wirebot when one is found, defaults otherwise */
function configOrDefaults(): BotConfig {
  return findConfigDir() ? loadConfig() : DEFAULT_CONFIG;
}

function clientFromEnv(config: BotConfig): BotClient {
  const token = loadBotToken();
  validateToken(token);
  return new BotClient({
    token,
    apiRoot: config.api.apiRoot,
    rateLimitRetries: config.api.rateLimitRetries,
  });
}

function createEchoBot(options: { pooled?: boolean; skipPending?: boolean }, logger: ConsoleLogger): Bot {
  try {
    const config = configOrDefaults();
    return new Bot({
      token: loadBotToken(),
      logger,
      config: {
        ...config,
        concurrency: options.pooled ? { ...config.concurrency, mode: "pooled" } : config.concurrency,
        polling: { ...config.polling, skipPending: options.skipPending ?? config.polling.skipPending },
      },
    });
  } catch (err) {
    fail(err);
  }
}

const program = new Command();

program
  .name("wirebot")
  .description("wirebot - bot API update dispatcher")
  .version(getVersionString());

program
  .command("init")
  .description("Create .wirebot/config in the current directory")
  .option("--yaml", "Write config.yaml instead of config.json")
  .action((options: { yaml?: boolean }) => {
    try {
      const path = initConfig(process.cwd(), options.yaml ? "yaml" : "json");
      console.log("✅ wirebot initialized\n");
      console.log(`  Config: ${path}`);
      console.log("");
      console.log("Next steps:");
      console.log(`  1. Put the bot token in ${TOKEN_ENV_VAR} (environment or .wirebot/.env)`);
      console.log("  2. Check it:       wirebot me");
      console.log("  3. Try the bot:    wirebot echo");
    } catch (err) {
      fail(err);
    }
  });

program
  .command("config")
  .description("Show the resolved configuration")
  .action(() => {
    try {
      const config = loadConfig();
      console.log("Configuration:\n");
      console.log(`  Config file: ${getConfigPath()}`);
      console.log(`  Concurrency: ${config.concurrency.mode} (pool size ${config.concurrency.poolSize})`);
      console.log(`  Polling timeout: ${config.polling.timeoutSeconds}s, limit ${config.polling.limit}`);
      console.log(`  Allowed updates: ${config.polling.allowedUpdates?.join(", ") ?? "all"}`);
      console.log(`  Parse mode: ${config.api.parseMode ?? "none"}`);
      console.log(`  Middleware: ${config.middleware.enabled ? "enabled" : "disabled"}`);
      console.log(`  Strict: ${config.strict}`);
      console.log(`  State: ${config.state.storage}${config.state.storage === "sqlite" ? ` (${config.state.path})` : ""}`);
      console.log(`  Webhook: ${config.webhook.url ?? "not set"}`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("me")
  .description("Check the token and show the bot account")
  .action(async () => {
    try {
      const me = await clientFromEnv(configOrDefaults()).getMe();
      console.log(`🤖 @${me.username} (${me.first_name})`);
      console.log(`  ID: ${me.id}`);
      console.log(`  Joins groups: ${me.can_join_groups ? "yes" : "no"}`);
      console.log(`  Reads all group messages: ${me.can_read_all_group_messages ? "yes" : "no"}`);
      console.log(`  Inline queries: ${me.supports_inline_queries ? "yes" : "no"}`);
    } catch (err) {
      fail(err);
    }
  });

const webhook = program.command("webhook").description("Manage webhook delivery");

webhook
  .command("set [url]")
  .description("Point the bot at a webhook URL (defaults to webhook.url)")
  .option("-s, --secret <token>", "Secret token the platform sends in each request")
  .option("--drop-pending", "Drop updates queued before the webhook was set")
  .action(async (url: string | undefined, options: { secret?: string; dropPending?: boolean }) => {
    try {
      const config = configOrDefaults();
      const bot = new Bot({
        token: loadBotToken(),
        config: {
          ...config,
          state: { storage: "memory" },
          webhook: {
            ...config.webhook,
            secretToken: options.secret ?? config.webhook.secretToken,
            dropPendingUpdates: options.dropPending ?? config.webhook.dropPendingUpdates,
          },
        },
      });
      await bot.setWebhook(url);
      console.log(`✅ Webhook set to ${url ?? config.webhook.url}`);
    } catch (err) {
      fail(err);
    }
  });

webhook
  .command("delete")
  .description("Remove the webhook so the bot can poll again")
  .option("--drop-pending", "Drop updates queued for the webhook")
  .action(async (options: { dropPending?: boolean }) => {
    try {
      await clientFromEnv(configOrDefaults()).deleteWebhook({ drop_pending_updates: options.dropPending });
      console.log("✅ Webhook removed");
    } catch (err) {
      fail(err);
    }
  });

webhook
  .command("info")
  .description("Show the webhook status")
  .action(async () => {
    try {
      const info = await clientFromEnv(configOrDefaults()).getWebhookInfo();
      console.log("Webhook:\n");
      console.log(`  URL: ${info.url || "not set"}`);
      console.log(`  Pending updates: ${info.pending_update_count}`);
      if (info.last_error_message) {
        const at = info.last_error_date ? new Date(info.last_error_date * 1000).toISOString() : "unknown";
        console.log(`  Last error: ${info.last_error_message} (${at})`);
      }
      if (info.allowed_updates) {
        console.log(`  Allowed updates: ${info.allowed_updates.join(", ")}`);
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command("echo")
  .description("Run an echo bot with long polling")
  .option("--pooled", "Run handlers on the worker pool")
  .option("--skip-pending", "Ignore updates sent while the bot was offline")
  .action(async (options: { pooled?: boolean; skipPending?: boolean }) => {
    const logger = new ConsoleLogger();
    const bot = createEchoBot(options, logger);
    registerEchoHandlers(bot);

    // First signal: stop polling, finish in-flight updates
    // Second signal: drop what is queued
    const shutdown = new ShutdownController(bot, logger);
    const handleShutdown = () => {
      shutdown
        .request()
        .then(() => {
          bot.dispose();
          process.exit(0);
        })
        .catch(fail);
    };

    process.on("SIGINT", handleShutdown); // Ctrl+C
    process.on("SIGTERM", handleShutdown); // kill (default signal)

    try {
      await bot.startPolling();
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync().catch(fail);
