/**
 * Config management for wirebot
 *
 * A BotConfig is a plain object passed to Bot. On disk it lives in
 * .wirebot/config.json (or config.yaml) in the bot's directory; commands
 * look for it in the current directory or its parents. The bot token is
 * kept out of the config file: WIREBOT_TOKEN in the environment or in
 * .wirebot/.env.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { dirname, isAbsolute, join, resolve } from "path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError, describeError } from "./errors.js";
import { UPDATE_KINDS } from "./updates/types.js";

const CONFIG_FOLDER = ".wirebot";
const CONFIG_FILES = ["config.json", "config.yaml", "config.yml"] as const;
const ENV_FILE = ".env";
export const TOKEN_ENV_VAR = "WIREBOT_TOKEN";

const ApiConfigSchema = z
  .object({
    apiRoot: z.string().url().optional(),
    parseMode: z.enum(["HTML", "MarkdownV2", "Markdown"]).optional(),
    rateLimitRetries: z.number().int().min(0).default(0),
  })
  .strict();

const PollingConfigSchema = z
  .object({
    timeoutSeconds: z.number().int().min(0).default(20),
    limit: z.number().int().min(1).max(100).default(100),
    intervalMs: z.number().int().min(0).default(0),
    nonStop: z.boolean().default(false),
    retryDelayMs: z.number().int().min(1).default(3000),
    maxRetryDelayMs: z.number().int().min(1).default(60000),
    skipPending: z.boolean().default(false),
    allowedUpdates: z.array(z.enum(UPDATE_KINDS)).optional(),
  })
  .strict();

const ConcurrencyConfigSchema = z
  .object({
    mode: z.enum(["inline", "pooled"]).default("inline"),
    poolSize: z.number().int().min(1).default(4),
  })
  .strict();

const WebhookConfigSchema = z
  .object({
    url: z.string().url().optional(),
    secretToken: z
      .string()
      .regex(/^[A-Za-z0-9_-]{1,256}$/, "must be 1-256 characters of A-Z, a-z, 0-9, _ and -")
      .optional(),
    dropPendingUpdates: z.boolean().default(false),
  })
  .strict();

const StateConfigSchema = z
  .object({
    storage: z.enum(["memory", "sqlite"]).default("memory"),
    /** SQLite file; relative paths resolve against the config directory */
    path: z.string().min(1).default("state.db"),
  })
  .strict();

export const BotConfigSchema = z
  .object({
    /** Known username skips the getMe call at startup */
    username: z.string().optional(),
    api: ApiConfigSchema.default({}),
    polling: PollingConfigSchema.default({}),
    concurrency: ConcurrencyConfigSchema.default({}),
    middleware: z.object({ enabled: z.boolean().default(true) }).strict().default({}),
    /** Rethrow handler errors from dispatch when no error handler is set */
    strict: z.boolean().default(false),
    webhook: WebhookConfigSchema.default({}),
    state: StateConfigSchema.default({}),
  })
  .strict();

export type BotConfig = z.infer<typeof BotConfigSchema>;
/** What callers may pass: every field optional at every level */
export type BotConfigInput = z.input<typeof BotConfigSchema>;

/**
 * Validate a partial config and fill in defaults
 *
 * @throws ConfigurationError listing every invalid field
 */
export function resolveConfig(input: unknown = {}): BotConfig {
  const result = BotConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new ConfigurationError(`Invalid config: ${issues.join("; ")}`);
  }
  if (result.data.polling.retryDelayMs > result.data.polling.maxRetryDelayMs) {
    throw new ConfigurationError("Invalid config: polling.retryDelayMs exceeds polling.maxRetryDelayMs");
  }
  return result.data;
}

export const DEFAULT_CONFIG: BotConfig = resolveConfig({});

function configFileIn(configDir: string): string | null {
  for (const name of CONFIG_FILES) {
    const path = join(configDir, name);
    if (existsSync(path)) return path;
  }
  return null;
}

/**
 * Finds the .wirebot directory by walking up from startDir.
 * Returns null when no directory on the way holds a config file.
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let dir = resolve(startDir);

  for (;;) {
    const configDir = join(dir, CONFIG_FOLDER);
    if (configFileIn(configDir)) return configDir;

    const parent = dirname(dir);
    if (parent === dir) return null; // Reached root
    dir = parent;
  }
}

/**
 * Gets the .wirebot directory.
 * Throws if no bot has been initialized here or above.
 */
export function getConfigDir(startDir?: string): string {
  const dir = findConfigDir(startDir);
  if (!dir) {
    throw new ConfigurationError(
      "No wirebot config found. Run 'wirebot init' in the bot directory to create one."
    );
  }
  return dir;
}

/**
 * Gets the config file path (json or yaml, whichever exists)
 */
export function getConfigPath(startDir?: string): string {
  const configDir = getConfigDir(startDir);
  const path = configFileIn(configDir);
  if (!path) throw new ConfigurationError(`No config file in ${configDir}`);
  return path;
}

/**
 * Parses config file content by extension
 */
export function parseConfigFile(path: string, content: string): unknown {
  return path.endsWith(".json") ? JSON.parse(content) : parseYaml(content);
}

/**
 * Loads and validates the config found from startDir
 */
export function loadConfig(startDir?: string): BotConfig {
  const configPath = getConfigPath(startDir);

  let config: BotConfig;
  try {
    config = resolveConfig(parseConfigFile(configPath, readFileSync(configPath, "utf-8")));
  } catch (err) {
    throw new ConfigurationError(`Failed to load config from ${configPath}: ${describeError(err)}`, {
      cause: err,
    });
  }

  const statePath = expandPath(config.state.path);
  return {
    ...config,
    state: {
      ...config.state,
      path: isAbsolute(statePath) ? statePath : join(dirname(configPath), statePath),
    },
  };
}

/**
 * Creates .wirebot/config.(json|yaml) with the default settings
 *
 * @returns the path of the written file
 */
export function initConfig(
  baseDir: string = process.cwd(),
  format: "json" | "yaml" = "json"
): string {
  const configDir = join(resolve(baseDir), CONFIG_FOLDER);
  const existing = configFileIn(configDir);
  if (existing) {
    throw new ConfigurationError(`wirebot is already initialized. Config exists at ${existing}`);
  }

  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
  }

  const configPath = join(configDir, format === "json" ? "config.json" : "config.yaml");
  const content =
    format === "json" ? JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n" : stringifyYaml(DEFAULT_CONFIG);

  try {
    writeFileSync(configPath, content, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Failed to create config at ${configPath}: ${describeError(err)}`);
  }
  return configPath;
}

/**
 * Expands ~ to home directory in paths
 */
export function expandPath(path: string): string {
  if (path.startsWith("~/")) {
    return path.replace("~", homedir());
  }
  return path;
}

/**
 * Parses a .env file (KEY=value lines, # comments, optional quotes)
 */
export function parseEnvFile(content: string): Record<string, string> {
  const vars: Record<string, string> = {};

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const eqIndex = trimmed.indexOf("=");
    if (eqIndex <= 0) continue;

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();
    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }
    vars[key] = value;
  }

  return vars;
}

/**
 * Environment with .wirebot/.env merged over process.env
 */
export function loadEnv(startDir?: string): Record<string, string | undefined> {
  const configDir = findConfigDir(startDir);
  const envPath = configDir ? join(configDir, ENV_FILE) : null;
  if (!envPath || !existsSync(envPath)) {
    return { ...process.env };
  }
  return { ...process.env, ...parseEnvFile(readFileSync(envPath, "utf-8")) };
}

/**
 * Checks the "<bot id>:<secret>" shape of a bot token
 *
 * @throws ConfigurationError naming what is wrong
 */
export function validateToken(token: string): void {
  if (/\s/.test(token)) {
    throw new ConfigurationError("Bot token must not contain spaces");
  }
  const parts = token.split(":");
  if (parts.length !== 2) {
    throw new ConfigurationError("Bot token must be two parts separated by a colon");
  }
  if (!/^\d+$/.test(parts[0])) {
    throw new ConfigurationError("Bot token must start with the numeric bot id");
  }
}

/**
 * Reads the bot token from WIREBOT_TOKEN (.wirebot/.env or the environment)
 *
 * @throws ConfigurationError when no token is set
 */
export function loadBotToken(startDir?: string): string {
  const token = loadEnv(startDir)[TOKEN_ENV_VAR];
  if (!token) {
    throw new ConfigurationError(
      `No bot token. Set ${TOKEN_ENV_VAR} in the environment or in ${CONFIG_FOLDER}/${ENV_FILE}.`
    );
  }
  return token;
}
