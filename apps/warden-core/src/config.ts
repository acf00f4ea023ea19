import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export type AppConfig = {
  configSourcePath: string;
  envOverridesApplied: number;
  port: number;
  nodeEnv: string;
  sqlitePath: string;
  discordBotToken: string | null;
  presenceIntervalMs: number;
  lifecycleRetryAttempts: number;
  lifecycleRetryBaseMs: number;
  autoJoinThreads: boolean;
};

type RawConfigFile = {
  port?: number;
  nodeEnv?: string;
  sqlitePath?: string;
  discordBotToken?: string | null;
  presenceIntervalMs?: number;
  lifecycleRetryAttempts?: number;
  lifecycleRetryBaseMs?: number;
  autoJoinThreads?: boolean;
};

const defaultConfigPath = "~/.config/guildwarden/config.json";
const defaultSqlitePath = "~/.local/share/guildwarden/data/guildwarden.db";

const expandHome = (inputPath: string): string => {
  if (inputPath === "~") {
    return homedir();
  }
  if (inputPath.startsWith("~/")) {
    return join(homedir(), inputPath.slice(2));
  }
  return inputPath;
};

const parseConfigFile = (resolvedPath: string): RawConfigFile => {
  let rawText: string;

  try {
    rawText = readFileSync(resolvedPath, "utf8");
  } catch (error) {
    throw new Error(
      `Config file is required at ${resolvedPath}. Create it from config/config.example.json or set GUILDWARDEN_CONFIG_PATH. Cause: ${String(error)}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawText);
  } catch (error) {
    throw new Error(
      `Config file at ${resolvedPath} is invalid JSON: ${String(error)}`,
    );
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Config file at ${resolvedPath} must be a JSON object`);
  }

  return parsed;
};

const asOptionalString = (value: unknown): string | undefined => {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const asOptionalNullableString = (
  value: unknown,
): string | null | undefined => {
  if (value === null) {
    return null;
  }
  return asOptionalString(value);
};

const asOptionalBoolean = (value: unknown): boolean | undefined => {
  if (typeof value === "boolean") {
    return value;
  }
  return undefined;
};

const asOptionalNumber = (value: unknown): number | undefined => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  return undefined;
};

const parseEnvBoolean = (value: string | undefined): boolean | undefined => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "true") {
    return true;
  }
  if (normalized === "false") {
    return false;
  }
  return undefined;
};

const asPositiveInt = (value: number, name: string): number => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
  return value;
};

const asNonNegativeInt = (value: number, name: string): number => {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer`);
  }
  return value;
};

export const loadConfig = (): AppConfig => {
  const configSourcePath = expandHome(
    process.env.GUILDWARDEN_CONFIG_PATH?.trim() || defaultConfigPath,
  );
  const fileConfig: RawConfigFile = parseConfigFile(configSourcePath);

  const overriddenKeys = [
    "PORT",
    "NODE_ENV",
    "SQLITE_PATH",
    "DISCORD_BOT_TOKEN",
    "PRESENCE_INTERVAL_MS",
    "LIFECYCLE_RETRY_ATTEMPTS",
    "LIFECYCLE_RETRY_BASE_MS",
    "AUTO_JOIN_THREADS",
  ].filter((key) => process.env[key] !== undefined).length;

  const port = Number(
    process.env.PORT ?? asOptionalNumber(fileConfig.port) ?? "3000",
  );
  const nodeEnv =
    process.env.NODE_ENV ??
    asOptionalString(fileConfig.nodeEnv) ??
    "development";
  const sqlitePath = expandHome(
    process.env.SQLITE_PATH ??
      asOptionalString(fileConfig.sqlitePath) ??
      defaultSqlitePath,
  );
  const discordBotToken =
    process.env.DISCORD_BOT_TOKEN?.trim() ||
    asOptionalNullableString(fileConfig.discordBotToken) ||
    null;
  const presenceIntervalMs = Number(
    process.env.PRESENCE_INTERVAL_MS ??
      asOptionalNumber(fileConfig.presenceIntervalMs) ??
      "3000",
  );
  const lifecycleRetryAttempts = Number(
    process.env.LIFECYCLE_RETRY_ATTEMPTS ??
      asOptionalNumber(fileConfig.lifecycleRetryAttempts) ??
      "3",
  );
  const lifecycleRetryBaseMs = Number(
    process.env.LIFECYCLE_RETRY_BASE_MS ??
      asOptionalNumber(fileConfig.lifecycleRetryBaseMs) ??
      "250",
  );
  const autoJoinThreads =
    parseEnvBoolean(process.env.AUTO_JOIN_THREADS) ??
    asOptionalBoolean(fileConfig.autoJoinThreads) ??
    true;

  asPositiveInt(port, "PORT");
  asPositiveInt(presenceIntervalMs, "PRESENCE_INTERVAL_MS");
  asNonNegativeInt(lifecycleRetryAttempts, "LIFECYCLE_RETRY_ATTEMPTS");
  asPositiveInt(lifecycleRetryBaseMs, "LIFECYCLE_RETRY_BASE_MS");

  return {
    configSourcePath,
    envOverridesApplied: overriddenKeys,
    port,
    nodeEnv,
    sqlitePath,
    discordBotToken,
    presenceIntervalMs,
    lifecycleRetryAttempts,
    lifecycleRetryBaseMs,
    autoJoinThreads,
  };
};
