import { existsSync } from "node:fs";
import { join } from "node:path";
import dotenv from "dotenv";
import type { Logger } from "./logger.js";
import { DEFAULT_MODEL } from "./summarizer.js";

export type Delivery = "message" | "file";

export interface AppConfig {
  openrouterApiKey?: string;
  openrouterModel: string;
  discordBotToken?: string;
  sourceChannelId?: string;
  targetChannelId?: string;
  delivery: Delivery;
  includeTrend: boolean;
  baseDir: string;
}

export type RunMode =
  | {
      kind: "live";
      apiKey: string;
      botToken: string;
      sourceChannelId: string;
      targetChannelId: string;
    }
  | {
      kind: "debug";
      inputPath: string;
      outputPath: string;
      /** Environment variables whose absence forced debug mode. */
      missing: string[];
    };

export const DEBUG_DIR = "debug";
export const DEBUG_CONVERSATION_FILE = "conversation_history.txt";
export const DEBUG_RESULT_FILE = "result.txt";

/**
 * Load `KEY=value` pairs from an env file into `process.env` when the file
 * exists. Values already present in the environment are not overwritten.
 */
export function loadEnvFile(path: string): boolean {
  if (!existsSync(path)) return false;
  const result = dotenv.config({ path });
  if (result.error) throw result.error;
  return true;
}

export function parseDelivery(
  value: string | undefined,
  logger?: Logger,
): Delivery {
  if (value === undefined || value === "") return "message";
  const normalized = value.trim().toLowerCase();
  if (normalized === "message" || normalized === "file") return normalized;
  logger?.warn(`Unknown report delivery "${value}", posting as a message`);
  return "message";
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(
  env: NodeJS.ProcessEnv,
  options: {
    baseDir: string;
    delivery?: string;
    includeTrend?: boolean;
    logger?: Logger;
  },
): AppConfig {
  return {
    openrouterApiKey: nonEmpty(env.OPENROUTER_API_KEY),
    openrouterModel: nonEmpty(env.OPENROUTER_MODEL) ?? DEFAULT_MODEL,
    discordBotToken: nonEmpty(env.DISCORD_BOT_TOKEN),
    sourceChannelId: nonEmpty(env.SOURCE_CHANNEL_ID),
    targetChannelId: nonEmpty(env.TARGET_CHANNEL_ID),
    delivery: parseDelivery(
      options.delivery ?? env.REPORT_DELIVERY,
      options.logger,
    ),
    includeTrend: options.includeTrend ?? false,
    baseDir: options.baseDir,
  };
}

export function selectMode(config: AppConfig): RunMode {
  const {
    openrouterApiKey: apiKey,
    discordBotToken: botToken,
    sourceChannelId,
    targetChannelId,
  } = config;
  if (apiKey && botToken && sourceChannelId && targetChannelId) {
    return { kind: "live", apiKey, botToken, sourceChannelId, targetChannelId };
  }

  const required: Array<[string, string | undefined]> = [
    ["OPENROUTER_API_KEY", apiKey],
    ["DISCORD_BOT_TOKEN", botToken],
    ["SOURCE_CHANNEL_ID", sourceChannelId],
    ["TARGET_CHANNEL_ID", targetChannelId],
  ];
  return {
    kind: "debug",
    inputPath: join(config.baseDir, DEBUG_DIR, DEBUG_CONVERSATION_FILE),
    outputPath: join(config.baseDir, DEBUG_DIR, DEBUG_RESULT_FILE),
    missing: required.filter(([, value]) => !value).map(([name]) => name),
  };
}
