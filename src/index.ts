#!/usr/bin/env node
import { join, resolve } from "node:path";
import { Command, Option } from "commander";
import { loadConfig, loadEnvFile } from "./config.js";
import { log } from "./logger.js";
import { createPipeline } from "./pipeline.js";

async function runAction(opts: {
  baseDir?: string;
  envFile?: string;
  deliver?: string;
  trend?: boolean;
}): Promise<void> {
  const baseDir = resolve(opts.baseDir ?? process.cwd());
  const envFile = opts.envFile
    ? resolve(opts.envFile)
    : join(baseDir, ".env");

  if (loadEnvFile(envFile)) {
    log.info(`Loaded environment variables from ${envFile}`);
  } else {
    log.info("Using environment variables from the process environment");
  }

  const config = loadConfig(process.env, {
    baseDir,
    delivery: opts.deliver,
    includeTrend: opts.trend,
    logger: log,
  });
  const pipeline = createPipeline(config);
  log.info(`Starting run in ${pipeline.mode.kind} mode`);

  const result = await pipeline.run();
  if (result.ok) {
    log.info(`Run completed (${result.outcome})`);
    process.exit(0);
  }
  log.error(`Run failed (${result.reason})`);
  process.exit(1);
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("mood-digest")
    .description(
      "Summarize the emotional tone of a chat channel's history, one date at a time",
    );

  program
    .command("run", { isDefault: true })
    .description(
      "Fetch channel history, analyze each date, and publish the report",
    )
    .option(
      "-b, --base-dir <path>",
      "directory holding .env and debug/ (default: current directory)",
    )
    .option("-e, --env-file <path>", "env file to load (default: <base-dir>/.env)")
    .addOption(
      new Option("--deliver <mode>", "how to publish the report").choices([
        "message",
        "file",
      ]),
    )
    .option("-t, --trend", "append a cross-date trend analysis")
    .addHelpText(
      "after",
      `
Environment variables:
  OPENROUTER_API_KEY       API key for OpenRouter
  OPENROUTER_MODEL         Model to use (default: openai/gpt-4o-mini)
  DISCORD_BOT_TOKEN        Discord bot token
  SOURCE_CHANNEL_ID        Channel whose history is analyzed
  TARGET_CHANNEL_ID        Channel the report is posted to
  REPORT_DELIVERY          "message" (default) or "file"
  LOG_LEVEL                debug, info (default), warn or error

If the API key, bot token or either channel id is missing, the run uses debug mode:
input from debug/conversation_history.txt, output to debug/result.txt.`,
    )
    .action(runAction);

  await program.parseAsync();
}

main().catch((err: unknown) => {
  const stack = err instanceof Error ? (err.stack ?? err.message) : String(err);
  log.error(`Unhandled exception: ${stack}`);
  process.exit(1);
});
