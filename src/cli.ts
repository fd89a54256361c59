import process from "node:process";
import { Command, Option } from "commander";
import { loadConfigFromEnv, type Environment } from "./config.js";
import { ConfigurationMissingError, describeError } from "./errors.js";
import { createPageFetcher } from "./fetcher.js";
import { logger, setLogLevel } from "./logger.js";
import { runMonitor } from "./monitor.js";
import { EmailNotifier } from "./notifier.js";
import { HostedSentimentClassifier } from "./sentiment.js";
import type { LogLevel, MonitorConfig, RunSummary } from "./types.js";

export interface RunFlags {
  dryRun?: boolean;
  logLevel?: LogLevel;
}

export function buildProgram(env: Environment): Command {
  const program = new Command();
  program
    .name("leader-watch")
    .description("Scan pages for negative mentions of configured leaders and email a digest")
    .version("0.1.0");

  program
    .command("run", { isDefault: true })
    .description("Run one monitoring pass using LEADERS, TARGET_URLS and the email settings from the environment")
    .option("--dry-run", "Log the digest instead of emailing it")
    .addOption(new Option("--log-level <level>", "Minimum log level").choices(["error", "warn", "info", "debug"]))
    .action(async (flags: RunFlags) => {
      await runOnce(flags, env);
    });

  return program;
}

/**
 * One monitoring pass. Missing leaders or URLs end the pass quietly with an
 * explanation; any other configuration error is rethrown.
 */
export async function runOnce(flags: RunFlags, env: Environment): Promise<RunSummary | undefined> {
  let config: MonitorConfig;
  try {
    config = loadConfigFromEnv(env);
  } catch (error) {
    if (error instanceof ConfigurationMissingError) {
      logger.error("Please set LEADERS and TARGET_URLS environment variables", { missing: error.missing });
      return undefined;
    }
    throw error;
  }

  setLogLevel(flags.logLevel ?? config.logLevel);
  const dryRun = Boolean(flags.dryRun) || config.dryRun;
  logger.info("Monitor starting", {
    leaders: config.leaders.length,
    urls: config.targetUrls.length,
    model: config.sentiment.model,
    threshold: config.threshold,
    dryRun,
  });

  return runMonitor(
    { ...config, dryRun },
    {
      fetchPage: createPageFetcher({ timeoutMs: config.fetchTimeoutMs, userAgent: config.userAgent }),
      classifier: new HostedSentimentClassifier(config.sentiment),
      notifier: new EmailNotifier(config.smtp),
    }
  );
}

export async function main(argv: string[], env: Environment): Promise<void> {
  try {
    await buildProgram(env).parseAsync(argv);
  } catch (error) {
    logger.error("Fatal error", { error: describeError(error) });
    process.exitCode = 1;
  }
}
