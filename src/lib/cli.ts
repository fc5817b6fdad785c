import path from "node:path";
import ora, { type Ora } from "ora";
import { parseCliArgs } from "./cli-args";
import { loadConfig } from "./config";
import { parseDateCode } from "./date-code";
import { ConfigError, UsageError, describeError } from "./errors";
import type { Logger } from "./log";
import type { GitClient } from "./publish";
import { updateSite } from "./update-site";
import { SKIP_PUBLISH } from "./constants";

export const EXIT_CODES = {
  ok: 0,
  usage: 1,
  runtime: 2,
  config: 3
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CliOptions {
  root: string;
  logger: Logger;
  git?: GitClient;
  skipPublish?: boolean;
  /** Hides the spinner, for callers that capture output. */
  silent?: boolean;
}

/**
 * Runs one `add-entry` invocation and returns its exit code. Argument and
 * date checks happen before any file is read.
 */
export async function runCli(args: readonly string[], options: CliOptions): Promise<ExitCode> {
  const { root, logger } = options;
  let spinner: Ora | null = null;

  try {
    const code = parseDateCode(parseCliArgs(args));

    spinner = ora({ text: "Loading configuration...", isSilent: options.silent ?? false }).start();
    const config = await loadConfig(root, { skipPublish: options.skipPublish ?? SKIP_PUBLISH });
    spinner.succeed(`Configuration loaded (publishing ${config.publish.enabled ? "enabled" : "disabled"})`);
    spinner = null;

    logger.detail(`Site root: ${path.relative(process.cwd(), root) || "."}`);
    logger.info(`Adding ${code} to the solution pages`);

    const report = await updateSite({ root, code, config, logger, git: options.git });

    const failed = report.outcomes.filter((outcome) => outcome.status === "failed").length;
    const summary = `${report.code}: ${report.changedFiles.length} file(s) changed`;
    logger.info(failed > 0 ? `${summary}, ${failed} operation(s) failed` : summary);
    for (const file of report.changedFiles) {
      logger.detail(file);
    }

    return report.publishError ? EXIT_CODES.runtime : EXIT_CODES.ok;
  } catch (error) {
    if (spinner) {
      spinner.fail("Configuration could not be loaded");
    }
    logger.error(describeError(error));
    if (error instanceof UsageError) {
      return EXIT_CODES.usage;
    }
    if (error instanceof ConfigError) {
      return EXIT_CODES.config;
    }
    // Calendar-invalid dates land here too.
    return EXIT_CODES.runtime;
  }
}
