import { formatDisplayDate, type DateCode } from "./date-code";
import { describeError, PublishError } from "./errors";
import { generatePage } from "./daily-page";
import { mergeEntry } from "./index-document";
import { patchHomepage } from "./homepage";
import { patchLandingPage } from "./landing-page";
import { ChangeSet, GitClient, publish, type PublishResult } from "./publish";
import type { Logger } from "./log";
import type { SiteConfig } from "./config";
import { GAME_IDS, HOMEPAGE_PATH, LANDING_PAGE_PATH, dailyPagePath, gameIndexPath } from "./constants";

export type OperationName = "index" | "page" | "homepage" | "landing" | "publish";

export interface OperationOutcome {
  operation: OperationName;
  target: string;
  status: "success" | "skipped" | "failed";
  message: string;
}

export interface RunReport {
  code: DateCode;
  changedFiles: string[];
  outcomes: OperationOutcome[];
  publish: PublishResult | null;
  publishError: PublishError | null;
}

export interface UpdateSiteOptions {
  root: string;
  code: DateCode;
  config: SiteConfig;
  logger: Logger;
  /** Defaults to a client running the git CLI in `root`. */
  git?: GitClient;
}

export async function updateSite(options: UpdateSiteOptions): Promise<RunReport> {
  const { root, code, config, logger } = options;
  const displayDate = formatDisplayDate(code);
  const changes = new ChangeSet();
  const outcomes: OperationOutcome[] = [];

  const record = (outcome: OperationOutcome) => {
    outcomes.push(outcome);
    if (outcome.status === "success") {
      logger.success(outcome.message);
    } else if (outcome.status === "skipped") {
      logger.warn(outcome.message);
    } else {
      logger.error(outcome.message);
    }
  };

  const attempt = async (operation: OperationName, target: string, task: () => Promise<OperationOutcome>) => {
    try {
      record(await task());
    } catch (error) {
      record({ operation, target, status: "failed", message: describeError(error) });
    }
  };

  for (const game of GAME_IDS) {
    const indexPath = gameIndexPath(game);
    await attempt("index", indexPath, async () => {
      const result = await mergeEntry(root, game, code);
      if (result.changed) {
        changes.add(result.path);
        return {
          operation: "index",
          target: indexPath,
          status: "success",
          message: `Added ${code} → ${displayDate} to ${indexPath}`
        };
      }
      return {
        operation: "index",
        target: indexPath,
        status: "skipped",
        message: `${code} already exists in ${indexPath}, skipping insert.`
      };
    });

    const pagePath = dailyPagePath(game, code);
    await attempt("page", pagePath, async () => {
      const result = await generatePage(root, game, code, config.dailyPage);
      if (result.changed) {
        changes.add(result.path);
        return { operation: "page", target: pagePath, status: "success", message: `Created ${pagePath}` };
      }
      return {
        operation: "page",
        target: pagePath,
        status: "skipped",
        message: `${pagePath} already exists, skipping.`
      };
    });
  }

  await attempt("homepage", HOMEPAGE_PATH, async () => {
    const result = await patchHomepage(root, code, config.homepage);
    if (result.changed) {
      changes.add(result.path);
      return {
        operation: "homepage",
        target: HOMEPAGE_PATH,
        status: "success",
        message: `Updated ${HOMEPAGE_PATH} with ${displayDate}`
      };
    }
    return {
      operation: "homepage",
      target: HOMEPAGE_PATH,
      status: "skipped",
      message: `${HOMEPAGE_PATH} already up to date.`
    };
  });

  await attempt("landing", LANDING_PAGE_PATH, async () => {
    const result = await patchLandingPage(root, code);
    if (result.changed) {
      changes.add(result.path);
      return {
        operation: "landing",
        target: LANDING_PAGE_PATH,
        status: "success",
        message: `Updated ${LANDING_PAGE_PATH} for ${displayDate}`
      };
    }
    return {
      operation: "landing",
      target: LANDING_PAGE_PATH,
      status: "skipped",
      message: `${LANDING_PAGE_PATH} already up to date.`
    };
  });

  const report: RunReport = {
    code,
    changedFiles: changes.paths,
    outcomes,
    publish: null,
    publishError: null
  };

  if (changes.isEmpty) {
    report.publish = { status: "nothing-to-commit" };
    record({ operation: "publish", target: code, status: "skipped", message: "No changes to commit." });
    return report;
  }
  if (!config.publish.enabled) {
    record({
      operation: "publish",
      target: code,
      status: "skipped",
      message: "Publishing disabled, leaving changes uncommitted."
    });
    return report;
  }

  const git = options.git ?? new GitClient(root);
  try {
    const result = publish(code, changes.paths, git);
    report.publish = result;
    const branchNote = result.status === "committed" && !result.createdBranch ? " (existing branch)" : "";
    record({
      operation: "publish",
      target: code,
      status: "success",
      message: `Committed ${changes.size} file(s) on branch '${code}'${branchNote}.`
    });
  } catch (error) {
    if (!(error instanceof PublishError)) {
      throw error;
    }
    report.publishError = error;
    record({ operation: "publish", target: code, status: "failed", message: `Publish failed: ${error.message}` });
  }
  return report;
}
