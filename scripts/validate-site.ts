#!/usr/bin/env tsx

/**
 * Checks the site's documents and site.yml without modifying anything.
 *
 * Usage:
 *   npm run validate
 *
 * Validates:
 * - site.yml shape, when the file exists
 * - the <ul> entry block of every game index
 * - the three homepage marker lines
 * - the landing page heading and one card per game
 */

import { loadConfig } from "../src/lib/config";
import { ConfigError } from "../src/lib/errors";
import { checkSite, type SiteIssue } from "../src/lib/site-check";
import { CONFIG_FILENAME, ROOT_DIR } from "../src/lib/constants";

async function main(): Promise<number> {
  console.log("🔍 Validating site documents...\n");

  const issues: SiteIssue[] = [];
  try {
    await loadConfig(ROOT_DIR);
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    issues.push({ file: CONFIG_FILENAME, field: "file", message: error.message });
  }
  issues.push(...(await checkSite(ROOT_DIR)));

  if (issues.length === 0) {
    console.log("✅ All site documents are valid!\n");
    return 0;
  }
  console.error("❌ Validation errors found:\n");
  issues.forEach((issue) => {
    console.error(`  ${issue.file}`);
    console.error(`    Field: ${issue.field}`);
    console.error(`    Error: ${issue.message}\n`);
  });
  return 1;
}

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
