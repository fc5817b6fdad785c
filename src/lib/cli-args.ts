import { isDateCodeFormat } from "./date-code";
import { UsageError } from "./errors";

export const USAGE = "Usage: npm run update -- YYYYMMDD";

/**
 * Checks the argument list shape only: one value of eight digits. Whether the
 * digits form a calendar date is decided later by parseDateCode.
 */
export function parseCliArgs(args: readonly string[]): string {
  if (args.length !== 1) {
    throw new UsageError(USAGE);
  }
  const [value] = args;
  if (!isDateCodeFormat(value)) {
    throw new UsageError("Date must be in format YYYYMMDD, e.g., 20250923");
  }
  return value;
}
