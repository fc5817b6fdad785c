import { MissingFileError, describeError } from "./errors";
import { readDocument, splitLines } from "./files";
import { parseIndexDocument } from "./index-document";
import { findGameCards, findHeading } from "./landing-page";
import { GAME_IDS, HOMEPAGE_PATH, LANDING_PAGE_PATH, gameIndexPath } from "./constants";

export interface SiteIssue {
  file: string;
  field: string;
  message: string;
}

const HOMEPAGE_MARKERS: Array<{ field: string; matches: (line: string) => boolean }> = [
  { field: "today-link", matches: (line) => line.includes('<a href="/today/">') },
  { field: "title", matches: (line) => line.trim().startsWith("<title>") },
  { field: "og:title", matches: (line) => line.includes('property="og:title"') }
];

/** Reports every structural marker the updater relies on that a document lacks. */
export async function checkSite(root: string): Promise<SiteIssue[]> {
  const issues: SiteIssue[] = [];

  for (const game of GAME_IDS) {
    const target = gameIndexPath(game);
    const text = await readOrReport(root, target, issues);
    if (text === null) {
      continue;
    }
    try {
      const document = parseIndexDocument(text, target);
      if (document.dropped.some((line) => line.trim().length > 0)) {
        issues.push({ file: target, field: "entries", message: "Entry block holds lines without a dated link" });
      }
    } catch (error) {
      issues.push({ file: target, field: "entries", message: describeError(error) });
    }
  }

  const homepage = await readOrReport(root, HOMEPAGE_PATH, issues);
  if (homepage !== null) {
    const lines = splitLines(homepage);
    for (const marker of HOMEPAGE_MARKERS) {
      if (!lines.some(marker.matches)) {
        issues.push({ file: HOMEPAGE_PATH, field: marker.field, message: "Marker line not found" });
      }
    }
  }

  const landing = await readOrReport(root, LANDING_PAGE_PATH, issues);
  if (landing !== null) {
    const lines = splitLines(landing);
    if (findHeading(lines) === -1) {
      issues.push({ file: LANDING_PAGE_PATH, field: "h1", message: "No <h1> heading found" });
    }
    const linked = new Set(findGameCards(lines).map((card) => card.game));
    for (const game of GAME_IDS) {
      if (!linked.has(game)) {
        issues.push({ file: LANDING_PAGE_PATH, field: `card.${game}`, message: "No game card linking to this game" });
      }
    }
  }

  return issues;
}

async function readOrReport(root: string, target: string, issues: SiteIssue[]): Promise<string | null> {
  try {
    return await readDocument(root, target);
  } catch (error) {
    if (error instanceof MissingFileError) {
      issues.push({ file: target, field: "file", message: "File does not exist" });
      return null;
    }
    throw error;
  }
}
