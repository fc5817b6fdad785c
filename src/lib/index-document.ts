import { formatDisplayDate, type DateCode } from "./date-code";
import { MalformedDocumentError } from "./errors";
import { detectLineEnding, joinLines, readDocument, splitLines, writeDocument, type LineEnding } from "./files";
import { gameIndexPath, type GameId } from "./constants";

const LIST_OPEN = "<ul>";
const LIST_CLOSE = "</ul>";
const ENTRY_REFERENCE = /href="(\d{8})\.html"/;

export interface IndexEntry {
  /** Eight digits as found in the entry's link; not checked as a calendar date. */
  code: string;
  line: string;
}

/**
 * A game index split around its entry block. `preamble` ends with the line
 * holding the list-open marker and `postamble` starts with the line holding
 * the list-close marker; `entries` sit between them, newest first.
 */
export interface IndexDocument {
  preamble: string[];
  entries: IndexEntry[];
  postamble: string[];
  /** Block lines with no date reference. They are not written back. */
  dropped: string[];
  lineEnding: LineEnding;
}

export interface MergeResult {
  path: string;
  changed: boolean;
  rewritten: boolean;
}

export function parseIndexDocument(text: string, source = "document"): IndexDocument {
  const lines = splitLines(text);
  const open = lines.findIndex((line) => line.includes(LIST_OPEN));
  const close = lines.findIndex((line) => line.includes(LIST_CLOSE));
  if (open === -1 || close === -1) {
    throw new MalformedDocumentError(source, "No <ul> block found");
  }
  if (close <= open) {
    throw new MalformedDocumentError(source, "</ul> appears before <ul>");
  }

  const entries = new Map<string, string>();
  const dropped: string[] = [];
  for (const line of lines.slice(open + 1, close)) {
    const code = line.match(ENTRY_REFERENCE)?.[1];
    if (code === undefined) {
      dropped.push(line);
      continue;
    }
    entries.set(code, line);
  }

  return {
    preamble: lines.slice(0, open + 1),
    entries: sortEntries(Array.from(entries, ([code, line]) => ({ code, line }))),
    postamble: lines.slice(close),
    dropped,
    lineEnding: detectLineEnding(text)
  };
}

export function renderEntryLine(code: DateCode): string {
  return `    <li><a href="${code}.html">${formatDisplayDate(code)}</a></li>`;
}

export function insertEntry(
  document: IndexDocument,
  code: DateCode
): { document: IndexDocument; inserted: boolean } {
  if (document.entries.some((entry) => entry.code === code)) {
    return { document, inserted: false };
  }
  const entries = sortEntries([...document.entries, { code, line: renderEntryLine(code) }]);
  return { document: { ...document, entries }, inserted: true };
}

export function renderIndexDocument(document: IndexDocument): string {
  const lines = [...document.preamble, ...document.entries.map((entry) => entry.line), ...document.postamble];
  return joinLines(lines, document.lineEnding);
}

export async function mergeEntry(root: string, game: GameId, code: DateCode): Promise<MergeResult> {
  const target = gameIndexPath(game);
  const original = await readDocument(root, target);
  const parsed = parseIndexDocument(original, target);
  const { document, inserted } = insertEntry(parsed, code);
  const rendered = renderIndexDocument(document);
  const rewritten = rendered !== original;
  if (rewritten) {
    await writeDocument(root, target, rendered);
  }
  return { path: target, changed: inserted, rewritten };
}

function sortEntries(entries: IndexEntry[]): IndexEntry[] {
  // Fixed-width YYYYMMDD: lexicographic order is chronological order.
  return [...entries].sort((a, b) => (a.code < b.code ? 1 : a.code > b.code ? -1 : 0));
}
