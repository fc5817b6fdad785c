import { formatDisplayDate, type DateCode } from "./date-code";
import { detectLineEnding, joinLines, readDocument, splitLines, writeDocument } from "./files";
import { HOMEPAGE_PATH } from "./constants";

export interface HomepageOptions {
  title: string;
  ogTitle: string;
}

export interface PatchResult {
  path: string;
  changed: boolean;
}

export function patchHomepageText(
  text: string,
  code: DateCode,
  options: HomepageOptions
): { text: string; changed: boolean } {
  const todayLink = `    <li><a href="/today/">🎯 ${formatDisplayDate(code)}</a></li>`;
  const titleLine = `  <title>${options.title}</title>`;
  const ogTitleLine = `  <meta property="og:title" content="${options.ogTitle}">`;

  let changed = false;
  const lines = splitLines(text).map((line) => {
    let replacement: string | null = null;
    if (line.includes('<a href="/today/">')) {
      replacement = line === todayLink ? null : todayLink;
    } else if (line.trim().startsWith("<title>")) {
      replacement = line.trim() === titleLine.trim() ? null : titleLine;
    } else if (line.includes('property="og:title"')) {
      replacement = line.trim() === ogTitleLine.trim() ? null : ogTitleLine;
    }
    if (replacement === null) {
      return line;
    }
    changed = true;
    return replacement;
  });

  return { text: changed ? joinLines(lines, detectLineEnding(text)) : text, changed };
}

export async function patchHomepage(root: string, code: DateCode, options: HomepageOptions): Promise<PatchResult> {
  const original = await readDocument(root, HOMEPAGE_PATH);
  const { text, changed } = patchHomepageText(original, code, options);
  if (changed) {
    await writeDocument(root, HOMEPAGE_PATH, text);
  }
  return { path: HOMEPAGE_PATH, changed };
}
