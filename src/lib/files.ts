import fs from "node:fs/promises";
import path from "node:path";
import { MissingFileError } from "./errors";

export function resolveSitePath(root: string, relativePath: string): string {
  return path.resolve(root, ...relativePath.split("/"));
}

export async function readDocument(root: string, relativePath: string): Promise<string> {
  try {
    return await fs.readFile(resolveSitePath(root, relativePath), "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new MissingFileError(relativePath);
    }
    throw error;
  }
}

export async function writeDocument(root: string, relativePath: string, contents: string): Promise<void> {
  await fs.writeFile(resolveSitePath(root, relativePath), contents, "utf8");
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}

export type LineEnding = "\n" | "\r\n";

/** CRLF when the document uses it anywhere, LF otherwise. */
export function detectLineEnding(text: string): LineEnding {
  return text.includes("\r\n") ? "\r\n" : "\n";
}

/** Lines without their terminators; a trailing newline leaves a final empty line. */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export function joinLines(lines: string[], ending: LineEnding = "\n"): string {
  return lines.join(ending);
}
