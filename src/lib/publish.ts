import { spawnSync } from "node:child_process";
import type { DateCode } from "./date-code";
import { PublishError } from "./errors";

export interface CommandResult {
  status: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (args: string[], cwd: string) => CommandResult;

export type PublishResult =
  | { status: "nothing-to-commit" }
  | { status: "committed"; branch: string; createdBranch: boolean; files: string[] };

/** Files touched during one run, in the order they were first reported. */
export class ChangeSet {
  private readonly entries = new Set<string>();

  add(filePath: string): void {
    this.entries.add(filePath);
  }

  get paths(): string[] {
    return Array.from(this.entries);
  }

  get size(): number {
    return this.entries.size;
  }

  get isEmpty(): boolean {
    return this.entries.size === 0;
  }
}

export const runGitCommand: CommandRunner = (args, cwd) => {
  const result = spawnSync("git", args, { cwd, encoding: "utf8" });
  if (result.error) {
    return { status: null, stdout: "", stderr: result.error.message };
  }
  return { status: result.status, stdout: result.stdout, stderr: result.stderr };
};

export class GitClient {
  constructor(
    private readonly cwd: string,
    private readonly run: CommandRunner = runGitCommand
  ) {}

  branchExists(name: string): boolean {
    return this.exec(["branch", "--list", name]).stdout.trim().length > 0;
  }

  checkout(name: string, options: { create?: boolean } = {}): void {
    this.exec(options.create ? ["checkout", "-b", name] : ["checkout", name]);
  }

  add(paths: string[]): void {
    this.exec(["add", "--", ...paths]);
  }

  commit(message: string): void {
    this.exec(["commit", "-m", message]);
  }

  private exec(args: string[]): CommandResult {
    const result = this.run(args, this.cwd);
    if (result.status !== 0) {
      throw new PublishError(["git", ...args].join(" "), result.status, result.stderr);
    }
    return result;
  }
}

export function commitMessage(code: DateCode): string {
  return `Add ${code} entry`;
}

/**
 * Commits exactly `files` on a branch named after the date, creating the
 * branch when it does not exist yet. Throws PublishError on the first failing
 * git command; files on disk are left as they are.
 */
export function publish(code: DateCode, files: string[], git: GitClient): PublishResult {
  if (files.length === 0) {
    return { status: "nothing-to-commit" };
  }
  const createdBranch = !git.branchExists(code);
  git.checkout(code, { create: createdBranch });
  git.add(files);
  git.commit(commitMessage(code));
  return { status: "committed", branch: code, createdBranch, files: [...files] };
}
