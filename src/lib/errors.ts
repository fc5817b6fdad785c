export type SiteErrorCode =
  | "USAGE"
  | "INVALID_DATE"
  | "MISSING_FILE"
  | "MALFORMED_DOCUMENT"
  | "UNKNOWN_GAME"
  | "PUBLISH_FAILED"
  | "INVALID_CONFIG";

export class SiteUpdateError extends Error {
  readonly code: SiteErrorCode;

  constructor(code: SiteErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UsageError extends SiteUpdateError {
  constructor(message: string) {
    super("USAGE", message);
  }
}

export class InvalidDateError extends SiteUpdateError {
  readonly value: string;

  constructor(value: string) {
    super("INVALID_DATE", `"${value}" is not a valid YYYYMMDD calendar date.`);
    this.value = value;
  }
}

export class MissingFileError extends SiteUpdateError {
  readonly path: string;

  constructor(filePath: string) {
    super("MISSING_FILE", `${filePath} not found.`);
    this.path = filePath;
  }
}

export class MalformedDocumentError extends SiteUpdateError {
  readonly path: string;

  constructor(filePath: string, detail: string) {
    super("MALFORMED_DOCUMENT", `${detail} in ${filePath}`);
    this.path = filePath;
  }
}

export class UnknownGameError extends SiteUpdateError {
  readonly game: string;

  constructor(game: string) {
    super("UNKNOWN_GAME", `Unknown game "${game}".`);
    this.game = game;
  }
}

export class PublishError extends SiteUpdateError {
  readonly command: string;
  readonly stderr: string;

  constructor(command: string, status: number | null, stderr: string) {
    const detail = stderr.trim() ? `: ${stderr.trim()}` : "";
    super("PUBLISH_FAILED", `\`${command}\` exited with ${status ?? "no status"}${detail}`);
    this.command = command;
    this.stderr = stderr;
  }
}

export class ConfigError extends SiteUpdateError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
