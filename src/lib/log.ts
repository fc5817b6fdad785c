export const COLORS = {
  reset: "\x1b[0m",
  info: "\x1b[36m",
  success: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  detail: "\x1b[90m"
} as const;

export const GLYPHS = {
  success: "✓",
  warn: "⚠",
  error: "✗",
  info: "ℹ",
  folder: "▸",
  branch: "⎇"
} as const;

export interface Logger {
  info(message: string): void;
  detail(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(): Logger {
  return {
    info: (message) => console.log(`${COLORS.info}${GLYPHS.info}${COLORS.reset} ${message}`),
    detail: (message) => console.log(`${COLORS.detail}${GLYPHS.folder} ${message}${COLORS.reset}`),
    success: (message) => console.log(`${COLORS.success}${GLYPHS.success}${COLORS.reset} ${message}`),
    warn: (message) => console.warn(`${COLORS.warn}${GLYPHS.warn}${COLORS.reset} ${message}`),
    error: (message) => console.error(`${COLORS.error}${GLYPHS.error}${COLORS.reset} ${message}`)
  };
}
