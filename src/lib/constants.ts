import path from "node:path";

export const ROOT_DIR = path.resolve(process.env.SITE_ROOT ?? process.cwd());
export const CONFIG_FILENAME = "site.yml";
export const SKIP_PUBLISH = process.env.SKIP_PUBLISH === "1";

export const GAME_IDS = ["minisudoku", "zip", "queens", "tango"] as const;

export type GameId = (typeof GAME_IDS)[number];

export const GAME_TITLES = {
  minisudoku: "Mini Sudoku",
  zip: "Zip",
  queens: "Queens",
  tango: "Tango"
} as const satisfies Record<GameId, string>;

export const HOMEPAGE_PATH = "index.html";
export const LANDING_PAGE_PATH = "today/index.html";

export function isGameId(value: string): value is GameId {
  return GAME_IDS.some((game) => game === value);
}

export function gameIndexPath(game: GameId): string {
  return `${game}/index.html`;
}

export function dailyPagePath(game: GameId, code: string): string {
  return `${game}/${code}.html`;
}
