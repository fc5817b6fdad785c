import fs from "node:fs/promises";
import { formatDisplayDate, type DateCode } from "./date-code";
import { UnknownGameError } from "./errors";
import { resolveSitePath } from "./files";
import { GAME_TITLES, dailyPagePath, isGameId, type GameId } from "./constants";

export interface DailyPageOptions {
  imageWidth: string;
}

export interface GenerateResult {
  path: string;
  changed: boolean;
}

export function renderDailyPage(game: GameId, code: DateCode, options: DailyPageOptions): string {
  const title = GAME_TITLES[game];
  const displayDate = formatDisplayDate(code);
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>${title} Solution – ${displayDate}</title>
  <link rel="stylesheet" href="../style.css">
</head>
<body>
  <header>
    <div class="container">
      <a href="/" class="logo">LinkedIn <span>Games</span></a>
      <nav>
        <a href="/">Home</a>
        <a href="/today/">Today's Solutions</a>
        <a href="/about.html">About</a>
      </nav>
    </div>
  </header>

  <main class="container">
    <h1>${title} – ${displayDate}</h1>

    <img src="../images/${game}_${code}.jpeg" alt="${title} Solution" style="max-width: ${options.imageWidth};">

    <footer>
      <hr>
      <a href="../today/" class="nav">← Back to Today's Solutions</a>
    </footer>
  </main>
</body>
</html>
`;
}

/**
 * Writes `<game>/<code>.html` unless it is already there. An existing page is
 * never touched.
 */
export async function generatePage(
  root: string,
  game: string,
  code: DateCode,
  options: DailyPageOptions
): Promise<GenerateResult> {
  if (!isGameId(game)) {
    throw new UnknownGameError(game);
  }
  const target = dailyPagePath(game, code);
  const contents = renderDailyPage(game, code, options);
  try {
    await fs.writeFile(resolveSitePath(root, target), contents, { encoding: "utf8", flag: "wx" });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "EEXIST") {
      return { path: target, changed: false };
    }
    throw error;
  }
  return { path: target, changed: true };
}
