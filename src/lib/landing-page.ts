import { formatDisplayDate, type DateCode } from "./date-code";
import { detectLineEnding, joinLines, readDocument, splitLines, writeDocument } from "./files";
import { GAME_IDS, LANDING_PAGE_PATH, type GameId } from "./constants";

const CARD_OPEN = '<div class="game-card">';
/** Lines after the card's `<h3>` searched for its link. */
const LINK_LOOKAHEAD = 4;

export interface GameCard {
  /** Index of the card's opening line. */
  start: number;
  /** Index of the link line, or null when none sits in the lookahead window. */
  link: number | null;
  game: GameId | null;
}

export interface LandingPatchResult {
  text: string;
  changed: boolean;
  heading: boolean;
  cards: GameId[];
}

export function findHeading(lines: string[]): number {
  return lines.findIndex((line) => line.trim().startsWith("<h1>"));
}

export function findGameCards(lines: string[]): GameCard[] {
  const cards: GameCard[] = [];
  let i = 0;
  while (i < lines.length) {
    const isCard =
      lines[i].includes(CARD_OPEN) && i + 2 < lines.length && lines[i + 1].trim().startsWith("<h3>");
    if (!isCard) {
      i++;
      continue;
    }
    const windowEnd = Math.min(i + 2 + LINK_LOOKAHEAD, lines.length);
    let link: number | null = null;
    for (let j = i + 2; j < windowEnd; j++) {
      if (lines[j].includes("<a href=") && lines[j].includes("../")) {
        link = j;
        break;
      }
    }
    cards.push({ start: i, link, game: link === null ? null : gameReferencedBy(lines[link]) });
    // Resume after the card's link, or after its heading when it has none.
    i = link === null ? i + 2 : link + 1;
  }
  return cards;
}

export function renderCardLink(game: GameId, code: DateCode): string {
  return `        <a href="../${game}/${code}.html">View Solution</a>`;
}

export function patchLandingText(text: string, code: DateCode): LandingPatchResult {
  const lines = splitLines(text);
  let heading = false;
  const cards: GameId[] = [];

  const headingIndex = findHeading(lines);
  if (headingIndex !== -1) {
    const rendered = `    <h1>${formatDisplayDate(code)}</h1>`;
    if (lines[headingIndex] !== rendered) {
      lines[headingIndex] = rendered;
      heading = true;
    }
  }

  for (const card of findGameCards(lines)) {
    if (card.link === null || card.game === null) {
      continue;
    }
    const rendered = renderCardLink(card.game, code);
    if (lines[card.link] !== rendered) {
      lines[card.link] = rendered;
      cards.push(card.game);
    }
  }

  const changed = heading || cards.length > 0;
  return { text: changed ? joinLines(lines, detectLineEnding(text)) : text, changed, heading, cards };
}

export async function patchLandingPage(root: string, code: DateCode): Promise<LandingPatchResult & { path: string }> {
  const original = await readDocument(root, LANDING_PAGE_PATH);
  const result = patchLandingText(original, code);
  if (result.changed) {
    await writeDocument(root, LANDING_PAGE_PATH, result.text);
  }
  return { ...result, path: LANDING_PAGE_PATH };
}

function gameReferencedBy(line: string): GameId | null {
  return GAME_IDS.find((game) => line.includes(`../${game}/`)) ?? null;
}
