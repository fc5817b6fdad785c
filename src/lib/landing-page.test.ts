import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { findGameCards, patchLandingPage, patchLandingText } from "./landing-page";
import { parseDateCode } from "./date-code";
import { MissingFileError } from "./errors";
import { createTempSite, type TempSite } from "../test/site";

const code = parseDateCode("20250923");

describe("findGameCards", () => {
  it("finds the link within the lookahead window", () => {
    const lines = [
      '<div class="game-card">',
      "<h3>Zip</h3>",
      "<p>one</p>",
      "<p>two</p>",
      "<p>three</p>",
      '<a href="../zip/20250901.html">View Solution</a>',
      "</div>"
    ];
    expect(findGameCards(lines)).toEqual([{ start: 0, link: 5, game: "zip" }]);
  });

  it("gives up on a link past the lookahead window", () => {
    const lines = [
      '<div class="game-card">',
      "<h3>Zip</h3>",
      "<p>one</p>",
      "<p>two</p>",
      "<p>three</p>",
      "<p>four</p>",
      '<a href="../zip/20250901.html">View Solution</a>',
      "</div>"
    ];
    expect(findGameCards(lines)).toEqual([{ start: 0, link: null, game: null }]);
  });

  it("ignores a card opener not followed by a sub-heading", () => {
    const lines = ['<div class="game-card">', "<p>Zip</p>", '<a href="../zip/20250901.html">View Solution</a>', "</div>"];
    expect(findGameCards(lines)).toEqual([]);
  });
});

describe("patchLandingText", () => {
  it("rewrites the heading and each card link, keeping the other card lines", () => {
    const input = [
      "  <h1>September 1, 2025</h1>",
      '  <div class="game-card">',
      "    <h3>Zip</h3>",
      "    <p>Connect the numbers.</p>",
      '    <a href="../zip/20250901.html">View Solution</a>',
      "  </div>",
      '  <div class="game-card">',
      "    <h3>Queens</h3>",
      '    <a href="../queens/20250901.html">View Solution</a>',
      "  </div>"
    ].join("\n");
    const result = patchLandingText(input, code);
    expect(result.changed).toBe(true);
    expect(result.heading).toBe(true);
    expect(result.cards).toEqual(["zip", "queens"]);
    expect(result.text.split("\n")).toEqual([
      "    <h1>September 23, 2025</h1>",
      '  <div class="game-card">',
      "    <h3>Zip</h3>",
      "    <p>Connect the numbers.</p>",
      '        <a href="../zip/20250923.html">View Solution</a>',
      "  </div>",
      '  <div class="game-card">',
      "    <h3>Queens</h3>",
      '        <a href="../queens/20250923.html">View Solution</a>',
      "  </div>"
    ]);
  });

  it("only rewrites the first heading", () => {
    const input = ["<h1>Old</h1>", "<h1>Second</h1>"].join("\n");
    expect(patchLandingText(input, code).text).toBe(["    <h1>September 23, 2025</h1>", "<h1>Second</h1>"].join("\n"));
  });

  it("passes through a card whose link points at an unknown game", () => {
    const input = ['<div class="game-card">', "<h3>Crossclimb</h3>", '<a href="../crossclimb/20250901.html">View</a>', "</div>"].join(
      "\n"
    );
    expect(patchLandingText(input, code)).toEqual({ text: input, changed: false, heading: false, cards: [] });
  });
});

describe("patchLandingText on CRLF input", () => {
  const page = (date: string) =>
    [
      `    <h1>${date === "20250923" ? "September 23, 2025" : "September 1, 2025"}</h1>`,
      '  <div class="game-card">',
      "    <h3>Tango</h3>",
      `        <a href="../tango/${date}.html">View Solution</a>`,
      "  </div>",
      ""
    ].join("\r\n");

  it("reports no change for an up-to-date page", () => {
    const input = page("20250923");
    expect(patchLandingText(input, code)).toEqual({ text: input, changed: false, heading: false, cards: [] });
  });

  it("rewrites the heading and link keeping CRLF endings", () => {
    const result = patchLandingText(page("20250901"), code);
    expect(result.changed).toBe(true);
    expect(result.cards).toEqual(["tango"]);
    expect(result.text).toBe(page("20250923"));
  });
});

describe("patchLandingPage", () => {
  let site: TempSite;

  beforeEach(async () => {
    site = await createTempSite();
  });

  afterEach(async () => {
    await site.cleanup();
  });

  it("updates the fixture page and reports no change on a second run", async () => {
    const first = await patchLandingPage(site.root, code);
    expect(first.changed).toBe(true);
    expect(first.cards).toEqual(["minisudoku", "zip", "queens", "tango"]);

    const text = await site.read("today/index.html");
    const lines = text.split("\n");
    expect(lines).toContain("    <h1>September 23, 2025</h1>");
    expect(lines).toContain('        <a href="../zip/20250923.html">View Solution</a>');
    expect(lines).toContain("        <p>Connect the numbers in order.</p>");

    const second = await patchLandingPage(site.root, code);
    expect(second.changed).toBe(false);
    expect(await site.read("today/index.html")).toBe(text);
  });

  it("fails with MissingFileError when the landing page is absent", async () => {
    await site.remove("today/index.html");
    await expect(patchLandingPage(site.root, code)).rejects.toBeInstanceOf(MissingFileError);
  });
});
