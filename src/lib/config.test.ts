import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { loadConfig, parseConfig } from "./config";
import { ConfigError } from "./errors";
import { createTempSite, type TempSite } from "../test/site";

describe("parseConfig", () => {
  it("fills in defaults for an empty file", () => {
    expect(parseConfig(null)).toEqual({
      homepage: {
        title: "LinkedIn Games Solutions – Mini Sudoku, Zip, Queens & Tango",
        ogTitle: "LinkedIn Games Solutions"
      },
      dailyPage: { imageWidth: "60%" },
      publish: { enabled: true }
    });
  });

  it("lets the environment switch publishing off", () => {
    expect(parseConfig({ publish: { enabled: true } }, { skipPublish: true }).publish.enabled).toBe(false);
  });

  it("lists every invalid field", () => {
    expect(() => parseConfig({ daily_page: { image_width: "wide" }, publish: { enabled: "yes" } })).toThrow(
      [
        "site.yml is invalid:",
        "- daily_page.image_width: must be a CSS length such as 60% or 480px",
        "- publish.enabled: Expected boolean, received string"
      ].join("\n")
    );
  });

  it("rejects unknown top-level keys", () => {
    expect(() => parseConfig({ homepages: {} })).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  let site: TempSite;

  beforeEach(async () => {
    site = await createTempSite({ empty: true });
  });

  afterEach(async () => {
    await site.cleanup();
  });

  it("uses defaults when site.yml is absent", async () => {
    const config = await loadConfig(site.root, { skipPublish: false });
    expect(config.homepage.ogTitle).toBe("LinkedIn Games Solutions");
    expect(config.publish.enabled).toBe(true);
  });

  it("reads overrides from site.yml", async () => {
    await site.write(
      "site.yml",
      ["homepage:", '  title: "Daily Puzzle Answers"', "daily_page:", "  image_width: 480px", "publish:", "  enabled: false", ""].join(
        "\n"
      )
    );
    const config = await loadConfig(site.root, { skipPublish: false });
    expect(config).toEqual({
      homepage: { title: "Daily Puzzle Answers", ogTitle: "LinkedIn Games Solutions" },
      dailyPage: { imageWidth: "480px" },
      publish: { enabled: false }
    });
  });

  it("reports YAML syntax errors as ConfigError", async () => {
    await site.write("site.yml", "homepage: [unclosed\n");
    await expect(loadConfig(site.root, { skipPublish: false })).rejects.toBeInstanceOf(ConfigError);
  });
});
