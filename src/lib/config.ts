import fs from "node:fs/promises";
import YAML from "yaml";
import { z } from "zod";
import { ConfigError, describeError } from "./errors";
import { resolveSitePath } from "./files";
import { CONFIG_FILENAME, SKIP_PUBLISH } from "./constants";

const configSchema = z
  .object({
    homepage: z
      .object({
        title: z.string().min(1).default("LinkedIn Games Solutions – Mini Sudoku, Zip, Queens & Tango"),
        og_title: z.string().min(1).default("LinkedIn Games Solutions")
      })
      .default({}),
    daily_page: z
      .object({
        image_width: z
          .string()
          .regex(/^\d+(\.\d+)?(%|px|rem|em|vw)$/, "must be a CSS length such as 60% or 480px")
          .default("60%")
      })
      .default({}),
    publish: z
      .object({
        enabled: z.boolean().default(true)
      })
      .default({})
  })
  .strict();

export interface SiteConfig {
  homepage: {
    title: string;
    ogTitle: string;
  };
  dailyPage: {
    imageWidth: string;
  };
  publish: {
    enabled: boolean;
  };
}

export function parseConfig(raw: unknown, options: { skipPublish?: boolean } = {}): SiteConfig {
  try {
    const parsed = configSchema.parse(raw ?? {});
    return {
      homepage: { title: parsed.homepage.title, ogTitle: parsed.homepage.og_title },
      dailyPage: { imageWidth: parsed.daily_page.image_width },
      publish: { enabled: parsed.publish.enabled && !(options.skipPublish ?? false) }
    };
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues
        .map((issue) => {
          const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
          return `- ${path}: ${issue.message}`;
        })
        .join("\n");
      throw new ConfigError(`${CONFIG_FILENAME} is invalid:\n${issues}`);
    }
    throw error;
  }
}

/** Reads `site.yml` from the site root; a missing file yields the defaults. */
export async function loadConfig(
  root: string,
  options: { skipPublish?: boolean } = { skipPublish: SKIP_PUBLISH }
): Promise<SiteConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(resolveSitePath(root, CONFIG_FILENAME), "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return parseConfig({}, options);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ConfigError(`${CONFIG_FILENAME} is not valid YAML: ${describeError(error)}`);
  }
  return parseConfig(parsed, options);
}
