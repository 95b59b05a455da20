/**
 * ScrapeConfig loader
 *
 * Validates raw CLI / prompt input with zod and produces a frozen
 * ScrapeConfig. Any violation is a ConfigurationError listing every issue.
 */

import { z } from "zod";
import type { ScrapeConfig } from "@/core/domain/ScrapeConfig";
import { STAR_FILTERS, parseStarFilter } from "@/core/domain/StarFilter";
import { ConfigurationError } from "@/core/errors";
import { OUTPUT_CONFIG, SCRAPE_DEFAULTS } from "@/config/constants";

const ScrapeInputSchema = z.object({
  keyword: z
    .string({ required_error: "keyword is required" })
    .trim()
    .min(1, "keyword must not be empty"),
  starFilter: z
    .string()
    .nullish()
    .transform((value, ctx) => {
      const filter = parseStarFilter(value);
      if (filter === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `invalid star filter "${value}" (expected ${[...STAR_FILTERS, "1-5", "all"].join(", ")})`,
        });
        return z.NEVER;
      }
      return filter;
    }),
  maxProducts: z
    .number()
    .int("maxProducts must be an integer")
    .min(1, "maxProducts must be greater than 0")
    .default(SCRAPE_DEFAULTS.MAX_PRODUCTS),
  maxPages: z
    .number()
    .int("maxPages must be an integer")
    .min(1, "maxPages must be greater than 0")
    .default(SCRAPE_DEFAULTS.MAX_PAGES),
  headless: z.boolean().default(false),
  cookiesPath: z.string().trim().min(1).default(OUTPUT_CONFIG.DEFAULT_COOKIES_FILE),
  outputDir: z.string().trim().min(1).default(OUTPUT_CONFIG.RESULT_DIR),
  autoLogin: z.boolean().default(false),
  debugScreenshots: z.boolean().default(false),
});

export type ScrapeInput = z.input<typeof ScrapeInputSchema>;

export function loadScrapeConfig(input: ScrapeInput): ScrapeConfig {
  const parseResult = ScrapeInputSchema.safeParse(input);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  return Object.freeze({ ...parseResult.data });
}
