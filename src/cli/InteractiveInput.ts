/**
 * Interactive scrape input
 *
 * Prompts for every scrape setting. An empty keyword is fatal; an unknown
 * star filter falls back to "all"; counts are asked again until valid.
 */

import { parseStarFilter } from "@/core/domain/StarFilter";
import { ConfigurationError } from "@/core/errors";
import type { ScrapeInput } from "@/config/ScrapeConfigLoader";
import { OUTPUT_CONFIG, SCRAPE_DEFAULTS } from "@/config/constants";
import type { Prompter } from "@/utils/Prompter";

const STAR_FILTER_HELP = [
  "Star filter options:",
  "  5 - Only 5-star reviews",
  "  4 - Only 4-star reviews",
  "  3 - Only 3-star reviews",
  "  2 - Only 2-star reviews",
  "  1 - Only 1-star reviews",
  "  positive - 4-5 star reviews",
  "  critical - 1-3 star reviews",
  "  all - All reviews (default)",
];

const YES = ["y", "yes", "1", "true"];

export async function promptScrapeInput(
  prompter: Prompter,
  output: NodeJS.WritableStream,
): Promise<ScrapeInput> {
  const keyword = await prompter.ask("Enter search keyword (e.g., 'laptop bag'): ");
  if (!keyword) {
    throw new ConfigurationError("Keyword cannot be empty", ["keyword"]);
  }

  output.write(`\n${STAR_FILTER_HELP.join("\n")}\n`);
  const rawFilter = (await prompter.ask("Enter star filter (press Enter for 'all'): ")).toLowerCase();
  let starFilter = parseStarFilter(rawFilter);
  if (starFilter === undefined) {
    output.write(`Warning: Invalid star filter '${rawFilter}'. Using 'all' instead.\n`);
    starFilter = null;
  }

  const maxProducts = await askPositiveInt(
    prompter,
    output,
    `Enter max number of products to scrape (default: ${SCRAPE_DEFAULTS.MAX_PRODUCTS}): `,
    SCRAPE_DEFAULTS.MAX_PRODUCTS,
  );
  const maxPages = await askPositiveInt(
    prompter,
    output,
    `Enter max pages per product (default: ${SCRAPE_DEFAULTS.MAX_PAGES}): `,
    SCRAPE_DEFAULTS.MAX_PAGES,
  );

  const headless = await askYesNo(prompter, "Run in headless mode? (y/n, default: n): ");

  const cookiesPath =
    (await prompter.ask(
      `Enter path to cookies file (default: ${OUTPUT_CONFIG.DEFAULT_COOKIES_FILE}): `,
    )) || OUTPUT_CONFIG.DEFAULT_COOKIES_FILE;

  return { keyword, starFilter, maxProducts, maxPages, headless, cookiesPath };
}

/**
 * Empty answer takes the default; anything but a positive integer asks again
 */
export async function askPositiveInt(
  prompter: Prompter,
  output: NodeJS.WritableStream,
  question: string,
  defaultValue: number,
): Promise<number> {
  for (;;) {
    const answer = await prompter.ask(question);
    if (!answer) return defaultValue;

    if (/^\d+$/.test(answer)) {
      const value = Number.parseInt(answer, 10);
      if (value > 0) return value;
      output.write("Error: Please enter a positive number\n");
      continue;
    }
    output.write("Error: Please enter a valid number\n");
  }
}

export async function askYesNo(prompter: Prompter, question: string): Promise<boolean> {
  const answer = (await prompter.ask(question)).toLowerCase();
  return YES.includes(answer);
}
