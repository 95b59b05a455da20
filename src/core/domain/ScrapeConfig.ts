/**
 * Run configuration, read-only once the pipeline starts
 */

import type { StarFilter } from "./StarFilter";

export interface ScrapeConfig {
  readonly keyword: string;
  readonly starFilter: StarFilter | null;
  readonly maxProducts: number;
  readonly maxPages: number;
  readonly headless: boolean;
  readonly cookiesPath: string;
  readonly outputDir: string;
  /** Attempt unattended sign-in before scraping */
  readonly autoLogin: boolean;
  /** Save screenshots when a step degrades */
  readonly debugScreenshots: boolean;
}
