/**
 * Fixed Delay Pacing
 *
 * SOLID:
 * - SRP: waiting between requests only
 * - OCP: other policies implement IPacingPolicy
 *
 * Constant waits: between review pages of one product, and between products.
 */

import type { IPacingPolicy } from "@/core/interfaces/IPacingPolicy";
import { SCRAPER_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";

export type Sleep = (ms: number) => Promise<void>;

export interface FixedDelayOptions {
  pageDelayMs?: number;
  productDelayMs?: number;
  /** Injected by tests */
  sleep?: Sleep;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class FixedDelayPacing implements IPacingPolicy {
  private readonly pageDelayMs: number;
  private readonly productDelayMs: number;
  private readonly sleep: Sleep;

  constructor(options: FixedDelayOptions = {}) {
    this.pageDelayMs = options.pageDelayMs ?? SCRAPER_CONFIG.PAGE_DELAY_MS;
    this.productDelayMs = options.productDelayMs ?? SCRAPER_CONFIG.PRODUCT_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async betweenPages(): Promise<void> {
    logger.debug({ wait_time_ms: this.pageDelayMs }, "Pacing between pages");
    await this.sleep(this.pageDelayMs);
  }

  async betweenProducts(): Promise<void> {
    logger.debug({ wait_time_ms: this.productDelayMs }, "Pacing between products");
    await this.sleep(this.productDelayMs);
  }
}
