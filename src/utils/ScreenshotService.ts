/**
 * Screenshot Service
 *
 * SOLID:
 * - SRP: saving debug screenshots only
 *
 * Path: outputDir/debug/YYYY-MM-DD/{label}_{HHmmss}.png
 * A failed capture is logged and never fails the caller.
 */

import * as fs from "fs/promises";
import * as path from "path";
import type { Page } from "playwright";
import { logger } from "@/config/logger";
import { OUTPUT_CONFIG } from "@/config/constants";
import { getDateStringWithDash, getTimeString } from "@/utils/timestamp";

export class ScreenshotService {
  constructor(
    private readonly outputDir: string,
    private readonly enabled: boolean,
  ) {}

  /**
   * @returns saved file path, null when disabled or failed
   */
  async capture(page: Page | null, label: string): Promise<string | null> {
    if (!this.enabled || !page) {
      return null;
    }

    try {
      const dayDir = path.join(this.outputDir, OUTPUT_CONFIG.DEBUG_DIR, getDateStringWithDash());
      await fs.mkdir(dayDir, { recursive: true });

      const safeLabel = label.replace(/[^\w.-]+/g, "_");
      const filepath = path.join(dayDir, `${safeLabel}_${getTimeString()}.png`);

      // viewport only
      await page.screenshot({ path: filepath, fullPage: false });

      logger.debug({ filepath, label }, "Debug screenshot saved");
      return filepath;
    } catch (error) {
      logger.warn({ error, label }, "Debug screenshot failed - ignored");
      return null;
    }
  }
}
