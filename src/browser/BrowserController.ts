/**
 * Browser Controller
 *
 * Playwright implementation of IBrowserSession: one browser, one context,
 * one page for the whole run.
 *
 * SOLID:
 * - SRP: browser lifecycle and navigation only (no extraction)
 * - LSP: interchangeable with any IBrowserSession (tests use an in-process fake)
 */

import { chromium, errors, type Browser, type BrowserContext, type Page } from "playwright";

import type { IBrowserSession, SessionOpenOptions } from "@/core/interfaces/IBrowserSession";
import type { IPageScope } from "@/core/interfaces/IPageScope";
import type { SessionCookie } from "@/core/domain/Session";
import { SessionBootstrapError, TransportTimeoutError, getErrorMessage } from "@/core/errors";
import { PlaywrightScope } from "./PlaywrightScope";
import { ScreenshotService } from "@/utils/ScreenshotService";
import { browserArgsFor } from "@/config/BrowserArgs";
import { SCRAPER_CONFIG } from "@/config/constants";
import { logger as rootLogger } from "@/config/logger";

const logger = rootLogger.child({ component: "browser" });

export class BrowserController implements IBrowserSession {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private activePage: Page | null = null;

  constructor(private readonly screenshots: ScreenshotService) {}

  async open(options: SessionOpenOptions): Promise<void> {
    if (this.activePage) {
      logger.debug("Browser already open");
      return;
    }

    logger.info({ headless: options.headless, cookies: options.cookies.length }, "Launching browser");

    try {
      this.browser = await chromium.launch({
        headless: options.headless,
        args: browserArgsFor(options.headless),
      });

      this.context = await this.browser.newContext({
        viewport: SCRAPER_CONFIG.DEFAULT_VIEWPORT,
        userAgent: SCRAPER_CONFIG.USER_AGENT,
        locale: SCRAPER_CONFIG.LOCALE,
        extraHTTPHeaders: {
          "Accept-Language": "en-US,en;q=0.9",
        },
      });
      this.context.setDefaultNavigationTimeout(SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS);
      this.context.setDefaultTimeout(SCRAPER_CONFIG.ACTION_TIMEOUT_MS);

      if (options.cookies.length > 0) {
        await this.context.addCookies(options.cookies);
      }

      this.activePage = await this.context.newPage();
    } catch (error) {
      await this.close();
      throw new SessionBootstrapError(`Browser session failed to start: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    logger.info("Browser ready");
  }

  async goto(url: string): Promise<void> {
    const page = this.requirePage();
    logger.debug({ url }, "Navigating");
    try {
      await page.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS,
      });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new TransportTimeoutError("goto", url, { cause: error });
      }
      throw error;
    }
  }

  currentUrl(): string {
    return this.requirePage().url();
  }

  async title(): Promise<string> {
    return this.requirePage().title();
  }

  page(): IPageScope {
    return PlaywrightScope.forPage(this.requirePage());
  }

  async settle(ms: number): Promise<void> {
    await this.requirePage().waitForTimeout(ms);
  }

  async captureDebug(label: string): Promise<string | null> {
    return this.screenshots.capture(this.activePage, label);
  }

  async cookies(): Promise<SessionCookie[]> {
    if (!this.context) return [];
    const cookies = await this.context.cookies();
    return cookies.map((cookie) => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
      expires: cookie.expires,
      httpOnly: cookie.httpOnly,
      secure: cookie.secure,
      sameSite: cookie.sameSite,
    }));
  }

  async close(): Promise<void> {
    if (this.context) {
      await this.context.close();
      this.context = null;
      this.activePage = null;
    }
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
    logger.debug("Browser closed");
  }

  private requirePage(): Page {
    if (!this.activePage) {
      throw new Error("BrowserController is not open");
    }
    return this.activePage;
  }
}
