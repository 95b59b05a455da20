/**
 * Playwright-backed IPageScope
 *
 * Wraps a Page (document scope) or a Locator (container scope). Single-element
 * reads and actions use the first match. Playwright's TimeoutError is mapped
 * to TransportTimeoutError; every other error propagates unchanged.
 */

import { errors, type Locator, type Page } from "playwright";
import type { IPageScope } from "@/core/interfaces/IPageScope";
import { TransportTimeoutError } from "@/core/errors";
import { SCRAPER_CONFIG } from "@/config/constants";

type ScopeRoot = { kind: "page"; page: Page } | { kind: "element"; locator: Locator };

export class PlaywrightScope implements IPageScope {
  private constructor(
    private readonly root: ScopeRoot,
    private readonly actionTimeoutMs: number,
  ) {}

  static forPage(page: Page, actionTimeoutMs: number = SCRAPER_CONFIG.ACTION_TIMEOUT_MS): PlaywrightScope {
    return new PlaywrightScope({ kind: "page", page }, actionTimeoutMs);
  }

  static forElement(
    locator: Locator,
    actionTimeoutMs: number = SCRAPER_CONFIG.ACTION_TIMEOUT_MS,
  ): PlaywrightScope {
    return new PlaywrightScope({ kind: "element", locator }, actionTimeoutMs);
  }

  async count(selector: string): Promise<number> {
    return this.guard("count", selector, () => this.locate(selector).count());
  }

  async all(selector: string): Promise<IPageScope[]> {
    const elements = await this.guard("all", selector, () => this.locate(selector).all());
    return elements.map((element) => PlaywrightScope.forElement(element, this.actionTimeoutMs));
  }

  async isVisible(selector: string): Promise<boolean> {
    return this.guard("isVisible", selector, () => this.locate(selector).first().isVisible());
  }

  async textContent(selector: string): Promise<string | null> {
    return this.guard("textContent", selector, async () => {
      const first = this.locate(selector).first();
      if ((await first.count()) === 0) return null;
      return first.textContent({ timeout: this.actionTimeoutMs });
    });
  }

  async getAttribute(selector: string, name: string): Promise<string | null> {
    return this.guard("getAttribute", selector, async () => {
      const first = this.locate(selector).first();
      if ((await first.count()) === 0) return null;
      return first.getAttribute(name, { timeout: this.actionTimeoutMs });
    });
  }

  async ownAttribute(name: string): Promise<string | null> {
    if (this.root.kind === "page") return null;
    const { locator } = this.root;
    return this.guard("ownAttribute", name, () =>
      locator.getAttribute(name, { timeout: this.actionTimeoutMs }),
    );
  }

  async fill(selector: string, value: string): Promise<void> {
    await this.guard("fill", selector, () =>
      this.locate(selector).first().fill(value, { timeout: this.actionTimeoutMs }),
    );
  }

  async click(selector: string): Promise<void> {
    await this.guard("click", selector, () =>
      this.locate(selector).first().click({ timeout: this.actionTimeoutMs }),
    );
  }

  private locate(selector: string): Locator {
    return this.root.kind === "page"
      ? this.root.page.locator(selector)
      : this.root.locator.locator(selector);
  }

  private async guard<T>(operation: string, target: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new TransportTimeoutError(operation, target, { cause: error });
      }
      throw error;
    }
  }
}
