/**
 * Product Discovery
 *
 * Keyword search -> ranked Product list.
 *
 * - containers are walked in DOM order until maxProducts products are built
 * - a container without an ASIN, or with an ASIN seen earlier, is skipped
 *   and does not use up a slot
 * - positions are 1-based over the built products
 * - a container that times out or fails is recorded and the walk moves on
 */

import type { IBrowserSession } from "@/core/interfaces/IBrowserSession";
import type { IPageScope } from "@/core/interfaces/IPageScope";
import { createProduct, type Product } from "@/core/domain/Product";
import { TransportTimeoutError, getErrorMessage } from "@/core/errors";
import type { FieldResolver, Resolution } from "@/resolver/FieldResolver";
import type { Diagnostics } from "@/diagnostics/Diagnostics";
import { SEARCH_SELECTORS } from "@/selectors/SearchSelectors";
import { parseRating } from "@/parsers/ValueParsers";
import { SCRAPER_CONFIG, SITE_CONFIG } from "@/config/constants";
import { logger as rootLogger, type Logger } from "@/config/logger";

export interface DiscoveryOptions {
  baseUrl?: string;
  settleMs?: number;
}

const ASIN_IN_LINK = /\/dp\/(\w{10})/;
const UNKNOWN_TITLE = "Unknown";
const NO_PRICE = "N/A";

export class ProductDiscovery {
  private readonly baseUrl: string;
  private readonly settleMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly session: IBrowserSession,
    private readonly resolver: FieldResolver,
    private readonly diagnostics: Diagnostics,
    options: DiscoveryOptions = {},
  ) {
    this.baseUrl = options.baseUrl ?? SITE_CONFIG.BASE_URL;
    this.settleMs = options.settleMs ?? SCRAPER_CONFIG.PAGE_SETTLE_MS;
    this.logger = rootLogger.child({ component: "discovery" });
  }

  /**
   * Search URL; spaces are encoded as "+"
   */
  buildSearchUrl(keyword: string): string {
    const query = new URLSearchParams({ k: keyword });
    return `${this.baseUrl}${SITE_CONFIG.SEARCH_PATH}?${query.toString()}`;
  }

  async search(keyword: string, maxProducts: number): Promise<Product[]> {
    const url = this.buildSearchUrl(keyword);
    this.logger.info({ keyword, url, maxProducts }, "Searching products");

    try {
      await this.session.goto(url);
    } catch (error) {
      this.recordFailure(error, { url });
      return [];
    }
    await this.session.settle(this.settleMs);

    const containers = await this.resolveContainersSafely(url);
    if (containers === null) return [];

    if (containers.value.length === 0) {
      this.diagnostics.record("no_results", "discovery", "No search result containers", {
        keyword,
        url,
      });
      await this.session.captureDebug("search_no_results");
      return [];
    }

    this.logger.debug(
      { selector: containers.selector, count: containers.value.length },
      "Search result containers found",
    );

    const products: Product[] = [];
    const seen = new Set<string>();

    for (const [index, container] of containers.value.entries()) {
      if (products.length >= maxProducts) break;

      let product: Product | null;
      try {
        product = await this.buildProduct(container, index, products.length + 1, seen);
      } catch (error) {
        this.recordFailure(error, { url, containerIndex: index });
        continue;
      }

      if (product) {
        seen.add(product.asin);
        products.push(product);
      }
    }

    this.logger.info({ keyword, count: products.length }, "Products discovered");
    return products;
  }

  private async resolveContainersSafely(url: string): Promise<Resolution<IPageScope[]> | null> {
    try {
      return await this.resolver.resolveContainers(this.session.page(), SEARCH_SELECTORS.container);
    } catch (error) {
      this.recordFailure(error, { url });
      return null;
    }
  }

  private recordFailure(error: unknown, context: Record<string, unknown>): void {
    if (error instanceof TransportTimeoutError) {
      this.diagnostics.record("transport_timeout", "discovery", error.message, context);
      return;
    }
    this.diagnostics.record("navigation_error", "discovery", getErrorMessage(error), context);
  }

  /**
   * @returns null when the container is skipped
   */
  private async buildProduct(
    container: IPageScope,
    containerIndex: number,
    position: number,
    seen: ReadonlySet<string>,
  ): Promise<Product | null> {
    const href = await this.resolver.resolveAttribute(container, SEARCH_SELECTORS.link, "href");
    const link = href.value ? this.toAbsolute(href.value) : "";

    const ownAsin = (await container.ownAttribute("data-asin"))?.trim() ?? "";
    const asin = ownAsin || (ASIN_IN_LINK.exec(link)?.[1] ?? "");

    if (!asin) {
      this.diagnostics.record("item_skipped", "discovery", "Search result without ASIN", {
        containerIndex,
      });
      return null;
    }
    if (seen.has(asin)) {
      this.diagnostics.record("item_skipped", "discovery", "Duplicate ASIN", {
        containerIndex,
        asin,
      });
      return null;
    }

    const title = await this.resolver.resolveText(container, SEARCH_SELECTORS.title, UNKNOWN_TITLE);
    const price = await this.resolver.resolveText(container, SEARCH_SELECTORS.price, NO_PRICE);

    return createProduct({
      asin,
      title: title.value,
      link: link || `${this.baseUrl}/dp/${asin}`,
      price: price.value,
      rating: await this.readRating(container),
      position,
    });
  }

  /**
   * aria-label ("4.5 out of 5 stars") first, then the star icon text
   */
  private async readRating(container: IPageScope): Promise<number> {
    const label = await this.resolver.resolveAttribute(
      container,
      SEARCH_SELECTORS.ratingLabel,
      "aria-label",
    );
    if (label.found && label.value) {
      return parseRating(label.value);
    }

    const text = await this.resolver.resolveText(container, SEARCH_SELECTORS.ratingText);
    return parseRating(text.value);
  }

  private toAbsolute(href: string): string {
    try {
      return new URL(href, `${this.baseUrl}/`).toString();
    } catch {
      return href;
    }
  }
}
