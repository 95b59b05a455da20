/**
 * Review Harvester
 *
 * Paginated review extraction for one product.
 *
 * Page loop (1..maxPages):
 * 1. pacing delay (not before page 1)
 * 2. navigate: timeout -> stop "transport_timeout", any other browser
 *    failure -> stop "navigation_error"
 * 3. sign-in redirect -> stop "session_invalid", partial results kept
 * 4. no review containers -> stop "no_reviews", next page never requested
 * 5. one review per container, each field resolved independently
 */

import type { IBrowserSession } from "@/core/interfaces/IBrowserSession";
import type { IPageScope } from "@/core/interfaces/IPageScope";
import type { IPacingPolicy } from "@/core/interfaces/IPacingPolicy";
import type { Product } from "@/core/domain/Product";
import { createReview, type Review } from "@/core/domain/Review";
import { toStarQueryValue, type StarFilter } from "@/core/domain/StarFilter";
import { TransportTimeoutError, getErrorMessage } from "@/core/errors";
import type { FieldResolver } from "@/resolver/FieldResolver";
import type { Diagnostics } from "@/diagnostics/Diagnostics";
import { REVIEW_SELECTORS } from "@/selectors/ReviewSelectors";
import { normalizeReviewDate, parseHelpfulVotes, parseRating } from "@/parsers/ValueParsers";
import { SCRAPER_CONFIG, SITE_CONFIG } from "@/config/constants";
import { logger as rootLogger, type Logger } from "@/config/logger";

export type HarvestStopReason =
  | "max_pages"
  | "no_reviews"
  | "session_invalid"
  | "transport_timeout"
  | "navigation_error";

export interface HarvestResult {
  reviews: Review[];
  pagesVisited: number;
  stopReason: HarvestStopReason;
}

export interface HarvesterOptions {
  baseUrl?: string;
  settleMs?: number;
}

type PageOutcome =
  | { kind: "reviews"; reviews: Review[] }
  | { kind: "stop"; reason: Exclude<HarvestStopReason, "max_pages"> };

export class ReviewHarvester {
  private readonly baseUrl: string;
  private readonly settleMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly session: IBrowserSession,
    private readonly resolver: FieldResolver,
    private readonly pacing: IPacingPolicy,
    private readonly diagnostics: Diagnostics,
    options: HarvesterOptions = {},
  ) {
    this.baseUrl = options.baseUrl ?? SITE_CONFIG.BASE_URL;
    this.settleMs = options.settleMs ?? SCRAPER_CONFIG.PAGE_SETTLE_MS;
    this.logger = rootLogger.child({ component: "harvester" });
  }

  buildReviewsUrl(asin: string, page: number, starFilter: StarFilter | null): string {
    const url = `${this.baseUrl}${SITE_CONFIG.REVIEWS_PATH}/${asin}/?pageNumber=${page}`;
    return starFilter ? `${url}&filterByStar=${toStarQueryValue(starFilter)}` : url;
  }

  async harvest(
    product: Product,
    starFilter: StarFilter | null,
    maxPages: number,
  ): Promise<HarvestResult> {
    const reviews: Review[] = [];
    let pagesVisited = 0;

    for (let page = 1; page <= maxPages; page++) {
      if (page > 1) {
        await this.pacing.betweenPages();
      }

      const outcome = await this.harvestPage(product, starFilter, page);
      pagesVisited = page;

      if (outcome.kind === "stop") {
        return this.finish(product, reviews, pagesVisited, outcome.reason);
      }

      reviews.push(...outcome.reviews);
      this.logger.info(
        { asin: product.asin, page, count: outcome.reviews.length },
        "Review page harvested",
      );
    }

    return this.finish(product, reviews, pagesVisited, "max_pages");
  }

  private async harvestPage(
    product: Product,
    starFilter: StarFilter | null,
    page: number,
  ): Promise<PageOutcome> {
    const url = this.buildReviewsUrl(product.asin, page, starFilter);

    try {
      await this.session.goto(url);
      await this.session.settle(this.settleMs);

      const currentUrl = this.session.currentUrl();
      if (currentUrl.includes("signin")) {
        this.diagnostics.record("session_invalid", "harvester", "Redirected to sign-in", {
          asin: product.asin,
          page,
          url: currentUrl,
        });
        await this.session.captureDebug(`signin_redirect_${product.asin}`);
        return { kind: "stop", reason: "session_invalid" };
      }

      const scope = this.session.page();
      const containers = await this.resolver.resolveContainers(scope, REVIEW_SELECTORS.container);
      if (containers.value.length === 0) {
        const marker = await this.resolver.resolvePresence(scope, REVIEW_SELECTORS.noReviews);
        this.diagnostics.record("no_reviews", "harvester", "No review containers", {
          asin: product.asin,
          page,
          noReviewsMarker: marker.found,
        });
        return { kind: "stop", reason: "no_reviews" };
      }

      const reviews: Review[] = [];
      for (const container of containers.value) {
        reviews.push(await this.parseReview(container, product));
      }
      return { kind: "reviews", reviews };
    } catch (error) {
      if (error instanceof TransportTimeoutError) {
        this.diagnostics.record("transport_timeout", "harvester", error.message, {
          asin: product.asin,
          page,
          url,
        });
        return { kind: "stop", reason: "transport_timeout" };
      }
      this.diagnostics.record("navigation_error", "harvester", getErrorMessage(error), {
        asin: product.asin,
        page,
        url,
      });
      return { kind: "stop", reason: "navigation_error" };
    }
  }

  private async parseReview(container: IPageScope, product: Product): Promise<Review> {
    const reviewer = await this.resolver.resolveText(container, REVIEW_SELECTORS.reviewer);
    const rating = await this.resolver.resolveText(container, REVIEW_SELECTORS.rating);
    const date = await this.resolver.resolveText(container, REVIEW_SELECTORS.date);
    const body = await this.resolver.resolveText(container, REVIEW_SELECTORS.body);
    const verified = await this.resolver.resolvePresence(container, REVIEW_SELECTORS.verified);
    const votes = await this.resolver.resolveText(container, REVIEW_SELECTORS.helpfulVotes);

    return createReview({
      productId: product.asin,
      productTitle: product.title,
      reviewer: reviewer.value,
      rating: parseRating(rating.value),
      date: normalizeReviewDate(date.value),
      verifiedPurchase: verified.value,
      content: body.value,
      helpfulVotes: parseHelpfulVotes(votes.value),
    });
  }

  private finish(
    product: Product,
    reviews: Review[],
    pagesVisited: number,
    stopReason: HarvestStopReason,
  ): HarvestResult {
    this.logger.info(
      { asin: product.asin, reviews: reviews.length, pagesVisited, stopReason },
      "Harvest finished",
    );
    return { reviews, pagesVisited, stopReason };
  }
}
