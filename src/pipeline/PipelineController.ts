/**
 * Pipeline Controller
 *
 * One scrape run, strictly sequential:
 * 0. resolve sign-in credentials and load the cookie file (no browser yet)
 * 1. open the browser session with the stored cookies
 * 2. sign in (autoLogin) or check the greeting of the stored session
 * 3. discover products
 * 4. harvest each product in rank order, pacing between products
 * 5. hand the reviews to the sink
 * 6. close the browser (always)
 *
 * Only ConfigurationError and SessionBootstrapError escape; everything else
 * degrades into diagnostics and partial results.
 */

import type { IBrowserSession } from "@/core/interfaces/IBrowserSession";
import type { IPacingPolicy } from "@/core/interfaces/IPacingPolicy";
import type { IReviewSink } from "@/core/interfaces/IReviewSink";
import type { ScrapeConfig } from "@/core/domain/ScrapeConfig";
import type { Product } from "@/core/domain/Product";
import type { Review } from "@/core/domain/Review";
import type { Credentials } from "@/core/domain/Session";
import { ConfigurationError, TransportTimeoutError, getErrorMessage } from "@/core/errors";
import { Diagnostics, type Diagnostic } from "@/diagnostics/Diagnostics";
import { FieldResolver } from "@/resolver/FieldResolver";
import { ProductDiscovery } from "@/discovery/ProductDiscovery";
import { ReviewHarvester, type HarvestResult } from "@/harvest/ReviewHarvester";
import { FixedDelayPacing } from "@/harvest/FixedDelayPacing";
import { CookieStore } from "@/browser/CookieStore";
import type { AuthOutcome } from "@/auth/AuthenticationAutomaton";
import type { CredentialProvider } from "@/auth/CredentialProvider";
import { LoginCoordinator, type WaitForUser } from "@/auth/LoginCoordinator";
import { AUTH_SELECTORS, isSignedInGreeting } from "@/selectors/AuthSelectors";
import { SCRAPER_CONFIG, SITE_CONFIG } from "@/config/constants";
import { logger as rootLogger } from "@/config/logger";

export interface PipelineDependencies {
  session: IBrowserSession;
  sink: IReviewSink;
  cookieStore?: CookieStore;
  pacing?: IPacingPolicy;
  diagnostics?: Diagnostics;
  /** Required when autoLogin is set */
  credentials?: CredentialProvider;
  /** Required when autoLogin is set */
  waitForUser?: WaitForUser;
  baseUrl?: string;
  settleMs?: number;
}

export interface ProductHarvest extends HarvestResult {
  product: Product;
}

export interface PipelineResult {
  products: Product[];
  /** Rank order, then page order, then DOM order */
  reviews: Review[];
  harvests: ProductHarvest[];
  /** null when auto sign-in was not requested */
  auth: AuthOutcome | null;
  diagnostics: readonly Diagnostic[];
  outputFiles: string[];
}

const logger = rootLogger.child({ component: "pipeline" });

export class PipelineController {
  private readonly diagnostics: Diagnostics;
  private readonly cookieStore: CookieStore;
  private readonly pacing: IPacingPolicy;
  private readonly resolver: FieldResolver;
  private readonly baseUrl: string;
  private readonly settleMs: number;

  constructor(private readonly deps: PipelineDependencies) {
    this.diagnostics = deps.diagnostics ?? new Diagnostics();
    this.cookieStore = deps.cookieStore ?? new CookieStore();
    this.pacing = deps.pacing ?? new FixedDelayPacing();
    this.resolver = new FieldResolver(this.diagnostics);
    this.baseUrl = deps.baseUrl ?? SITE_CONFIG.BASE_URL;
    this.settleMs = deps.settleMs ?? SCRAPER_CONFIG.PAGE_SETTLE_MS;
  }

  async run(config: ScrapeConfig): Promise<PipelineResult> {
    const { credentialProvider, waitForUser } = this.requireLoginDeps(config);

    logger.info(
      {
        keyword: config.keyword,
        starFilter: config.starFilter ?? "all",
        maxProducts: config.maxProducts,
        maxPages: config.maxPages,
      },
      "Scrape started",
    );

    const credentials: Credentials | null = credentialProvider
      ? await credentialProvider.getCredentials()
      : null;

    const cookies = await this.cookieStore.load(config.cookiesPath);
    if (cookies.status === "missing") {
      this.diagnostics.record("cookies_missing", "pipeline", "No cookie file, login redirects likely", {
        cookiesPath: config.cookiesPath,
      });
    }

    const { session } = this.deps;
    await session.open({ headless: config.headless, cookies: cookies.cookies });

    try {
      let auth: AuthOutcome | null = null;
      if (credentials && waitForUser) {
        const coordinator = new LoginCoordinator({
          session,
          resolver: this.resolver,
          diagnostics: this.diagnostics,
          cookieStore: this.cookieStore,
          waitForUser,
          baseUrl: this.baseUrl,
          settleMs: this.settleMs,
        });
        const report = await coordinator.login({ credentials, cookiesPath: config.cookiesPath });
        auth = report.outcome;
      } else if (cookies.status === "loaded") {
        await this.checkStoredSession();
      }

      const discovery = new ProductDiscovery(session, this.resolver, this.diagnostics, {
        baseUrl: this.baseUrl,
        settleMs: this.settleMs,
      });
      const products = await discovery.search(config.keyword, config.maxProducts);

      const harvests = await this.harvestAll(products, config);
      const reviews = harvests.flatMap((harvest) => harvest.reviews);

      const { files } = await this.deps.sink.write(config.keyword, reviews);

      logger.info(
        {
          products: products.length,
          reviews: reviews.length,
          files,
          diagnostics: this.diagnostics.summary(),
        },
        "Scrape finished",
      );

      return {
        products,
        reviews,
        harvests,
        auth,
        diagnostics: this.diagnostics.list(),
        outputFiles: files,
      };
    } finally {
      await this.closeSession();
    }
  }

  private async harvestAll(products: Product[], config: ScrapeConfig): Promise<ProductHarvest[]> {
    const harvester = new ReviewHarvester(
      this.deps.session,
      this.resolver,
      this.pacing,
      this.diagnostics,
      { baseUrl: this.baseUrl, settleMs: this.settleMs },
    );

    const harvests: ProductHarvest[] = [];
    for (const [index, product] of products.entries()) {
      logger.info(
        { position: product.position, asin: product.asin, title: product.title },
        `Harvesting product ${index + 1}/${products.length}`,
      );
      const result = await harvester.harvest(product, config.starFilter, config.maxPages);
      harvests.push({ product, ...result });

      if (index < products.length - 1) {
        await this.pacing.betweenProducts();
      }
    }
    return harvests;
  }

  /**
   * Greeting check for a cookie-restored session (diagnostic only)
   */
  private async checkStoredSession(): Promise<void> {
    const { session } = this.deps;
    try {
      await session.goto(`${this.baseUrl}/`);
      await session.settle(this.settleMs);
      const greeting = await this.resolver.resolveVisibleText(session.page(), AUTH_SELECTORS.greeting);
      if (greeting.found && isSignedInGreeting(greeting.value)) {
        logger.info({ greeting: greeting.value }, "Stored session is signed in");
        return;
      }
      this.diagnostics.record("auth_unverified", "pipeline", "Could not verify sign-in, cookies may be stale", {
        greeting: greeting.value,
      });
    } catch (error) {
      if (error instanceof TransportTimeoutError) {
        this.diagnostics.record("transport_timeout", "pipeline", error.message, {
          operation: error.operation,
        });
        return;
      }
      this.diagnostics.record("navigation_error", "pipeline", getErrorMessage(error), {
        step: "greeting",
      });
    }
  }

  private requireLoginDeps(config: ScrapeConfig): {
    credentialProvider: CredentialProvider | null;
    waitForUser: WaitForUser | null;
  } {
    if (!config.autoLogin) {
      return { credentialProvider: null, waitForUser: null };
    }
    const { credentials, waitForUser } = this.deps;
    if (!credentials || !waitForUser) {
      throw new ConfigurationError("Auto sign-in needs a credential provider and a manual fallback");
    }
    return { credentialProvider: credentials, waitForUser };
  }

  private async closeSession(): Promise<void> {
    try {
      await this.deps.session.close();
    } catch (error) {
      logger.warn({ error: getErrorMessage(error) }, "Browser close failed");
    }
  }
}
