/**
 * Login Coordinator
 *
 * Unattended sign-in with manual fallback, then cookie persistence.
 *
 * Flow:
 * 1. credentials given: AuthenticationAutomaton (at most once)
 * 2. manual (no credentials, or the automaton needs completion): open the
 *    sign-in page and wait for the user
 * 3. home page greeting check (diagnostic only)
 * 4. save the context cookies to the cookie file
 * 5. optional: open a review page with the new session (diagnostic only)
 *
 * Credentials are resolved by the caller before the browser opens.
 * Navigation failures in steps 2, 3 and 5 are recorded and the flow goes on.
 */

import type { IBrowserSession } from "@/core/interfaces/IBrowserSession";
import type { Credentials } from "@/core/domain/Session";
import { TransportTimeoutError, getErrorMessage } from "@/core/errors";
import type { FieldResolver } from "@/resolver/FieldResolver";
import type { Diagnostics } from "@/diagnostics/Diagnostics";
import type { CookieStore } from "@/browser/CookieStore";
import { AuthenticationAutomaton, type AuthOutcome } from "./AuthenticationAutomaton";
import { AUTH_SELECTORS, isSignedInGreeting } from "@/selectors/AuthSelectors";
import { REVIEW_SELECTORS } from "@/selectors/ReviewSelectors";
import { SCRAPER_CONFIG, SITE_CONFIG } from "@/config/constants";
import { logger as rootLogger } from "@/config/logger";

export type WaitForUser = (message: string) => Promise<void>;

export interface LoginRequest {
  /** null skips the automaton and goes straight to manual sign-in */
  credentials: Credentials | null;
  cookiesPath: string;
  /** Open a review page once the cookies are saved */
  verifyReviewAccess?: boolean;
}

export interface LoginReport {
  /** null when auto sign-in was not attempted */
  outcome: AuthOutcome | null;
  manualCompletion: boolean;
  greeting: string | null;
  cookiesSaved: number;
  /** null when not checked or the review page could not be loaded */
  reviewAccess: boolean | null;
}

export interface LoginCoordinatorDeps {
  session: IBrowserSession;
  resolver: FieldResolver;
  diagnostics: Diagnostics;
  cookieStore: CookieStore;
  waitForUser: WaitForUser;
  baseUrl?: string;
  settleMs?: number;
}

const logger = rootLogger.child({ component: "login" });

export class LoginCoordinator {
  private readonly baseUrl: string;
  private readonly settleMs: number;

  constructor(private readonly deps: LoginCoordinatorDeps) {
    this.baseUrl = deps.baseUrl ?? SITE_CONFIG.BASE_URL;
    this.settleMs = deps.settleMs ?? SCRAPER_CONFIG.PAGE_SETTLE_MS;
  }

  async login(request: LoginRequest): Promise<LoginReport> {
    const { session, resolver, diagnostics } = this.deps;

    let outcome: AuthOutcome | null = null;
    if (request.credentials) {
      const automaton = new AuthenticationAutomaton(session, resolver, diagnostics, {
        baseUrl: this.baseUrl,
      });
      outcome = await automaton.run(request.credentials);
    }

    const manualCompletion = outcome === null || outcome.needsManualCompletion;
    if (manualCompletion) {
      if (outcome === null) {
        await this.openSignInPage();
      }
      logger.info(
        { state: outcome?.state ?? null, detail: outcome?.detail ?? null },
        "Waiting for manual sign-in",
      );
      await this.deps.waitForUser(
        "Complete the sign-in in the browser window, then press Enter to continue...",
      );
    }

    const greeting = await this.readGreeting(outcome);

    const cookies = await session.cookies();
    await this.deps.cookieStore.save(request.cookiesPath, cookies);

    const reviewAccess = request.verifyReviewAccess ? await this.checkReviewAccess() : null;

    return { outcome, manualCompletion, greeting, cookiesSaved: cookies.length, reviewAccess };
  }

  /**
   * The user can still reach the sign-in page by hand when this fails
   */
  private async openSignInPage(): Promise<void> {
    const url = `${this.baseUrl}${SITE_CONFIG.SIGN_IN_PATH}`;
    try {
      await this.deps.session.goto(url);
    } catch (error) {
      this.recordFailure(error, { step: "sign_in_page", url });
    }
  }

  /**
   * Home page greeting. The automaton already read it when it verified the
   * sign-in; otherwise navigate home and look again.
   */
  private async readGreeting(outcome: AuthOutcome | null): Promise<string | null> {
    if (outcome && !outcome.needsManualCompletion) {
      logger.info({ greeting: outcome.greeting }, "Signed in");
      return outcome.greeting;
    }

    const { session, resolver, diagnostics } = this.deps;
    const url = `${this.baseUrl}/`;
    try {
      await session.goto(url);
      await session.settle(this.settleMs);

      const greeting = await resolver.resolveVisibleText(session.page(), AUTH_SELECTORS.greeting);
      if (greeting.found && isSignedInGreeting(greeting.value)) {
        logger.info({ greeting: greeting.value }, "Signed in");
        return greeting.value;
      }

      diagnostics.record("auth_unverified", "auth", "Greeting not found after sign-in", {
        greeting: greeting.value,
      });
      return null;
    } catch (error) {
      this.recordFailure(error, { step: "greeting", url });
      return null;
    }
  }

  private async checkReviewAccess(): Promise<boolean | null> {
    const { session, resolver, diagnostics } = this.deps;
    const url = `${this.baseUrl}${SITE_CONFIG.REVIEWS_PATH}/${SITE_CONFIG.REVIEW_CHECK_ASIN}/`;
    try {
      await session.goto(url);
      await session.settle(this.settleMs);

      const reviews = await resolver.resolveContainers(session.page(), REVIEW_SELECTORS.container);
      if (reviews.value.length > 0) {
        logger.info({ url, count: reviews.value.length }, "Review page reachable with saved cookies");
        return true;
      }

      diagnostics.record("auth_unverified", "auth", "No reviews visible with the saved cookies", {
        url,
        currentUrl: session.currentUrl(),
      });
      return false;
    } catch (error) {
      this.recordFailure(error, { step: "review_access", url });
      return null;
    }
  }

  private recordFailure(error: unknown, context: Record<string, unknown>): void {
    if (error instanceof TransportTimeoutError) {
      this.deps.diagnostics.record("transport_timeout", "auth", error.message, context);
      return;
    }
    this.deps.diagnostics.record("navigation_error", "auth", getErrorMessage(error), context);
  }
}
