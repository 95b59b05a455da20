/**
 * Authentication Automaton
 *
 * Unattended sign-in as an explicit state machine. Each transition requires
 * its trigger to succeed; the first failure halts at Unclear. On any
 * challenge (CAPTCHA, MFA, inline error) the automaton stops and reports it
 * so the caller can fall back to manual completion. Challenge fields are
 * probed for visibility and never filled.
 *
 * SOLID:
 * - SRP: drives the sign-in form only (no cookie persistence, no prompting)
 * - DIP: depends on IBrowserSession and FieldResolver
 */

import type { IBrowserSession } from "@/core/interfaces/IBrowserSession";
import type { Credentials } from "@/core/domain/Session";
import { TransportTimeoutError, getErrorMessage } from "@/core/errors";
import type { FieldResolver } from "@/resolver/FieldResolver";
import type { Diagnostics } from "@/diagnostics/Diagnostics";
import { AUTH_SELECTORS, isSignedInGreeting } from "@/selectors/AuthSelectors";
import { SCRAPER_CONFIG, SITE_CONFIG } from "@/config/constants";
import { logger as rootLogger, type Logger } from "@/config/logger";

export enum AuthState {
  Init = "Init",
  HomeReached = "HomeReached",
  SignInPageReached = "SignInPageReached",
  EmailEntered = "EmailEntered",
  ContinueClicked = "ContinueClicked",
  PasswordEntered = "PasswordEntered",
  SubmitClicked = "SubmitClicked",
  ChallengeCheck = "ChallengeCheck",
  LoginVerified = "LoginVerified",
  CaptchaRequired = "CaptchaRequired",
  MfaRequired = "MfaRequired",
  ErrorDetected = "ErrorDetected",
  Unclear = "Unclear",
}

export type TerminalAuthState =
  | AuthState.LoginVerified
  | AuthState.CaptchaRequired
  | AuthState.MfaRequired
  | AuthState.ErrorDetected
  | AuthState.Unclear;

export interface AuthOutcome {
  state: TerminalAuthState;
  /** States visited, Init first, terminal state last */
  trail: AuthState[];
  needsManualCompletion: boolean;
  /** Human-readable reason for the terminal state */
  detail: string;
  /** Greeting text when the home page shows one */
  greeting: string | null;
}

export interface AutomatonOptions {
  baseUrl?: string;
  /** Settle after each form step */
  stepSettleMs?: number;
  /** Settle after the credentials are submitted */
  submitSettleMs?: number;
}

const ERROR_TITLE_WORDS = ["sorry", "error", "not found", "blocked", "captcha"];
const SIGN_IN_URL_MARKERS = ["signin", "/ap/"];

/**
 * Trigger failure: the transition's locator or navigation did not succeed
 */
class TriggerFailed extends Error {}

export class AuthenticationAutomaton {
  private readonly baseUrl: string;
  private readonly stepSettleMs: number;
  private readonly submitSettleMs: number;
  private readonly logger: Logger;

  private trail: AuthState[] = [];

  constructor(
    private readonly session: IBrowserSession,
    private readonly resolver: FieldResolver,
    private readonly diagnostics: Diagnostics,
    options: AutomatonOptions = {},
  ) {
    this.baseUrl = options.baseUrl ?? SITE_CONFIG.BASE_URL;
    this.stepSettleMs = options.stepSettleMs ?? SCRAPER_CONFIG.AUTH_STEP_SETTLE_MS;
    this.submitSettleMs = options.submitSettleMs ?? SCRAPER_CONFIG.AUTH_SUBMIT_SETTLE_MS;
    this.logger = rootLogger.child({ component: "auth" });
  }

  /**
   * Run the sign-in once. Never throws for site behaviour; every failure is
   * folded into the outcome.
   */
  async run(credentials: Credentials): Promise<AuthOutcome> {
    this.trail = [AuthState.Init];

    try {
      await this.reachHome();
      await this.reachSignInPage();
      await this.enterEmail(credentials.identifier);
      await this.clickContinue();
      await this.enterPassword(credentials.secret);
      await this.clickSubmit();
      return await this.checkChallenges();
    } catch (error) {
      if (error instanceof TransportTimeoutError) {
        this.diagnostics.record("transport_timeout", "auth", error.message, {
          operation: error.operation,
          target: error.target,
        });
      }
      const detail =
        error instanceof TriggerFailed || error instanceof TransportTimeoutError
          ? error.message
          : `Unexpected failure: ${getErrorMessage(error)}`;
      return this.finish(AuthState.Unclear, detail);
    }
  }

  private async reachHome(): Promise<void> {
    await this.session.goto(`${this.baseUrl}/`);
    await this.session.settle(this.stepSettleMs);

    const title = await this.session.title();
    const lowered = title.toLowerCase();
    if (ERROR_TITLE_WORDS.some((word) => lowered.includes(word))) {
      this.diagnostics.record("page_heuristic", "auth", "Home page title looks like an error page", {
        title,
      });
    }
    this.advance(AuthState.HomeReached);
  }

  private async reachSignInPage(): Promise<void> {
    const link = await this.resolver.click(this.session.page(), AUTH_SELECTORS.signInLink);
    if (link.found) {
      this.logger.debug({ selector: link.selector }, "Sign-in link clicked");
    } else {
      this.logger.info("No sign-in link visible, opening the sign-in page directly");
      await this.session.goto(`${this.baseUrl}${SITE_CONFIG.SIGN_IN_PATH}`);
    }
    await this.session.settle(this.stepSettleMs);

    const url = this.session.currentUrl();
    if (!SIGN_IN_URL_MARKERS.some((marker) => url.includes(marker))) {
      throw new TriggerFailed(`Sign-in page not reached: ${url}`);
    }
    this.advance(AuthState.SignInPageReached);
  }

  private async enterEmail(identifier: string): Promise<void> {
    const result = await this.resolver.fill(this.session.page(), AUTH_SELECTORS.email, identifier);
    if (!result.found) throw new TriggerFailed("Email field not found");
    this.advance(AuthState.EmailEntered);
  }

  private async clickContinue(): Promise<void> {
    const result = await this.resolver.click(this.session.page(), AUTH_SELECTORS.continueButton);
    if (!result.found) throw new TriggerFailed("Continue button not found");
    await this.session.settle(this.stepSettleMs);
    this.advance(AuthState.ContinueClicked);
  }

  private async enterPassword(secret: string): Promise<void> {
    const result = await this.resolver.fill(this.session.page(), AUTH_SELECTORS.password, secret);
    if (!result.found) throw new TriggerFailed("Password field not found");
    this.advance(AuthState.PasswordEntered);
  }

  private async clickSubmit(): Promise<void> {
    const result = await this.resolver.click(this.session.page(), AUTH_SELECTORS.submitButton);
    if (!result.found) throw new TriggerFailed("Sign-in button not found");
    await this.session.settle(this.submitSettleMs);
    this.advance(AuthState.SubmitClicked);
  }

  /**
   * CAPTCHA, then MFA, then inline error; first hit is terminal.
   * With none visible, verify the greeting on a fresh home page.
   */
  private async checkChallenges(): Promise<AuthOutcome> {
    this.advance(AuthState.ChallengeCheck);
    const scope = this.session.page();

    const captcha = await this.resolver.probe(scope, AUTH_SELECTORS.captcha);
    if (captcha.found) {
      this.recordChallenge("captcha", captcha.selector);
      return this.finish(AuthState.CaptchaRequired, "CAPTCHA challenge shown");
    }

    const mfa = await this.resolver.probe(scope, AUTH_SELECTORS.mfa);
    if (mfa.found) {
      this.recordChallenge("mfa", mfa.selector);
      return this.finish(AuthState.MfaRequired, "Two-step verification requested");
    }

    const loginError = await this.resolver.resolveVisibleText(scope, AUTH_SELECTORS.loginError);
    if (loginError.found) {
      this.recordChallenge("error", loginError.selector);
      return this.finish(
        AuthState.ErrorDetected,
        loginError.value ? `Sign-in error: ${loginError.value}` : "Sign-in error shown",
      );
    }

    await this.session.goto(`${this.baseUrl}/`);
    await this.session.settle(this.stepSettleMs);

    const greeting = await this.resolver.resolveVisibleText(
      this.session.page(),
      AUTH_SELECTORS.greeting,
    );
    if (greeting.found && isSignedInGreeting(greeting.value)) {
      return this.finish(AuthState.LoginVerified, "Greeting present", greeting.value);
    }

    this.diagnostics.record("auth_unverified", "auth", "No greeting after sign-in", {
      greeting: greeting.value,
    });
    return this.finish(
      AuthState.Unclear,
      "Sign-in submitted but no greeting found",
      greeting.found ? greeting.value : null,
    );
  }

  private recordChallenge(challenge: "captcha" | "mfa" | "error", selector: string | null): void {
    this.diagnostics.record("challenge_detected", "auth", `Sign-in challenge: ${challenge}`, {
      challenge,
      selector,
    });
  }

  private advance(state: AuthState): void {
    this.trail.push(state);
    this.logger.debug({ state }, "Auth transition");
  }

  private finish(state: TerminalAuthState, detail: string, greeting: string | null = null): AuthOutcome {
    this.trail.push(state);
    const outcome: AuthOutcome = {
      state,
      trail: [...this.trail],
      needsManualCompletion: state !== AuthState.LoginVerified,
      detail,
      greeting,
    };
    this.logger.info(
      { state, needsManualCompletion: outcome.needsManualCompletion, detail },
      "Sign-in attempt finished",
    );
    return outcome;
  }
}
