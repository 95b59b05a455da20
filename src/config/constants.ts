/**
 * Application constants
 *
 * Environment-driven settings with typed defaults.
 * dotenv is loaded by the CLI entry before this module is evaluated.
 */

export const APP_METADATA = {
  /**
   * Keep in sync with package.json "version"
   */
  VERSION: "1.0.0",
  NAME: "Review Harvester",
} as const;

/**
 * Target site
 */
export const SITE_CONFIG = {
  /**
   * Environment: SITE_BASE_URL
   * Default: https://www.amazon.com
   */
  BASE_URL: (process.env.SITE_BASE_URL || "https://www.amazon.com").replace(/\/+$/, ""),

  SEARCH_PATH: "/s",
  REVIEWS_PATH: "/product-reviews",

  /**
   * Product whose review page the login command opens to check the saved session
   * Environment: REVIEW_CHECK_ASIN
   */
  REVIEW_CHECK_ASIN: process.env.REVIEW_CHECK_ASIN || "B00DUGZFWY",

  /**
   * Direct sign-in entry, used when no sign-in link is visible on the home page
   */
  SIGN_IN_PATH:
    "/ap/signin?openid.pape.max_auth_age=0" +
    "&openid.return_to=https%3A%2F%2Fwww.amazon.com%2F" +
    "&openid.identity=http%3A%2F%2Fspecs.openid.net%2Fauth%2F2.0%2Fidentifier_select" +
    "&openid.assoc_handle=usflex&openid.mode=checkid_setup" +
    "&openid.claimed_id=http%3A%2F%2Fspecs.openid.net%2Fauth%2F2.0%2Fidentifier_select" +
    "&openid.ns=http%3A%2F%2Fspecs.openid.net%2Fauth%2F2.0",
} as const;

/**
 * Browser / extraction settings
 */
export const SCRAPER_CONFIG = {
  DEFAULT_VIEWPORT: {
    width: 1920,
    height: 1080,
  },

  USER_AGENT:
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",

  LOCALE: "en-US",

  /**
   * Environment: NAVIGATION_TIMEOUT_MS
   * Default: 60000
   */
  NAVIGATION_TIMEOUT_MS: Number(process.env.NAVIGATION_TIMEOUT_MS) || 60000,

  /**
   * Upper bound for a single query / click / fill
   */
  ACTION_TIMEOUT_MS: Number(process.env.ACTION_TIMEOUT_MS) || 10000,

  /**
   * Settle time after a navigation before the DOM is queried
   */
  PAGE_SETTLE_MS: 2000,

  /**
   * Settle time after a sign-in form step
   */
  AUTH_STEP_SETTLE_MS: 3000,

  /**
   * Settle time after the credentials are submitted
   */
  AUTH_SUBMIT_SETTLE_MS: 5000,

  /**
   * Fixed pacing between review pages of one product
   * Environment: PAGE_DELAY_MS
   */
  PAGE_DELAY_MS: Number(process.env.PAGE_DELAY_MS) || 2000,

  /**
   * Fixed pacing between products
   * Environment: PRODUCT_DELAY_MS
   */
  PRODUCT_DELAY_MS: Number(process.env.PRODUCT_DELAY_MS) || 3000,
} as const;

/**
 * Credentials lookup
 */
export const AUTH_CONFIG = {
  EMAIL_ENV: "AMAZON_EMAIL",
  PASSWORD_ENV: "AMAZON_PASSWORD",
} as const;

/**
 * Output settings
 */
export const OUTPUT_CONFIG = {
  /**
   * Environment: RESULT_OUTPUT_DIR
   * Default: current directory
   */
  RESULT_DIR: process.env.RESULT_OUTPUT_DIR || ".",

  DEFAULT_COOKIES_FILE: "amazon_cookies.json",

  /**
   * Sub-directory of the output dir for debug screenshots
   */
  DEBUG_DIR: "debug",
} as const;

/**
 * CLI defaults
 */
export const SCRAPE_DEFAULTS = {
  MAX_PRODUCTS: 3,
  MAX_PAGES: 2,
} as const;
