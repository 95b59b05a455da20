/**
 * Browser Launch Arguments
 *
 * SOLID:
 * - SRP: Chromium launch flags only
 * - OCP: combine categories per environment
 */

export const BROWSER_ARGS = {
  /**
   * Memory flags
   * - keep /dev/shm usage low
   * - no GPU, no extensions, no background networking
   */
  MEMORY_OPTIMIZED: [
    "--disable-dev-shm-usage",
    "--disable-gpu",
    "--disable-accelerated-2d-canvas",
    "--disable-extensions",
    "--disable-background-networking",
    "--no-first-run",
  ],

  /**
   * Sandbox flags (required inside Docker)
   */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox"],

  /**
   * Window flags for headed runs, where the user may finish a sign-in by hand
   */
  WINDOW: ["--window-size=1920,1080", "--start-maximized"],

  /**
   * Headless runs (CI, Docker)
   */
  get HEADLESS() {
    return [...this.SANDBOX, ...this.MEMORY_OPTIMIZED];
  },

  /**
   * Headed runs (local)
   */
  get HEADED() {
    return [...this.MEMORY_OPTIMIZED, ...this.WINDOW];
  },
} as const;

export function browserArgsFor(headless: boolean): string[] {
  return headless ? BROWSER_ARGS.HEADLESS : BROWSER_ARGS.HEADED;
}
