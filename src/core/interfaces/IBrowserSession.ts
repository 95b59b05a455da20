/**
 * Browser Session Interface
 *
 * The single browser context / page shared by every component of a run.
 *
 * Mutating calls (open with cookies, fills and clicks during sign-in) are made
 * by the pipeline and the authentication path only; discovery and the
 * harvester navigate and read.
 */

import type { IPageScope } from "./IPageScope";
import type { SessionCookie } from "@/core/domain/Session";

export interface SessionOpenOptions {
  headless: boolean;
  /** Loaded into the context before the first navigation */
  cookies: SessionCookie[];
}

export interface IBrowserSession {
  /** Launch the browser and inject cookies; failures are SessionBootstrapError */
  open(options: SessionOpenOptions): Promise<void>;

  /** Navigate and wait for DOMContentLoaded; raises TransportTimeoutError */
  goto(url: string): Promise<void>;

  /** URL after redirects */
  currentUrl(): string;

  title(): Promise<string>;

  /** Scope bound to the current document */
  page(): IPageScope;

  /** Fixed wait for client-side rendering to settle */
  settle(ms: number): Promise<void>;

  /**
   * Save a debug screenshot of the current page
   * @returns file path, or null when captures are disabled or failed
   */
  captureDebug(label: string): Promise<string | null>;

  cookies(): Promise<SessionCookie[]>;

  close(): Promise<void>;
}
