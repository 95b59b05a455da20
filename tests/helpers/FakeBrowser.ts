/**
 * In-process stand-ins for the browser
 *
 * Pages are static element trees keyed by URL. Each element maps selectors to
 * its matching children, so a scope answers exactly the selectors the test
 * declares. Every navigation, fill and click is recorded.
 */

import type { IPageScope } from "@/core/interfaces/IPageScope";
import type { IBrowserSession, SessionOpenOptions } from "@/core/interfaces/IBrowserSession";
import type { SessionCookie } from "@/core/domain/Session";
import { TransportTimeoutError } from "@/core/errors";

export interface FakeElement {
  text?: string;
  attributes?: Record<string, string>;
  /** default true */
  visible?: boolean;
  /** selector -> matches in DOM order */
  children?: Record<string, FakeElement[]>;
  /** clicking navigates the session to this URL */
  navigatesTo?: string;
  /** selectors whose queries time out */
  timeoutSelectors?: string[];
  /** selectors whose queries fail with a non-timeout error */
  brokenSelectors?: string[];
}

export interface FakePage {
  title?: string;
  root?: FakeElement;
  /** URL reported after navigation (redirects) */
  redirectTo?: string;
  /** navigation to this page times out */
  timeout?: boolean;
  /** navigation to this page fails with this message (connection reset, closed target) */
  failure?: string;
}

export type Interaction =
  | { type: "goto"; url: string }
  | { type: "fill"; selector: string; value: string }
  | { type: "click"; selector: string };

interface ScopeContext {
  interactions: Interaction[];
  navigate: (url: string) => void;
}

export class FakeScope implements IPageScope {
  constructor(
    private readonly element: FakeElement,
    private readonly context: ScopeContext,
    private readonly isPage: boolean = false,
  ) {}

  async count(selector: string): Promise<number> {
    return this.matches(selector).length;
  }

  async all(selector: string): Promise<IPageScope[]> {
    return this.matches(selector).map((child) => new FakeScope(child, this.context));
  }

  async isVisible(selector: string): Promise<boolean> {
    const first = this.matches(selector)[0];
    return first !== undefined && first.visible !== false;
  }

  async textContent(selector: string): Promise<string | null> {
    return this.matches(selector)[0]?.text ?? null;
  }

  async getAttribute(selector: string, name: string): Promise<string | null> {
    return this.matches(selector)[0]?.attributes?.[name] ?? null;
  }

  async ownAttribute(name: string): Promise<string | null> {
    if (this.isPage) return null;
    return this.element.attributes?.[name] ?? null;
  }

  async fill(selector: string, value: string): Promise<void> {
    this.requireFirst(selector);
    this.context.interactions.push({ type: "fill", selector, value });
  }

  async click(selector: string): Promise<void> {
    const target = this.requireFirst(selector);
    this.context.interactions.push({ type: "click", selector });
    if (target.navigatesTo) {
      this.context.navigate(target.navigatesTo);
    }
  }

  private matches(selector: string): FakeElement[] {
    if (this.element.timeoutSelectors?.includes(selector)) {
      throw new TransportTimeoutError("query", selector);
    }
    if (this.element.brokenSelectors?.includes(selector)) {
      throw new Error(`Malformed selector: ${selector}`);
    }
    return this.element.children?.[selector] ?? [];
  }

  private requireFirst(selector: string): FakeElement {
    const first = this.matches(selector)[0];
    if (!first) {
      throw new Error(`No element for ${selector}`);
    }
    return first;
  }
}

export class FakeBrowserSession implements IBrowserSession {
  readonly interactions: Interaction[] = [];
  readonly captures: string[] = [];
  openedWith: SessionOpenOptions | null = null;
  closed = false;
  settleCalls = 0;

  private url = "about:blank";
  private current: FakePage = {};

  constructor(
    private readonly pages: Record<string, FakePage> = {},
    private readonly sessionCookies: SessionCookie[] = [],
  ) {}

  async open(options: SessionOpenOptions): Promise<void> {
    this.openedWith = options;
  }

  async goto(url: string): Promise<void> {
    this.interactions.push({ type: "goto", url });
    this.navigate(url);
  }

  currentUrl(): string {
    return this.url;
  }

  async title(): Promise<string> {
    return this.current.title ?? "";
  }

  page(): IPageScope {
    return new FakeScope(
      this.current.root ?? {},
      { interactions: this.interactions, navigate: (url) => this.navigate(url) },
      true,
    );
  }

  async settle(): Promise<void> {
    this.settleCalls++;
  }

  async captureDebug(label: string): Promise<string | null> {
    this.captures.push(label);
    return null;
  }

  async cookies(): Promise<SessionCookie[]> {
    return this.sessionCookies;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** URLs passed to goto(), in order */
  visited(): string[] {
    return this.interactions.flatMap((entry) => (entry.type === "goto" ? [entry.url] : []));
  }

  private navigate(url: string): void {
    const page = this.pages[url];
    if (page?.timeout) {
      throw new TransportTimeoutError("goto", url);
    }
    if (page?.failure) {
      throw new Error(page.failure);
    }
    this.current = page ?? {};
    this.url = page?.redirectTo ?? url;
  }
}

/**
 * Element with the given selectors each matching a single child
 */
export function el(
  children: Record<string, FakeElement | FakeElement[]> = {},
  props: Omit<FakeElement, "children"> = {},
): FakeElement {
  const normalized: Record<string, FakeElement[]> = {};
  for (const [selector, value] of Object.entries(children)) {
    normalized[selector] = Array.isArray(value) ? value : [value];
  }
  return { ...props, children: normalized };
}

/**
 * Leaf element with text
 */
export function text(value: string, props: Omit<FakeElement, "text"> = {}): FakeElement {
  return { ...props, text: value };
}
