/**
 * Page Scope Interface
 *
 * A queryable region of the current page: the whole document or a single
 * container element (one search result, one review).
 *
 * SOLID:
 * - ISP: only what field resolution needs
 * - DIP: resolver, discovery and harvester depend on this, not on Playwright
 *
 * Implementations raise TransportTimeoutError when an operation exceeds its
 * timeout. A selector with no match is never an error:
 * count() returns 0 and textContent()/getAttribute() return null.
 */
export interface IPageScope {
  /** Number of elements matching the selector inside this scope */
  count(selector: string): Promise<number>;

  /** Every element matching the selector, in DOM order, as child scopes */
  all(selector: string): Promise<IPageScope[]>;

  /** Whether the first match is visible */
  isVisible(selector: string): Promise<boolean>;

  /** textContent of the first match, null when nothing matches */
  textContent(selector: string): Promise<string | null>;

  /** Attribute of the first match, null when nothing matches or the attribute is absent */
  getAttribute(selector: string, name: string): Promise<string | null>;

  /** Attribute of the scope's own root element; null for a page scope */
  ownAttribute(name: string): Promise<string | null>;

  /** Replace the value of the first match */
  fill(selector: string, value: string): Promise<void>;

  /** Click the first match */
  click(selector: string): Promise<void>;
}
