/**
 * Field Resolver
 *
 * Tries a field's candidate selectors strictly in declared order and accepts
 * the first usable one; later candidates are never consulted once one is
 * accepted. Exhaustion yields the caller's default with found=false.
 *
 * Acceptance:
 * - read-only fields (text, attribute, presence, containers): at least one match
 * - actionable fields (fill, click) and probes: the first match is visible
 *
 * For actionable fields the interaction happens during resolution: the
 * first visible control is the one acted on.
 *
 * Errors:
 * - TransportTimeoutError from the scope propagates to the caller
 * - any other error on a candidate is recorded and the next candidate is tried
 */

import type { IPageScope } from "@/core/interfaces/IPageScope";
import type { Candidate } from "@/core/domain/Candidate";
import { TransportTimeoutError, getErrorMessage } from "@/core/errors";
import type { Diagnostics } from "@/diagnostics/Diagnostics";

export interface Resolution<T> {
  value: T;
  found: boolean;
  /** Accepted selector, null on exhaustion */
  selector: string | null;
  /** Index of the accepted selector in the candidate list, -1 on exhaustion */
  index: number;
}

type Acceptance = "present" | "visible";

export class FieldResolver {
  constructor(private readonly diagnostics: Diagnostics) {}

  /**
   * Trimmed text of the first matching candidate
   */
  async resolveText(
    scope: IPageScope,
    candidate: Candidate,
    defaultValue: string = "",
  ): Promise<Resolution<string>> {
    return this.resolve(scope, candidate, "present", defaultValue, async (selector) => {
      const text = await scope.textContent(selector);
      return text?.trim() || defaultValue;
    });
  }

  /**
   * Trimmed text of the first visible candidate
   */
  async resolveVisibleText(
    scope: IPageScope,
    candidate: Candidate,
    defaultValue: string = "",
  ): Promise<Resolution<string>> {
    return this.resolve(scope, candidate, "visible", defaultValue, async (selector) => {
      const text = await scope.textContent(selector);
      return text?.trim() || defaultValue;
    });
  }

  /**
   * Attribute value of the first matching candidate
   */
  async resolveAttribute(
    scope: IPageScope,
    candidate: Candidate,
    attribute: string,
    defaultValue: string = "",
  ): Promise<Resolution<string>> {
    return this.resolve(scope, candidate, "present", defaultValue, async (selector) => {
      const value = await scope.getAttribute(selector, attribute);
      return value?.trim() || defaultValue;
    });
  }

  /**
   * Whether any candidate matches (badges, markers)
   */
  async resolvePresence(scope: IPageScope, candidate: Candidate): Promise<Resolution<boolean>> {
    return this.resolve(scope, candidate, "present", false, async () => true, { quiet: true });
  }

  /**
   * Container granularity: every element of the first candidate with at
   * least one match
   */
  async resolveContainers(
    scope: IPageScope,
    candidate: Candidate,
  ): Promise<Resolution<IPageScope[]>> {
    return this.resolve(scope, candidate, "present", [], (selector) => scope.all(selector));
  }

  /**
   * First visible candidate, without reading or acting on it
   */
  async probe(scope: IPageScope, candidate: Candidate): Promise<Resolution<boolean>> {
    return this.resolve(scope, candidate, "visible", false, async () => true, { quiet: true });
  }

  /**
   * Fill the first visible candidate
   */
  async fill(scope: IPageScope, candidate: Candidate, value: string): Promise<Resolution<boolean>> {
    return this.resolve(scope, candidate, "visible", false, async (selector) => {
      await scope.fill(selector, value);
      return true;
    });
  }

  /**
   * Click the first visible candidate
   */
  async click(scope: IPageScope, candidate: Candidate): Promise<Resolution<boolean>> {
    return this.resolve(scope, candidate, "visible", false, async (selector) => {
      await scope.click(selector);
      return true;
    });
  }

  private async resolve<T>(
    scope: IPageScope,
    candidate: Candidate,
    acceptance: Acceptance,
    defaultValue: T,
    extract: (selector: string) => Promise<T>,
    options: { quiet?: boolean } = {},
  ): Promise<Resolution<T>> {
    for (const [index, selector] of candidate.selectors.entries()) {
      let accepted = false;
      try {
        accepted = await this.accepts(scope, selector, acceptance);
        if (!accepted) continue;

        const value = await extract(selector);
        return { value, found: true, selector, index };
      } catch (error) {
        if (error instanceof TransportTimeoutError) throw error;

        this.diagnostics.record("selector_error", "resolver", "Candidate selector failed", {
          field: candidate.field,
          selector,
          accepted,
          error: getErrorMessage(error),
        });
      }
    }

    if (!options.quiet) {
      this.diagnostics.record("field_unresolved", "resolver", "No candidate matched", {
        field: candidate.field,
        tried: candidate.selectors.length,
      });
    }

    return { value: defaultValue, found: false, selector: null, index: -1 };
  }

  private async accepts(scope: IPageScope, selector: string, acceptance: Acceptance): Promise<boolean> {
    if (acceptance === "visible") {
      return scope.isVisible(selector);
    }
    return (await scope.count(selector)) > 0;
  }
}
