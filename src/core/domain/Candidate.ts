/**
 * Candidate: ordered locator alternatives for one semantic field
 */

export type SelectorList = readonly [string, ...string[]];

export interface Candidate {
  /** Semantic field name, e.g. "signIn.email" */
  readonly field: string;
  /** CSS selectors, highest priority first */
  readonly selectors: SelectorList;
}

export function defineCandidate(field: string, selectors: SelectorList): Candidate {
  return Object.freeze({ field, selectors: Object.freeze(selectors) });
}
