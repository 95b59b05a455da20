/**
 * Search result candidates
 *
 * Everything except `container` is resolved inside one result container.
 */

import { defineCandidate } from "@/core/domain/Candidate";

export const SEARCH_SELECTORS = {
  container: defineCandidate("search.container", [
    '[data-component-type="s-search-result"]',
    '[data-asin]:not([data-asin=""])',
    ".s-result-item[data-asin]",
    "div.s-card-container",
  ]),

  title: defineCandidate("search.title", [
    "h2 a span",
    "h2 span",
    ".a-text-normal",
    ".s-link-style span",
  ]),

  link: defineCandidate("search.link", ["h2 a", "a.s-link", 'a[href*="/dp/"]']),

  price: defineCandidate("search.price", [".a-price-whole", ".a-price span"]),

  /** aria-label carries "4.5 out of 5 stars" */
  ratingLabel: defineCandidate("search.ratingLabel", ['[aria-label*="out of 5 stars"]']),

  ratingText: defineCandidate("search.ratingText", [".a-icon-star-small"]),
} as const;
