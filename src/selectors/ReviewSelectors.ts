/**
 * Review page candidates
 */

import { defineCandidate } from "@/core/domain/Candidate";

export const REVIEW_SELECTORS = {
  container: defineCandidate("review.container", [
    '[data-hook="review"]',
    'div[id*="customer_review"]',
    ".review",
    "div.a-section.review",
  ]),

  reviewer: defineCandidate("review.reviewer", [".a-profile-name"]),

  rating: defineCandidate("review.rating", [
    '[data-hook="review-star-rating"]',
    '[data-hook="cmps-review-star-rating"]',
  ]),

  date: defineCandidate("review.date", ['[data-hook="review-date"]']),

  body: defineCandidate("review.body", ['[data-hook="review-body"]']),

  verified: defineCandidate("review.verified", ['[data-hook="avp-badge"]']),

  helpfulVotes: defineCandidate("review.helpfulVotes", ['[data-hook="helpful-vote-statement"]']),

  noReviews: defineCandidate("review.noReviews", [
    ".no-reviews-section",
    '[data-hook="noReviewsSection"]',
  ]),
} as const;
