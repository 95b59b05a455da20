/**
 * Review domain model
 */

export interface Review {
  /** Product.asin of the product the review was harvested for */
  readonly productId: string;
  readonly productTitle: string;
  readonly reviewer: string;
  /** 0-5, 0 when the star text could not be read */
  readonly rating: number;
  /** Date text with the "Reviewed in ... on" preface removed */
  readonly date: string;
  readonly verifiedPurchase: boolean;
  readonly content: string;
  /** 0 when not stated */
  readonly helpfulVotes: number;
}

export function createReview(fields: Review): Review {
  return Object.freeze({ ...fields });
}

/**
 * Flat record written to CSV / JSON (snake_case keys)
 */
export interface ReviewRecord {
  product_id: string;
  product_title: string;
  reviewer: string;
  rating: number;
  date: string;
  verified_purchase: boolean;
  content: string;
  helpful_votes: number;
}

export function toReviewRecord(review: Review): ReviewRecord {
  return {
    product_id: review.productId,
    product_title: review.productTitle,
    reviewer: review.reviewer,
    rating: review.rating,
    date: review.date,
    verified_purchase: review.verifiedPurchase,
    content: review.content,
    helpful_votes: review.helpfulVotes,
  };
}
