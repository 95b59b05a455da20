/**
 * Persistence hand-off for harvested reviews
 */

import type { Review } from "@/core/domain/Review";

export interface ReviewSinkResult {
  /** Files written, empty when there was nothing to write */
  files: string[];
}

export interface IReviewSink {
  write(keyword: string, reviews: readonly Review[]): Promise<ReviewSinkResult>;
}
