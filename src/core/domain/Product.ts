/**
 * Product domain model
 * One entry per discovered search result
 */

export interface Product {
  /** Site product identifier, unique within a run */
  readonly asin: string;
  readonly title: string;
  /** Absolute product URL */
  readonly link: string;
  /** Price as displayed; "N/A" when the result shows none */
  readonly price: string;
  /** 0-5, 0 when unknown */
  readonly rating: number;
  /** 1-based rank among the products built in this run */
  readonly position: number;
}

export function createProduct(fields: Product): Product {
  return Object.freeze({ ...fields });
}
