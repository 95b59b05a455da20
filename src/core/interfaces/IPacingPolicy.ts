/**
 * Pacing strategy applied between page fetches and between products
 */
export interface IPacingPolicy {
  betweenPages(): Promise<void>;
  betweenProducts(): Promise<void>;
}
