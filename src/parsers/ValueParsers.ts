/**
 * Value Parsers
 *
 * Pure, total text-to-value conversions for scraped fields.
 * Unparseable input yields the field's neutral value (0 or the trimmed text).
 */

const RATING_OUT_OF_FIVE = /(\d+(?:\.\d+)?)\s+out of\s+5/i;
const RATING_STARS = /(\d+(?:\.\d+)?)\s+stars?\b/i;
const REVIEW_DATE_PREFACE = /^\s*Reviewed in .*? on\s+/i;
const HELPFUL_VOTES = /(\d[\d,]*)\s+(?:people|person)\s+found/i;

const MAX_RATING = 5;

/**
 * Star rating from text such as "4.5 out of 5 stars" or "4 stars".
 * @returns 0 when no number is found or it is outside 0-5
 */
export function parseRating(text: string | null | undefined): number {
  if (!text) return 0;

  const match = RATING_OUT_OF_FIVE.exec(text) ?? RATING_STARS.exec(text);
  if (!match) return 0;

  const value = Number.parseFloat(match[1]);
  if (!Number.isFinite(value) || value < 0 || value > MAX_RATING) return 0;
  return value;
}

/**
 * Drop the "Reviewed in <country> on " preface.
 * "Reviewed in the United States on January 5, 2024" -> "January 5, 2024"
 */
export function normalizeReviewDate(text: string | null | undefined): string {
  if (!text) return "";
  return text.replace(REVIEW_DATE_PREFACE, "").trim();
}

/**
 * Helpful vote count from "1,234 people found this helpful".
 * "One person found this helpful" has no digits and yields 0.
 */
export function parseHelpfulVotes(text: string | null | undefined): number {
  if (!text) return 0;

  const match = HELPFUL_VOTES.exec(text);
  if (!match) return 0;

  const value = Number.parseInt(match[1].replace(/,/g, ""), 10);
  return Number.isFinite(value) ? value : 0;
}
