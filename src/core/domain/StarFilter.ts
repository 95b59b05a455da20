/**
 * Review star filter
 */

export const STAR_FILTERS = [
  "one",
  "two",
  "three",
  "four",
  "five",
  "positive",
  "critical",
] as const;

export type StarFilter = (typeof STAR_FILTERS)[number];

/**
 * Value of the site's filterByStar query parameter
 */
const QUERY_VALUES: Record<StarFilter, string> = {
  one: "one_star",
  two: "two_star",
  three: "three_star",
  four: "four_star",
  five: "five_star",
  positive: "positive",
  critical: "critical",
};

/**
 * Input aliases accepted on the command line / prompt
 * ("5" -> five, "all" -> no filter)
 */
const ALIASES: Record<string, StarFilter | null> = {
  "1": "one",
  "2": "two",
  "3": "three",
  "4": "four",
  "5": "five",
  all: null,
};

export function toStarQueryValue(filter: StarFilter): string {
  return QUERY_VALUES[filter];
}

export function isStarFilter(value: string): value is StarFilter {
  return (STAR_FILTERS as readonly string[]).includes(value);
}

/**
 * Parse user input into a filter.
 * @returns the filter, null for "all"/empty, undefined when unrecognised
 */
export function parseStarFilter(input: string | null | undefined): StarFilter | null | undefined {
  const value = (input ?? "").trim().toLowerCase();
  if (!value) return null;
  if (isStarFilter(value)) return value;
  if (Object.hasOwn(ALIASES, value)) return ALIASES[value];
  return undefined;
}
