/**
 * ValueParsers Test
 */

import { describe, it, expect } from "@jest/globals";
import { normalizeReviewDate, parseHelpfulVotes, parseRating } from "@/parsers/ValueParsers";

describe("parseRating", () => {
  it.each([
    ["4.5 out of 5 stars", 4.5],
    ["5.0 out of 5 stars", 5],
    ["1 out of 5", 1],
    ["3 stars", 3],
    ["Rated 4 star", 4],
  ])("parses %p as %p", (input, expected) => {
    expect(parseRating(input)).toBe(expected);
  });

  it("prefers the 'out of 5' form", () => {
    expect(parseRating("2 stars, 4.0 out of 5")).toBe(4);
  });

  it.each(["", "no rating", "7 out of 5 stars", "12 stars"])("returns 0 for %p", (input) => {
    expect(parseRating(input)).toBe(0);
  });

  it("returns 0 for null", () => {
    expect(parseRating(null)).toBe(0);
  });
});

describe("normalizeReviewDate", () => {
  it("strips the 'Reviewed in ... on' preface", () => {
    expect(normalizeReviewDate("Reviewed in the United States on January 5, 2024")).toBe(
      "January 5, 2024",
    );
  });

  it("is idempotent", () => {
    const once = normalizeReviewDate("Reviewed in Canada on March 3, 2023");
    expect(normalizeReviewDate(once)).toBe(once);
  });

  it("trims text without a preface", () => {
    expect(normalizeReviewDate("  June 1, 2022 ")).toBe("June 1, 2022");
  });

  it("returns an empty string for missing text", () => {
    expect(normalizeReviewDate(undefined)).toBe("");
  });
});

describe("parseHelpfulVotes", () => {
  it("parses a plain count", () => {
    expect(parseHelpfulVotes("12 people found this helpful")).toBe(12);
  });

  it("accepts thousands separators", () => {
    expect(parseHelpfulVotes("1,234 people found this helpful")).toBe(1234);
  });

  it("returns 0 for the spelled-out single vote", () => {
    expect(parseHelpfulVotes("One person found this helpful")).toBe(0);
  });

  it("returns 0 when absent", () => {
    expect(parseHelpfulVotes("")).toBe(0);
    expect(parseHelpfulVotes(null)).toBe(0);
  });
});
