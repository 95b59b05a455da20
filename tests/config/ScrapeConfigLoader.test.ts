/**
 * ScrapeConfigLoader Test
 */

import { describe, it, expect } from "@jest/globals";
import { loadScrapeConfig } from "@/config/ScrapeConfigLoader";
import { ConfigurationError } from "@/core/errors";
import { OUTPUT_CONFIG } from "@/config/constants";

describe("loadScrapeConfig", () => {
  it("applies defaults", () => {
    const config = loadScrapeConfig({ keyword: "  laptop bag " });

    expect(config).toEqual({
      keyword: "laptop bag",
      starFilter: null,
      maxProducts: 3,
      maxPages: 2,
      headless: false,
      cookiesPath: OUTPUT_CONFIG.DEFAULT_COOKIES_FILE,
      outputDir: OUTPUT_CONFIG.RESULT_DIR,
      autoLogin: false,
      debugScreenshots: false,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it.each([
    ["5", "five"],
    ["1", "one"],
    ["positive", "positive"],
    ["CRITICAL", "critical"],
    ["all", null],
    ["", null],
  ])("maps star filter %p to %p", (input, expected) => {
    expect(loadScrapeConfig({ keyword: "mug", starFilter: input }).starFilter).toBe(expected);
  });

  it("rejects an unknown star filter", () => {
    expect(() => loadScrapeConfig({ keyword: "mug", starFilter: "six" })).toThrow(
      ConfigurationError,
    );
  });

  it("rejects an empty keyword", () => {
    expect(() => loadScrapeConfig({ keyword: "   " })).toThrow(/keyword must not be empty/);
  });

  it("lists every violated bound", () => {
    let caught: unknown;
    try {
      loadScrapeConfig({ keyword: "mug", maxProducts: 0, maxPages: 1.5 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.issues).toEqual([
        "maxProducts: maxProducts must be greater than 0",
        "maxPages: maxPages must be an integer",
      ]);
    }
  });
});
