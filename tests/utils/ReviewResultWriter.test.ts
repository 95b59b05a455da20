/**
 * ReviewResultWriter Test
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ReviewResultWriter, escapeCsvField, toFileSlug } from "@/utils/ReviewResultWriter";
import { createReview } from "@/core/domain/Review";

const REVIEW = createReview({
  productId: "B000000001",
  productTitle: 'Mug, 12oz "Travel"',
  reviewer: "Ana",
  rating: 4.5,
  date: "May 2, 2024",
  verifiedPurchase: true,
  content: "Line one\nLine two",
  helpfulVotes: 3,
});

describe("ReviewResultWriter", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "review-writer-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes CSV and JSON named after the keyword", async () => {
    const writer = new ReviewResultWriter({
      outputDir: tmpDir,
      now: () => new Date(2024, 4, 2, 10, 30, 0),
    });

    const result = await writer.write("travel mug", [REVIEW]);

    const csvPath = path.join(tmpDir, "reviews_travel_mug.csv");
    const jsonPath = path.join(tmpDir, "reviews_travel_mug.json");
    expect(result.files).toEqual([csvPath, jsonPath]);

    expect(fs.readFileSync(csvPath, "utf-8")).toBe(
      "product_id,product_title,reviewer,rating,date,verified_purchase,content,helpful_votes\r\n" +
        'B000000001,"Mug, 12oz ""Travel""",Ana,4.5,"May 2, 2024",true,"Line one\nLine two",3\r\n',
    );

    const json = JSON.parse(fs.readFileSync(jsonPath, "utf-8"));
    expect(json.total_reviews).toBe(1);
    expect(json.scrape_date).toMatch(/^2024-05-02T10:30:00\.000[+-]\d{2}:\d{2}$/);
    expect(json.reviews).toEqual([
      {
        product_id: "B000000001",
        product_title: 'Mug, 12oz "Travel"',
        reviewer: "Ana",
        rating: 4.5,
        date: "May 2, 2024",
        verified_purchase: true,
        content: "Line one\nLine two",
        helpful_votes: 3,
      },
    ]);
  });

  it("writes nothing for an empty review list", async () => {
    const writer = new ReviewResultWriter({ outputDir: tmpDir });

    const result = await writer.write("mug", []);

    expect(result.files).toEqual([]);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it("escapes CSV fields only when needed", () => {
    expect(escapeCsvField("plain")).toBe("plain");
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
  });

  it("underscores keyword whitespace", () => {
    expect(toFileSlug("  laptop   bag ")).toBe("laptop_bag");
  });

  it("turns path separators in the keyword into underscores", () => {
    expect(toFileSlug("usb-c/lightning cable")).toBe("usb-c_lightning_cable");
    expect(toFileSlug("..\\mug: 12oz?")).toBe(".._mug_12oz_");
  });

  it("writes a keyword with a slash into the output directory itself", async () => {
    const writer = new ReviewResultWriter({ outputDir: tmpDir });

    const result = await writer.write("usb-c/lightning cable", [REVIEW]);

    expect(result.files).toEqual([
      path.join(tmpDir, "reviews_usb-c_lightning_cable.csv"),
      path.join(tmpDir, "reviews_usb-c_lightning_cable.json"),
    ]);
    expect(fs.readdirSync(tmpDir).sort()).toEqual([
      "reviews_usb-c_lightning_cable.csv",
      "reviews_usb-c_lightning_cable.json",
    ]);
  });
});
