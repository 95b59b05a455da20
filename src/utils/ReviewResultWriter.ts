/**
 * ReviewResultWriter - CSV / JSON persistence of harvested reviews
 *
 * SOLID:
 * - SRP: file output only
 * - DIP: the pipeline sees IReviewSink
 *
 * Files (keyword spaces -> "_"):
 * - {outputDir}/reviews_{keyword}.csv
 * - {outputDir}/reviews_{keyword}.json  { scrape_date, total_reviews, reviews }
 *
 * Nothing is written for an empty review list.
 */

import * as fs from "fs/promises";
import * as path from "path";
import type { IReviewSink, ReviewSinkResult } from "@/core/interfaces/IReviewSink";
import { toReviewRecord, type Review, type ReviewRecord } from "@/core/domain/Review";
import { OUTPUT_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import { getTimestampWithTimezone } from "@/utils/timestamp";

export const CSV_COLUMNS: readonly (keyof ReviewRecord)[] = [
  "product_id",
  "product_title",
  "reviewer",
  "rating",
  "date",
  "verified_purchase",
  "content",
  "helpful_votes",
];

export interface ReviewResultFile {
  scrape_date: string;
  total_reviews: number;
  reviews: ReviewRecord[];
}

export interface ReviewResultWriterOptions {
  /** Default: OUTPUT_CONFIG.RESULT_DIR */
  outputDir?: string;
  /** Injected by tests */
  now?: () => Date;
}

export class ReviewResultWriter implements IReviewSink {
  private readonly outputDir: string;
  private readonly now: () => Date;

  constructor(options: ReviewResultWriterOptions = {}) {
    this.outputDir = options.outputDir || OUTPUT_CONFIG.RESULT_DIR;
    this.now = options.now ?? (() => new Date());
  }

  async write(keyword: string, reviews: readonly Review[]): Promise<ReviewSinkResult> {
    if (reviews.length === 0) {
      logger.warn({ keyword }, "No reviews to save");
      return { files: [] };
    }

    await fs.mkdir(this.outputDir, { recursive: true });

    const baseName = `reviews_${toFileSlug(keyword)}`;
    const csvPath = path.join(this.outputDir, `${baseName}.csv`);
    const jsonPath = path.join(this.outputDir, `${baseName}.json`);
    const records = reviews.map(toReviewRecord);

    await fs.writeFile(csvPath, toCsv(records), "utf-8");

    const document: ReviewResultFile = {
      scrape_date: getTimestampWithTimezone(this.now()),
      total_reviews: records.length,
      reviews: records,
    };
    await fs.writeFile(jsonPath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");

    logger.info({ csvPath, jsonPath, count: records.length }, "Reviews saved");
    return { files: [csvPath, jsonPath] };
  }
}

/**
 * "laptop bag" -> "laptop_bag"
 */
/**
 * Keyword as a single file name segment: whitespace, path separators and
 * other unsafe characters become "_"
 */
export function toFileSlug(keyword: string): string {
  return keyword.trim().replace(/[^\w.-]+/g, "_");
}

export function toCsv(records: readonly ReviewRecord[]): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const record of records) {
    lines.push(CSV_COLUMNS.map((column) => escapeCsvField(formatCsvValue(record[column]))).join(","));
  }
  return `${lines.join("\r\n")}\r\n`;
}

function formatCsvValue(value: string | number | boolean): string {
  return String(value);
}

/**
 * RFC 4180: quote fields containing a comma, quote or line break; double quotes
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}
