/**
 * Command line interface (commander)
 *
 * Commands:
 * - scrape (default): search, harvest reviews, write CSV/JSON
 * - login: sign in (auto or manual), save the session cookies and check that
 *   a review page is reachable with them
 */

import { Command } from "commander";

import type { ScrapeConfig } from "@/core/domain/ScrapeConfig";
import { ScraperError, getErrorMessage } from "@/core/errors";
import { loadScrapeConfig, type ScrapeInput } from "@/config/ScrapeConfigLoader";
import { APP_METADATA, OUTPUT_CONFIG, SCRAPE_DEFAULTS } from "@/config/constants";
import { Diagnostics } from "@/diagnostics/Diagnostics";
import { FieldResolver } from "@/resolver/FieldResolver";
import { BrowserController } from "@/browser/BrowserController";
import { CookieStore } from "@/browser/CookieStore";
import { CredentialProvider } from "@/auth/CredentialProvider";
import { LoginCoordinator } from "@/auth/LoginCoordinator";
import { PipelineController, type PipelineResult } from "@/pipeline/PipelineController";
import { ReviewResultWriter } from "@/utils/ReviewResultWriter";
import { ScreenshotService } from "@/utils/ScreenshotService";
import { TerminalPrompter, type Prompter } from "@/utils/Prompter";
import { askYesNo, promptScrapeInput } from "./InteractiveInput";

export interface CreateCliOptions {
  readonly prompter?: Prompter;
  readonly stdout?: NodeJS.WritableStream;
  readonly stderr?: NodeJS.WritableStream;
}

interface ScrapeCommandOptions {
  keyword?: string;
  starFilter?: string;
  maxProducts: number;
  maxPages: number;
  headless: boolean;
  cookiesFile: string;
  outputDir: string;
  login: boolean;
  debugScreenshots: boolean;
  interactive: boolean;
}

interface LoginCommandOptions {
  auto: boolean;
  manual: boolean;
  cookiesFile: string;
  headless: boolean;
}

const toNumber = (value: string): number => Number(value);

export const createCli = (options: CreateCliOptions = {}): Command => {
  const program = new Command();
  const prompter = options.prompter ?? new TerminalPrompter();
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;

  const print = (line = "") => stdout.write(`${line}\n`);

  const handle = <T extends unknown[]>(runner: (...args: T) => Promise<void>) => {
    return async (...args: T) => {
      try {
        await runner(...args);
      } catch (error) {
        const prefix = error instanceof ScraperError ? `${error.name}: ` : "";
        stderr.write(`Error: ${prefix}${getErrorMessage(error)}\n`);
        throw error;
      }
    };
  };

  program
    .name("review-harvester")
    .description(`${APP_METADATA.NAME} - product review scraper`)
    .version(APP_METADATA.VERSION);

  program
    .command("scrape", { isDefault: true })
    .description("Search a keyword and harvest the reviews of the top products")
    .option("-k, --keyword <keyword>", "Search keyword")
    .option("-s, --star-filter <filter>", "Star filter (5, 4, 3, 2, 1, positive, critical, all)")
    .option("-p, --max-products <n>", "Max products to scrape", toNumber, SCRAPE_DEFAULTS.MAX_PRODUCTS)
    .option("-m, --max-pages <n>", "Max review pages per product", toNumber, SCRAPE_DEFAULTS.MAX_PAGES)
    .option("--headless", "Run the browser headless", false)
    .option("-c, --cookies-file <path>", "Cookie file", OUTPUT_CONFIG.DEFAULT_COOKIES_FILE)
    .option("-o, --output-dir <dir>", "Directory for the CSV/JSON output", OUTPUT_CONFIG.RESULT_DIR)
    .option("--login", "Sign in automatically before scraping", false)
    .option("--debug-screenshots", "Save screenshots when a step degrades", false)
    .option("-i, --interactive", "Prompt for every setting", false)
    .action(
      handle(async (command: ScrapeCommandOptions) => {
        const input: ScrapeInput =
          command.interactive || !command.keyword
            ? {
                ...(await promptScrapeInput(prompter, stdout)),
                outputDir: command.outputDir,
                autoLogin: command.login,
                debugScreenshots: command.debugScreenshots,
              }
            : {
                keyword: command.keyword,
                starFilter: command.starFilter,
                maxProducts: command.maxProducts,
                maxPages: command.maxPages,
                headless: command.headless,
                cookiesPath: command.cookiesFile,
                outputDir: command.outputDir,
                autoLogin: command.login,
                debugScreenshots: command.debugScreenshots,
              };

        const config = loadScrapeConfig(input);
        printConfiguration(config, print);

        const pipeline = new PipelineController({
          session: new BrowserController(
            new ScreenshotService(config.outputDir, config.debugScreenshots),
          ),
          sink: new ReviewResultWriter({ outputDir: config.outputDir }),
          credentials: new CredentialProvider(prompter),
          waitForUser: (message) => prompter.pause(message),
        });

        const result = await pipeline.run(config);
        printSummary(result, print);
      }),
    );

  program
    .command("login")
    .description("Sign in and save the session cookies for later scrapes")
    .option("--auto", "Try automatic sign-in first", false)
    .option("--manual", "Sign in by hand in the browser window", false)
    .option("-c, --cookies-file <path>", "Cookie file", OUTPUT_CONFIG.DEFAULT_COOKIES_FILE)
    .option("--headless", "Run the browser headless (auto sign-in only)", false)
    .action(
      handle(async (command: LoginCommandOptions) => {
        const auto = command.manual
          ? false
          : command.auto || (await askYesNo(prompter, "Attempt automatic sign-in? (y/n): "));

        const credentials = auto ? await new CredentialProvider(prompter).getCredentials() : null;

        const diagnostics = new Diagnostics();
        const session = new BrowserController(new ScreenshotService(OUTPUT_CONFIG.RESULT_DIR, false));
        const coordinator = new LoginCoordinator({
          session,
          resolver: new FieldResolver(diagnostics),
          diagnostics,
          cookieStore: new CookieStore(),
          waitForUser: (message) => prompter.pause(message),
        });

        await session.open({ headless: command.headless && auto, cookies: [] });
        try {
          const report = await coordinator.login({
            credentials,
            cookiesPath: command.cookiesFile,
            verifyReviewAccess: true,
          });
          if (report.outcome) {
            print(`Automatic sign-in: ${report.outcome.state} (${report.outcome.detail})`);
          }
          print(report.greeting ? `Signed in: ${report.greeting}` : "Sign-in could not be verified");
          print(`Saved ${report.cookiesSaved} cookies to ${command.cookiesFile}`);
          print(describeReviewAccess(report.reviewAccess));
        } finally {
          await session.close();
        }
      }),
    );

  return program;
};

function describeReviewAccess(reviewAccess: boolean | null): string {
  if (reviewAccess === null) return "Review page check could not run (see log)";
  return reviewAccess
    ? "Review page access: OK"
    : "Review page access: no reviews visible, the cookies may not be valid";
}

function printConfiguration(config: ScrapeConfig, print: (line?: string) => void): void {
  print();
  print("=== Configuration ===");
  print(`Keyword: ${config.keyword}`);
  print(`Star filter: ${config.starFilter ?? "all"}`);
  print(`Max products: ${config.maxProducts}`);
  print(`Max pages per product: ${config.maxPages}`);
  print(`Headless mode: ${config.headless}`);
  print(`Cookies file: ${config.cookiesPath}`);
  print(`Output directory: ${config.outputDir}`);
  print();
}

function printSummary(result: PipelineResult, print: (line?: string) => void): void {
  print();
  print("=== Summary ===");
  print(`Products found: ${result.products.length}`);
  for (const harvest of result.harvests) {
    print(
      `  #${harvest.product.position} ${harvest.product.asin}: ${harvest.reviews.length} reviews, ` +
        `${harvest.pagesVisited} page(s), stopped: ${harvest.stopReason}`,
    );
  }
  print(`Total reviews: ${result.reviews.length}`);
  if (result.outputFiles.length > 0) {
    print(`Saved to: ${result.outputFiles.join(", ")}`);
  } else {
    print("No reviews saved");
  }
  if (result.diagnostics.length > 0) {
    print(`Diagnostics: ${result.diagnostics.length} (see log for details)`);
  }
}
