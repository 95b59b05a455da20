/**
 * Cookie Store
 *
 * Reads and writes the session cookie file (a JSON array of browser cookies).
 * The file is validated with zod before anything is handed to the browser.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import type { SessionCookie } from "@/core/domain/Session";
import { SessionBootstrapError, getErrorMessage } from "@/core/errors";
import { logger } from "@/config/logger";

const SessionCookieSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
  domain: z.string().min(1),
  path: z.string().default("/"),
  expires: z.number().default(-1),
  httpOnly: z.boolean().default(false),
  secure: z.boolean().default(false),
  sameSite: z.enum(["Strict", "Lax", "None"]).default("Lax"),
});

const CookieFileSchema = z.array(SessionCookieSchema);

export type CookieLoadResult =
  | { status: "loaded"; cookies: SessionCookie[] }
  | { status: "missing"; cookies: [] };

export class CookieStore {
  /**
   * @throws SessionBootstrapError when the file exists but is unreadable or invalid
   */
  async load(filePath: string): Promise<CookieLoadResult> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return { status: "missing", cookies: [] };
      }
      throw new SessionBootstrapError(`Cookie file unreadable: ${filePath}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new SessionBootstrapError(
        `Cookie file is not valid JSON: ${filePath} (${getErrorMessage(error)})`,
        { cause: error },
      );
    }

    const parseResult = CookieFileSchema.safeParse(json);
    if (!parseResult.success) {
      const issues = parseResult.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new SessionBootstrapError(`Cookie file is invalid: ${filePath} (${issues})`);
    }

    logger.info({ filePath, count: parseResult.data.length }, "Cookies loaded");
    return { status: "loaded", cookies: parseResult.data };
  }

  async save(filePath: string, cookies: readonly SessionCookie[]): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, `${JSON.stringify(cookies, null, 2)}\n`, "utf-8");
    logger.info({ filePath, count: cookies.length }, "Cookies saved");
  }
}

function isNotFound(error: unknown): boolean {
  // fs errors may come from another realm, so no instanceof here
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
