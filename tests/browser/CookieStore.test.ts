/**
 * CookieStore Test
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { CookieStore } from "@/browser/CookieStore";
import { SessionBootstrapError } from "@/core/errors";
import type { SessionCookie } from "@/core/domain/Session";

const COOKIE: SessionCookie = {
  name: "session-id",
  value: "test-session",
  domain: ".shop.test",
  path: "/",
  expires: 1893456000,
  httpOnly: true,
  secure: true,
  sameSite: "None",
};

describe("CookieStore", () => {
  let tmpDir: string;
  let store: CookieStore;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "cookie-store-"));
    store = new CookieStore();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reports a missing file without failing", async () => {
    const result = await store.load(path.join(tmpDir, "absent.json"));

    expect(result).toEqual({ status: "missing", cookies: [] });
  });

  it("round-trips saved cookies", async () => {
    const filePath = path.join(tmpDir, "nested", "cookies.json");

    await store.save(filePath, [COOKIE]);
    const result = await store.load(filePath);

    expect(result).toEqual({ status: "loaded", cookies: [COOKIE] });
    expect(fs.readFileSync(filePath, "utf-8")).toBe(`${JSON.stringify([COOKIE], null, 2)}\n`);
  });

  it("fills optional cookie fields with defaults", async () => {
    const filePath = path.join(tmpDir, "cookies.json");
    fs.writeFileSync(filePath, JSON.stringify([{ name: "a", value: "1", domain: ".shop.test" }]));

    const result = await store.load(filePath);

    expect(result.cookies).toEqual([
      {
        name: "a",
        value: "1",
        domain: ".shop.test",
        path: "/",
        expires: -1,
        httpOnly: false,
        secure: false,
        sameSite: "Lax",
      },
    ]);
  });

  it("rejects malformed JSON", async () => {
    const filePath = path.join(tmpDir, "cookies.json");
    fs.writeFileSync(filePath, "[{");

    await expect(store.load(filePath)).rejects.toBeInstanceOf(SessionBootstrapError);
  });

  it("rejects cookies that fail validation", async () => {
    const filePath = path.join(tmpDir, "cookies.json");
    fs.writeFileSync(filePath, JSON.stringify([{ name: "a", value: "1" }]));

    await expect(store.load(filePath)).rejects.toThrow(/Cookie file is invalid: .*0\.domain/);
  });
});
