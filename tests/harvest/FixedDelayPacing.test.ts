/**
 * FixedDelayPacing Test
 */

import { describe, it, expect, jest } from "@jest/globals";
import { FixedDelayPacing, type Sleep } from "@/harvest/FixedDelayPacing";

describe("FixedDelayPacing", () => {
  it("waits the page and product delays", async () => {
    const sleep = jest.fn<Sleep>().mockResolvedValue(undefined);
    const pacing = new FixedDelayPacing({ pageDelayMs: 2000, productDelayMs: 3000, sleep });

    await pacing.betweenPages();
    await pacing.betweenProducts();

    expect(sleep.mock.calls).toEqual([[2000], [3000]]);
  });

  it("defaults to 2s between pages and 3s between products", async () => {
    const sleep = jest.fn<Sleep>().mockResolvedValue(undefined);
    const pacing = new FixedDelayPacing({ sleep });

    await pacing.betweenPages();
    await pacing.betweenProducts();

    expect(sleep.mock.calls).toEqual([[2000], [3000]]);
  });
});
