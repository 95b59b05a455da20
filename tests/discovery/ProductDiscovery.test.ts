/**
 * ProductDiscovery Test
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { ProductDiscovery } from "@/discovery/ProductDiscovery";
import { FieldResolver } from "@/resolver/FieldResolver";
import { Diagnostics } from "@/diagnostics/Diagnostics";
import { FakeBrowserSession, el, text, type FakeElement } from "../helpers/FakeBrowser";

const BASE = "https://shop.test";
const RESULT = '[data-component-type="s-search-result"]';

function resultCard(asin: string | null, title: string, extra: Record<string, FakeElement> = {}): FakeElement {
  return el(
    {
      "h2 a span": text(title),
      "h2 a": { attributes: { href: `/product-${title.toLowerCase()}/dp/${asin ?? "NOASIN0000"}` } },
      ...extra,
    },
    asin === null ? {} : { attributes: { "data-asin": asin } },
  );
}

describe("ProductDiscovery", () => {
  let diagnostics: Diagnostics;

  beforeEach(() => {
    diagnostics = new Diagnostics();
  });

  function discoveryFor(session: FakeBrowserSession): ProductDiscovery {
    return new ProductDiscovery(session, new FieldResolver(diagnostics), diagnostics, {
      baseUrl: BASE,
      settleMs: 0,
    });
  }

  it("builds the search URL with '+' for spaces", () => {
    const discovery = discoveryFor(new FakeBrowserSession());

    expect(discovery.buildSearchUrl("laptop bag")).toBe(`${BASE}/s?k=laptop+bag`);
  });

  it("returns the top products in DOM order with 1-based positions", async () => {
    const searchUrl = `${BASE}/s?k=mug`;
    const cards = ["B000000001", "B000000002", "B000000003", "B000000004", "B000000005"].map(
      (asin, i) => resultCard(asin, `Mug${i + 1}`),
    );
    const session = new FakeBrowserSession({ [searchUrl]: { root: el({ [RESULT]: cards }) } });

    const products = await discoveryFor(session).search("mug", 3);

    expect(products.map((p) => [p.asin, p.position])).toEqual([
      ["B000000001", 1],
      ["B000000002", 2],
      ["B000000003", 3],
    ]);
    expect(products[0].title).toBe("Mug1");
    expect(products[0].link).toBe(`${BASE}/product-mug1/dp/B000000001`);
  });

  it("skips a container without ASIN without using a slot", async () => {
    const searchUrl = `${BASE}/s?k=mug`;
    const noAsin = el({ "h2 a span": text("Sponsored") });
    const session = new FakeBrowserSession({
      [searchUrl]: {
        root: el({
          [RESULT]: [
            resultCard("B000000001", "One"),
            noAsin,
            resultCard("B000000002", "Two"),
            resultCard("B000000003", "Three"),
          ],
        }),
      },
    });

    const products = await discoveryFor(session).search("mug", 3);

    expect(products.map((p) => p.asin)).toEqual(["B000000001", "B000000002", "B000000003"]);
    expect(products.map((p) => p.position)).toEqual([1, 2, 3]);
    expect(diagnostics.byKind("item_skipped")).toHaveLength(1);
  });

  it("skips duplicate ASINs", async () => {
    const searchUrl = `${BASE}/s?k=mug`;
    const session = new FakeBrowserSession({
      [searchUrl]: {
        root: el({
          [RESULT]: [
            resultCard("B000000001", "One"),
            resultCard("B000000001", "Again"),
            resultCard("B000000002", "Two"),
          ],
        }),
      },
    });

    const products = await discoveryFor(session).search("mug", 5);

    expect(products.map((p) => p.asin)).toEqual(["B000000001", "B000000002"]);
    expect(products[1].position).toBe(2);
  });

  it("takes the ASIN from the product link when the container has none", async () => {
    const searchUrl = `${BASE}/s?k=mug`;
    const session = new FakeBrowserSession({
      [searchUrl]: { root: el({ [RESULT]: [resultCard(null, "Linked")] }) },
    });

    const [product] = await discoveryFor(session).search("mug", 1);

    expect(product.asin).toBe("NOASIN0000");
  });

  it("applies defaults and reads the rating from the aria-label", async () => {
    const searchUrl = `${BASE}/s?k=mug`;
    const bare = el(
      { '[aria-label*="out of 5 stars"]': { attributes: { "aria-label": "4.6 out of 5 stars" } } },
      { attributes: { "data-asin": "B000000009" } },
    );
    const session = new FakeBrowserSession({ [searchUrl]: { root: el({ [RESULT]: [bare] }) } });

    const [product] = await discoveryFor(session).search("mug", 1);

    expect(product).toEqual({
      asin: "B000000009",
      title: "Unknown",
      link: `${BASE}/dp/B000000009`,
      price: "N/A",
      rating: 4.6,
      position: 1,
    });
  });

  it("reads the price and the star icon text", async () => {
    const searchUrl = `${BASE}/s?k=mug`;
    const card = resultCard("B000000001", "Priced", {
      ".a-price-whole": text("24."),
      ".a-icon-star-small": text("4.0 out of 5 stars"),
    });
    const session = new FakeBrowserSession({ [searchUrl]: { root: el({ [RESULT]: [card] }) } });

    const [product] = await discoveryFor(session).search("mug", 1);

    expect(product.price).toBe("24.");
    expect(product.rating).toBe(4);
  });

  it("falls back to later container selectors", async () => {
    const searchUrl = `${BASE}/s?k=mug`;
    const session = new FakeBrowserSession({
      [searchUrl]: {
        root: el({ "div.s-card-container": [resultCard("B000000007", "Card")] }),
      },
    });

    const products = await discoveryFor(session).search("mug", 3);

    expect(products.map((p) => p.asin)).toEqual(["B000000007"]);
  });

  it("returns [] with a no_results diagnostic and a debug capture", async () => {
    const session = new FakeBrowserSession({ [`${BASE}/s?k=mug`]: { root: el() } });

    const products = await discoveryFor(session).search("mug", 3);

    expect(products).toEqual([]);
    expect(diagnostics.has("no_results")).toBe(true);
    expect(session.captures).toEqual(["search_no_results"]);
  });

  it("returns [] when the search page times out", async () => {
    const session = new FakeBrowserSession({ [`${BASE}/s?k=mug`]: { timeout: true } });

    const products = await discoveryFor(session).search("mug", 3);

    expect(products).toEqual([]);
    expect(diagnostics.has("transport_timeout")).toBe(true);
  });

  it("moves on to the next container when one times out", async () => {
    const searchUrl = `${BASE}/s?k=mug`;
    const stalled = { ...resultCard("B000000002", "Two"), timeoutSelectors: ["h2 a"] };
    const session = new FakeBrowserSession({
      [searchUrl]: {
        root: el({
          [RESULT]: [
            resultCard("B000000001", "One"),
            stalled,
            resultCard("B000000003", "Three"),
            resultCard("B000000004", "Four"),
          ],
        }),
      },
    });

    const products = await discoveryFor(session).search("mug", 4);

    expect(products.map((p) => [p.asin, p.position])).toEqual([
      ["B000000001", 1],
      ["B000000003", 2],
      ["B000000004", 3],
    ]);
    expect(diagnostics.byKind("transport_timeout")[0].context).toEqual({
      url: searchUrl,
      containerIndex: 1,
    });
  });

  it("returns [] when the search page fails to load", async () => {
    const session = new FakeBrowserSession({
      [`${BASE}/s?k=mug`]: { failure: "page.goto: net::ERR_CONNECTION_RESET" },
    });

    const products = await discoveryFor(session).search("mug", 3);

    expect(products).toEqual([]);
    expect(diagnostics.byKind("navigation_error")[0].context).toEqual({
      url: `${BASE}/s?k=mug`,
    });
  });
});
