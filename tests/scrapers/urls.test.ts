import { describe, it, expect } from "@jest/globals";
import {
  canonicalAmazonUrl,
  canonicalNoonUrl,
  canonicalProductUrl,
  normalizeUrl,
} from "../../src/scrapers/urls.js";

describe("normalizeUrl", () => {
  it.each([
    ["amazon.com", "https://www.amazon.com"],
    ["https://amazon.com", "https://www.amazon.com"],
    ["  http://www.noon.com  ", "http://www.noon.com"],
    ["http://noon.com/uae-en", "http://www.noon.com/uae-en"],
  ])("%s -> %s", (input, expected) => {
    expect(normalizeUrl(input)).toBe(expected);
  });
});

describe("canonicalNoonUrl", () => {
  it("drops the slug and query string", () => {
    expect(
      canonicalNoonUrl("https://www.noon.com/saudi-en/long-seo-text/N38503505A/p/?o=abc")
    ).toBe("https://www.noon.com/saudi-en/N38503505A/p/");
  });

  it("returns null for non-product pages", () => {
    expect(canonicalNoonUrl("https://www.noon.com/saudi-en/search?q=laptop")).toBeNull();
  });

  it("returns null when nothing precedes the p segment", () => {
    expect(canonicalNoonUrl("https://www.noon.com/p/")).toBeNull();
  });

  it("returns null for unparseable input", () => {
    expect(canonicalNoonUrl("not a url")).toBeNull();
  });
});

describe("canonicalAmazonUrl", () => {
  it("reduces /dp/ links", () => {
    expect(
      canonicalAmazonUrl("https://www.amazon.sa/Pragmatic-Programmer/dp/9353949432/ref=sr_1_1?k=x")
    ).toBe("https://www.amazon.sa/dp/9353949432/");
  });

  it("rewrites /gp/product/ links to /dp/", () => {
    expect(canonicalAmazonUrl("https://www.amazon.ae/gp/product/B0TEST0001/ref=x")).toBe(
      "https://www.amazon.ae/dp/B0TEST0001/"
    );
  });

  it.each([["https://www.amazon.sa/s?k=mouse"], ["https://www.amazon.sa/dp/"]])(
    "returns null without an ASIN: %s",
    (url) => {
      expect(canonicalAmazonUrl(url)).toBeNull();
    }
  );
});

describe("canonicalProductUrl", () => {
  it("normalizes before dispatching to Amazon", () => {
    expect(canonicalProductUrl("amazon.sa/some/messy/url/dp/12345/")).toBe(
      "https://www.amazon.sa/dp/12345/"
    );
  });

  it("dispatches Noon links", () => {
    expect(canonicalProductUrl("noon.com/uae-en/some-slug/N1234/p/")).toBe(
      "https://www.noon.com/uae-en/N1234/p/"
    );
  });

  it("returns null for other stores", () => {
    expect(canonicalProductUrl("https://www.ebay.com/itm/1")).toBeNull();
  });
});
