import { DEFAULT_COMPARISON_CONFIG } from "../../config";
import {
  isValidLink,
  researchPortalUrl,
  resolveNewsItem,
  resolveNewsItems,
  webSearchUrl,
} from "../news_links";

const settings = DEFAULT_COMPARISON_CONFIG;
const TATA_PORTAL =
  "https://www.moneycontrol.com/stocks/cptmarket/compsearchnew.php?search_data=Tata%20Motors%20Limited&topsearch_type=1&search_str=Tata%20Motors%20Limited";

describe("isValidLink", () => {
  it("accepts absolute http(s) URLs", () => {
    expect(isValidLink("https://news.example.com/a")).toBe(true);
    expect(isValidLink("http://example.com")).toBe(true);
  });

  it("rejects missing, relative, hostless and loopback links", () => {
    expect(isValidLink(undefined)).toBe(false);
    expect(isValidLink("")).toBe(false);
    expect(isValidLink("/news/a")).toBe(false);
    expect(isValidLink("not a url")).toBe(false);
    expect(isValidLink("javascript:alert(1)")).toBe(false);
    expect(isValidLink("http://localhost/x")).toBe(false);
    expect(isValidLink("http://api.localhost/x")).toBe(false);
    expect(isValidLink("http://127.0.0.1:8080/x")).toBe(false);
    expect(isValidLink("http://[::1]/x")).toBe(false);
  });
});

describe("researchPortalUrl", () => {
  it("percent-encodes the company name into both query slots", () => {
    expect(researchPortalUrl("Tata Motors Limited", settings)).toBe(TATA_PORTAL);
    expect(researchPortalUrl("M&M", settings)).toBe(
      "https://www.moneycontrol.com/stocks/cptmarket/compsearchnew.php?search_data=M%26M&topsearch_type=1&search_str=M%26M"
    );
  });
});

describe("resolveNewsItem", () => {
  const domestic = {
    region: "domestic",
    companyName: "Tata Motors Limited",
  } as const;
  const foreign = { region: "foreign", companyName: "Apple Inc." } as const;

  it("sends domestic tickers to the research portal, even for loopback links", () => {
    const item = resolveNewsItem(
      { title: "Results", publisher: "Example Wire", link: "http://localhost/x" },
      domestic,
      settings
    );
    expect(item).toEqual({
      title: "Results",
      link: TATA_PORTAL,
      publisher: "Example Wire",
      isResearchPortal: true,
    });
  });

  it("discards valid provider links for domestic tickers", () => {
    const item = resolveNewsItem(
      { title: "Results", link: "https://news.example.com/tata" },
      domestic,
      settings
    );
    expect(item.link).toBe(TATA_PORTAL);
    expect(item.publisher).toBe("Moneycontrol");
  });

  it("keeps valid provider links for foreign tickers", () => {
    const item = resolveNewsItem(
      { title: "Chips", publisher: "Example Wire", link: "https://news.example.com/a" },
      foreign,
      settings
    );
    expect(item).toEqual({
      title: "Chips",
      link: "https://news.example.com/a",
      publisher: "Example Wire",
      isResearchPortal: false,
    });
  });

  it("replaces malformed foreign links with a web search for the title", () => {
    const item = resolveNewsItem(
      { title: "Apple ships new chips", link: "http://localhost/x" },
      foreign,
      settings
    );
    expect(item.link).toBe(
      "https://www.google.com/search?q=Apple%20ships%20new%20chips"
    );
  });

  it("fills in title and publisher defaults", () => {
    const item = resolveNewsItem({ title: "  " }, foreign, settings);
    expect(item).toEqual({
      title: "Apple Inc. News",
      link: "https://www.google.com/search?q=Apple%20Inc.%20News",
      publisher: "Market News",
      isResearchPortal: false,
    });
  });
});

describe("resolveNewsItems", () => {
  const raws = [1, 2, 3, 4, 5].map((n) => ({
    title: `Headline ${n}`,
    link: `https://news.example.com/${n}`,
  }));

  it("keeps only the first three items", () => {
    const items = resolveNewsItems(
      raws,
      { region: "foreign", companyName: "Apple Inc." },
      settings
    );
    expect(items.map((i) => i.title)).toEqual([
      "Headline 1",
      "Headline 2",
      "Headline 3",
    ]);
  });

  it("synthesizes one portal item for a domestic ticker without news", () => {
    const items = resolveNewsItems(
      [],
      { region: "domestic", companyName: "Tata Motors Limited" },
      settings
    );
    expect(items).toEqual([
      {
        title: "Tata Motors Limited News",
        link: TATA_PORTAL,
        publisher: "Moneycontrol",
        isResearchPortal: true,
      },
    ]);
  });

  it("leaves a foreign ticker without news empty", () => {
    expect(
      resolveNewsItems(
        undefined,
        { region: "foreign", companyName: "Apple Inc." },
        settings
      )
    ).toEqual([]);
  });
});

describe("query encoding", () => {
  it("replaces unpaired surrogates in the company name", () => {
    expect(researchPortalUrl("Bad\uD800Name", settings)).toBe(
      "https://www.moneycontrol.com/stocks/cptmarket/compsearchnew.php?search_data=Bad%EF%BF%BDName&topsearch_type=1&search_str=Bad%EF%BF%BDName"
    );
  });

  it("keeps surrogate pairs intact", () => {
    expect(webSearchUrl("Up \uD83D\uDE00", settings)).toBe(
      "https://www.google.com/search?q=Up%20%F0%9F%98%80"
    );
  });

  it("falls back to a web search for a malformed headline with a bad link", () => {
    const item = resolveNewsItem(
      { title: "x\uDC00", link: "nope" },
      { region: "foreign", companyName: "Apple Inc." },
      settings
    );
    expect(item.link).toBe("https://www.google.com/search?q=x%EF%BF%BD");
  });
});
