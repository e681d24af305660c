/**
 * Yahoo Finance market data provider.
 *
 * Endpoints:
 * - quoteSummary (fundamentals; needs a cookie + crumb session)
 * - chart (daily closes for the tracked horizons and arbitrary windows)
 * - search (recent headlines)
 *
 * Fundamentals are required; a failing history horizon or headline lookup
 * only leaves that field empty.
 */
import type { z } from "zod";
import {
  HORIZONS,
  RawQuoteSchema,
  type Horizon,
  type PricePoint,
  type RawHeadline,
  type RawQuote,
} from "../domain/raw_quote";
import { getLogger } from "@src/util/logger";
import type { MarketDataProvider } from "./contracts";
import { MarketDataError, codeForStatus } from "./errors";
import {
  ChartResponseSchema,
  QuoteSummaryResponseSchema,
  SearchResponseSchema,
  pickRaw,
  type ChartResponse,
  type QuoteSummaryModules,
  type SearchResponse,
} from "./yahoo_schemas";

const PROVIDER = "yahoo";

const COOKIE_URL = "https://fc.yahoo.com/";
const CRUMB_URL = "https://query2.finance.yahoo.com/v1/test/getcrumb";
const QUOTE_SUMMARY_URL =
  "https://query2.finance.yahoo.com/v10/finance/quoteSummary";
const CHART_URL = "https://query1.finance.yahoo.com/v8/finance/chart";
const SEARCH_URL = "https://query1.finance.yahoo.com/v1/finance/search";

const QUOTE_MODULES = [
  "price",
  "summaryDetail",
  "defaultKeyStatistics",
  "financialData",
  "assetProfile",
];

const HORIZON_RANGES: Record<Horizon, string> = {
  "1y": "1y",
  "1m": "1mo",
  "5d": "5d",
};

const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36";

export type FetchFn = (
  input: string,
  init?: RequestInit
) => Promise<Response>;

export interface YahooFinanceProviderOptions {
  fetch?: FetchFn;
  timeoutMs?: number;
  newsCount?: number;
}

interface YahooSession {
  cookie: string;
  crumb: string;
}

export class YahooFinanceProvider implements MarketDataProvider {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly newsCount: number;
  private readonly logger = getLogger("comparison/yahoo_provider");
  private session: Promise<YahooSession> | undefined;

  constructor(options: YahooFinanceProviderOptions = {}) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? 8000;
    this.newsCount = options.newsCount ?? 10;
  }

  async getQuote(ticker: string): Promise<RawQuote> {
    const [summary, history, news] = await Promise.all([
      this.fetchQuoteSummary(ticker),
      this.fetchHorizons(ticker),
      this.fetchNews(ticker),
    ]);

    const parsed = RawQuoteSchema.safeParse(
      toRawQuote(ticker, summary, history, news)
    );
    if (!parsed.success) {
      throw new MarketDataError(
        PROVIDER,
        "INVALID_RESPONSE",
        `quote for ${ticker} failed validation: ${parsed.error.message}`
      );
    }
    this.logger.debug(
      { ticker, news: news?.length ?? 0 },
      "yahoo quote fetched"
    );
    return parsed.data;
  }

  /**
   * Daily closes between `from` and `to` (inclusive), oldest first.
   */
  async getPriceHistory(params: {
    ticker: string;
    from: Date;
    to: Date;
  }): Promise<PricePoint[]> {
    const url = new URL(`${CHART_URL}/${encodeURIComponent(params.ticker)}`);
    url.searchParams.set("period1", String(toUnixSeconds(params.from)));
    url.searchParams.set("period2", String(toUnixSeconds(params.to) + 86400));
    url.searchParams.set("interval", "1d");
    const res = await this.getJson(url, ChartResponseSchema);
    return chartToPoints(params.ticker, res);
  }

  private async fetchQuoteSummary(
    ticker: string
  ): Promise<QuoteSummaryModules> {
    const session = await this.getSession();
    const url = new URL(`${QUOTE_SUMMARY_URL}/${encodeURIComponent(ticker)}`);
    url.searchParams.set("modules", QUOTE_MODULES.join(","));
    url.searchParams.set("crumb", session.crumb);

    let res: z.infer<typeof QuoteSummaryResponseSchema>;
    try {
      res = await this.getJson(url, QuoteSummaryResponseSchema, session.cookie);
    } catch (err) {
      if (err instanceof MarketDataError && err.code === "AUTH") {
        // Stale crumb: the next request opens a fresh session
        this.session = undefined;
      }
      throw err;
    }

    const modules = res.quoteSummary.result?.[0];
    if (!modules) {
      const reason = res.quoteSummary.error?.description ?? "empty result";
      throw new MarketDataError(
        PROVIDER,
        "NOT_FOUND",
        `no quote summary for ${ticker}: ${reason}`
      );
    }
    return modules;
  }

  private async fetchHorizons(
    ticker: string
  ): Promise<Partial<Record<Horizon, PricePoint[]>>> {
    const entries = await Promise.all(
      HORIZONS.map(async (horizon) => {
        const url = new URL(`${CHART_URL}/${encodeURIComponent(ticker)}`);
        url.searchParams.set("range", HORIZON_RANGES[horizon]);
        url.searchParams.set("interval", "1d");
        try {
          const res = await this.getJson(url, ChartResponseSchema);
          return [horizon, chartToPoints(ticker, res)] as const;
        } catch (err) {
          this.logger.warn({ ticker, horizon, err }, "yahoo history failed");
          return [horizon, undefined] as const;
        }
      })
    );

    const history: Partial<Record<Horizon, PricePoint[]>> = {};
    for (const [horizon, points] of entries) {
      if (points) history[horizon] = points;
    }
    return history;
  }

  private async fetchNews(ticker: string): Promise<RawHeadline[] | undefined> {
    const url = new URL(SEARCH_URL);
    url.searchParams.set("q", ticker);
    url.searchParams.set("quotesCount", "0");
    url.searchParams.set("newsCount", String(this.newsCount));
    try {
      const res = await this.getJson(url, SearchResponseSchema);
      return searchToHeadlines(res);
    } catch (err) {
      this.logger.warn({ ticker, err }, "yahoo news failed");
      return undefined;
    }
  }

  private getSession(): Promise<YahooSession> {
    if (!this.session) {
      const pending = this.openSession();
      pending.catch(() => {
        if (this.session === pending) this.session = undefined;
      });
      this.session = pending;
    }
    return this.session;
  }

  private async openSession(): Promise<YahooSession> {
    let cookie = "";
    try {
      // Responds 404 but still sets the consent cookie
      const res = await this.request(COOKIE_URL);
      cookie = res.headers
        .getSetCookie()
        .map((c) => c.split(";")[0])
        .join("; ");
    } catch (err) {
      this.logger.warn({ err }, "yahoo cookie request failed");
    }

    const res = await this.request(
      CRUMB_URL,
      cookie ? { Cookie: cookie } : {}
    );
    if (!res.ok) {
      throw new MarketDataError(
        PROVIDER,
        codeForStatus(res.status),
        `crumb request failed: HTTP ${res.status}`
      );
    }
    const crumb = (await res.text()).trim();
    if (!crumb || crumb.length > 50) {
      throw new MarketDataError(PROVIDER, "AUTH", "invalid crumb received");
    }
    return { cookie, crumb };
  }

  private async getJson<T>(
    url: URL,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    cookie?: string
  ): Promise<T> {
    const res = await this.request(
      url.toString(),
      cookie ? { Cookie: cookie } : {}
    );
    if (!res.ok) {
      throw new MarketDataError(
        PROVIDER,
        codeForStatus(res.status),
        `${url.pathname} failed: HTTP ${res.status}`
      );
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new MarketDataError(
        PROVIDER,
        "INVALID_RESPONSE",
        `${url.pathname} returned malformed JSON`,
        { cause: err }
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new MarketDataError(
        PROVIDER,
        "INVALID_RESPONSE",
        `${url.pathname} response failed validation: ${parsed.error.message}`
      );
    }
    return parsed.data;
  }

  private async request(
    url: string,
    headers: Record<string, string> = {}
  ): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await this.fetchFn(url, {
        signal: controller.signal,
        headers: {
          Accept: "application/json,text/plain;q=0.9,*/*;q=0.8",
          "User-Agent": USER_AGENT,
          "Accept-Language": "en-US,en;q=0.9",
          ...headers,
        },
      });
    } catch (err) {
      throw new MarketDataError(
        PROVIDER,
        "UPSTREAM",
        `request to ${new URL(url).host} failed`,
        { cause: err }
      );
    } finally {
      clearTimeout(timeout);
    }
  }
}

function toRawQuote(
  ticker: string,
  modules: QuoteSummaryModules,
  history: Partial<Record<Horizon, PricePoint[]>>,
  news: RawHeadline[] | undefined
): RawQuote {
  const { price, summaryDetail, defaultKeyStatistics, financialData } = modules;
  const profile = modules.assetProfile;
  return {
    symbol: ticker,
    shortName: price?.shortName ?? undefined,
    longName: price?.longName ?? undefined,
    spotPrice:
      pickRaw(price?.regularMarketPrice) ?? pickRaw(financialData?.currentPrice),
    previousClose:
      pickRaw(summaryDetail?.previousClose) ??
      pickRaw(price?.regularMarketPreviousClose),
    marketCap: pickRaw(summaryDetail?.marketCap) ?? pickRaw(price?.marketCap),
    trailingPE: pickRaw(summaryDetail?.trailingPE),
    pegRatio: pickRaw(defaultKeyStatistics?.pegRatio),
    forwardPE:
      pickRaw(summaryDetail?.forwardPE) ??
      pickRaw(defaultKeyStatistics?.forwardPE),
    priceToBook: pickRaw(defaultKeyStatistics?.priceToBook),
    enterpriseValue: pickRaw(defaultKeyStatistics?.enterpriseValue),
    ebitda: pickRaw(financialData?.ebitda),
    debtToEquity: pickRaw(financialData?.debtToEquity),
    currentRatio: pickRaw(financialData?.currentRatio),
    returnOnEquity: pickRaw(financialData?.returnOnEquity),
    fiftyTwoWeekHigh: pickRaw(summaryDetail?.fiftyTwoWeekHigh),
    fiftyTwoWeekLow: pickRaw(summaryDetail?.fiftyTwoWeekLow),
    averageVolume: pickRaw(summaryDetail?.averageVolume),
    dividendYield: pickRaw(summaryDetail?.dividendYield),
    beta: pickRaw(summaryDetail?.beta),
    recommendationMean: pickRaw(financialData?.recommendationMean),
    sector: profile?.sector ?? undefined,
    industry: profile?.industry ?? undefined,
    fullTimeEmployees: pickRaw(profile?.fullTimeEmployees),
    news,
    history,
  };
}

export function chartToPoints(
  ticker: string,
  res: ChartResponse
): PricePoint[] {
  const result = res.chart.result?.[0];
  if (!result) {
    const reason = res.chart.error?.description ?? "empty result";
    throw new MarketDataError(
      PROVIDER,
      "NOT_FOUND",
      `no chart for ${ticker}: ${reason}`
    );
  }
  const timestamps = result.timestamp ?? [];
  const closes = result.indicators.quote[0]?.close ?? [];
  const points: PricePoint[] = [];
  timestamps.forEach((ts, i) => {
    const close = closes[i];
    if (close == null || !Number.isFinite(close)) return;
    points.push({ date: toIsoDate(new Date(ts * 1000)), close });
  });
  return points;
}

function searchToHeadlines(res: SearchResponse): RawHeadline[] {
  return (res.news ?? []).map((item) => ({
    title: item.title ?? undefined,
    publisher: item.publisher ?? undefined,
    link: item.link ?? undefined,
    publishedAt:
      item.providerPublishTime != null
        ? new Date(item.providerPublishTime * 1000).toISOString()
        : undefined,
  }));
}

function toUnixSeconds(d: Date): number {
  return Math.floor(d.getTime() / 1000);
}

function toIsoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}
