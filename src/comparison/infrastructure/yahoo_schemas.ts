/**
 * Response shapes of the public Yahoo Finance JSON endpoints. Only the
 * fields the comparison reads are declared; everything is optional.
 */
import { z } from "zod";

// quoteSummary numbers arrive as { raw, fmt }, as a bare number, or as {}
const YahooNumber = z
  .union([
    z.number(),
    z.object({ raw: z.number().optional() }).passthrough(),
  ])
  .nullish();

export type YahooNumberValue = z.infer<typeof YahooNumber>;

export function pickRaw(value: YahooNumberValue): number | undefined {
  if (value == null) return undefined;
  const n = typeof value === "number" ? value : value.raw;
  return n !== undefined && Number.isFinite(n) ? n : undefined;
}

const YahooError = z
  .object({ code: z.string().optional(), description: z.string().optional() })
  .nullish();

export const QuoteSummaryModulesSchema = z.object({
  price: z
    .object({
      regularMarketPrice: YahooNumber,
      regularMarketPreviousClose: YahooNumber,
      marketCap: YahooNumber,
      shortName: z.string().nullish(),
      longName: z.string().nullish(),
    })
    .passthrough()
    .optional(),
  summaryDetail: z
    .object({
      previousClose: YahooNumber,
      trailingPE: YahooNumber,
      forwardPE: YahooNumber,
      marketCap: YahooNumber,
      fiftyTwoWeekHigh: YahooNumber,
      fiftyTwoWeekLow: YahooNumber,
      averageVolume: YahooNumber,
      dividendYield: YahooNumber,
      beta: YahooNumber,
    })
    .passthrough()
    .optional(),
  defaultKeyStatistics: z
    .object({
      pegRatio: YahooNumber,
      priceToBook: YahooNumber,
      enterpriseValue: YahooNumber,
      forwardPE: YahooNumber,
    })
    .passthrough()
    .optional(),
  financialData: z
    .object({
      currentPrice: YahooNumber,
      ebitda: YahooNumber,
      debtToEquity: YahooNumber,
      currentRatio: YahooNumber,
      returnOnEquity: YahooNumber,
      recommendationMean: YahooNumber,
    })
    .passthrough()
    .optional(),
  assetProfile: z
    .object({
      sector: z.string().nullish(),
      industry: z.string().nullish(),
      fullTimeEmployees: YahooNumber,
    })
    .passthrough()
    .optional(),
});

export type QuoteSummaryModules = z.infer<typeof QuoteSummaryModulesSchema>;

export const QuoteSummaryResponseSchema = z.object({
  quoteSummary: z.object({
    result: z.array(QuoteSummaryModulesSchema).nullish(),
    error: YahooError,
  }),
});

export const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).nullish(),
          indicators: z.object({
            quote: z.array(
              z.object({ close: z.array(z.number().nullable()).nullish() })
            ),
          }),
        })
      )
      .nullish(),
    error: YahooError,
  }),
});

export type ChartResponse = z.infer<typeof ChartResponseSchema>;

export const SearchResponseSchema = z.object({
  news: z
    .array(
      z
        .object({
          title: z.string().nullish(),
          publisher: z.string().nullish(),
          link: z.string().nullish(),
          providerPublishTime: z.number().nullish(),
        })
        .passthrough()
    )
    .nullish(),
});

export type SearchResponse = z.infer<typeof SearchResponseSchema>;
