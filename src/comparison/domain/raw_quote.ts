/**
 * Provider-facing quote schema. Every attribute except the symbol may be
 * absent; the engine decides what absence means.
 */
import { z } from "zod";

export const HORIZONS = ["1y", "1m", "5d"] as const;
export type Horizon = (typeof HORIZONS)[number];

const numeric = z.number().finite().optional();

export const PricePointSchema = z.object({
  date: z.string(), // YYYY-MM-DD
  close: z.number().finite(),
});

export const RawHeadlineSchema = z.object({
  title: z.string().optional(),
  publisher: z.string().optional(),
  link: z.string().optional(),
  publishedAt: z.string().optional(), // ISO8601
});

export const RawQuoteSchema = z.object({
  symbol: z.string().min(1),
  shortName: z.string().optional(),
  longName: z.string().optional(),
  spotPrice: numeric,
  previousClose: numeric,
  marketCap: numeric,
  trailingPE: numeric,
  pegRatio: numeric,
  forwardPE: numeric,
  priceToBook: numeric,
  enterpriseValue: numeric,
  ebitda: numeric,
  debtToEquity: numeric,
  currentRatio: numeric,
  returnOnEquity: numeric,
  fiftyTwoWeekHigh: numeric,
  fiftyTwoWeekLow: numeric,
  averageVolume: numeric,
  dividendYield: numeric,
  beta: numeric,
  recommendationMean: numeric,
  sector: z.string().optional(),
  industry: z.string().optional(),
  fullTimeEmployees: numeric,
  news: z.array(RawHeadlineSchema).optional(),
  history: z
    .object({
      "1y": z.array(PricePointSchema).optional(),
      "1m": z.array(PricePointSchema).optional(),
      "5d": z.array(PricePointSchema).optional(),
    })
    .optional(),
});

export type PricePoint = z.infer<typeof PricePointSchema>;
export type RawHeadline = z.infer<typeof RawHeadlineSchema>;
export type RawQuote = z.infer<typeof RawQuoteSchema>;
