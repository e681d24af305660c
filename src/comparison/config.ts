import { z } from "zod";
import { getList, getNumber, getString } from "@src/util/env";

export const ComparisonConfigSchema = z.object({
  domesticSuffixes: z.array(z.string().min(1)).min(1),
  currencySymbols: z.object({
    domestic: z.string().min(1),
    foreign: z.string().min(1),
  }),
  researchPortalUrl: z.string().url(),
  researchPortalLabel: z.string().min(1),
  genericPublisherLabel: z.string().min(1),
  webSearchUrl: z.string().url(),
  newsLimit: z.number().int().min(0).max(20),
  timeoutMs: z.number().int().positive(),
});

export type ComparisonConfig = z.infer<typeof ComparisonConfigSchema>;

export const DEFAULT_COMPARISON_CONFIG: ComparisonConfig = {
  domesticSuffixes: [".NS", ".BO"],
  currencySymbols: { domestic: "₹", foreign: "$" },
  researchPortalUrl:
    "https://www.moneycontrol.com/stocks/cptmarket/compsearchnew.php",
  researchPortalLabel: "Moneycontrol",
  genericPublisherLabel: "Market News",
  webSearchUrl: "https://www.google.com/search",
  newsLimit: 3,
  timeoutMs: 8000,
};

export function loadComparisonConfig(): ComparisonConfig {
  const defaults = DEFAULT_COMPARISON_CONFIG;
  return ComparisonConfigSchema.parse({
    domesticSuffixes: getList(
      "COMPARE_DOMESTIC_SUFFIXES",
      defaults.domesticSuffixes
    ),
    currencySymbols: {
      domestic: getString(
        "COMPARE_DOMESTIC_CURRENCY",
        defaults.currencySymbols.domestic
      ),
      foreign: getString(
        "COMPARE_FOREIGN_CURRENCY",
        defaults.currencySymbols.foreign
      ),
    },
    researchPortalUrl: getString(
      "COMPARE_RESEARCH_PORTAL_URL",
      defaults.researchPortalUrl
    ),
    researchPortalLabel: getString(
      "COMPARE_RESEARCH_PORTAL_LABEL",
      defaults.researchPortalLabel
    ),
    genericPublisherLabel: getString(
      "COMPARE_GENERIC_PUBLISHER_LABEL",
      defaults.genericPublisherLabel
    ),
    webSearchUrl: getString("COMPARE_WEB_SEARCH_URL", defaults.webSearchUrl),
    newsLimit: getNumber("COMPARE_NEWS_LIMIT", defaults.newsLimit),
    timeoutMs: getNumber("COMPARE_TIMEOUT_MS", defaults.timeoutMs),
  });
}
