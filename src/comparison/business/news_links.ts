/**
 * Turns provider headlines into news items whose links always open.
 *
 * Domestic tickers are pointed at the research portal search for the company,
 * discarding the provider's per-article link. Foreign tickers keep the
 * provider link. Whatever link is chosen must be an absolute, non-loopback
 * URL, otherwise it is replaced by a web search for the headline.
 */
import type { RawHeadline } from "../domain/raw_quote";
import type { MarketRegion, NewsItem } from "../domain/types";

export interface NewsLinkSettings {
  researchPortalUrl: string;
  researchPortalLabel: string;
  genericPublisherLabel: string;
  webSearchUrl: string;
  newsLimit: number;
}

export interface NewsContext {
  region: MarketRegion;
  companyName: string;
}

export function researchPortalUrl(
  companyName: string,
  settings: Pick<NewsLinkSettings, "researchPortalUrl">
): string {
  const q = encodeQuery(companyName);
  return `${settings.researchPortalUrl}?search_data=${q}&topsearch_type=1&search_str=${q}`;
}

export function webSearchUrl(
  query: string,
  settings: Pick<NewsLinkSettings, "webSearchUrl">
): string {
  return `${settings.webSearchUrl}?q=${encodeQuery(query)}`;
}

// Unpaired UTF-16 surrogates make encodeURIComponent throw
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

function encodeQuery(value: string): string {
  return encodeURIComponent(value.replace(LONE_SURROGATE, "\uFFFD"));
}

export function isValidLink(link: string | undefined): link is string {
  if (!link) return false;
  let parsed: URL;
  try {
    parsed = new URL(link);
  } catch {
    return false;
  }
  if (!parsed.protocol || !parsed.hostname) return false;
  return !isLoopbackHost(parsed.hostname);
}

function isLoopbackHost(hostname: string): boolean {
  const host = hostname.toLowerCase();
  return (
    host === "localhost" ||
    host.endsWith(".localhost") ||
    /^127(?:\.\d{1,3}){3}$/.test(host) ||
    host === "[::1]"
  );
}

export function resolveNewsItem(
  raw: RawHeadline,
  context: NewsContext,
  settings: NewsLinkSettings
): NewsItem {
  const isDomestic = context.region === "domestic";
  const title = nonEmpty(raw.title) ?? `${context.companyName} News`;
  const publisher =
    nonEmpty(raw.publisher) ??
    (isDomestic ? settings.researchPortalLabel : settings.genericPublisherLabel);

  const portal = researchPortalUrl(context.companyName, settings);
  const candidate = isDomestic ? portal : raw.link?.trim();
  const link = isValidLink(candidate)
    ? candidate
    : webSearchUrl(title, settings);

  return {
    title,
    link,
    publisher,
    isResearchPortal: isDomestic && link === portal,
  };
}

/**
 * Resolves at most `newsLimit` items. A domestic ticker without headlines
 * still gets one research portal entry; a foreign one gets none.
 */
export function resolveNewsItems(
  raws: readonly RawHeadline[] | undefined,
  context: NewsContext,
  settings: NewsLinkSettings
): NewsItem[] {
  const items = (raws ?? [])
    .slice(0, settings.newsLimit)
    .map((raw) => resolveNewsItem(raw, context, settings));

  if (items.length === 0 && context.region === "domestic") {
    return [resolveNewsItem({}, context, settings)];
  }
  return items;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
