export type MarketDataErrorCode =
  | "NOT_FOUND"
  | "RATE_LIMIT"
  | "AUTH"
  | "UPSTREAM"
  | "INVALID_RESPONSE";

export class MarketDataError extends Error {
  constructor(
    readonly provider: string,
    readonly code: MarketDataErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "MarketDataError";
  }
}

export function codeForStatus(status: number): MarketDataErrorCode {
  if (status === 404) return "NOT_FOUND";
  if (status === 429) return "RATE_LIMIT";
  if (status === 401 || status === 403) return "AUTH";
  return "UPSTREAM";
}
