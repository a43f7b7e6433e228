export type QuoteProviderErrorReason =
  | 'timeout'
  | 'http_error'
  | 'network_error'
  | 'parse_error'
  | 'retry_exhausted';

export interface QuoteProviderErrorPayload {
  source: string;
  reason: QuoteProviderErrorReason;
  message: string;
  attempts: number;
  status?: number;
}

export class QuoteProviderError extends Error {
  public readonly payload: QuoteProviderErrorPayload;
  public readonly cause?: unknown;

  constructor(payload: QuoteProviderErrorPayload, cause?: unknown) {
    super(payload.message);
    this.name = 'QuoteProviderError';
    this.payload = payload;
    this.cause = cause;
  }
}

export function isQuoteProviderError(value: unknown): value is QuoteProviderError {
  return value instanceof QuoteProviderError;
}
