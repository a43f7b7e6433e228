import { QuoteProviderError, QuoteProviderErrorReason } from './quote-provider.error';

export interface FetchPolicy {
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface FetchDependencies {
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export interface FetchRequest {
  source: string;
  url: string;
  headers?: Record<string, string>;
}

const RETRIABLE_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export function backoffDelay(attempt: number, policy: FetchPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

function providerError(
  request: FetchRequest,
  attempts: number,
  reason: QuoteProviderErrorReason,
  message: string,
  status?: number,
  cause?: unknown,
): QuoteProviderError {
  return new QuoteProviderError({ source: request.source, reason, message, attempts, status }, cause);
}

/**
 * GET with a per-attempt timeout and exponential backoff on network
 * failures and retriable HTTP statuses.
 * @throws QuoteProviderError
 */
export async function fetchTextWithPolicy(
  request: FetchRequest,
  policy: FetchPolicy,
  dependencies: FetchDependencies = {},
): Promise<string> {
  const fetchImpl = dependencies.fetchImpl ?? fetch;
  const sleep = dependencies.sleep ?? defaultSleep;
  let lastError: QuoteProviderError | null = null;

  for (let attempt = 0; attempt <= policy.maxRetries; attempt += 1) {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), policy.timeoutMs);

    try {
      const response = await fetchImpl(request.url, { headers: request.headers, signal: controller.signal });
      if (!response.ok) {
        const error = providerError(
          request,
          attempt + 1,
          'http_error',
          `Upstream returned HTTP ${response.status}`,
          response.status,
        );
        if (!RETRIABLE_STATUSES.has(response.status)) {
          throw error;
        }
        lastError = error;
      } else {
        return await response.text();
      }
    } catch (error: unknown) {
      if (error instanceof QuoteProviderError) {
        throw error;
      }
      const reason: QuoteProviderErrorReason = isAbortError(error) ? 'timeout' : 'network_error';
      lastError = providerError(
        request,
        attempt + 1,
        reason,
        reason === 'timeout' ? 'Upstream request timed out' : 'Upstream request failed',
        undefined,
        error,
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (attempt < policy.maxRetries) {
      await sleep(backoffDelay(attempt, policy));
    }
  }

  if (lastError && policy.maxRetries === 0) {
    throw lastError;
  }
  throw providerError(
    request,
    policy.maxRetries + 1,
    'retry_exhausted',
    `Retry limit exhausted for ${request.source}`,
    lastError?.payload.status,
    lastError,
  );
}

/** Same as fetchTextWithPolicy, parsed as JSON of unknown shape. */
export async function fetchJsonWithPolicy(
  request: FetchRequest,
  policy: FetchPolicy,
  dependencies: FetchDependencies = {},
): Promise<unknown> {
  const text = await fetchTextWithPolicy(request, policy, dependencies);
  try {
    return JSON.parse(text);
  } catch (error: unknown) {
    throw providerError(request, 1, 'parse_error', 'Failed to parse upstream JSON payload', undefined, error);
  }
}
