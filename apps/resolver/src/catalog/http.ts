import { AuthError, NetworkError, NotFoundError } from "../lib/errors";
import { logEvent, readErrorMessage } from "../lib/logger";

export type FetchFn = typeof fetch;

export type FetchJsonOptions = {
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  maxRetryAfterMs?: number;
  context?: Record<string, unknown>;
  fetchImpl?: FetchFn;
};

type NormalizedFetchJsonOptions = Required<Omit<FetchJsonOptions, "fetchImpl">> & {
  fetchImpl: FetchFn | null;
};

function normalizeOptions(timeoutOrOptions?: number | FetchJsonOptions): NormalizedFetchJsonOptions {
  if (typeof timeoutOrOptions === "number") {
    return {
      timeoutMs: timeoutOrOptions,
      retries: 0,
      retryDelayMs: 250,
      maxRetryAfterMs: 10_000,
      context: {},
      fetchImpl: null,
    };
  }

  return {
    timeoutMs: timeoutOrOptions?.timeoutMs ?? 8_000,
    retries: Math.max(0, timeoutOrOptions?.retries ?? 2),
    retryDelayMs: Math.max(0, timeoutOrOptions?.retryDelayMs ?? 250),
    maxRetryAfterMs: Math.max(0, timeoutOrOptions?.maxRetryAfterMs ?? 10_000),
    context: timeoutOrOptions?.context ?? {},
    fetchImpl: timeoutOrOptions?.fetchImpl ?? null,
  };
}

function shouldRetryStatus(status: number) {
  return status === 408 || status === 429 || status >= 500;
}

export function sanitizeUrlForLogs(rawUrl: string) {
  try {
    const parsed = new URL(rawUrl);
    const sensitiveKeys = ["key", "api_key", "apikey", "token", "access_token", "client_secret", "authorization"];

    for (const sensitiveKey of sensitiveKeys) {
      if (parsed.searchParams.has(sensitiveKey)) {
        parsed.searchParams.set(sensitiveKey, "[redacted]");
      }
    }

    return parsed.toString();
  } catch {
    return rawUrl.replace(/(key|token|access_token|client_secret)=([^&]+)/gi, "$1=[redacted]");
  }
}

function readRetryAfterMs(response: Response) {
  const raw = response.headers.get("retry-after");
  if (!raw) return null;
  const seconds = Number.parseFloat(raw);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1_000);
  const dateMs = Date.parse(raw);
  if (Number.isFinite(dateMs)) return Math.max(0, dateMs - Date.now());
  return null;
}

function delayMs(baseMs: number, attempt: number) {
  const jitter = baseMs > 0 ? Math.floor(Math.random() * 60) : 0;
  return baseMs * 2 ** attempt + jitter;
}

async function wait(ms: number) {
  if (ms <= 0) return;
  await new Promise((resolve) => setTimeout(resolve, ms));
}

function errorForStatus(status: number, url: string) {
  if (status === 404 || status === 400) {
    return new NotFoundError(`Catalog has no entity at ${url} (HTTP ${status})`);
  }
  if (status === 401 || status === 403) {
    return new AuthError(`Catalog refused the request to ${url} (HTTP ${status})`);
  }
  return new NetworkError(`Catalog request to ${url} failed with HTTP ${status}`, status);
}

/**
 * GET/POST a JSON document. Retries timeouts, transport errors and
 * 408/429/5xx with exponential backoff; every other non-2xx status is thrown
 * right away as a NotFoundError, AuthError or NetworkError.
 */
export async function fetchJsonWithTimeout(
  input: string | URL,
  init: RequestInit = {},
  timeoutOrOptions: number | FetchJsonOptions = 8_000,
): Promise<unknown> {
  const options = normalizeOptions(timeoutOrOptions);
  const fetchImpl = options.fetchImpl ?? globalThis.fetch;
  const url = typeof input === "string" ? input : input.toString();
  const logUrl = sanitizeUrlForLogs(url);
  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= options.retries; attempt += 1) {
    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort();
    }, options.timeoutMs);

    let retryAfterMs: number | null = null;
    try {
      const response = await fetchImpl(input, {
        ...init,
        signal: controller.signal,
      });

      if (response.ok) {
        if (response.status === 204) return null;
        return (await response.json()) as unknown;
      }

      const retryable = shouldRetryStatus(response.status);
      if (!retryable || attempt >= options.retries) {
        logEvent("warn", "catalog_http_non_ok", {
          url: logUrl,
          status: response.status,
          attempt: attempt + 1,
          ...options.context,
        });
        throw errorForStatus(response.status, logUrl);
      }

      retryAfterMs = readRetryAfterMs(response);
      logEvent("warn", "catalog_http_retry_status", {
        url: logUrl,
        status: response.status,
        attempt: attempt + 1,
        retries: options.retries + 1,
        retryAfterMs,
        ...options.context,
      });
    } catch (error) {
      if (error instanceof NotFoundError || error instanceof AuthError || error instanceof NetworkError) {
        throw error;
      }

      const message = controller.signal.aborted ? `TIMEOUT_${options.timeoutMs}MS` : readErrorMessage(error);
      lastError = error instanceof Error ? error : new Error(message);
      if (attempt >= options.retries) {
        logEvent("warn", "catalog_http_failure", {
          url: logUrl,
          attempt: attempt + 1,
          retries: options.retries + 1,
          error: message,
          ...options.context,
        });
        throw new NetworkError(`Catalog request to ${logUrl} failed: ${message}`, null, { cause: lastError });
      }

      logEvent("warn", "catalog_http_retry_error", {
        url: logUrl,
        attempt: attempt + 1,
        retries: options.retries + 1,
        error: message,
        ...options.context,
      });
    } finally {
      clearTimeout(timeout);
    }

    const backoff = delayMs(options.retryDelayMs, attempt);
    await wait(retryAfterMs === null ? backoff : Math.min(Math.max(retryAfterMs, backoff), options.maxRetryAfterMs));
  }

  throw new NetworkError(`Catalog request to ${logUrl} failed`, null, { cause: lastError });
}

/**
 * Follows the redirects of a HEAD request and returns the final url. A
 * response that was not redirected is an error, since the caller expects a
 * shortener.
 */
export async function resolveRedirect(url: string, timeoutMs: number, fetchImpl: FetchFn = globalThis.fetch) {
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort();
  }, timeoutMs);

  try {
    const response = await fetchImpl(url, {
      method: "HEAD",
      redirect: "follow",
      signal: controller.signal,
    });

    if (!response.redirected || !response.url || response.url === url) {
      throw new NetworkError(`Expected a redirect from ${url} (HTTP ${response.status})`, response.status);
    }

    return response.url;
  } catch (error) {
    if (error instanceof NetworkError) throw error;
    const message = controller.signal.aborted ? `TIMEOUT_${timeoutMs}MS` : readErrorMessage(error);
    logEvent("warn", "short_link_resolve_failed", {
      url: sanitizeUrlForLogs(url),
      error: message,
    });
    throw new NetworkError(`Could not resolve ${url}: ${message}`, null, { cause: error });
  } finally {
    clearTimeout(timeout);
  }
}
