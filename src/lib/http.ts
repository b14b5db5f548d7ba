import { setTimeout as sleep } from "node:timers/promises";
import { HttpError, errorMessage } from "./errors.js";

export type Fetcher = (url: string, accept?: string) => Promise<string>;

export type FetcherOptions = {
  userAgent: string;
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  fetchImpl?: typeof fetch;
};

export const ACCEPT_XML =
  "application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.1";
export const ACCEPT_HTML = "text/html, application/xhtml+xml;q=0.9, */*;q=0.1";
export const ACCEPT_TEXT = "text/plain, */*;q=0.1";

type Fetched = { ok: boolean; status: number; body: string };

// The body is read under the same deadline as the headers: a server that
// stalls mid-body must still time out.
async function readBody(response: Response, signal: AbortSignal, timeoutMs: number): Promise<string> {
  let fail: (error: Error) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    fail = reject;
  });
  const onAbort = () => fail(new Error(`Timed out after ${timeoutMs}ms`));
  if (signal.aborted) onAbort();
  else signal.addEventListener("abort", onAbort, { once: true });
  try {
    return await Promise.race([response.text(), aborted]);
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}

async function fetchWithTimeout(
  fetchImpl: typeof fetch,
  url: string,
  options: RequestInit,
  timeoutMs: number
): Promise<Fetched> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetchImpl(url, { ...options, signal: controller.signal });
    if (!response.ok) return { ok: false, status: response.status, body: "" };
    return {
      ok: true,
      status: response.status,
      body: await readBody(response, controller.signal, timeoutMs)
    };
  } finally {
    clearTimeout(timeout);
  }
}

function isRetryableStatus(status: number) {
  return status === 429 || status >= 500;
}

/**
 * Builds the GET-as-text transport used by every pipeline stage.
 * Network errors, timeouts (headers or body), 429 and 5xx are retried
 * `retries` times with linear backoff; other non-2xx statuses fail on the
 * first attempt.
 */
export function createFetcher(options: FetcherOptions): Fetcher {
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (url, accept = ACCEPT_XML) => {
    let lastError: HttpError | null = null;

    for (let attempt = 0; attempt <= options.retries; attempt += 1) {
      if (attempt > 0 && options.backoffMs > 0) {
        await sleep(options.backoffMs * attempt);
      }

      let response: Fetched;
      try {
        response = await fetchWithTimeout(
          fetchImpl,
          url,
          {
            headers: {
              "User-Agent": options.userAgent,
              Accept: accept,
              "Accept-Encoding": "gzip, deflate"
            },
            redirect: "follow"
          },
          options.timeoutMs
        );
      } catch (error) {
        lastError = new HttpError(`Request failed for ${url}: ${errorMessage(error)}`, url, null);
        continue;
      }

      if (!response.ok) {
        lastError = new HttpError(`HTTP ${response.status} for ${url}`, url, response.status);
        if (isRetryableStatus(response.status)) continue;
        throw lastError;
      }
      return response.body;
    }

    throw lastError ?? new HttpError(`Request failed for ${url}`, url, null);
  };
}
