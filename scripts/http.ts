import { isRecord } from "./extract";
import { sleep } from "./rate_limiter";
import type { JsonObject } from "./types";

export class HttpRequestError extends Error {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HttpRequestError";
  }
}

export type GetJsonOptions = {
  params?: Record<string, string | number | undefined>;
  headers?: Record<string, string>;
  timeoutMs: number;
  // Extra attempts after the first; only transport failures and 5xx are retried
  retries?: number;
  retryWaitMs?: number;
  // How much of an error body ends up in the message
  snippetLength?: number;
  wait?: (ms: number) => Promise<void>;
};

function buildUrl(url: string, params: GetJsonOptions["params"]): string {
  if (!params) return url;
  const u = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    u.searchParams.set(key, String(value));
  }
  return u.toString();
}

/**
 * GET a JSON object with a fixed-wait retry loop. Errors surface as
 * HttpRequestError so callers can record the message against the row.
 */
export async function getJson(url: string, options: GetJsonOptions): Promise<JsonObject> {
  const target = buildUrl(url, options.params);
  const attempts = Math.max(1, (options.retries ?? 0) + 1);
  const wait = options.wait ?? sleep;
  const retryWaitMs = options.retryWaitMs ?? 0;
  const snippetLength = options.snippetLength ?? 1000;
  const headers = { Accept: "application/json", ...options.headers };

  for (let attempt = 1; attempt <= attempts; attempt++) {
    let res: Response;
    let text: string;
    // A body that fails mid-read counts as a transport failure
    try {
      res = await fetch(target, { headers, signal: AbortSignal.timeout(options.timeoutMs) });
      if (res.status >= 500 && attempt < attempts) {
        await res.body?.cancel();
        await wait(retryWaitMs);
        continue;
      }
      text = await res.text();
    } catch (e) {
      if (attempt === attempts) {
        const msg = e instanceof Error ? e.message : String(e);
        throw new HttpRequestError(`Request to ${url} failed: ${msg}`, undefined, { cause: e });
      }
      await wait(retryWaitMs);
      continue;
    }

    if (res.status >= 400) {
      throw new HttpRequestError(
        `Request to ${url} failed with HTTP ${res.status}: ${text.slice(0, snippetLength)}`,
        res.status
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (e) {
      throw new HttpRequestError(`Invalid JSON returned by ${url}`, res.status, { cause: e });
    }
    if (!isRecord(data)) {
      throw new HttpRequestError(`Expected a JSON object from ${url}`, res.status);
    }
    return data;
  }

  // The loop either returns or throws on its last attempt
  throw new HttpRequestError(`Request to ${url} failed for an unknown reason`);
}
