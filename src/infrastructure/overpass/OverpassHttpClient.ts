import { isRequestError, type OverpassClient, type OverpassRequestError } from "../../ports/OverpassClient";
import { retry } from "../../shared/retry/retry";

export const DEFAULT_OVERPASS_TIMEOUT_MS = 30000;

const requestError = (message: string, fields: Omit<OverpassRequestError, "name" | "message">) =>
  Object.assign(new Error(message), fields) satisfies OverpassRequestError;

/**
 * Overpass API client using native fetch (Node 20). Each attempt is bounded
 * by `timeoutMs`; `retries` extra attempts are made for timeouts, 429 and
 * 5xx answers.
 */
export class OverpassHttpClient implements OverpassClient {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = DEFAULT_OVERPASS_TIMEOUT_MS,
    private readonly retries = 0
  ) {}

  async query(overpassQl: string): Promise<unknown> {
    const url = new URL(this.baseUrl);
    url.searchParams.set("data", overpassQl);
    const safeRequestUrl = `${url.origin}${url.pathname}`;

    const doFetch = async (): Promise<unknown> => {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      let res: Response;
      let body: string;
      try {
        res = await fetch(url.toString(), {
          headers: { accept: "application/json" },
          signal: controller.signal
        });
        body = await res.text();
      } catch (err) {
        if (controller.signal.aborted) {
          throw requestError(`Overpass request timeout after ${this.timeoutMs}ms`, {
            isTimeout: true,
            requestUrl: safeRequestUrl
          });
        }
        throw err;
      } finally {
        clearTimeout(timeout);
      }

      if (!res.ok) {
        const err: OverpassRequestError = requestError(`Overpass request failed: ${res.status}`, {
          status: res.status,
          requestUrl: safeRequestUrl
        });
        if (res.status === 429) {
          const retryAfter = res.headers.get("retry-after");
          if (retryAfter && /^\d+$/.test(retryAfter)) {
            err.retryDelayMs = Number(retryAfter) * 1000;
          }
        }
        throw err;
      }

      if (body.trim() === "") {
        throw requestError("Overpass response body is empty", { isEmptyBody: true, requestUrl: safeRequestUrl });
      }

      try {
        return JSON.parse(body);
      } catch {
        throw requestError("Overpass response is not valid JSON", {
          isMalformedBody: true,
          requestUrl: safeRequestUrl
        });
      }
    };

    return retry(doFetch, {
      retries: this.retries,
      minDelayMs: 500,
      maxDelayMs: 5000,
      onRetry: ({ attempt, maxAttempts, error }) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "http.retry",
          status: statusOf(error),
          url: safeRequestUrl,
          attempt,
          maxAttempts
        }));
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "http.give_up",
          status: statusOf(error),
          url: safeRequestUrl,
          attempt,
          maxAttempts
        }));
      },
      shouldRetry: (err) => {
        if (!isRequestError(err)) return true;
        if (err.isTimeout) return true;
        if (err.isEmptyBody || err.isMalformedBody) return false;

        const status = err.status;
        if (status === 429) {
          return { retry: true, delayMs: err.retryDelayMs };
        }
        if (typeof status === "number" && status >= 400 && status < 500) return false;
        if (typeof status === "number" && status >= 500) return true;
        if (typeof status === "number") return false;
        return true;
      }
    });
  }
}

const statusOf = (err: unknown): number | null => (isRequestError(err) ? err.status ?? null : null);
