import { describeError, FetchError } from "./errors.js";
import { logger } from "./logger.js";
import { DEFAULT_FETCH_TIMEOUT, DEFAULT_USER_AGENT } from "./config.js";

export interface FetchOptions {
  timeoutMs?: number;
  userAgent?: string;
}

export type PageFetcher = (url: string) => Promise<string | null>;

export async function requestPage(url: string, options: FetchOptions = {}): Promise<string> {
  const timeout = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeout);
  try {
    const response = await fetch(url, {
      headers: {
        "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: "text/html,application/xhtml+xml",
      },
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new FetchError(url, `HTTP ${response.status}`, response.status);
    }
    return await response.text();
  } catch (error) {
    if (error instanceof FetchError) {
      throw error;
    }
    const reason = controller.signal.aborted ? `timed out after ${timeout}ms` : describeError(error);
    throw new FetchError(url, reason);
  } finally {
    clearTimeout(timer);
  }
}

/** Fetch failures are logged and reported as `null`; they never end a run. */
export async function fetchPage(url: string, options: FetchOptions = {}): Promise<string | null> {
  try {
    return await requestPage(url, options);
  } catch (error) {
    if (error instanceof FetchError && error.status !== undefined) {
      logger.warn("Page fetch failed", { url, status: error.status });
    } else {
      logger.error("Page fetch error", { url, error: describeError(error) });
    }
    return null;
  }
}

export function createPageFetcher(options: FetchOptions): PageFetcher {
  return (url) => fetchPage(url, options);
}
