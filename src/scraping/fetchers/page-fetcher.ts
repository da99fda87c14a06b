/**
 * Page Fetcher
 *
 * Downloads the raw HTML of a viking file page.
 * The scraper only knows the PageFetcher interface, so tests and
 * batch runs can substitute their own implementation.
 */
import axios from "axios";
import config from "../../config";
import { logger } from "../../monitoring/logger";
import { FetchFailedError, FetchTimeoutError } from "../../shared/errors/scrape.errors";
import { retryWithBackoff } from "../../shared/utils/retry";

export interface PageFetcher {
  /**
   * @throws FetchFailedError on connection errors and non-2xx responses
   * @throws FetchTimeoutError when `timeoutMs` elapses first
   */
  fetch(url: string, timeoutMs: number): Promise<string>;
}

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

export class HttpPageFetcher implements PageFetcher {
  private readonly userAgent: string;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(
    userAgent: string = config.userAgent,
    maxAttempts: number = config.fetchMaxAttempts,
    retryDelayMs: number = config.fetchRetryDelayMs
  ) {
    this.userAgent = userAgent;
    this.maxAttempts = maxAttempts;
    this.retryDelayMs = retryDelayMs;
  }

  async fetch(url: string, timeoutMs: number): Promise<string> {
    return retryWithBackoff(() => this.fetchOnce(url, timeoutMs), {
      maxAttempts: this.maxAttempts,
      initialDelayMs: this.retryDelayMs,
      label: "Page fetch",
      // 4xx will not change on retry
      shouldRetry: (error) =>
        !(error instanceof FetchFailedError && error.status !== undefined && error.status < 500),
    });
  }

  private async fetchOnce(url: string, timeoutMs: number): Promise<string> {
    try {
      const response = await axios.get<string>(url, {
        timeout: timeoutMs,
        responseType: "text",
        headers: {
          "User-Agent": this.userAgent,
          Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
          "Accept-Language": "en-US,en;q=0.5",
        },
      });

      logger.debug(
        { url, status: response.status, length: response.data.length },
        "Page fetched"
      );
      return response.data;
    } catch (error) {
      throw toFetchError(url, error);
    }
  }
}

function toFetchError(url: string, error: unknown): FetchFailedError {
  if (axios.isAxiosError(error)) {
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new FetchTimeoutError(`Timed out fetching ${url}`);
    }
    if (error.response) {
      return new FetchFailedError(
        `HTTP ${error.response.status} fetching ${url}`,
        error.response.status
      );
    }
    return new FetchFailedError(`Network error fetching ${url}: ${error.message}`);
  }
  return new FetchFailedError(
    `Failed fetching ${url}: ${error instanceof Error ? error.message : String(error)}`
  );
}
