/**
 * Batch Runner
 *
 * Scrapes many viking pages with a fixed number of concurrent workers.
 * Calls share no state beyond the rate limiter, so one URL failing
 * (e.g. no identifier) is recorded against that URL and the rest go on.
 * Results come back in input order.
 */
import config from "../config";
import { logger } from "../monitoring/logger";
import type { ExtractionOutcome } from "../shared/types/viking.types";
import { VikingFileScraper } from "../scraping/viking-file.scraper";
import { RateLimiter } from "./rate-limiter";

export type BatchItemResult =
  | { url: string; ok: true; outcome: ExtractionOutcome }
  | { url: string; ok: false; error: Error };

export interface BatchOptions {
  concurrency?: number;
  rateLimiter?: RateLimiter;
}

export async function runBatch(
  scraper: VikingFileScraper,
  urls: string[],
  options: BatchOptions = {}
): Promise<BatchItemResult[]> {
  const concurrency = Math.max(1, options.concurrency ?? config.batchConcurrency);
  const rateLimiter = options.rateLimiter ?? new RateLimiter();
  const results: BatchItemResult[] = new Array(urls.length);
  let next = 0;

  async function worker(workerId: number): Promise<void> {
    while (next < urls.length) {
      const index = next++;
      const url = urls[index];

      await rateLimiter.waitForToken();
      try {
        results[index] = { url, ok: true, outcome: await scraper.scrape(url) };
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        logger.error({ url, workerId, error: failure.message }, "Batch item failed");
        results[index] = { url, ok: false, error: failure };
      }
    }
  }

  const workerCount = Math.min(concurrency, urls.length);
  await Promise.all(Array.from({ length: workerCount }, (_, i) => worker(i + 1)));

  logger.info(
    {
      total: urls.length,
      failed: results.filter((r) => !r.ok).length,
      partial: results.filter((r) => r.ok && r.outcome.warning).length,
    },
    "Batch complete"
  );
  return results;
}
