/**
 * viking-link-extractor
 *
 * Library entry point. The CLI lives in ./cli.
 */
export { VikingFileScraper } from "./scraping/viking-file.scraper";
export type { ScraperOptions } from "./scraping/viking-file.scraper";
export { LinkExtractor, matchKnownHost } from "./scraping/extractors/link.extractor";
export {
  extractPageMetadata,
  extractFileName,
  extractFileSize,
  extractUploadDate,
} from "./scraping/extractors/page-metadata.extractor";
export { HttpPageFetcher } from "./scraping/fetchers/page-fetcher";
export type { PageFetcher } from "./scraping/fetchers/page-fetcher";
export { parseDocument } from "./scraping/parsers/html-document";
export type { DocumentElement, ParsedDocument } from "./scraping/parsers/html-document";
export { resolveFileId, normalizeLink } from "./shared/utils/url";
export { inferQuality, inferFileType } from "./shared/utils/inference";
export * from "./processing/record-serializer";
export * from "./processing/oxx-file.handler";
export { runBatch } from "./workers/batch.runner";
export type { BatchItemResult, BatchOptions } from "./workers/batch.runner";
export { RateLimiter } from "./workers/rate-limiter";
export * from "./shared/errors/scrape.errors";
export type * from "./shared/types/viking.types";
export type * from "./shared/types/oxx-file.types";
