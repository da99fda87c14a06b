/**
 * Viking File Scraper
 *
 * Assembles a VikingFileInfo for one page URL:
 * 1. Resolve the file identifier (fatal when missing)
 * 2. Fetch the page through the PageFetcher
 * 3. Parse it and run the metadata extractor and link extractor
 *
 * A failed fetch does not fail the call. The result then carries only
 * the identifier and page URL, plus a warning describing the failure.
 */
import config from "../config";
import { logger } from "../monitoring/logger";
import {
  FetchFailedError,
  IdentifierNotFoundError,
} from "../shared/errors/scrape.errors";
import type { ExtractionOutcome, VikingFileInfo } from "../shared/types/viking.types";
import { resolveFileId } from "../shared/utils/url";
import { LinkExtractor } from "./extractors/link.extractor";
import { extractPageMetadata } from "./extractors/page-metadata.extractor";
import { HttpPageFetcher, type PageFetcher } from "./fetchers/page-fetcher";
import { parseDocument } from "./parsers/html-document";

export interface ScraperOptions {
  fetcher?: PageFetcher;
  linkExtractor?: LinkExtractor;
  timeoutMs?: number;
}

export class VikingFileScraper {
  private readonly fetcher: PageFetcher;
  private readonly linkExtractor: LinkExtractor;
  private readonly timeoutMs: number;

  constructor(options: ScraperOptions = {}) {
    this.fetcher = options.fetcher ?? new HttpPageFetcher();
    this.linkExtractor = options.linkExtractor ?? new LinkExtractor();
    this.timeoutMs = options.timeoutMs ?? config.requestTimeoutMs;
  }

  /**
   * @throws IdentifierNotFoundError when the URL is not a viking file page
   */
  async scrape(pageUrl: string): Promise<ExtractionOutcome> {
    const fileId = resolveFileId(pageUrl);
    if (!fileId) {
      throw new IdentifierNotFoundError(pageUrl);
    }

    let html: string;
    try {
      html = await this.fetcher.fetch(pageUrl, this.timeoutMs);
    } catch (error) {
      const failure =
        error instanceof FetchFailedError
          ? error
          : new FetchFailedError(error instanceof Error ? error.message : String(error));

      logger.warn(
        { pageUrl, fileId, code: failure.code, error: failure.message },
        "Page fetch failed, returning partial result"
      );
      return {
        value: { fileId, pageUrl, downloadLinks: [] },
        warning: { code: failure.code, message: failure.message },
      };
    }

    return { value: this.extractFromHtml(html, pageUrl, fileId) };
  }

  /** Synchronous core: no I/O, never throws on bad markup */
  extractFromHtml(html: string, pageUrl: string, fileId: string): VikingFileInfo {
    const document = parseDocument(html);
    const metadata = extractPageMetadata(document);
    const downloadLinks = this.linkExtractor.extract(document, pageUrl);

    return {
      fileId,
      fileName: metadata.fileName,
      fileSize: metadata.fileSize,
      uploadDate: metadata.uploadDate,
      downloadLinks,
      pageUrl,
    };
  }
}
