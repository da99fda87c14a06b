/**
 * Download Link Extractor
 *
 * Discovers candidate download links on a viking file page using three
 * independent strategies, run in this order:
 *
 * 1. Explicit affordances: elements with an href whose text says "download"
 * 2. Known-host links: any href pointing at a known file host
 * 3. Inline pattern scan: absolute URLs found anywhere in the serialized
 *    markup, including scripts and attributes the element queries skip.
 *    Matches are entity-decoded, so `&amp;` in an attribute compares equal
 *    to the `&` the element queries read
 *
 * All strategies feed one accumulator. A URL already collected is never
 * added again, so the earliest strategy to find a URL decides its
 * quality, source and type. URLs are compared as exact strings.
 */
import { decodeHTML } from "entities";
import config from "../../config";
import {
  DOWNLOAD_TEXT_PATTERN,
  HOST_SUFFIX_PATTERN,
  INLINE_LINK_PATTERNS,
  KNOWN_HOSTS,
  LINK_SOURCES,
  TRAILING_QUOTE_PATTERN,
} from "../../config/constants";
import { logger } from "../../monitoring/logger";
import type { DownloadLink } from "../../shared/types/viking.types";
import { inferFileType, inferQuality } from "../../shared/utils/inference";
import { normalizeLink } from "../../shared/utils/url";
import type { ParsedDocument } from "../parsers/html-document";

type LinkStrategy = (document: ParsedDocument, links: LinkAccumulator) => void;

/** Ordered, url-unique collection of discovered links */
class LinkAccumulator {
  private readonly links: DownloadLink[] = [];
  private readonly seen = new Set<string>();

  add(link: DownloadLink): boolean {
    if (this.seen.has(link.url)) return false;
    this.seen.add(link.url);
    this.links.push(Object.freeze(link));
    return true;
  }

  get size(): number {
    return this.links.length;
  }

  toArray(): DownloadLink[] {
    return [...this.links];
  }
}

export class LinkExtractor {
  private readonly baseOrigin: string;
  private readonly strategies: ReadonlyArray<[name: string, run: LinkStrategy]>;

  constructor(baseOrigin: string = config.vikingBaseUrl) {
    this.baseOrigin = baseOrigin;
    this.strategies = [
      ["explicit-affordances", (document, links) => this.collectDownloadAffordances(document, links)],
      ["known-hosts", (document, links) => this.collectKnownHostLinks(document, links)],
      ["inline-scan", (document, links) => this.collectInlineLinks(document, links)],
    ];
  }

  /**
   * Runs every strategy over the document.
   *
   * @param pageUrl - Page the document came from, used for log context
   * @returns Links in discovery order, one per distinct URL
   */
  extract(document: ParsedDocument, pageUrl: string): DownloadLink[] {
    const links = new LinkAccumulator();

    for (const [name, run] of this.strategies) {
      const before = links.size;
      run(document, links);
      logger.debug(
        { pageUrl, strategy: name, added: links.size - before },
        "Link strategy finished"
      );
    }

    logger.info({ pageUrl, count: links.size }, "Download links extracted");
    return links.toArray();
  }

  private collectDownloadAffordances(document: ParsedDocument, links: LinkAccumulator): void {
    for (const element of document.linkElements()) {
      const href = element.attr("href");
      const text = element.text();
      if (!href || !DOWNLOAD_TEXT_PATTERN.test(text)) continue;

      links.add({
        url: normalizeLink(href, this.baseOrigin),
        quality: inferQuality(text),
        source: LINK_SOURCES.VIKING,
      });
    }
  }

  private collectKnownHostLinks(document: ParsedDocument, links: LinkAccumulator): void {
    for (const element of document.linkElements()) {
      const href = element.attr("href");
      if (!href) continue;

      const host = matchKnownHost(href);
      if (!host) continue;

      links.add({ url: href, source: host.replace(HOST_SUFFIX_PATTERN, "") });
    }
  }

  private collectInlineLinks(document: ParsedDocument, links: LinkAccumulator): void {
    const markup = document.serialize();

    for (const pattern of INLINE_LINK_PATTERNS) {
      for (const match of markup.matchAll(pattern)) {
        const url = decodeHTML(match[0]).replace(TRAILING_QUOTE_PATTERN, "");
        if (!url) continue;

        links.add({
          url,
          quality: inferQuality(url),
          source: LINK_SOURCES.DIRECT,
          fileType: inferFileType(url),
        });
      }
    }
  }
}

/** First entry of KNOWN_HOSTS contained in the lower-cased target */
export function matchKnownHost(target: string): string | undefined {
  const lowered = target.toLowerCase();
  return KNOWN_HOSTS.find((host) => lowered.includes(host));
}
