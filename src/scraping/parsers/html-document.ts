/**
 * HTML Document Parser
 *
 * Wraps cheerio behind the small query surface the extractors need.
 * Extractors depend on ParsedDocument, never on cheerio directly.
 */
import * as cheerio from "cheerio";
import type { AnyNode } from "cheerio";

export interface DocumentElement {
  /** Attribute value, or undefined when the attribute is missing */
  attr(name: string): string | undefined;
  /** Visible text of the element and its descendants */
  text(): string;
}

export interface ParsedDocument {
  /** Every element carrying an href, in document order */
  linkElements(): DocumentElement[];
  /** Elements matching a CSS selector, in document order */
  select(selector: string): DocumentElement[];
  /** Text nodes of the page body in document order, one per line */
  pageText(): string;
  /** The document serialized back to markup */
  serialize(): string;
}

class CheerioDocument implements ParsedDocument {
  private readonly $: cheerio.CheerioAPI;

  constructor(html: string) {
    this.$ = cheerio.load(html);
  }

  linkElements(): DocumentElement[] {
    return this.select("[href]");
  }

  select(selector: string): DocumentElement[] {
    return this.$(selector)
      .toArray()
      .map((node) => {
        const element = this.$(node);
        return {
          attr: (name: string) => element.attr(name),
          text: () => element.text(),
        };
      });
  }

  pageText(): string {
    const parts: string[] = [];
    const visit = (node: AnyNode): void => {
      if (node.nodeType === 3) {
        parts.push(this.$(node).text());
        return;
      }
      this.$(node).contents().each((_, child) => visit(child));
    };

    this.$("body").contents().each((_, child) => visit(child));
    return parts.join("\n");
  }

  serialize(): string {
    return this.$.html();
  }
}

/**
 * Parses raw HTML. Malformed or empty markup still yields a document;
 * queries on it simply find less.
 */
export function parseDocument(html: string): ParsedDocument {
  return new CheerioDocument(html);
}
