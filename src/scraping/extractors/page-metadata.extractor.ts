/**
 * Page Metadata Extractor
 *
 * Pulls file name, size and upload date from a viking file page.
 * Each field walks its own ordered list of selector lookups and takes
 * the first non-empty value; text patterns are the last resort.
 */
import {
  FILE_NAME_LOOKUPS,
  FILE_SIZE_LABEL_PATTERN,
  FILE_SIZE_LOOKUPS,
  FILE_SIZE_TOKEN_PATTERN,
  type SelectorLookup,
  UPLOAD_DATE_LABEL_PATTERN,
  UPLOAD_DATE_LOOKUPS,
} from "../../config/constants";
import type { PageMetadata } from "../../shared/types/viking.types";
import type { ParsedDocument } from "../parsers/html-document";

export function extractPageMetadata(document: ParsedDocument): PageMetadata {
  return {
    fileName: extractFileName(document),
    fileSize: extractFileSize(document),
    uploadDate: extractUploadDate(document),
  };
}

export function extractFileName(document: ParsedDocument): string | undefined {
  return firstLookup(document, FILE_NAME_LOOKUPS);
}

/**
 * Labelled elements first, then a "Size: 1.2 GB" label in the text,
 * then any bare size token such as "700MB" anywhere on the page.
 */
export function extractFileSize(document: ParsedDocument): string | undefined {
  const labelled = firstLookup(document, FILE_SIZE_LOOKUPS);
  if (labelled) return labelled;

  const text = document.pageText();
  return (
    firstCapture(FILE_SIZE_LABEL_PATTERN, text) ??
    firstCapture(FILE_SIZE_TOKEN_PATTERN, text)
  );
}

export function extractUploadDate(document: ParsedDocument): string | undefined {
  return (
    firstLookup(document, UPLOAD_DATE_LOOKUPS) ??
    firstCapture(UPLOAD_DATE_LABEL_PATTERN, document.pageText())
  );
}

// --- Helpers ---

function firstLookup(
  document: ParsedDocument,
  lookups: readonly SelectorLookup[]
): string | undefined {
  for (const { selector, attribute } of lookups) {
    for (const element of document.select(selector)) {
      const value = trimOrUndefined(
        attribute ? element.attr(attribute) : element.text()
      );
      if (value) return value;
    }
  }
  return undefined;
}

function firstCapture(pattern: RegExp, text: string): string | undefined {
  return trimOrUndefined(pattern.exec(text)?.[1]);
}

function trimOrUndefined(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const trimmed = value.replace(/\s+/g, " ").trim();
  return trimmed === "" ? undefined : trimmed;
}
