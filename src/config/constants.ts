/**
 * Application Constants
 *
 * Static values that don't change per environment.
 * Includes the ordered pattern tables used by the identifier resolver,
 * attribute inferencer and extraction strategies, the page metadata
 * selector fallbacks, and error codes.
 *
 * Every table here is evaluated first-match-wins in declaration order.
 * Reordering entries changes observable results.
 */

// --- File Identifier Patterns ---
// Host-qualified patterns come first so a path-only pattern never shadows them.
export const FILE_ID_PATTERNS: readonly RegExp[] = [
  /vik(?:1|i)ngfile\.[a-z.]+\/f\/([\w-]+)/i,
  /vik(?:1|i)ngfile\.[a-z.]+\/file\/([\w-]+)/i,
  /\/f\/([\w-]+)/,
  /\/file\/([\w-]+)/,
];

// --- Attribute Inference ---
export const QUALITY_PATTERN = /(1080p|720p|480p|360p|4K|2K|HD|SD|FHD|UHD)/i;

export const FILE_TYPE_PATTERN = /\.([A-Za-z0-9]+)(?:\?|$)/;

// --- Extraction Strategies ---
/** Visible text that marks an element as an explicit download affordance */
export const DOWNLOAD_TEXT_PATTERN = /download/i;

/** Known hosting-domain substrings, in source-naming precedence order */
export const KNOWN_HOSTS: readonly string[] = [
  "drive.google.com",
  "gdtot",
  "hubcloud",
  "filepress",
  "pixeldrain",
  "mediafire",
  "mega.nz",
  "dropbox",
  "streamtape",
  "doodstream",
  "mixdrop",
  "upstream",
];

/** Domain suffixes dropped from a host substring to form the source name */
export const HOST_SUFFIX_PATTERN = /\.(?:com|nz)$/;

export const MEDIA_EXTENSIONS: readonly string[] = [
  "mp4",
  "mkv",
  "avi",
  "mov",
  "wmv",
  "flv",
  "webm",
  "m3u8",
];

/**
 * Inline URL patterns scanned over the serialized document, in order:
 * media files, then /download/ paths, then /dl/ paths.
 */
export const INLINE_LINK_PATTERNS: readonly RegExp[] = [
  new RegExp(
    `https?://[^\\s"'<>]+\\.(?:${MEDIA_EXTENSIONS.join("|")})\\b`,
    "gi"
  ),
  /https?:\/\/[^\s"'<>]*\/download\/[^\s"'<>]*/gi,
  /https?:\/\/[^\s"'<>]*\/dl\/[^\s"'<>]*/gi,
];

export const TRAILING_QUOTE_PATTERN = /["'<>]+$/;

// --- Link Sources ---
export const LINK_SOURCES = {
  VIKING: "viking",
  DIRECT: "direct",
} as const;

// --- Page Metadata Selectors ---
// A lookup reads the attribute when one is named, the element text otherwise.
export interface SelectorLookup {
  selector: string;
  attribute?: string;
}

export const FILE_NAME_LOOKUPS: readonly SelectorLookup[] = [
  { selector: "[data-file-name]", attribute: "data-file-name" },
  { selector: ".file-name" },
  { selector: ".filename" },
  { selector: "h1.title" },
  { selector: 'meta[property="og:title"]', attribute: "content" },
  { selector: "h1" },
  { selector: "title" },
];

export const FILE_SIZE_LOOKUPS: readonly SelectorLookup[] = [
  { selector: "[data-file-size]", attribute: "data-file-size" },
  { selector: ".file-size" },
  { selector: ".filesize" },
  { selector: ".size" },
];

export const FILE_SIZE_LABEL_PATTERN = /Size\s*:\s*(\d+(?:\.\d+)?\s*[KMGT]?B)\b/i;

/** Last resort: any bare size token anywhere in the page text */
export const FILE_SIZE_TOKEN_PATTERN = /(\d+(?:\.\d+)?\s*[KMGT]B)\b/i;

export const UPLOAD_DATE_LOOKUPS: readonly SelectorLookup[] = [
  { selector: "[data-upload-date]", attribute: "data-upload-date" },
  { selector: "time[datetime]", attribute: "datetime" },
  { selector: ".upload-date" },
  { selector: ".date" },
];

export const UPLOAD_DATE_LABEL_PATTERN = /Uploaded(?:\s+on)?\s*:\s*([^\n|]+)/i;

// --- Error Codes ---
export const ERROR_CODES = {
  IDENTIFIER_NOT_FOUND: "IDENTIFIER_NOT_FOUND",
  FETCH_FAILED: "FETCH_FAILED",
  TIMEOUT: "TIMEOUT",
  VALIDATION_FAILED: "VALIDATION_FAILED",
  INVALID_ARGUMENTS: "INVALID_ARGUMENTS",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
