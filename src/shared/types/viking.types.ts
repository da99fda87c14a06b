/**
 * Viking File Types
 *
 * Shapes produced by the extraction engine for a single viking file page.
 * Field names are camelCase here; the snake_case wire keys live in
 * the record serializer.
 */
import type { ErrorCode } from "../../config/constants";

/**
 * A single candidate download link discovered on a page.
 * Two links are the same link when their `url` strings are identical.
 */
export interface DownloadLink {
  readonly url: string;
  /** Quality label such as "1080p" or "HD", as it appeared in the source text */
  readonly quality?: string;
  /** "viking", "direct", or a known-host name such as "pixeldrain" */
  readonly source: string;
  readonly fileSize?: string;
  /** Extension without the dot, e.g. "mkv" */
  readonly fileType?: string;
}

/**
 * Everything extracted from one viking file page.
 * `downloadLinks` keeps discovery order across strategies.
 */
export interface VikingFileInfo {
  readonly fileId: string;
  readonly fileName?: string;
  readonly fileSize?: string;
  readonly uploadDate?: string;
  readonly downloadLinks: readonly DownloadLink[];
  readonly pageUrl: string;
}

/** Metadata pulled from the page around the links */
export interface PageMetadata {
  fileName?: string;
  fileSize?: string;
  uploadDate?: string;
}

/** A recovered failure attached to a best-effort result */
export interface ExtractionWarning {
  code: ErrorCode;
  message: string;
}

/**
 * Result of scraping one page.
 * A fetch failure still yields a value (identifier and page URL only)
 * together with a warning describing what went wrong.
 */
export interface ExtractionOutcome {
  value: VikingFileInfo;
  warning?: ExtractionWarning;
}
