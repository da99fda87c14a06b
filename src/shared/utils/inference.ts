/**
 * Attribute Inference
 *
 * Best-effort derivation of quality and file type from free text or a URL.
 * No match is a normal outcome and yields undefined.
 */
import { FILE_TYPE_PATTERN, QUALITY_PATTERN } from "../../config/constants";

/**
 * Finds the leftmost quality token (1080p, 720p, HD, 4K, ...) in `text`,
 * case-insensitively. The token is returned as written in the input.
 *
 * @example inferQuality("Download 720p Now") // "720p"
 */
export function inferQuality(text: string): string | undefined {
  return QUALITY_PATTERN.exec(text)?.[1];
}

/**
 * Reads the extension of the last path segment, ignoring a query string.
 *
 * @example inferFileType("https://host/x/movie.mkv?t=1") // "mkv"
 */
export function inferFileType(url: string): string | undefined {
  return FILE_TYPE_PATTERN.exec(url)?.[1];
}
