/**
 * Output Formatter
 *
 * Renders extraction outcomes and OxxFile statistics for the CLI,
 * either as JSON (wire records) or as human-readable text.
 */
import type { VikingStatistics } from "../shared/types/oxx-file.types";
import type { DownloadLink, ExtractionOutcome } from "../shared/types/viking.types";
import { serializeVikingFileInfo } from "./record-serializer";

export type OutputFormat = "json" | "text";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "text"];

const MISSING = "N/A";

/**
 * One outcome renders as a single record, several as an array.
 * Warnings are not part of the record; they are reported separately.
 */
export function formatOutcomesJson(outcomes: ExtractionOutcome[]): string {
  const records = outcomes.map((outcome) => serializeVikingFileInfo(outcome.value));
  return JSON.stringify(records.length === 1 ? records[0] : records, null, 2);
}

export function formatOutcomeText(outcome: ExtractionOutcome): string {
  const info = outcome.value;
  const lines = [
    `File ID: ${info.fileId}`,
    `Page URL: ${info.pageUrl}`,
    `File Name: ${info.fileName ?? MISSING}`,
    `File Size: ${info.fileSize ?? MISSING}`,
    `Upload Date: ${info.uploadDate ?? MISSING}`,
    `Download Links (${info.downloadLinks.length}):`,
    ...info.downloadLinks.map((link, i) => `  ${i + 1}. ${describeLink(link)}`),
  ];

  if (outcome.warning) {
    lines.push(`Warning [${outcome.warning.code}]: ${outcome.warning.message}`);
  }

  return lines.join("\n");
}

export function formatOutcomes(outcomes: ExtractionOutcome[], format: OutputFormat): string {
  if (format === "json") return formatOutcomesJson(outcomes);
  return outcomes.map(formatOutcomeText).join("\n\n");
}

export function formatStatistics(stats: VikingStatistics, format: OutputFormat): string {
  if (format === "json") {
    return JSON.stringify(
      {
        total_files: stats.totalFiles,
        files_with_viking_link: stats.filesWithVikingLink,
        viking_conversion_failures: stats.vikingConversionFailures,
        success_rate: stats.successRate,
      },
      null,
      2
    );
  }

  return [
    `Total files: ${stats.totalFiles}`,
    `Files with viking link: ${stats.filesWithVikingLink}`,
    `Viking conversion failures: ${stats.vikingConversionFailures}`,
    `Success rate: ${stats.successRate.toFixed(1)}%`,
  ].join("\n");
}

function describeLink(link: DownloadLink): string {
  const details = [link.quality, link.fileType, link.fileSize].filter(
    (detail): detail is string => detail !== undefined
  );
  const suffix = details.length > 0 ? ` (${details.join(", ")})` : "";
  return `[${link.source}] ${link.url}${suffix}`;
}
