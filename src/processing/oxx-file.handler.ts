/**
 * OxxFile Handler
 *
 * Queries over OxxFile records (host links, viking status), collection
 * filters and statistics, and JSON file persistence.
 */
import * as fs from "fs";
import { logger } from "../monitoring/logger";
import type {
  HostLinks,
  OxxFile,
  VikingInfo,
  VikingStatistics,
} from "../shared/types/oxx-file.types";
import { deserializeOxxFile, oxxFileToJson, parseJson } from "./record-serializer";

export function hasVikingLink(file: OxxFile): boolean {
  return file.vikingLink !== undefined && file.vikingLink.length > 0;
}

export function isVikingConversionFailed(file: OxxFile): boolean {
  return file.metadata.vikingConversionFailed;
}

/**
 * Every available hosting link keyed by host: viking, pixeldrain, gdtot,
 * hubcloud, filepress, then drive_1 ... drive_n for the drive links.
 */
export function getAllLinks(file: OxxFile): HostLinks {
  const links: HostLinks = {};

  if (file.vikingLink) links.viking = file.vikingLink;
  if (file.pixeldrainLink) links.pixeldrain = file.pixeldrainLink;
  if (file.gdtotLink) links.gdtot = file.gdtotLink;
  if (file.hubcloudLink) links.hubcloud = file.hubcloudLink;
  if (file.filepressLink) links.filepress = file.filepressLink;

  file.driveLinks.forEach((driveLink, i) => {
    links[`drive_${i + 1}`] = driveLink.webViewLink;
  });

  return links;
}

export function getVikingInfo(file: OxxFile): VikingInfo {
  return {
    vikingLink: file.vikingLink,
    vikingConversionFailed: file.metadata.vikingConversionFailed,
    vikingConversionFailedAt: file.metadata.vikingConversionFailedAt,
    hasVikingLink: hasVikingLink(file),
  };
}

// --- Collections ---

export function filterByVikingLink(files: OxxFile[]): OxxFile[] {
  return files.filter(hasVikingLink);
}

export function filterByVikingConversionFailed(files: OxxFile[]): OxxFile[] {
  return files.filter(isVikingConversionFailed);
}

/**
 * Success rate is the share of viking-linked files whose conversion did
 * not fail, as a percentage; 0 when no file has a viking link.
 */
export function getVikingStatistics(files: OxxFile[]): VikingStatistics {
  const filesWithVikingLink = files.filter(hasVikingLink).length;
  const vikingConversionFailures = files.filter(isVikingConversionFailed).length;

  return {
    totalFiles: files.length,
    filesWithVikingLink,
    vikingConversionFailures,
    successRate:
      filesWithVikingLink > 0
        ? ((filesWithVikingLink - vikingConversionFailures) / filesWithVikingLink) * 100
        : 0,
  };
}

// --- Persistence ---

export function loadOxxFile(filePath: string): OxxFile {
  return deserializeOxxFile(parseJson(fs.readFileSync(filePath, "utf-8")));
}

/** Reads a JSON file holding either one OxxFile or an array of them */
export function loadOxxFiles(filePath: string): OxxFile[] {
  const data = parseJson(fs.readFileSync(filePath, "utf-8"));
  const files = Array.isArray(data) ? data.map(deserializeOxxFile) : [deserializeOxxFile(data)];

  logger.debug({ filePath, count: files.length }, "OxxFile records loaded");
  return files;
}

export function saveOxxFile(file: OxxFile, filePath: string): void {
  fs.writeFileSync(filePath, oxxFileToJson(file), "utf-8");
  logger.debug({ filePath, id: file.id }, "OxxFile record saved");
}
