/**
 * Record Serializer
 *
 * Maps every record to and from its plain wire form.
 * - VikingFileInfo / DownloadLink use snake_case keys (file_id, download_links, ...)
 * - OxxFile / DriveLink / Metadata use camelCase keys (fileId, webViewLink, ...),
 *   except OxxFile's `credential_index`
 *
 * Deserialization is lenient: missing keys take the Joi schema default
 * (empty string, 0, false, [] or null) instead of failing. Values of the
 * wrong type still fail with ValidationFailedError.
 *
 * Absent optional fields serialize as null. Empty strings read back for an
 * optional field become absent, so a host link is never "".
 */
import Joi from "joi";
import { LINK_SOURCES } from "../config/constants";
import { logger } from "../monitoring/logger";
import { ValidationFailedError } from "../shared/errors/scrape.errors";
import type { DriveLink, Metadata, OxxFile } from "../shared/types/oxx-file.types";
import type { DownloadLink, VikingFileInfo } from "../shared/types/viking.types";

// --- Wire Shapes ---

export interface DownloadLinkRecord {
  url: string;
  quality: string | null;
  source: string;
  file_size: string | null;
  file_type: string | null;
}

export interface VikingFileInfoRecord {
  file_id: string;
  file_name: string | null;
  file_size: string | null;
  upload_date: string | null;
  download_links: DownloadLinkRecord[];
  page_url: string;
}

export interface DriveLinkRecord {
  fileId: string;
  webViewLink: string;
  driveLabel: string;
  credentialIndex: number;
  isLoginDrive: boolean;
  isDrive2: boolean;
}

export interface MetadataRecord {
  mimeType: string;
  fileExtension: string;
  modifiedTime: string;
  createdTime: string;
  pixeldrainConversionFailed: boolean;
  pixeldrainConversionFailedAt: string;
  pixeldrainConversionError: string;
  vikingConversionFailed: boolean;
  vikingConversionFailedAt: string;
}

export interface OxxFileRecord {
  id: string;
  code: string;
  fileName: string;
  size: number;
  driveLinks: DriveLinkRecord[];
  metadata: MetadataRecord;
  createdAt: string;
  views: number;
  status: string;
  gdtotLink: string | null;
  gdtotName: string | null;
  hubcloudLink: string;
  filepressLink: string;
  vikingLink: string | null;
  pixeldrainLink: string | null;
  credential_index: number;
  duration: string | null;
  userName: string;
}

// --- Schemas ---

const text = () => Joi.string().allow("").default("");
const optionalText = () => Joi.string().allow(null, "").default(null);
const count = () => Joi.number().integer().min(0).default(0);
const flag = () => Joi.boolean().default(false);

const downloadLinkSchema = Joi.object<DownloadLinkRecord>({
  url: text(),
  quality: optionalText(),
  source: Joi.string().allow("").default(LINK_SOURCES.VIKING),
  file_size: optionalText(),
  file_type: optionalText(),
});

const vikingFileInfoSchema = Joi.object<VikingFileInfoRecord>({
  file_id: text(),
  file_name: optionalText(),
  file_size: optionalText(),
  upload_date: optionalText(),
  download_links: Joi.array().items(downloadLinkSchema).default([]),
  page_url: text(),
});

const driveLinkSchema = Joi.object<DriveLinkRecord>({
  fileId: text(),
  webViewLink: text(),
  driveLabel: text(),
  credentialIndex: count(),
  isLoginDrive: flag(),
  isDrive2: flag(),
});

const metadataSchema = Joi.object<MetadataRecord>({
  mimeType: text(),
  fileExtension: text(),
  modifiedTime: text(),
  createdTime: text(),
  pixeldrainConversionFailed: flag(),
  pixeldrainConversionFailedAt: text(),
  pixeldrainConversionError: text(),
  vikingConversionFailed: flag(),
  vikingConversionFailedAt: text(),
});

const oxxFileSchema = Joi.object<OxxFileRecord>({
  id: text(),
  code: text(),
  fileName: text(),
  size: count(),
  driveLinks: Joi.array().items(driveLinkSchema).default([]),
  metadata: metadataSchema.default(),
  createdAt: text(),
  views: count(),
  status: text(),
  gdtotLink: optionalText(),
  gdtotName: optionalText(),
  hubcloudLink: Joi.string().allow(null, "").default(""),
  filepressLink: Joi.string().allow(null, "").default(""),
  vikingLink: optionalText(),
  pixeldrainLink: optionalText(),
  credential_index: count(),
  duration: optionalText(),
  userName: text(),
});

/**
 * Validate a wire record against its schema.
 * Throws ValidationFailedError if the data is invalid.
 */
function validateRecord<T>(schema: Joi.ObjectSchema<T>, input: unknown, kind: string): T {
  const { error, value } = schema.required().validate(input, {
    abortEarly: false,
    stripUnknown: true,
  });

  if (error) {
    const details = error.details.map((d) => d.message).join("; ");
    logger.warn({ kind, validationErrors: details }, "Record validation failed");
    throw new ValidationFailedError(`${kind} validation failed: ${details}`);
  }

  return value;
}

// --- DownloadLink ---

export function serializeDownloadLink(link: DownloadLink): DownloadLinkRecord {
  return {
    url: link.url,
    quality: link.quality ?? null,
    source: link.source,
    file_size: link.fileSize ?? null,
    file_type: link.fileType ?? null,
  };
}

export function deserializeDownloadLink(input: unknown): DownloadLink {
  return toDownloadLink(validateRecord(downloadLinkSchema, input, "DownloadLink"));
}

function toDownloadLink(record: DownloadLinkRecord): DownloadLink {
  return Object.freeze({
    url: record.url,
    quality: presentOrUndefined(record.quality),
    source: record.source,
    fileSize: presentOrUndefined(record.file_size),
    fileType: presentOrUndefined(record.file_type),
  });
}

// --- VikingFileInfo ---

export function serializeVikingFileInfo(info: VikingFileInfo): VikingFileInfoRecord {
  return {
    file_id: info.fileId,
    file_name: info.fileName ?? null,
    file_size: info.fileSize ?? null,
    upload_date: info.uploadDate ?? null,
    download_links: info.downloadLinks.map(serializeDownloadLink),
    page_url: info.pageUrl,
  };
}

export function deserializeVikingFileInfo(input: unknown): VikingFileInfo {
  const record = validateRecord(vikingFileInfoSchema, input, "VikingFileInfo");
  return {
    fileId: record.file_id,
    fileName: presentOrUndefined(record.file_name),
    fileSize: presentOrUndefined(record.file_size),
    uploadDate: presentOrUndefined(record.upload_date),
    downloadLinks: record.download_links.map(toDownloadLink),
    pageUrl: record.page_url,
  };
}

// --- DriveLink ---

export function serializeDriveLink(link: DriveLink): DriveLinkRecord {
  return { ...link };
}

export function deserializeDriveLink(input: unknown): DriveLink {
  return { ...validateRecord(driveLinkSchema, input, "DriveLink") };
}

// --- Metadata ---

export function serializeMetadata(metadata: Metadata): MetadataRecord {
  return { ...metadata };
}

export function deserializeMetadata(input: unknown): Metadata {
  return { ...validateRecord(metadataSchema, input, "Metadata") };
}

// --- OxxFile ---

export function serializeOxxFile(file: OxxFile): OxxFileRecord {
  return {
    id: file.id,
    code: file.code,
    fileName: file.fileName,
    size: file.size,
    driveLinks: file.driveLinks.map(serializeDriveLink),
    metadata: serializeMetadata(file.metadata),
    createdAt: file.createdAt,
    views: file.views,
    status: file.status,
    gdtotLink: file.gdtotLink ?? null,
    gdtotName: file.gdtotName ?? null,
    hubcloudLink: file.hubcloudLink ?? "",
    filepressLink: file.filepressLink ?? "",
    vikingLink: file.vikingLink ?? null,
    pixeldrainLink: file.pixeldrainLink ?? null,
    credential_index: file.credentialIndex,
    duration: file.duration ?? null,
    userName: file.userName,
  };
}

export function deserializeOxxFile(input: unknown): OxxFile {
  const record = validateRecord(oxxFileSchema, input, "OxxFile");
  return {
    id: record.id,
    code: record.code,
    fileName: record.fileName,
    size: record.size,
    driveLinks: record.driveLinks.map((link) => ({ ...link })),
    metadata: { ...record.metadata },
    createdAt: record.createdAt,
    views: record.views,
    status: record.status,
    gdtotLink: presentOrUndefined(record.gdtotLink),
    gdtotName: presentOrUndefined(record.gdtotName),
    hubcloudLink: presentOrUndefined(record.hubcloudLink),
    filepressLink: presentOrUndefined(record.filepressLink),
    vikingLink: presentOrUndefined(record.vikingLink),
    pixeldrainLink: presentOrUndefined(record.pixeldrainLink),
    credentialIndex: record.credential_index,
    duration: presentOrUndefined(record.duration),
    userName: record.userName,
  };
}

export function oxxFileToJson(file: OxxFile, indent: number = 2): string {
  return JSON.stringify(serializeOxxFile(file), null, indent);
}

export function oxxFileFromJson(json: string): OxxFile {
  return deserializeOxxFile(parseJson(json));
}

/** Parses JSON text, reporting syntax errors as validation failures */
export function parseJson(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch (error) {
    throw new ValidationFailedError(`Invalid JSON: ${(error as Error).message}`);
  }
}

// --- Helpers ---

function presentOrUndefined(value: string | null | undefined): string | undefined {
  return value ? value : undefined;
}
