/**
 * OxxFile Types
 *
 * The multi-host file record used for downstream storage and lookup.
 * One OxxFile owns its DriveLink list and its Metadata; neither has a
 * lifecycle of its own.
 */

/** A Google Drive copy of the file */
export interface DriveLink {
  fileId: string;
  webViewLink: string;
  driveLabel: string;
  credentialIndex: number;
  isLoginDrive: boolean;
  isDrive2: boolean;
}

/** File attributes plus per-host conversion failure state */
export interface Metadata {
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

/**
 * A file with links on several hosting services.
 * Host link fields are either absent or a non-empty string.
 */
export interface OxxFile {
  id: string;
  code: string;
  fileName: string;
  /** Size in bytes */
  size: number;
  driveLinks: DriveLink[];
  metadata: Metadata;
  createdAt: string;
  views: number;
  status: string;
  gdtotLink?: string;
  gdtotName?: string;
  hubcloudLink?: string;
  filepressLink?: string;
  vikingLink?: string;
  pixeldrainLink?: string;
  credentialIndex: number;
  /** Running time, e.g. "01:30:00" */
  duration?: string;
  userName: string;
}

/** Host name → link, in the order returned by getAllLinks */
export type HostLinks = Record<string, string>;

export interface VikingInfo {
  vikingLink?: string;
  vikingConversionFailed: boolean;
  vikingConversionFailedAt: string;
  hasVikingLink: boolean;
}

export interface VikingStatistics {
  totalFiles: number;
  filesWithVikingLink: number;
  vikingConversionFailures: number;
  /** Percentage of viking-linked files whose conversion did not fail */
  successRate: number;
}
