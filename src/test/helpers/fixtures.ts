import { AxiosError, AxiosHeaders, type AxiosResponse } from "axios";
import type { PageFetcher } from "../../scraping/fetchers/page-fetcher";
import type { DriveLink, Metadata, OxxFile } from "../../shared/types/oxx-file.types";

export const BASE_ORIGIN = "https://vik1ngfile.site";

export const VIKING_PAGE_HTML = `
<html>
  <head><title>Viking File - Sample.Movie.2024.mkv</title></head>
  <body>
    <h1 class="file-name">Sample.Movie.2024.mkv</h1>
    <span class="file-size">1.4 GB</span>
    <span class="upload-date">2024-01-05</span>
    <a class="btn" href="/d/abc123">Download 1080p</a>
    <a href="https://pixeldrain.com/u/pd123">Mirror</a>
    <script>var backup = "https://cdn.example/files/sample_720p.mp4";</script>
  </body>
</html>`;

/** Fetcher that serves fixed HTML, or rejects with a fixed error */
export class StubFetcher implements PageFetcher {
  readonly calls: Array<{ url: string; timeoutMs: number }> = [];

  constructor(
    private readonly html: string,
    private readonly error?: Error
  ) {}

  async fetch(url: string, timeoutMs: number): Promise<string> {
    this.calls.push({ url, timeoutMs });
    if (this.error) throw this.error;
    return this.html;
  }
}

export function response(status: number, data: string): AxiosResponse<string> {
  return {
    status,
    statusText: String(status),
    headers: {},
    config: { headers: new AxiosHeaders() },
    data,
  };
}

export function httpError(status: number): AxiosError {
  return new AxiosError(
    `Request failed with status code ${status}`,
    "ERR_BAD_RESPONSE",
    undefined,
    undefined,
    response(status, "")
  );
}

export function buildMetadata(overrides: Partial<Metadata> = {}): Metadata {
  return {
    mimeType: "video/mp4",
    fileExtension: "mp4",
    modifiedTime: "2024-01-01T00:00:00Z",
    createdTime: "2024-01-01T00:00:00Z",
    pixeldrainConversionFailed: false,
    pixeldrainConversionFailedAt: "",
    pixeldrainConversionError: "",
    vikingConversionFailed: false,
    vikingConversionFailedAt: "",
    ...overrides,
  };
}

export function buildDriveLink(overrides: Partial<DriveLink> = {}): DriveLink {
  return {
    fileId: "drive-1",
    webViewLink: "https://drive.google.com/file/d/drive-1/view",
    driveLabel: "Primary Drive",
    credentialIndex: 0,
    isLoginDrive: false,
    isDrive2: false,
    ...overrides,
  };
}

export function buildOxxFile(overrides: Partial<OxxFile> = {}): OxxFile {
  return {
    id: "file001",
    code: "XYZ123",
    fileName: "sample_video.mp4",
    size: 1048576000,
    driveLinks: [buildDriveLink()],
    metadata: buildMetadata(),
    createdAt: "2024-01-01T00:00:00Z",
    views: 100,
    status: "active",
    credentialIndex: 0,
    userName: "user123",
    ...overrides,
  };
}
