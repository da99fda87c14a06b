/**
 * Custom Error Classes for Extraction Operations
 *
 * Each error class maps to an ERROR_CODE in constants.ts.
 * The scraper uses these to decide between failing a call and
 * degrading it into a partial result.
 */
import { ERROR_CODES, ErrorCode } from "../../config/constants";

/**
 * Base class for all extraction errors.
 * Includes an error code for classification in logs and CLI output.
 */
export class ScrapeError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;

  constructor(message: string, code: ErrorCode, retryable: boolean = true) {
    super(message);
    this.name = "ScrapeError";
    this.code = code;
    this.retryable = retryable;
  }
}

/** Input URL matches none of the known file-page patterns */
export class IdentifierNotFoundError extends ScrapeError {
  public readonly url: string;

  constructor(url: string) {
    super(
      `No file identifier found in URL: ${url}`,
      ERROR_CODES.IDENTIFIER_NOT_FOUND,
      false
    );
    this.name = "IdentifierNotFoundError";
    this.url = url;
  }
}

/** Page could not be fetched (network error, DNS, non-2xx status) */
export class FetchFailedError extends ScrapeError {
  public readonly status?: number;

  constructor(
    message: string = "Page fetch failed",
    status?: number,
    code: ErrorCode = ERROR_CODES.FETCH_FAILED
  ) {
    super(message, code, true);
    this.name = "FetchFailedError";
    this.status = status;
  }
}

/** Page fetch exceeded its timeout */
export class FetchTimeoutError extends FetchFailedError {
  constructor(message: string = "Page fetch timed out") {
    super(message, undefined, ERROR_CODES.TIMEOUT);
    this.name = "FetchTimeoutError";
  }
}

/** Serialized record failed schema validation */
export class ValidationFailedError extends ScrapeError {
  constructor(message: string = "Data validation failed") {
    super(message, ERROR_CODES.VALIDATION_FAILED, false);
    this.name = "ValidationFailedError";
  }
}

/** CLI invoked with missing or unknown arguments */
export class InvalidArgumentsError extends ScrapeError {
  constructor(message: string) {
    super(message, ERROR_CODES.INVALID_ARGUMENTS, false);
    this.name = "InvalidArgumentsError";
  }
}
