/**
 * Environment Configuration
 *
 * Centralizes all environment variables into a typed configuration object.
 * All modules import config from here instead of reading process.env directly.
 *
 * Groups:
 * - Runtime: environment name and log level
 * - Viking: base origin used to absolutize relative download links
 * - Fetch: HTTP timeout, user agent and attempt count for page fetches
 * - Batch: concurrency and request throttling for multi-URL runs
 */
import dotenv from "dotenv";

dotenv.config();

const config = {
  // --- Runtime ---
  env: process.env.NODE_ENV || "development",
  logLevel: process.env.LOG_LEVEL || "info",

  // --- Viking Website ---
  vikingBaseUrl: (process.env.VIKING_BASE_URL || "https://vik1ngfile.site").replace(/\/+$/, ""),

  // --- Page Fetching ---
  requestTimeoutMs: parseInt(process.env.REQUEST_TIMEOUT_MS || "30000", 10),
  userAgent:
    process.env.USER_AGENT ||
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  fetchMaxAttempts: parseInt(process.env.FETCH_MAX_ATTEMPTS || "1", 10),
  fetchRetryDelayMs: parseInt(process.env.FETCH_RETRY_DELAY_MS || "1000", 10),

  // --- Batch Extraction ---
  batchConcurrency: parseInt(process.env.BATCH_CONCURRENCY || "3", 10),
  rateLimitMax: parseInt(process.env.RATE_LIMIT_MAX || "10", 10),
  rateLimitDurationMs: parseInt(
    process.env.RATE_LIMIT_DURATION_MS || "60000",
    10
  ),
};

export default config;
