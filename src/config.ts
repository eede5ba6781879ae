import "dotenv/config";
import { homedir } from "node:os";
import { join } from "node:path";

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  return parseInt(raw, 10);
}

export const config = {
  // Cache
  cacheDir: process.env.CARD_POSTER_CACHE_DIR || join(homedir(), ".card-poster", "cache"),
  cacheTtlDays: intFromEnv("CARD_POSTER_CACHE_TTL_DAYS", 30),
  cacheMaxBytes: intFromEnv("CARD_POSTER_CACHE_MAX_BYTES", 512 * 1024 * 1024),

  // Descargas
  downloadConcurrency: intFromEnv("CARD_POSTER_DOWNLOAD_CONCURRENCY", 6),
  fetchTimeoutMs: intFromEnv("CARD_POSTER_FETCH_TIMEOUT_MS", 10_000),
  retryMaxAttempts: intFromEnv("CARD_POSTER_RETRY_MAX_ATTEMPTS", 3),
  retryBaseDelayMs: intFromEnv("CARD_POSTER_RETRY_BASE_DELAY_MS", 500),
  retryMaxDelayMs: intFromEnv("CARD_POSTER_RETRY_MAX_DELAY_MS", 8_000),
  maxRequestsPerSecond: intFromEnv("CARD_POSTER_MAX_RPS", 8),
  userAgent: "card-poster/0.1 (+collection export)",

  // Procesamiento
  renderConcurrency: intFromEnv("CARD_POSTER_RENDER_CONCURRENCY", 2),
  maxImagePixels: 20_000_000,

  logLevel: process.env.LOG_LEVEL || "info",
};

export type AppConfig = typeof config;

// Validate numeric settings
export function validateConfig(cfg: AppConfig = config): void {
  const positive = [
    "cacheTtlDays",
    "cacheMaxBytes",
    "downloadConcurrency",
    "fetchTimeoutMs",
    "retryMaxAttempts",
    "maxRequestsPerSecond",
    "renderConcurrency",
    "maxImagePixels",
  ] as const;

  const invalid = positive.filter((key) => !Number.isFinite(cfg[key]) || cfg[key] <= 0);
  const negative = (["retryBaseDelayMs", "retryMaxDelayMs"] as const).filter(
    (key) => !Number.isFinite(cfg[key]) || cfg[key] < 0
  );

  const bad = [...invalid, ...negative];
  if (bad.length > 0) {
    throw new Error(`Config invalida: ${bad.join(", ")}`);
  }
}
