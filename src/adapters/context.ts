import type { ExportContext } from "../application/usecases/exportCollection";
import { TokenBucketRateLimiter } from "../application/services/rateLimiter";
import { sleep } from "../application/services/retry";
import { AppConfig, config as defaultConfig } from "../config";
import { FsCacheStore } from "./cache/fsCacheStore";
import { HttpImageFetcher } from "./http/httpImageFetcher";
import { SharpImageValidator } from "./imaging/sharpImageValidator";
import { CsvManifestWriter } from "./persistence/csvManifestWriter";
import { FsArtifactSink } from "./persistence/fsArtifactSink";
import { PdfLibBundler } from "./renderer/pdfLibBundler";
import { SharpCompositor } from "./renderer/sharpCompositor";

export function createCacheStore(cfg: AppConfig = defaultConfig): FsCacheStore {
  return new FsCacheStore({ rootDir: cfg.cacheDir, ttlDays: cfg.cacheTtlDays, maxBytes: cfg.cacheMaxBytes });
}

/** Arma el contexto de produccion: disco, red y sharp. */
export function createExportContext(cfg: AppConfig = defaultConfig): ExportContext {
  const sink = new FsArtifactSink();

  return {
    cache: createCacheStore(cfg),
    fetcher: new HttpImageFetcher({ timeoutMs: cfg.fetchTimeoutMs, userAgent: cfg.userAgent }),
    validator: new SharpImageValidator(cfg.maxImagePixels),
    compositor: new SharpCompositor(sink),
    bundler: new PdfLibBundler(sink),
    manifestWriter: new CsvManifestWriter(),
    rateLimiter: new TokenBucketRateLimiter(cfg.maxRequestsPerSecond),
    settings: {
      downloadConcurrency: cfg.downloadConcurrency,
      renderConcurrency: cfg.renderConcurrency,
      retry: {
        maxAttempts: cfg.retryMaxAttempts,
        baseDelayMs: cfg.retryBaseDelayMs,
        maxDelayMs: cfg.retryMaxDelayMs,
      },
    },
    now: () => new Date(),
    sleep,
    random: Math.random,
  };
}
