import { CacheCorruptError, CacheFullError, CacheWriteError } from "../../domain/errors";
import type { CardRef, ResolvedImage, ResolveFailure } from "../../domain/models";
import { cacheKeyForUrl, computeSha256 } from "../../utils/hash";
import { logger } from "../../utils/logger";
import type { CacheStorePort, ImageFetcherPort, ImageValidatorPort, RateLimiterPort } from "../ports";
import { rateLimitKey } from "./rateLimiter";
import { DEFAULT_RETRY_POLICY, RetryPolicy, backoffDelayMs, sleep } from "./retry";

export interface DownloaderDeps {
  cache: CacheStorePort;
  fetcher: ImageFetcherPort;
  validator: ImageValidatorPort;
  rateLimiter?: RateLimiterPort;
  retry?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface ResolveOptions {
  cacheOptOut?: boolean; // ni lookup ni put
  signal?: AbortSignal;
}

type Acquired =
  | { ok: true; bytes: Buffer; attempts: number; cached: boolean; cacheError?: string }
  | { ok: false; failure: ResolveFailure };

export class Downloader {
  private readonly retry: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  // single-flight: misma URL en vuelo => una sola descarga
  private readonly inFlight = new Map<string, Promise<Acquired>>();

  constructor(private readonly deps: DownloaderDeps) {
    this.retry = deps.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = deps.sleep ?? sleep;
    this.random = deps.random ?? Math.random;

    if (!Number.isInteger(this.retry.maxAttempts) || this.retry.maxAttempts < 1) {
      throw new RangeError(`retry.maxAttempts debe ser >= 1 (${this.retry.maxAttempts})`);
    }
  }

  async resolve(card: CardRef, options: ResolveOptions = {}): Promise<ResolvedImage> {
    const url = card.imageUrl.trim();
    if (!url) {
      return this.placeholder(card, { kind: "permanent", reason: "missing_image_url", attempts: 0 });
    }

    const key = cacheKeyForUrl(url);
    const useCache = !options.cacheOptOut;

    if (useCache) {
      const cached = await this.fromCache(key);
      if (cached) {
        logger.debug("Cache hit", { cardId: card.id, key });
        return { card, origin: "cache", bytes: cached };
      }
    }

    const flightKey = `${useCache ? "c" : "n"}:${key}`;
    let flight = this.inFlight.get(flightKey);
    if (!flight) {
      flight = this.acquire(url, key, useCache, options.signal).finally(() => this.inFlight.delete(flightKey));
      this.inFlight.set(flightKey, flight);
    }

    const acquired = await flight;
    if (!acquired.ok) return this.placeholder(card, acquired.failure);

    return {
      card,
      origin: "network",
      bytes: acquired.bytes,
      attempts: acquired.attempts,
      cached: acquired.cached,
      ...(acquired.cacheError ? { cacheError: acquired.cacheError } : {}),
    };
  }

  private placeholder(card: CardRef, failure: ResolveFailure): ResolvedImage {
    logger.warn("Se usa placeholder", {
      cardId: card.id,
      name: card.name,
      kind: failure.kind,
      reason: failure.reason,
      attempts: failure.attempts,
    });
    return { card, origin: "placeholder", failure };
  }

  private async fromCache(key: string): Promise<Buffer | null> {
    const entry = await this.deps.cache.lookup(key);
    if (!entry) return null;

    try {
      return await this.deps.cache.read(entry);
    } catch (error) {
      if (!(error instanceof CacheCorruptError)) throw error;
      logger.warn("Entrada de cache ilegible, se descarga de nuevo", { key, error: error.message });
      await this.deps.cache.invalidate(key);
      return null;
    }
  }

  private async acquire(url: string, key: string, useCache: boolean, signal?: AbortSignal): Promise<Acquired> {
    const downloaded = await this.download(url, signal);
    if (!downloaded.ok) return downloaded;
    if (!useCache) return { ...downloaded, cached: false };

    try {
      await this.deps.cache.put({ key, bytes: downloaded.bytes, contentHash: computeSha256(downloaded.bytes), sourceUrl: url });
      return { ...downloaded, cached: true };
    } catch (error) {
      if (!(error instanceof CacheWriteError) && !(error instanceof CacheFullError)) throw error;
      // la imagen sirve para este trabajo aunque no quede cacheada
      logger.warn("No se pudo cachear la imagen", { url, error: error.message });
      return { ...downloaded, cached: false, cacheError: error.message };
    }
  }

  private async download(
    url: string,
    signal?: AbortSignal
  ): Promise<{ ok: true; bytes: Buffer; attempts: number } | { ok: false; failure: ResolveFailure }> {
    const { fetcher, validator, rateLimiter } = this.deps;
    let last: ResolveFailure = { kind: "transient", reason: "no_attempts", attempts: 0 };

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      if (signal?.aborted) {
        return { ok: false, failure: { kind: "cancelled", reason: "cancelled", attempts: attempt - 1 } };
      }

      if (rateLimiter) await rateLimiter.acquire(rateLimitKey(url));

      const outcome = await fetcher.fetchImage(url);

      if (outcome.ok) {
        const validation = await validator.validate(outcome.bytes);
        if (!validation.ok) {
          return {
            ok: false,
            failure: { kind: "permanent", reason: `invalid_image: ${validation.error}`, attempts: attempt },
          };
        }
        return { ok: true, bytes: outcome.bytes, attempts: attempt };
      }

      const failure: ResolveFailure = {
        kind: outcome.retryable ? "transient" : "permanent",
        reason: outcome.error,
        attempts: attempt,
        ...(outcome.httpStatus !== undefined ? { httpStatus: outcome.httpStatus } : {}),
      };
      if (!outcome.retryable) return { ok: false, failure };

      last = failure;
      if (attempt < this.retry.maxAttempts) {
        const delayMs = backoffDelayMs(attempt, this.retry, this.random);
        logger.info("Reintentando descarga", { url, attempt, delayMs, error: outcome.error });
        await this.sleep(delayMs);
      }
    }

    return { ok: false, failure: { ...last, reason: `retries_exhausted: ${last.reason}` } };
  }
}
