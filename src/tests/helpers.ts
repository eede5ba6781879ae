import sharp from "sharp";
import type {
  ArtifactSinkPort,
  CachePutParams,
  CacheStats,
  CacheStorePort,
  FetchOutcome,
  ImageFetcherPort,
  ImageValidatorPort,
  PruneResult,
  ValidationOutcome,
} from "../application/ports";
import { ArtifactWriteError } from "../domain/errors";
import type { CacheEntry, CacheEntryStatus, CardRef } from "../domain/models";
import { getBlobStoragePath } from "../utils/hash";

export function makeCard(id: string, overrides: Partial<CardRef> = {}): CardRef {
  const n = Number(id.replace(/\D/g, "")) || 1;
  return {
    id,
    name: `Carta ${id}`,
    setName: "Set Base",
    artist: "Ana Ruiz",
    generation: 1,
    dexNumber: n,
    imageUrl: `https://img.test/cards/${id}.png`,
    ...overrides,
  };
}

export function makeCards(count: number): CardRef[] {
  return Array.from({ length: count }, (_, i) => makeCard(`c${i + 1}`));
}

export async function solidPng(width: number, height: number, rgb: { r: number; g: number; b: number }): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: rgb } })
    .png()
    .toBuffer();
}

/** PNG valido al que le faltan los ultimos 30 bytes: la cabecera se lee, los pixeles no. */
export async function truncatedPng(width: number, height: number): Promise<Buffer> {
  const full = await solidPng(width, height, { r: 200, g: 40, b: 40 });
  return full.subarray(0, full.length - 30);
}

/** Cache en memoria con la misma semantica de lookup/put que la de disco (sin TTL). */
export class MemoryCache implements CacheStorePort {
  readonly entries = new Map<string, CacheEntry>();
  readonly blobs = new Map<string, Buffer>();
  puts = 0;
  invalidations: string[] = [];
  failPutWith: Error | null = null;
  failLookupWith: Error | null = null;

  async lookup(key: string): Promise<CacheEntry | null> {
    if (this.failLookupWith) throw this.failLookupWith;
    const e = this.entries.get(key);
    return e && e.status === "active" ? { ...e } : null;
  }

  async read(entry: CacheEntry): Promise<Buffer> {
    const bytes = this.blobs.get(entry.key);
    if (!bytes) throw new Error(`sin blob para ${entry.key}`);
    return bytes;
  }

  async put(params: CachePutParams): Promise<CacheEntry> {
    if (this.failPutWith) throw this.failPutWith;
    this.puts++;
    const now = new Date(0).toISOString();
    const entry: CacheEntry = {
      key: params.key,
      sourceUrl: params.sourceUrl,
      blobPath: getBlobStoragePath(params.contentHash),
      contentHash: params.contentHash,
      sizeBytes: params.bytes.length,
      fetchedAt: now,
      lastAccessedAt: now,
      accessCount: 0,
      version: 1,
      status: "active",
    };
    this.entries.set(params.key, entry);
    this.blobs.set(params.key, params.bytes);
    return { ...entry };
  }

  async invalidate(key: string): Promise<boolean> {
    this.invalidations.push(key);
    const e = this.entries.get(key);
    if (!e) return false;
    e.status = "stale";
    return true;
  }

  async prune(): Promise<PruneResult> {
    return { entriesRemoved: 0, bytesFreed: 0 };
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.blobs.clear();
  }

  async stats(): Promise<CacheStats> {
    const entries: Record<CacheEntryStatus, number> = { active: 0, stale: 0, evicted: 0 };
    for (const e of this.entries.values()) entries[e.status]++;
    return { entries, activeBytes: 0, hits: 0, misses: 0 };
  }

  async flush(): Promise<void> {}
}

type Responder = (url: string, call: number) => FetchOutcome | Promise<FetchOutcome>;

/** Fetcher en proceso: cada URL responde segun `responder`; registra llamadas. */
export class ScriptedFetcher implements ImageFetcherPort {
  readonly calls: string[] = [];

  constructor(private readonly responder: Responder) {}

  async fetchImage(url: string): Promise<FetchOutcome> {
    this.calls.push(url);
    // simula latencia de red fuera de la cola de microtareas
    await new Promise<void>((r) => setImmediate(r));
    return this.responder(url, this.calls.length);
  }

  callsFor(url: string): number {
    return this.calls.filter((u) => u === url).length;
  }
}

export function okOutcome(bytes: Buffer): FetchOutcome {
  return { ok: true, bytes, contentType: "image/png", httpStatus: 200 };
}

export function httpError(status: number): FetchOutcome {
  return { ok: false, retryable: status >= 500 || status === 408 || status === 429, error: `HTTP ${status}`, httpStatus: status };
}

export const acceptAll: ImageValidatorPort = {
  async validate(bytes: Buffer): Promise<ValidationOutcome> {
    return { ok: true, metadata: { width: 1, height: 1, format: "png", size: bytes.length } };
  },
};

export class MemorySink implements ArtifactSinkPort {
  readonly files = new Map<string, Buffer>();
  failOn: ((path: string) => boolean) | null = null;

  async write(path: string, bytes: Uint8Array): Promise<void> {
    if (this.failOn?.(path)) throw new ArtifactWriteError(`disco lleno: ${path}`);
    this.files.set(path, Buffer.from(bytes));
  }

  async read(path: string): Promise<Buffer> {
    const b = this.files.get(path);
    if (!b) throw new Error(`no existe ${path}`);
    return b;
  }
}

export async function pixelAt(image: Buffer, x: number, y: number): Promise<{ r: number; g: number; b: number }> {
  const { data, info } = await sharp(image).removeAlpha().raw().toBuffer({ resolveWithObject: true });
  const i = (y * info.width + x) * info.channels;
  return { r: data[i], g: data[i + 1], b: data[i + 2] };
}
