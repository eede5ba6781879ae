import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { CachePutParams, CacheStats, CacheStorePort, PruneResult } from "../../application/ports";
import { CacheCorruptError, CacheFullError, CacheWriteError, errorMessage } from "../../domain/errors";
import type { CacheEntry, CacheEntryStatus } from "../../domain/models";
import { computeSha256, getBlobStoragePath } from "../../utils/hash";
import { logger } from "../../utils/logger";

const INDEX_FILE = "index.json";
const INDEX_FORMAT = 1;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface FsCacheStoreOptions {
  rootDir: string;
  ttlDays: number;
  maxBytes: number;
  now?: () => Date;
}

interface IndexFile {
  format: number;
  entries: CacheEntry[];
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isCacheEntry(v: unknown): v is CacheEntry {
  if (!isRecord(v)) return false;
  return (
    typeof v.key === "string" &&
    typeof v.sourceUrl === "string" &&
    typeof v.blobPath === "string" &&
    typeof v.contentHash === "string" &&
    typeof v.sizeBytes === "number" &&
    typeof v.fetchedAt === "string" &&
    typeof v.lastAccessedAt === "string" &&
    typeof v.accessCount === "number" &&
    typeof v.version === "number" &&
    (v.status === "active" || v.status === "stale" || v.status === "evicted")
  );
}

function isNotFound(error: unknown): boolean {
  return isRecord(error) && error.code === "ENOENT";
}

/**
 * Cache en disco: index.json + blobs direccionados por contenido.
 * Todas las mutaciones pasan por una cola; index y blobs se escriben
 * a un temporal y se renombran.
 */
export class FsCacheStore implements CacheStorePort {
  private readonly rootDir: string;
  private readonly ttlMs: number;
  private readonly maxBytes: number;
  private readonly now: () => Date;

  private index: Map<string, CacheEntry> | null = null;
  private queue: Promise<void> = Promise.resolve();
  private dirty = false;
  private tmpCounter = 0;

  private hits = 0;
  private misses = 0;

  constructor(options: FsCacheStoreOptions) {
    this.rootDir = options.rootDir;
    this.ttlMs = options.ttlDays * DAY_MS;
    this.maxBytes = options.maxBytes;
    this.now = options.now ?? (() => new Date());
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    // la cola sigue aunque una operacion falle; el error le llega al llamador via `run`
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async loadIndex(): Promise<Map<string, CacheEntry>> {
    if (this.index) return this.index;

    const index = new Map<string, CacheEntry>();
    let raw: string | null = null;
    try {
      raw = await readFile(join(this.rootDir, INDEX_FILE), "utf-8");
    } catch (error) {
      // sin indice legible la cache arranca vacia; las escrituras fallan con CacheWriteError
      if (!isNotFound(error)) {
        logger.warn("No se pudo leer el indice de cache", { rootDir: this.rootDir, error: errorMessage(error) });
      }
    }

    if (raw !== null) {
      try {
        const parsed: unknown = JSON.parse(raw);
        const entries = isRecord(parsed) && Array.isArray(parsed.entries) ? parsed.entries : [];
        for (const e of entries) {
          if (isCacheEntry(e)) index.set(e.key, e);
        }
      } catch (error) {
        logger.warn("Indice de cache ilegible, se empieza vacio", { error: errorMessage(error) });
        this.dirty = true;
      }
    }

    this.index = index;
    return index;
  }

  private async writeAtomic(relPath: string, data: Uint8Array | string): Promise<void> {
    const target = join(this.rootDir, relPath);
    const tmp = `${target}.tmp-${process.pid}-${this.tmpCounter++}`;
    let tmpCreated = false;
    try {
      await mkdir(dirname(target), { recursive: true });
      tmpCreated = true;
      await writeFile(tmp, data);
      await rename(tmp, target);
    } catch (error) {
      if (tmpCreated) await rm(tmp, { force: true });
      throw new CacheWriteError(`No se pudo escribir ${relPath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async saveIndex(index: Map<string, CacheEntry>): Promise<void> {
    const file: IndexFile = { format: INDEX_FORMAT, entries: [...index.values()] };
    await this.writeAtomic(INDEX_FILE, JSON.stringify(file, null, 2));
    this.dirty = false;
  }

  private isReferenced(index: Map<string, CacheEntry>, blobPath: string, exceptKey: string): boolean {
    for (const e of index.values()) {
      if (e.key !== exceptKey && e.status !== "evicted" && e.blobPath === blobPath) return true;
    }
    return false;
  }

  private async deleteBlobIfOrphan(index: Map<string, CacheEntry>, entry: CacheEntry): Promise<void> {
    if (this.isReferenced(index, entry.blobPath, entry.key)) return;
    try {
      await rm(join(this.rootDir, entry.blobPath), { force: true });
    } catch (error) {
      throw new CacheWriteError(`No se pudo borrar ${entry.blobPath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private activeBytes(index: Map<string, CacheEntry>, exceptKey?: string): number {
    let total = 0;
    for (const e of index.values()) {
      if (e.status === "active" && e.key !== exceptKey) total += e.sizeBytes;
    }
    return total;
  }

  lookup(key: string): Promise<CacheEntry | null> {
    return this.exclusive(async () => {
      const index = await this.loadIndex();
      const entry = index.get(key);

      if (!entry || entry.status !== "active") {
        this.misses++;
        return null;
      }

      const now = this.now();
      if (now.getTime() - Date.parse(entry.fetchedAt) > this.ttlMs) {
        entry.status = "stale";
        this.dirty = true;
        this.misses++;
        logger.debug("Entrada de cache vencida", { key, fetchedAt: entry.fetchedAt });
        return null;
      }

      entry.lastAccessedAt = now.toISOString();
      entry.accessCount++;
      this.dirty = true;
      this.hits++;
      return { ...entry };
    });
  }

  async read(entry: CacheEntry): Promise<Buffer> {
    let bytes: Buffer;
    try {
      bytes = await readFile(join(this.rootDir, entry.blobPath));
    } catch (error) {
      throw new CacheCorruptError(`Blob ilegible (${entry.blobPath}): ${errorMessage(error)}`, { cause: error });
    }
    if (computeSha256(bytes) !== entry.contentHash) {
      throw new CacheCorruptError(`Hash no coincide para ${entry.blobPath}`);
    }
    return bytes;
  }

  put(params: CachePutParams): Promise<CacheEntry> {
    return this.exclusive(async () => {
      const { key, bytes, contentHash, sourceUrl } = params;
      const index = await this.loadIndex();
      const sizeBytes = bytes.length;
      const now = this.now().toISOString();

      if (sizeBytes > this.maxBytes) {
        throw new CacheFullError(`Imagen de ${sizeBytes} bytes supera el limite de cache (${this.maxBytes}).`);
      }

      const existing = index.get(key);

      if (existing && existing.status !== "evicted" && existing.contentHash === contentHash) {
        // mismo contenido: solo metadata
        existing.status = "active";
        existing.fetchedAt = now;
        existing.lastAccessedAt = now;
        await this.saveIndex(index);
        return { ...existing };
      }

      await this.evictFor(index, key, sizeBytes);

      const blobPath = getBlobStoragePath(contentHash);
      await this.writeAtomic(blobPath, bytes);

      const entry: CacheEntry = {
        key,
        sourceUrl,
        blobPath,
        contentHash,
        sizeBytes,
        fetchedAt: now,
        lastAccessedAt: now,
        accessCount: existing?.accessCount ?? 0,
        version: (existing?.version ?? 0) + 1,
        status: "active",
      };
      index.set(key, entry);

      if (existing && existing.status !== "evicted" && existing.blobPath !== blobPath) {
        await this.deleteBlobIfOrphan(index, existing);
      }

      await this.saveIndex(index);
      logger.debug("Imagen cacheada", { key, sizeBytes, version: entry.version });
      return { ...entry };
    });
  }

  /** LRU sobre entradas activas hasta que entren `incoming` bytes. */
  private async evictFor(index: Map<string, CacheEntry>, key: string, incoming: number): Promise<void> {
    let used = this.activeBytes(index, key);
    if (used + incoming <= this.maxBytes) return;

    const candidates = [...index.values()]
      .filter((e) => e.status === "active" && e.key !== key)
      .sort((a, b) => Date.parse(a.lastAccessedAt) - Date.parse(b.lastAccessedAt) || (a.key < b.key ? -1 : 1));

    for (const victim of candidates) {
      if (used + incoming <= this.maxBytes) break;
      victim.status = "evicted";
      // si la escritura que sigue falla, flush igual guarda el desalojo
      this.dirty = true;
      used -= victim.sizeBytes;
      await this.deleteBlobIfOrphan(index, victim);
      logger.info("Entrada de cache desalojada", { key: victim.key, sizeBytes: victim.sizeBytes });
    }
  }

  invalidate(key: string): Promise<boolean> {
    return this.exclusive(async () => {
      const index = await this.loadIndex();
      const entry = index.get(key);
      if (!entry || entry.status !== "active") return false;

      entry.status = "stale";
      await this.saveIndex(index);
      return true;
    });
  }

  prune(params: { olderThanDays: number }): Promise<PruneResult> {
    return this.exclusive(async () => {
      const index = await this.loadIndex();
      const cutoff = this.now().getTime() - params.olderThanDays * DAY_MS;

      const removed = [...index.values()].filter((e) => Date.parse(e.lastAccessedAt) < cutoff);
      let bytesFreed = 0;
      const deleted = new Set<string>();

      for (const entry of removed) index.delete(entry.key);
      for (const entry of removed) {
        if (entry.status === "evicted") continue; // blob ya borrado
        if (deleted.has(entry.blobPath) || this.isReferenced(index, entry.blobPath, entry.key)) continue;
        await this.deleteBlobIfOrphan(index, entry);
        deleted.add(entry.blobPath);
        bytesFreed += entry.sizeBytes;
      }

      if (removed.length > 0 || this.dirty) await this.saveIndex(index);
      logger.info("Cache podada", { entriesRemoved: removed.length, bytesFreed });
      return { entriesRemoved: removed.length, bytesFreed };
    });
  }

  clear(): Promise<void> {
    return this.exclusive(async () => {
      try {
        await rm(this.rootDir, { recursive: true, force: true });
      } catch (error) {
        throw new CacheWriteError(`No se pudo vaciar la cache: ${errorMessage(error)}`, { cause: error });
      }
      this.index = new Map();
      this.dirty = false;
    });
  }

  stats(): Promise<CacheStats> {
    return this.exclusive(async () => {
      const index = await this.loadIndex();
      const entries: Record<CacheEntryStatus, number> = { active: 0, stale: 0, evicted: 0 };
      for (const e of index.values()) entries[e.status]++;
      return { entries, activeBytes: this.activeBytes(index), hits: this.hits, misses: this.misses };
    });
  }

  flush(): Promise<void> {
    return this.exclusive(async () => {
      if (!this.dirty || !this.index) return;
      await this.saveIndex(this.index);
    });
  }
}
