import type {
  ArtifactRef,
  CacheEntry,
  CacheEntryStatus,
  CardRef,
  ExportConfig,
  ImageOrigin,
  PageOutcome,
  PagePlan,
  PlacedCard,
  ResolvedImage,
} from "../../domain/models";

// ===== Fuente de cartas (capa de datos externa) =====
export interface CardSourcePort {
  listCards(): Promise<CardRef[]>;
}

// ===== Cache de imagenes =====
export interface CachePutParams {
  key: string;
  bytes: Buffer;
  contentHash: string;
  sourceUrl: string;
}

export interface PruneResult {
  entriesRemoved: number;
  bytesFreed: number;
}

export interface CacheStats {
  entries: Record<CacheEntryStatus, number>;
  activeBytes: number;
  hits: number;   // de esta sesion
  misses: number;
}

export interface CacheStorePort {
  lookup(key: string): Promise<CacheEntry | null>;
  read(entry: CacheEntry): Promise<Buffer>;
  put(params: CachePutParams): Promise<CacheEntry>;
  invalidate(key: string): Promise<boolean>;
  prune(params: { olderThanDays: number }): Promise<PruneResult>;
  clear(): Promise<void>;
  stats(): Promise<CacheStats>;
  flush(): Promise<void>;
}

// ===== Red =====
export type FetchOutcome =
  | { ok: true; bytes: Buffer; contentType: string; httpStatus: number }
  | { ok: false; retryable: boolean; error: string; httpStatus?: number };

export interface ImageFetcherPort {
  fetchImage(url: string): Promise<FetchOutcome>;
}

export interface ImageMetadata {
  width: number;
  height: number;
  format: string;
  size: number;
}

export type ValidationOutcome = { ok: true; metadata: ImageMetadata } | { ok: false; error: string };

export interface ImageValidatorPort {
  validate(bytes: Buffer): Promise<ValidationOutcome>;
}

export interface RateLimiterPort {
  acquire(key: string): Promise<void>;
}

// ===== Salida =====
export interface ArtifactSinkPort {
  write(path: string, bytes: Uint8Array): Promise<void>;
  read(path: string): Promise<Buffer>;
}

export interface RenderPageParams {
  page: PagePlan;
  images: ReadonlyMap<string, ResolvedImage>; // por card.id
  config: ExportConfig;
  totalPages: number;
  exportedAt: Date;
  outputPath: string;
}

export interface CompositorPort {
  render(params: RenderPageParams): Promise<ArtifactRef>;
}

export interface PdfBundlerPort {
  bundle(params: { artifacts: ArtifactRef[]; outputPath: string }): Promise<void>;
}

export interface ManifestRow {
  pageIndex: number;
  pageStatus: PageOutcome["status"];
  placed: PlacedCard;
  origin: ImageOrigin | undefined; // undefined => no se llego a resolver
  failureReason?: string;
}

export interface ManifestWriterPort {
  writeManifest(params: { csvPath: string; rows: ManifestRow[] }): Promise<void>;
}
