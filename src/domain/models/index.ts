import { InvalidCardListError, InvalidConfigError } from "../errors";

export type Px = number;

// ===== Cartas =====
export interface CardRef {
  id: string;
  name: string;         // nombre a mostrar
  setName: string;
  artist: string;
  generation: number;
  dexNumber: number;
  imageUrl: string;     // vacio => placeholder
}

// ===== Configuracion de exportacion =====
export const QUALITY_TIERS = ["high", "medium", "low"] as const;
export type QualityTier = (typeof QUALITY_TIERS)[number];

export const LABEL_FIELDS = ["dex-number", "set-name", "artist"] as const;
export type LabelField = (typeof LABEL_FIELDS)[number];

export const OUTPUT_FORMATS = ["png", "jpeg"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type GenerationFilter = "all" | number[];

export interface ExportConfig {
  cardsPerRow: number;  // 2..5
  quality: QualityTier;
  labels: LabelField[];
  generations: GenerationFilter;
  title: string;
  format: OutputFormat;
}

export const MIN_CARDS_PER_ROW = 2;
export const MAX_CARDS_PER_ROW = 5;
export const DEFAULT_TITLE = "Mi coleccion de cartas";

export function defaultExportConfig(): ExportConfig {
  return {
    cardsPerRow: 4,
    quality: "high",
    labels: ["dex-number", "set-name"],
    generations: "all",
    title: DEFAULT_TITLE,
    format: "png",
  };
}

export interface QualityProfile {
  cardWidthPx: Px;
  cardHeightPx: Px;
  spacingPx: Px;
  labelHeightPx: Px;    // banda reservada aunque no haya labels
  titleFontPx: number;
  labelFontPx: number;
  maxGridPixels: number; // presupuesto de pixeles de la grilla por pagina
  pngCompressionLevel: number;
  jpegQuality: number;
}

export const HEADER_HEIGHT_PX = 80;
export const FOOTER_HEIGHT_PX = 60;

export const QUALITY_PROFILES: Record<QualityTier, QualityProfile> = {
  high: {
    cardWidthPx: 245,
    cardHeightPx: 342,
    spacingPx: 20,
    labelHeightPx: 48,
    titleFontPx: 24,
    labelFontPx: 10,
    maxGridPixels: 6_600_000,
    pngCompressionLevel: 1,
    jpegQuality: 95,
  },
  medium: {
    cardWidthPx: 180,
    cardHeightPx: 252,
    spacingPx: 15,
    labelHeightPx: 42,
    titleFontPx: 20,
    labelFontPx: 9,
    maxGridPixels: 7_250_000,
    pngCompressionLevel: 3,
    jpegQuality: 85,
  },
  low: {
    cardWidthPx: 120,
    cardHeightPx: 168,
    spacingPx: 10,
    labelHeightPx: 36,
    titleFontPx: 16,
    labelFontPx: 8,
    maxGridPixels: 5_020_000,
    pngCompressionLevel: 6,
    jpegQuality: 70,
  },
};

// ===== Layout =====
export interface GridLayout {
  cols: number;
  rowsPerPage: number;
  capacityPerPage: number;
  maxCells: number;

  cardWidthPx: Px;
  cardHeightPx: Px;
  labelHeightPx: Px;
  spacingPx: Px;

  stepXPx: Px; // card + spacing
  stepYPx: Px; // card + label + spacing
}

export interface PlacedCard {
  card: CardRef;
  row: number;
  col: number;
  xPx: Px;  // esquina superior izquierda de la carta
  yPx: Px;
}

export interface PagePlan {
  pageIndex: number;  // 0-based
  rows: number;
  cols: number;
  widthPx: Px;
  heightPx: Px;
  cells: PlacedCard[];
}

// ===== Resolucion de imagenes =====
export type ImageOrigin = "cache" | "network" | "placeholder";

export interface ResolveFailure {
  kind: "transient" | "permanent" | "cancelled";
  reason: string;
  attempts: number;
  httpStatus?: number;
}

export type ResolvedImage =
  | { card: CardRef; origin: "cache"; bytes: Buffer }
  | { card: CardRef; origin: "network"; bytes: Buffer; attempts: number; cached: boolean; cacheError?: string }
  | { card: CardRef; origin: "placeholder"; failure: ResolveFailure };

// ===== Cache =====
export type CacheEntryStatus = "active" | "stale" | "evicted";

export interface CacheEntry {
  key: string;
  sourceUrl: string;
  blobPath: string;      // relativo a la raiz de la cache
  contentHash: string;
  sizeBytes: number;
  fetchedAt: string;     // ISO
  lastAccessedAt: string;
  accessCount: number;
  version: number;
  status: CacheEntryStatus;
}

// ===== Resultado =====
export type ExportState = "Idle" | "Planning" | "Resolving" | "Rendering" | "Completed" | "Cancelled" | "Failed";

export type ExportStatus = "clean" | "with-placeholders" | "output-failed" | "cancelled" | "nothing-to-export";

/** Carta con imagen resuelta que no se pudo dibujar y quedo como placeholder. */
export interface RenderFallback {
  cardId: string;
  error: string;
}

export interface ArtifactRef {
  pageIndex: number;
  path: string;
  bytes: number;
  widthPx: Px;
  heightPx: Px;
  fallbacks?: RenderFallback[]; // solo si hubo alguna
}

export type PageOutcome =
  | { pageIndex: number; status: "written"; artifact: ArtifactRef }
  | { pageIndex: number; status: "failed"; reason: "write" | "render"; error: string; cardCount: number }
  | { pageIndex: number; status: "skipped"; cardCount: number };

export interface ExportCounts {
  total: number;
  processed: number;
  succeeded: number;
  fromCache: number;
  fromNetwork: number;
  placeholder: number;
  failed: number;         // cartas ausentes de todo artefacto escrito
  cacheWriteFailures: number;
}

export interface CardFailure {
  cardId: string;
  name: string;
  kind: ResolveFailure["kind"];
  reason: string;
}

export interface SideOutput {
  path: string;
  error?: string;
}

export interface ExportResult {
  status: ExportStatus;
  state: "Completed" | "Cancelled";
  artifacts: ArtifactRef[];
  pages: PageOutcome[];
  counts: ExportCounts;
  failures: CardFailure[];
  elapsedMs: number;
  bundle?: SideOutput;
  manifest?: SideOutput;
}

export interface ExportProgress {
  processed: number;
  total: number;
  fraction: number;
  fromCache: number;
  fromNetwork: number;
  placeholder: number;
}

// ===== Validacion =====
const QUALITY_TIER_SET: ReadonlySet<string> = new Set(QUALITY_TIERS);
const LABEL_FIELD_SET: ReadonlySet<string> = new Set(LABEL_FIELDS);
const OUTPUT_FORMAT_SET: ReadonlySet<string> = new Set(OUTPUT_FORMATS);

export function isQualityTier(v: unknown): v is QualityTier {
  return typeof v === "string" && QUALITY_TIER_SET.has(v);
}

export function isLabelField(v: unknown): v is LabelField {
  return typeof v === "string" && LABEL_FIELD_SET.has(v);
}

export function isOutputFormat(v: unknown): v is OutputFormat {
  return typeof v === "string" && OUTPUT_FORMAT_SET.has(v);
}

export function createExportConfig(params: Partial<ExportConfig>): ExportConfig {
  return validateExportConfig({ ...defaultExportConfig(), ...params });
}

export function validateExportConfig(config: ExportConfig): ExportConfig {
  const { cardsPerRow, quality, labels, generations, title, format } = config;

  if (!Number.isInteger(cardsPerRow) || cardsPerRow < MIN_CARDS_PER_ROW || cardsPerRow > MAX_CARDS_PER_ROW) {
    throw new InvalidConfigError(
      `cardsPerRow invalido (${cardsPerRow}). Debe ser un entero entre ${MIN_CARDS_PER_ROW} y ${MAX_CARDS_PER_ROW}.`
    );
  }
  if (!isQualityTier(quality)) {
    throw new InvalidConfigError(`Calidad desconocida: ${String(quality)}. Opciones: ${QUALITY_TIERS.join(", ")}.`);
  }
  if (!isOutputFormat(format)) {
    throw new InvalidConfigError(`Formato desconocido: ${String(format)}. Opciones: ${OUTPUT_FORMATS.join(", ")}.`);
  }

  const unknownLabels = labels.filter((l) => !isLabelField(l));
  if (unknownLabels.length > 0) {
    throw new InvalidConfigError(`Labels desconocidos: ${unknownLabels.join(", ")}.`);
  }

  if (generations !== "all") {
    if (generations.length === 0) {
      throw new InvalidConfigError("El filtro de generaciones no puede estar vacio (usa 'all').");
    }
    const bad = generations.filter((g) => !Number.isInteger(g) || g <= 0);
    if (bad.length > 0) {
      throw new InvalidConfigError(`Generaciones invalidas: ${bad.join(", ")}.`);
    }
  }

  if (typeof title !== "string") throw new InvalidConfigError("El titulo debe ser texto.");

  return {
    cardsPerRow,
    quality,
    // orden canonico, sin duplicados
    labels: LABEL_FIELDS.filter((l) => labels.includes(l)),
    generations: generations === "all" ? "all" : [...new Set(generations)].sort((a, b) => a - b),
    title,
    format,
  };
}

export function assertUniqueCardIds(cards: CardRef[]): void {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const c of cards) {
    if (!c.id) throw new InvalidCardListError(`Carta sin id: ${c.name || "(sin nombre)"}`);
    if (seen.has(c.id)) dupes.add(c.id);
    seen.add(c.id);
  }
  if (dupes.size > 0) {
    throw new InvalidCardListError(`Ids de carta duplicados: ${[...dupes].join(", ")}`);
  }
}

export function cellPixels(profile: QualityProfile): number {
  const stepX = profile.cardWidthPx + profile.spacingPx;
  const stepY = profile.cardHeightPx + profile.labelHeightPx + profile.spacingPx;
  return stepX * stepY;
}
