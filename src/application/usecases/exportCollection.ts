import {
  ArtifactWriteError,
  CacheWriteError,
  ExportJobError,
  InvalidConfigError,
  InvalidStateError,
  errorMessage,
} from "../../domain/errors";
import {
  ArtifactRef,
  CardFailure,
  CardRef,
  ExportConfig,
  ExportCounts,
  ExportProgress,
  ExportResult,
  ExportState,
  ExportStatus,
  ImageOrigin,
  PageOutcome,
  PagePlan,
  RenderFallback,
  ResolvedImage,
  SideOutput,
  assertUniqueCardIds,
  validateExportConfig,
} from "../../domain/models";
import { cacheKeyForUrl } from "../../utils/hash";
import { logger } from "../../utils/logger";
import type { LayoutEngine } from "../engines";
import { GridLayoutEngine } from "../engines/gridEngine";
import type {
  CacheStorePort,
  CompositorPort,
  ImageFetcherPort,
  ImageValidatorPort,
  ManifestRow,
  ManifestWriterPort,
  PdfBundlerPort,
  RateLimiterPort,
} from "../ports";
import { bundleArtifactPath, manifestArtifactPath, pageArtifactPath } from "../services/artifactNames";
import { Limiter, createLimiter } from "../services/concurrency";
import { Downloader } from "../services/downloader";
import type { RetryPolicy } from "../services/retry";

export interface ExportSettings {
  downloadConcurrency: number;
  renderConcurrency: number;
  retry: RetryPolicy;
}

/** Todo lo que un trabajo necesita, explicito. Nada global. */
export interface ExportContext {
  cache: CacheStorePort;
  fetcher: ImageFetcherPort;
  validator: ImageValidatorPort;
  compositor: CompositorPort;
  bundler?: PdfBundlerPort;
  manifestWriter?: ManifestWriterPort;
  rateLimiter?: RateLimiterPort;
  engine?: LayoutEngine;
  settings: ExportSettings;
  now: () => Date;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface ExportJob {
  cards: CardRef[];
  config: ExportConfig;
  outputDir: string;
  signal?: AbortSignal;
  useCache?: boolean; // default true
  outputs?: { pdf?: boolean; manifest?: boolean };
  onProgress?: (progress: ExportProgress) => void;
  onStateChange?: (state: ExportState) => void;
}

const TRANSITIONS: Record<ExportState, readonly ExportState[]> = {
  Idle: ["Planning"],
  Planning: ["Resolving", "Completed", "Cancelled", "Failed"],
  Resolving: ["Rendering", "Cancelled", "Failed"],
  Rendering: ["Completed", "Cancelled", "Failed"],
  Completed: [],
  Cancelled: [],
  Failed: [],
};

interface CardSummary {
  origin: ImageOrigin;
  failureReason?: string;
}

function emptyCounts(total: number): ExportCounts {
  return {
    total,
    processed: 0,
    succeeded: 0,
    fromCache: 0,
    fromNetwork: 0,
    placeholder: 0,
    failed: 0,
    cacheWriteFailures: 0,
  };
}

export class ExportCoordinator {
  private current: ExportState = "Idle";
  private onStateChange?: (state: ExportState) => void;

  constructor(private readonly ctx: ExportContext) {}

  get state(): ExportState {
    return this.current;
  }

  private transition(next: ExportState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new InvalidStateError(`Transicion invalida: ${this.current} -> ${next}`);
    }
    logger.info("Estado de exportacion", { from: this.current, to: next });
    this.current = next;
    this.onStateChange?.(next);
  }

  async run(job: ExportJob): Promise<ExportResult> {
    if (this.current !== "Idle") {
      throw new InvalidStateError(`El coordinador ya fue usado (estado ${this.current}).`);
    }

    const config = validateExportConfig(job.config);
    assertUniqueCardIds(job.cards);
    if (job.outputs?.pdf && !this.ctx.bundler) {
      throw new InvalidConfigError("Se pidio PDF pero no hay bundler configurado.");
    }
    if (job.outputs?.manifest && !this.ctx.manifestWriter) {
      throw new InvalidConfigError("Se pidio manifiesto pero no hay writer configurado.");
    }

    this.onStateChange = job.onStateChange;
    const startedAt = this.ctx.now().getTime();
    const elapsed = () => this.ctx.now().getTime() - startedAt;

    this.transition("Planning");
    const engine = this.ctx.engine ?? new GridLayoutEngine();
    const pages = engine.plan(job.cards, config);
    const total = pages.reduce((n, p) => n + p.cells.length, 0);

    if (job.signal?.aborted) {
      this.transition("Cancelled");
      return {
        status: "cancelled",
        state: "Cancelled",
        artifacts: [],
        pages: pages.map((p): PageOutcome => ({ pageIndex: p.pageIndex, status: "skipped", cardCount: p.cells.length })),
        counts: emptyCounts(total),
        failures: [],
        elapsedMs: elapsed(),
      };
    }

    if (pages.length === 0) {
      logger.info("Nada para exportar con el filtro actual", { cards: job.cards.length });
      this.transition("Completed");
      return {
        status: "nothing-to-export",
        state: "Completed",
        artifacts: [],
        pages: [],
        counts: emptyCounts(0),
        failures: [],
        elapsedMs: elapsed(),
      };
    }

    logger.info("Plan de exportacion", { engine: engine.id, pages: pages.length, cards: total });
    this.transition("Resolving");

    const run = new JobRun(this.ctx, job, config, pages, total);
    try {
      await run.resolveAll();
    } catch (error) {
      await run.settleRenders();
      this.transition("Failed");
      await run.flushCache();
      logger.error("Exportacion fallida", { error: errorMessage(error), processed: run.counts.processed, total });
      throw new ExportJobError(
        `La exportacion fallo: ${errorMessage(error)}`,
        run.counts.processed,
        total,
        { cause: error }
      );
    }

    let cancelled = run.aborted();
    if (!cancelled) this.transition("Rendering");

    await run.settleRenders();
    cancelled = cancelled || run.aborted();

    let bundle: SideOutput | undefined;
    let manifest: SideOutput | undefined;
    if (!cancelled) {
      bundle = await run.writeBundle();
      manifest = await run.writeManifest();
    }

    await run.flushCache();
    this.transition(cancelled ? "Cancelled" : "Completed");

    const outcomes = run.pageOutcomes();
    const counts = { ...run.counts };
    counts.failed = outcomes.reduce((n, o) => (o.status === "failed" ? n + o.cardCount : n), 0);

    const outputFailed = counts.failed > 0 || Boolean(bundle?.error) || Boolean(manifest?.error);
    let status: ExportStatus;
    if (cancelled) status = "cancelled";
    else if (outputFailed) status = "output-failed";
    else if (counts.placeholder > 0) status = "with-placeholders";
    else status = "clean";

    const result: ExportResult = {
      status,
      state: cancelled ? "Cancelled" : "Completed",
      artifacts: outcomes.flatMap((o) => (o.status === "written" ? [o.artifact] : [])),
      pages: outcomes,
      counts,
      failures: run.failures,
      elapsedMs: elapsed(),
      ...(bundle ? { bundle } : {}),
      ...(manifest ? { manifest } : {}),
    };

    logger.info("Exportacion terminada", {
      status,
      artifacts: result.artifacts.length,
      placeholder: counts.placeholder,
      failed: counts.failed,
      elapsedMs: result.elapsedMs,
    });
    return result;
  }
}

/** Estado mutable de una sola ejecucion. */
class JobRun {
  readonly counts: ExportCounts;
  readonly failures: CardFailure[] = [];

  private readonly downloader: Downloader;
  private readonly renderLimit: Limiter;
  private readonly images = new Map<string, ResolvedImage>(); // bytes vivos hasta renderizar la pagina
  private readonly summaries = new Map<string, CardSummary>();
  private readonly pending: number[];
  private readonly outcomes: Array<PageOutcome | undefined>;
  private readonly renders: Promise<void>[] = [];
  private readonly exportedAt: Date;

  constructor(
    private readonly ctx: ExportContext,
    private readonly job: ExportJob,
    private readonly config: ExportConfig,
    private readonly pages: PagePlan[],
    total: number
  ) {
    this.counts = emptyCounts(total);
    this.downloader = new Downloader({
      cache: ctx.cache,
      fetcher: ctx.fetcher,
      validator: ctx.validator,
      rateLimiter: ctx.rateLimiter,
      retry: ctx.settings.retry,
      sleep: ctx.sleep,
      random: ctx.random,
    });
    this.renderLimit = createLimiter(ctx.settings.renderConcurrency);
    this.pending = pages.map((p) => p.cells.length);
    this.outcomes = pages.map(() => undefined);
    this.exportedAt = ctx.now();
  }

  aborted(): boolean {
    return this.job.signal?.aborted ?? false;
  }

  async resolveAll(): Promise<void> {
    const downloadLimit = createLimiter(this.ctx.settings.downloadConcurrency);
    const useCache = this.job.useCache ?? true;

    const tasks = this.pages.flatMap((page) =>
      page.cells.map((cell) =>
        downloadLimit(async () => {
          // cancelado => no se despacha nada mas
          if (this.aborted()) return;
          const image = await this.downloader.resolve(cell.card, { cacheOptOut: !useCache, signal: this.job.signal });
          this.record(page, image);
        })
      )
    );

    const settled = await Promise.allSettled(tasks);
    const rejected = settled.find((s): s is PromiseRejectedResult => s.status === "rejected");
    if (rejected) throw rejected.reason;
  }

  private record(page: PagePlan, image: ResolvedImage): void {
    const { card } = image;
    const c = this.counts;
    c.processed++;

    if (image.origin === "cache") {
      c.fromCache++;
      c.succeeded++;
      this.summaries.set(card.id, { origin: "cache" });
    } else if (image.origin === "network") {
      c.fromNetwork++;
      c.succeeded++;
      if (image.cacheError) c.cacheWriteFailures++;
      this.summaries.set(card.id, { origin: "network" });
    } else {
      c.placeholder++;
      this.failures.push({ cardId: card.id, name: card.name, kind: image.failure.kind, reason: image.failure.reason });
      this.summaries.set(card.id, { origin: "placeholder", failureReason: image.failure.reason });
    }
    this.images.set(card.id, image);

    this.job.onProgress?.({
      processed: c.processed,
      total: c.total,
      fraction: c.total === 0 ? 1 : c.processed / c.total,
      fromCache: c.fromCache,
      fromNetwork: c.fromNetwork,
      placeholder: c.placeholder,
    });

    this.pending[page.pageIndex]--;
    if (this.pending[page.pageIndex] === 0) {
      this.renders.push(this.renderLimit(() => this.renderPage(page)));
    }
  }

  private async renderPage(page: PagePlan): Promise<void> {
    const cardCount = page.cells.length;
    if (this.aborted()) {
      this.outcomes[page.pageIndex] = { pageIndex: page.pageIndex, status: "skipped", cardCount };
      this.release(page);
      return;
    }

    const outputPath = pageArtifactPath(this.job.outputDir, this.config, page.pageIndex);
    let fallbacks: RenderFallback[] = [];
    try {
      const artifact = await this.ctx.compositor.render({
        page,
        images: this.images,
        config: this.config,
        totalPages: this.pages.length,
        exportedAt: this.exportedAt,
        outputPath,
      });
      this.outcomes[page.pageIndex] = { pageIndex: page.pageIndex, status: "written", artifact };
      fallbacks = artifact.fallbacks ?? [];
      logger.info("Pagina escrita", { page: page.pageIndex + 1, path: artifact.path, bytes: artifact.bytes });
    } catch (error) {
      const reason = error instanceof ArtifactWriteError ? "write" : "render";
      this.outcomes[page.pageIndex] = {
        pageIndex: page.pageIndex,
        status: "failed",
        reason,
        error: errorMessage(error),
        cardCount,
      };
      logger.error("No se pudo generar la pagina", { page: page.pageIndex + 1, reason, error: errorMessage(error) });
    } finally {
      this.release(page);
    }

    await this.demoteFallbacks(page, fallbacks);
  }

  /** Imagenes resueltas que no se pudieron dibujar cuentan como placeholder. */
  private async demoteFallbacks(page: PagePlan, fallbacks: RenderFallback[]): Promise<void> {
    const c = this.counts;
    for (const fallback of fallbacks) {
      const cell = page.cells.find((p) => p.card.id === fallback.cardId);
      const summary = this.summaries.get(fallback.cardId);
      if (!cell || !summary || summary.origin === "placeholder") continue;

      const { card } = cell;
      c.succeeded--;
      if (summary.origin === "cache") c.fromCache--;
      else c.fromNetwork--;
      c.placeholder++;

      const reason = `undecodable_image: ${fallback.error}`;
      this.failures.push({ cardId: card.id, name: card.name, kind: "permanent", reason });
      this.summaries.set(card.id, { origin: "placeholder", failureReason: reason });
      logger.warn("Imagen ilegible al renderizar, queda placeholder", { cardId: card.id, error: fallback.error });

      await this.dropCachedImage(card);
    }
  }

  private async dropCachedImage(card: CardRef): Promise<void> {
    const url = card.imageUrl.trim();
    if (!url || this.job.useCache === false) return;
    try {
      await this.ctx.cache.invalidate(cacheKeyForUrl(url));
    } catch (error) {
      if (!(error instanceof CacheWriteError)) throw error;
      this.counts.cacheWriteFailures++;
      logger.warn("No se pudo invalidar la imagen en cache", { cardId: card.id, error: error.message });
    }
  }

  private release(page: PagePlan): void {
    for (const cell of page.cells) this.images.delete(cell.card.id);
  }

  async settleRenders(): Promise<void> {
    // renderPage no rechaza; allSettled igual protege ante un fallo del limiter
    const settled = await Promise.allSettled(this.renders);
    for (const s of settled) {
      if (s.status === "rejected") logger.error("Render abortado", { error: errorMessage(s.reason) });
    }
  }

  pageOutcomes(): PageOutcome[] {
    return this.pages.map(
      (page, i): PageOutcome =>
        this.outcomes[i] ?? { pageIndex: page.pageIndex, status: "skipped", cardCount: page.cells.length }
    );
  }

  private writtenArtifacts(): ArtifactRef[] {
    return this.pageOutcomes().flatMap((o) => (o.status === "written" ? [o.artifact] : []));
  }

  async writeBundle(): Promise<SideOutput | undefined> {
    const { bundler } = this.ctx;
    if (!this.job.outputs?.pdf || !bundler) return undefined;

    const outputPath = bundleArtifactPath(this.job.outputDir, this.config);
    const artifacts = this.writtenArtifacts();
    if (artifacts.length === 0) return { path: outputPath, error: "No hay paginas escritas para el PDF." };

    try {
      await bundler.bundle({ artifacts, outputPath });
      logger.info("PDF generado", { path: outputPath, pages: artifacts.length });
      return { path: outputPath };
    } catch (error) {
      logger.error("No se pudo generar el PDF", { path: outputPath, error: errorMessage(error) });
      return { path: outputPath, error: errorMessage(error) };
    }
  }

  async writeManifest(): Promise<SideOutput | undefined> {
    const { manifestWriter } = this.ctx;
    if (!this.job.outputs?.manifest || !manifestWriter) return undefined;

    const csvPath = manifestArtifactPath(this.job.outputDir, this.config);
    const outcomes = this.pageOutcomes();
    const rows: ManifestRow[] = this.pages.flatMap((page) =>
      page.cells.map((placed) => {
        const summary = this.summaries.get(placed.card.id);
        return {
          pageIndex: page.pageIndex,
          pageStatus: outcomes[page.pageIndex].status,
          placed,
          origin: summary?.origin,
          ...(summary?.failureReason ? { failureReason: summary.failureReason } : {}),
        };
      })
    );

    try {
      await manifestWriter.writeManifest({ csvPath, rows });
      logger.info("Manifiesto generado", { path: csvPath, rows: rows.length });
      return { path: csvPath };
    } catch (error) {
      logger.error("No se pudo generar el manifiesto", { path: csvPath, error: errorMessage(error) });
      return { path: csvPath, error: errorMessage(error) };
    }
  }

  async flushCache(): Promise<void> {
    try {
      await this.ctx.cache.flush();
    } catch (error) {
      if (!(error instanceof CacheWriteError)) throw error;
      this.counts.cacheWriteFailures++;
      logger.warn("No se pudo guardar el indice de cache", { error: error.message });
    }
  }
}
