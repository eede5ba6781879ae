import test from "node:test";
import assert from "node:assert/strict";
import { join } from "node:path";

import { SharpImageValidator } from "../adapters/imaging/sharpImageValidator";
import { SharpCompositor } from "../adapters/renderer/sharpCompositor";
import type {
  CompositorPort,
  ManifestRow,
  ManifestWriterPort,
  PdfBundlerPort,
  RenderPageParams,
} from "../application/ports";
import { ExportContext, ExportCoordinator } from "../application/usecases/exportCollection";
import {
  ArtifactWriteError,
  CacheWriteError,
  ExportJobError,
  InvalidConfigError,
  InvalidStateError,
} from "../domain/errors";
import { ArtifactRef, CardRef, ExportProgress, ExportState, createExportConfig } from "../domain/models";
import { cacheKeyForUrl } from "../utils/hash";
import { setLogLevel } from "../utils/logger";
import {
  MemoryCache,
  MemorySink,
  ScriptedFetcher,
  acceptAll,
  httpError,
  makeCard,
  makeCards,
  okOutcome,
  solidPng,
  truncatedPng,
} from "./helpers";

setLogLevel("silent");

const OUT = "/out";
const FIXED_NOW = new Date("2024-03-05T07:08:09Z");

class RecordingCompositor implements CompositorPort {
  readonly rendered: number[] = [];

  constructor(private readonly failFor: (pageIndex: number) => Error | null = () => null) {}

  async render(params: RenderPageParams): Promise<ArtifactRef> {
    const error = this.failFor(params.page.pageIndex);
    if (error) throw error;
    this.rendered.push(params.page.pageIndex);
    return {
      pageIndex: params.page.pageIndex,
      path: params.outputPath,
      bytes: 1,
      widthPx: params.page.widthPx,
      heightPx: params.page.heightPx,
    };
  }
}

function sevenCards(): CardRef[] {
  return makeCards(7).map((c) => (c.id === "c3" ? { ...c, imageUrl: "" } : c));
}

async function imageFetcher(): Promise<ScriptedFetcher> {
  const png = await solidPng(10, 14, { r: 255, g: 0, b: 0 });
  return new ScriptedFetcher((url) => (url.endsWith("/c5.png") ? httpError(404) : okOutcome(png)));
}

function makeContext(parts: Pick<ExportContext, "cache" | "fetcher" | "compositor"> & Partial<ExportContext>): ExportContext {
  return {
    validator: acceptAll,
    settings: {
      downloadConcurrency: 3,
      renderConcurrency: 1,
      retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1 },
    },
    now: () => FIXED_NOW,
    sleep: async () => {},
    random: () => 0,
    ...parts,
  };
}

test("7 cartas con 2 sin imagen: una pagina, 5 ok y 2 placeholders", async () => {
  const cache = new MemoryCache();
  const fetcher = await imageFetcher();
  const sink = new MemorySink();
  const states: ExportState[] = [];
  const progress: ExportProgress[] = [];

  const coordinator = new ExportCoordinator(makeContext({ cache, fetcher, compositor: new SharpCompositor(sink) }));
  const result = await coordinator.run({
    cards: sevenCards(),
    config: createExportConfig({ cardsPerRow: 4, quality: "high" }),
    outputDir: OUT,
    onStateChange: (s) => states.push(s),
    onProgress: (p) => progress.push(p),
  });

  assert.equal(result.status, "with-placeholders");
  assert.equal(result.state, "Completed");
  assert.equal(coordinator.state, "Completed");
  assert.deepEqual(states, ["Planning", "Resolving", "Rendering", "Completed"]);

  assert.equal(result.artifacts.length, 1);
  const [artifact] = result.artifacts;
  assert.equal(artifact.path, join(OUT, "mi_coleccion_de_cartas_p01.png"));
  assert.equal(artifact.widthPx, 1080);
  assert.equal(artifact.heightPx, 980);
  assert.ok(sink.files.has(artifact.path));

  assert.deepEqual(result.counts, {
    total: 7,
    processed: 7,
    succeeded: 5,
    fromCache: 0,
    fromNetwork: 5,
    placeholder: 2,
    failed: 0,
    cacheWriteFailures: 0,
  });
  assert.deepEqual(
    result.failures.slice().sort((a, b) => a.cardId.localeCompare(b.cardId)),
    [
      { cardId: "c3", name: "Carta c3", kind: "permanent", reason: "missing_image_url" },
      { cardId: "c5", name: "Carta c5", kind: "permanent", reason: "HTTP 404" },
    ]
  );
  assert.equal(fetcher.calls.length, 6);
  assert.equal(result.elapsedMs, 0);

  assert.deepEqual(
    progress.map((p) => p.processed),
    [1, 2, 3, 4, 5, 6, 7]
  );
  assert.equal(progress[6].fraction, 1);
  assert.equal(progress[6].placeholder, 2);
});

test("Segunda exportacion sale de cache: cero descargas de imagenes cacheadas", async () => {
  const cache = new MemoryCache();
  const fetcher = await imageFetcher();
  const job = { cards: sevenCards(), config: createExportConfig({}), outputDir: OUT };

  await new ExportCoordinator(makeContext({ cache, fetcher, compositor: new RecordingCompositor() })).run(job);
  const firstCalls = fetcher.calls.length;

  const again = await new ExportCoordinator(makeContext({ cache, fetcher, compositor: new RecordingCompositor() })).run(job);

  assert.equal(again.counts.fromCache, 5);
  assert.equal(again.counts.fromNetwork, 0);
  // solo se reintenta la que dio 404
  assert.deepEqual(fetcher.calls.slice(firstCalls), ["https://img.test/cards/c5.png"]);
});

test("useCache=false descarga todo y no escribe la cache", async () => {
  const cache = new MemoryCache();
  const fetcher = await imageFetcher();

  const result = await new ExportCoordinator(makeContext({ cache, fetcher, compositor: new RecordingCompositor() })).run({
    cards: sevenCards(),
    config: createExportConfig({}),
    outputDir: OUT,
    useCache: false,
  });

  assert.equal(result.counts.fromNetwork, 5);
  assert.equal(cache.puts, 0);
});

test("Filtro sin cartas: nothing-to-export sin descargas", async () => {
  const fetcher = await imageFetcher();
  const states: ExportState[] = [];

  const result = await new ExportCoordinator(
    makeContext({ cache: new MemoryCache(), fetcher, compositor: new RecordingCompositor() })
  ).run({
    cards: sevenCards(),
    config: createExportConfig({ generations: [7] }),
    outputDir: OUT,
    onStateChange: (s) => states.push(s),
  });

  assert.equal(result.status, "nothing-to-export");
  assert.equal(result.state, "Completed");
  assert.deepEqual(result.artifacts, []);
  assert.equal(result.counts.total, 0);
  assert.equal(fetcher.calls.length, 0);
  assert.deepEqual(states, ["Planning", "Completed"]);
});

test("Falla de escritura en una pagina no frena las demas", async () => {
  const compositor = new RecordingCompositor((i) => (i === 1 ? new ArtifactWriteError("disco lleno") : null));
  const fetcher = await imageFetcher();

  const result = await new ExportCoordinator(makeContext({ cache: new MemoryCache(), fetcher, compositor })).run({
    cards: makeCards(61),
    config: createExportConfig({ cardsPerRow: 4, quality: "high" }),
    outputDir: OUT,
  });

  assert.equal(result.status, "output-failed");
  assert.equal(result.state, "Completed");
  assert.equal(result.artifacts.length, 1);
  assert.equal(result.artifacts[0].pageIndex, 0);
  assert.deepEqual(result.pages[1], {
    pageIndex: 1,
    status: "failed",
    reason: "write",
    error: "disco lleno",
    cardCount: 1,
  });
  assert.equal(result.counts.failed, 1);
  // c5 sigue siendo 404
  assert.equal(result.counts.placeholder, 1);
});

test("Un error de render se reporta como reason=render", async () => {
  const compositor = new RecordingCompositor(() => new Error("svg invalido"));
  const fetcher = await imageFetcher();

  const result = await new ExportCoordinator(makeContext({ cache: new MemoryCache(), fetcher, compositor })).run({
    cards: makeCards(2),
    config: createExportConfig({}),
    outputDir: OUT,
  });

  assert.equal(result.status, "output-failed");
  assert.deepEqual(result.pages, [{ pageIndex: 0, status: "failed", reason: "render", error: "svg invalido", cardCount: 2 }]);
  assert.equal(result.counts.failed, 2);
});

test("Cancelar a mitad de las descargas: no se despacha mas y no se renderiza", async () => {
  const controller = new AbortController();
  const png = await solidPng(4, 4, { r: 0, g: 255, b: 0 });
  const fetcher = new ScriptedFetcher((_url, call) => {
    if (call === 50) controller.abort();
    return okOutcome(png);
  });
  const compositor = new RecordingCompositor();
  const states: ExportState[] = [];

  const ctx = makeContext({ cache: new MemoryCache(), fetcher, compositor });
  ctx.settings.downloadConcurrency = 4;
  const result = await new ExportCoordinator(ctx).run({
    cards: makeCards(100),
    config: createExportConfig({ cardsPerRow: 5, quality: "low" }),
    outputDir: OUT,
    signal: controller.signal,
    onStateChange: (s) => states.push(s),
  });

  assert.equal(result.status, "cancelled");
  assert.equal(result.state, "Cancelled");
  assert.deepEqual(result.artifacts, []);
  assert.deepEqual(result.pages, [{ pageIndex: 0, status: "skipped", cardCount: 100 }]);
  assert.ok(result.counts.processed >= 50, `processed=${result.counts.processed}`);
  assert.ok(result.counts.processed < 100, `processed=${result.counts.processed}`);
  assert.ok(fetcher.calls.length < 100);
  assert.deepEqual(compositor.rendered, []);
  assert.deepEqual(states, ["Planning", "Resolving", "Cancelled"]);
});

test("Senal ya cancelada: no se resuelve nada", async () => {
  const controller = new AbortController();
  controller.abort();
  const fetcher = await imageFetcher();

  const result = await new ExportCoordinator(
    makeContext({ cache: new MemoryCache(), fetcher, compositor: new RecordingCompositor() })
  ).run({ cards: makeCards(3), config: createExportConfig({}), outputDir: OUT, signal: controller.signal });

  assert.equal(result.status, "cancelled");
  assert.equal(result.counts.processed, 0);
  assert.equal(result.counts.total, 3);
  assert.equal(fetcher.calls.length, 0);
});

test("Config invalida se rechaza antes de planificar", async () => {
  const states: ExportState[] = [];
  const coordinator = new ExportCoordinator(
    makeContext({ cache: new MemoryCache(), fetcher: await imageFetcher(), compositor: new RecordingCompositor() })
  );

  await assert.rejects(
    coordinator.run({
      cards: makeCards(3),
      config: { ...createExportConfig({}), cardsPerRow: 9 },
      outputDir: OUT,
      onStateChange: (s) => states.push(s),
    }),
    InvalidConfigError
  );
  assert.equal(coordinator.state, "Idle");
  assert.deepEqual(states, []);
});

test("PDF pedido sin bundler es error de configuracion", async () => {
  const coordinator = new ExportCoordinator(
    makeContext({ cache: new MemoryCache(), fetcher: await imageFetcher(), compositor: new RecordingCompositor() })
  );
  await assert.rejects(
    coordinator.run({ cards: makeCards(1), config: createExportConfig({}), outputDir: OUT, outputs: { pdf: true } }),
    InvalidConfigError
  );
});

test("Un coordinador corre un solo trabajo", async () => {
  const coordinator = new ExportCoordinator(
    makeContext({ cache: new MemoryCache(), fetcher: await imageFetcher(), compositor: new RecordingCompositor() })
  );
  const job = { cards: makeCards(1), config: createExportConfig({}), outputDir: OUT };

  await coordinator.run(job);
  await assert.rejects(coordinator.run(job), InvalidStateError);
});

test("Falla de la capa de cache: trabajo Failed con conteos parciales", async () => {
  const cache = new MemoryCache();
  cache.failLookupWith = new Error("indice roto");
  const coordinator = new ExportCoordinator(
    makeContext({ cache, fetcher: await imageFetcher(), compositor: new RecordingCompositor() })
  );

  await assert.rejects(
    coordinator.run({ cards: makeCards(4), config: createExportConfig({}), outputDir: OUT }),
    (error: unknown) => {
      assert.ok(error instanceof ExportJobError);
      assert.equal(error.processed, 0);
      assert.equal(error.total, 4);
      assert.match(error.message, /indice roto/);
      return true;
    }
  );
  assert.equal(coordinator.state, "Failed");
});

test("Fallos de escritura en cache se cuentan pero no fallan la exportacion", async () => {
  const cache = new MemoryCache();
  cache.failPutWith = new CacheWriteError("sin espacio");

  const result = await new ExportCoordinator(
    makeContext({ cache, fetcher: await imageFetcher(), compositor: new RecordingCompositor() })
  ).run({ cards: sevenCards(), config: createExportConfig({}), outputDir: OUT });

  assert.equal(result.status, "with-placeholders");
  assert.equal(result.counts.cacheWriteFailures, 5);
  assert.equal(result.counts.fromNetwork, 5);
});

test("PDF y manifiesto opcionales", async () => {
  const bundled: ArtifactRef[][] = [];
  const bundler: PdfBundlerPort = {
    async bundle({ artifacts }) {
      bundled.push(artifacts);
    },
  };
  const manifests: ManifestRow[][] = [];
  const manifestWriter: ManifestWriterPort = {
    async writeManifest({ rows }) {
      manifests.push(rows);
    },
  };

  const result = await new ExportCoordinator(
    makeContext({
      cache: new MemoryCache(),
      fetcher: await imageFetcher(),
      compositor: new RecordingCompositor(),
      bundler,
      manifestWriter,
    })
  ).run({
    cards: sevenCards(),
    config: createExportConfig({}),
    outputDir: OUT,
    outputs: { pdf: true, manifest: true },
  });

  assert.equal(result.status, "with-placeholders");
  assert.deepEqual(result.bundle, { path: join(OUT, "mi_coleccion_de_cartas.pdf") });
  assert.deepEqual(result.manifest, { path: join(OUT, "mi_coleccion_de_cartas_manifest.csv") });
  assert.equal(bundled.length, 1);
  assert.equal(bundled[0].length, 1);

  const rows = manifests[0];
  assert.equal(rows.length, 7);
  const c3 = rows.find((r) => r.placed.card.id === "c3");
  assert.equal(c3?.origin, "placeholder");
  assert.equal(c3?.failureReason, "missing_image_url");
  assert.equal(c3?.pageStatus, "written");
  assert.equal(rows.find((r) => r.placed.card.id === "c1")?.origin, "network");
});

test("Si el PDF falla el estado es output-failed", async () => {
  const bundler: PdfBundlerPort = {
    async bundle() {
      throw new Error("pdf roto");
    },
  };

  const result = await new ExportCoordinator(
    makeContext({ cache: new MemoryCache(), fetcher: await imageFetcher(), compositor: new RecordingCompositor(), bundler })
  ).run({ cards: makeCards(2), config: createExportConfig({}), outputDir: OUT, outputs: { pdf: true } });

  assert.equal(result.status, "output-failed");
  assert.deepEqual(result.bundle, { path: join(OUT, "mi_coleccion_de_cartas.pdf"), error: "pdf roto" });
  assert.equal(result.artifacts.length, 1);
});

test("Ids duplicados se rechazan", async () => {
  const coordinator = new ExportCoordinator(
    makeContext({ cache: new MemoryCache(), fetcher: await imageFetcher(), compositor: new RecordingCompositor() })
  );
  await assert.rejects(
    coordinator.run({ cards: [makeCard("c1"), makeCard("c1")], config: createExportConfig({}), outputDir: OUT }),
    /duplicados/
  );
});

test("Imagen truncada: placeholder permanente y nada en cache", async () => {
  const cache = new MemoryCache();
  const bytes = await truncatedPng(200, 280);
  const fetcher = new ScriptedFetcher(() => okOutcome(bytes));

  const result = await new ExportCoordinator(
    makeContext({
      cache,
      fetcher,
      validator: new SharpImageValidator(1_000_000),
      compositor: new SharpCompositor(new MemorySink()),
    })
  ).run({ cards: makeCards(3), config: createExportConfig({ quality: "low" }), outputDir: OUT });

  assert.equal(result.status, "with-placeholders");
  assert.equal(result.counts.succeeded, 0);
  assert.equal(result.counts.placeholder, 3);
  assert.equal(cache.puts, 0);
  // permanente: un solo intento por carta
  assert.equal(fetcher.calls.length, 3);
  assert.equal(result.failures.length, 3);
  for (const f of result.failures) {
    assert.equal(f.kind, "permanent");
    assert.match(f.reason, /^invalid_image: /);
  }
});

test("Imagen que no se puede dibujar al renderizar cuenta como placeholder", async () => {
  const cache = new MemoryCache();
  const broken = await truncatedPng(200, 280);
  const good = await solidPng(20, 28, { r: 0, g: 0, b: 255 });
  const fetcher = new ScriptedFetcher((url) => okOutcome(url.endsWith("/c2.png") ? good : broken));
  const manifests: ManifestRow[][] = [];

  const result = await new ExportCoordinator(
    makeContext({
      cache,
      fetcher,
      compositor: new SharpCompositor(new MemorySink()),
      manifestWriter: {
        async writeManifest({ rows }) {
          manifests.push(rows);
        },
      },
    })
  ).run({
    cards: makeCards(3),
    config: createExportConfig({ quality: "low" }),
    outputDir: OUT,
    outputs: { manifest: true },
  });

  assert.equal(result.status, "with-placeholders");
  assert.equal(result.artifacts.length, 1);
  assert.deepEqual(
    result.artifacts[0].fallbacks?.map((f) => f.cardId),
    ["c1", "c3"]
  );
  assert.equal(result.counts.succeeded, 1);
  assert.equal(result.counts.fromNetwork, 1);
  assert.equal(result.counts.placeholder, 2);
  assert.deepEqual(
    result.failures.map((f) => f.cardId).sort(),
    ["c1", "c3"]
  );
  for (const f of result.failures) assert.match(f.reason, /^undecodable_image: /);

  // la copia mala no se vuelve a servir desde cache
  assert.deepEqual(cache.invalidations.slice().sort(), [
    cacheKeyForUrl("https://img.test/cards/c1.png"),
    cacheKeyForUrl("https://img.test/cards/c3.png"),
  ].sort());

  const c1 = manifests[0].find((r) => r.placed.card.id === "c1");
  assert.equal(c1?.origin, "placeholder");
  assert.match(c1?.failureReason ?? "", /^undecodable_image: /);
});
