import { resolve } from "node:path";
import { parseArgs } from "node:util";

import { estimateExport } from "../../application/usecases/estimateExport";
import { ExportCoordinator } from "../../application/usecases/exportCollection";
import { config, validateConfig } from "../../config";
import { InvalidCardListError, InvalidConfigError } from "../../domain/errors";
import {
  ExportConfig,
  ExportProgress,
  ExportResult,
  GenerationFilter,
  LabelField,
  QUALITY_TIERS,
  createExportConfig,
  isLabelField,
  isOutputFormat,
  isQualityTier,
} from "../../domain/models";
import { cacheKeyForUrl } from "../../utils/hash";
import { createCacheStore, createExportContext } from "../context";
import { CsvCardSource } from "../persistence/csvCardReader";

export const EXIT_OK = 0;
export const EXIT_OUTPUT_FAILED = 1;
export const EXIT_USAGE = 2;
export const EXIT_CANCELLED = 130;

const USAGE = `Uso:
  card-poster export <cartas.csv> --out <carpeta> [opciones]
  card-poster estimate <cartas.csv> [opciones]
  card-poster cache stats | prune [--days N] | clear | invalidate <url>

Opciones de exportacion:
  --per-row N          cartas por fila (2-5, default 4)
  --quality q          ${QUALITY_TIERS.join(" | ")} (default high)
  --labels a,b         dex-number,set-name,artist | none
  --generation g       all | 1,2,...
  --title t            titulo del poster
  --format f           png | jpeg
  --pdf                ademas, un PDF con todas las paginas
  --manifest           ademas, un CSV con la ubicacion de cada carta
  --no-cache           no lee ni escribe la cache
`;

const OPTIONS = {
  out: { type: "string", short: "o" },
  "per-row": { type: "string" },
  quality: { type: "string" },
  labels: { type: "string" },
  generation: { type: "string" },
  title: { type: "string" },
  format: { type: "string" },
  pdf: { type: "boolean" },
  manifest: { type: "boolean" },
  "no-cache": { type: "boolean" },
  days: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

type CliValues = ReturnType<typeof parseCli>["values"];

export function parseCli(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

function parseGenerations(raw: string): GenerationFilter {
  if (raw.trim().toLowerCase() === "all") return "all";
  return raw.split(",").map((g) => {
    const n = Number(g.trim());
    if (!Number.isInteger(n) || n <= 0) throw new InvalidConfigError(`Generacion invalida: ${g}`);
    return n;
  });
}

function parseLabels(raw: string): LabelField[] {
  if (raw.trim().toLowerCase() === "none") return [];
  const labels: LabelField[] = [];
  for (const part of raw.split(",")) {
    const l = part.trim();
    if (!isLabelField(l)) throw new InvalidConfigError(`Label desconocido: ${l}`);
    labels.push(l);
  }
  return labels;
}

export function exportConfigFromFlags(values: CliValues): ExportConfig {
  const partial: Partial<ExportConfig> = {};

  if (values["per-row"] !== undefined) partial.cardsPerRow = Number(values["per-row"]);
  if (values.quality !== undefined) {
    if (!isQualityTier(values.quality)) throw new InvalidConfigError(`Calidad desconocida: ${values.quality}`);
    partial.quality = values.quality;
  }
  if (values.format !== undefined) {
    if (!isOutputFormat(values.format)) throw new InvalidConfigError(`Formato desconocido: ${values.format}`);
    partial.format = values.format;
  }
  if (values.labels !== undefined) partial.labels = parseLabels(values.labels);
  if (values.generation !== undefined) partial.generations = parseGenerations(values.generation);
  if (values.title !== undefined) partial.title = values.title;

  return createExportConfig(partial);
}

export function exitCodeFor(result: ExportResult): number {
  if (result.status === "cancelled") return EXIT_CANCELLED;
  if (result.status === "output-failed") return EXIT_OUTPUT_FAILED;
  return EXIT_OK;
}

function progressPrinter(): (p: ExportProgress) => void {
  let lastDecile = -1;
  return (p) => {
    const decile = Math.floor(p.fraction * 10);
    if (decile === lastDecile) return;
    lastDecile = decile;
    console.log(
      `Progreso: ${p.processed}/${p.total} (cache ${p.fromCache}, red ${p.fromNetwork}, placeholder ${p.placeholder})`
    );
  };
}

function printSummary(result: ExportResult): void {
  const c = result.counts;
  console.log("\n=== RESUMEN ===");
  console.log(`Estado: ${result.status}`);
  console.log(`Cartas: ${c.total} (ok ${c.succeeded}, cache ${c.fromCache}, red ${c.fromNetwork})`);
  console.log(`Placeholders: ${c.placeholder}`);
  if (c.failed > 0) console.log(`Cartas en paginas fallidas: ${c.failed}`);
  if (c.cacheWriteFailures > 0) console.log(`Fallos de escritura en cache: ${c.cacheWriteFailures}`);
  console.log(`Tiempo: ${(result.elapsedMs / 1000).toFixed(1)} s`);

  for (const page of result.pages) {
    if (page.status === "written") console.log(`- Pagina ${page.pageIndex + 1}: ${page.artifact.path}`);
    else if (page.status === "failed") console.log(`- Pagina ${page.pageIndex + 1}: ERROR (${page.reason}) ${page.error}`);
    else console.log(`- Pagina ${page.pageIndex + 1}: omitida`);
  }
  if (result.bundle) console.log(`PDF: ${result.bundle.error ? `ERROR ${result.bundle.error}` : result.bundle.path}`);
  if (result.manifest) {
    console.log(`Manifiesto: ${result.manifest.error ? `ERROR ${result.manifest.error}` : result.manifest.path}`);
  }

  if (result.failures.length > 0) {
    console.log("\nCartas sin imagen:");
    for (const f of result.failures) console.log(`- ${f.cardId} ${f.name}: ${f.reason}`);
  }
}

async function runExport(csvPath: string | undefined, values: CliValues): Promise<number> {
  if (!csvPath) throw new InvalidConfigError("Falta el CSV de cartas.");
  if (!values.out) throw new InvalidConfigError("Falta --out <carpeta>.");

  const exportConfig = exportConfigFromFlags(values);
  const cards = await new CsvCardSource(resolve(csvPath)).listCards();

  const controller = new AbortController();
  const onSigint = () => {
    console.log("\nCancelando... (se terminan las descargas en curso)");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const coordinator = new ExportCoordinator(createExportContext());
    const result = await coordinator.run({
      cards,
      config: exportConfig,
      outputDir: resolve(values.out),
      signal: controller.signal,
      useCache: !values["no-cache"],
      outputs: { pdf: Boolean(values.pdf), manifest: Boolean(values.manifest) },
      onProgress: progressPrinter(),
    });

    printSummary(result);
    return exitCodeFor(result);
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

async function runEstimate(csvPath: string | undefined, values: CliValues): Promise<number> {
  if (!csvPath) throw new InvalidConfigError("Falta el CSV de cartas.");

  const cards = await new CsvCardSource(resolve(csvPath)).listCards();
  const estimate = estimateExport(cards, exportConfigFromFlags(values));

  console.log("\n=== ESTIMACION ===");
  console.log(`Cartas: ${estimate.cardCount}`);
  console.log(`Entran por pagina: ${estimate.capacityPerPage}`);
  console.log(`Paginas: ${estimate.pageCount}`);
  for (const p of estimate.pages) {
    console.log(`- Pagina ${p.pageIndex + 1}: ${p.widthPx}x${p.heightPx}px (${p.rows} filas)`);
  }
  console.log(`Memoria aprox. sin comprimir: ${estimate.estimatedRawMb} MB`);
  for (const w of estimate.warnings) console.log(`AVISO: ${w}`);
  return EXIT_OK;
}

async function runCache(action: string | undefined, arg: string | undefined, values: CliValues): Promise<number> {
  const cache = createCacheStore();

  switch (action) {
    case "stats": {
      const s = await cache.stats();
      console.log(`Cache: ${config.cacheDir}`);
      console.log(`Activas: ${s.entries.active}  Vencidas: ${s.entries.stale}  Desalojadas: ${s.entries.evicted}`);
      console.log(`Tamano activo: ${(s.activeBytes / (1024 * 1024)).toFixed(2)} MB`);
      return EXIT_OK;
    }
    case "prune": {
      const days = values.days !== undefined ? Number(values.days) : config.cacheTtlDays;
      if (!Number.isFinite(days) || days < 0) throw new InvalidConfigError(`--days invalido: ${values.days}`);
      const r = await cache.prune({ olderThanDays: days });
      console.log(`Eliminadas ${r.entriesRemoved} entradas (${(r.bytesFreed / (1024 * 1024)).toFixed(2)} MB).`);
      return EXIT_OK;
    }
    case "clear":
      await cache.clear();
      console.log("Cache vaciada.");
      return EXIT_OK;
    case "invalidate": {
      if (!arg) throw new InvalidConfigError("Falta la URL a invalidar.");
      const ok = await cache.invalidate(cacheKeyForUrl(arg));
      console.log(ok ? "Entrada invalidada." : "La URL no estaba en cache.");
      return EXIT_OK;
    }
    default:
      throw new InvalidConfigError(`Accion de cache desconocida: ${action ?? "(ninguna)"}`);
  }
}

function isParseArgsError(error: unknown): error is Error {
  return error instanceof Error && "code" in error && String(error.code).startsWith("ERR_PARSE_ARGS_");
}

function usageError(message: string): number {
  console.error(`Error: ${message}\n`);
  console.error(USAGE);
  return EXIT_USAGE;
}

export async function runCli(argv: string[] = process.argv.slice(2)): Promise<number> {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (error) {
    if (!isParseArgsError(error)) throw error;
    return usageError(error.message);
  }

  const { values, positionals } = parsed;
  const [command, first, second] = positionals;

  if (values.help || !command) {
    console.log(USAGE);
    return command ? EXIT_OK : EXIT_USAGE;
  }

  validateConfig();

  try {
    if (command === "export") return await runExport(first, values);
    if (command === "estimate") return await runEstimate(first, values);
    if (command === "cache") return await runCache(first, second, values);
    throw new InvalidConfigError(`Comando desconocido: ${command}`);
  } catch (error) {
    if (!(error instanceof InvalidConfigError) && !(error instanceof InvalidCardListError)) throw error;
    return usageError(error.message);
  }
}
