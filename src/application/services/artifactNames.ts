import { join } from "node:path";
import type { ExportConfig } from "../../domain/models";

const FALLBACK_BASE_NAME = "coleccion";

export function slugify(text: string): string {
  return text
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/** "Mi coleccion" + gens [1,2] => "mi_coleccion_gen1-2" */
export function artifactBaseName(config: ExportConfig): string {
  const base = slugify(config.title) || FALLBACK_BASE_NAME;
  if (config.generations === "all") return base;
  return `${base}_gen${config.generations.join("-")}`;
}

export function pageArtifactPath(outputDir: string, config: ExportConfig, pageIndex: number): string {
  const ext = config.format === "jpeg" ? "jpg" : "png";
  const page = String(pageIndex + 1).padStart(2, "0");
  return join(outputDir, `${artifactBaseName(config)}_p${page}.${ext}`);
}

export function bundleArtifactPath(outputDir: string, config: ExportConfig): string {
  return join(outputDir, `${artifactBaseName(config)}.pdf`);
}

export function manifestArtifactPath(outputDir: string, config: ExportConfig): string {
  return join(outputDir, `${artifactBaseName(config)}_manifest.csv`);
}
