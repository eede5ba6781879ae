import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { ManifestRow, ManifestWriterPort } from "../../application/ports";

function esc(v: unknown) {
  const s = String(v ?? "");
  return `"${s.replace(/"/g, '""')}"`;
}

export const MANIFEST_COLUMNS = [
  "page",
  "row",
  "col",
  "cardId",
  "name",
  "setName",
  "dexNumber",
  "generation",
  "origin",
  "failureReason",
  "pageStatus",
  "imageUrl",
] as const;

export function manifestLine(row: ManifestRow): string {
  const { card } = row.placed;
  return [
    row.pageIndex + 1,
    row.placed.row + 1,
    row.placed.col + 1,
    card.id,
    card.name,
    card.setName,
    card.dexNumber,
    card.generation,
    row.origin ?? "unresolved",
    row.failureReason ?? "",
    row.pageStatus,
    card.imageUrl,
  ]
    .map(esc)
    .join(",");
}

export class CsvManifestWriter implements ManifestWriterPort {
  async writeManifest(params: { csvPath: string; rows: ManifestRow[] }): Promise<void> {
    const { csvPath, rows } = params;

    const lines = [MANIFEST_COLUMNS.map(esc).join(","), ...rows.map(manifestLine)];

    await mkdir(dirname(csvPath), { recursive: true });
    await writeFile(csvPath, lines.join("\n"), "utf-8");
  }
}
