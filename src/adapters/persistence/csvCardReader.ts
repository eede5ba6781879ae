import { readFile } from "node:fs/promises";
import type { CardSourcePort } from "../../application/ports";
import { InvalidCardListError } from "../../domain/errors";
import type { CardRef } from "../../domain/models";

export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let cur = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];

    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          cur += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        cur += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      continue;
    }

    if (ch === ",") {
      fields.push(cur);
      cur = "";
      continue;
    }

    cur += ch;
  }

  fields.push(cur);
  return fields;
}

// "Set Name", "set_name", "setName" => "setname"
function normalizeHeader(key: string): string {
  return key.replace(/^\uFEFF/, "").toLowerCase().replace(/[^a-z0-9]/g, "");
}

function toInt(raw: string, column: string, lineNo: number): number {
  if (!raw) return 0;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidCardListError(`CSV invalido (linea ${lineNo}): ${column}="${raw}" no es un entero >= 0.`);
  }
  return n;
}

export function parseCardsCsv(raw: string): CardRef[] {
  const lines = raw.split(/\r?\n/);

  let i = 0;
  while (i < lines.length && !lines[i].trim()) i++;
  if (i >= lines.length) return [];

  const header = parseCsvLine(lines[i]).map(normalizeHeader);
  const col = (name: string) => header.indexOf(name);

  const idx = {
    id: col("id"),
    name: col("name"),
    setName: col("setname"),
    artist: col("artist"),
    generation: col("generation"),
    dexNumber: col("dexnumber"),
    imageUrl: col("imageurl"),
    imageUrlLarge: col("imageurllarge"),
    imageUrlSmall: col("imageurlsmall"),
  };

  if (idx.id < 0 || idx.name < 0) {
    throw new InvalidCardListError("CSV invalido: faltan columnas obligatorias id y name.");
  }

  const cards: CardRef[] = [];
  for (i++; i < lines.length; i++) {
    const line = lines[i];
    if (!line.trim()) continue;

    const parts = parseCsvLine(line);
    const get = (k: number) => (k >= 0 ? (parts[k] ?? "").trim() : "");
    const lineNo = i + 1;

    cards.push({
      id: get(idx.id),
      name: get(idx.name),
      setName: get(idx.setName),
      artist: get(idx.artist),
      generation: toInt(get(idx.generation), "generation", lineNo),
      dexNumber: toInt(get(idx.dexNumber), "dexNumber", lineNo),
      // la imagen grande tiene prioridad sobre la chica
      imageUrl: get(idx.imageUrl) || get(idx.imageUrlLarge) || get(idx.imageUrlSmall),
    });
  }

  return cards;
}

export class CsvCardSource implements CardSourcePort {
  constructor(private readonly csvPath: string) {}

  async listCards(): Promise<CardRef[]> {
    const raw = await readFile(this.csvPath, "utf-8");
    return parseCardsCsv(raw);
  }
}
