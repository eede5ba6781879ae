import type { CardRef, LabelField, QualityProfile } from "../../domain/models";

const HEADER_BG = "#34495e";
const TEXT_COLOR = "#ecf0f1";
const MUTED_TEXT = "#bdc3c7";
const PLACEHOLDER_BG = "#34495e";
const PLACEHOLDER_BORDER = "#7f8c8d";
const FONT = "DejaVu Sans, Arial, sans-serif";

export const APP_ATTRIBUTION = "Generado con card-poster";

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Corta a lo que entra en `widthPx` (aprox. 0.6em por caracter). */
export function fitText(text: string, widthPx: number, fontPx: number): string {
  const maxChars = Math.max(1, Math.floor(widthPx / (fontPx * 0.6)));
  if (text.length <= maxChars) return text;
  if (maxChars <= 3) return text.slice(0, maxChars);
  return `${text.slice(0, maxChars - 3)}...`;
}

export function labelLines(card: CardRef, labels: readonly LabelField[]): string[] {
  const lines: string[] = [];
  for (const field of labels) {
    if (field === "dex-number") {
      lines.push(`#${String(card.dexNumber).padStart(3, "0")} ${card.name}`);
    } else if (field === "set-name") {
      if (card.setName) lines.push(card.setName);
    } else if (card.artist) {
      lines.push(`Ilus. ${card.artist}`);
    }
  }
  return lines;
}

/** "YYYY-MM-DD HH:MM UTC" */
export function formatExportStamp(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

export function footerText(exportedAt: Date): string {
  return `Exportado el ${formatExportStamp(exportedAt)} · ${APP_ATTRIBUTION}`;
}

export function pageLabel(pageIndex: number, totalPages: number): string | null {
  return totalPages > 1 ? `Pagina ${pageIndex + 1} / ${totalPages}` : null;
}

export function headerSvg(params: {
  widthPx: number;
  heightPx: number;
  title: string;
  pageLabel: string | null;
  fontPx: number;
}): string {
  const { widthPx, heightPx, title, fontPx } = params;
  const mid = Math.round(heightPx / 2 + fontPx / 3);
  const pageText = params.pageLabel
    ? `<text x="${widthPx - 16}" y="${mid}" font-family="${FONT}" font-size="${Math.round(fontPx * 0.6)}" fill="${MUTED_TEXT}" text-anchor="end">${escapeXml(params.pageLabel)}</text>`
    : "";

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${widthPx}" height="${heightPx}">
  <rect x="0" y="0" width="${widthPx}" height="${heightPx}" fill="${HEADER_BG}"/>
  <text x="${Math.round(widthPx / 2)}" y="${mid}" font-family="${FONT}" font-size="${fontPx}" font-weight="bold" fill="${TEXT_COLOR}" text-anchor="middle">${escapeXml(fitText(title, widthPx * 0.7, fontPx))}</text>
  ${pageText}
</svg>`;
}

export function footerSvg(params: { widthPx: number; heightPx: number; text: string; fontPx: number }): string {
  const { widthPx, heightPx, text, fontPx } = params;
  return `<svg xmlns="http://www.w3.org/2000/svg" width="${widthPx}" height="${heightPx}">
  <rect x="0" y="0" width="${widthPx}" height="${heightPx}" fill="${HEADER_BG}"/>
  <text x="${Math.round(widthPx / 2)}" y="${Math.round(heightPx / 2 + fontPx / 3)}" font-family="${FONT}" font-size="${fontPx}" fill="${MUTED_TEXT}" text-anchor="middle">${escapeXml(fitText(text, widthPx - 20, fontPx))}</text>
</svg>`;
}

export function placeholderSvg(params: { widthPx: number; heightPx: number; name: string; profile: QualityProfile }): string {
  const { widthPx, heightPx, name, profile } = params;
  const font = profile.labelFontPx + 2;
  const cx = Math.round(widthPx / 2);
  const cy = Math.round(heightPx / 2);

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${widthPx}" height="${heightPx}">
  <rect x="1" y="1" width="${widthPx - 2}" height="${heightPx - 2}" rx="6" fill="${PLACEHOLDER_BG}" stroke="${PLACEHOLDER_BORDER}" stroke-width="2"/>
  <text x="${cx}" y="${cy - font}" font-family="${FONT}" font-size="${font}" fill="${MUTED_TEXT}" text-anchor="middle">Sin imagen</text>
  <text x="${cx}" y="${cy + font}" font-family="${FONT}" font-size="${font}" fill="${TEXT_COLOR}" text-anchor="middle">${escapeXml(fitText(name, widthPx - 12, font))}</text>
</svg>`;
}

export function labelsSvg(params: { widthPx: number; heightPx: number; lines: string[]; fontPx: number }): string {
  const { widthPx, heightPx, lines, fontPx } = params;
  const lineHeight = Math.round(fontPx * 1.3);
  const texts = lines
    .map(
      (line, i) =>
        `<text x="${Math.round(widthPx / 2)}" y="${4 + lineHeight * (i + 1)}" font-family="${FONT}" font-size="${fontPx}" fill="${i === 0 ? TEXT_COLOR : MUTED_TEXT}" text-anchor="middle">${escapeXml(fitText(line, widthPx - 4, fontPx))}</text>`
    )
    .join("\n  ");

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${widthPx}" height="${heightPx}">
  ${texts}
</svg>`;
}
