import { ExportConfig, GridLayout, PagePlan, QUALITY_PROFILES, CardRef } from "../../domain/models";
import { planGrid } from "../services/gridPlanner";
import { pageSize, paginateCards } from "../services/paginator";
import { filterAndSortCards } from "../services/cardFilter";
import type { ExportEstimate, LayoutEngine } from "./index";

export const GRID_ENGINE_V1 = "poster-grid-v1";

const MAX_SIDE_WARNING_PX = 10_000;
const LARGE_COLLECTION_WARNING = 500;

export class GridLayoutEngine implements LayoutEngine {
  readonly id = GRID_ENGINE_V1;

  layoutFor(config: ExportConfig): GridLayout {
    return planGrid(QUALITY_PROFILES[config.quality], config.cardsPerRow);
  }

  plan(cards: readonly CardRef[], config: ExportConfig): PagePlan[] {
    const filtered = filterAndSortCards(cards, config.generations);
    if (filtered.length === 0) return [];

    return paginateCards({ layout: this.layoutFor(config), cards: filtered });
  }

  estimate(cards: readonly CardRef[], config: ExportConfig): ExportEstimate {
    const layout = this.layoutFor(config);
    const cardCount = filterAndSortCards(cards, config.generations).length;
    const pageCount = Math.ceil(cardCount / layout.capacityPerPage);

    const pages: ExportEstimate["pages"] = [];
    let rawBytes = 0;
    for (let p = 0; p < pageCount; p++) {
      const onPage = Math.min(layout.capacityPerPage, cardCount - p * layout.capacityPerPage);
      const rows = Math.ceil(onPage / layout.cols);
      const size = pageSize(layout, rows);
      pages.push({ pageIndex: p, rows, ...size });
      rawBytes += size.widthPx * size.heightPx * 4;
    }

    const warnings: string[] = [];
    if (cardCount === 0) warnings.push("No hay cartas para exportar con este filtro.");
    if (pages.some((p) => p.widthPx > MAX_SIDE_WARNING_PX || p.heightPx > MAX_SIDE_WARNING_PX)) {
      warnings.push("Paginas muy grandes: puede consumir mucha memoria.");
    }
    if (cardCount > LARGE_COLLECTION_WARNING) {
      warnings.push("Coleccion grande: la primera exportacion puede tardar varios minutos.");
    }

    return {
      cardCount,
      pageCount,
      capacityPerPage: layout.capacityPerPage,
      pages,
      estimatedRawMb: Math.round((rawBytes / (1024 * 1024)) * 100) / 100,
      warnings,
    };
  }
}
