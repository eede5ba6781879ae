import type { CardRef, ExportConfig, GridLayout, PagePlan } from "../../domain/models";

export interface LayoutEngine {
  readonly id: string;
  layoutFor(config: ExportConfig): GridLayout;
  plan(cards: readonly CardRef[], config: ExportConfig): PagePlan[];
}

export interface ExportEstimate {
  cardCount: number;
  pageCount: number;
  capacityPerPage: number;
  pages: Array<{ pageIndex: number; rows: number; widthPx: number; heightPx: number }>;
  estimatedRawMb: number; // RGBA sin comprimir
  warnings: string[];
}
