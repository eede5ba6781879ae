import { CardRef, ExportConfig, validateExportConfig } from "../../domain/models";
import type { ExportEstimate } from "../engines";
import { GridLayoutEngine } from "../engines/gridEngine";

/** Paginas y tamanos que produciria una exportacion, sin descargar nada. */
export function estimateExport(cards: readonly CardRef[], config: ExportConfig): ExportEstimate {
  return new GridLayoutEngine().estimate(cards, validateExportConfig(config));
}
