import { InvalidConfigError } from "../../domain/errors";
import {
  GridLayout,
  MAX_CARDS_PER_ROW,
  MIN_CARDS_PER_ROW,
  QualityProfile,
  cellPixels,
} from "../../domain/models";

export function planGrid(profile: QualityProfile, cardsPerRow: number): GridLayout {
  if (!Number.isInteger(cardsPerRow) || cardsPerRow < MIN_CARDS_PER_ROW || cardsPerRow > MAX_CARDS_PER_ROW) {
    throw new InvalidConfigError(`cardsPerRow invalido (${cardsPerRow}).`);
  }

  const stepXPx = profile.cardWidthPx + profile.spacingPx;
  // la banda de labels se reserva siempre: activar/desactivar labels no mueve cartas
  const stepYPx = profile.cardHeightPx + profile.labelHeightPx + profile.spacingPx;

  const maxCells = Math.floor(profile.maxGridPixels / cellPixels(profile));
  const rowsPerPage = Math.max(1, Math.floor(maxCells / cardsPerRow));

  return {
    cols: cardsPerRow,
    rowsPerPage,
    capacityPerPage: rowsPerPage * cardsPerRow,
    maxCells,
    cardWidthPx: profile.cardWidthPx,
    cardHeightPx: profile.cardHeightPx,
    labelHeightPx: profile.labelHeightPx,
    spacingPx: profile.spacingPx,
    stepXPx,
    stepYPx,
  };
}
