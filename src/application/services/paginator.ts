import { CardRef, FOOTER_HEIGHT_PX, GridLayout, HEADER_HEIGHT_PX, PagePlan, Px } from "../../domain/models";

export function pageSize(layout: GridLayout, rows: number): { widthPx: Px; heightPx: Px } {
  return {
    widthPx: layout.spacingPx + layout.cols * layout.stepXPx,
    heightPx: HEADER_HEIGHT_PX + layout.spacingPx + rows * layout.stepYPx + FOOTER_HEIGHT_PX,
  };
}

export function paginateCards(params: {
  layout: GridLayout;
  cards: CardRef[]; // ya filtradas y en orden estable
}): PagePlan[] {
  const { layout, cards } = params;

  const pages: PagePlan[] = [];

  cards.forEach((card, placedTotal) => {
    const pageIndex = Math.floor(placedTotal / layout.capacityPerPage);
    const idxOnPage = placedTotal % layout.capacityPerPage;

    const row = Math.floor(idxOnPage / layout.cols);
    const col = idxOnPage % layout.cols;

    // y crece hacia abajo desde el borde superior del lienzo
    const xPx = layout.spacingPx + col * layout.stepXPx;
    const yPx = HEADER_HEIGHT_PX + layout.spacingPx + row * layout.stepYPx;

    let page = pages[pageIndex];
    if (!page) {
      page = { pageIndex, rows: 0, cols: layout.cols, widthPx: 0, heightPx: 0, cells: [] };
      pages.push(page);
    }
    page.cells.push({ card, row, col, xPx, yPx });
  });

  for (const page of pages) {
    page.rows = Math.ceil(page.cells.length / layout.cols);
    const size = pageSize(layout, page.rows);
    page.widthPx = size.widthPx;
    page.heightPx = size.heightPx;
  }

  return pages;
}
