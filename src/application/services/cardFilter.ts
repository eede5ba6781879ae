import type { CardRef, GenerationFilter } from "../../domain/models";

export function compareCards(a: CardRef, b: CardRef): number {
  if (a.dexNumber !== b.dexNumber) return a.dexNumber - b.dexNumber;
  const byName = a.name.localeCompare(b.name, "en");
  if (byName !== 0) return byName;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function filterAndSortCards(cards: readonly CardRef[], generations: GenerationFilter): CardRef[] {
  const filtered = generations === "all" ? cards.slice() : cards.filter((c) => generations.includes(c.generation));
  return filtered.sort(compareCards);
}
