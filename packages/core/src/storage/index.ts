import type { ItemDraft } from "@itemgate/schemas";
import type { ItemStore } from "./interfaces.js";
import { InMemoryItemStore } from "./in-memory.js";

export type { ItemStore } from "./interfaces.js";
export { InMemoryItemStore } from "./in-memory.js";

export const DEFAULT_ITEMS: readonly ItemDraft[] = [
  { name: "Alpha", price: 12.3 },
  { name: "Beta", price: 45.6 },
  { name: "Gamma", price: 78.9 },
  { name: "Delta", price: 10 },
  { name: "Epsilon", price: 20 },
];

export function createInMemoryItemStore(): ItemStore {
  return new InMemoryItemStore();
}

/**
 * Seed the store with starter items. Drafts go through `create`, so they are
 * validated and numbered like any other item.
 */
export function seedDefaultItems(store: ItemStore, drafts: readonly ItemDraft[] = DEFAULT_ITEMS): void {
  for (const draft of drafts) {
    store.create(draft);
  }
}
