import type { Item, ItemDraft, ItemId, ItemPage } from "@itemgate/schemas";

/**
 * Owner of the item collection. Implementations are synchronous: every call
 * finishes before another request's code can run, which is what keeps id
 * assignment and in-place replacement consistent under concurrent requests.
 */
export interface ItemStore {
  list(page: number, pageSize: number): ItemPage;
  get(id: ItemId): Item;
  create(draft: ItemDraft): Item;
  update(id: ItemId, draft: ItemDraft): Item;
  delete(id: ItemId): void;
  size(): number;
}
