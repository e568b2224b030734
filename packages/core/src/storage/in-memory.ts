import type { Item, ItemDraft, ItemId, ItemPage, ProblemMap } from "@itemgate/schemas";
import { InvalidArgumentError, ItemNotFoundError, ValidationFailedError } from "../errors.js";
import { validateItemDraft } from "../validation/item-validator.js";
import type { ItemStore } from "./interfaces.js";

const PAGINATION_MINIMUM = ">= 1";

export class InMemoryItemStore implements ItemStore {
  private items: Item[] = [];
  // Highest id ever handed out; deleted ids are never reissued.
  private lastId = 0;

  list(page: number, pageSize: number): ItemPage {
    const problems: ProblemMap = {};
    if (!Number.isInteger(page) || page < 1) problems["page"] = [PAGINATION_MINIMUM];
    if (!Number.isInteger(pageSize) || pageSize < 1) problems["pageSize"] = [PAGINATION_MINIMUM];
    if (Object.keys(problems).length > 0) {
      throw new InvalidArgumentError(problems);
    }

    const offset = (page - 1) * pageSize;
    return {
      page,
      pageSize,
      total: this.items.length,
      items: this.items.slice(offset, offset + pageSize).map((item) => ({ ...item })),
    };
  }

  get(id: ItemId): Item {
    const item = this.items.find((i) => i.id === id);
    if (!item) throw new ItemNotFoundError(id);
    return { ...item };
  }

  create(draft: ItemDraft): Item {
    assertValid(draft);

    const id = this.nextId();
    const item: Item = { id, name: draft.name, price: draft.price };
    this.items.push(item);
    this.lastId = id;
    return { ...item };
  }

  update(id: ItemId, draft: ItemDraft): Item {
    const index = this.items.findIndex((i) => i.id === id);
    if (index < 0) throw new ItemNotFoundError(id);
    assertValid(draft);

    const updated: Item = { id, name: draft.name, price: draft.price };
    this.items[index] = updated;
    return { ...updated };
  }

  delete(id: ItemId): void {
    const index = this.items.findIndex((i) => i.id === id);
    if (index < 0) throw new ItemNotFoundError(id);
    this.items.splice(index, 1);
  }

  size(): number {
    return this.items.length;
  }

  private nextId(): ItemId {
    const maxExisting = this.items.reduce((max, item) => Math.max(max, item.id), 0);
    return Math.max(maxExisting, this.lastId) + 1;
  }
}

function assertValid(draft: ItemDraft): void {
  const problems = validateItemDraft(draft);
  if (Object.keys(problems).length > 0) {
    throw new ValidationFailedError(problems);
  }
}
