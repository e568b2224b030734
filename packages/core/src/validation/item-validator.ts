import type { ItemDraft, ProblemMap } from "@itemgate/schemas";

export const NAME_REQUIRED = "required";
export const PRICE_NOT_POSITIVE = "must be > 0";

export function nameProblems(name: string): string[] {
  return name.trim().length === 0 ? [NAME_REQUIRED] : [];
}

export function priceProblems(price: number): string[] {
  return Number.isFinite(price) && price > 0 ? [] : [PRICE_NOT_POSITIVE];
}

/**
 * Check a draft against the item business rules. Every rule runs, so a draft
 * that breaks both produces both problems.
 */
export function validateItemDraft(draft: ItemDraft): ProblemMap {
  const problems: ProblemMap = {};

  const name = nameProblems(draft.name);
  if (name.length > 0) problems["name"] = name;
  const price = priceProblems(draft.price);
  if (price.length > 0) problems["price"] = price;

  return problems;
}

export function isValidItemDraft(draft: ItemDraft): boolean {
  return Object.keys(validateItemDraft(draft)).length === 0;
}
