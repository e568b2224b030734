import { z } from "zod";
import type { ItemDraft, ProblemMap } from "@itemgate/schemas";
import { ItemDraftSchema, ListItemsQuerySchema } from "@itemgate/schemas";
import { nameProblems, priceProblems } from "@itemgate/core";

// ── Items ────────────────────────────────────────────────────────────

export const CreateItemBodySchema = ItemDraftSchema;
export const ReplaceItemBodySchema = ItemDraftSchema;
export { ListItemsQuerySchema };

export const ItemIdParamsSchema = z.object({
  id: z.coerce.number().int(),
});

const BodyFieldsSchema = z.record(z.unknown());

/** Collapse zod issues into the field → messages map used in error bodies. */
export function issuesToProblems(issues: readonly z.ZodIssue[]): ProblemMap {
  const problems: ProblemMap = {};
  for (const issue of issues) {
    const field = issue.path.length > 0 ? issue.path.join(".") : "body";
    (problems[field] ??= []).push(issue.message);
  }
  return problems;
}

export type DraftParseResult =
  | { success: true; draft: ItemDraft }
  | { success: false; problems: ProblemMap };

/**
 * Parse a create/replace body into a draft. Each field is checked on its own:
 * a missing or mistyped field is reported under its name, and the business
 * rules still run on the fields that are well-typed, so one response lists
 * every problem. A body that is not a JSON object counts as empty.
 */
export function parseItemDraft(body: unknown): DraftParseResult {
  const fields = BodyFieldsSchema.safeParse(body);
  const record = fields.success ? fields.data : {};
  const problems: ProblemMap = {};

  const name = ItemDraftSchema.shape.name.safeParse(record["name"]);
  const nameIssues = name.success ? nameProblems(name.data) : name.error.issues.map((i) => i.message);
  if (nameIssues.length > 0) problems["name"] = nameIssues;

  const price = ItemDraftSchema.shape.price.safeParse(record["price"]);
  const priceIssues = price.success ? priceProblems(price.data) : price.error.issues.map((i) => i.message);
  if (priceIssues.length > 0) problems["price"] = priceIssues;

  if (name.success && price.success && Object.keys(problems).length === 0) {
    return { success: true, draft: { name: name.data, price: price.data } };
  }
  return { success: false, problems };
}
