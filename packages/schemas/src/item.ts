import { z } from "zod";

export const ItemIdSchema = z.number().int().positive();
export type ItemId = z.infer<typeof ItemIdSchema>;

export const ItemSchema = z.object({
  id: ItemIdSchema,
  name: z.string().min(1),
  price: z.number().positive().finite(),
});
export type Item = z.infer<typeof ItemSchema>;

/**
 * Shape a caller sends to create or replace an item. Only the structure is
 * checked here; business rules (non-blank name, positive price) belong to
 * the validator so that every violated field is reported together.
 */
export const ItemDraftSchema = z.object({
  name: z.string({ required_error: "required", invalid_type_error: "must be a string" }),
  price: z.number({ required_error: "required", invalid_type_error: "must be a number" }).finite(),
});
export type ItemDraft = z.infer<typeof ItemDraftSchema>;
