import { z } from "zod";
import { ItemSchema } from "./item.js";

export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 2;

export const ListItemsQuerySchema = z.object({
  page: z.coerce.number().int().default(DEFAULT_PAGE),
  pageSize: z.coerce.number().int().default(DEFAULT_PAGE_SIZE),
});
export type ListItemsQuery = z.infer<typeof ListItemsQuerySchema>;

export const ItemPageSchema = z.object({
  page: z.number().int(),
  pageSize: z.number().int(),
  total: z.number().int().nonnegative(),
  items: z.array(ItemSchema),
});
export type ItemPage = z.infer<typeof ItemPageSchema>;
