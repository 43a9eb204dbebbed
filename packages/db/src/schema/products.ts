import { pgTable, text, timestamp, integer, index } from "drizzle-orm/pg-core";

export const products = pgTable(
  "products",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    name: text("name").notNull(),
    category: text("category").notNull(),
    tags: text("tags").array().notNull().default([]),
    priceCents: integer("price_cents"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    categoryIdx: index("products_category_idx").on(table.category),
  }),
);

export type ProductRow = typeof products.$inferSelect;
