import { pgTable, text, timestamp, integer, index } from "drizzle-orm/pg-core";

export const articles = pgTable(
  "articles",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    topic: text("topic").notNull(),
    content: text("content").notNull(),
    ownerId: text("owner_id").notNull(),
    wordCount: integer("word_count").notNull(),
    sourcePassageCount: integer("source_passage_count").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    ownerIdx: index("articles_owner_id_idx").on(table.ownerId),
  }),
);

export type ArticleRow = typeof articles.$inferSelect;
