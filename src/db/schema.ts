import { sqliteTable, text, integer, real, uniqueIndex } from "drizzle-orm/sqlite-core";

export const users = sqliteTable("users", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull().unique(),
});

// user_id stays nullable in files migrated from the single-user layout
export const movies = sqliteTable(
  "movies",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    title: text("title").notNull(),
    year: integer("year").notNull(),
    rating: real("rating").notNull(), // 1-10 by convention, 0 when OMDb has none
    posterUrl: text("poster_url"),
    userId: integer("user_id").references(() => users.id),
  },
  (table) => ({
    titleUserUnique: uniqueIndex("movies_title_user_id_unique").on(table.title, table.userId),
  })
);

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;

export type Movie = typeof movies.$inferSelect;
export type NewMovie = typeof movies.$inferInsert;
