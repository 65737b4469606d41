import { getTableColumns } from "drizzle-orm";
import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const responses = sqliteTable("responses", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  phoneNumber: text("phone_number").notNull(),
  name: text("name").notNull(),
  email: text("email"),
  neighborhood: text("neighborhood").notNull(),
  ageGroup: text("age_group").notNull(),
  votingFrequency: text("voting_frequency").notNull(),
  // JSON array text; order is preserved.
  issues: text("issues").notNull(),
  engagement: text("engagement").notNull(),
  additionalComments: text("additional_comments"),
  timestamp: text("timestamp").notNull(),
});

export type ResponseRow = typeof responses.$inferSelect;
export type NewResponseRow = typeof responses.$inferInsert;

/** Storage column names in table order, e.g. `phone_number`. */
export const RESPONSE_COLUMNS: string[] = Object.values(
  getTableColumns(responses),
).map((column) => column.name);
