import { sql } from "drizzle-orm";
import { index, integer, primaryKey, sqliteTable, text } from "drizzle-orm/sqlite-core";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type DocumentFields = Record<string, JsonValue>;

export const sessions = sqliteTable(
  "sessions",
  {
    sessionId: text("session_id").primaryKey(),
    stage: integer("stage", { mode: "number" }).notNull(),
    // Validated against the session-state schema on read.
    state: text("state", { mode: "json" }).$type<unknown>().notNull(),
    updatedAt: integer("updated_at", { mode: "number" })
      .default(sql`(strftime('%s','now') * 1000)`)
      .notNull()
  },
  (table) => ({
    stageIndex: index("sessions_stage_idx").on(table.stage)
  })
);

export const documents = sqliteTable(
  "documents",
  {
    collection: text("collection").notNull(),
    key: text("key").notNull(),
    fields: text("fields", { mode: "json" }).$type<DocumentFields>().notNull(),
    updatedAt: integer("updated_at", { mode: "number" })
      .default(sql`(strftime('%s','now') * 1000)`)
      .notNull()
  },
  (table) => ({
    pk: primaryKey({ columns: [table.collection, table.key] })
  })
);
