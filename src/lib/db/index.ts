import { createClient } from "@libsql/client";
import { sql } from "drizzle-orm";
import { drizzle, type LibSQLDatabase } from "drizzle-orm/libsql";

export type SurveyDb = LibSQLDatabase;

export interface DatabaseHandle {
  db: SurveyDb;
  close(): void;
}

function toUrl(filename: string): string {
  return filename === ":memory:" ? filename : `file:${filename}`;
}

/** Opens (or creates) the SQLite file. Pass ":memory:" for a throwaway store. */
export function openDatabase(filename: string): DatabaseHandle {
  const client = createClient({ url: toUrl(filename) });
  return {
    db: drizzle(client),
    close: () => {
      if (!client.closed) client.close();
    },
  };
}

export async function createResponsesTable(db: SurveyDb): Promise<void> {
  await db.run(sql`
    CREATE TABLE IF NOT EXISTS responses (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      phone_number TEXT NOT NULL,
      name TEXT NOT NULL,
      email TEXT,
      neighborhood TEXT NOT NULL,
      age_group TEXT NOT NULL,
      voting_frequency TEXT NOT NULL,
      issues TEXT NOT NULL,
      engagement TEXT NOT NULL,
      additional_comments TEXT,
      timestamp TEXT NOT NULL
    )
  `);
}
