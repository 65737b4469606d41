import { mkdirSync } from "node:fs";
import path from "node:path";
import { loadServerConfig, type ServerConfig } from "./config";
import { openDatabase } from "./db";
import { JsonFileBackupWriter } from "./storage/backup-writer";
import {
  type SubmissionRecorder,
  StoreThenBackupRecorder,
} from "./storage/recorder";
import { SqliteSurveyStore, type SurveyStore } from "./storage/survey-store";

export interface SurveyContext {
  config: ServerConfig;
  store: SurveyStore;
  recorder: SubmissionRecorder;
  close(): void;
}

/**
 * Creates the data directory, opens the database and makes sure the
 * responses table exists. The caller owns the returned context.
 */
export async function openSurveyContext(
  config: ServerConfig,
): Promise<SurveyContext> {
  mkdirSync(config.dataDir, { recursive: true });
  const handle = openDatabase(config.dbFile);
  const store = new SqliteSurveyStore(handle.db);

  const schema = await store.ensureSchema();
  if (!schema.ok) {
    handle.close();
    throw schema.error;
  }

  const backup = new JsonFileBackupWriter(
    path.join(config.dataDir, "responses.json"),
  );

  return {
    config,
    store,
    recorder: new StoreThenBackupRecorder(store, backup),
    close: () => handle.close(),
  };
}

let shared: Promise<SurveyContext> | null = null;
let current: SurveyContext | null = null;

/** Closes the server's context; the next `getSurveyContext` opens a new one. */
export function closeSurveyContext(): void {
  shared = null;
  current?.close();
  current = null;
}

/**
 * The server's context: opened on first use, closed when the process exits.
 * Signals are left to Next, which exits the process after its own shutdown.
 */
export function getSurveyContext(): Promise<SurveyContext> {
  if (shared) return shared;

  const opening = openSurveyContext(loadServerConfig()).then((context) => {
    if (shared !== opening) {
      context.close();
      throw new Error("survey context closed while opening");
    }
    console.info("[survey] database_ready", { dbFile: context.config.dbFile });
    current = context;
    if (!process.listeners("exit").includes(closeSurveyContext)) {
      process.once("exit", closeSurveyContext);
    }
    return context;
  });
  // A failed open is retried on the next request.
  opening.catch(() => {
    if (shared === opening) shared = null;
  });

  shared = opening;
  return opening;
}
