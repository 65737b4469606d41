import { readFile, writeFile } from "node:fs/promises";
import { StorageError } from "@/lib/errors";
import { err, ok, type Result } from "@/lib/result";
import type { StampedSubmission } from "@/lib/schema/survey";

export interface BackupWriter {
  append(submission: StampedSubmission): Promise<Result<void, StorageError>>;
}

async function readEntries(filePath: string): Promise<unknown[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error(`${filePath} does not hold a JSON array`);
  }
  return parsed;
}

/**
 * Mirrors every accepted submission into one JSON array file.
 * Read-modify-write with no lock: concurrent appends can drop entries.
 */
export class JsonFileBackupWriter implements BackupWriter {
  constructor(readonly filePath: string) {}

  async append(submission: StampedSubmission) {
    try {
      const entries = await readEntries(this.filePath);
      entries.push(submission);
      await writeFile(this.filePath, JSON.stringify(entries, null, 2), "utf8");
      return ok(undefined);
    } catch (error) {
      return err(new StorageError("backup", error));
    }
  }
}
