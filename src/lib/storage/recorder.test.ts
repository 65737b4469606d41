import { describe, expect, it, vi } from "vitest";
import { StorageError } from "@/lib/errors";
import { err, ok } from "@/lib/result";
import type { StampedSubmission } from "@/lib/schema/survey";
import type { BackupWriter } from "./backup-writer";
import { StoreThenBackupRecorder } from "./recorder";
import type { SurveyStore } from "./survey-store";

const SUBMISSION: StampedSubmission = {
  phoneNumber: "6175550100",
  name: "Jane Voter",
  neighborhood: "Readville",
  ageGroup: "45-54",
  votingFrequency: "Some elections",
  issues: ["Education"],
  engagement: "Not sure",
  timestamp: "2026-03-01T10:00:00.000Z",
};

function makeStore(insert: SurveyStore["insert"]): SurveyStore {
  return {
    ensureSchema: vi.fn(async () => ok(undefined)),
    insert: vi.fn(insert),
    listAll: vi.fn(async () => ok([])),
    countGroupedBy: vi.fn(async () => ok({})),
    countAll: vi.fn(async () => ok(0)),
  };
}

describe("StoreThenBackupRecorder", () => {
  it("inserts, backs up and returns the new id", async () => {
    const store = makeStore(async () => ok(7));
    const backup: BackupWriter = { append: vi.fn(async () => ok(undefined)) };
    const result = await new StoreThenBackupRecorder(store, backup).record(
      SUBMISSION,
    );
    expect(result).toEqual({ ok: true, data: 7 });
    expect(store.insert).toHaveBeenCalledWith(SUBMISSION);
    expect(backup.append).toHaveBeenCalledWith(SUBMISSION);
  });

  it("skips the backup when the insert fails", async () => {
    const failure = new StorageError("insert", new Error("disk I/O error"));
    const store = makeStore(async () => err(failure));
    const backup: BackupWriter = { append: vi.fn(async () => ok(undefined)) };
    const result = await new StoreThenBackupRecorder(store, backup).record(
      SUBMISSION,
    );
    expect(result).toEqual({ ok: false, error: failure });
    expect(backup.append).not.toHaveBeenCalled();
  });

  it("reports a backup failure after the row is inserted", async () => {
    const failure = new StorageError("backup", new Error("EACCES"));
    const store = makeStore(async () => ok(3));
    const backup: BackupWriter = { append: vi.fn(async () => err(failure)) };
    const result = await new StoreThenBackupRecorder(store, backup).record(
      SUBMISSION,
    );
    expect(result).toEqual({ ok: false, error: failure });
    expect(store.insert).toHaveBeenCalledOnce();
  });
});
