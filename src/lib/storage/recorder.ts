import type { StorageError } from "@/lib/errors";
import type { Result } from "@/lib/result";
import type { StampedSubmission } from "@/lib/schema/survey";
import type { BackupWriter } from "./backup-writer";
import type { SurveyStore } from "./survey-store";

/**
 * Persists one accepted submission. Handlers only see this interface, so
 * the store/backup pair can be replaced without touching them.
 */
export interface SubmissionRecorder {
  record(submission: StampedSubmission): Promise<Result<number, StorageError>>;
}

/**
 * Inserts into the store, then mirrors into the backup. Not atomic: a failed
 * backup leaves the row in place and the backup one entry behind.
 */
export class StoreThenBackupRecorder implements SubmissionRecorder {
  constructor(
    private readonly store: SurveyStore,
    private readonly backup: BackupWriter,
  ) {}

  async record(
    submission: StampedSubmission,
  ): Promise<Result<number, StorageError>> {
    const inserted = await this.store.insert(submission);
    if (!inserted.ok) return inserted;

    const backedUp = await this.backup.append(submission);
    if (!backedUp.ok) return backedUp;

    return inserted;
  }
}
