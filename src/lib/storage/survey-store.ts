import { count, desc } from "drizzle-orm";
import { z } from "zod";
import { createResponsesTable, type SurveyDb } from "@/lib/db";
import { type ResponseRow, responses } from "@/lib/db/schema";
import { StorageError, type StorageOperation } from "@/lib/errors";
import { err, ok, type Result } from "@/lib/result";
import type {
  GroupableField,
  StampedSubmission,
  SurveyResponse,
} from "@/lib/schema/survey";

const STORED_ISSUES = z.array(z.string());

type StoreResult<T> = Promise<Result<T, StorageError>>;

export interface SurveyStore {
  ensureSchema(): StoreResult<void>;
  insert(submission: StampedSubmission): StoreResult<number>;
  /** Newest timestamp first. */
  listAll(): StoreResult<SurveyResponse[]>;
  countGroupedBy(field: GroupableField): StoreResult<Record<string, number>>;
  countAll(): StoreResult<number>;
}

function toResponse(row: ResponseRow): SurveyResponse {
  return {
    ...row,
    email: row.email ?? "",
    additionalComments: row.additionalComments ?? "",
    issues: STORED_ISSUES.parse(JSON.parse(row.issues)),
  };
}

export class SqliteSurveyStore implements SurveyStore {
  constructor(private readonly db: SurveyDb) {}

  private async attempt<T>(
    operation: StorageOperation,
    fn: () => Promise<T>,
  ): StoreResult<T> {
    try {
      return ok(await fn());
    } catch (error) {
      return err(new StorageError(operation, error));
    }
  }

  ensureSchema() {
    return this.attempt("ensure_schema", () => createResponsesTable(this.db));
  }

  insert(submission: StampedSubmission) {
    return this.attempt("insert", async () => {
      const [row] = await this.db
        .insert(responses)
        .values({
          phoneNumber: submission.phoneNumber,
          name: submission.name,
          email: submission.email ?? "",
          neighborhood: submission.neighborhood,
          ageGroup: submission.ageGroup,
          votingFrequency: submission.votingFrequency,
          issues: JSON.stringify(submission.issues),
          engagement: submission.engagement,
          additionalComments: submission.additionalComments ?? "",
          timestamp: submission.timestamp,
        })
        .returning({ id: responses.id });
      if (!row) throw new Error("insert returned no row");
      return row.id;
    });
  }

  listAll() {
    return this.attempt("list", async () => {
      const rows = await this.db
        .select()
        .from(responses)
        .orderBy(desc(responses.timestamp), desc(responses.id));
      return rows.map(toResponse);
    });
  }

  countGroupedBy(field: GroupableField) {
    const column = responses[field];
    return this.attempt("count", async () => {
      const rows = await this.db
        .select({ value: column, count: count() })
        .from(responses)
        .groupBy(column);
      return Object.fromEntries(rows.map((r) => [r.value, r.count]));
    });
  }

  countAll() {
    return this.attempt("count", async () => {
      const [row] = await this.db.select({ total: count() }).from(responses);
      return row?.total ?? 0;
    });
  }
}
