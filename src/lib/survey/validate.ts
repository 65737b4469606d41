import { ValidationError } from "@/lib/errors";
import { err, ok, type Result } from "@/lib/result";
import {
  REQUIRED_FIELDS,
  SURVEY_SUBMISSION,
  type SurveySubmission,
} from "@/lib/schema/survey";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isBlank(v: unknown): boolean {
  return v === undefined || v === null || v === "";
}

/**
 * Checks a submission payload. Reports the first violated constraint only:
 * required fields in form order, then the issue selection, then field types.
 */
export function validateSubmission(
  input: unknown,
): Result<SurveySubmission, ValidationError> {
  if (!isRecord(input)) return err(ValidationError.invalidBody());

  for (const field of REQUIRED_FIELDS) {
    if (isBlank(input[field])) return err(ValidationError.missingField(field));
  }

  const issues = input.issues;
  if (isBlank(issues) || (Array.isArray(issues) && issues.length === 0)) {
    return err(ValidationError.emptySelection());
  }

  const parsed = SURVEY_SUBMISSION.safeParse(input);
  if (!parsed.success) {
    const field = parsed.error.issues[0]?.path[0];
    return err(ValidationError.invalidField(String(field ?? "body")));
  }

  return ok(parsed.data);
}
