import { errorMessage } from "@/lib/result";

export function badRequest(error: string): Response {
  return Response.json({ error }, { status: 400 });
}

/** 500 with the raw cause text in `details`; this is an admin-facing tool. */
export function serverError(scope: string, error: string, cause: unknown) {
  const details = errorMessage(cause);
  console.error(`[${scope}] failed`, { error: details });
  return Response.json({ error, details }, { status: 500 });
}
