import { getSurveyContext } from "@/lib/context";
import { badRequest, serverError } from "@/lib/http/respond";
import type { StampedSubmission } from "@/lib/schema/survey";
import { validateSubmission } from "@/lib/survey/validate";

export const runtime = "nodejs";

const FAILURE = "Failed to save survey response";

export async function POST(req: Request) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return badRequest("Invalid JSON body.");
  }

  const parsed = validateSubmission(body);
  if (!parsed.ok) {
    return badRequest(parsed.error.message);
  }

  try {
    const submission: StampedSubmission = {
      ...parsed.data,
      timestamp: parsed.data.timestamp || new Date().toISOString(),
    };

    const { recorder } = await getSurveyContext();
    const recorded = await recorder.record(submission);
    if (!recorded.ok) {
      return serverError("submit-survey", FAILURE, recorded.error);
    }

    console.info("[submit-survey] saved", {
      id: recorded.data,
      name: submission.name,
    });
    return Response.json({
      success: true,
      message: "Survey response saved successfully",
      id: recorded.data,
    });
  } catch (error) {
    return serverError("submit-survey", FAILURE, error);
  }
}
