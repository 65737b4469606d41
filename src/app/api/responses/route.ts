import { getSurveyContext } from "@/lib/context";
import { serverError } from "@/lib/http/respond";
import { toStoredJson } from "@/lib/survey/serialize";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const FAILURE = "Failed to fetch responses";

export async function GET() {
  try {
    const { store } = await getSurveyContext();
    const listed = await store.listAll();
    if (!listed.ok) return serverError("responses", FAILURE, listed.error);

    return Response.json({
      success: true,
      count: listed.data.length,
      responses: listed.data.map(toStoredJson),
    });
  } catch (error) {
    return serverError("responses", FAILURE, error);
  }
}
