import { getSurveyContext } from "@/lib/context";
import { serverError } from "@/lib/http/respond";
import type { SurveyStats } from "@/lib/schema/survey";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const FAILURE = "Failed to fetch statistics";

export async function GET() {
  try {
    const { store } = await getSurveyContext();
    const total = await store.countAll();
    if (!total.ok) return serverError("stats", FAILURE, total.error);
    const byNeighborhood = await store.countGroupedBy("neighborhood");
    if (!byNeighborhood.ok) {
      return serverError("stats", FAILURE, byNeighborhood.error);
    }
    const byAgeGroup = await store.countGroupedBy("ageGroup");
    if (!byAgeGroup.ok) return serverError("stats", FAILURE, byAgeGroup.error);
    const byVoting = await store.countGroupedBy("votingFrequency");
    if (!byVoting.ok) return serverError("stats", FAILURE, byVoting.error);

    const stats: SurveyStats = {
      total: total.data,
      by_neighborhood: byNeighborhood.data,
      by_age_group: byAgeGroup.data,
      by_voting_frequency: byVoting.data,
    };
    return Response.json({ success: true, stats });
  } catch (error) {
    return serverError("stats", FAILURE, error);
  }
}
