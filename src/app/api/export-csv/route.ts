import { getSurveyContext } from "@/lib/context";
import { exportResponsesCsv } from "@/lib/export/csv";
import { serverError } from "@/lib/http/respond";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const FAILURE = "Failed to export CSV";

export async function GET() {
  try {
    const { store, config } = await getSurveyContext();
    const listed = await store.listAll();
    if (!listed.ok) return serverError("export-csv", FAILURE, listed.error);

    const filename = await exportResponsesCsv(listed.data, config.dataDir);
    console.info("[export-csv] written", { filename, rows: listed.data.length });
    return Response.json({
      success: true,
      message: "CSV exported successfully",
      filename,
    });
  } catch (error) {
    return serverError("export-csv", FAILURE, error);
  }
}
