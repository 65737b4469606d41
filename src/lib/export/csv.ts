import { writeFile } from "node:fs/promises";
import path from "node:path";
import Papa from "papaparse";
import { RESPONSE_COLUMNS } from "@/lib/db/schema";
import type { SurveyResponse } from "@/lib/schema/survey";
import { toStoredJson } from "@/lib/survey/serialize";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `responses_export_YYYYMMDD_HHMMSS.csv` in server local time. */
export function exportFileName(now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `responses_export_${date}_${time}.csv`;
}

export function toCsv(responses: SurveyResponse[]): string {
  // Header comes from the table definition so an empty store still gets one.
  return Papa.unparse({
    fields: RESPONSE_COLUMNS,
    data: responses.map((r) => ({
      ...toStoredJson(r),
      issues: JSON.stringify(r.issues),
    })),
  });
}

/** Writes the export and returns its path. */
export async function exportResponsesCsv(
  responses: SurveyResponse[],
  dataDir: string,
  now: Date = new Date(),
): Promise<string> {
  const filePath = path.join(dataDir, exportFileName(now));
  await writeFile(filePath, toCsv(responses), "utf8");
  return filePath;
}
