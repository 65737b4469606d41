import { mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { openSurveyContext, type SurveyContext } from "./context";

export interface TestContext {
  context: SurveyContext;
  dataDir: string;
  backupFile: string;
  cleanup(): void;
}

/** An in-memory database with a throwaway data directory. */
export async function openTestContext(): Promise<TestContext> {
  const dataDir = mkdtempSync(path.join(os.tmpdir(), "survey-test-"));
  const context = await openSurveyContext({
    port: 5000,
    dataDir,
    dbFile: ":memory:",
  });
  return {
    context,
    dataDir,
    backupFile: path.join(dataDir, "responses.json"),
    cleanup: () => {
      context.close();
      rmSync(dataDir, { recursive: true, force: true });
    },
  };
}

export function validSubmissionBody(overrides: Record<string, unknown> = {}) {
  return {
    phoneNumber: "(617) 555-0100",
    name: "Jane Voter",
    email: "jane@example.test",
    neighborhood: "Hyde Park",
    ageGroup: "35-44",
    votingFrequency: "Every election",
    issues: ["Public safety", "Housing", "Transit"],
    engagement: "Very interested",
    additionalComments: "More bus routes",
    ...overrides,
  };
}
