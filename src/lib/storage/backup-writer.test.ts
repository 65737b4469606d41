import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { StampedSubmission } from "@/lib/schema/survey";
import { JsonFileBackupWriter } from "./backup-writer";

function submission(name: string): StampedSubmission {
  return {
    phoneNumber: "6175550100",
    name,
    neighborhood: "Mattapan",
    ageGroup: "25-34",
    votingFrequency: "Most elections",
    issues: ["Transit", "Parks"],
    engagement: "Somewhat interested",
    timestamp: "2026-03-01T10:00:00.000Z",
  };
}

let dir: string;
let filePath: string;

beforeEach(() => {
  dir = mkdtempSync(path.join(os.tmpdir(), "survey-backup-"));
  filePath = path.join(dir, "responses.json");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function readBackup(): unknown {
  return JSON.parse(readFileSync(filePath, "utf8"));
}

describe("JsonFileBackupWriter", () => {
  it("creates the file on the first append", async () => {
    const writer = new JsonFileBackupWriter(filePath);
    const result = await writer.append(submission("First"));
    expect(result).toEqual({ ok: true, data: undefined });
    expect(readBackup()).toEqual([submission("First")]);
  });

  it("appends after the existing entries", async () => {
    const writer = new JsonFileBackupWriter(filePath);
    await writer.append(submission("First"));
    await writer.append(submission("Second"));
    expect(readBackup()).toEqual([submission("First"), submission("Second")]);
  });

  it("keeps entries written by an earlier run", async () => {
    writeFileSync(filePath, JSON.stringify([{ legacy: true }]));
    await new JsonFileBackupWriter(filePath).append(submission("New"));
    expect(readBackup()).toEqual([{ legacy: true }, submission("New")]);
  });

  it("pretty-prints with two-space indentation", async () => {
    await new JsonFileBackupWriter(filePath).append(submission("First"));
    expect(readFileSync(filePath, "utf8").split("\n")[1]).toBe("  {");
  });

  it("returns a StorageError when the file is not a JSON array", async () => {
    writeFileSync(filePath, JSON.stringify({ not: "an array" }));
    const result = await new JsonFileBackupWriter(filePath).append(
      submission("First"),
    );
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.operation).toBe("backup");
    expect(result.error.message).toBe(`${filePath} does not hold a JSON array`);
  });

  it("returns a StorageError when the directory is missing", async () => {
    const writer = new JsonFileBackupWriter(
      path.join(dir, "missing", "responses.json"),
    );
    const result = await writer.append(submission("First"));
    expect(result.ok).toBe(false);
  });
});
