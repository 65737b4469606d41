import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { SentMessageRecord } from "@/lib/schema/sent-message";
import { composeMessage } from "./message";
import { SurveyNotifier, saveSmsLog } from "./notifier";
import type { MessagingProvider } from "./provider";

const NOW = new Date("2026-10-19T12:00:00.000Z");
const SURVEY_URL = "https://survey.test/survey.html";

function makeNotifier(send: MessagingProvider["send"]) {
  const provider = { send: vi.fn(send) };
  const notifier = new SurveyNotifier({
    provider,
    fromNumber: "+16175550000",
    surveyUrl: SURVEY_URL,
    now: () => NOW,
  });
  return { provider, notifier };
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// sendOne
// ---------------------------------------------------------------------------

describe("SurveyNotifier.sendOne", () => {
  it("formats the number and sends the personalised message", async () => {
    const { provider, notifier } = makeNotifier(async () => ({
      sid: "SM1",
      status: "queued",
    }));
    await notifier.sendOne("(617) 555-0100", "Jane");
    expect(provider.send).toHaveBeenCalledWith({
      to: "+16175550100",
      from: "+16175550000",
      body: composeMessage(SURVEY_URL, "Jane"),
    });
  });

  it("returns a success record with the provider sid and status", async () => {
    const { notifier } = makeNotifier(async () => ({
      sid: "SM1",
      status: "queued",
    }));
    const record = await notifier.sendOne("6175550100");
    expect(record).toEqual({
      success: true,
      to: "+16175550100",
      sid: "SM1",
      status: "queued",
      name: null,
      timestamp: "2026-10-19T12:00:00.000Z",
    });
  });

  it("returns a failure record instead of rejecting", async () => {
    const { notifier } = makeNotifier(async () => {
      throw new Error("Authenticate");
    });
    const record = await notifier.sendOne("6175550100", "Jane");
    expect(record).toEqual({
      success: false,
      to: "6175550100",
      error: "Authenticate",
      name: "Jane",
      timestamp: "2026-10-19T12:00:00.000Z",
    });
  });

  it("keeps every attempt in records", async () => {
    let calls = 0;
    const { notifier } = makeNotifier(async () => {
      calls += 1;
      if (calls === 2) throw new Error("Queue overflow");
      return { sid: `SM${calls}`, status: "sent" };
    });
    await notifier.sendOne("6175550100");
    await notifier.sendOne("6175550101");
    expect(notifier.records.map((r) => r.success)).toEqual([true, false]);
  });
});

// ---------------------------------------------------------------------------
// sendBulk
// ---------------------------------------------------------------------------

describe("SurveyNotifier.sendBulk", () => {
  it("counts a recipient without a phone as failed and never sends to it", async () => {
    const { provider, notifier } = makeNotifier(async () => ({
      sid: "SM1",
      status: "queued",
    }));
    const summary = await notifier.sendBulk([
      { phone: "6175550100" },
      { name: "Jane" },
    ]);
    expect(summary.total).toBe(2);
    expect(summary.successful).toBe(1);
    expect(summary.failed).toBe(1);
    expect(summary.details).toHaveLength(1);
    expect(provider.send).toHaveBeenCalledOnce();
    expect(provider.send).toHaveBeenCalledWith(
      expect.objectContaining({ to: "+16175550100" }),
    );
  });

  it("keeps going after a provider failure", async () => {
    const { provider, notifier } = makeNotifier(async ({ to }) => {
      if (to === "+16175550101") throw new Error("Unreachable");
      return { sid: `SM-${to}`, status: "queued" };
    });
    const summary = await notifier.sendBulk([
      { phone: "6175550100", name: "A" },
      { phone: "6175550101", name: "B" },
      { phone: "6175550102", name: "C" },
    ]);
    expect(provider.send).toHaveBeenCalledTimes(3);
    expect(summary).toMatchObject({ total: 3, successful: 2, failed: 1 });
    expect(summary.details.map((d) => d.name)).toEqual(["A", "B", "C"]);
  });

  it("sends one message at a time", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const { notifier } = makeNotifier(async () => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 1));
      inFlight -= 1;
      return { sid: "SM1", status: "queued" };
    });
    await notifier.sendBulk([
      { phone: "6175550100" },
      { phone: "6175550101" },
      { phone: "6175550102" },
    ]);
    expect(maxInFlight).toBe(1);
  });

  it("returns an empty summary for no recipients", async () => {
    const { notifier } = makeNotifier(async () => ({
      sid: "SM1",
      status: "queued",
    }));
    expect(await notifier.sendBulk([])).toEqual({
      total: 0,
      successful: 0,
      failed: 0,
      details: [],
    });
  });
});

// ---------------------------------------------------------------------------
// saveSmsLog
// ---------------------------------------------------------------------------

describe("saveSmsLog", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), "sms-log-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("overwrites the file with the run timestamp and records", async () => {
    const filePath = path.join(dir, "sms_log.json");
    writeFileSync(filePath, "previous run");
    const records: SentMessageRecord[] = [
      {
        success: false,
        to: "123",
        error: "Invalid number",
        name: null,
        timestamp: "2026-10-19T11:59:00.000Z",
      },
    ];
    await saveSmsLog(filePath, records, NOW);
    expect(JSON.parse(readFileSync(filePath, "utf8"))).toEqual({
      timestamp: "2026-10-19T12:00:00.000Z",
      messages: records,
    });
  });
});
