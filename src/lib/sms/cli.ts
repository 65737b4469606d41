import { readFile } from "node:fs/promises";
import { loadSmsConfig, type SmsConfig } from "@/lib/config";
import { errorMessage } from "@/lib/result";
import { RECIPIENTS, type Recipient } from "@/lib/schema/recipient";
import type { BulkSendSummary } from "@/lib/schema/sent-message";
import { SurveyNotifier, saveSmsLog } from "./notifier";
import { createTwilioProvider, type MessagingProvider } from "./provider";

export const USAGE = [
  "Usage:",
  "  Single SMS: npm run sms -- <phone_number> [name]",
  "  Bulk SMS:   npm run sms -- --bulk <recipients_file.json>",
  "",
  "Recipients file format:",
  '  [{"phone": "6175550100", "name": "Jane Voter"}, ...]',
].join("\n");

export interface CliDeps {
  env: Record<string, string | undefined>;
  createProvider: (config: SmsConfig) => MessagingProvider;
  print: (line: string) => void;
}

const defaultDeps: CliDeps = {
  env: process.env,
  createProvider: createTwilioProvider,
  print: (line) => console.log(line),
};

async function readRecipients(filePath: string): Promise<Recipient[]> {
  const raw = await readFile(filePath, "utf8");
  const parsed = RECIPIENTS.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`${filePath} must hold an array of {"phone", "name"} objects`);
  }
  return parsed.data;
}

function printSummary(print: CliDeps["print"], summary: BulkSendSummary) {
  const rule = "=".repeat(50);
  print(rule);
  print("Bulk SMS Send Summary:");
  print(`Total: ${summary.total}`);
  print(`Successful: ${summary.successful}`);
  print(`Failed: ${summary.failed}`);
  print(rule);
}

/** Returns the process exit code. */
export async function runSmsCli(
  argv: string[],
  deps: CliDeps = defaultDeps,
): Promise<number> {
  const { print } = deps;
  const [first, second] = argv;

  if (!first) {
    print(USAGE);
    return 1;
  }
  if (first === "--bulk" && !second) {
    print("Error: Please provide recipients file");
    return 1;
  }

  const config = loadSmsConfig(deps.env);
  if (!config.ok) {
    print(`Error: ${config.error.message}`);
    return 1;
  }

  const notifier = new SurveyNotifier({
    provider: deps.createProvider(config.data),
    fromNumber: config.data.fromNumber,
    surveyUrl: config.data.surveyUrl,
  });

  if (first === "--bulk" && second) {
    let recipients: Recipient[];
    try {
      recipients = await readRecipients(second);
    } catch (error) {
      print(`Error: ${errorMessage(error)}`);
      return 1;
    }

    print(`Sending survey invitations to ${recipients.length} recipients...`);
    const summary = await notifier.sendBulk(recipients);
    printSummary(print, summary);

    try {
      await saveSmsLog(config.data.logFile, notifier.records);
    } catch (error) {
      print(`Error: could not write ${config.data.logFile}: ${errorMessage(error)}`);
      return 1;
    }
    print(`Log saved to ${config.data.logFile}`);
    return 0;
  }

  const record = await notifier.sendOne(first, second);
  if (record.success) {
    print(`SMS sent to ${record.to} (SID: ${record.sid})`);
    return 0;
  }
  print(`Failed to send SMS to ${record.to}: ${record.error}`);
  return 1;
}
