import { writeFile } from "node:fs/promises";
import { errorMessage } from "@/lib/result";
import type { Recipient } from "@/lib/schema/recipient";
import type {
  BulkSendSummary,
  SentMessageRecord,
} from "@/lib/schema/sent-message";
import { composeMessage } from "./message";
import { formatPhoneNumber } from "./phone";
import type { MessagingProvider } from "./provider";

export interface NotifierOptions {
  provider: MessagingProvider;
  fromNumber: string;
  surveyUrl: string;
  now?: () => Date;
}

/**
 * Sends survey invitations one at a time. Every attempt is kept in
 * `records` for the lifetime of the notifier.
 */
export class SurveyNotifier {
  readonly records: SentMessageRecord[] = [];
  private readonly now: () => Date;

  constructor(private readonly options: NotifierOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /** Resolves with a failure record instead of rejecting. */
  async sendOne(rawPhone: string, name?: string): Promise<SentMessageRecord> {
    let record: SentMessageRecord;
    try {
      const to = formatPhoneNumber(rawPhone);
      const receipt = await this.options.provider.send({
        to,
        from: this.options.fromNumber,
        body: composeMessage(this.options.surveyUrl, name),
      });
      record = {
        success: true,
        to,
        sid: receipt.sid,
        status: receipt.status,
        name: name ?? null,
        timestamp: this.now().toISOString(),
      };
      console.info("[sms] sent", { to, sid: receipt.sid });
    } catch (error) {
      record = {
        success: false,
        to: rawPhone,
        error: errorMessage(error),
        name: name ?? null,
        timestamp: this.now().toISOString(),
      };
      console.warn("[sms] send_failed", { to: rawPhone, error: record.error });
    }
    this.records.push(record);
    return record;
  }

  async sendBulk(recipients: Recipient[]): Promise<BulkSendSummary> {
    const summary: BulkSendSummary = {
      total: recipients.length,
      successful: 0,
      failed: 0,
      details: [],
    };

    for (const recipient of recipients) {
      if (!recipient.phone) {
        console.warn("[sms] skipped_missing_phone", { name: recipient.name });
        summary.failed += 1;
        continue;
      }
      const record = await this.sendOne(
        recipient.phone,
        recipient.name ?? undefined,
      );
      summary.details.push(record);
      if (record.success) summary.successful += 1;
      else summary.failed += 1;
    }

    return summary;
  }
}

/** Overwrites `filePath` with the run timestamp and every record. */
export async function saveSmsLog(
  filePath: string,
  records: SentMessageRecord[],
  now: Date = new Date(),
): Promise<void> {
  const log = { timestamp: now.toISOString(), messages: records };
  await writeFile(filePath, JSON.stringify(log, null, 2), "utf8");
}
