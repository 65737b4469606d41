export type SentMessageRecord =
  | {
      success: true;
      to: string;
      sid: string;
      status: string;
      name: string | null;
      timestamp: string;
    }
  | {
      success: false;
      to: string;
      error: string;
      name: string | null;
      timestamp: string;
    };

export interface BulkSendSummary {
  total: number;
  successful: number;
  failed: number;
  details: SentMessageRecord[];
}
