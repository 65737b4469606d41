import twilio from "twilio";
import type { SmsConfig } from "@/lib/config";

export interface OutboundMessage {
  to: string;
  from: string;
  body: string;
}

export interface ProviderReceipt {
  sid: string;
  status: string;
}

export interface MessagingProvider {
  send(message: OutboundMessage): Promise<ProviderReceipt>;
}

export function createTwilioProvider(
  config: Pick<SmsConfig, "accountSid" | "authToken">,
): MessagingProvider {
  const client = twilio(config.accountSid, config.authToken);
  return {
    async send({ to, from, body }) {
      const message = await client.messages.create({ to, from, body });
      return { sid: message.sid, status: message.status };
    },
  };
}
