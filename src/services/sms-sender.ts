import twilio from "twilio";
import { config } from "../config.js";
import type { TriggeredTarget } from "../types.js";
import { formatTargetHitShort } from "./message-format.js";

let client: ReturnType<typeof twilio> | null = null;

function getClient() {
  if (!client) {
    client = twilio(config.twilio.accountSid, config.twilio.authToken);
  }
  return client;
}

export async function sendSmsAlert(triggered: TriggeredTarget): Promise<void> {
  const to = config.notifySms;
  if (!to) throw new Error("NOTIFY_SMS is not configured");

  await getClient().messages.create({
    body: `[${triggered.userId}] ${formatTargetHitShort(triggered)}`,
    from: config.twilio.fromNumber,
    to,
  });
}
