import type { TriggeredTarget } from "../types.js";
import { formatTargetHit } from "./message-format.js";

const TELEGRAM_API = "https://api.telegram.org";

/** Sends the alert to the chat whose id is the user id. */
export async function sendTelegramAlert(botToken: string, triggered: TriggeredTarget): Promise<void> {
  const res = await fetch(`${TELEGRAM_API}/bot${botToken}/sendMessage`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({
      chat_id: triggered.userId,
      text: formatTargetHit(triggered),
      parse_mode: "Markdown",
    }),
  });
  if (!res.ok) {
    throw new Error(`Telegram sendMessage failed: ${res.status}`);
  }
}
