import { config, isEmailConfigured, isSmsConfigured } from "../config.js";
import { errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { Notifier, TargetLevel, TriggeredTarget } from "../types.js";
import { sendEmailAlert } from "./email-sender.js";
import { formatUsd } from "./message-format.js";
import { sendSmsAlert } from "./sms-sender.js";
import { sendTelegramAlert } from "./telegram-sender.js";

export interface NotificationChannel {
  name: string;
  send(triggered: TriggeredTarget): Promise<void>;
}

export class ChannelNotifier implements Notifier {
  constructor(
    private readonly channels: NotificationChannel[],
    private readonly now: () => Date = () => new Date(),
  ) {}

  async notify(userId: string, level: TargetLevel, currentPrice: number): Promise<boolean> {
    const triggered: TriggeredTarget = { userId, level, currentPrice, triggeredAt: this.now() };

    log.info(
      `[ALERT] ${level.symbol} hit ${formatUsd(currentPrice)} (target: ${formatUsd(level.targetPrice)}) for user ${userId}`,
    );

    if (this.channels.length === 0) {
      log.warn(`  -> No notification channel configured`);
      return false;
    }

    let anySucceeded = false;
    for (const channel of this.channels) {
      try {
        await channel.send(triggered);
        log.info(`  -> ${channel.name} sent`);
        anySucceeded = true;
      } catch (err) {
        log.error(`  -> ${channel.name} failed:`, errorMessage(err));
      }
    }
    return anySucceeded;
  }
}

export function configuredChannels(): NotificationChannel[] {
  const channels: NotificationChannel[] = [];
  const botToken = config.telegramBotToken;
  if (botToken) {
    channels.push({ name: "Telegram", send: (t) => sendTelegramAlert(botToken, t) });
  }
  if (isEmailConfigured()) {
    channels.push({ name: "Email", send: sendEmailAlert });
  }
  if (isSmsConfigured()) {
    channels.push({ name: "SMS", send: sendSmsAlert });
  }
  return channels;
}
