import type { TriggeredTarget } from "../types.js";
import { dropBelowTargetPercent } from "./alert-evaluator.js";

export function formatUsd(value: number, digits = 4): string {
  return `$${value.toLocaleString("en-US", {
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
  })}`;
}

export function formatSignedPercent(value: number): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(2)}%`;
}

export function formatDateTime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Markdown alert body (Telegram, email). */
export function formatTargetHit(triggered: TriggeredTarget): string {
  const { level, currentPrice, triggeredAt } = triggered;
  const extraDrop = dropBelowTargetPercent(level, currentPrice);
  return [
    `🚨 *TARGET HIT!* 🚨`,
    ``,
    `📊 *${level.symbol}* dropped to your level!`,
    ``,
    `🎯 *Target:* ${formatUsd(level.targetPrice)}`,
    `💰 *Current:* ${formatUsd(currentPrice)}`,
    `📉 *Extra Drop:* ${extraDrop.toFixed(2)}% below target`,
    ``,
    `⏰ *Time:* ${formatDateTime(triggeredAt)}`,
    ``,
    `This level has been removed from monitoring.`,
  ].join("\n");
}

/** One-line form for SMS and email subjects. */
export function formatTargetHitShort(triggered: TriggeredTarget): string {
  const { level, currentPrice } = triggered;
  return `Target hit: ${level.symbol} at ${formatUsd(currentPrice)} (target ${formatUsd(level.targetPrice)})`;
}
