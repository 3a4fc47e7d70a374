import type { LevelStatus, TargetLevel } from "../types.js";

export function isTriggered(level: TargetLevel, currentPrice: number): boolean {
  return currentPrice <= level.targetPrice;
}

/** How far the target sits from the current price, as a signed percentage of current. */
export function distancePercent(targetPrice: number, currentPrice: number): number {
  return ((targetPrice - currentPrice) / currentPrice) * 100;
}

/** How far price went past the target, as a percentage of the target. */
export function dropBelowTargetPercent(level: TargetLevel, currentPrice: number): number {
  return Math.abs(((level.targetPrice - currentPrice) / level.targetPrice) * 100);
}

export function describeStatus(level: TargetLevel, currentPrice: number | null): LevelStatus {
  if (currentPrice == null) return "unknown";
  return isTriggered(level, currentPrice) ? "hit" : "watching";
}
