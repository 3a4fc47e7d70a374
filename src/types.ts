/** One pending "alert me when price drops to or below" condition. Never mutated after creation. */
export interface TargetLevel {
  readonly symbol: string;
  readonly targetPrice: number;
  readonly createdAt: Date;
}

export interface UpsertResult {
  level: TargetLevel;
  isUpdate: boolean;
  previousPrice: number | null;
}

export interface ListedLevel {
  symbol: string;
  level: TargetLevel;
}

export interface RegistryEntry {
  userId: string;
  symbol: string;
  level: TargetLevel;
}

export type TriggerPredicate = (level: TargetLevel, currentPrice: number) => boolean;

/** Latest known price for a symbol, or null when it is unavailable right now. */
export interface PriceSource {
  lookup(symbol: string): Promise<number | null>;
}

/** Delivers a one-time alert. Resolves false when no channel delivered it. */
export interface Notifier {
  notify(userId: string, level: TargetLevel, currentPrice: number): Promise<boolean>;
}

export interface TriggeredTarget {
  userId: string;
  level: TargetLevel;
  currentPrice: number;
  triggeredAt: Date;
}

export type LevelStatus = "hit" | "watching" | "unknown";

export type MonitorState = "idle" | "scanning";

export interface TickSummary {
  checked: number;
  skipped: number;
  triggered: number;
  notified: number;
  failed: number;
}
