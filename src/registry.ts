import { ValidationError } from "./errors.js";
import type {
  ListedLevel,
  RegistryEntry,
  TargetLevel,
  TriggerPredicate,
  UpsertResult,
} from "./types.js";

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/**
 * In-memory store of user -> symbol -> target level.
 *
 * Every method is synchronous, so on the event loop each call runs to
 * completion before any other caller (HTTP handler or monitor tick) touches
 * the same slot. Nothing here may await.
 */
export class TargetRegistry {
  private readonly users = new Map<string, Map<string, TargetLevel>>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  upsert(userId: string, symbol: string, targetPrice: number): UpsertResult {
    if (!userId) throw new ValidationError("user id required");
    const key = normalizeSymbol(symbol);
    if (!key) throw new ValidationError("symbol required");
    if (typeof targetPrice !== "number" || !Number.isFinite(targetPrice) || targetPrice <= 0) {
      throw new ValidationError("target price must be a positive number");
    }

    let levels = this.users.get(userId);
    if (!levels) {
      levels = new Map();
      this.users.set(userId, levels);
    }

    const previous = levels.get(key);
    const level: TargetLevel = Object.freeze({ symbol: key, targetPrice, createdAt: this.now() });
    levels.set(key, level);

    return {
      level,
      isUpdate: previous !== undefined,
      previousPrice: previous?.targetPrice ?? null,
    };
  }

  remove(userId: string, symbol: string): TargetLevel | null {
    return this.take(userId, normalizeSymbol(symbol));
  }

  list(userId: string): ListedLevel[] {
    const levels = this.users.get(userId);
    if (!levels) return [];
    return [...levels].map(([symbol, level]) => ({ symbol, level }));
  }

  snapshotAll(): RegistryEntry[] {
    const entries: RegistryEntry[] = [];
    for (const [userId, levels] of this.users) {
      for (const [symbol, level] of levels) {
        entries.push({ userId, symbol, level });
      }
    }
    return entries;
  }

  /**
   * Removes the stored level only if `predicate` holds for it right now.
   * Returns null when the slot is empty or the predicate fails.
   */
  popIf(
    userId: string,
    symbol: string,
    predicate: TriggerPredicate,
    currentPrice: number,
  ): TargetLevel | null {
    const key = normalizeSymbol(symbol);
    const level = this.users.get(userId)?.get(key);
    if (!level || !predicate(level, currentPrice)) return null;
    return this.take(userId, key);
  }

  size(): number {
    let total = 0;
    for (const levels of this.users.values()) total += levels.size;
    return total;
  }

  private take(userId: string, key: string): TargetLevel | null {
    const levels = this.users.get(userId);
    const level = levels?.get(key);
    if (!levels || !level) return null;
    levels.delete(key);
    if (levels.size === 0) this.users.delete(userId);
    return level;
  }
}
