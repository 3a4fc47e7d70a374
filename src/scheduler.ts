import { errorMessage } from "./errors.js";
import { log } from "./logger.js";
import type { TargetRegistry } from "./registry.js";
import { isTriggered } from "./services/alert-evaluator.js";
import type { MonitorState, Notifier, PriceSource, RegistryEntry, TickSummary } from "./types.js";

export interface MonitorOptions {
  intervalMs: number;
  errorCooldownMs: number;
}

export const DEFAULT_MONITOR_OPTIONS: MonitorOptions = {
  intervalMs: 300_000,
  errorCooldownMs: 60_000,
};

/**
 * Periodically scans every stored level against live prices.
 *
 * A level is claimed with `popIf` before the notifier is called, so a level
 * removed or replaced by a user mid-scan can never produce an alert.
 */
export class MonitorLoop {
  private state: MonitorState = "idle";
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  // bumped by start/stop so cycles from an earlier run do not re-arm
  private generation = 0;
  private inFlight: Promise<TickSummary> | null = null;
  private readonly options: MonitorOptions;

  constructor(
    private readonly registry: TargetRegistry,
    private readonly priceSource: PriceSource,
    private readonly notifier: Notifier,
    options: Partial<MonitorOptions> = {},
  ) {
    this.options = { ...DEFAULT_MONITOR_OPTIONS, ...options };
  }

  get currentState(): MonitorState {
    return this.state;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.generation++;
    log.info(
      `Monitoring every ${this.options.intervalMs / 1000}s (cooldown after errors: ${this.options.errorCooldownMs / 1000}s)`,
    );
    this.schedule(0);
  }

  stop(): void {
    this.running = false;
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  tick(): Promise<TickSummary> {
    if (!this.inFlight) {
      this.state = "scanning";
      this.inFlight = this.scan().finally(() => {
        this.state = "idle";
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private schedule(delayMs: number): void {
    const generation = this.generation;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.cycle(generation);
    }, delayMs);
  }

  private async cycle(generation: number): Promise<void> {
    let delay = this.options.intervalMs;
    try {
      await this.tick();
    } catch (err) {
      log.error("Error in monitoring loop:", errorMessage(err));
      delay = this.options.errorCooldownMs;
    }
    if (this.running && generation === this.generation) this.schedule(delay);
  }

  private async scan(): Promise<TickSummary> {
    const summary: TickSummary = { checked: 0, skipped: 0, triggered: 0, notified: 0, failed: 0 };
    const entries = this.registry.snapshotAll();
    const prices = new Map<string, Promise<number | null>>();

    for (const entry of entries) {
      let price = prices.get(entry.symbol);
      if (!price) {
        price = this.lookup(entry.symbol);
        prices.set(entry.symbol, price);
      }
      const currentPrice = await price;
      if (currentPrice == null) {
        summary.skipped++;
        continue;
      }
      summary.checked++;

      if (!isTriggered(entry.level, currentPrice)) continue;
      await this.fire(entry, currentPrice, summary);
    }

    if (summary.checked > 0) {
      log.info(`Checked ${summary.checked} level(s), ${summary.triggered} triggered`);
    }
    return summary;
  }

  private async fire(entry: RegistryEntry, currentPrice: number, summary: TickSummary): Promise<void> {
    const { userId, symbol } = entry;
    const claimed = this.registry.popIf(userId, symbol, isTriggered, currentPrice);
    if (!claimed) {
      log.info(`  ${symbol} for user ${userId} changed before it could fire, skipping`);
      return;
    }
    summary.triggered++;

    try {
      if (await this.notifier.notify(userId, claimed, currentPrice)) {
        summary.notified++;
        return;
      }
      log.warn(`  Alert for ${symbol} (user ${userId}) was not delivered`);
    } catch (err) {
      log.error(`  Alert for ${symbol} (user ${userId}) failed:`, errorMessage(err));
    }
    summary.failed++;
  }

  private async lookup(symbol: string): Promise<number | null> {
    try {
      return await this.priceSource.lookup(symbol);
    } catch (err) {
      log.warn(`  Price lookup for ${symbol} failed:`, errorMessage(err));
      return null;
    }
  }
}
