import type { PriceSource } from "../types.js";

export interface BinancePriceSourceOptions {
  spotUrl: string;
  futuresUrl: string;
  timeoutMs: number;
}

const PERPETUAL_SUFFIX = ".P";

/**
 * Last traded price from Binance. `BTCUSDT` is read from the spot market,
 * `BTCUSDT.P` from the USD-M perpetual futures market.
 */
export class BinancePriceSource implements PriceSource {
  constructor(private readonly options: BinancePriceSourceOptions) {}

  async lookup(symbol: string): Promise<number | null> {
    const res = await fetch(this.tickerUrl(symbol), {
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });
    // Binance answers 400 (code -1121) for unknown symbols; anything else is an outage or rate limit
    if (res.status === 400) return null;
    if (!res.ok) throw new Error(`Binance ticker request failed: ${res.status}`);

    const json = (await res.json()) as { price?: unknown };
    const price = Number(json.price);
    return Number.isFinite(price) && price > 0 ? price : null;
  }

  tickerUrl(symbol: string): string {
    if (symbol.endsWith(PERPETUAL_SUFFIX)) {
      const contract = symbol.slice(0, -PERPETUAL_SUFFIX.length);
      return `${this.options.futuresUrl}/fapi/v1/ticker/price?symbol=${encodeURIComponent(contract)}`;
    }
    return `${this.options.spotUrl}/api/v3/ticker/price?symbol=${encodeURIComponent(symbol)}`;
  }
}
