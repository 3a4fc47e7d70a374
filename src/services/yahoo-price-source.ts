import YahooFinance from "yahoo-finance2";
import { errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { PriceSource } from "../types.js";

const yf = new YahooFinance({
  queue: { concurrency: 1, timeout: 60 },
});

// Cache to avoid redundant fetches when several users watch the same symbol
const CACHE_TTL_MS = 30_000;

export class YahooPriceSource implements PriceSource {
  private readonly cache = new Map<string, { price: number | null; ts: number }>();

  constructor(private readonly retries = 2) {}

  async lookup(symbol: string): Promise<number | null> {
    const cached = this.cache.get(symbol);
    if (cached && Date.now() - cached.ts < CACHE_TTL_MS) {
      return cached.price;
    }

    const price = await this.fetchWithRetry(symbol);
    this.cache.set(symbol, { price, ts: Date.now() });
    return price;
  }

  private async fetchWithRetry(symbol: string): Promise<number | null> {
    for (let attempt = 0; attempt <= this.retries; attempt++) {
      try {
        const quotes = await yf.quote([symbol]);
        const quoteArray = Array.isArray(quotes) ? quotes : [quotes];
        const quote = quoteArray.find((q) => q && q.regularMarketPrice != null);
        return quote?.regularMarketPrice ?? null;
      } catch (err) {
        const msg = errorMessage(err);
        if (msg.includes("429") && attempt < this.retries) {
          const delay = (attempt + 1) * 2000;
          log.warn(`Yahoo Finance 429, retrying in ${delay / 1000}s (attempt ${attempt + 1}/${this.retries})`);
          await new Promise((r) => setTimeout(r, delay));
          continue;
        }
        throw err;
      }
    }
    return null;
  }
}
