import type { Config } from "../config.js";
import type { PriceSource } from "../types.js";
import { BinancePriceSource } from "./binance-price-source.js";

export async function createPriceSource(config: Config): Promise<PriceSource> {
  if (config.priceSource === "yahoo") {
    const { YahooPriceSource } = await import("./yahoo-price-source.js");
    return new YahooPriceSource();
  }
  return new BinancePriceSource({
    spotUrl: config.binance.spotUrl,
    futuresUrl: config.binance.futuresUrl,
    timeoutMs: config.lookupTimeoutMs,
  });
}
