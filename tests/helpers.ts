import type { Server } from "node:http";
import { vi } from "vitest";
import { TargetRegistry } from "../src/registry.js";
import { MonitorLoop } from "../src/scheduler.js";
import { createApp } from "../src/server.js";
import type { Notifier, PriceSource } from "../src/types.js";

export const CREATED_AT = new Date("2026-03-01T10:00:00.000Z");

export interface TestServer {
  baseUrl: string;
  registry: TargetRegistry;
  prices: Record<string, number | null>;
  close(): Promise<void>;
}

/** Starts the API on an ephemeral port with an in-memory price table. "DOWN" makes lookups throw. */
export async function startTestServer(): Promise<TestServer> {
  const prices: Record<string, number | null> = {};
  const priceSource: PriceSource = {
    lookup: async (symbol) => {
      if (symbol === "DOWN") throw new Error("price source offline");
      return prices[symbol] ?? null;
    },
  };
  const notifier: Notifier = { notify: vi.fn(async () => true) };
  const registry = new TargetRegistry(() => CREATED_AT);
  const monitor = new MonitorLoop(registry, priceSource, notifier);
  const app = createApp({ registry, priceSource, monitor });

  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("test server has no port");

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    registry,
    prices,
    close: () => new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve()))),
  };
}
