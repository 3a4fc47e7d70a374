import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TargetRegistry } from "../src/registry.js";
import { MonitorLoop } from "../src/scheduler.js";
import { createApp } from "../src/server.js";
import { BinancePriceSource } from "../src/services/binance-price-source.js";
import { CREATED_AT, startTestServer, type TestServer } from "./helpers.js";

describe("server API", () => {
  let t: TestServer;

  beforeEach(async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    t = await startTestServer();
    t.prices.SYM = 120;
  });

  afterEach(async () => {
    await t.close();
    vi.restoreAllMocks();
  });

  async function post(path: string, body: object) {
    return fetch(`${t.baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  async function get(path: string) {
    return fetch(`${t.baseUrl}${path}`);
  }

  async function del(path: string) {
    return fetch(`${t.baseUrl}${path}`, { method: "DELETE" });
  }

  it("reports health", async () => {
    t.registry.upsert("alice", "SYM", 100);
    const res = await get("/api/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, monitor: "idle", levels: 1 });
  });

  it("creates a level", async () => {
    const res = await post("/api/users/alice/levels", { symbol: "sym", targetPrice: 100 });
    expect(res.status).toBe(201);
    const data = await res.json();
    expect(data.level).toEqual({ symbol: "SYM", targetPrice: 100, createdAt: CREATED_AT.toISOString() });
    expect(data.isUpdate).toBe(false);
    expect(data.previousPrice).toBeNull();
    expect(data.currentPrice).toBe(120);
    expect(data.distancePercent).toBeCloseTo(-16.6667, 3);
    expect(data.warning).toBeNull();
  });

  it("replaces a level for the same symbol", async () => {
    await post("/api/users/alice/levels", { symbol: "SYM", targetPrice: 100 });
    const res = await post("/api/users/alice/levels", { symbol: "SYM", targetPrice: 90 });
    expect(res.status).toBe(200);
    const data = await res.json();
    expect(data.isUpdate).toBe(true);
    expect(data.previousPrice).toBe(100);
    expect(t.registry.list("alice").map((l) => l.level.targetPrice)).toEqual([90]);
  });

  it("stores a target above the current price with a warning", async () => {
    const res = await post("/api/users/alice/levels", { symbol: "SYM", targetPrice: 150 });
    expect(res.status).toBe(201);
    expect((await res.json()).warning).toBe("Target is at or above the current price");
    expect(t.registry.size()).toBe(1);
  });

  it("accepts a numeric string price", async () => {
    const res = await post("/api/users/alice/levels", { symbol: "SYM", targetPrice: "99.5" });
    expect(res.status).toBe(201);
    expect((await res.json()).level.targetPrice).toBe(99.5);
  });

  it("rejects a missing symbol", async () => {
    const res = await post("/api/users/alice/levels", { targetPrice: 100 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "symbol and targetPrice required" });
  });

  it.each([0, -1, "abc", null])("rejects target price %s", async (targetPrice) => {
    const res = await post("/api/users/alice/levels", { symbol: "SYM", targetPrice });
    expect(res.status).toBe(400);
    expect(t.registry.size()).toBe(0);
  });

  it("rejects symbols without a price", async () => {
    const res = await post("/api/users/alice/levels", { symbol: "nope", targetPrice: 1 });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Unknown symbol "NOPE"' });
    expect(t.registry.size()).toBe(0);
  });

  it("answers 502 when the price source fails", async () => {
    const res = await post("/api/users/alice/levels", { symbol: "DOWN", targetPrice: 1 });
    expect(res.status).toBe(502);
  });

  it("lists levels with live prices", async () => {
    t.registry.upsert("alice", "SYM", 100);
    t.registry.upsert("alice", "GONE", 5);
    t.prices.GONE = null;

    const res = await get("/api/users/alice/levels");
    expect(res.status).toBe(200);
    const data = await res.json();
    expect(data).toHaveLength(2);
    expect(data[0]).toMatchObject({ symbol: "SYM", targetPrice: 100, currentPrice: 120, status: "watching" });
    expect(data[1]).toEqual({
      symbol: "GONE",
      targetPrice: 5,
      createdAt: CREATED_AT.toISOString(),
      currentPrice: null,
      distancePercent: null,
      status: "unknown",
    });
  });

  it("marks levels the price already reached", async () => {
    t.registry.upsert("alice", "SYM", 130);
    const data = await (await get("/api/users/alice/levels")).json();
    expect(data[0].status).toBe("hit");
  });

  it("lists nothing for an unknown user", async () => {
    const res = await get("/api/users/nobody/levels");
    expect(await res.json()).toEqual([]);
  });

  it("removes a level", async () => {
    t.registry.upsert("alice", "SYM", 100);
    const res = await del("/api/users/alice/levels/sym");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ symbol: "SYM", targetPrice: 100, createdAt: CREATED_AT.toISOString() });
    expect(t.registry.size()).toBe(0);
  });

  it("returns 404 when removing a missing level", async () => {
    const res = await del("/api/users/alice/levels/SYM");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "No active level for SYM" });
  });

  it("returns the current price for a symbol", async () => {
    const res = await get("/api/price/sym");
    expect(await res.json()).toEqual({ symbol: "SYM", price: 120 });
  });

  it("returns 404 for an unknown price symbol", async () => {
    const res = await get("/api/price/NOPE");
    expect(res.status).toBe(404);
  });
});

describe("server API over a rate-limited Binance", () => {
  const realFetch = fetch;

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("answers 502, not unknown symbol", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    // only the Binance host is faked; requests to the test server go through
    vi.stubGlobal(
      "fetch",
      vi.fn<typeof fetch>(async (input, init) =>
        String(input).startsWith("https://binance.test")
          ? new Response(JSON.stringify({ code: -1003, msg: "Too many requests." }), { status: 429 })
          : realFetch(input, init),
      ),
    );
    const priceSource = new BinancePriceSource({
      spotUrl: "https://binance.test",
      futuresUrl: "https://binance.test",
      timeoutMs: 1_000,
    });
    const registry = new TargetRegistry();
    const monitor = new MonitorLoop(registry, priceSource, { notify: async () => true });
    const server = createApp({ registry, priceSource, monitor }).listen(0);
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("test server has no port");

    try {
      const res = await realFetch(`http://127.0.0.1:${address.port}/api/users/alice/levels`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ symbol: "BTCUSDT", targetPrice: 1 }),
      });
      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({ error: "Price source unavailable" });
      expect(registry.size()).toBe(0);
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});
