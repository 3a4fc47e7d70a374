import express from "express";
import { errorMessage, ValidationError } from "./errors.js";
import { log } from "./logger.js";
import { normalizeSymbol, type TargetRegistry } from "./registry.js";
import type { MonitorLoop } from "./scheduler.js";
import { describeStatus, distancePercent } from "./services/alert-evaluator.js";
import type { PriceSource, TargetLevel } from "./types.js";

export interface AppDeps {
  registry: TargetRegistry;
  priceSource: PriceSource;
  monitor: MonitorLoop;
}

function levelJson(level: TargetLevel) {
  return {
    symbol: level.symbol,
    targetPrice: level.targetPrice,
    createdAt: level.createdAt.toISOString(),
  };
}

export function createApp({ registry, priceSource, monitor }: AppDeps): express.Express {
  const app = express();
  app.use(express.json());

  async function lookupOrNull(symbol: string): Promise<number | null> {
    try {
      return await priceSource.lookup(symbol);
    } catch (err) {
      log.warn(`  Price lookup for ${symbol} failed:`, errorMessage(err));
      return null;
    }
  }

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, monitor: monitor.currentState, levels: registry.size() });
  });

  // ── Target level routes ────────────────────────────────────────────────

  app.get("/api/users/:userId/levels", async (req, res) => {
    try {
      const listed = registry.list(req.params.userId);
      const rows = [];
      for (const { level } of listed) {
        const currentPrice = await lookupOrNull(level.symbol);
        rows.push({
          ...levelJson(level),
          currentPrice,
          distancePercent: currentPrice != null ? distancePercent(level.targetPrice, currentPrice) : null,
          status: describeStatus(level, currentPrice),
        });
      }
      res.json(rows);
    } catch (err) {
      log.error("GET /api/users/:userId/levels error:", errorMessage(err));
      res.status(500).json({ error: "Failed to list levels" });
    }
  });

  app.post("/api/users/:userId/levels", async (req, res) => {
    try {
      const { symbol, targetPrice } = req.body ?? {};
      if (typeof symbol !== "string" || !symbol.trim()) {
        res.status(400).json({ error: "symbol and targetPrice required" });
        return;
      }
      const price = Number(targetPrice);
      if (!Number.isFinite(price) || price <= 0) {
        res.status(400).json({ error: "targetPrice must be a positive number" });
        return;
      }

      const resolvedSymbol = normalizeSymbol(symbol);
      let currentPrice: number | null;
      try {
        currentPrice = await priceSource.lookup(resolvedSymbol);
      } catch (err) {
        log.warn(`  Price lookup for ${resolvedSymbol} failed:`, errorMessage(err));
        res.status(502).json({ error: "Price source unavailable" });
        return;
      }
      if (currentPrice == null) {
        res.status(404).json({ error: `Unknown symbol "${resolvedSymbol}"` });
        return;
      }

      // Stored even when the target is at or above the current price; the caller gets a warning.
      const { level, isUpdate, previousPrice } = registry.upsert(req.params.userId, resolvedSymbol, price);
      res.status(isUpdate ? 200 : 201).json({
        level: levelJson(level),
        isUpdate,
        previousPrice,
        currentPrice,
        distancePercent: distancePercent(level.targetPrice, currentPrice),
        warning: level.targetPrice >= currentPrice ? "Target is at or above the current price" : null,
      });
    } catch (err) {
      if (err instanceof ValidationError) {
        res.status(400).json({ error: err.message });
        return;
      }
      log.error("POST /api/users/:userId/levels error:", errorMessage(err));
      res.status(500).json({ error: "Failed to save level" });
    }
  });

  app.delete("/api/users/:userId/levels/:symbol", (req, res) => {
    const removed = registry.remove(req.params.userId, req.params.symbol);
    if (!removed) {
      res.status(404).json({ error: `No active level for ${normalizeSymbol(req.params.symbol)}` });
      return;
    }
    res.json(levelJson(removed));
  });

  // ── Price routes ───────────────────────────────────────────────────────

  app.get("/api/price/:symbol", async (req, res) => {
    const symbol = normalizeSymbol(req.params.symbol);
    const price = await lookupOrNull(symbol);
    if (price == null) {
      res.status(404).json({ error: `Symbol "${symbol}" not found` });
      return;
    }
    res.json({ symbol, price });
  });

  return app;
}
