import { Hono } from "hono";
import type { AppContext } from "../context.ts";
import { validateBody, validateQuery } from "../middleware/validation.ts";
import { currentPricesRequestSchema, moversQuerySchema } from "../schemas/api.ts";
import { normalizeStockRecord, type StockRecord } from "../services/stock-normalizer.ts";
import type { GatewayResult, MarketQuote } from "../services/market-data-gateway.ts";
import { apiError } from "../lib/errors.ts";

function toRecords(quotes: readonly MarketQuote[]): StockRecord[] {
  return quotes
    .map((quote) => normalizeStockRecord(quote))
    .filter((record): record is StockRecord => record !== null);
}

export function createStockRoutes(ctx: AppContext) {
  const routes = new Hono();

  const movers = (
    fetchMovers: (limit: number) => Promise<GatewayResult<MarketQuote[]>>,
    key: "gainers" | "losers",
  ) =>
    routes.get(`/top-${key}`, validateQuery(moversQuerySchema), async (c) => {
      const { limit } = c.get("validatedQuery");
      const result = await fetchMovers(limit);
      if (!result.ok) {
        return apiError(c, "PROVIDER_UNAVAILABLE", { reason: result.error });
      }
      return c.json({ [key]: toRecords(result.data), timestamp: new Date().toISOString() });
    });

  // ---------------------------------------------------------------------------
  // GET /top-gainers, GET /top-losers -- Session movers, scored
  // Registered before /:symbol so the literal paths win
  // ---------------------------------------------------------------------------

  movers((limit) => ctx.gateway.topGainers(limit), "gainers");
  movers((limit) => ctx.gateway.topLosers(limit), "losers");

  // ---------------------------------------------------------------------------
  // POST /current-prices -- ["OGDC", "PSO"] -> { "OGDC": 120.3, ... }
  // ---------------------------------------------------------------------------

  routes.post("/current-prices", validateBody(currentPricesRequestSchema), async (c) => {
    const symbols = c.get("validatedBody");
    const results = await Promise.all(symbols.map((symbol) => ctx.gateway.stockAnalysis(symbol)));

    const prices: Record<string, number> = {};
    symbols.forEach((symbol, i) => {
      const result = results[i];
      if (result?.ok) prices[symbol] = result.data.price_data.current_price;
    });

    return c.json(prices);
  });

  // ---------------------------------------------------------------------------
  // GET /:symbol -- Technical analysis plus the engine's recommendation
  // ---------------------------------------------------------------------------

  routes.get("/:symbol", async (c) => {
    const result = await ctx.gateway.stockAnalysis(c.req.param("symbol"));
    if (!result.ok) {
      return apiError(c, "STOCK_NOT_FOUND", { reason: result.error });
    }

    const record = normalizeStockRecord(result.data);
    return c.json({
      ...result.data,
      recommendation: record && {
        label: record.recommendation,
        score: record.score,
        reason: record.reason,
        factors: record.factors,
      },
    });
  });

  return routes;
}
