/**
 * Portfolio Valuation
 *
 * Marks each holding to the latest price found in a set of stock records
 * and totals the priced positions. Positions with no matching record are
 * kept with null market fields so the caller can still show them.
 */

import type { PortfolioPosition } from "../agents/agent-types.ts";
import type { RecommendationLabel } from "./recommendation-engine.ts";
import { normalizeStockRecord, symbolKey, type StockRecord } from "./stock-normalizer.ts";
import type { MarketDataGateway } from "./market-data-gateway.ts";
import { round2, percentChange } from "../lib/math-utils.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PositionValuation {
  symbol: string;
  quantity: number;
  buyPrice: number;
  costBasis: number;
  currentPrice: number | null;
  marketValue: number | null;
  pnl: number | null;
  pnlPercent: number | null;
  recommendation: RecommendationLabel | null;
}

export interface PortfolioValuation {
  positions: PositionValuation[];
  /** Cost basis of the priced positions only */
  totalCost: number;
  totalValue: number;
  totalPnl: number;
  totalPnlPercent: number | null;
  pricedPositions: number;
  unpricedSymbols: string[];
}

// ---------------------------------------------------------------------------
// Valuation
// ---------------------------------------------------------------------------

export function indexBySymbol(stocks: readonly StockRecord[]): Map<string, StockRecord> {
  const index = new Map<string, StockRecord>();
  for (const stock of stocks) {
    const key = symbolKey(stock.symbol);
    if (!index.has(key)) index.set(key, stock);
  }
  return index;
}

export function valuePortfolio(
  positions: readonly PortfolioPosition[],
  stocks: readonly StockRecord[],
): PortfolioValuation {
  const index = indexBySymbol(stocks);
  const valued: PositionValuation[] = [];
  const unpricedSymbols: string[] = [];
  let totalCost = 0;
  let totalValue = 0;
  let pricedPositions = 0;

  for (const position of positions) {
    const costBasis = round2(position.quantity * position.buyPrice);
    const stock = index.get(symbolKey(position.symbol));

    if (!stock) {
      unpricedSymbols.push(position.symbol);
      valued.push({
        symbol: position.symbol,
        quantity: position.quantity,
        buyPrice: position.buyPrice,
        costBasis,
        currentPrice: null,
        marketValue: null,
        pnl: null,
        pnlPercent: null,
        recommendation: null,
      });
      continue;
    }

    const marketValue = round2(position.quantity * stock.price);
    const pnl = round2(marketValue - costBasis);
    const pnlPercent = percentChange(costBasis, marketValue);

    totalCost += costBasis;
    totalValue += marketValue;
    pricedPositions++;

    valued.push({
      symbol: position.symbol,
      quantity: position.quantity,
      buyPrice: position.buyPrice,
      costBasis,
      currentPrice: stock.price,
      marketValue,
      pnl,
      pnlPercent: pnlPercent === null ? null : round2(pnlPercent),
      recommendation: stock.recommendation,
    });
  }

  const totalPnlPercent = percentChange(totalCost, totalValue);

  return {
    positions: valued,
    totalCost: round2(totalCost),
    totalValue: round2(totalValue),
    totalPnl: round2(totalValue - totalCost),
    totalPnlPercent: totalPnlPercent === null ? null : round2(totalPnlPercent),
    pricedPositions,
    unpricedSymbols,
  };
}

/**
 * Add records for the given symbols that `stocks` does not cover, fetched
 * one by one through the gateway. Symbols the gateway cannot resolve are
 * left out. Returns a new list; `stocks` keeps its order at the front.
 */
export async function completeSnapshots(
  symbols: readonly string[],
  stocks: readonly StockRecord[],
  gateway: MarketDataGateway,
): Promise<StockRecord[]> {
  const index = indexBySymbol(stocks);
  const missing = [...new Set(symbols.map(symbolKey))].filter((key) => !index.has(key));

  const fetched = await Promise.all(
    missing.map(async (key) => {
      const result = await gateway.stockAnalysis(key);
      return result.ok ? normalizeStockRecord(result.data) : null;
    }),
  );

  return [...stocks, ...fetched.filter((stock): stock is StockRecord => stock !== null)];
}
