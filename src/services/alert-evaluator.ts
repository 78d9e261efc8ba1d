/**
 * Alert Evaluator
 *
 * Checks user-defined alert rules against fresh stock snapshots. Rules for
 * symbols with no snapshot, and indicator rules whose indicator the
 * provider did not report, simply do not trigger.
 */

import { symbolKey, type StockRecord } from "./stock-normalizer.ts";
import type { MarketDataGateway } from "./market-data-gateway.ts";
import { completeSnapshots, indexBySymbol } from "./portfolio-valuation.ts";
import { PSX_CURRENCY } from "../config/constants.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface AlertRuleBase {
  symbol: string;
  isActive: boolean;
  /** Caller-supplied text used instead of the generated message */
  message?: string;
}

export type AlertRule =
  | (AlertRuleBase & { type: "price_target"; targetPrice: number; direction: "above" | "below" })
  | (AlertRuleBase & { type: "rsi_oversold"; threshold: number })
  | (AlertRuleBase & { type: "rsi_overbought"; threshold: number })
  | (AlertRuleBase & { type: "volume_spike"; minVolume: number });

export type AlertType = AlertRule["type"];

export interface TriggeredAlert {
  symbol: string;
  type: AlertType;
  message: string;
  price: number;
  changePercent: number;
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/** Generated message when the rule fires, null when it does not. */
function checkRule(rule: AlertRule, stock: StockRecord): string | null {
  const symbol = stock.symbol;

  switch (rule.type) {
    case "price_target": {
      const hit = rule.direction === "above" ? stock.price >= rule.targetPrice : stock.price <= rule.targetPrice;
      return hit
        ? `${symbol} is at ${stock.price} ${PSX_CURRENCY}, ${rule.direction} the ${rule.targetPrice} ${PSX_CURRENCY} target`
        : null;
    }
    case "rsi_oversold":
      if (stock.rsi === undefined || stock.rsi >= rule.threshold) return null;
      return `${symbol} RSI ${stock.rsi} is below ${rule.threshold} (oversold)`;
    case "rsi_overbought":
      if (stock.rsi === undefined || stock.rsi <= rule.threshold) return null;
      return `${symbol} RSI ${stock.rsi} is above ${rule.threshold} (overbought)`;
    case "volume_spike":
      if (stock.volume === undefined || stock.volume < rule.minVolume) return null;
      return `${symbol} volume ${stock.volume} reached ${rule.minVolume}`;
  }
}

export function evaluateAlerts(
  rules: readonly AlertRule[],
  stocks: readonly StockRecord[],
): TriggeredAlert[] {
  const index = indexBySymbol(stocks);
  const triggered: TriggeredAlert[] = [];

  for (const rule of rules) {
    if (!rule.isActive) continue;
    const stock = index.get(symbolKey(rule.symbol));
    if (!stock) continue;

    const generated = checkRule(rule, stock);
    if (generated === null) continue;

    triggered.push({
      symbol: stock.symbol,
      type: rule.type,
      message: rule.message ?? generated,
      price: stock.price,
      changePercent: stock.changePercent,
    });
  }

  return triggered;
}

/**
 * Snapshots for every active rule: `stocks` plus direct lookups for the
 * symbols it does not cover.
 */
export function resolveAlertStocks(
  rules: readonly AlertRule[],
  stocks: readonly StockRecord[],
  gateway: MarketDataGateway,
): Promise<StockRecord[]> {
  const symbols = rules.filter((rule) => rule.isActive).map((rule) => rule.symbol);
  return completeSnapshots(symbols, stocks, gateway);
}
