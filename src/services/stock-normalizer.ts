/**
 * Stock Record Normalizer
 *
 * Reconciles the two payload shapes the market data tools emit into one
 * canonical StockRecord and scores it:
 *
 * - "detailed" (get_stock_analysis): prices under `price_data`, indicators
 *   under `technical_indicators`
 * - "simple" (gainers / losers / RSI scans): flat fields, where the price may
 *   be `price` or `close` and the percent move `change_percent` or `change`
 *
 * Parsing never throws. parseStockPayload() reports why a payload was
 * rejected; normalizeStockRecord() is the null-returning form.
 */

import { round2, toFiniteNumber, percentChange } from "../lib/math-utils.ts";
import {
  scoreSnapshot,
  type RecommendationLabel,
  type TechnicalSnapshot,
} from "./recommendation-engine.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Snapshot + recommendation: the unit returned to callers. */
export interface StockRecord extends TechnicalSnapshot {
  /** Absolute price move for the session */
  change: number;
  recommendation: RecommendationLabel;
  score: number;
  reason: string;
  factors: string[];
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

type PayloadObject = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isPayloadObject(value: unknown): value is PayloadObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Drop a market qualifier: "PSX:OGDC" -> "OGDC". Bare tickers pass through.
 */
export function stripMarketPrefix(symbol: string): string {
  const trimmed = symbol.trim();
  const colon = trimmed.lastIndexOf(":");
  return colon >= 0 ? trimmed.slice(colon + 1).trim() : trimmed;
}

/** Canonical key used to compare symbols across sources. */
export function symbolKey(symbol: string): string {
  return stripMarketPrefix(symbol).toUpperCase();
}

/** First key present with a finite numeric value. */
function pickNumber(source: PayloadObject, ...keys: string[]): number | null {
  for (const key of keys) {
    const value = toFiniteNumber(source[key]);
    if (value !== null) return value;
  }
  return null;
}

interface ExtractedFields {
  price: number | null;
  open: number | null;
  changePercent: number | null;
  /** Explicit absolute change, when the payload carries one */
  changeDelta: number | null;
  rsi: number | null;
  volume: number | null;
  sma20: number | null;
  ema50: number | null;
}

function extractDetailed(priceData: PayloadObject, indicators: PayloadObject): ExtractedFields {
  return {
    price: pickNumber(priceData, "current_price", "price", "close"),
    open: pickNumber(priceData, "open"),
    changePercent: pickNumber(priceData, "change_percent"),
    changeDelta: pickNumber(priceData, "change"),
    rsi: pickNumber(indicators, "rsi"),
    volume: pickNumber(priceData, "volume"),
    sma20: pickNumber(indicators, "sma20"),
    ema50: pickNumber(indicators, "ema50"),
  };
}

function extractSimple(raw: PayloadObject): ExtractedFields {
  const hasPercentField = toFiniteNumber(raw.change_percent) !== null;
  return {
    price: pickNumber(raw, "price", "close"),
    open: pickNumber(raw, "open"),
    // Scanner rows name the percent move `change` when `change_percent` is absent
    changePercent: hasPercentField ? pickNumber(raw, "change_percent") : pickNumber(raw, "change"),
    changeDelta: hasPercentField ? pickNumber(raw, "change") : null,
    rsi: pickNumber(raw, "rsi", "RSI"),
    volume: pickNumber(raw, "volume"),
    sma20: pickNumber(raw, "sma20", "SMA20"),
    ema50: pickNumber(raw, "ema50", "EMA50"),
  };
}

function resolveChange(fields: ExtractedFields, price: number, changePercent: number): number {
  if (fields.changeDelta !== null) return round2(fields.changeDelta);
  if (fields.open !== null) return round2(price - fields.open);
  // Back out the previous price from the percentage
  if (changePercent <= -100) return 0;
  return round2(price - price / (1 + changePercent / 100));
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function parseStockPayload(raw: unknown): ParseResult<StockRecord> {
  if (!isPayloadObject(raw)) {
    return { ok: false, reason: "payload is not an object" };
  }

  if (typeof raw.symbol !== "string" || raw.symbol.trim().length === 0) {
    return {
      ok: false,
      reason: typeof raw.error === "string" ? `provider error: ${raw.error}` : "missing symbol",
    };
  }

  const symbol = stripMarketPrefix(raw.symbol);
  if (symbol.length === 0) {
    return { ok: false, reason: "missing symbol" };
  }

  const fields =
    isPayloadObject(raw.price_data)
      ? extractDetailed(raw.price_data, isPayloadObject(raw.technical_indicators) ? raw.technical_indicators : {})
      : extractSimple(raw);

  if (fields.price === null) {
    return { ok: false, reason: `non-numeric price for ${symbol}` };
  }
  const price = fields.price;

  let changePercent = fields.changePercent;
  if (changePercent === null && fields.open !== null) {
    const computed = percentChange(fields.open, price);
    changePercent = computed === null ? null : round2(computed);
  }
  const resolvedPercent = changePercent ?? 0;

  const snapshot: TechnicalSnapshot = {
    symbol,
    price,
    changePercent: resolvedPercent,
    ...(fields.rsi !== null && { rsi: fields.rsi }),
    ...(fields.volume !== null && { volume: Math.round(fields.volume) }),
    ...(fields.sma20 !== null && { sma20: fields.sma20 }),
    ...(fields.ema50 !== null && { ema50: fields.ema50 }),
  };

  const recommendation = scoreSnapshot(snapshot);

  return {
    ok: true,
    value: {
      ...snapshot,
      change: resolveChange(fields, price, resolvedPercent),
      recommendation: recommendation.label,
      score: recommendation.score,
      reason: recommendation.reason,
      factors: recommendation.factors,
    },
  };
}

/**
 * Normalize one provider payload, or null when it is not a usable stock
 * record (error payloads, missing symbol, non-numeric price).
 */
export function normalizeStockRecord(raw: unknown): StockRecord | null {
  const result = parseStockPayload(raw);
  return result.ok ? result.value : null;
}
