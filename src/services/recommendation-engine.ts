/**
 * Recommendation Engine
 *
 * Turns one technical snapshot into a BUY / SELL / HOLD call with an
 * integer score and a short human-readable reason. Pure and deterministic:
 * the same snapshot always produces the same recommendation, and nothing
 * is cached between calls because prices move.
 *
 * Scoring is additive over three independent terms, evaluated in order:
 *   1. RSI (oversold / overbought)
 *   2. Session change % (momentum / dip)
 *   3. Trend (price vs SMA20 vs EMA50)
 * Each term that fires contributes points and one factor tag.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One symbol's market data at one point in time. */
export interface TechnicalSnapshot {
  symbol: string;
  price: number;
  changePercent: number;
  /** Absent when the provider did not report it; never defaulted to 0 */
  rsi?: number;
  volume?: number;
  sma20?: number;
  ema50?: number;
}

export type RecommendationLabel = "BUY" | "SELL" | "HOLD";

export interface Recommendation {
  label: RecommendationLabel;
  score: number;
  reason: string;
  /** Factor tags in evaluation order (RSI, change, trend) */
  factors: string[];
}

// ---------------------------------------------------------------------------
// Thresholds
// ---------------------------------------------------------------------------

/** RSI below this is oversold (+3) */
const RSI_OVERSOLD = 30;
/** RSI in [RSI_OVERSOLD, RSI_UNDERVALUED) is undervalued (+1) */
const RSI_UNDERVALUED = 40;
/** RSI in (RSI_OVERVALUED, RSI_OVERBOUGHT] is overvalued (-1) */
const RSI_OVERVALUED = 60;
/** RSI above this is overbought (-3) */
const RSI_OVERBOUGHT = 70;

/** Change % above this is a strong rally (-2) */
const CHANGE_STRONG_RALLY = 5;
/** Change % in (CHANGE_MOMENTUM, CHANGE_STRONG_RALLY] is positive momentum (+1) */
const CHANGE_MOMENTUM = 2;
/** Change % in [CHANGE_BIG_DIP, CHANGE_PULLBACK) is a slight pullback (+1) */
const CHANGE_PULLBACK = -2;
/** Change % below this is a big dip (+2) */
const CHANGE_BIG_DIP = -5;

/** Score at or above which the label is BUY */
const BUY_THRESHOLD = 3;
/** Score at or below which the label is SELL */
const SELL_THRESHOLD = -3;

/** Number of factor tags quoted in the reason string */
const REASON_FACTOR_COUNT = 2;

const REASON_PREFIX: Record<RecommendationLabel, string> = {
  BUY: "Good opportunity",
  SELL: "Take profits",
  HOLD: "Mixed signals",
};

const REASON_FALLBACK: Record<RecommendationLabel, string> = {
  BUY: "Good value",
  SELL: "Overpriced",
  HOLD: "Stable, wait and see",
};

// ---------------------------------------------------------------------------
// Scoring terms
// ---------------------------------------------------------------------------

interface ScoreTerm {
  points: number;
  factor: string;
}

function rsiTerm(rsi: number | undefined): ScoreTerm | null {
  if (rsi === undefined) return null;
  if (rsi < RSI_OVERSOLD) return { points: 3, factor: "oversold" };
  if (rsi < RSI_UNDERVALUED) return { points: 1, factor: "undervalued" };
  if (rsi > RSI_OVERBOUGHT) return { points: -3, factor: "overbought" };
  if (rsi > RSI_OVERVALUED) return { points: -1, factor: "overvalued" };
  return null;
}

function changeTerm(changePercent: number): ScoreTerm | null {
  if (changePercent > CHANGE_STRONG_RALLY) return { points: -2, factor: "strong rally" };
  if (changePercent > CHANGE_MOMENTUM) return { points: 1, factor: "positive momentum" };
  if (changePercent < CHANGE_BIG_DIP) return { points: 2, factor: "big dip" };
  if (changePercent < CHANGE_PULLBACK) return { points: 1, factor: "slight pullback" };
  return null;
}

function trendTerm(snapshot: TechnicalSnapshot): ScoreTerm | null {
  const { price, sma20, ema50 } = snapshot;
  if (sma20 === undefined || ema50 === undefined || !(price > 0)) return null;
  if (price > sma20 && sma20 > ema50) return { points: 2, factor: "strong uptrend" };
  if (price < sma20 && sma20 < ema50) return { points: -2, factor: "downtrend" };
  return null;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function labelForScore(score: number): RecommendationLabel {
  if (score >= BUY_THRESHOLD) return "BUY";
  if (score <= SELL_THRESHOLD) return "SELL";
  return "HOLD";
}

export function buildReason(label: RecommendationLabel, factors: string[]): string {
  if (factors.length === 0) return REASON_FALLBACK[label];
  return `${REASON_PREFIX[label]} - ${factors.slice(0, REASON_FACTOR_COUNT).join(", ")}`;
}

/**
 * Score a snapshot.
 *
 * @example
 * scoreSnapshot({ symbol: "OGDC", price: 120, changePercent: 1, rsi: 25 })
 * // { label: "BUY", score: 3, reason: "Good opportunity - oversold", factors: ["oversold"] }
 */
export function scoreSnapshot(snapshot: TechnicalSnapshot): Recommendation {
  const terms = [
    rsiTerm(snapshot.rsi),
    changeTerm(snapshot.changePercent),
    trendTerm(snapshot),
  ].filter((term): term is ScoreTerm => term !== null);

  const score = terms.reduce((sum, term) => sum + term.points, 0);
  const factors = terms.map((term) => term.factor);
  const label = labelForScore(score);

  return {
    label,
    score,
    reason: buildReason(label, factors),
    factors,
  };
}
