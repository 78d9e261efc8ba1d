/**
 * Market Data Gateway: TradingView scanner for the Pakistan Stock Exchange
 *
 * Five operations back the agent's tools and the /stocks routes:
 *   topGainers, topLosers, stockAnalysis, scanOversold, scanOverbought
 *
 * Every failure (network, timeout, HTTP status, unexpected payload, unknown
 * symbol) is caught here and returned as `{ ok: false, error }`. Nothing
 * raises past this boundary; callers treat an error result as "no data".
 *
 * Scanner API: POST {base}/{market}/scan with a JSON body naming the columns
 * to return. Each row comes back as `{ s: "PSX:OGDC", d: [...values] }` with
 * values in column order.
 */

import { z } from "zod";
import {
  PSX_MARKET,
  PSX_SYMBOL_PREFIX,
  DEFAULT_SCREEN_LIMIT,
  MAX_SCREEN_LIMIT,
} from "../config/constants.ts";
import { ProviderError, errorMessage } from "../lib/errors.ts";
import { round2, percentChange } from "../lib/math-utils.ts";
import { stripMarketPrefix } from "./stock-normalizer.ts";

// ---------------------------------------------------------------------------
// Result Types
// ---------------------------------------------------------------------------

export type GatewayResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: string };

/** Flat row from the gainers / losers endpoints */
export interface MarketQuote {
  symbol: string;
  price: number;
  change_percent: number;
  volume: number | null;
  open: number | null;
}

/** Flat row from the RSI scans */
export interface RsiScanRow {
  symbol: string;
  price: number;
  change_percent: number;
  rsi: number;
  volume: number | null;
  signal: string;
}

export type RsiSignal = "Overbought" | "Oversold" | "Neutral";
export type OverallSignal = "Bullish" | "Bearish" | "Neutral";

/** Nested snapshot for a single symbol */
export interface StockAnalysis {
  symbol: string;
  price_data: {
    current_price: number;
    open: number | null;
    high: number | null;
    low: number | null;
    change: number | null;
    change_percent: number;
    volume: number | null;
  };
  technical_indicators: {
    rsi: number | null;
    rsi_signal: RsiSignal | null;
    sma20: number | null;
    ema50: number | null;
    bb_upper: number | null;
    bb_lower: number | null;
    bb_signal: string | null;
    macd: number | null;
    macd_signal: number | null;
  };
  overall_signal: OverallSignal;
}

/**
 * Every operation takes an optional caller signal; aborting it cancels the
 * upstream request on top of the gateway's own timeout.
 */
export interface MarketDataGateway {
  topGainers(limit?: number, signal?: AbortSignal): Promise<GatewayResult<MarketQuote[]>>;
  topLosers(limit?: number, signal?: AbortSignal): Promise<GatewayResult<MarketQuote[]>>;
  stockAnalysis(symbol: string, signal?: AbortSignal): Promise<GatewayResult<StockAnalysis>>;
  scanOversold(
    rsiThreshold: number,
    limit?: number,
    signal?: AbortSignal,
  ): Promise<GatewayResult<RsiScanRow[]>>;
  scanOverbought(
    rsiThreshold: number,
    limit?: number,
    signal?: AbortSignal,
  ): Promise<GatewayResult<RsiScanRow[]>>;
}

// ---------------------------------------------------------------------------
// Scanner wire format
// ---------------------------------------------------------------------------

const scannerResponseSchema = z.object({
  totalCount: z.number().optional(),
  data: z.array(
    z.object({
      s: z.string(),
      d: z.array(z.union([z.number(), z.string(), z.null()])),
    }),
  ),
});

type ScannerRow = z.infer<typeof scannerResponseSchema>["data"][number];

interface ScannerRequest {
  columns: readonly string[];
  filter?: Array<{ left: string; operation: "less" | "greater"; right: number }>;
  sort?: { sortBy: string; sortOrder: "asc" | "desc" };
  range?: [number, number];
  symbols?: { tickers: string[] };
}

const QUOTE_COLUMNS = ["name", "close", "volume", "change", "open"] as const;
const SCAN_COLUMNS = ["name", "close", "volume", "change", "RSI"] as const;
const ANALYSIS_COLUMNS = [
  "name",
  "close",
  "open",
  "high",
  "low",
  "volume",
  "RSI",
  "SMA20",
  "EMA50",
  "BB.upper",
  "BB.lower",
  "MACD.macd",
  "MACD.signal",
] as const;

/** Read a numeric column from a scanner row; null when missing or not a number. */
function cell(row: ScannerRow, columns: readonly string[], column: string): number | null {
  const index = columns.indexOf(column);
  const value = index >= 0 ? row.d[index] : null;
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function roundOrNull(value: number | null): number | null {
  return value === null ? null : round2(value);
}

function clampLimit(limit: number | undefined): number {
  const value = limit ?? DEFAULT_SCREEN_LIMIT;
  if (!Number.isFinite(value)) return DEFAULT_SCREEN_LIMIT;
  return Math.min(MAX_SCREEN_LIMIT, Math.max(1, Math.floor(value)));
}

/** "ogdc" / "PSX:OGDC" -> "PSX:OGDC" */
export function toExchangeTicker(symbol: string): string {
  return `${PSX_SYMBOL_PREFIX}:${stripMarketPrefix(symbol).toUpperCase()}`;
}

export function classifyRsi(rsi: number | null): RsiSignal | null {
  if (rsi === null) return null;
  if (rsi > 70) return "Overbought";
  if (rsi < 30) return "Oversold";
  return "Neutral";
}

export function classifyOverall(changePercent: number, rsi: number | null): OverallSignal {
  if (changePercent > 2 && (rsi === null || rsi < 70)) return "Bullish";
  if (changePercent < -2) return "Bearish";
  return "Neutral";
}

function classifyBands(close: number, upper: number | null, lower: number | null): string | null {
  if (upper === null || lower === null) return null;
  if (close > upper) return "Above Upper Band";
  if (close < lower) return "Below Lower Band";
  return "Within Bands";
}

// ---------------------------------------------------------------------------
// TradingView implementation
// ---------------------------------------------------------------------------

export interface TradingViewGatewayOptions {
  baseUrl: string;
  timeoutMs: number;
  market?: string;
  fetchFn?: typeof fetch;
}

export class TradingViewGateway implements MarketDataGateway {
  private readonly baseUrl: string;
  private readonly market: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: TradingViewGatewayOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.market = options.market ?? PSX_MARKET;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  topGainers(limit?: number, signal?: AbortSignal): Promise<GatewayResult<MarketQuote[]>> {
    return this.guard("topGainers", () => this.fetchQuotes("desc", clampLimit(limit), signal));
  }

  topLosers(limit?: number, signal?: AbortSignal): Promise<GatewayResult<MarketQuote[]>> {
    return this.guard("topLosers", () => this.fetchQuotes("asc", clampLimit(limit), signal));
  }

  scanOversold(
    rsiThreshold: number,
    limit?: number,
    signal?: AbortSignal,
  ): Promise<GatewayResult<RsiScanRow[]>> {
    return this.guard("scanOversold", () =>
      this.fetchRsiScan("less", rsiThreshold, clampLimit(limit), signal),
    );
  }

  scanOverbought(
    rsiThreshold: number,
    limit?: number,
    signal?: AbortSignal,
  ): Promise<GatewayResult<RsiScanRow[]>> {
    return this.guard("scanOverbought", () =>
      this.fetchRsiScan("greater", rsiThreshold, clampLimit(limit), signal),
    );
  }

  stockAnalysis(symbol: string, signal?: AbortSignal): Promise<GatewayResult<StockAnalysis>> {
    return this.guard("stockAnalysis", () => this.fetchAnalysis(symbol, signal));
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<GatewayResult<T>> {
    try {
      return { ok: true, data: await fn() };
    } catch (err) {
      const message = errorMessage(err);
      console.warn(`[MarketData] ${operation} failed: ${message}`);
      return { ok: false, error: message };
    }
  }

  private async scan(request: ScannerRequest, signal?: AbortSignal): Promise<ScannerRow[]> {
    const url = `${this.baseUrl}/${this.market}/scan`;
    const body = {
      markets: [this.market],
      options: { lang: "en" },
      ...request,
    };

    let resp: Response;
    try {
      resp = await this.fetchFn(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: signal
          ? AbortSignal.any([signal, AbortSignal.timeout(this.timeoutMs)])
          : AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ProviderError(`scanner request failed: ${errorMessage(err)}`);
    }

    if (!resp.ok) {
      throw new ProviderError(`scanner responded with HTTP ${resp.status}`);
    }

    let json: unknown;
    try {
      json = await resp.json();
    } catch {
      throw new ProviderError("scanner returned invalid JSON");
    }

    const parsed = scannerResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderError("scanner returned an unexpected payload");
    }
    return parsed.data.data;
  }

  private async fetchQuotes(
    sortOrder: "asc" | "desc",
    limit: number,
    signal?: AbortSignal,
  ): Promise<MarketQuote[]> {
    const rows = await this.scan(
      {
        columns: QUOTE_COLUMNS,
        sort: { sortBy: "change", sortOrder },
        range: [0, limit],
      },
      signal,
    );

    const quotes: MarketQuote[] = [];
    for (const row of rows) {
      const close = cell(row, QUOTE_COLUMNS, "close");
      const change = cell(row, QUOTE_COLUMNS, "change");
      if (close === null || change === null) continue;
      quotes.push({
        symbol: row.s,
        price: close,
        change_percent: round2(change),
        volume: cell(row, QUOTE_COLUMNS, "volume"),
        open: cell(row, QUOTE_COLUMNS, "open"),
      });
    }
    return quotes.slice(0, limit);
  }

  private async fetchRsiScan(
    operation: "less" | "greater",
    threshold: number,
    limit: number,
    signal?: AbortSignal,
  ): Promise<RsiScanRow[]> {
    const oversold = operation === "less";
    const rows = await this.scan(
      {
        columns: SCAN_COLUMNS,
        filter: [{ left: "RSI", operation, right: threshold }],
        sort: { sortBy: "RSI", sortOrder: oversold ? "asc" : "desc" },
        range: [0, limit],
      },
      signal,
    );

    const results: RsiScanRow[] = [];
    for (const row of rows) {
      const close = cell(row, SCAN_COLUMNS, "close");
      const rsi = cell(row, SCAN_COLUMNS, "RSI");
      if (close === null || rsi === null) continue;
      // The scanner filter is authoritative, but rows outside it are dropped anyway
      if (oversold ? rsi >= threshold : rsi <= threshold) continue;
      results.push({
        symbol: row.s,
        price: close,
        change_percent: round2(cell(row, SCAN_COLUMNS, "change") ?? 0),
        rsi: round2(rsi),
        volume: cell(row, SCAN_COLUMNS, "volume"),
        signal: oversold ? "Oversold - Potential Buy" : "Overbought - Potential Sell",
      });
    }
    return results.slice(0, limit);
  }

  private async fetchAnalysis(symbol: string, signal?: AbortSignal): Promise<StockAnalysis> {
    const ticker = toExchangeTicker(symbol);
    const rows = await this.scan(
      {
        columns: ANALYSIS_COLUMNS,
        symbols: { tickers: [ticker] },
      },
      signal,
    );

    const row = rows[0];
    const close = row ? cell(row, ANALYSIS_COLUMNS, "close") : null;
    if (!row || close === null) {
      throw new ProviderError(`No data found for ${ticker}`);
    }

    const open = cell(row, ANALYSIS_COLUMNS, "open");
    const changePercent = round2(open === null ? 0 : (percentChange(open, close) ?? 0));
    const rsi = roundOrNull(cell(row, ANALYSIS_COLUMNS, "RSI"));
    const bbUpper = cell(row, ANALYSIS_COLUMNS, "BB.upper");
    const bbLower = cell(row, ANALYSIS_COLUMNS, "BB.lower");

    return {
      symbol: row.s,
      price_data: {
        current_price: close,
        open,
        high: cell(row, ANALYSIS_COLUMNS, "high"),
        low: cell(row, ANALYSIS_COLUMNS, "low"),
        change: open === null ? null : round2(close - open),
        change_percent: changePercent,
        volume: cell(row, ANALYSIS_COLUMNS, "volume"),
      },
      technical_indicators: {
        rsi,
        rsi_signal: classifyRsi(rsi),
        sma20: cell(row, ANALYSIS_COLUMNS, "SMA20"),
        ema50: cell(row, ANALYSIS_COLUMNS, "EMA50"),
        bb_upper: bbUpper,
        bb_lower: bbLower,
        bb_signal: classifyBands(close, bbUpper, bbLower),
        macd: cell(row, ANALYSIS_COLUMNS, "MACD.macd"),
        macd_signal: cell(row, ANALYSIS_COLUMNS, "MACD.signal"),
      },
      overall_signal: classifyOverall(changePercent, rsi),
    };
  }
}
