/**
 * Market Data Gateway Tests
 *
 * Runs the TradingView gateway against an in-process fetch stand-in:
 * - Request shape (URL, columns, sort, filter, range, tickers)
 * - Row mapping and rounding
 * - Every failure mode comes back as { ok: false, error }
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import {
  TradingViewGateway,
  classifyOverall,
  classifyRsi,
  toExchangeTicker,
} from "../market-data-gateway.ts";

const BASE_URL = "https://scanner.example.test";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function requestBody(fetchFn: Mock<typeof fetch>, call = 0): unknown {
  const init = fetchFn.mock.calls[call]?.[1];
  return JSON.parse(String(init?.body));
}

describe("TradingViewGateway", () => {
  let fetchFn: Mock<typeof fetch>;
  let gateway: TradingViewGateway;

  function respondWith(body: unknown, status = 200) {
    fetchFn.mockImplementation(async () => jsonResponse(body, status));
  }

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    fetchFn = vi.fn<typeof fetch>();
    gateway = new TradingViewGateway({ baseUrl: `${BASE_URL}/`, timeoutMs: 1000, fetchFn });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("topGainers / topLosers", () => {
    it("should request the day's movers sorted by change and map rows", async () => {
      respondWith({
        totalCount: 2,
        data: [
          { s: "PSX:AAA", d: ["AAA", 10.5, 1000, 7.456, 10] },
          { s: "PSX:BBB", d: ["BBB", null, 5, 3, 1] },
        ],
      });

      const result = await gateway.topGainers(5);

      expect(result).toEqual({
        ok: true,
        data: [{ symbol: "PSX:AAA", price: 10.5, change_percent: 7.46, volume: 1000, open: 10 }],
      });
      expect(fetchFn.mock.calls[0]?.[0]).toBe(`${BASE_URL}/pakistan/scan`);
      expect(requestBody(fetchFn)).toEqual({
        markets: ["pakistan"],
        options: { lang: "en" },
        columns: ["name", "close", "volume", "change", "open"],
        sort: { sortBy: "change", sortOrder: "desc" },
        range: [0, 5],
      });
    });

    it("should sort losers ascending", async () => {
      respondWith({ data: [] });
      await gateway.topLosers(3);
      expect(requestBody(fetchFn)).toMatchObject({
        sort: { sortBy: "change", sortOrder: "asc" },
        range: [0, 3],
      });
    });

    it("should clamp the limit to 1..50 with a default of 10", async () => {
      respondWith({ data: [] });
      await gateway.topGainers(500);
      await gateway.topGainers(0);
      await gateway.topGainers();
      expect(requestBody(fetchFn, 0)).toMatchObject({ range: [0, 50] });
      expect(requestBody(fetchFn, 1)).toMatchObject({ range: [0, 1] });
      expect(requestBody(fetchFn, 2)).toMatchObject({ range: [0, 10] });
    });

    it("should keep null volume and open as null", async () => {
      respondWith({ data: [{ s: "PSX:AAA", d: ["AAA", 10, null, 1, null] }] });
      const result = await gateway.topGainers(1);
      expect(result).toEqual({
        ok: true,
        data: [{ symbol: "PSX:AAA", price: 10, change_percent: 1, volume: null, open: null }],
      });
    });
  });

  describe("failures", () => {
    it("should convert an HTTP error status", async () => {
      respondWith({ message: "nope" }, 500);
      expect(await gateway.topGainers()).toEqual({
        ok: false,
        error: "scanner responded with HTTP 500",
      });
    });

    it("should convert a network failure", async () => {
      fetchFn.mockRejectedValue(new Error("boom"));
      expect(await gateway.topLosers()).toEqual({
        ok: false,
        error: "scanner request failed: boom",
      });
    });

    it("should convert an unexpected payload", async () => {
      respondWith({ rows: [] });
      expect(await gateway.scanOversold(30)).toEqual({
        ok: false,
        error: "scanner returned an unexpected payload",
      });
    });

    it("should convert a non-JSON body", async () => {
      fetchFn.mockImplementation(async () => new Response("<html>", { status: 200 }));
      expect(await gateway.topGainers()).toEqual({
        ok: false,
        error: "scanner returned invalid JSON",
      });
    });

    it("should log the failed operation", async () => {
      respondWith({}, 503);
      await gateway.topGainers();
      expect(console.warn).toHaveBeenCalledWith(
        "[MarketData] topGainers failed: scanner responded with HTTP 503",
      );
    });
  });

  describe("cancellation", () => {
    it("should abort the request when the caller's signal fires", async () => {
      respondWith({ data: [] });
      const controller = new AbortController();

      const pending = gateway.stockAnalysis("OGDC", controller.signal);
      controller.abort();
      await pending;

      const signal = fetchFn.mock.calls[0]?.[1]?.signal;
      expect(signal).toBeInstanceOf(AbortSignal);
      expect(signal?.aborted).toBe(true);
    });

    it("should keep its own timeout without a caller signal", async () => {
      respondWith({ data: [] });

      await gateway.topGainers(5);

      expect(fetchFn.mock.calls[0]?.[1]?.signal?.aborted).toBe(false);
    });
  });

  describe("RSI scans", () => {
    it("should filter below the threshold, lowest RSI first", async () => {
      respondWith({
        data: [
          { s: "PSX:AAA", d: ["AAA", 50, 2000, -1.234, 25.123] },
          { s: "PSX:BBB", d: ["BBB", 60, 100, 0.5, 35] },
          { s: "PSX:CCC", d: ["CCC", 70, 100, 0.5, null] },
        ],
      });

      const result = await gateway.scanOversold(30, 5);

      expect(requestBody(fetchFn)).toEqual({
        markets: ["pakistan"],
        options: { lang: "en" },
        columns: ["name", "close", "volume", "change", "RSI"],
        filter: [{ left: "RSI", operation: "less", right: 30 }],
        sort: { sortBy: "RSI", sortOrder: "asc" },
        range: [0, 5],
      });
      expect(result).toEqual({
        ok: true,
        data: [
          {
            symbol: "PSX:AAA",
            price: 50,
            change_percent: -1.23,
            rsi: 25.12,
            volume: 2000,
            signal: "Oversold - Potential Buy",
          },
        ],
      });
    });

    it("should filter above the threshold, highest RSI first", async () => {
      respondWith({ data: [{ s: "PSX:AAA", d: ["AAA", 50, 10, 4, 81] }] });

      const result = await gateway.scanOverbought(70);

      expect(requestBody(fetchFn)).toMatchObject({
        filter: [{ left: "RSI", operation: "greater", right: 70 }],
        sort: { sortBy: "RSI", sortOrder: "desc" },
      });
      expect(result.ok && result.data[0]?.signal).toBe("Overbought - Potential Sell");
    });
  });

  describe("stockAnalysis", () => {
    it("should request one ticker and build the nested analysis", async () => {
      respondWith({
        data: [
          {
            s: "PSX:OGDC",
            d: ["OGDC", 110, 100, 112, 99, 5000, 25.456, 105, 100, 115, 95, 1.2, 0.8],
          },
        ],
      });

      const result = await gateway.stockAnalysis("ogdc");

      expect(requestBody(fetchFn)).toMatchObject({ symbols: { tickers: ["PSX:OGDC"] } });
      expect(result).toEqual({
        ok: true,
        data: {
          symbol: "PSX:OGDC",
          price_data: {
            current_price: 110,
            open: 100,
            high: 112,
            low: 99,
            change: 10,
            change_percent: 10,
            volume: 5000,
          },
          technical_indicators: {
            rsi: 25.46,
            rsi_signal: "Oversold",
            sma20: 105,
            ema50: 100,
            bb_upper: 115,
            bb_lower: 95,
            bb_signal: "Within Bands",
            macd: 1.2,
            macd_signal: 0.8,
          },
          overall_signal: "Bullish",
        },
      });
    });

    it("should report an unknown symbol", async () => {
      respondWith({ totalCount: 0, data: [] });
      expect(await gateway.stockAnalysis("PSX:ZZZ")).toEqual({
        ok: false,
        error: "No data found for PSX:ZZZ",
      });
    });

    it("should report zero change when the open is missing", async () => {
      respondWith({
        data: [{ s: "PSX:OGDC", d: ["OGDC", 110, null, null, null, null, null, null, null, null, null, null, null] }],
      });
      const result = await gateway.stockAnalysis("OGDC");
      expect(result.ok && result.data.price_data).toEqual({
        current_price: 110,
        open: null,
        high: null,
        low: null,
        change: null,
        change_percent: 0,
        volume: null,
      });
      expect(result.ok && result.data.technical_indicators.rsi_signal).toBeNull();
    });
  });
});

describe("gateway helpers", () => {
  it("should build exchange tickers", () => {
    expect(toExchangeTicker("ogdc")).toBe("PSX:OGDC");
    expect(toExchangeTicker("PSX:HBL")).toBe("PSX:HBL");
  });

  it("should classify RSI", () => {
    expect(classifyRsi(71)).toBe("Overbought");
    expect(classifyRsi(29)).toBe("Oversold");
    expect(classifyRsi(50)).toBe("Neutral");
    expect(classifyRsi(null)).toBeNull();
  });

  it("should classify the overall signal", () => {
    expect(classifyOverall(3, 50)).toBe("Bullish");
    expect(classifyOverall(3, 75)).toBe("Neutral");
    expect(classifyOverall(-3, 20)).toBe("Bearish");
    expect(classifyOverall(1, null)).toBe("Neutral");
  });
});
