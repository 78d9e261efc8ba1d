import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createTestApp, postJson } from "./test-app.ts";
import { call, textTurn, toolTurn } from "../agents/__tests__/scripted-client.ts";
import { analysis } from "../services/__tests__/fake-gateway.ts";

describe("POST /api/v1/portfolio/analyze", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should return the analysis with a valuation of every holding", async () => {
    const { app, client, gateway } = createTestApp();
    gateway.stockAnalysis.mockImplementation(async (symbol) => {
      if (symbol === "OGDC") return { ok: true, data: analysis("OGDC", 120) };
      if (symbol === "HBL") return { ok: true, data: analysis("HBL", 180) };
      return { ok: false, error: `No data found for PSX:${symbol}` };
    });
    client.complete
      .mockResolvedValueOnce(toolTurn([call("c1", "get_stock_analysis", { symbol: "OGDC" })]))
      .mockResolvedValueOnce(textTurn("OGDC is up 20%; HBL is down 10%."));

    const res = await app.request(
      postJson("/api/v1/portfolio/analyze", {
        portfolio: [
          { symbol: "OGDC", quantity: 100, buy_price: 100 },
          { symbol: "HBL", quantity: 50, buy_price: 200 },
        ],
      }),
    );

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      analysis: "OGDC is up 20%; HBL is down 10%.",
      portfolio: [
        { symbol: "OGDC", quantity: 100, buy_price: 100 },
        { symbol: "HBL", quantity: 50, buy_price: 200 },
      ],
      valuation: {
        totalCost: 20000,
        totalValue: 21000,
        totalPnl: 1000,
        totalPnlPercent: 5,
        pricedPositions: 2,
        unpricedSymbols: [],
      },
      stocks: [{ symbol: "OGDC", price: 120 }],
    });
  });

  it("should reject an empty portfolio", async () => {
    const { app } = createTestApp();

    const res = await app.request(postJson("/api/v1/portfolio/analyze", { portfolio: [] }));

    expect(res.status).toBe(400);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      details: { issues: [{ path: "portfolio", message: "portfolio must contain at least one position" }] },
    });
  });

  it("should reject a fractional share quantity", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      postJson("/api/v1/portfolio/analyze", { portfolio: [{ symbol: "OGDC", quantity: 1.5, buy_price: 100 }] }),
    );

    expect(res.status).toBe(400);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      details: { issues: [{ path: "portfolio.0.quantity", message: "quantity must be a whole number of shares" }] },
    });
  });
});
