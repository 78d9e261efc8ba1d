import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createTestApp, postJson } from "./test-app.ts";
import { call, sentMessages, textTurn, toolTurn } from "../agents/__tests__/scripted-client.ts";
import { quote } from "../services/__tests__/fake-gateway.ts";

describe("POST /api/v1/query", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should return the answer and the stocks the tools produced", async () => {
    const { app, client, gateway } = createTestApp();
    gateway.topGainers.mockResolvedValue({ ok: true, data: [quote("OGDC", 120, 3)] });
    client.complete
      .mockResolvedValueOnce(toolTurn([call("c1", "get_psx_top_gainers")]))
      .mockResolvedValueOnce(textTurn("OGDC topped the board."));

    const res = await app.request(postJson("/api/v1/query", { query: "Top gainers today?" }));

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      response: "OGDC topped the board.",
      stocks: [{ symbol: "OGDC", price: 120, changePercent: 3, recommendation: "HOLD" }],
      timestamp: expect.any(String),
    });
  });

  it("should put the supplied portfolio into the system instruction", async () => {
    const { app, client } = createTestApp();
    client.complete.mockResolvedValueOnce(textTurn("Hold."));

    const res = await app.request(
      postJson("/api/v1/query", {
        query: "Should I sell?",
        portfolio: [{ symbol: "OGDC", quantity: 10, buy_price: 100 }],
      }),
    );

    expect(res.status).toBe(200);
    expect(sentMessages(client, 0)[0]?.content).toContain("- OGDC: 10 shares @ 100 PKR");
  });

  it("should reject a blank query", async () => {
    const { app, client } = createTestApp();

    const res = await app.request(postJson("/api/v1/query", { query: "   " }));

    expect(res.status).toBe(400);
    const body: unknown = await res.json();
    expect(body).toEqual({
      error: "Validation failed",
      code: "VALIDATION_FAILED",
      status: 400,
      details: { issues: [{ path: "query", message: "query is required" }] },
    });
    expect(client.complete).not.toHaveBeenCalled();
  });

  it("should reject a portfolio position with a negative buy price", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      postJson("/api/v1/query", {
        query: "Review",
        portfolio: [{ symbol: "OGDC", quantity: 10, buy_price: -1 }],
      }),
    );

    expect(res.status).toBe(400);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      details: { issues: [{ path: "portfolio.0.buy_price", message: "buy_price must be positive" }] },
    });
  });

  it("should reject a body that is not JSON", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/query", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });

    expect(res.status).toBe(400);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ code: "INVALID_JSON" });
  });

  it("should answer 503 when the reasoning provider has no API key", async () => {
    const { app } = createTestApp({ realReasoningClient: true });

    const res = await app.request(postJson("/api/v1/query", { query: "Top gainers?" }));

    expect(res.status).toBe(503);
    const body: unknown = await res.json();
    expect(body).toEqual({
      error: "The analysis service is temporarily unavailable",
      code: "SERVICE_UNAVAILABLE",
      status: 503,
    });
  });

  it("should answer 503 when the first reasoning step fails", async () => {
    const { app, client } = createTestApp();
    client.complete.mockRejectedValueOnce(new Error("connection refused"));

    const res = await app.request(postJson("/api/v1/query", { query: "Top gainers?" }));

    expect(res.status).toBe(503);
  });

  it("should rate limit each client", async () => {
    const { app, client } = createTestApp({ rateLimit: 1 });
    client.complete.mockResolvedValue(textTurn("ok"));
    const headers = { "x-forwarded-for": "203.0.113.7" };

    const first = await app.request(postJson("/api/v1/query", { query: "one" }, headers));
    const second = await app.request(postJson("/api/v1/query", { query: "two" }, headers));
    const other = await app.request(postJson("/api/v1/query", { query: "three" }, { "x-forwarded-for": "203.0.113.8" }));

    expect(first.status).toBe(200);
    expect(second.status).toBe(429);
    const body: unknown = await second.json();
    expect(body).toMatchObject({ code: "RATE_LIMITED", status: 429 });
    expect(other.status).toBe(200);
  });
});
