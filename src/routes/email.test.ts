import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createTestApp, postJson, NOW } from "./test-app.ts";
import { call, textTurn, toolTurn } from "../agents/__tests__/scripted-client.ts";
import { analysis, quote } from "../services/__tests__/fake-gateway.ts";
import { EmailService } from "../services/email-service.ts";

const REQUEST = {
  email: "investor@example.com",
  portfolio: [{ symbol: "OGDC", quantity: 100, buy_price: 100 }],
  alerts: [
    { symbol: "OGDC", alert_type: "price_target", condition: { target_price: 110 } },
    { symbol: "LUCK", alert_type: "rsi_oversold" },
    { symbol: "HBL", alert_type: "volume_spike", condition: { min_volume: 1 }, is_active: false },
  ],
};

describe("POST /api/v1/email/send-update", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function scriptRun(ctx: ReturnType<typeof createTestApp>) {
    ctx.gateway.topGainers.mockResolvedValue({ ok: true, data: [quote("OGDC", 120, 3)] });
    ctx.gateway.stockAnalysis.mockImplementation(async (symbol) =>
      symbol === "LUCK"
        ? { ok: true, data: analysis("LUCK", 500, { rsi: 20 }) }
        : { ok: false, error: `No data found for PSX:${symbol}` },
    );
    ctx.client.complete
      .mockResolvedValueOnce(toolTurn([call("c1", "get_psx_top_gainers")]))
      .mockResolvedValueOnce(textTurn("Your portfolio is up 20%."));
  }

  it("should log the email in mock mode and report triggered alerts", async () => {
    const test = createTestApp();
    scriptRun(test);

    const res = await test.app.request(postJson("/api/v1/email/send-update", REQUEST));

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      message: "Email logged (mock mode)",
      sent: true,
      mock: true,
      triggeredAlerts: [
        {
          symbol: "OGDC",
          type: "price_target",
          message: "OGDC is at 120 PKR, above the 110 PKR target",
          price: 120,
          changePercent: 3,
        },
        {
          symbol: "LUCK",
          type: "rsi_oversold",
          message: "LUCK RSI 20 is below 30 (oversold)",
          price: 500,
          changePercent: 0,
        },
      ],
    });
    expect(test.gateway.stockAnalysis).not.toHaveBeenCalledWith("HBL");
    expect(body).toMatchObject({ alertEmailsSent: 0 });
    expect(console.log).not.toHaveBeenCalledWith(expect.stringContaining("MOCK ALERT"));
  });

  it("should email each triggered alert when asked to", async () => {
    const test = createTestApp();
    scriptRun(test);

    const res = await test.app.request(
      postJson("/api/v1/email/send-update", { ...REQUEST, alert_emails: true }),
    );

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ sent: true, alertEmailsSent: 2 });
    expect(console.log).toHaveBeenCalledWith(
      '[EmailService] MOCK ALERT to investor@example.com: "Alert: OGDC - price_target"',
    );
    expect(console.log).toHaveBeenCalledWith(
      '[EmailService] MOCK ALERT to investor@example.com: "Alert: LUCK - rsi_oversold"',
    );
  });

  it("should reuse the holdings priced for the valuation when checking alerts", async () => {
    const test = createTestApp();
    test.gateway.stockAnalysis.mockResolvedValue({ ok: true, data: analysis("HBL", 180) });
    test.client.complete.mockResolvedValueOnce(textTurn("Hold HBL."));

    const res = await test.app.request(
      postJson("/api/v1/email/send-update", {
        email: "investor@example.com",
        portfolio: [{ symbol: "HBL", quantity: 10, buy_price: 150 }],
        alerts: [{ symbol: "HBL", alert_type: "price_target", condition: { target_price: 170 } }],
      }),
    );

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      triggeredAlerts: [{ symbol: "HBL", type: "price_target", price: 180 }],
    });
    expect(test.gateway.stockAnalysis).toHaveBeenCalledTimes(1);
    expect(test.gateway.stockAnalysis).toHaveBeenCalledWith("HBL");
  });

  it("should send through Resend when a key is configured", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => new Response("{}", { status: 200 }));
    const emailService = new EmailService({
      apiKey: "test-secret",
      from: "alerts@example.com",
      fetchFn,
      clock: () => NOW,
    });
    const test = createTestApp({ emailService });
    scriptRun(test);

    const res = await test.app.request(postJson("/api/v1/email/send-update", REQUEST));

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ message: "Email sent successfully", sent: true, mock: false });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("should answer 502 when delivery fails", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => new Response("{}", { status: 500 }));
    const emailService = new EmailService({ apiKey: "test-secret", from: "alerts@example.com", fetchFn });
    const test = createTestApp({ emailService });
    scriptRun(test);

    const res = await test.app.request(postJson("/api/v1/email/send-update", REQUEST));

    expect(res.status).toBe(502);
    const body: unknown = await res.json();
    expect(body).toEqual({
      error: "Failed to send email",
      code: "EMAIL_DELIVERY_FAILED",
      status: 502,
      details: { reason: "Resend responded with HTTP 500" },
    });
  });

  it("should reject an invalid email address", async () => {
    const { app, client } = createTestApp();

    const res = await app.request(postJson("/api/v1/email/send-update", { ...REQUEST, email: "not-an-email" }));

    expect(res.status).toBe(400);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      details: { issues: [{ path: "email", message: "email must be a valid address" }] },
    });
    expect(client.complete).not.toHaveBeenCalled();
  });

  it("should reject an unknown alert type", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      postJson("/api/v1/email/send-update", {
        ...REQUEST,
        alerts: [{ symbol: "OGDC", alert_type: "moon_shot" }],
      }),
    );

    expect(res.status).toBe(400);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ code: "VALIDATION_FAILED" });
  });
});
