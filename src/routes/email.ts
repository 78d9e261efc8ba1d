import { Hono } from "hono";
import type { AppContext } from "../context.ts";
import { validateBody } from "../middleware/validation.ts";
import { emailUpdateRequestSchema } from "../schemas/api.ts";
import { evaluateAlerts, resolveAlertStocks } from "../services/alert-evaluator.ts";
import { apiError } from "../lib/errors.ts";

export function createEmailRoutes(ctx: AppContext) {
  const routes = new Hono();

  // ---------------------------------------------------------------------------
  // POST /send-update -- Analyze the portfolio, check alerts, email the result
  // ---------------------------------------------------------------------------

  routes.post("/send-update", validateBody(emailUpdateRequestSchema), async (c) => {
    const { email, portfolio, alerts, alert_emails: alertEmails } = c.get("validatedBody");

    const analysis = await ctx.agent.analyzePortfolio(portfolio);
    const rules = alerts ?? [];
    const snapshots = await resolveAlertStocks(rules, analysis.snapshots, ctx.gateway);
    const triggeredAlerts = evaluateAlerts(rules, snapshots);

    // Alert emails are best-effort; only the update decides the response
    const alertDeliveries = alertEmails
      ? await Promise.all(triggeredAlerts.map((alert) => ctx.emailService.sendAlert(email, alert)))
      : [];

    const delivery = await ctx.emailService.sendPortfolioUpdate({
      to: email,
      analysis: analysis.analysis,
      valuation: analysis.valuation,
      alerts: triggeredAlerts,
    });

    if (!delivery.sent) {
      return apiError(c, "EMAIL_DELIVERY_FAILED", { reason: delivery.error });
    }

    return c.json({
      message: delivery.mock ? "Email logged (mock mode)" : "Email sent successfully",
      sent: true,
      mock: delivery.mock,
      triggeredAlerts,
      alertEmailsSent: alertDeliveries.filter((d) => d.sent).length,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
