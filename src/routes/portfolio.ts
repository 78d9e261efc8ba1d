import { Hono } from "hono";
import type { AppContext } from "../context.ts";
import { validateBody } from "../middleware/validation.ts";
import { portfolioAnalysisRequestSchema, toWirePosition } from "../schemas/api.ts";

export function createPortfolioRoutes(ctx: AppContext) {
  const routes = new Hono();

  // ---------------------------------------------------------------------------
  // POST /analyze -- Narrative review plus a valuation of every holding
  // ---------------------------------------------------------------------------

  routes.post("/analyze", validateBody(portfolioAnalysisRequestSchema), async (c) => {
    const { portfolio } = c.get("validatedBody");
    const result = await ctx.agent.analyzePortfolio(portfolio);

    return c.json({
      analysis: result.analysis,
      portfolio: result.portfolio.map(toWirePosition),
      valuation: result.valuation,
      stocks: result.stocks,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
