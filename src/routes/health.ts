import { Hono } from "hono";
import type { AppContext } from "../context.ts";
import { getSessionInfo } from "../services/market-hours.ts";

/**
 * GET /health - Liveness plus the exchange session the answers are based on
 *
 * Returns:
 * - status: always "healthy" while the process serves requests
 * - uptime: milliseconds since start-up
 * - provider: configured reasoning provider and model
 * - market: PSX session status and local time
 * - timestamp: current ISO timestamp
 */
export function createHealthRoutes(ctx: AppContext) {
  const routes = new Hono();

  routes.get("/", (c) => {
    const session = getSessionInfo(ctx.clock());
    return c.json({
      status: "healthy",
      uptime: Date.now() - ctx.startedAt,
      provider: {
        name: ctx.env.LLM_PROVIDER,
        model: ctx.env.LLM_PROVIDER === "anthropic" ? ctx.env.ANTHROPIC_MODEL : ctx.env.OPENAI_MODEL,
      },
      market: { status: session.status, localTime: session.localTime },
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
