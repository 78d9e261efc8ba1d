import { Hono } from "hono";
import type { AppContext } from "../context.ts";
import { validateBody } from "../middleware/validation.ts";
import { queryRequestSchema } from "../schemas/api.ts";

/**
 * POST /query: natural-language question with an optional portfolio.
 *
 * Returns the assistant's answer plus the stock records its tools produced.
 */
export function createQueryRoutes(ctx: AppContext) {
  const routes = new Hono();

  routes.post("/", validateBody(queryRequestSchema), async (c) => {
    const { query, portfolio } = c.get("validatedBody");
    const result = await ctx.agent.run(query, portfolio ?? []);

    return c.json({
      response: result.response,
      stocks: result.stocks,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
