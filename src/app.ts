import { Hono } from "hono";
import { cors } from "hono/cors";
import type { AppContext } from "./context.ts";
import { createApiRateLimiter } from "./middleware/rate-limit.ts";
import { globalErrorHandler, notFoundHandler } from "./middleware/error-handler.ts";
import { createHealthRoutes } from "./routes/health.ts";
import { createQueryRoutes } from "./routes/query.ts";
import { createPortfolioRoutes } from "./routes/portfolio.ts";
import { createEmailRoutes } from "./routes/email.ts";
import { createStockRoutes } from "./routes/stocks.ts";

export interface CreateAppOptions {
  /** Requests per minute per client; defaults to RATE_LIMIT_MAX */
  rateLimit?: number;
}

export function createApp(ctx: AppContext, options: CreateAppOptions = {}) {
  const app = new Hono();

  app.use("*", cors({ origin: ctx.env.CORS_ORIGIN }));

  // Service info (public)
  app.get("/", (c) => {
    return c.json({
      message: "PSX Portfolio API",
      version: "1.0.0",
      health: "/api/v1/health",
    });
  });

  // Health check (public, not rate limited)
  app.route("/api/v1/health", createHealthRoutes(ctx));

  // Everything else under /api/v1 is rate limited per client
  app.use("/api/v1/*", createApiRateLimiter(options.rateLimit));

  app.route("/api/v1/query", createQueryRoutes(ctx));
  app.route("/api/v1/portfolio", createPortfolioRoutes(ctx));
  app.route("/api/v1/email", createEmailRoutes(ctx));
  app.route("/api/v1/stocks", createStockRoutes(ctx));

  app.onError(globalErrorHandler);
  app.notFound(notFoundHandler);

  return app;
}
