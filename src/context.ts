/**
 * Application context: the long-lived collaborators built once at start-up
 * and handed to the route factories.
 */

import type { Env } from "./config/env.ts";
import type { ReasoningClient } from "./agents/agent-types.ts";
import { createReasoningClient } from "./agents/client-factory.ts";
import { PortfolioAgent } from "./agents/portfolio-agent.ts";
import { TradingViewGateway, type MarketDataGateway } from "./services/market-data-gateway.ts";
import { EmailService } from "./services/email-service.ts";

export interface AppContext {
  env: Env;
  gateway: MarketDataGateway;
  agent: PortfolioAgent;
  emailService: EmailService;
  /** Epoch ms the context was created, for uptime */
  startedAt: number;
  /** Wall clock for session status */
  clock: () => Date;
}

/** Collaborators to use instead of the real ones (tests) */
export interface AppContextOverrides {
  reasoningClient?: ReasoningClient;
  gateway?: MarketDataGateway;
  emailService?: EmailService;
  clock?: () => Date;
}

export function createAppContext(env: Env, overrides: AppContextOverrides = {}): AppContext {
  const gateway =
    overrides.gateway ??
    new TradingViewGateway({
      baseUrl: env.TRADINGVIEW_SCANNER_URL,
      timeoutMs: env.MARKET_DATA_TIMEOUT_MS,
    });

  const agent = new PortfolioAgent({
    client: overrides.reasoningClient ?? createReasoningClient(env),
    gateway,
    maxRoundTrips: env.AGENT_MAX_ROUND_TRIPS,
    reasoningTimeoutMs: env.REASONING_TIMEOUT_MS,
    toolTimeoutMs: env.TOOL_TIMEOUT_MS,
    ...(overrides.clock && { clock: overrides.clock }),
  });

  const emailService =
    overrides.emailService ??
    new EmailService({
      apiKey: env.RESEND_API_KEY,
      from: env.EMAIL_FROM,
      ...(overrides.clock && { clock: overrides.clock }),
    });

  const clock = overrides.clock ?? (() => new Date());

  return { env, gateway, agent, emailService, startedAt: Date.now(), clock };
}
