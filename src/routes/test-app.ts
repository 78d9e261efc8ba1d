/**
 * Builds the full HTTP app over in-process fakes: a scripted reasoning
 * client, a fake market data gateway and a fixed clock.
 */

import { loadEnv } from "../config/env.ts";
import { createAppContext } from "../context.ts";
import { createApp } from "../app.ts";
import type { EmailService } from "../services/email-service.ts";
import { createFakeGateway, type FakeGateway } from "../services/__tests__/fake-gateway.ts";
import { createScriptedClient, type ScriptedClient } from "../agents/__tests__/scripted-client.ts";

// 11:00 PKT on Monday 19 October 2026
export const NOW = new Date("2026-10-19T06:00:00Z");

export interface TestAppOptions {
  env?: Record<string, string>;
  emailService?: EmailService;
  rateLimit?: number;
  /** Use the configured provider instead of the scripted client */
  realReasoningClient?: boolean;
}

export function createTestApp(options: TestAppOptions = {}) {
  const client = createScriptedClient();
  const gateway: FakeGateway = createFakeGateway();
  const env = loadEnv({ NODE_ENV: "test", ...options.env });

  const ctx = createAppContext(env, {
    gateway,
    clock: () => NOW,
    ...(!options.realReasoningClient && { reasoningClient: client }),
    ...(options.emailService && { emailService: options.emailService }),
  });

  const app = createApp(ctx, options.rateLimit === undefined ? {} : { rateLimit: options.rateLimit });

  return { app, client, gateway, ctx };
}

export function postJson(path: string, body: unknown, headers: Record<string, string> = {}): Request {
  return new Request(`http://localhost${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
  });
}
