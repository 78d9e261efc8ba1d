/**
 * Builds the configured reasoning client. The SDK client inside it is
 * initialized lazily, so a missing API key only fails the first reasoning
 * call (FatalConfigurationError -> 503), not server start-up.
 */

import type { Env } from "../config/env.ts";
import type { ReasoningClient } from "./agent-types.ts";
import { OpenAIReasoningClient } from "./openai-reasoning-client.ts";
import { AnthropicReasoningClient } from "./anthropic-reasoning-client.ts";

export function createReasoningClient(env: Env): ReasoningClient {
  switch (env.LLM_PROVIDER) {
    case "anthropic":
      return new AnthropicReasoningClient({
        apiKey: env.ANTHROPIC_API_KEY,
        model: env.ANTHROPIC_MODEL,
        temperature: env.LLM_TEMPERATURE,
      });
    case "openai":
      return new OpenAIReasoningClient({
        apiKey: env.OPENAI_API_KEY,
        model: env.OPENAI_MODEL,
        temperature: env.LLM_TEMPERATURE,
      });
  }
}
