/**
 * OpenAI reasoning client (chat completions with tool calling).
 *
 * Converts the provider-neutral conversation to OpenAI's message format:
 * - Assistant message with a tool_calls array
 * - Separate "tool" role messages for each result
 */

import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import type {
  AgentTurn,
  ConversationMessage,
  ReasoningClient,
  ToolCall,
  ToolDefinition,
} from "./agent-types.ts";
import { toToolArguments } from "./portfolio-tools.ts";
import { FatalConfigurationError } from "../lib/errors.ts";

/** Completion budget for one reasoning step */
const MAX_COMPLETION_TOKENS = 2048;

export interface OpenAIReasoningClientOptions {
  apiKey: string | undefined;
  model: string;
  temperature: number;
  /** Pre-built SDK client (tests) */
  client?: OpenAI;
}

// ---------------------------------------------------------------------------
// Format conversion
// ---------------------------------------------------------------------------

export function toOpenAIMessages(messages: readonly ConversationMessage[]): ChatCompletionMessageParam[] {
  return messages.map((msg): ChatCompletionMessageParam => {
    switch (msg.role) {
      case "system":
        return { role: "system", content: msg.content };
      case "user":
        return { role: "user", content: msg.content };
      case "assistant":
        return {
          role: "assistant",
          content: msg.content,
          ...(msg.toolCalls.length > 0 && {
            tool_calls: msg.toolCalls.map((tc) => ({
              id: tc.id,
              type: "function" as const,
              function: { name: tc.name, arguments: JSON.stringify(tc.arguments) },
            })),
          }),
        };
      case "tool":
        return { role: "tool", tool_call_id: msg.toolCallId, content: msg.content };
    }
  });
}

export function toOpenAITools(tools: readonly ToolDefinition[]): ChatCompletionTool[] {
  return tools.map((tool) => ({
    type: "function" as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: {
        type: tool.parameters.type,
        properties: tool.parameters.properties,
        required: tool.parameters.required,
      },
    },
  }));
}

function parseArguments(raw: string): Record<string, unknown> {
  if (raw.trim().length === 0) return {};
  try {
    return toToolArguments(JSON.parse(raw));
  } catch {
    console.warn(`[OpenAIReasoning] Unparseable tool arguments: ${raw.slice(0, 120)}`);
    return {};
  }
}

/**
 * Parse an OpenAI chat completion into an AgentTurn.
 */
export function parseOpenAIResponse(response: ChatCompletion): AgentTurn {
  const choice = response.choices[0];
  if (!choice) {
    return { toolCalls: [], textResponse: null, stopReason: "end_turn" };
  }

  const toolCalls: ToolCall[] = [];
  for (const tc of choice.message.tool_calls ?? []) {
    if (tc.type !== "function") continue;
    toolCalls.push({
      id: tc.id,
      name: tc.function.name,
      arguments: parseArguments(tc.function.arguments),
    });
  }

  let stopReason: AgentTurn["stopReason"] = "end_turn";
  if (choice.finish_reason === "tool_calls" || toolCalls.length > 0) stopReason = "tool_use";
  else if (choice.finish_reason === "length") stopReason = "max_tokens";

  return {
    toolCalls,
    textResponse: choice.message.content ?? null,
    stopReason,
    ...(response.usage && {
      usage: {
        inputTokens: response.usage.prompt_tokens,
        outputTokens: response.usage.completion_tokens,
      },
    }),
  };
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class OpenAIReasoningClient implements ReasoningClient {
  readonly provider = "openai" as const;
  readonly model: string;
  private readonly apiKey: string | undefined;
  private readonly temperature: number;
  private client: OpenAI | null;

  constructor(options: OpenAIReasoningClientOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.temperature = options.temperature;
    this.client = options.client ?? null;
  }

  /**
   * Lazily initialize the OpenAI client.
   * Throws FatalConfigurationError if the API key is not configured.
   */
  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.apiKey) {
        throw new FatalConfigurationError(
          "OPENAI_API_KEY environment variable is not set. The assistant cannot reason without it.",
        );
      }
      this.client = new OpenAI({ apiKey: this.apiKey });
    }
    return this.client;
  }

  async complete(
    messages: ConversationMessage[],
    tools: ToolDefinition[],
    signal?: AbortSignal,
  ): Promise<AgentTurn> {
    const client = this.getClient();

    const response = await client.chat.completions.create(
      {
        model: this.model,
        temperature: this.temperature,
        max_tokens: MAX_COMPLETION_TOKENS,
        messages: toOpenAIMessages(messages),
        ...(tools.length > 0 && { tools: toOpenAITools(tools) }),
      },
      { signal },
    );

    return parseOpenAIResponse(response);
  }
}
