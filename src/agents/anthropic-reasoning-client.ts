/**
 * Anthropic reasoning client (messages API with tool use).
 *
 * Anthropic format differs from OpenAI's:
 * - System text is a request parameter, not a message
 * - Assistant tool calls are `tool_use` content blocks
 * - Tool results go back as `tool_result` blocks inside a single user message
 */

import Anthropic from "@anthropic-ai/sdk";
import type {
  AgentTurn,
  ConversationMessage,
  ReasoningClient,
  ToolCall,
  ToolDefinition,
} from "./agent-types.ts";
import { toToolArguments } from "./portfolio-tools.ts";
import { FatalConfigurationError } from "../lib/errors.ts";

const MAX_COMPLETION_TOKENS = 2048;

export interface AnthropicReasoningClientOptions {
  apiKey: string | undefined;
  model: string;
  temperature: number;
  client?: Anthropic;
}

// ---------------------------------------------------------------------------
// Format conversion
// ---------------------------------------------------------------------------

export interface AnthropicRequestMessages {
  system: string;
  messages: Anthropic.MessageParam[];
}

export function toAnthropicMessages(messages: readonly ConversationMessage[]): AnthropicRequestMessages {
  const systemParts: string[] = [];
  const out: Anthropic.MessageParam[] = [];
  let pendingResults: Anthropic.ToolResultBlockParam[] = [];

  const flushResults = () => {
    if (pendingResults.length === 0) return;
    out.push({ role: "user", content: pendingResults });
    pendingResults = [];
  };

  for (const msg of messages) {
    if (msg.role === "tool") {
      pendingResults.push({ type: "tool_result", tool_use_id: msg.toolCallId, content: msg.content });
      continue;
    }
    flushResults();

    switch (msg.role) {
      case "system":
        systemParts.push(msg.content);
        break;
      case "user":
        out.push({ role: "user", content: msg.content });
        break;
      case "assistant": {
        const blocks: Anthropic.ContentBlockParam[] = [];
        if (msg.content !== null && msg.content.trim().length > 0) {
          blocks.push({ type: "text", text: msg.content });
        }
        for (const tc of msg.toolCalls) {
          blocks.push({ type: "tool_use", id: tc.id, name: tc.name, input: tc.arguments });
        }
        // The API rejects empty assistant turns
        if (blocks.length > 0) out.push({ role: "assistant", content: blocks });
        break;
      }
    }
  }
  flushResults();

  return { system: systemParts.join("\n\n"), messages: out };
}

export function toAnthropicTools(tools: readonly ToolDefinition[]): Anthropic.Tool[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: {
      type: tool.parameters.type,
      properties: tool.parameters.properties,
      required: tool.parameters.required,
    },
  }));
}

/**
 * Parse an Anthropic message into an AgentTurn.
 */
export function parseAnthropicResponse(response: Anthropic.Message): AgentTurn {
  const toolCalls: ToolCall[] = [];
  const texts: string[] = [];

  for (const block of response.content) {
    if (block.type === "text") {
      texts.push(block.text);
    } else if (block.type === "tool_use") {
      toolCalls.push({ id: block.id, name: block.name, arguments: toToolArguments(block.input) });
    }
  }

  let stopReason: AgentTurn["stopReason"] = "end_turn";
  if (response.stop_reason === "tool_use" || toolCalls.length > 0) stopReason = "tool_use";
  else if (response.stop_reason === "max_tokens") stopReason = "max_tokens";

  return {
    toolCalls,
    textResponse: texts.length > 0 ? texts.join("\n") : null,
    stopReason,
    usage: {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    },
  };
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class AnthropicReasoningClient implements ReasoningClient {
  readonly provider = "anthropic" as const;
  readonly model: string;
  private readonly apiKey: string | undefined;
  private readonly temperature: number;
  private client: Anthropic | null;

  constructor(options: AnthropicReasoningClientOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.temperature = options.temperature;
    this.client = options.client ?? null;
  }

  private getClient(): Anthropic {
    if (!this.client) {
      if (!this.apiKey) {
        throw new FatalConfigurationError(
          "ANTHROPIC_API_KEY environment variable is not set. The assistant cannot reason without it.",
        );
      }
      this.client = new Anthropic({ apiKey: this.apiKey });
    }
    return this.client;
  }

  async complete(
    messages: ConversationMessage[],
    tools: ToolDefinition[],
    signal?: AbortSignal,
  ): Promise<AgentTurn> {
    const client = this.getClient();
    const request = toAnthropicMessages(messages);

    const response = await client.messages.create(
      {
        model: this.model,
        max_tokens: MAX_COMPLETION_TOKENS,
        // Anthropic caps temperature at 1
        temperature: Math.min(this.temperature, 1),
        messages: request.messages,
        ...(request.system.length > 0 && { system: request.system }),
        ...(tools.length > 0 && { tools: toAnthropicTools(tools) }),
      },
      { signal },
    );

    return parseAnthropicResponse(response);
  }
}
