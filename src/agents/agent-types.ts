/**
 * Agent Types
 *
 * Provider-neutral conversation, tool-call and portfolio types shared by the
 * orchestrator, the reasoning clients and the response assembler. Each
 * reasoning client converts these to and from its SDK's native format.
 */

import type { StockRecord } from "../services/stock-normalizer.ts";

// ---------------------------------------------------------------------------
// Portfolio
// ---------------------------------------------------------------------------

/** One holding supplied by the caller */
export interface PortfolioPosition {
  readonly symbol: string;
  readonly quantity: number;
  readonly buyPrice: number;
}

// ---------------------------------------------------------------------------
// Tool-Calling Types
// ---------------------------------------------------------------------------

/** A tool call requested by the reasoning step */
export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/** JSON-schema description of one tool's parameters */
export interface ToolParam {
  type: "string" | "number" | "integer";
  description: string;
  enum?: string[];
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: {
    type: "object";
    properties: Record<string, ToolParam>;
    required: string[];
  };
}

/** Output of one reasoning step */
export interface AgentTurn {
  toolCalls: ToolCall[];
  textResponse: string | null;
  stopReason: "tool_use" | "end_turn" | "max_tokens";
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

// ---------------------------------------------------------------------------
// Conversation
// ---------------------------------------------------------------------------

export interface SystemMessage {
  role: "system";
  content: string;
}

export interface UserMessage {
  role: "user";
  content: string;
}

export interface AssistantMessage {
  role: "assistant";
  content: string | null;
  toolCalls: ToolCall[];
}

export interface ToolResultMessage {
  role: "tool";
  toolCallId: string;
  name: string;
  /** JSON text returned by the tool */
  content: string;
}

export type ConversationMessage =
  | SystemMessage
  | UserMessage
  | AssistantMessage
  | ToolResultMessage;

/**
 * A single LLM-reasoning backend. Implementations must be safe to share
 * across concurrent runs: all per-run state lives in the message list.
 */
export interface ReasoningClient {
  readonly provider: "openai" | "anthropic";
  readonly model: string;
  complete(
    messages: ConversationMessage[],
    tools: ToolDefinition[],
    signal?: AbortSignal,
  ): Promise<AgentTurn>;
}

// ---------------------------------------------------------------------------
// Run results
// ---------------------------------------------------------------------------

export type RunOutcome =
  | "completed"
  | "loop_budget_exceeded"
  | "reasoning_timeout"
  | "reasoning_failed";

export interface AgentRunResult {
  response: string;
  stocks: StockRecord[];
  outcome: RunOutcome;
  /** Reasoning steps that returned a turn */
  reasoningSteps: number;
  toolCallCount: number;
  /** Full trace without the system instruction */
  messages: ConversationMessage[];
}
