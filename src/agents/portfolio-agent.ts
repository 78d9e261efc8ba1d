/**
 * Portfolio Agent: tool-calling loop for PSX questions
 *
 * Runs an explicit state machine over one conversation:
 *
 *   reasoning ──(tool calls)──> tool-execution ──> reasoning
 *   reasoning ──(no tool calls)──> terminal
 *
 * Each reasoning step gets a freshly built system instruction (exchange
 * clock + session status + portfolio). Tool calls from one step run
 * concurrently and their results are appended in request order. The loop
 * stops after `maxRoundTrips` reasoning steps; timeouts and late failures
 * end the run with the best partial answer instead of an exception.
 */

import type {
  AgentRunResult,
  AgentTurn,
  ConversationMessage,
  PortfolioPosition,
  ReasoningClient,
  RunOutcome,
  ToolCall,
  ToolResultMessage,
} from "./agent-types.ts";
import { executeTool, getToolDefinitions } from "./portfolio-tools.ts";
import { buildSystemInstruction } from "./system-prompt.ts";
import { assembleResponse } from "./response-assembler.ts";
import type { MarketDataGateway } from "../services/market-data-gateway.ts";
import {
  completeSnapshots,
  valuePortfolio,
  type PortfolioValuation,
} from "../services/portfolio-valuation.ts";
import type { StockRecord } from "../services/stock-normalizer.ts";
import { withTimeout, TimeoutError } from "../lib/timeout.ts";
import {
  errorMessage,
  FatalConfigurationError,
  ReasoningUnavailableError,
} from "../lib/errors.ts";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Maximum characters to show from tool call arguments in console logs.
 */
const TOOL_ARGS_LOG_PREVIEW_LENGTH = 200;

/**
 * Query sent for a whole-portfolio review.
 */
export const PORTFOLIO_ANALYSIS_QUERY = `Analyze my portfolio and provide:
1. Current value of each stock
2. Profit/loss for each position
3. Overall portfolio performance
4. Recommendations (hold/buy more/sell)

Calculate using current market prices.`;

export interface PortfolioAgentOptions {
  client: ReasoningClient;
  gateway: MarketDataGateway;
  /** Reasoning steps allowed per run */
  maxRoundTrips: number;
  reasoningTimeoutMs: number;
  toolTimeoutMs: number;
  /** Wall clock for the system instruction */
  clock?: () => Date;
}

export interface PortfolioAnalysis {
  analysis: string;
  portfolio: PortfolioPosition[];
  valuation: PortfolioValuation;
  /** Stocks the conversation surfaced */
  stocks: StockRecord[];
  /** `stocks` plus the holdings looked up for the valuation */
  snapshots: StockRecord[];
  outcome: RunOutcome;
}

type LoopPhase =
  | { kind: "reasoning" }
  | { kind: "tool-execution"; toolCalls: ToolCall[] }
  | { kind: "terminal"; outcome: RunOutcome };

// ---------------------------------------------------------------------------
// Agent
// ---------------------------------------------------------------------------

export class PortfolioAgent {
  private readonly client: ReasoningClient;
  private readonly gateway: MarketDataGateway;
  private readonly maxRoundTrips: number;
  private readonly reasoningTimeoutMs: number;
  private readonly toolTimeoutMs: number;
  private readonly clock: () => Date;

  constructor(options: PortfolioAgentOptions) {
    this.client = options.client;
    this.gateway = options.gateway;
    this.maxRoundTrips = options.maxRoundTrips;
    this.reasoningTimeoutMs = options.reasoningTimeoutMs;
    this.toolTimeoutMs = options.toolTimeoutMs;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Answer one query. `priorMessages` continues an earlier conversation;
   * system messages in it are dropped because the instruction is rebuilt
   * on every step.
   */
  async run(
    query: string,
    portfolio: readonly PortfolioPosition[] = [],
    priorMessages: readonly ConversationMessage[] = [],
  ): Promise<AgentRunResult> {
    const messages: ConversationMessage[] = [
      ...priorMessages.filter((msg) => msg.role !== "system"),
      { role: "user", content: query },
    ];
    const tools = getToolDefinitions();

    let phase: LoopPhase = { kind: "reasoning" };
    let reasoningSteps = 0;
    let toolCallCount = 0;

    while (phase.kind !== "terminal") {
      if (phase.kind === "reasoning") {
        if (reasoningSteps >= this.maxRoundTrips) {
          console.warn(
            `[PortfolioAgent] Round-trip cap reached (${this.maxRoundTrips}). Returning partial answer.`,
          );
          phase = { kind: "terminal", outcome: "loop_budget_exceeded" };
          continue;
        }

        const system = buildSystemInstruction(portfolio, this.clock());
        let turn: AgentTurn;
        try {
          turn = await withTimeout(
            "reasoning step",
            (signal) =>
              this.client.complete([{ role: "system", content: system }, ...messages], tools, signal),
            this.reasoningTimeoutMs,
          );
        } catch (err) {
          phase = { kind: "terminal", outcome: this.reasoningFailureOutcome(err, reasoningSteps) };
          continue;
        }

        reasoningSteps++;
        messages.push({ role: "assistant", content: turn.textResponse, toolCalls: turn.toolCalls });

        phase =
          turn.toolCalls.length > 0
            ? { kind: "tool-execution", toolCalls: turn.toolCalls }
            : { kind: "terminal", outcome: "completed" };
        continue;
      }

      // tool-execution
      for (const tc of phase.toolCalls) {
        console.log(
          `[PortfolioAgent] Tool call #${++toolCallCount}: ${tc.name}(${JSON.stringify(tc.arguments).slice(0, TOOL_ARGS_LOG_PREVIEW_LENGTH)})`,
        );
      }
      const results = await Promise.all(phase.toolCalls.map((tc) => this.runTool(tc)));
      messages.push(...results);
      phase = { kind: "reasoning" };
    }

    const { response, stocks } = assembleResponse(messages);
    console.log(
      `[PortfolioAgent] Run finished: ${phase.outcome} after ${reasoningSteps} reasoning step(s), ${toolCallCount} tool call(s), ${stocks.length} stock(s)`,
    );

    return {
      response,
      stocks,
      outcome: phase.outcome,
      reasoningSteps,
      toolCallCount,
      messages,
    };
  }

  /**
   * Review a whole portfolio: narrative answer plus a valuation of every
   * holding. Holdings the conversation did not price are looked up directly.
   */
  async analyzePortfolio(portfolio: readonly PortfolioPosition[]): Promise<PortfolioAnalysis> {
    const result = await this.run(PORTFOLIO_ANALYSIS_QUERY, portfolio);
    const priced = await completeSnapshots(
      portfolio.map((p) => p.symbol),
      result.stocks,
      this.gateway,
    );

    return {
      analysis: result.response,
      portfolio: [...portfolio],
      valuation: valuePortfolio(portfolio, priced),
      stocks: result.stocks,
      snapshots: priced,
      outcome: result.outcome,
    };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async runTool(tc: ToolCall): Promise<ToolResultMessage> {
    let content: string;
    try {
      content = await withTimeout(
        `tool ${tc.name}`,
        (signal) => executeTool(tc.name, tc.arguments, { gateway: this.gateway, signal }),
        this.toolTimeoutMs,
      );
    } catch (err) {
      console.warn(`[PortfolioAgent] Tool ${tc.name} failed: ${errorMessage(err)}`);
      content = JSON.stringify({ error: errorMessage(err) });
    }
    return { role: "tool", toolCallId: tc.id, name: tc.name, content };
  }

  /**
   * Map a failed reasoning step to a terminal outcome. Missing credentials
   * and a first step that never answered are not recoverable and rethrow.
   */
  private reasoningFailureOutcome(err: unknown, completedSteps: number): RunOutcome {
    if (err instanceof FatalConfigurationError) throw err;

    if (err instanceof TimeoutError) {
      console.warn(`[PortfolioAgent] ${err.message}. Returning partial answer.`);
      return "reasoning_timeout";
    }

    if (completedSteps === 0) {
      throw new ReasoningUnavailableError(
        `Reasoning service unavailable: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    console.error(`[PortfolioAgent] Reasoning step failed: ${errorMessage(err)}. Returning partial answer.`);
    return "reasoning_failed";
  }
}
