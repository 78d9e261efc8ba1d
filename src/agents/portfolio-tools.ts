/**
 * Portfolio Tools: Tool definitions & central executor for the agent loop
 *
 * 5 tools the reasoning step can call:
 *   get_psx_top_gainers, get_psx_top_losers, get_stock_analysis,
 *   scan_oversold_stocks, scan_overbought_stocks
 *
 * Every tool returns JSON text. Gateway errors and bad arguments come back
 * as `{"error": "..."}` so the loop can keep going.
 */

import { z } from "zod";
import type { ToolDefinition } from "./agent-types.ts";
import type { GatewayResult, MarketDataGateway } from "../services/market-data-gateway.ts";
import {
  DEFAULT_SCREEN_LIMIT,
  MAX_SCREEN_LIMIT,
  DEFAULT_OVERSOLD_RSI,
  DEFAULT_OVERBOUGHT_RSI,
} from "../config/constants.ts";

// ---------------------------------------------------------------------------
// Tool Context
// ---------------------------------------------------------------------------

export interface ToolContext {
  gateway: MarketDataGateway;
  /** Aborted when the tool call runs out of time */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Argument Schemas
// ---------------------------------------------------------------------------

const limitField = z.coerce
  .number()
  .int()
  .min(1)
  .max(MAX_SCREEN_LIMIT)
  .default(DEFAULT_SCREEN_LIMIT);

const moversArgsSchema = z.object({
  limit: limitField,
  // Accepted for compatibility; the scanner only serves the daily change
  timeframe: z.string().optional(),
});

const analysisArgsSchema = z.object({
  symbol: z.string().trim().min(1, "symbol is required"),
});

function rsiScanArgsSchema(defaultThreshold: number) {
  return z.object({
    rsi_threshold: z.coerce.number().min(0).max(100).default(defaultThreshold),
    limit: limitField,
  });
}

const oversoldArgsSchema = rsiScanArgsSchema(DEFAULT_OVERSOLD_RSI);
const overboughtArgsSchema = rsiScanArgsSchema(DEFAULT_OVERBOUGHT_RSI);

// ---------------------------------------------------------------------------
// Tool Schema Definitions
// ---------------------------------------------------------------------------

const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: "get_psx_top_gainers",
    description:
      "Get the top gaining PSX stocks for the current (or most recent) session with price, change %, volume and open.",
    parameters: {
      type: "object",
      properties: {
        limit: { type: "integer", description: `Number of stocks to return (default ${DEFAULT_SCREEN_LIMIT})` },
        timeframe: { type: "string", description: "Time period; only 1D is served", enum: ["1D"] },
      },
      required: [],
    },
  },
  {
    name: "get_psx_top_losers",
    description:
      "Get the top losing PSX stocks for the current (or most recent) session with price, change %, volume and open.",
    parameters: {
      type: "object",
      properties: {
        limit: { type: "integer", description: `Number of stocks to return (default ${DEFAULT_SCREEN_LIMIT})` },
        timeframe: { type: "string", description: "Time period; only 1D is served", enum: ["1D"] },
      },
      required: [],
    },
  },
  {
    name: "get_stock_analysis",
    description:
      "Get detailed technical analysis for one PSX stock: price data, RSI, SMA20, EMA50, Bollinger Bands, MACD and signals.",
    parameters: {
      type: "object",
      properties: {
        symbol: { type: "string", description: 'Stock symbol, e.g. "OGDC" (PSX: prefix optional)' },
      },
      required: ["symbol"],
    },
  },
  {
    name: "scan_oversold_stocks",
    description:
      "Find oversold PSX stocks (RSI below a threshold), lowest RSI first. Potential buying opportunities.",
    parameters: {
      type: "object",
      properties: {
        rsi_threshold: { type: "number", description: `RSI upper bound (default ${DEFAULT_OVERSOLD_RSI})` },
        limit: { type: "integer", description: `Number of results (default ${DEFAULT_SCREEN_LIMIT})` },
      },
      required: [],
    },
  },
  {
    name: "scan_overbought_stocks",
    description:
      "Find overbought PSX stocks (RSI above a threshold), highest RSI first. Potential selling opportunities.",
    parameters: {
      type: "object",
      properties: {
        rsi_threshold: { type: "number", description: `RSI lower bound (default ${DEFAULT_OVERBOUGHT_RSI})` },
        limit: { type: "integer", description: `Number of results (default ${DEFAULT_SCREEN_LIMIT})` },
      },
      required: [],
    },
  },
];

export function getToolDefinitions(): ToolDefinition[] {
  return TOOL_DEFINITIONS;
}

// ---------------------------------------------------------------------------
// Central Tool Executor
// ---------------------------------------------------------------------------

function serialize<T>(result: GatewayResult<T>): string {
  return result.ok ? JSON.stringify(result.data) : JSON.stringify({ error: result.error });
}

function invalidArgs(toolName: string, error: z.ZodError): string {
  const issues = error.issues
    .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
    .join("; ");
  return JSON.stringify({ error: `Invalid arguments for ${toolName}: ${issues}` });
}

/**
 * Execute a tool call and return the result as a JSON string.
 */
export async function executeTool(
  toolName: string,
  args: Record<string, unknown>,
  ctx: ToolContext,
): Promise<string> {
  switch (toolName) {
    case "get_psx_top_gainers": {
      const parsed = moversArgsSchema.safeParse(args);
      if (!parsed.success) return invalidArgs(toolName, parsed.error);
      return serialize(await ctx.gateway.topGainers(parsed.data.limit, ctx.signal));
    }

    case "get_psx_top_losers": {
      const parsed = moversArgsSchema.safeParse(args);
      if (!parsed.success) return invalidArgs(toolName, parsed.error);
      return serialize(await ctx.gateway.topLosers(parsed.data.limit, ctx.signal));
    }

    case "get_stock_analysis": {
      const parsed = analysisArgsSchema.safeParse(args);
      if (!parsed.success) return invalidArgs(toolName, parsed.error);
      return serialize(await ctx.gateway.stockAnalysis(parsed.data.symbol, ctx.signal));
    }

    case "scan_oversold_stocks": {
      const parsed = oversoldArgsSchema.safeParse(args);
      if (!parsed.success) return invalidArgs(toolName, parsed.error);
      return serialize(
        await ctx.gateway.scanOversold(parsed.data.rsi_threshold, parsed.data.limit, ctx.signal),
      );
    }

    case "scan_overbought_stocks": {
      const parsed = overboughtArgsSchema.safeParse(args);
      if (!parsed.success) return invalidArgs(toolName, parsed.error);
      return serialize(
        await ctx.gateway.scanOverbought(parsed.data.rsi_threshold, parsed.data.limit, ctx.signal),
      );
    }

    default:
      return JSON.stringify({ error: `Unknown tool: ${toolName}` });
  }
}

/**
 * Coerce decoded tool-call arguments into a plain object. Anything that is
 * not a JSON object becomes `{}` and is then checked by the tool's schema.
 */
export function toToolArguments(value: unknown): Record<string, unknown> {
  return isArgumentObject(value) ? value : {};
}

function isArgumentObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
