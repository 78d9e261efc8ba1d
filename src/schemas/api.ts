/**
 * Request schemas for the HTTP API.
 *
 * Wire names are snake_case (`buy_price`, `alert_type`); each schema
 * transforms the payload into the domain types the agent and services use.
 */

import { z } from "zod";
import type { PortfolioPosition } from "../agents/agent-types.ts";
import type { AlertRule } from "../services/alert-evaluator.ts";
import {
  DEFAULT_OVERBOUGHT_RSI,
  DEFAULT_OVERSOLD_RSI,
  DEFAULT_SCREEN_LIMIT,
  MAX_PRICE_LOOKUP_SYMBOLS,
  MAX_SCREEN_LIMIT,
} from "../config/constants.ts";

/** Longest ticker accepted, with room for a "PSX:" prefix */
const STOCK_SYMBOL_MAX_LENGTH = 20;

/** Longest natural-language query accepted */
const QUERY_MAX_LENGTH = 2000;

/** Most holdings accepted in one request */
const PORTFOLIO_MAX_POSITIONS = 50;

/** Most alert rules accepted in one request */
const ALERTS_MAX = 50;

const symbolField = z
  .string()
  .trim()
  .min(1, "symbol is required")
  .max(STOCK_SYMBOL_MAX_LENGTH, "symbol too long");

// ---------------------------------------------------------------------------
// Portfolio
// ---------------------------------------------------------------------------

export const portfolioItemSchema = z
  .object({
    symbol: symbolField,
    quantity: z.number().int("quantity must be a whole number of shares").positive("quantity must be positive"),
    buy_price: z.number().positive("buy_price must be positive"),
  })
  .transform(
    (item): PortfolioPosition => ({
      symbol: item.symbol,
      quantity: item.quantity,
      buyPrice: item.buy_price,
    }),
  );

const portfolioSchema = z.array(portfolioItemSchema).max(PORTFOLIO_MAX_POSITIONS);

// ---------------------------------------------------------------------------
// Alerts
// ---------------------------------------------------------------------------

const messageField = z.string().trim().min(1).max(500).optional();
const activeField = z.boolean().default(true);

const alertSchema = z
  .discriminatedUnion("alert_type", [
    z.object({
      symbol: symbolField,
      alert_type: z.literal("price_target"),
      condition: z.object({
        target_price: z.number().positive("target_price must be positive"),
        direction: z.enum(["above", "below"]).optional(),
        message: messageField,
      }),
      is_active: activeField,
    }),
    z.object({
      symbol: symbolField,
      alert_type: z.literal("rsi_oversold"),
      condition: z
        .object({ threshold: z.number().min(0).max(100).optional(), message: messageField })
        .optional(),
      is_active: activeField,
    }),
    z.object({
      symbol: symbolField,
      alert_type: z.literal("rsi_overbought"),
      condition: z
        .object({ threshold: z.number().min(0).max(100).optional(), message: messageField })
        .optional(),
      is_active: activeField,
    }),
    z.object({
      symbol: symbolField,
      alert_type: z.literal("volume_spike"),
      condition: z.object({
        min_volume: z.number().nonnegative("min_volume must not be negative"),
        message: messageField,
      }),
      is_active: activeField,
    }),
  ])
  .transform((alert): AlertRule => {
    const message = alert.condition?.message;
    const base = {
      symbol: alert.symbol,
      isActive: alert.is_active,
      ...(message !== undefined && { message }),
    };

    switch (alert.alert_type) {
      case "price_target":
        return {
          ...base,
          type: "price_target",
          targetPrice: alert.condition.target_price,
          direction: alert.condition.direction ?? "above",
        };
      case "rsi_oversold":
        return { ...base, type: "rsi_oversold", threshold: alert.condition?.threshold ?? DEFAULT_OVERSOLD_RSI };
      case "rsi_overbought":
        return { ...base, type: "rsi_overbought", threshold: alert.condition?.threshold ?? DEFAULT_OVERBOUGHT_RSI };
      case "volume_spike":
        return { ...base, type: "volume_spike", minVolume: alert.condition.min_volume };
    }
  });

// ---------------------------------------------------------------------------
// Request bodies
// ---------------------------------------------------------------------------

/** POST /query */
export const queryRequestSchema = z.object({
  query: z.string().trim().min(1, "query is required").max(QUERY_MAX_LENGTH, "query too long"),
  portfolio: portfolioSchema.optional(),
});

/** POST /portfolio/analyze */
export const portfolioAnalysisRequestSchema = z.object({
  portfolio: portfolioSchema.min(1, "portfolio must contain at least one position"),
});

/** POST /email/send-update */
export const emailUpdateRequestSchema = z.object({
  email: z.email("email must be a valid address"),
  portfolio: portfolioSchema.min(1, "portfolio must contain at least one position"),
  alerts: z.array(alertSchema).max(ALERTS_MAX).optional(),
  /** Also send each triggered alert as its own email */
  alert_emails: z.boolean().default(false),
});

/** POST /stocks/current-prices: a bare JSON array of tickers */
export const currentPricesRequestSchema = z
  .array(symbolField)
  .min(1, "at least one symbol is required")
  .max(MAX_PRICE_LOOKUP_SYMBOLS, `at most ${MAX_PRICE_LOOKUP_SYMBOLS} symbols per request`);

// ---------------------------------------------------------------------------
// Query strings
// ---------------------------------------------------------------------------

/** ?limit= on the gainers / losers routes */
export const moversQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_SCREEN_LIMIT).default(DEFAULT_SCREEN_LIMIT),
});

/** Domain position back to its wire shape for responses */
export function toWirePosition(position: PortfolioPosition) {
  return {
    symbol: position.symbol,
    quantity: position.quantity,
    buy_price: position.buyPrice,
  };
}
