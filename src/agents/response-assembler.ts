/**
 * Response Assembler
 *
 * Folds a finished conversation trace into the caller's answer:
 * - `response`: text of the latest assistant message that has any
 * - `stocks`: every tool result in trace order, normalized, first record
 *   per symbol kept, capped
 */

import type { ConversationMessage } from "./agent-types.ts";
import {
  parseStockPayload,
  symbolKey,
  type ParseResult,
  type StockRecord,
} from "../services/stock-normalizer.ts";
import { FALLBACK_RESPONSE, MAX_RESPONSE_STOCKS } from "../config/constants.ts";
import { errorMessage } from "../lib/errors.ts";

export interface AssembledResponse {
  response: string;
  stocks: StockRecord[];
}

export function parseToolContent(content: string): ParseResult<unknown> {
  try {
    return { ok: true, value: JSON.parse(content) };
  } catch (err) {
    return { ok: false, reason: `invalid JSON: ${errorMessage(err)}` };
  }
}

function latestAssistantText(messages: readonly ConversationMessage[]): string | null {
  for (let i = messages.length - 1; i >= 0; i--) {
    const msg = messages[i];
    if (msg?.role === "assistant" && msg.content !== null && msg.content.trim().length > 0) {
      return msg.content;
    }
  }
  return null;
}

export function assembleResponse(
  messages: readonly ConversationMessage[],
  maxStocks: number = MAX_RESPONSE_STOCKS,
): AssembledResponse {
  const stocks: StockRecord[] = [];
  const seen = new Set<string>();

  for (const msg of messages) {
    if (msg.role !== "tool") continue;
    if (stocks.length >= maxStocks) break;

    const parsed = parseToolContent(msg.content);
    if (!parsed.ok) {
      console.warn(`[ResponseAssembler] Skipping ${msg.name} result: ${parsed.reason}`);
      continue;
    }

    const value = parsed.value;
    if (typeof value !== "object" || value === null) {
      console.warn(`[ResponseAssembler] Skipping ${msg.name} result: not an object or array`);
      continue;
    }
    const items: unknown[] = Array.isArray(value) ? value : [value];

    for (const item of items) {
      const record = parseStockPayload(item);
      if (!record.ok) {
        console.warn(`[ResponseAssembler] Dropped ${msg.name} item: ${record.reason}`);
        continue;
      }
      const key = symbolKey(record.value.symbol);
      if (seen.has(key)) continue;
      seen.add(key);
      stocks.push(record.value);
      if (stocks.length >= maxStocks) break;
    }
  }

  return {
    response: latestAssistantText(messages) ?? FALLBACK_RESPONSE,
    stocks,
  };
}
