/**
 * Shared formatting utilities for prompts, emails and log lines
 */

/**
 * Format a percentage value with sign prefix and custom decimal places
 *
 * @example
 * formatPercentage(5.67) // "+5.67%"
 * formatPercentage(-2.345, 1) // "-2.3%"
 */
export function formatPercentage(value: number, decimals: number = 2): string {
  if (Number.isNaN(value)) return "0.00%";
  const sign = value > 0 ? "+" : "";
  return `${sign}${value.toFixed(decimals)}%`;
}

/**
 * Format an amount with thousands separators and 2 decimal places
 *
 * @example
 * formatCurrency(1234.5678) // "1,234.57"
 */
export function formatCurrency(value: number): string {
  if (Number.isNaN(value)) return "0.00";
  return value.toLocaleString("en-US", {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

/**
 * Escape text for interpolation into HTML element content or attributes
 *
 * @example
 * escapeHtml("<b>P&L</b>") // "&lt;b&gt;P&amp;L&lt;/b&gt;"
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}
