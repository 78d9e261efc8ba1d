/**
 * Email Service: portfolio update and immediate alert emails
 *
 * Without RESEND_API_KEY the service runs in mock mode: the email is written
 * to the console and reported as sent. With a key it is POSTed to the Resend
 * REST API. Delivery failures are returned, not thrown.
 */

import type { TriggeredAlert } from "./alert-evaluator.ts";
import type { PortfolioValuation } from "./portfolio-valuation.ts";
import { escapeHtml, formatCurrency, formatPercentage } from "../lib/format-utils.ts";
import { errorMessage } from "../lib/errors.ts";
import {
  EMAIL_SEND_TIMEOUT_MS,
  PSX_CURRENCY,
  PSX_TIMEZONE,
  RESEND_API_URL,
} from "../config/constants.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface EmailServiceOptions {
  apiKey: string | undefined;
  from: string;
  apiUrl?: string;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
  clock?: () => Date;
}

export interface PortfolioUpdate {
  to: string;
  analysis: string;
  valuation?: PortfolioValuation;
  alerts?: readonly TriggeredAlert[];
}

export interface EmailDeliveryResult {
  sent: boolean;
  mock: boolean;
  subject: string;
  error?: string;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

const dateFormatter = new Intl.DateTimeFormat("en-US", {
  timeZone: PSX_TIMEZONE,
  year: "numeric",
  month: "long",
  day: "numeric",
});

export function buildSubject(date: Date): string {
  return `Your PSX Portfolio Update - ${dateFormatter.format(date)}`;
}

function renderAlerts(alerts: readonly TriggeredAlert[]): string {
  if (alerts.length === 0) return "";
  const items = alerts
    .map(
      (alert) =>
        `<div class="alert"><strong>${escapeHtml(alert.symbol)}</strong>: ${escapeHtml(alert.message)}</div>`,
    )
    .join("\n");
  return `<h2>Alerts Triggered</h2>\n${items}`;
}

function renderValuation(valuation: PortfolioValuation | undefined): string {
  if (!valuation || valuation.pricedPositions === 0) return "";
  const rows = valuation.positions
    .map((p) => {
      const value = p.marketValue === null ? "n/a" : formatCurrency(p.marketValue);
      const pnl = p.pnlPercent === null ? "n/a" : formatPercentage(p.pnlPercent);
      const cls = p.pnl !== null && p.pnl < 0 ? "loss" : "profit";
      return `<tr><td>${escapeHtml(p.symbol)}</td><td>${p.quantity}</td><td>${value}</td><td class="${cls}">${pnl}</td></tr>`;
    })
    .join("\n");
  const total =
    valuation.totalPnlPercent === null ? "" : ` (${formatPercentage(valuation.totalPnlPercent)})`;
  return `<h2>Positions</h2>
<table>
<tr><th>Symbol</th><th>Shares</th><th>Value (${PSX_CURRENCY})</th><th>P&amp;L</th></tr>
${rows}
</table>
<p><strong>Total value:</strong> ${formatCurrency(valuation.totalValue)} ${PSX_CURRENCY}${total}</p>`;
}

export function buildAlertSubject(alert: TriggeredAlert): string {
  return `Alert: ${alert.symbol} - ${alert.type}`;
}

export function buildAlertEmailHtml(alert: TriggeredAlert): string {
  return `<!DOCTYPE html>
<html>
<head>
<style>
body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; }
.container { max-width: 600px; margin: 0 auto; padding: 20px; }
.alert-box { background: #fee2e2; border: 2px solid #dc2626; padding: 20px; border-radius: 5px; }
</style>
</head>
<body>
<div class="container">
<div class="alert-box">
<h1>Alert: ${escapeHtml(alert.type)}</h1>
<h2>${escapeHtml(alert.symbol)}</h2>
<p><strong>Current Price:</strong> ${formatCurrency(alert.price)} ${PSX_CURRENCY}</p>
<p><strong>Change:</strong> ${formatPercentage(alert.changePercent)}</p>
<p>${escapeHtml(alert.message)}</p>
</div>
</div>
</body>
</html>`;
}

export function buildPortfolioEmailHtml(update: PortfolioUpdate, date: Date): string {
  const analysis = escapeHtml(update.analysis).replace(/\n/g, "<br>\n");

  return `<!DOCTYPE html>
<html>
<head>
<style>
body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; }
.container { max-width: 600px; margin: 0 auto; padding: 20px; }
.header { background: #2563eb; color: white; padding: 20px; text-align: center; }
.profit { color: #16a34a; font-weight: bold; }
.loss { color: #dc2626; font-weight: bold; }
.alert { background: #fef3c7; border-left: 4px solid #f59e0b; padding: 10px; margin: 10px 0; }
</style>
</head>
<body>
<div class="container">
<div class="header"><h1>Your PSX Portfolio Update</h1><p>${dateFormatter.format(date)}</p></div>
<div class="content">
<h2>Portfolio Analysis</h2>
<p>${analysis}</p>
${renderValuation(update.valuation)}
${renderAlerts(update.alerts ?? [])}
</div>
</div>
</body>
</html>`;
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export class EmailService {
  private readonly apiKey: string | undefined;
  private readonly from: string;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly clock: () => Date;

  constructor(options: EmailServiceOptions) {
    this.apiKey = options.apiKey && options.apiKey.length > 0 ? options.apiKey : undefined;
    this.from = options.from;
    this.apiUrl = options.apiUrl ?? RESEND_API_URL;
    this.timeoutMs = options.timeoutMs ?? EMAIL_SEND_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? fetch;
    this.clock = options.clock ?? (() => new Date());
  }

  get mockMode(): boolean {
    return this.apiKey === undefined;
  }

  async sendPortfolioUpdate(update: PortfolioUpdate): Promise<EmailDeliveryResult> {
    const now = this.clock();
    const subject = buildSubject(now);
    const html = buildPortfolioEmailHtml(update, now);

    if (this.apiKey === undefined) {
      console.log(`[EmailService] MOCK EMAIL to ${update.to}: "${subject}"`);
      console.log(`[EmailService] ${update.alerts?.length ?? 0} alert(s), ${html.length} bytes of HTML`);
      return { sent: true, mock: true, subject };
    }
    return this.deliver(this.apiKey, update.to, subject, html);
  }

  /** Immediate email for one triggered alert */
  async sendAlert(to: string, alert: TriggeredAlert): Promise<EmailDeliveryResult> {
    const subject = buildAlertSubject(alert);
    const html = buildAlertEmailHtml(alert);

    if (this.apiKey === undefined) {
      console.log(`[EmailService] MOCK ALERT to ${to}: "${subject}"`);
      return { sent: true, mock: true, subject };
    }
    return this.deliver(this.apiKey, to, subject, html);
  }

  private async deliver(
    apiKey: string,
    to: string,
    subject: string,
    html: string,
  ): Promise<EmailDeliveryResult> {
    try {
      const resp = await this.fetchFn(this.apiUrl, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ from: this.from, to: [to], subject, html }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!resp.ok) {
        const error = `Resend responded with HTTP ${resp.status}`;
        console.error(`[EmailService] Delivery to ${to} failed: ${error}`);
        return { sent: false, mock: false, subject, error };
      }

      console.log(`[EmailService] Sent "${subject}" to ${to}`);
      return { sent: true, mock: false, subject };
    } catch (err) {
      const error = errorMessage(err);
      console.error(`[EmailService] Delivery to ${to} failed: ${error}`);
      return { sent: false, mock: false, subject, error };
    }
  }
}
