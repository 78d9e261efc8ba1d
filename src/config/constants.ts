// ---------------------------------------------------------------------------
// Exchange
// ---------------------------------------------------------------------------

/** TradingView market identifier for the Pakistan Stock Exchange */
export const PSX_MARKET = "pakistan";

/** Exchange qualifier TradingView puts in front of PSX tickers ("PSX:OGDC") */
export const PSX_SYMBOL_PREFIX = "PSX";

/** IANA zone the exchange clock runs in (PKT, UTC+5, no DST) */
export const PSX_TIMEZONE = "Asia/Karachi";

/**
 * Regular session boundaries in minutes from local midnight.
 * The session is open for SESSION_OPEN_MINUTE <= t < SESSION_CLOSE_MINUTE.
 */
export const SESSION_OPEN_MINUTE = 9 * 60 + 15; // 09:15
export const SESSION_CLOSE_MINUTE = 15 * 60 + 30; // 15:30

/** Currency label used in prompts and emails */
export const PSX_CURRENCY = "PKR";

// ---------------------------------------------------------------------------
// Screener limits
// ---------------------------------------------------------------------------

/** Default number of rows for gainers/losers/scans when the caller omits it */
export const DEFAULT_SCREEN_LIMIT = 10;

/** Upper bound on rows requested from the scanner in one call */
export const MAX_SCREEN_LIMIT = 50;

/** Default RSI bound for the oversold scan */
export const DEFAULT_OVERSOLD_RSI = 30;

/** Default RSI bound for the overbought scan */
export const DEFAULT_OVERBOUGHT_RSI = 70;

/** Max symbols accepted by POST /stocks/current-prices */
export const MAX_PRICE_LOOKUP_SYMBOLS = 25;

// ---------------------------------------------------------------------------
// Response assembly
// ---------------------------------------------------------------------------

/** Max distinct stock records returned with one answer */
export const MAX_RESPONSE_STOCKS = 10;

/** Answer text when the run produced no assistant text at all */
export const FALLBACK_RESPONSE = "I couldn't process that request.";

// ---------------------------------------------------------------------------
// HTTP
// ---------------------------------------------------------------------------

/** Rate limit: requests per window per client */
export const RATE_LIMIT_MAX = 30;

/** Rate limit window in milliseconds (1 minute) */
export const RATE_LIMIT_WINDOW_MS = 60_000;

/** Resend REST endpoint for outgoing mail */
export const RESEND_API_URL = "https://api.resend.com/emails";

/** Timeout for one Resend API call */
export const EMAIL_SEND_TIMEOUT_MS = 10_000;
