/**
 * Market Hours: PSX session status
 *
 * The exchange trades Monday–Friday, 09:15–15:30 Pakistan Standard Time.
 * Outside that window the session is closed; Saturday and Sunday are
 * reported as "weekend". The status feeds the agent's system instruction so
 * answers given after hours say which session the data comes from.
 */

import {
  PSX_TIMEZONE,
  SESSION_OPEN_MINUTE,
  SESSION_CLOSE_MINUTE,
} from "../config/constants.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SessionStatus = "open" | "closed" | "weekend";

export interface SessionInfo {
  status: SessionStatus;
  isOpen: boolean;
  /** Exchange-local wall clock, "YYYY-MM-DD HH:MM" */
  localTime: string;
  /** Exchange-local weekday name, e.g. "Monday" */
  weekday: string;
  description: string;
}

interface ExchangeClock {
  dateStr: string;
  timeStr: string;
  weekday: string;
  minutesSinceMidnight: number;
}

// ---------------------------------------------------------------------------
// Time Utilities
// ---------------------------------------------------------------------------

const clockFormatter = new Intl.DateTimeFormat("en-US", {
  timeZone: PSX_TIMEZONE,
  year: "numeric",
  month: "2-digit",
  day: "2-digit",
  hour: "2-digit",
  minute: "2-digit",
  weekday: "long",
  hourCycle: "h23",
});

function getExchangeClock(date: Date): ExchangeClock {
  const parts: Record<string, string> = {};
  for (const part of clockFormatter.formatToParts(date)) {
    parts[part.type] = part.value;
  }

  const hours = parseInt(parts.hour ?? "0", 10);
  const minutes = parseInt(parts.minute ?? "0", 10);

  return {
    dateStr: `${parts.year}-${parts.month}-${parts.day}`,
    timeStr: `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`,
    weekday: parts.weekday ?? "",
    minutesSinceMidnight: hours * 60 + minutes,
  };
}

function formatMinute(minute: number): string {
  return `${String(Math.floor(minute / 60)).padStart(2, "0")}:${String(minute % 60).padStart(2, "0")}`;
}

// ---------------------------------------------------------------------------
// Session Detection
// ---------------------------------------------------------------------------

export function getSessionInfo(date: Date = new Date()): SessionInfo {
  const clock = getExchangeClock(date);
  const localTime = `${clock.dateStr} ${clock.timeStr}`;
  const hours = `${formatMinute(SESSION_OPEN_MINUTE)}–${formatMinute(SESSION_CLOSE_MINUTE)} PKT`;

  if (clock.weekday === "Saturday" || clock.weekday === "Sunday") {
    return {
      status: "weekend",
      isOpen: false,
      localTime,
      weekday: clock.weekday,
      description: `Weekend: the market is closed (regular hours Mon–Fri ${hours})`,
    };
  }

  const mins = clock.minutesSinceMidnight;
  if (mins >= SESSION_OPEN_MINUTE && mins < SESSION_CLOSE_MINUTE) {
    return {
      status: "open",
      isOpen: true,
      localTime,
      weekday: clock.weekday,
      description: `Regular session in progress (${hours})`,
    };
  }

  return {
    status: "closed",
    isOpen: false,
    localTime,
    weekday: clock.weekday,
    description:
      mins < SESSION_OPEN_MINUTE
        ? `Pre-open: the market opens at ${formatMinute(SESSION_OPEN_MINUTE)} PKT`
        : `After hours: the market closed at ${formatMinute(SESSION_CLOSE_MINUTE)} PKT`,
  };
}
