import { describe, it, expect } from "vitest";
import { getSessionInfo } from "../market-hours.ts";

// PKT is UTC+5 with no daylight saving; 2026-10-19 is a Monday.

describe("Market Hours", () => {
  it("should report closed one minute before the open", () => {
    const info = getSessionInfo(new Date("2026-10-19T04:14:00Z"));
    expect(info).toEqual({
      status: "closed",
      isOpen: false,
      localTime: "2026-10-19 09:14",
      weekday: "Monday",
      description: "Pre-open: the market opens at 09:15 PKT",
    });
  });

  it("should report open at 09:15 PKT", () => {
    const info = getSessionInfo(new Date("2026-10-19T04:15:00Z"));
    expect(info.status).toBe("open");
    expect(info.isOpen).toBe(true);
    expect(info.localTime).toBe("2026-10-19 09:15");
    expect(info.description).toBe("Regular session in progress (09:15–15:30 PKT)");
  });

  it("should report open one minute before the close", () => {
    expect(getSessionInfo(new Date("2026-10-19T10:29:00Z")).status).toBe("open");
  });

  it("should report closed from 15:30 PKT", () => {
    const info = getSessionInfo(new Date("2026-10-19T10:30:00Z"));
    expect(info.status).toBe("closed");
    expect(info.description).toBe("After hours: the market closed at 15:30 PKT");
  });

  it("should use the exchange date, not the UTC date", () => {
    // 21:00 UTC Monday is 02:00 Tuesday in Karachi
    const info = getSessionInfo(new Date("2026-10-19T21:00:00Z"));
    expect(info.localTime).toBe("2026-10-20 02:00");
    expect(info.weekday).toBe("Tuesday");
    expect(info.status).toBe("closed");
  });

  it("should report the weekend during Saturday trading hours", () => {
    const info = getSessionInfo(new Date("2026-10-17T06:00:00Z"));
    expect(info).toEqual({
      status: "weekend",
      isOpen: false,
      localTime: "2026-10-17 11:00",
      weekday: "Saturday",
      description: "Weekend: the market is closed (regular hours Mon–Fri 09:15–15:30 PKT)",
    });
  });

  it("should report the weekend on Sunday", () => {
    expect(getSessionInfo(new Date("2026-10-18T06:00:00Z")).status).toBe("weekend");
  });
});
