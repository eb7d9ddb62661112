import { describe, expect, it } from "vitest";
import { parseCron, cronMatches, nextCronMatch, CronParseError } from "../cron.ts";

const HOUR = 60 * 60 * 1000;

// ── parseCron ───────────────────────────────────────────────────────────────

describe("parseCron", () => {
  it("expands wildcards and folds Sunday 7 into 0", () => {
    const fields = parseCron("* * * * *");
    expect(fields.minute).toHaveLength(60);
    expect(fields.hour).toHaveLength(24);
    expect(fields.dayOfMonth).toHaveLength(31);
    expect(fields.month).toHaveLength(12);
    expect(fields.dayOfWeek).toEqual([0, 1, 2, 3, 4, 5, 6]);
    expect(fields.dayOfMonthRestricted).toBe(false);
    expect(fields.dayOfWeekRestricted).toBe(false);
  });

  it("parses ranges, steps and lists", () => {
    const fields = parseCron("*/15 9-17/4 1,15 * 1-5");
    expect(fields.minute).toEqual([0, 15, 30, 45]);
    expect(fields.hour).toEqual([9, 13, 17]);
    expect(fields.dayOfMonth).toEqual([1, 15]);
    expect(fields.dayOfWeek).toEqual([1, 2, 3, 4, 5]);
    expect(fields.dayOfMonthRestricted).toBe(true);
  });

  it("steps from a single value to the field maximum", () => {
    expect(parseCron("50/5 * * * *").minute).toEqual([50, 55]);
  });

  it("accepts month and weekday names", () => {
    const fields = parseCron("0 8 * jan,dec mon-fri");
    expect(fields.month).toEqual([1, 12]);
    expect(fields.dayOfWeek).toEqual([1, 2, 3, 4, 5]);
  });

  it("expands macros", () => {
    const daily = parseCron("@daily");
    expect(daily.minute).toEqual([0]);
    expect(daily.hour).toEqual([0]);

    const weekly = parseCron("@weekly");
    expect(weekly.dayOfWeek).toEqual([0]);

    expect(parseCron("@hourly").hour).toHaveLength(24);
    expect(parseCron("@monthly").dayOfMonth).toEqual([1]);
    expect(parseCron("@yearly").month).toEqual([1]);
  });

  it("rejects @reboot", () => {
    expect(() => parseCron("@reboot")).toThrow(CronParseError);
  });

  it("rejects wrong field counts", () => {
    expect(() => parseCron("0 0 * *")).toThrow("Expected 5 fields, got 4");
  });

  it("names the offending field", () => {
    try {
      parseCron("0 25 * * *");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CronParseError);
      if (err instanceof CronParseError) {
        expect(err.field).toBe("hour");
        expect(err.expression).toBe("0 25 * * *");
      }
    }
  });

  it("rejects empty, inverted and non-numeric parts", () => {
    expect(() => parseCron("")).toThrow("Empty cron expression");
    expect(() => parseCron("0 5-1 * * *")).toThrow(CronParseError);
    expect(() => parseCron("x * * * *")).toThrow(CronParseError);
    expect(() => parseCron("*/0 * * * *")).toThrow(CronParseError);
    expect(() => parseCron("1,,2 * * * *")).toThrow(CronParseError);
  });
});

// ── cronMatches ─────────────────────────────────────────────────────────────

describe("cronMatches", () => {
  it("matches a weekday schedule", () => {
    const fields = parseCron("30 9 * * 1");
    // 2026-10-19 is a Monday
    expect(cronMatches(fields, new Date(2026, 9, 19, 9, 30))).toBe(true);
    expect(cronMatches(fields, new Date(2026, 9, 20, 9, 30))).toBe(false);
  });

  it("ORs day-of-month and day-of-week when both are restricted", () => {
    const fields = parseCron("0 0 1 * 1");
    // Thursday the 1st
    expect(cronMatches(fields, new Date(2026, 9, 1, 0, 0))).toBe(true);
    // Monday the 19th
    expect(cronMatches(fields, new Date(2026, 9, 19, 0, 0))).toBe(true);
    // Tuesday the 20th
    expect(cronMatches(fields, new Date(2026, 9, 20, 0, 0))).toBe(false);
  });
});

// ── nextCronMatch ───────────────────────────────────────────────────────────

describe("nextCronMatch", () => {
  const now = new Date(2026, 9, 19, 10, 20, 45);

  it("finds the next run later the same day", () => {
    const next = nextCronMatch(parseCron("0 14 * * *"), now, 24 * HOUR);
    expect(next).toEqual(new Date(2026, 9, 19, 14, 0));
  });

  it("rolls over to the next day when today's slot has passed", () => {
    const next = nextCronMatch(parseCron("0 6 * * *"), now, 24 * HOUR);
    expect(next).toEqual(new Date(2026, 9, 20, 6, 0));
  });

  it("is strictly after the reference minute", () => {
    const next = nextCronMatch(parseCron("20 10 * * *"), now, 48 * HOUR);
    expect(next).toEqual(new Date(2026, 9, 20, 10, 20));
  });

  it("returns the next hourly slot", () => {
    const next = nextCronMatch(parseCron("@hourly"), now, HOUR);
    expect(next).toEqual(new Date(2026, 9, 19, 11, 0));
  });

  it("returns null outside the lookahead window", () => {
    // Next Sunday midnight is 2026-10-25
    expect(nextCronMatch(parseCron("@weekly"), now, 24 * HOUR)).toBeNull();
    expect(nextCronMatch(parseCron("@weekly"), now, 7 * 24 * HOUR)).toEqual(
      new Date(2026, 9, 25, 0, 0),
    );
  });

  it("returns null for dates that never occur", () => {
    expect(nextCronMatch(parseCron("0 0 31 2 *"), now, 24 * HOUR)).toBeNull();
  });
});
