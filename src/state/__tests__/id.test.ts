import { describe, expect, it } from "vitest";
import { generateMessageId, generateRunId } from "../id.ts";

describe("generateMessageId", () => {
  it("encodes the timestamp and a 6-char hex suffix", () => {
    const id = generateMessageId(new Date("2026-10-19T10:21:05.123Z"));
    expect(id).toMatch(/^20261019T102105123Z-[0-9a-f]{6}$/);
  });

  it("sorts lexicographically by creation time", () => {
    const earlier = generateMessageId(new Date("2026-10-19T09:59:59.999Z"));
    const later = generateMessageId(new Date("2026-10-19T10:00:00.000Z"));
    expect([later, earlier].sort()).toEqual([earlier, later]);
  });

  it("generates unique IDs for the same instant", () => {
    const now = new Date("2026-10-19T10:00:00.000Z");
    const ids = new Set(Array.from({ length: 50 }, () => generateMessageId(now)));
    expect(ids.size).toBeGreaterThan(45);
  });
});

describe("generateRunId", () => {
  it("prefixes with run-", () => {
    expect(generateRunId(new Date("2026-01-02T03:04:05.006Z"))).toMatch(
      /^run-20260102T030405006Z-[0-9a-f]{6}$/,
    );
  });
});
