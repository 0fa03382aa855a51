import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../src/generator/errors";
import { ageOn, daysBefore, isoDate, isoDateTime, parseReferenceDate, yearsBefore } from "../src/generator/dates";

const ref = new Date("2025-06-01T00:00:00Z");

describe("dates", () => {
  it("formats dates and date-times in UTC", () => {
    expect(isoDate(ref)).toBe("2025-06-01");
    expect(isoDateTime(ref)).toBe("2025-06-01T00:00:00+00:00");
    expect(isoDate(daysBefore(ref, 31))).toBe("2025-05-01");
  });

  it("falls back to Feb 28 when the anniversary does not exist", () => {
    expect(isoDate(yearsBefore(new Date("2024-02-29T00:00:00Z"), 1))).toBe("2023-02-28");
    expect(isoDate(yearsBefore(ref, 30))).toBe("1995-06-01");
  });

  it("computes completed years of age", () => {
    expect(ageOn("1956-09-03", ref)).toBe(68);
    expect(ageOn("1995-06-01", ref)).toBe(30);
    expect(ageOn("1995-06-02", ref)).toBe(29);
    expect(ageOn(undefined, ref)).toBeUndefined();
    expect(ageOn("not a date", ref)).toBeUndefined();
  });

  it("parses an explicit reference date and rejects garbage", () => {
    expect(parseReferenceDate("2025-06-01").toISOString()).toBe("2025-06-01T00:00:00.000Z");
    expect(() => parseReferenceDate("yesterday-ish")).toThrow(ConfigurationError);
  });

  it("defaults to today at midnight UTC", () => {
    const d = parseReferenceDate(undefined);
    expect(d.getUTCHours()).toBe(0);
    expect(d.getUTCMinutes()).toBe(0);
    expect(isoDate(d)).toBe(isoDate(new Date()));
  });
});
