/**
 * Unit tests for the export date-range resolver
 */

import { ConfigurationError } from "../../errors";
import { DATE_FILTERS, resolveDateRange, rangeForFilter } from "../date-range";

// Friday
const REFERENCE_DAY = new Date(2024, 2, 15, 13, 0, 0);

describe("rangeForFilter", () => {
  it.each([
    ["TODAY", "2024-03-15", "2024-03-15"],
    ["YESTERDAY", "2024-03-14", "2024-03-14"],
    ["THIS_WEEK", "2024-03-11", "2024-03-17"],
    ["LAST_WEEK", "2024-03-04", "2024-03-10"],
    ["THIS_MONTH", "2024-03-01", "2024-03-31"],
    ["LAST_MONTH", "2024-02-01", "2024-02-29"],
    ["TILL_DATE", "1970-01-01", "2024-03-15"],
  ] as const)("should resolve %s to [%s, %s]", (filter, start, end) => {
    expect(rangeForFilter(filter, REFERENCE_DAY)).toEqual({ startDate: start, endDate: end });
  });

  it("should cover every keyword in the enumeration", () => {
    for (const filter of DATE_FILTERS) {
      const range = rangeForFilter(filter, REFERENCE_DAY);
      expect(range.startDate <= range.endDate).toBe(true);
    }
  });

  it("should treat Sunday as the last day of the current week", () => {
    const sunday = new Date(2024, 2, 17);
    expect(rangeForFilter("THIS_WEEK", sunday)).toEqual({ startDate: "2024-03-11", endDate: "2024-03-17" });
    expect(rangeForFilter("LAST_WEEK", sunday)).toEqual({ startDate: "2024-03-04", endDate: "2024-03-10" });
  });

  it("should treat Monday as the first day of the current week", () => {
    const monday = new Date(2024, 2, 11);
    expect(rangeForFilter("THIS_WEEK", monday)).toEqual({ startDate: "2024-03-11", endDate: "2024-03-17" });
  });

  it("should cross the year boundary for LAST_MONTH and YESTERDAY", () => {
    const newYear = new Date(2024, 0, 1);
    expect(rangeForFilter("LAST_MONTH", newYear)).toEqual({ startDate: "2023-12-01", endDate: "2023-12-31" });
    expect(rangeForFilter("YESTERDAY", newYear)).toEqual({ startDate: "2023-12-31", endDate: "2023-12-31" });
  });
});

describe("resolveDateRange", () => {
  it("should default to YESTERDAY when no keyword is given", () => {
    expect(resolveDateRange(undefined, {}, REFERENCE_DAY)).toEqual({
      startDate: "2024-03-14",
      endDate: "2024-03-14",
      filter: "YESTERDAY",
    });
    expect(resolveDateRange("  ", {}, REFERENCE_DAY).filter).toBe("YESTERDAY");
  });

  it("should accept keywords regardless of case and whitespace", () => {
    expect(resolveDateRange(" this_week ", {}, REFERENCE_DAY)).toEqual({
      startDate: "2024-03-11",
      endDate: "2024-03-17",
      filter: "THIS_WEEK",
    });
  });

  it("should let both overrides replace the keyword range entirely", () => {
    const overrides = { startDate: "2024-01-05", endDate: "2024-01-20" };
    for (const keyword of ["TODAY", "TILL_DATE", "NOT_A_FILTER"]) {
      expect(resolveDateRange(keyword, overrides, REFERENCE_DAY)).toEqual({
        startDate: "2024-01-05",
        endDate: "2024-01-20",
        filter: "CUSTOM",
      });
    }
  });

  it("should apply a start override on its own", () => {
    expect(resolveDateRange("THIS_WEEK", { startDate: "2024-03-13" }, REFERENCE_DAY)).toEqual({
      startDate: "2024-03-13",
      endDate: "2024-03-17",
      filter: "THIS_WEEK",
    });
  });

  it("should apply an end override on its own", () => {
    expect(resolveDateRange("THIS_MONTH", { endDate: "2024-03-15" }, REFERENCE_DAY)).toEqual({
      startDate: "2024-03-01",
      endDate: "2024-03-15",
      filter: "THIS_MONTH",
    });
  });

  it("should ignore empty overrides", () => {
    expect(resolveDateRange("TODAY", { startDate: "", endDate: " " }, REFERENCE_DAY)).toEqual({
      startDate: "2024-03-15",
      endDate: "2024-03-15",
      filter: "TODAY",
    });
  });

  it("should reject an unknown keyword without a complete override pair", () => {
    expect(() => resolveDateRange("FORTNIGHT", {}, REFERENCE_DAY)).toThrow(ConfigurationError);
    expect(() => resolveDateRange("FORTNIGHT", { startDate: "2024-03-01" }, REFERENCE_DAY)).toThrow(
      /Unknown DATE_FILTER "FORTNIGHT"/,
    );
  });

  it("should reject malformed override dates", () => {
    expect(() => resolveDateRange("TODAY", { startDate: "15/03/2024" }, REFERENCE_DAY)).toThrow(ConfigurationError);
    expect(() => resolveDateRange("TODAY", { endDate: "2024-13-01" }, REFERENCE_DAY)).toThrow(
      'CUSTOM_END_DATE must be a calendar date in YYYY-MM-DD format, got "2024-13-01"',
    );
  });

  it("should reject a start date after the end date", () => {
    expect(() =>
      resolveDateRange("TODAY", { startDate: "2024-03-20", endDate: "2024-03-10" }, REFERENCE_DAY),
    ).toThrow("Start date 2024-03-20 is after end date 2024-03-10");
  });
});
