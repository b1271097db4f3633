import { describe, expect, it } from "vitest";
import { extractReportDate, formatReportDate } from "./report-date.ts";

const NOW = new Date(2026, 9, 18);

describe("extractReportDate", () => {
  it("takes the first date on the first page", () => {
    const text = "Inmates Booked In During The Past 24 Hours\nReport Date: 3/15/2026 Page: 1 of 4\nSMITH, JOHN 1234567 3/14/2026";
    expect(formatReportDate(extractReportDate(text, NOW))).toBe("3/15/2026");
  });

  it("skips matches that are not calendar dates", () => {
    expect(formatReportDate(extractReportDate("13/45/2026 then 2/28/2026", NOW))).toBe("2/28/2026");
  });

  it("falls back to now when the page has no usable date", () => {
    expect(extractReportDate("no dates here", NOW)).toBe(NOW);
    expect(extractReportDate("2/30/2026", NOW)).toBe(NOW);
    expect(extractReportDate("", NOW)).toBe(NOW);
  });
});

describe("formatReportDate", () => {
  it("writes month and day without padding", () => {
    expect(formatReportDate(new Date(2026, 0, 5))).toBe("1/5/2026");
    expect(formatReportDate(new Date(2025, 11, 31))).toBe("12/31/2025");
  });
});
