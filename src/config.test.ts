import { describe, expect, it } from "vitest";
import { DEFAULT_BOOKED_BASE_URL, loadReportConfig, parseBookedDay } from "./config.ts";

describe("loadReportConfig", () => {
  it("uses defaults when the environment is empty", () => {
    expect(loadReportConfig({})).toEqual({ bookedBaseUrl: DEFAULT_BOOKED_BASE_URL, bookedDay: "01" });
  });

  it("reads and trims environment overrides", () => {
    expect(
      loadReportConfig({ BOOKED_BASE_URL: " https://reports.example.test/booked ", BOOKED_DAY: "7" }),
    ).toEqual({ bookedBaseUrl: "https://reports.example.test/booked", bookedDay: "7" });
  });

  it("treats blank values as unset", () => {
    expect(loadReportConfig({ BOOKED_BASE_URL: "  ", BOOKED_DAY: "" })).toEqual({
      bookedBaseUrl: DEFAULT_BOOKED_BASE_URL,
      bookedDay: "01",
    });
  });
});

describe("parseBookedDay", () => {
  it("rejects values that are not one or two digits", () => {
    expect(() => parseBookedDay("aa")).toThrow('Invalid booked-in report day: "aa". Expected one or two digits.');
    expect(() => parseBookedDay("123")).toThrow("Invalid booked-in report day");
  });
});
