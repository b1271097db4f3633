import { describe, expect, it } from "vitest";
import { cleanChargeText } from "./charge-clean.ts";

describe("cleanChargeText", () => {
  it("keeps plain charge text, normalizing its spacing", () => {
    expect(cleanChargeText("THEFT OF PROPERTY")).toBe("THEFT OF PROPERTY");
    expect(cleanChargeText("  THEFT   OF PROPERTY  ")).toBe("THEFT OF PROPERTY");
  });

  it("returns an empty string for boilerplate and blank input", () => {
    expect(cleanChargeText("")).toBe("");
    expect(cleanChargeText("BOOKING NO. DESCRIPTION")).toBe("");
    expect(cleanChargeText("Page: 2 of 9")).toBe("");
  });

  it("strips an embedded street address and everything after it", () => {
    expect(cleanChargeText("BURGLARY OF HABITATION 123 MAIN ST FORT WORTH TX 76102")).toBe(
      "BURGLARY OF HABITATION",
    );
  });

  it("strips a trailing city, state and postal code", () => {
    expect(cleanChargeText("THEFT FORT WORTH TX 76102")).toBe("THEFT");
    expect(cleanChargeText("THEFT HURST TX 76053-1234")).toBe("THEFT");
  });

  it("strips out-of-state addresses as well", () => {
    expect(cleanChargeText("DWI TULSA OK 74101")).toBe("DWI");
    expect(cleanChargeText("THEFT LA 71101")).toBe("THEFT");
    expect(cleanChargeText("RESISTING ARREST OK 74101 SEARCH")).toBe("RESISTING ARREST SEARCH");
  });

  it("strips a trailing bare state and postal code", () => {
    expect(cleanChargeText("THEFT TX 76102")).toBe("THEFT");
    expect(cleanChargeText("TX 76102")).toBe("");
  });

  it("drops a state and postal code caught in the middle of the text", () => {
    expect(cleanChargeText("EVADING ARREST TX 76102 DETENTION")).toBe("EVADING ARREST DETENTION");
  });

  it("rejects text that turns into boilerplate once the address is gone", () => {
    expect(cleanChargeText("BOOK TX 76102 IN DATE")).toBe("");
  });

  it("is idempotent", () => {
    const samples = [
      "THEFT OF PROPERTY",
      "BURGLARY OF HABITATION 123 MAIN ST FORT WORTH TX 76102",
      "THEFT FORT WORTH TX 76102",
      "EVADING ARREST TX 76102 DETENTION",
      "DWI TX 76102 ARLINGTON TX 76010",
      "POSS CS PG 1 <1G",
      "DWI TULSA OK 74101",
    ];
    for (const sample of samples) {
      const once = cleanChargeText(sample);
      expect(cleanChargeText(once)).toBe(once);
    }
  });

  it("never leaves a state followed by a postal code", () => {
    expect(cleanChargeText("DWI TX 76102 ARLINGTON TX 76010")).toBe("DWI");
    expect(cleanChargeText("FRAUD NM 87101 SHREVEPORT LA 71101")).toBe("FRAUD");
  });
});
