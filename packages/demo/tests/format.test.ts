import { describe, it, expect } from "vitest";
import { LABEL_WIDTH, labelCell } from "../src/format.js";

describe("labelCell", () => {
  it("pads short labels to the column", () => {
    expect(labelCell("Payee")).toBe(`Payee${" ".repeat(13)}`);
    expect(labelCell("Payee")).toHaveLength(LABEL_WIDTH);
  });

  it("keeps a gap after the longest walkthrough label", () => {
    expect(labelCell("Merchant balance")).toBe("Merchant balance  ");
  });

  it("keeps a gap after a label wider than the column", () => {
    expect(labelCell("Authorization window")).toBe("Authorization window  ");
  });
});
