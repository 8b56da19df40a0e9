import { describe, expect, it } from "vitest";
import { DIVIDER, assembleReport, placeholderBlock } from "../../report/assemble";

describe("assembleReport", () => {
  it("closes every block with the divider", () => {
    expect(DIVIDER).toHaveLength(60);
    expect(assembleReport(["*A*\nline", "*B*\nline"])).toBe(`*A*\nline\n${DIVIDER}\n*B*\nline\n${DIVIDER}`);
  });

  it("returns an empty message for no blocks", () => {
    expect(assembleReport([])).toBe("");
  });

  it("builds the unavailable placeholder", () => {
    expect(placeholderBlock("*Completed event*")).toBe("*Completed event*\n(Results unavailable)");
  });
});
