import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import * as XLSX from "xlsx";
import { MetadataUnusableError } from "../../errors";
import { buildEventIndex, loadEventIndex, mapColumns, toEventId } from "../../metadata/spreadsheet";

describe("toEventId", () => {
  it("keeps the integer form of float-like ids", () => {
    expect(toEventId(3001)).toBe("3001");
    expect(toEventId("3001.0")).toBe("3001");
    expect(toEventId(" 3002 ")).toBe("3002");
    expect(toEventId(null)).toBe("");
  });
});

describe("mapColumns", () => {
  it("matches headers regardless of case, spaces and underscores", () => {
    expect(mapColumns(["Event_ID", "Event Type", "Host Country", "Notes"])).toEqual({
      eventId: "Event_ID",
      eventType: "Event Type",
      country: "Host Country"
    });
  });
});

describe("buildEventIndex", () => {
  it("indexes rows by event id", () => {
    const index = buildEventIndex([
      { EventId: 3001, Category: "WTT Contender", Nation: "Tunisia" },
      { EventId: "3002.0", Category: "WTT Feeder", Nation: "" },
      { EventId: "", Category: "ignored", Nation: "" }
    ]);

    expect(index.size).toBe(2);
    expect(index.get("3001")).toEqual({ eventName: "", eventType: "WTT Contender", country: "Tunisia" });
    expect(index.get("3002")).toEqual({ eventName: "", eventType: "WTT Feeder", country: "" });
  });

  it("rejects sheets it cannot use", () => {
    expect(() => buildEventIndex([])).toThrow(MetadataUnusableError);
    expect(() => buildEventIndex([{ Type: "WTT Feeder" }])).toThrow("must contain an EventId column");
    expect(() => buildEventIndex([{ EventId: "" }])).toThrow("No valid rows");
  });
});

describe("loadEventIndex", () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("reads the first sheet of a workbook", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "events-"));
    tempDirs.push(dir);
    const file = path.join(dir, "events.xlsx");

    const workbook = XLSX.utils.book_new();
    const sheet = XLSX.utils.json_to_sheet([
      { EventId: 3001, EventName: "WTT Star Contender Goa", EventType: "Star Contender", Country: "India" }
    ]);
    XLSX.utils.book_append_sheet(workbook, sheet, "Events");
    fs.writeFileSync(file, XLSX.write(workbook, { type: "buffer", bookType: "xlsx" }));

    const index = loadEventIndex(file);
    expect(index.get("3001")).toEqual({
      eventName: "WTT Star Contender Goa",
      eventType: "Star Contender",
      country: "India"
    });
  });

  it("reports a missing file as unusable metadata", () => {
    expect(() => loadEventIndex(path.join(os.tmpdir(), "does-not-exist", "events.xlsx"))).toThrow(MetadataUnusableError);
  });
});
