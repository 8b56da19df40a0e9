import { describe, expect, it, vi } from "vitest";
import { EventMetadataMissingError } from "../../errors";
import { headerTitle, resolveHeader } from "../../report/header";
import type { EventMetadata } from "../../types";
import type { JsonFetcher } from "../../utils";

const METADATA_URL = "https://metadata.test/event";

function spreadsheet(entries: Record<string, Partial<EventMetadata>>): Map<string, EventMetadata> {
  return new Map(
    Object.entries(entries).map(([eventId, metadata]) => [
      eventId,
      { eventName: "", eventType: "", country: "", ...metadata }
    ])
  );
}

describe("headerTitle", () => {
  it("prefers the event name, then type and country", () => {
    expect(headerTitle({ eventName: "WTT Star Contender Goa", eventType: "Star Contender", country: "India" })).toBe(
      "WTT Star Contender Goa"
    );
    expect(headerTitle({ eventName: "", eventType: "WTT Feeder", country: "" })).toBe("WTT Feeder");
    expect(headerTitle({ eventName: " ", eventType: "", country: "" })).toBeNull();
  });
});

describe("resolveHeader", () => {
  it("uses the spreadsheet first", async () => {
    const fetcher = vi.fn<JsonFetcher>();
    const header = await resolveHeader(
      "3001",
      { spreadsheet: spreadsheet({ "3001": { eventType: "WTT Contender", country: "Tunisia" } }), metadataUrl: METADATA_URL, fetcher },
      {}
    );

    expect(header.displayText).toBe("*WTT Contender | Tunisia*");
    expect(fetcher).not.toHaveBeenCalled();
  });

  it("appends the event id when asked to", async () => {
    const header = await resolveHeader(
      "3001",
      { spreadsheet: spreadsheet({ "3001": { eventName: "WTT Feeder Varazdin" } }) },
      { showEventId: true }
    );

    expect(header.displayText).toBe("*WTT Feeder Varazdin* (Event 3001)");
  });

  it("falls back to the metadata endpoint", async () => {
    const fetcher = vi.fn<JsonFetcher>(async () => ({ event: { EventType: "WTT Feeder", HostCountry: "Portugal" } }));

    const header = await resolveHeader("3002", { spreadsheet: spreadsheet({}), metadataUrl: METADATA_URL, fetcher });

    expect(header.displayText).toBe("*WTT Feeder | Portugal*");
    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(fetcher).toHaveBeenCalledWith(METADATA_URL, expect.objectContaining({ params: { EventId: "3002" } }));
  });

  it("uses the placeholder when every tier comes up empty", async () => {
    const fetcher = vi.fn<JsonFetcher>(async () => {
      throw new Error("socket hang up");
    });

    const header = await resolveHeader("3003", { metadataUrl: METADATA_URL, fetcher });
    expect(header.displayText).toBe("*Completed event*");
  });

  it("throws in strict mode instead of using the placeholder", async () => {
    await expect(resolveHeader("3004", { spreadsheet: spreadsheet({}) }, { strict: true })).rejects.toBeInstanceOf(
      EventMetadataMissingError
    );
  });
});
