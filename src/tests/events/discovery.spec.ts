import { describe, expect, it, vi } from "vitest";
import { DiscoveryError } from "../../errors";
import { discoverLatestEventIds, parseEventIds } from "../../events/discovery";
import type { JsonFetcher } from "../../utils";

const APP_SETTING_URL = "https://settings.test/app";

describe("parseEventIds", () => {
  it("strips noise and keeps the first occurrence", () => {
    expect(parseEventIds("101,102,101, 103")).toEqual(["101", "102", "103"]);
    expect(parseEventIds("WTT-104, x105 ,,")).toEqual(["104", "105"]);
    expect(parseEventIds("")).toEqual([]);
  });
});

describe("discoverLatestEventIds", () => {
  it("sends a cache-busting timestamp and parses the value", async () => {
    const fetcher = vi.fn<JsonFetcher>(async () => ({ value: "101,102,101, 103" }));

    const ids = await discoverLatestEventIds({
      appSettingUrl: APP_SETTING_URL,
      fetcher,
      now: () => new Date("2025-03-01T10:00:00.000Z")
    });

    expect(ids).toEqual(["101", "102", "103"]);
    expect(fetcher).toHaveBeenCalledWith(
      APP_SETTING_URL,
      expect.objectContaining({ params: { qc: "2025-03-01T10:00:00.000Z" }, timeout: 20_000 })
    );
  });

  it("accepts a numeric value and a missing value", async () => {
    expect(await discoverLatestEventIds({ appSettingUrl: APP_SETTING_URL, fetcher: async () => ({ value: 3001 }) })).toEqual([
      "3001"
    ]);
    expect(await discoverLatestEventIds({ appSettingUrl: APP_SETTING_URL, fetcher: async () => ({}) })).toEqual([]);
  });

  it("wraps network failures", async () => {
    const fetcher: JsonFetcher = async () => {
      throw new Error("ECONNRESET");
    };

    await expect(discoverLatestEventIds({ appSettingUrl: APP_SETTING_URL, fetcher })).rejects.toThrow(DiscoveryError);
  });

  it("rejects bodies of the wrong shape", async () => {
    await expect(
      discoverLatestEventIds({ appSettingUrl: APP_SETTING_URL, fetcher: async () => ["3001"] })
    ).rejects.toBeInstanceOf(DiscoveryError);
    await expect(
      discoverLatestEventIds({ appSettingUrl: APP_SETTING_URL, fetcher: async () => ({ value: { ids: [1] } }) })
    ).rejects.toBeInstanceOf(DiscoveryError);
  });
});
