import type { EventId, EventMetadata } from "../types";
import { fetchJson, isRecord, readString, requestHeaders, type JsonFetcher } from "../utils";

const METADATA_TIMEOUT_MS = 30_000;

const NAME_KEYS = ["eventName", "EventName", "name", "Name", "title", "Title"];
const TYPE_KEYS = ["eventType", "EventType", "type", "Type", "category", "Category"];
const COUNTRY_KEYS = ["country", "Country", "hostCountry", "HostCountry", "nation", "Nation"];

function pick(record: Record<string, unknown>, keys: string[]): string {
  for (const key of keys) {
    const value = readString(record, key).trim();
    if (value) return value;
  }
  return "";
}

/** Reads name/type/country from an event-metadata body, unwrapping an `event` envelope. */
export function extractEventMetadata(body: unknown): EventMetadata | null {
  if (!isRecord(body)) return null;
  const record = isRecord(body.event) ? body.event : body;
  const metadata: EventMetadata = {
    eventName: pick(record, NAME_KEYS),
    eventType: pick(record, TYPE_KEYS),
    country: pick(record, COUNTRY_KEYS)
  };
  if (!metadata.eventName && !metadata.eventType && !metadata.country) return null;
  return metadata;
}

export async function fetchEventMetadata(
  url: string,
  eventId: EventId,
  fetcher: JsonFetcher = fetchJson
): Promise<EventMetadata | null> {
  const body = await fetcher(url, {
    params: { EventId: eventId },
    headers: requestHeaders(),
    timeout: METADATA_TIMEOUT_MS
  });
  return extractEventMetadata(body);
}
