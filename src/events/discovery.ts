import { z } from "zod";
import { DiscoveryError, describeError } from "../errors";
import { createLogger } from "../logger";
import type { EventId } from "../types";
import { fetchJson, requestHeaders, utcNowIsoMs, type JsonFetcher } from "../utils";

const log = createLogger("discovery");

const DISCOVERY_TIMEOUT_MS = 20_000;

const AppSettingSchema = z.object({
  value: z.union([z.string(), z.number()]).nullish()
});

export interface DiscoveryOptions {
  appSettingUrl: string;
  fetcher?: JsonFetcher;
  now?: () => Date;
}

/**
 * Turns the comma-separated app-setting value into event ids: non-digits are
 * stripped from every token, empty tokens dropped, first occurrence kept.
 */
export function parseEventIds(raw: string): EventId[] {
  const ids: EventId[] = [];
  const seen = new Set<EventId>();
  for (const part of raw.split(",")) {
    const eventId = part.replace(/\D/g, "");
    if (eventId.length === 0 || seen.has(eventId)) continue;
    seen.add(eventId);
    ids.push(eventId);
  }
  return ids;
}

export async function discoverLatestEventIds(options: DiscoveryOptions): Promise<EventId[]> {
  const fetcher = options.fetcher ?? fetchJson;
  const now = options.now ?? (() => new Date());

  let body: unknown;
  try {
    body = await fetcher(options.appSettingUrl, {
      params: { qc: utcNowIsoMs(now()) },
      headers: requestHeaders(),
      timeout: DISCOVERY_TIMEOUT_MS
    });
  } catch (error) {
    throw new DiscoveryError(`Event discovery request failed: ${describeError(error)}`, error);
  }

  const parsed = AppSettingSchema.safeParse(body);
  if (!parsed.success) {
    throw new DiscoveryError("Event discovery response is not an app-setting object", parsed.error);
  }

  const raw = String(parsed.data.value ?? "").trim();
  const ids = parseEventIds(raw);
  log.info(`Latest completed events: ${ids.length > 0 ? ids.join(", ") : "none"}`);
  return ids;
}
