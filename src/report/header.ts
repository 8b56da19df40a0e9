import { EventMetadataMissingError, EXIT_CODES, describeError } from "../errors";
import { createLogger } from "../logger";
import { fetchEventMetadata } from "../metadata/event-api";
import type { EventHeader, EventId, EventMetadata, EventMetadataSource } from "../types";
import { firstAvailable, type FallbackCandidate, type JsonFetcher } from "../utils";

const log = createLogger("header");

export const PLACEHOLDER_TITLE = "Completed event";

export interface HeaderSources {
  spreadsheet?: EventMetadataSource;
  /** Event-metadata endpoint queried with ?EventId= when the spreadsheet has nothing. */
  metadataUrl?: string;
  fetcher?: JsonFetcher;
}

export interface HeaderOptions {
  showEventId?: boolean;
  /** Throw instead of falling back to the placeholder. */
  strict?: boolean;
}

export function headerTitle(metadata: EventMetadata): string | null {
  const name = metadata.eventName.trim();
  if (name) return name;
  const parts = [metadata.eventType.trim(), metadata.country.trim()].filter((part) => part.length > 0);
  return parts.length > 0 ? parts.join(" | ") : null;
}

export function renderHeader(title: string, eventId: EventId, showEventId = false): EventHeader {
  const suffix = showEventId ? ` (Event ${eventId})` : "";
  return { displayText: `*${title}*${suffix}` };
}

export async function resolveHeader(
  eventId: EventId,
  sources: HeaderSources,
  options: HeaderOptions = {}
): Promise<EventHeader> {
  const tiers: Array<FallbackCandidate<string>> = [];

  const { spreadsheet, metadataUrl } = sources;
  if (spreadsheet) {
    tiers.push({
      label: "spreadsheet",
      run: async () => {
        const metadata = spreadsheet.get(eventId);
        return metadata ? headerTitle(metadata) : null;
      }
    });
  }
  if (metadataUrl) {
    tiers.push({
      label: "metadata api",
      run: async () => {
        const metadata = await fetchEventMetadata(metadataUrl, eventId, sources.fetcher);
        return metadata ? headerTitle(metadata) : null;
      }
    });
  }

  const result = await firstAvailable(tiers, {
    onFailure: ({ label, error }) => log.warn(`Event ${eventId}: ${label} lookup failed: ${describeError(error)}`)
  });

  if (result) {
    log.debug(`Event ${eventId}: header from ${result.label}`);
    return renderHeader(result.value, eventId, options.showEventId);
  }

  if (options.strict) {
    throw new EventMetadataMissingError([eventId], EXIT_CODES.blockFailed);
  }

  log.warn(`Event ${eventId}: no metadata, using placeholder header`);
  return renderHeader(PLACEHOLDER_TITLE, eventId, options.showEventId);
}
