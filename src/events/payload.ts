import { PayloadUnavailableError, describeError } from "../errors";
import { createLogger } from "../logger";
import type { EventId, RawPayload } from "../types";
import { fetchJson, firstAvailable, httpStatusOf, requestHeaders, type FallbackCandidate, type JsonFetcher } from "../utils";

const log = createLogger("payload");

const PAYLOAD_TIMEOUT_MS = 30_000;

export type PayloadTier = "static" | "live";

export const DEFAULT_TAKES: readonly number[] = [200, 100, 50, 20, 10];
export const DEFAULT_TIERS: readonly PayloadTier[] = ["static", "live"];

export interface PayloadSourceOptions {
  staticRoot: string;
  liveApi: string;
  /** Tried in order; every tier walks the full take list before the next tier starts. */
  tiers?: readonly PayloadTier[];
  takes?: readonly number[];
  fetcher?: JsonFetcher;
}

/** A 200 response whose body did not parse to a JSON object or array counts as a failed source. */
function requireJsonBody(body: unknown): RawPayload {
  if (body === null || body === undefined) return body;
  if (typeof body !== "object") {
    throw new Error(`response body is not JSON (${typeof body})`);
  }
  return body;
}

export function staticSnapshotUrl(staticRoot: string, eventId: EventId, take: number): string {
  return `${staticRoot}/${eventId}/${eventId}_take_${take}_official_results.json`;
}

function buildCandidate(
  tier: PayloadTier,
  take: number,
  eventId: EventId,
  options: PayloadSourceOptions,
  fetcher: JsonFetcher
): FallbackCandidate<RawPayload> {
  if (tier === "static") {
    return {
      label: `static take=${take}`,
      run: async () =>
        requireJsonBody(
          await fetcher(staticSnapshotUrl(options.staticRoot, eventId, take), {
            headers: requestHeaders(true),
            timeout: PAYLOAD_TIMEOUT_MS
          })
        )
    };
  }
  return {
    label: `live take=${take}`,
    run: async () =>
      requireJsonBody(
        await fetcher(options.liveApi, {
          params: {
            EventId: eventId,
            include_match_card: "true",
            take: String(take),
            languageCode: "en"
          },
          headers: requestHeaders(),
          timeout: PAYLOAD_TIMEOUT_MS
        })
      )
  };
}

export async function resolvePayload(eventId: EventId, options: PayloadSourceOptions): Promise<RawPayload> {
  const fetcher = options.fetcher ?? fetchJson;
  const tiers = options.tiers ?? DEFAULT_TIERS;
  const takes = options.takes ?? DEFAULT_TAKES;

  const candidates = tiers.flatMap((tier) => takes.map((take) => buildCandidate(tier, take, eventId, options, fetcher)));

  const result = await firstAvailable(candidates, {
    onFailure: ({ label, error }) => {
      if (httpStatusOf(error) === 404) {
        log.debug(`Event ${eventId}: ${label} not published`);
      } else {
        log.debug(`Event ${eventId}: ${label} failed: ${describeError(error)}`);
      }
    },
    onEmpty: (label) => log.debug(`Event ${eventId}: ${label} returned an empty body`)
  });

  if (!result) {
    throw new PayloadUnavailableError(
      eventId,
      candidates.map((candidate) => candidate.label)
    );
  }

  log.info(`Event ${eventId}: payload from ${result.label}`);
  return result.value;
}
