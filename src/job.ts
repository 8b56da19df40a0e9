import type { AppConfig } from "./config/env";
import { discoverLatestEventIds } from "./events/discovery";
import { resolvePayload } from "./events/payload";
import {
  EXIT_CODES,
  EventMetadataMissingError,
  MetadataUnusableError,
  NotificationRateLimitedError,
  ReportJobError,
  describeError,
  type ExitCode
} from "./errors";
import { createLogger } from "./logger";
import { normalizeMatches } from "./matches/normalization";
import { loadEventIndex, type EventIndex } from "./metadata/spreadsheet";
import type { Notifier } from "./notify/twilio";
import { assembleReport, placeholderBlock } from "./report/assemble";
import { PLACEHOLDER_TITLE, renderHeader, resolveHeader } from "./report/header";
import { formatNationalMatches } from "./report/nation";
import type { EventHeader, EventId, EventMetadataSource } from "./types";
import type { JsonFetcher } from "./utils";

const log = createLogger("job");

export const JOB_VERSION = "nation-digest-v8";

export interface JobDependencies {
  config: AppConfig;
  notifier: Notifier;
  fetcher?: JsonFetcher;
  loadMetadata?: (workbookPath: string) => EventIndex;
  /** Receives the message preview; defaults to stdout. */
  preview?: (message: string) => void;
}

export interface JobOutcome {
  exitCode: ExitCode;
  message: string | null;
  messageId: string | null;
  eventIds: EventId[];
}

function loadSpreadsheet(deps: JobDependencies): EventMetadataSource | undefined {
  const { config } = deps;
  const workbook = config.eventsWorkbook;
  if (!workbook) {
    if (config.policy.requireMetadata) {
      throw new MetadataUnusableError("Event spreadsheet required but EVENTS_XLSX is not set");
    }
    return undefined;
  }

  const load = deps.loadMetadata ?? loadEventIndex;
  try {
    return load(workbook);
  } catch (error) {
    if (config.policy.requireMetadata) {
      throw error instanceof MetadataUnusableError ? error : new MetadataUnusableError(describeError(error), error);
    }
    log.warn(`Event spreadsheet unusable, continuing without it: ${describeError(error)}`);
    return undefined;
  }
}

async function buildEventHeader(eventId: EventId, spreadsheet: EventMetadataSource | undefined, deps: JobDependencies): Promise<EventHeader> {
  const { config, fetcher } = deps;
  return resolveHeader(
    eventId,
    { spreadsheet, metadataUrl: config.eventMetadataUrl, fetcher },
    { showEventId: config.showEventId, strict: config.policy.requireEventMetadata }
  );
}

async function buildMatchBlock(eventId: EventId, header: EventHeader, deps: JobDependencies): Promise<string> {
  const { config, fetcher } = deps;
  const payload = await resolvePayload(eventId, {
    staticRoot: config.endpoints.staticRoot,
    liveApi: config.endpoints.liveApi,
    tiers: config.payload.tiers,
    takes: config.payload.takes,
    fetcher
  });
  const matches = normalizeMatches(payload);
  log.info(`Event ${eventId}: ${matches.length} matches parsed`);
  return formatNationalMatches(matches, config.targetNation, header, { roundLabels: config.roundLabels });
}

async function buildReport(eventIds: EventId[], spreadsheet: EventMetadataSource | undefined, deps: JobDependencies): Promise<string> {
  const { config } = deps;
  const blocks: string[] = [];
  for (const eventId of eventIds) {
    let header: EventHeader | null = null;
    try {
      header = await buildEventHeader(eventId, spreadsheet, deps);
      blocks.push(await buildMatchBlock(eventId, header, deps));
    } catch (error) {
      log.error(`Failed building block for ${eventId}: ${describeError(error)}`);
      if (config.policy.abortOnBlockError) {
        throw new ReportJobError(`Failed building block for ${eventId}: ${describeError(error)}`, EXIT_CODES.blockFailed, {
          cause: error
        });
      }
      const fallback = header ?? renderHeader(PLACEHOLDER_TITLE, eventId, config.showEventId);
      blocks.push(placeholderBlock(fallback.displayText));
    }
  }
  return assembleReport(blocks);
}

async function execute(deps: JobDependencies): Promise<JobOutcome> {
  const { config, notifier } = deps;
  log.info(`JOB_VERSION: ${JOB_VERSION} (mode=${config.policy.mode}, nation=${config.targetNation})`);

  const spreadsheet = loadSpreadsheet(deps);

  const eventIds = await discoverLatestEventIds({ appSettingUrl: config.endpoints.appSetting, fetcher: deps.fetcher });
  if (eventIds.length === 0) {
    log.info("No completed events.");
    return { exitCode: EXIT_CODES.ok, message: null, messageId: null, eventIds };
  }

  if (config.policy.requireEventMetadata) {
    const missing = eventIds.filter((eventId) => !spreadsheet?.has(eventId));
    if (missing.length > 0) {
      throw new EventMetadataMissingError(missing);
    }
  }

  const message = await buildReport(eventIds, spreadsheet, deps);
  const preview = deps.preview ?? ((text: string) => console.log(`==== MESSAGE PREVIEW ====\n${text}\n=========================`));
  preview(message);

  if (config.dryRun) {
    log.info("DRY_RUN set, message not sent");
    return { exitCode: EXIT_CODES.ok, message, messageId: null, eventIds };
  }

  try {
    const messageId = await notifier.send(message);
    log.info(`Sent message ${messageId}`);
    return { exitCode: EXIT_CODES.ok, message, messageId, eventIds };
  } catch (error) {
    if (error instanceof NotificationRateLimitedError) {
      log.warn(`${error.message}; skipping send.`);
      return { exitCode: EXIT_CODES.ok, message, messageId: null, eventIds };
    }
    throw error;
  }
}

/** Runs one digest and maps every failure to its exit code. Never rejects. */
export async function runReportJob(deps: JobDependencies): Promise<JobOutcome> {
  try {
    return await execute(deps);
  } catch (error) {
    const exitCode = error instanceof ReportJobError ? error.exitCode : EXIT_CODES.fatal;
    log.error(`ERROR: ${describeError(error)}`);
    return { exitCode, message: null, messageId: null, eventIds: [] };
  }
}
