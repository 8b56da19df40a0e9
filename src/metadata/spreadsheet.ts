import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { MetadataUnusableError, describeError } from "../errors";
import { createLogger } from "../logger";
import type { EventId, EventMetadata } from "../types";

const log = createLogger("spreadsheet");

type Column = "eventId" | "eventName" | "eventType" | "country";

const COLUMNS: Column[] = ["eventId", "eventName", "eventType", "country"];

const COLUMN_ALIASES: Record<Column, string[]> = {
  eventId: ["eventid", "id"],
  eventName: ["eventname", "name", "title"],
  eventType: ["eventtype", "type", "eventcategory", "category"],
  country: ["country", "hostcountry", "nation"]
};

export type EventIndex = Map<EventId, EventMetadata>;

export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[\s_]+/g, "");
}

/** Spreadsheet ids often come back as floats ("3001.0"); keep the integer form. */
export function toEventId(value: unknown): EventId {
  if (typeof value === "number") {
    return Number.isInteger(value) ? String(value) : String(value).trim();
  }
  const text = String(value ?? "").trim();
  const floatLike = /^(\d+)\.0+$/.exec(text);
  return floatLike ? floatLike[1] : text;
}

function cellText(row: Record<string, unknown>, column: string | undefined): string {
  if (!column) return "";
  const value = row[column];
  if (value === null || value === undefined) return "";
  return String(value).trim();
}

export function mapColumns(headers: string[]): Partial<Record<Column, string>> {
  const mapping: Partial<Record<Column, string>> = {};
  for (const header of headers) {
    const normalized = normalizeHeader(header);
    for (const column of COLUMNS) {
      if (COLUMN_ALIASES[column].includes(normalized)) {
        mapping[column] = header;
      }
    }
  }
  return mapping;
}

export function buildEventIndex(rows: Array<Record<string, unknown>>): EventIndex {
  if (rows.length === 0) {
    throw new MetadataUnusableError("Event spreadsheet is empty");
  }

  const headers = Array.from(new Set(rows.flatMap((row) => Object.keys(row))));
  const columns = mapColumns(headers);
  const idColumn = columns.eventId;
  if (!idColumn) {
    throw new MetadataUnusableError("Event spreadsheet must contain an EventId column");
  }

  const index: EventIndex = new Map();
  for (const row of rows) {
    const eventId = toEventId(row[idColumn]);
    if (!eventId) continue;
    index.set(eventId, {
      eventName: cellText(row, columns.eventName),
      eventType: cellText(row, columns.eventType),
      country: cellText(row, columns.country)
    });
  }

  if (index.size === 0) {
    throw new MetadataUnusableError("No valid rows found in event spreadsheet");
  }
  return index;
}

export function loadEventIndex(workbookPath: string): EventIndex {
  const resolved = path.resolve(workbookPath);
  if (!fs.existsSync(resolved)) {
    throw new MetadataUnusableError(`Event spreadsheet not found: ${resolved}`);
  }

  let rows: Array<Record<string, unknown>>;
  try {
    const workbook = XLSX.read(fs.readFileSync(resolved), { type: "buffer" });
    const firstSheet = workbook.SheetNames[0];
    const sheet = firstSheet ? workbook.Sheets[firstSheet] : undefined;
    rows = sheet ? XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: "" }) : [];
  } catch (error) {
    throw new MetadataUnusableError(`Event spreadsheet could not be read: ${describeError(error)}`, error);
  }

  const index = buildEventIndex(rows);
  log.info(`Loaded ${index.size} events from ${path.basename(resolved)}`);
  return index;
}
