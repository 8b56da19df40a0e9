import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../errors";
import { LOG_LEVELS } from "../logger";
import type { PayloadTier } from "../events/payload";

export const DEFAULT_APPSETTING_URL =
  "https://wtt-website-api-prod-3-frontdoor-bddnb2haduafdze9.a01.azurefd.net/api/cms/GetAppSetting/completed_results_page_event_id";
export const DEFAULT_STATIC_ROOT =
  "https://wtt-web-frontdoor-withoutcache-cqakg0andqf5hchn.a01.azurefd.net/websitestaticapifiles";
export const DEFAULT_LIVE_API_URL =
  "https://wtt-website-live-events-api-prod-cmfzgabgbzhphabb.eastasia-01.azurewebsites.net/api/cms/GetOfficialResult";

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => value === "true" || value === "1" || value === "yes");

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(",")
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
    );

const EnvSchema = z.object({
  TARGET_NATION: z
    .string()
    .default("IND")
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.string().regex(/^[A-Z]{2,4}$/, "must be a 2-4 letter nation code")),
  REPORT_MODE: z.enum(["lenient", "strict"]).default("lenient"),
  REQUIRE_METADATA: booleanFlag.optional(),
  REQUIRE_EVENT_METADATA: booleanFlag.optional(),
  ABORT_ON_BLOCK_ERROR: booleanFlag.optional(),
  SHOW_EVENT_ID: booleanFlag.default("false"),
  ROUND_LABELS: z.enum(["short", "long"]).default("short"),
  DRY_RUN: booleanFlag.default("false"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  EVENTS_XLSX: optionalText,
  EVENT_METADATA_URL: optionalText.pipe(z.string().url().optional()),
  APPSETTING_URL: z.string().url().default(DEFAULT_APPSETTING_URL),
  STATIC_ROOT: z.string().url().default(DEFAULT_STATIC_ROOT),
  LIVE_API_URL: z.string().url().default(DEFAULT_LIVE_API_URL),
  PAYLOAD_TAKES: commaList("200,100,50,20,10").pipe(
    z.array(z.coerce.number().int().positive()).min(1, "needs at least one page size")
  ),
  PAYLOAD_TIERS: commaList("static,live").pipe(z.array(z.enum(["static", "live"])).min(1)),
  TWILIO_ACCOUNT_SID: optionalText,
  TWILIO_AUTH_TOKEN: optionalText,
  TWILIO_API_KEY_SID: optionalText,
  TWILIO_API_KEY_SECRET: optionalText,
  TWILIO_WHATSAPP_FROM: optionalText,
  WHATSAPP_TO: optionalText
});

export type RawEnv = Record<string, string | undefined>;

export interface TwilioSettings {
  accountSid?: string;
  authToken?: string;
  apiKeySid?: string;
  apiKeySecret?: string;
  from?: string;
  to?: string;
}

export interface ReportPolicy {
  mode: "lenient" | "strict";
  /** Spreadsheet must load; otherwise exit 2. */
  requireMetadata: boolean;
  /** Every discovered id must be in the spreadsheet; otherwise exit 3. */
  requireEventMetadata: boolean;
  /** A failing event block aborts with exit 4 instead of a placeholder block. */
  abortOnBlockError: boolean;
}

export interface AppConfig {
  targetNation: string;
  policy: ReportPolicy;
  showEventId: boolean;
  roundLabels: "short" | "long";
  dryRun: boolean;
  logLevel: (typeof LOG_LEVELS)[number];
  eventsWorkbook?: string;
  eventMetadataUrl?: string;
  endpoints: {
    appSetting: string;
    staticRoot: string;
    liveApi: string;
  };
  payload: {
    tiers: PayloadTier[];
    takes: number[];
  };
  twilio: TwilioSettings;
}

export function loadDotenv(dir: string = process.cwd()): void {
  // Variables already present (CI secrets) win over the file.
  dotenv.config({ path: path.join(dir, ".env"), override: false });
}

export function parseConfig(env: RawEnv): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`);
  }

  const parsed = result.data;
  const strict = parsed.REPORT_MODE === "strict";

  return {
    targetNation: parsed.TARGET_NATION,
    policy: {
      mode: parsed.REPORT_MODE,
      requireMetadata: parsed.REQUIRE_METADATA ?? strict,
      requireEventMetadata: parsed.REQUIRE_EVENT_METADATA ?? strict,
      abortOnBlockError: parsed.ABORT_ON_BLOCK_ERROR ?? strict
    },
    showEventId: parsed.SHOW_EVENT_ID,
    roundLabels: parsed.ROUND_LABELS,
    dryRun: parsed.DRY_RUN,
    logLevel: parsed.LOG_LEVEL,
    eventsWorkbook: parsed.EVENTS_XLSX ?? (strict ? "TT_Events_2021-2025.xlsx" : undefined),
    eventMetadataUrl: parsed.EVENT_METADATA_URL,
    endpoints: {
      appSetting: parsed.APPSETTING_URL,
      staticRoot: parsed.STATIC_ROOT.replace(/\/+$/, ""),
      liveApi: parsed.LIVE_API_URL
    },
    payload: {
      tiers: parsed.PAYLOAD_TIERS,
      takes: parsed.PAYLOAD_TAKES
    },
    twilio: {
      accountSid: parsed.TWILIO_ACCOUNT_SID,
      authToken: parsed.TWILIO_AUTH_TOKEN,
      apiKeySid: parsed.TWILIO_API_KEY_SID,
      apiKeySecret: parsed.TWILIO_API_KEY_SECRET,
      from: parsed.TWILIO_WHATSAPP_FROM,
      to: parsed.WHATSAPP_TO
    }
  };
}
