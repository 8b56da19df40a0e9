import axios, { type AxiosRequestConfig } from "axios";

export type JsonFetcher = (url: string, config?: AxiosRequestConfig) => Promise<unknown>;

export interface FallbackCandidate<T> {
  label: string;
  run: () => Promise<T | null | undefined>;
}

export interface FallbackFailure {
  label: string;
  error: unknown;
}

export interface FallbackResult<T> {
  label: string;
  value: T;
  failures: FallbackFailure[];
}

export interface FallbackHooks {
  onFailure?: (failure: FallbackFailure) => void;
  onEmpty?: (label: string) => void;
}

const SITE_ORIGIN = "https://www.worldtabletennis.com";

/**
 * Runs candidates one after another and returns the first non-empty value.
 * A candidate that throws or yields null/undefined is skipped; later candidates
 * are never started once one succeeds. Resolves to null when all are exhausted.
 */
export async function firstAvailable<T>(
  candidates: Array<FallbackCandidate<T>>,
  hooks: FallbackHooks = {}
): Promise<FallbackResult<T> | null> {
  const failures: FallbackFailure[] = [];
  for (const candidate of candidates) {
    try {
      const value = await candidate.run();
      if (value !== null && value !== undefined) {
        return { label: candidate.label, value, failures };
      }
      hooks.onEmpty?.(candidate.label);
    } catch (error) {
      const failure = { label: candidate.label, error };
      failures.push(failure);
      hooks.onFailure?.(failure);
    }
  }
  return null;
}

export function utcNowIsoMs(now: Date = new Date()): string {
  return now.toISOString();
}

export function requestHeaders(noCache = false): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/json, text/plain, */*",
    Origin: SITE_ORIGIN,
    Referer: `${SITE_ORIGIN}/`,
    "User-Agent": "Mozilla/5.0"
  };
  if (noCache) {
    headers["Cache-Control"] = "no-cache";
    headers.Pragma = "no-cache";
  }
  return headers;
}

export function httpStatusOf(error: unknown): number | null {
  if (axios.isAxiosError(error)) {
    return error.response?.status ?? null;
  }
  return null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

export async function fetchJson(url: string, config: AxiosRequestConfig = {}): Promise<unknown> {
  const response = await axios.request<unknown>({ url, method: "GET", ...config });
  return response.data;
}
