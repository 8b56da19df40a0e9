import { AxiosError, AxiosHeaders } from "axios";
import type { CanonicalMatch } from "../types";

export interface EntryOptions {
  subEventName?: string;
  description?: string;
  home?: { name: string; org: string };
  away?: { name: string; org: string };
  overall?: string;
  games?: string;
}

export function buildEntry(options: EntryOptions = {}): Record<string, unknown> {
  const home = options.home ?? { name: "A. Sharma / R. Das", org: "IND" };
  const away = options.away ?? { name: "L. Martin / P. Roux", org: "FRA" };
  return {
    match_card: {
      subEventName: options.subEventName ?? "Men's Doubles",
      subEventDescription: options.description ?? "Quarterfinal",
      competitiors: [
        { competitorType: "H", competitiorName: home.name, competitiorOrg: home.org },
        { competitorType: "A", competitiorName: away.name, competitiorOrg: away.org }
      ],
      resultOverallScores: options.overall ?? "3-1",
      resultsGameScores: options.games ?? "11-9,9-11,11-7,11-5"
    }
  };
}

export function buildMatch(overrides: Partial<CanonicalMatch> = {}): CanonicalMatch {
  return {
    subEventName: "Men's Doubles",
    round: "QF",
    home: { name: "A. Sharma / R. Das", nationCode: "IND" },
    away: { name: "L. Martin / P. Roux", nationCode: "FRA" },
    overallScore: "3-1",
    gameScores: "11-9,9-11,11-7,11-5",
    winnerName: "A. Sharma / R. Das",
    ...overrides
  };
}

export function httpError(status: number): AxiosError {
  return new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_REQUEST", undefined, undefined, {
    status,
    statusText: "",
    data: null,
    headers: {},
    config: { headers: new AxiosHeaders() }
  });
}
