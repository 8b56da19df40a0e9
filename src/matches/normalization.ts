import type { CanonicalMatch, MatchSide, RawPayload } from "../types";
import { isRecord, readString } from "../utils";
import { classifyRound } from "./rounds";

const SCORE_PATTERN = /^\s*(\d+)\s*[-:]\s*(\d+)\s*$/;

const EMPTY_SIDE: MatchSide = { name: "", nationCode: "" };

export function extractMatchEntries(payload: RawPayload): unknown[] {
  if (Array.isArray(payload)) return payload;
  if (isRecord(payload) && Array.isArray(payload.matches)) return payload.matches;
  return [];
}

/** Parses a strict "A-B" / "A:B" score; anything else is null. */
export function parseScore(score: string): [number, number] | null {
  const match = SCORE_PATTERN.exec(score);
  if (!match) return null;
  return [Number(match[1]), Number(match[2])];
}

export function determineWinner(overallScore: string, home: MatchSide, away: MatchSide): string {
  const parsed = parseScore(overallScore);
  if (!parsed) return "";
  const [homeGames, awayGames] = parsed;
  if (homeGames > awayGames) return home.name;
  if (awayGames > homeGames) return away.name;
  return "";
}

function firstNonEmpty(record: Record<string, unknown>, keys: string[]): string {
  for (const key of keys) {
    const value = readString(record, key);
    if (value.length > 0) return value;
  }
  return "";
}

function readSides(card: Record<string, unknown>): { home: MatchSide; away: MatchSide } {
  let home = EMPTY_SIDE;
  let away = EMPTY_SIDE;
  // The backend spells the field "competitiors".
  const competitors = Array.isArray(card.competitiors) ? card.competitiors : [];
  for (const competitor of competitors) {
    if (!isRecord(competitor)) continue;
    const side: MatchSide = {
      name: readString(competitor, "competitiorName"),
      nationCode: readString(competitor, "competitiorOrg").trim()
    };
    if (competitor.competitorType === "H") {
      home = side;
    } else if (competitor.competitorType === "A") {
      away = side;
    }
  }
  return { home, away };
}

export function normalizeMatch(entry: unknown): CanonicalMatch {
  const record = isRecord(entry) ? entry : {};
  const card = isRecord(record.match_card) ? record.match_card : {};

  const { home, away } = readSides(card);
  const overallScore = firstNonEmpty(card, ["resultOverallScores", "overallScores"]);

  return {
    subEventName: firstNonEmpty(card, ["subEventName"]) || readString(record, "subEventType"),
    round: classifyRound(readString(card, "subEventDescription")),
    home,
    away,
    overallScore,
    gameScores: firstNonEmpty(card, ["resultsGameScores", "gameScores"]),
    winnerName: determineWinner(overallScore, home, away)
  };
}

export function normalizeMatches(payload: RawPayload): CanonicalMatch[] {
  return extractMatchEntries(payload).map((entry) => normalizeMatch(entry));
}
