import { describeRound } from "../matches/rounds";
import type { CanonicalMatch, EventHeader, MatchSide, RoundLabelStyle } from "../types";

const FLIPPABLE_SCORE = /^(\s*)(\d+)(\s*[-:]\s*)(\d+)(\s*)$/;

export interface NationFormatOptions {
  roundLabels?: RoundLabelStyle;
}

/**
 * Token-exact nation match: "IND/SGP" carries IND, "INDO" does not.
 */
export function hasNationToken(nationField: string, nationCode: string): boolean {
  const target = nationCode.trim().toUpperCase();
  if (!nationField || !target) return false;
  return nationField.trim().toUpperCase().split(/[/\s,-]+/).includes(target);
}

/** Swaps the two numbers of an "A-B" / "A:B" score and leaves anything else alone. */
export function flipScore(score: string): string {
  return score.replace(FLIPPABLE_SCORE, (_whole, lead: string, first: string, separator: string, second: string, tail: string) =>
    `${lead}${second}${separator}${first}${tail}`
  );
}

export function flipGameScores(gameScores: string): string {
  return gameScores
    .split(",")
    .map((piece) => flipScore(piece))
    .join(",");
}

export function involvesNation(match: CanonicalMatch, nationCode: string): boolean {
  return hasNationToken(match.home.nationCode, nationCode) || hasNationToken(match.away.nationCode, nationCode);
}

function describeOpponent(opponent: MatchSide): string {
  return opponent.name ? `${opponent.name} (${opponent.nationCode})` : `(${opponent.nationCode})`;
}

export function formatMatchLines(match: CanonicalMatch, nationCode: string, options: NationFormatOptions = {}): string[] {
  const round = describeRound(match.round, options.roundLabels ?? "short");
  const heading = `${match.subEventName} ${round}`.trim();

  const targetIsHome = hasNationToken(match.home.nationCode, nationCode);
  const target = targetIsHome ? match.home : match.away;
  const opponent = targetIsHome ? match.away : match.home;

  const opponentText = describeOpponent(opponent);
  let phrase: string;
  let overall = match.overallScore;
  let games = match.gameScores;
  if (match.winnerName && (match.winnerName === target.name || match.winnerName === opponent.name)) {
    phrase = match.winnerName === target.name ? `defeated ${opponentText} by` : `lost to ${opponentText} by`;
    // Scores are stored home-first; a decided match reads from the target side.
    if (!targetIsHome) {
      overall = flipScore(overall);
      games = flipGameScores(games);
    }
  } else {
    phrase = `vs ${opponentText}`;
  }

  return [heading, `${target.name} ${phrase} (${overall}) (${games})`];
}

export function formatNationalMatches(
  matches: CanonicalMatch[],
  nationCode: string,
  header: EventHeader,
  options: NationFormatOptions = {}
): string {
  const national = matches.filter((match) => involvesNation(match, nationCode));
  if (national.length === 0) {
    return [header.displayText, `(No ${nationCode.toUpperCase()} matches found)`].join("\n");
  }

  const blocks = national.map((match) => formatMatchLines(match, nationCode, options).join("\n"));
  return [header.displayText, blocks.join("\n\n")].join("\n");
}
