export type EventId = string;

export type RawPayload = unknown;

export interface MatchSide {
  name: string;
  nationCode: string;
}

export interface CanonicalMatch {
  subEventName: string;
  round: string;
  home: MatchSide;
  away: MatchSide;
  /** Home-side perspective, e.g. "3-1". */
  overallScore: string;
  gameScores: string;
  winnerName: string;
}

export interface EventHeader {
  displayText: string;
}

export interface EventMetadata {
  eventName: string;
  eventType: string;
  country: string;
}

export interface EventMetadataSource {
  get(eventId: EventId): EventMetadata | undefined;
  has(eventId: EventId): boolean;
  readonly size: number;
}

export type RoundLabelStyle = "short" | "long";
