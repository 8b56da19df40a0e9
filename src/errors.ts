export const EXIT_CODES = {
  ok: 0,
  fatal: 1,
  metadataUnusable: 2,
  eventMetadataMissing: 3,
  blockFailed: 4
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export class ReportJobError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = EXIT_CODES.fatal, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class ConfigurationError extends ReportJobError {
  constructor(message: string) {
    super(message, EXIT_CODES.fatal);
  }
}

export class DiscoveryError extends ReportJobError {
  constructor(message: string, cause?: unknown) {
    super(message, EXIT_CODES.fatal, { cause });
  }
}

export class PayloadUnavailableError extends ReportJobError {
  readonly eventId: string;

  readonly attempts: string[];

  constructor(eventId: string, attempts: string[] = []) {
    super(`No payload available for event ${eventId}`, EXIT_CODES.blockFailed);
    this.eventId = eventId;
    this.attempts = attempts;
  }
}

export class MetadataUnusableError extends ReportJobError {
  constructor(message: string, cause?: unknown) {
    super(message, EXIT_CODES.metadataUnusable, { cause });
  }
}

export class EventMetadataMissingError extends ReportJobError {
  readonly eventIds: string[];

  constructor(eventIds: string[], exitCode: ExitCode = EXIT_CODES.eventMetadataMissing) {
    super(`No event metadata for: ${eventIds.join(", ")}`, exitCode);
    this.eventIds = eventIds;
  }
}

export class NotificationRateLimitedError extends ReportJobError {
  constructor(message = "Notification daily cap reached (429)") {
    super(message, EXIT_CODES.ok);
  }
}

export class NotificationError extends ReportJobError {
  readonly status: number | null;

  constructor(message: string, status: number | null, cause?: unknown) {
    super(message, EXIT_CODES.fatal, { cause });
    this.status = status;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
