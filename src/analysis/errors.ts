export type ParseFailureReason = "MALFORMED" | "BAD_TIMESTAMP";

/**
 * A log line that could not be turned into a LogEvent. Returned by the
 * parser rather than thrown; the runner counts and skips these lines.
 */
export class LogParseError extends Error {
  readonly reason: ParseFailureReason;
  readonly lineNumber: number | null;

  constructor(reason: ParseFailureReason, message: string, lineNumber: number | null = null) {
    super(lineNumber === null ? message : `Line ${lineNumber}: ${message}`);
    this.name = "LogParseError";
    this.reason = reason;
    this.lineNumber = lineNumber;
  }
}

export type ConfigErrorCode = "INVALID_RULE" | "INVALID_CONFIG";

/** Fatal: the rule set cannot be loaded, so no detection runs. */
export class ConfigError extends Error {
  readonly code: ConfigErrorCode;
  readonly ruleId: string | null;

  constructor(code: ConfigErrorCode, message: string, ruleId: string | null = null) {
    super(ruleId === null ? message : `Rule "${ruleId}": ${message}`);
    this.name = "ConfigError";
    this.code = code;
    this.ruleId = ruleId;
  }
}

/** Reported (never thrown) when a run stops on its abort signal. */
export class CancelledEarlyError extends Error {
  readonly eventsProcessed: number;

  constructor(eventsProcessed: number) {
    super(`Detection cancelled after ${eventsProcessed} event(s)`);
    this.name = "CancelledEarlyError";
    this.eventsProcessed = eventsProcessed;
  }
}
