import type { FrequencyRule, LogEvent, PatternRule, Severity } from "@/analysis/types";

/** 2023-10-10 13:00:00 UTC */
export const BASE_TIME = Date.UTC(2023, 9, 10, 13, 0, 0);

/** BASE_TIME plus `seconds` */
export function at(seconds: number): number {
  return BASE_TIME + seconds * 1000;
}

export function makeEvent(overrides: Partial<LogEvent> = {}): LogEvent {
  return {
    timestamp: BASE_TIME,
    sourceAddress: "10.0.0.1",
    remoteUser: null,
    method: "GET",
    path: "/",
    query: "",
    protocol: "HTTP/1.1",
    statusCode: 200,
    bodyBytesSent: 512,
    referer: null,
    userAgent: "Mozilla/5.0",
    raw: "test line",
    lineNumber: null,
    ...overrides,
  };
}

export function failedLogin(seconds: number, sourceAddress = "10.0.0.1"): LogEvent {
  return makeEvent({
    timestamp: at(seconds),
    sourceAddress,
    method: "POST",
    path: "/login",
    statusCode: 401,
  });
}

export function bruteForceRule(threshold: number, windowSeconds: number): FrequencyRule {
  return {
    id: "bf-test",
    kind: "BRUTE_FORCE",
    severity: "HIGH",
    description: null,
    mitreTactic: null,
    mitreTechnique: null,
    threshold,
    windowMs: windowSeconds * 1000,
    failureStatuses: new Set([401, 403]),
  };
}

export function patternRule(
  id: string,
  patterns: Array<[string, RegExp]>,
  kind: PatternRule["kind"] = "SQL_INJECTION",
  severity: Severity = "HIGH"
): PatternRule {
  return {
    id,
    kind,
    severity,
    description: null,
    mitreTactic: "Initial Access",
    mitreTechnique: "T1190 - Exploit Public-Facing Application",
    patterns: patterns.map(([patternId, regex]) => ({ id: patternId, regex, source: regex.source })),
  };
}

/**
 * Build a combined-format access-log line. `time` is the text between the
 * brackets.
 */
export function combinedLine(opts: {
  ip?: string;
  time?: string;
  request?: string;
  status?: number;
  userAgent?: string;
} = {}): string {
  const {
    ip = "10.0.0.1",
    time = "10/Oct/2023:13:55:36 +0000",
    request = "GET / HTTP/1.1",
    status = 200,
    userAgent = "Mozilla/5.0",
  } = opts;
  return `${ip} - - [${time}] "${request}" ${status} 512 "-" "${userAgent}"`;
}
