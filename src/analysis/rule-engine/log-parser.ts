/**
 * Access-log parsing.
 *
 * Turns one NGINX access-log line into a structured LogEvent. Two layouts
 * are understood: the classic `combined` text format and JSON lines written
 * by an `escape=json` log_format. Parsing is pure; failures come back as a
 * LogParseError value so callers can count and skip them.
 */

import { isIP } from "net";
import { z } from "zod/v4";
import { LogParseError } from "@/analysis/errors";
import type { LogEvent } from "@/analysis/types";
import { parseIsoTimestamp, parseTimeLocal } from "./utils";

export type LogFormat = "combined" | "jsonl";

export type ParseOutcome =
  | { ok: true; event: LogEvent }
  | { ok: false; error: LogParseError };

export interface ParseResult {
  events: LogEvent[];
  format: LogFormat;
  errors: LogParseError[];
}

/**
 * addr ident user [time] "request" status bytes "referer" "user-agent"
 * The referer/user-agent pair is optional so common-format lines parse too.
 */
const COMBINED_REGEX =
  /^(\S+) \S+ (\S+) \[([^\]]*)\] "((?:[^"\\]|\\.)*)" (\d{3})(?= |$)(?: (\S+))?(?: "((?:[^"\\]|\\.)*)" "((?:[^"\\]|\\.)*)")?/;

const PROTOCOL_REGEX = /^HTTP\/\d/i;

const jsonRecordSchema = z.object({
  remote_addr: z.string(),
  remote_user: z.string().optional(),
  time_local: z.string().optional(),
  time_iso8601: z.string().optional(),
  request: z.string(),
  status: z.union([z.number().int(), z.string().regex(/^\d{3}$/)]),
  body_bytes_sent: z.union([z.number().int(), z.string()]).optional(),
  http_referer: z.string().optional(),
  http_user_agent: z.string().optional(),
});

interface RequestLine {
  method: string;
  path: string;
  query: string;
  protocol: string;
}

const EMPTY_REQUEST: RequestLine = { method: "", path: "", query: "", protocol: "" };

function isJsonObjectLine(line: string): boolean {
  if (!line.startsWith("{")) return false;
  try {
    const value: unknown = JSON.parse(line);
    return typeof value === "object" && value !== null;
  } catch {
    return false;
  }
}

/**
 * Detect the log format from a sample of lines. JSONL wins when JSON-object
 * lines are at least as many as the other non-empty lines, so a truncated
 * record at the top of a JSONL file costs that line only.
 */
export function detectFormat(lines: string[]): LogFormat {
  let json = 0;
  let other = 0;
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    if (isJsonObjectLine(trimmed)) json++;
    else other++;
  }

  return json > 0 && json >= other ? "jsonl" : "combined";
}

/** Undo NGINX/Apache field escaping (`\"`, `\\`, `\xHH`). */
function unescapeField(value: string): string {
  if (!value.includes("\\")) return value;
  return value.replace(/\\x([0-9a-fA-F]{2})|\\(.)/g, (_m, hex: string | undefined, ch: string | undefined) =>
    hex !== undefined ? String.fromCharCode(parseInt(hex, 16)) : (ch ?? "")
  );
}

function optionalField(value: string | undefined): string | null {
  if (value === undefined || value === "" || value === "-") return null;
  return value;
}

function parseBytes(value: string | number | undefined): number | null {
  if (typeof value === "number") return value;
  if (value === undefined || !/^\d+$/.test(value)) return null;
  return Number(value);
}

/**
 * Split a request line into method, path, query and protocol.
 * Targets containing spaces (unencoded payloads) are kept whole.
 */
export function splitRequestLine(request: string): RequestLine {
  const trimmed = request.trim();
  if (trimmed === "" || trimmed === "-") return EMPTY_REQUEST;

  const firstSpace = trimmed.indexOf(" ");
  if (firstSpace === -1) {
    return { ...splitTarget(trimmed), method: "", protocol: "" };
  }

  const method = trimmed.slice(0, firstSpace);
  const rest = trimmed.slice(firstSpace + 1);
  const lastSpace = rest.lastIndexOf(" ");
  const lastToken = lastSpace === -1 ? rest : rest.slice(lastSpace + 1);

  if (lastSpace !== -1 && PROTOCOL_REGEX.test(lastToken)) {
    return { method, ...splitTarget(rest.slice(0, lastSpace)), protocol: lastToken };
  }
  if (lastSpace === -1 && PROTOCOL_REGEX.test(lastToken)) {
    // "GET HTTP/1.1" with the target missing
    return { method, path: "", query: "", protocol: lastToken };
  }
  return { method, ...splitTarget(rest), protocol: "" };
}

function splitTarget(target: string): { path: string; query: string } {
  const q = target.indexOf("?");
  if (q === -1) return { path: target, query: "" };
  return { path: target.slice(0, q), query: target.slice(q + 1) };
}

function malformed(message: string, lineNumber: number | null): ParseOutcome {
  return { ok: false, error: new LogParseError("MALFORMED", message, lineNumber) };
}

function badTimestamp(value: string, lineNumber: number | null): ParseOutcome {
  return {
    ok: false,
    error: new LogParseError("BAD_TIMESTAMP", `Unparseable timestamp "${value}"`, lineNumber),
  };
}

function parseCombinedLine(line: string, lineNumber: number | null): ParseOutcome {
  const match = COMBINED_REGEX.exec(line);
  if (!match) return malformed("Line does not match the combined log format", lineNumber);

  const [, addr, user, timeLocal, request, status, bytes, referer, userAgent] = match;
  if (isIP(addr) === 0) return malformed(`Invalid source address "${addr}"`, lineNumber);

  const timestamp = parseTimeLocal(timeLocal);
  if (timestamp === null) return badTimestamp(timeLocal, lineNumber);

  return {
    ok: true,
    event: {
      timestamp,
      sourceAddress: addr,
      remoteUser: optionalField(user),
      ...splitRequestLine(unescapeField(request)),
      statusCode: Number(status),
      bodyBytesSent: parseBytes(bytes),
      referer: optionalField(referer === undefined ? undefined : unescapeField(referer)),
      userAgent: userAgent === undefined || userAgent === "-" ? "" : unescapeField(userAgent),
      raw: line,
      lineNumber,
    },
  };
}

function parseJsonLine(line: string, lineNumber: number | null): ParseOutcome {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    return malformed("Invalid JSON", lineNumber);
  }

  const parsed = z.safeParse(jsonRecordSchema, data);
  if (!parsed.success) {
    return malformed("JSON record is missing access-log fields", lineNumber);
  }
  const record = parsed.data;

  if (isIP(record.remote_addr) === 0) {
    return malformed(`Invalid source address "${record.remote_addr}"`, lineNumber);
  }

  let timestamp: number | null;
  if (record.time_iso8601 !== undefined) {
    timestamp = parseIsoTimestamp(record.time_iso8601);
    if (timestamp === null) return badTimestamp(record.time_iso8601, lineNumber);
  } else if (record.time_local !== undefined) {
    timestamp = parseTimeLocal(record.time_local);
    if (timestamp === null) return badTimestamp(record.time_local, lineNumber);
  } else {
    return malformed("JSON record has no timestamp", lineNumber);
  }

  return {
    ok: true,
    event: {
      timestamp,
      sourceAddress: record.remote_addr,
      remoteUser: optionalField(record.remote_user),
      ...splitRequestLine(record.request),
      statusCode: Number(record.status),
      bodyBytesSent: parseBytes(record.body_bytes_sent),
      referer: optionalField(record.http_referer),
      userAgent: record.http_user_agent === undefined || record.http_user_agent === "-"
        ? ""
        : record.http_user_agent,
      raw: line,
      lineNumber,
    },
  };
}

/**
 * Parse a single access-log line.
 */
export function parseLogLine(
  line: string,
  lineNumber: number | null = null,
  format: LogFormat = "combined"
): ParseOutcome {
  if (line.trim().length === 0) return malformed("Empty line", lineNumber);
  return format === "jsonl"
    ? parseJsonLine(line.trim(), lineNumber)
    : parseCombinedLine(line, lineNumber);
}

/**
 * Parse all lines of a log file. Lines are numbered from 1; the format is
 * detected from the lines themselves.
 */
export function parseLogLines(lines: string[]): ParseResult {
  const format = detectFormat(lines);
  const events: LogEvent[] = [];
  const errors: LogParseError[] = [];

  lines.forEach((line, i) => {
    const outcome = parseLogLine(line, i + 1, format);
    if (outcome.ok) events.push(outcome.event);
    else errors.push(outcome.error);
  });

  return { events, format, errors };
}
