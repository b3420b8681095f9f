import { createHash } from "crypto";
import { MAX_LINE_CONTENT } from "@/lib/constants";

/**
 * Compute a deterministic fingerprint for a finding.
 * SHA-256 of (ruleId + lineNumber + content), truncated to 16 hex chars.
 */
export function computeFingerprint(
  ruleId: string,
  lineNumber: number | null,
  content: string
): string {
  const input = `${ruleId}:${lineNumber ?? ""}:${content}`;
  return createHash("sha256").update(input).digest("hex").slice(0, 16);
}

/**
 * Truncate a line for display in findings, preserving useful context.
 */
export function truncateLine(line: string, maxLength: number = MAX_LINE_CONTENT): string {
  if (line.length <= maxLength) return line;
  return line.slice(0, maxLength) + "...";
}

const MONTH_NAMES = [
  "jan", "feb", "mar", "apr", "may", "jun",
  "jul", "aug", "sep", "oct", "nov", "dec",
];

/**
 * NGINX `$time_local`: 10/Oct/2023:13:55:36 +0000
 */
const TIME_LOCAL_REGEX =
  /^(\d{2})\/([A-Za-z]{3})\/(\d{4}):(\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2})$/;

const ISO_8601_REGEX =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
}

/**
 * Parse an NGINX `$time_local` value into epoch milliseconds.
 * Returns null when the value is not a real instant (unknown month,
 * day 31 in a 30-day month, hour 24, ...).
 */
export function parseTimeLocal(value: string): number | null {
  const match = TIME_LOCAL_REGEX.exec(value.trim());
  if (!match) return null;

  const [, dd, mon, yyyy, hh, mi, ss, sign, offH, offM] = match;
  const month = MONTH_NAMES.indexOf(mon.toLowerCase());
  if (month === -1) return null;

  const year = Number(yyyy);
  const day = Number(dd);
  const hour = Number(hh);
  const minute = Number(mi);
  const second = Number(ss);
  const offsetHours = Number(offH);
  const offsetMinutes = Number(offM);

  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;
  if (offsetHours > 14 || offsetMinutes > 59) return null;

  const offsetMs = (offsetHours * 60 + offsetMinutes) * 60_000;
  const utc = Date.UTC(year, month, day, hour, minute, second);
  return sign === "+" ? utc - offsetMs : utc + offsetMs;
}

/**
 * Parse an ISO 8601 timestamp with an explicit zone (`$time_iso8601`).
 */
export function parseIsoTimestamp(value: string): number | null {
  const trimmed = value.trim();
  if (!ISO_8601_REGEX.test(trimmed)) return null;
  const ts = Date.parse(trimmed);
  return isNaN(ts) ? null : ts;
}

/**
 * URL-decode a request fragment. Malformed percent escapes are left as-is
 * while well-formed runs around them are still decoded.
 */
export function decodeUriSafe(value: string): string {
  if (!value.includes("%") && !value.includes("+")) return value;
  const spaced = value.replace(/\+/g, " ");
  try {
    return decodeURIComponent(spaced);
  } catch (error) {
    if (!(error instanceof URIError)) throw error;
    return spaced.replace(/(?:%[0-9a-f]{2})+/gi, (run) => {
      try {
        return decodeURIComponent(run);
      } catch {
        return run;
      }
    });
  }
}

/**
 * Escape a keyword so it can be compiled as a literal regular expression.
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
