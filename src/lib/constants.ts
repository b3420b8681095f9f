import type { DetectionKind, Severity, SeverityCounts } from "@/analysis/types";

export const SEVERITY_ORDER = ["CRITICAL", "HIGH", "MEDIUM", "LOW"] as const;

/** Numeric rank for severity comparison (higher = more severe) */
export const SEVERITY_RANK: Record<Severity, number> = {
  LOW: 0,
  MEDIUM: 1,
  HIGH: 2,
  CRITICAL: 3,
};

export const KIND_LABELS: Record<DetectionKind, string> = {
  BRUTE_FORCE: "Brute Force",
  SQL_INJECTION: "SQL Injection",
  SCANNING: "Scanning",
};

/** Statuses treated as failed authentication when a rule does not say otherwise. */
export const DEFAULT_FAILURE_STATUSES = [401, 403] as const;

/** Max characters of a raw line kept as finding evidence. */
export const MAX_LINE_CONTENT = 500;

/** Number of lines sampled for format detection before processing. */
export const FORMAT_SAMPLE_SIZE = 10;

export function maxSeverity(a: Severity, b: Severity): Severity {
  return SEVERITY_RANK[a] >= SEVERITY_RANK[b] ? a : b;
}

export function emptySeverityCounts(): SeverityCounts {
  return { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0 };
}
