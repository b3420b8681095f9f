import type {
  AddressSummary,
  EscalationPolicy,
  Finding,
  Report,
  Severity,
} from "./types";
import { emptySeverityCounts, maxSeverity, SEVERITY_RANK } from "@/lib/constants";

export interface AggregateOptions {
  /** Raise an address's summary severity when one rule fires often. */
  escalation?: EscalationPolicy;
}

const ESCALATION_LEVELS = ["CRITICAL", "HIGH", "MEDIUM"] as const;

/**
 * Highest severity whose per-rule count bound is reached by `count`,
 * or null when none is.
 */
export function escalationFor(count: number, policy: EscalationPolicy): Severity | null {
  for (const level of ESCALATION_LEVELS) {
    const bound = policy[level];
    if (bound !== undefined && count >= bound) return level;
  }
  return null;
}

/**
 * Group findings by source address into the final report.
 *
 * Addresses appear in the order their first finding was detected, and each
 * address keeps its findings in detection order, so the same input always
 * yields the same report.
 */
export function aggregateFindings(
  findings: readonly Finding[],
  options: AggregateOptions = {}
): Report {
  const byAddress = new Map<string, AddressSummary>();
  const severityCounts = emptySeverityCounts();

  for (const finding of findings) {
    let summary = byAddress.get(finding.sourceAddress);
    if (!summary) {
      summary = {
        sourceAddress: finding.sourceAddress,
        findings: [],
        maxSeverity: finding.severity,
        escalatedSeverity: finding.severity,
        severityCounts: emptySeverityCounts(),
        ruleCounts: {},
      };
      byAddress.set(finding.sourceAddress, summary);
    }

    summary.findings.push(finding);
    summary.maxSeverity = maxSeverity(summary.maxSeverity, finding.severity);
    summary.severityCounts[finding.severity]++;
    summary.ruleCounts[finding.ruleId] = (summary.ruleCounts[finding.ruleId] ?? 0) + 1;
    severityCounts[finding.severity]++;
  }

  const addresses = Array.from(byAddress.values());
  for (const summary of addresses) {
    summary.escalatedSeverity = summary.maxSeverity;
    if (!options.escalation) continue;
    for (const count of Object.values(summary.ruleCounts)) {
      const level = escalationFor(count, options.escalation);
      if (level && SEVERITY_RANK[level] > SEVERITY_RANK[summary.escalatedSeverity]) {
        summary.escalatedSeverity = level;
      }
    }
  }

  return {
    addresses,
    totalFindings: findings.length,
    severityCounts,
  };
}

/** Findings for one address, or an empty list. */
export function findingsFor(report: Report, sourceAddress: string): Finding[] {
  return report.addresses.find((a) => a.sourceAddress === sourceAddress)?.findings ?? [];
}
