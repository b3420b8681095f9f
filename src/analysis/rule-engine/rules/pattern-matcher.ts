import type { Detector, Finding, LogEvent, PatternRule } from "@/analysis/types";
import { KIND_LABELS } from "@/lib/constants";
import { computeFingerprint, decodeUriSafe, truncateLine } from "../utils";

/**
 * The request fields a client controls: the target (path and query) and
 * the User-Agent header.
 */
export function buildHaystack(event: LogEvent): string {
  const target = event.query ? `${event.path}?${event.query}` : event.path;
  return [target, event.userAgent].filter((part) => part.length > 0).join(" ");
}

/**
 * Stateless matcher shared by SQL-injection and scanning rules; the rule's
 * pattern set is the only thing that differs between them.
 *
 * Patterns are tried in configured order and the first hit wins, so an
 * event yields at most one finding per rule. Each pattern is tried against
 * the raw request first and then against its URL-decoded form.
 */
export class PatternMatcher implements Detector {
  constructor(readonly rule: PatternRule) {}

  evaluate(event: LogEvent): Finding | null {
    const haystack = buildHaystack(event);
    if (!haystack) return null;
    const decoded = decodeUriSafe(haystack);

    for (const pattern of this.rule.patterns) {
      const match =
        pattern.regex.exec(haystack) ??
        (decoded !== haystack ? pattern.regex.exec(decoded) : null);
      if (!match) continue;

      const matchedText = match[0];
      return {
        sourceAddress: event.sourceAddress,
        ruleId: this.rule.id,
        kind: this.rule.kind,
        severity: this.rule.severity,
        title: `${KIND_LABELS[this.rule.kind]} Detected: ${pattern.id}`,
        evidence: { type: "pattern", patternId: pattern.id, matchedText },
        detectedAt: event.timestamp,
        lineNumber: event.lineNumber,
        lineContent: truncateLine(event.raw),
        fingerprint: computeFingerprint(
          this.rule.id,
          event.lineNumber,
          `${event.sourceAddress}:${event.timestamp}:${pattern.id}:${matchedText}`
        ),
        mitreTactic: this.rule.mitreTactic,
        mitreTechnique: this.rule.mitreTechnique,
      };
    }

    return null;
  }
}
