import type { Detector, Finding, FrequencyRule, LogEvent } from "@/analysis/types";
import { computeFingerprint, truncateLine } from "../utils";

// ── Window operations ───────────────────────────────
// A window is an ascending array of epoch-ms timestamps. These helpers
// never mutate their input.

/**
 * Insert a timestamp keeping ascending order. Equal timestamps go after
 * the existing ones, so ties are all kept.
 */
export function insertTimestamp(window: readonly number[], ts: number): number[] {
  let lo = 0;
  let hi = window.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (window[mid] <= ts) lo = mid + 1;
    else hi = mid;
  }
  return [...window.slice(0, lo), ts, ...window.slice(lo)];
}

/**
 * Drop every entry more than `windowMs` earlier than the newest entry.
 */
export function evictExpired(window: readonly number[], windowMs: number): number[] {
  if (window.length === 0) return [];
  const cutoff = window[window.length - 1] - windowMs;
  let lo = 0;
  let hi = window.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (window[mid] < cutoff) lo = mid + 1;
    else hi = mid;
  }
  return window.slice(lo);
}

/**
 * Entries kept after a window fires. With `threshold - 2` left over, a
 * single further failure cannot fire again on its own; two fresh failures
 * inside the window are needed.
 */
export function retainedAfterFinding(threshold: number): number {
  return Math.max(threshold - 2, 0);
}

export function trimAfterFinding(window: readonly number[], threshold: number): number[] {
  const keep = retainedAfterFinding(threshold);
  return keep === 0 ? [] : window.slice(-keep);
}

// ── Detector ────────────────────────────────────────

/**
 * Sliding-window brute-force detector.
 *
 * Counts failed authentication attempts (status in the rule's failure set)
 * per source address. Each address's window is anchored to the newest
 * failure seen for that address, not to wall-clock time, and events may
 * arrive out of order. When a window reaches the threshold a finding is
 * emitted and the window is trimmed so the same burst does not re-fire on
 * every following failure.
 */
export class FrequencyDetector implements Detector {
  private readonly windows = new Map<string, number[]>();

  constructor(readonly rule: FrequencyRule) {}

  evaluate(event: LogEvent): Finding | null {
    if (!this.rule.failureStatuses.has(event.statusCode)) return null;

    const address = event.sourceAddress;
    const window = evictExpired(
      insertTimestamp(this.windows.get(address) ?? [], event.timestamp),
      this.rule.windowMs
    );

    if (window.length < this.rule.threshold) {
      this.windows.set(address, window);
      return null;
    }

    const remaining = trimAfterFinding(window, this.rule.threshold);
    if (remaining.length > 0) this.windows.set(address, remaining);
    else this.windows.delete(address);

    return this.buildFinding(event, window);
  }

  /**
   * Forget every address whose newest failure is older than `before`
   * (epoch ms). Returns the number of addresses removed.
   */
  evictIdle(before: number): number {
    let removed = 0;
    for (const [address, window] of this.windows) {
      if (window[window.length - 1] < before) {
        this.windows.delete(address);
        removed++;
      }
    }
    return removed;
  }

  reset(): void {
    this.windows.clear();
  }

  get trackedAddresses(): number {
    return this.windows.size;
  }

  private buildFinding(event: LogEvent, timestamps: number[]): Finding {
    const ip = event.sourceAddress;
    const count = timestamps.length;
    const firstSeen = timestamps[0];
    const lastSeen = timestamps[count - 1];
    const windowSeconds = this.rule.windowMs / 1000;

    return {
      sourceAddress: ip,
      ruleId: this.rule.id,
      kind: "BRUTE_FORCE",
      severity: this.rule.severity,
      title: `Brute Force Attack: ${count} failed auth attempts from ${ip} within ${windowSeconds}s`,
      evidence: { type: "frequency", count, timestamps, firstSeen, lastSeen },
      detectedAt: event.timestamp,
      lineNumber: event.lineNumber,
      lineContent: truncateLine(event.raw),
      fingerprint: computeFingerprint(
        this.rule.id,
        event.lineNumber,
        `${ip}:${event.timestamp}:${timestamps.join(",")}`
      ),
      mitreTactic: this.rule.mitreTactic,
      mitreTechnique: this.rule.mitreTechnique,
    };
  }
}
