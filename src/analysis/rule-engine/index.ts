import { CancelledEarlyError, type ParseFailureReason } from "@/analysis/errors";
import type { Detector, Finding, LogEvent, Rule } from "@/analysis/types";
import { FORMAT_SAMPLE_SIZE } from "@/lib/constants";
import { detectFormat, parseLogLine, type LogFormat } from "./log-parser";
import type { RuleRegistry } from "./registry";
import { FrequencyDetector } from "./rules/brute-force";
import { PatternMatcher } from "./rules/pattern-matcher";

export interface EngineRunOptions {
  /** Checked before each event is read; an aborted run keeps what it found so far. */
  signal?: AbortSignal;
}

export interface EngineRunResult {
  findings: Finding[];
  eventsProcessed: number;
  interruption: CancelledEarlyError | null;
}

export interface RuleEngineOptions extends EngineRunOptions {
  /** Number given to the first line (default 1), for resumed runs */
  firstLineNumber?: number;
  /** Skip format detection */
  format?: LogFormat;
}

export interface RuleEngineResult {
  findings: Finding[];
  totalLinesProcessed: number;
  skippedLineCount: number;
  parseErrors: Record<ParseFailureReason, number>;
  logFormat: LogFormat;
  interruption: CancelledEarlyError | null;
}

export function createDetector(rule: Rule): Detector {
  return rule.kind === "BRUTE_FORCE" ? new FrequencyDetector(rule) : new PatternMatcher(rule);
}

/**
 * Runs every registry rule against each event, in the order the caller
 * supplies events. Events are never reordered here: the frequency
 * detectors depend on sequence, so sorting is left to the caller (see
 * sortEventsByTimestamp).
 *
 * Detector state lives as long as the engine, which lets a cancelled run
 * be continued by calling run() again with the rest of the stream.
 */
export class DetectionEngine {
  private readonly detectors: Detector[];
  private readonly frequencyDetectors: FrequencyDetector[];

  constructor(readonly registry: RuleRegistry) {
    this.detectors = registry.all().map(createDetector);
    this.frequencyDetectors = this.detectors.filter(
      (d): d is FrequencyDetector => d instanceof FrequencyDetector
    );
  }

  /** Evaluate one event against every rule. */
  process(event: LogEvent): Finding[] {
    const findings: Finding[] = [];
    for (const detector of this.detectors) {
      const finding = detector.evaluate(event);
      if (finding) findings.push(finding);
    }
    return findings;
  }

  /**
   * Evaluate events until the source ends or the signal aborts. The signal
   * is checked before each event is pulled, so an aborted run consumes
   * nothing it did not process and leaves the source open: passing the same
   * iterator to run() again continues where this call stopped.
   */
  run(events: Iterable<LogEvent>, options: EngineRunOptions = {}): EngineRunResult {
    const iterator = events[Symbol.iterator]();
    const findings: Finding[] = [];
    let eventsProcessed = 0;

    for (;;) {
      if (options.signal?.aborted) {
        return { findings, eventsProcessed, interruption: new CancelledEarlyError(eventsProcessed) };
      }
      const next = iterator.next();
      if (next.done) break;
      findings.push(...this.process(next.value));
      eventsProcessed++;
    }

    return { findings, eventsProcessed, interruption: null };
  }

  /**
   * Drop brute-force state for addresses idle since before `before`
   * (epoch ms). For long-running callers; a batch run never needs it.
   */
  sweep(before: number): number {
    return this.frequencyDetectors.reduce((sum, d) => sum + d.evictIdle(before), 0);
  }

  reset(): void {
    for (const detector of this.frequencyDetectors) detector.reset();
  }
}

/**
 * One-shot detection over a sequence of already-parsed events.
 */
export function runDetection(
  events: Iterable<LogEvent>,
  registry: RuleRegistry,
  options: EngineRunOptions = {}
): EngineRunResult {
  return new DetectionEngine(registry).run(events, options);
}

/**
 * Stable sort by timestamp. Callers opt into this explicitly; the engine
 * itself processes events in the order given.
 */
export function sortEventsByTimestamp(events: readonly LogEvent[]): LogEvent[] {
  return [...events].sort((a, b) => a.timestamp - b.timestamp);
}

type LineSource = Iterable<string> | AsyncIterable<string>;

/** Pull-based reader over a sync or async line source. */
function lineReader(lines: LineSource): () => Promise<IteratorResult<string>> {
  if (Symbol.asyncIterator in lines) {
    const iterator = lines[Symbol.asyncIterator]();
    return () => iterator.next();
  }
  const iterator = lines[Symbol.iterator]();
  return async () => iterator.next();
}

/**
 * Run the detection engine over raw log lines.
 *
 * Streams line by line: each line is parsed and handed to the engine before
 * the next is read. Lines that fail to parse (blank, malformed, bad
 * timestamp) are counted and skipped, never fatal.
 *
 * The format is detected from the first FORMAT_SAMPLE_SIZE lines. The
 * signal is checked before every read, and every line read is processed,
 * including a partial sample when the signal aborts during sampling. The
 * source is never closed, so a cancelled run resumes by passing the same
 * source again with `firstLineNumber: totalLinesProcessed + 1` and the
 * returned `logFormat`.
 */
export async function runRuleEngine(
  lines: LineSource,
  engine: DetectionEngine,
  options: RuleEngineOptions = {}
): Promise<RuleEngineResult> {
  const { signal } = options;
  const read = lineReader(lines);
  const findings: Finding[] = [];
  const parseErrors: Record<ParseFailureReason, number> = { MALFORMED: 0, BAD_TIMESTAMP: 0 };
  let lineNumber = options.firstLineNumber ?? 1;
  let totalLinesProcessed = 0;
  let skippedLineCount = 0;
  let exhausted = false;

  const handle = (line: string, format: LogFormat): void => {
    const outcome = parseLogLine(line, lineNumber++, format);
    totalLinesProcessed++;
    if (!outcome.ok) {
      skippedLineCount++;
      parseErrors[outcome.error.reason]++;
      return;
    }
    findings.push(...engine.process(outcome.event));
  };

  let logFormat: LogFormat;
  if (options.format) {
    logFormat = options.format;
  } else {
    const sample: string[] = [];
    while (sample.length < FORMAT_SAMPLE_SIZE && !signal?.aborted) {
      const next = await read();
      if (next.done) {
        exhausted = true;
        break;
      }
      sample.push(next.value);
    }
    logFormat = detectFormat(sample);
    for (const line of sample) handle(line, logFormat);
  }

  while (!exhausted && !signal?.aborted) {
    const next = await read();
    if (next.done) {
      exhausted = true;
      break;
    }
    handle(next.value, logFormat);
  }

  return {
    findings,
    totalLinesProcessed,
    skippedLineCount,
    parseErrors,
    logFormat,
    interruption: exhausted ? null : new CancelledEarlyError(totalLinesProcessed),
  };
}
