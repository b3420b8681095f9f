/**
 * Batch analysis pipeline.
 *
 *   rule set → registry → lines → parser → engine → aggregator → report
 *
 * An invalid rule set aborts before any line is read and no report is
 * produced. Everything after that is non-fatal: unparseable lines are
 * counted, and an aborted signal yields a report over what was seen.
 */

import { createReadStream } from "fs";
import { createInterface, type Interface } from "readline";
import { loadRuleConfig, resolveRulesPath, type RuleSetConfig } from "@/lib/config";
import { aggregateFindings } from "./aggregator";
import { ConfigError, type ParseFailureReason } from "./errors";
import { DetectionEngine, runRuleEngine, sortEventsByTimestamp } from "./rule-engine";
import { parseLogLines } from "./rule-engine/log-parser";
import { RuleRegistry } from "./rule-engine/registry";
import type { AnalysisPipelineResult, Finding } from "./types";

export type EventOrder = "input" | "timestamp";

export interface AnalysisPipelineOptions {
  /** Rule file; defaults to RULES_PATH or the bundled rule set */
  rulesPath?: string;
  /** Already-loaded rule set, used instead of reading a file */
  rules?: RuleSetConfig;
  signal?: AbortSignal;
  /**
   * "input" (default) feeds events in log order. "timestamp" reads the
   * whole input and sorts events by time before detection.
   */
  order?: EventOrder;
}

export type LogSource = string | Iterable<string> | AsyncIterable<string>;

/** Stream a log file line by line. Closing the reader releases the file. */
export function readLogLines(filePath: string): Interface {
  const input = createReadStream(filePath, { encoding: "utf-8" });
  const reader = createInterface({ input, crlfDelay: Infinity });
  reader.once("close", () => input.destroy());
  return reader;
}

async function loadRegistry(
  options: AnalysisPipelineOptions
): Promise<{ registry: RuleRegistry; config: RuleSetConfig }> {
  try {
    const config = options.rules ?? (await loadRuleConfig(options.rulesPath ?? resolveRulesPath()));
    return { registry: RuleRegistry.load(config.rules), config };
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[Pipeline] Invalid rule configuration: ${error.message}`);
    }
    throw error;
  }
}

function openSource(source: LogSource): { lines: Iterable<string> | AsyncIterable<string>; close: () => void } {
  if (typeof source !== "string") return { lines: source, close: () => {} };
  const reader = readLogLines(source);
  return { lines: reader, close: () => reader.close() };
}

async function collectLines(source: Iterable<string> | AsyncIterable<string>): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of source) lines.push(line);
  return lines;
}

/**
 * Run the full analysis over a log file path or an iterable of lines.
 */
export async function runAnalysisPipeline(
  source: LogSource,
  options: AnalysisPipelineOptions = {}
): Promise<AnalysisPipelineResult> {
  const { registry, config } = await loadRegistry(options);
  const engine = new DetectionEngine(registry);
  // Cancelled runs leave their source open for resuming; a file opened here is ours to close
  const { lines, close } = openSource(source);
  const label = typeof source === "string" ? `"${source}"` : "in-memory input";

  console.log(`[Pipeline] Starting analysis of ${label} with ${registry.size} rule(s)`);

  let findings: Finding[];
  let totalLinesAnalyzed: number;
  let parseErrors: Record<ParseFailureReason, number>;
  let cancelled: boolean;

  try {
    if (options.order === "timestamp") {
      const parsed = parseLogLines(await collectLines(lines));
      const run = engine.run(sortEventsByTimestamp(parsed.events), { signal: options.signal });
      findings = run.findings;
      totalLinesAnalyzed = parsed.events.length + parsed.errors.length;
      parseErrors = { MALFORMED: 0, BAD_TIMESTAMP: 0 };
      for (const error of parsed.errors) parseErrors[error.reason]++;
      cancelled = run.interruption !== null;
    } else {
      const result = await runRuleEngine(lines, engine, { signal: options.signal });
      findings = result.findings;
      totalLinesAnalyzed = result.totalLinesProcessed;
      parseErrors = result.parseErrors;
      cancelled = result.interruption !== null;
    }
  } finally {
    close();
  }

  const skippedLineCount = parseErrors.MALFORMED + parseErrors.BAD_TIMESTAMP;
  if (skippedLineCount > 0) {
    console.warn(
      `[Pipeline] Skipped ${skippedLineCount} line(s): ${parseErrors.MALFORMED} malformed, ${parseErrors.BAD_TIMESTAMP} bad timestamp`
    );
  }
  if (cancelled) {
    console.warn(`[Pipeline] Cancelled after ${totalLinesAnalyzed} line(s); report holds partial results`);
  }

  const report = aggregateFindings(findings, { escalation: config.escalation ?? undefined });
  console.log(
    `[Pipeline] Finished ${label}: ${totalLinesAnalyzed} line(s), ${report.totalFindings} finding(s) across ${report.addresses.length} address(es)`
  );

  return { report, totalLinesAnalyzed, skippedLineCount, parseErrors, cancelled };
}
