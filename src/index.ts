export { aggregateFindings, escalationFor, findingsFor, type AggregateOptions } from "./analysis/aggregator";
export { CancelledEarlyError, ConfigError, LogParseError } from "./analysis/errors";
export type { ConfigErrorCode, ParseFailureReason } from "./analysis/errors";
export {
  runAnalysisPipeline,
  readLogLines,
  type AnalysisPipelineOptions,
  type EventOrder,
  type LogSource,
} from "./analysis/pipeline";
export {
  DetectionEngine,
  createDetector,
  runDetection,
  runRuleEngine,
  sortEventsByTimestamp,
  type EngineRunOptions,
  type EngineRunResult,
  type RuleEngineOptions,
  type RuleEngineResult,
} from "./analysis/rule-engine";
export {
  detectFormat,
  parseLogLine,
  parseLogLines,
  type LogFormat,
  type ParseOutcome,
} from "./analysis/rule-engine/log-parser";
export { RuleRegistry } from "./analysis/rule-engine/registry";
export { FrequencyDetector } from "./analysis/rule-engine/rules/brute-force";
export { PatternMatcher } from "./analysis/rule-engine/rules/pattern-matcher";
export type * from "./analysis/types";
export {
  DEFAULT_RULES_PATH,
  loadRuleConfig,
  parseRuleConfig,
  resolveRulesPath,
  type RuleSetConfig,
} from "./lib/config";
export { SEVERITY_ORDER, SEVERITY_RANK, KIND_LABELS } from "./lib/constants";
