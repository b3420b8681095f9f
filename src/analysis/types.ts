export type Severity = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";
export type DetectionKind = "BRUTE_FORCE" | "SQL_INJECTION" | "SCANNING";
export type PatternKind = Exclude<DetectionKind, "BRUTE_FORCE">;

/** One parsed access-log record. */
export interface LogEvent {
  /** Epoch milliseconds */
  readonly timestamp: number;
  readonly sourceAddress: string;
  readonly remoteUser: string | null;
  readonly method: string;
  readonly path: string;
  readonly query: string;
  readonly protocol: string;
  readonly statusCode: number;
  readonly bodyBytesSent: number | null;
  readonly referer: string | null;
  readonly userAgent: string;
  readonly raw: string;
  /** 1-based position in the input, null when the event was built directly */
  readonly lineNumber: number | null;
}

// ── Rule definitions (as configured) ────────────────

export interface PatternDefinition {
  id?: string;
  pattern: string;
  /** Treat `pattern` as a plain keyword instead of a regular expression */
  literal?: boolean;
}

interface RuleDefinitionBase {
  id: string;
  severity: Severity;
  enabled?: boolean;
  description?: string;
  mitreTactic?: string;
  mitreTechnique?: string;
}

export interface PatternRuleDefinition extends RuleDefinitionBase {
  kind: PatternKind;
  patterns: PatternDefinition[];
}

export interface FrequencyRuleDefinition extends RuleDefinitionBase {
  kind: "BRUTE_FORCE";
  threshold: number;
  windowSeconds: number;
  failureStatuses: number[];
}

export type RuleDefinition = PatternRuleDefinition | FrequencyRuleDefinition;

// ── Compiled rules (held by the registry) ───────────

export interface CompiledPattern {
  readonly id: string;
  readonly regex: RegExp;
  readonly source: string;
}

interface RuleBase {
  readonly id: string;
  readonly severity: Severity;
  readonly description: string | null;
  readonly mitreTactic: string | null;
  readonly mitreTechnique: string | null;
}

export interface PatternRule extends RuleBase {
  readonly kind: PatternKind;
  readonly patterns: readonly CompiledPattern[];
}

export interface FrequencyRule extends RuleBase {
  readonly kind: "BRUTE_FORCE";
  readonly threshold: number;
  readonly windowMs: number;
  readonly failureStatuses: ReadonlySet<number>;
}

export type Rule = PatternRule | FrequencyRule;

// ── Findings ────────────────────────────────────────

export interface PatternEvidence {
  readonly type: "pattern";
  readonly patternId: string;
  readonly matchedText: string;
}

export interface FrequencyEvidence {
  readonly type: "frequency";
  readonly count: number;
  /** Contributing timestamps, ascending */
  readonly timestamps: readonly number[];
  readonly firstSeen: number;
  readonly lastSeen: number;
}

export type FindingEvidence = PatternEvidence | FrequencyEvidence;

export interface Finding {
  readonly sourceAddress: string;
  readonly ruleId: string;
  readonly kind: DetectionKind;
  readonly severity: Severity;
  readonly title: string;
  readonly evidence: FindingEvidence;
  /** Timestamp of the triggering event (epoch ms) */
  readonly detectedAt: number;
  readonly lineNumber: number | null;
  readonly lineContent: string;
  readonly fingerprint: string;
  readonly mitreTactic: string | null;
  readonly mitreTechnique: string | null;
}

/**
 * Capability every detector exposes to the engine. Pattern matchers are
 * stateless; the frequency detector keeps per-address windows.
 */
export interface Detector {
  readonly rule: Rule;
  evaluate(event: LogEvent): Finding | null;
}

// ── Report ──────────────────────────────────────────

export type SeverityCounts = Record<Severity, number>;

export interface AddressSummary {
  sourceAddress: string;
  /** Detection order */
  findings: Finding[];
  maxSeverity: Severity;
  /** maxSeverity raised by the frequency escalation policy, if any */
  escalatedSeverity: Severity;
  severityCounts: SeverityCounts;
  ruleCounts: Record<string, number>;
}

export interface Report {
  /** First-seen order */
  addresses: AddressSummary[];
  totalFindings: number;
  severityCounts: SeverityCounts;
}

/** Per-rule finding counts at which an address's summary severity is raised. */
export type EscalationPolicy = Partial<Record<Exclude<Severity, "LOW">, number>>;

export interface AnalysisPipelineResult {
  report: Report;
  totalLinesAnalyzed: number;
  skippedLineCount: number;
  parseErrors: Record<"MALFORMED" | "BAD_TIMESTAMP", number>;
  cancelled: boolean;
}
