/**
 * Registry of active detection rules.
 *
 * Rule definitions come in as plain configuration; the registry validates
 * them, compiles every pattern once, and exposes the frozen result. Loading
 * is all-or-nothing: the first invalid rule aborts the load with a
 * ConfigError naming it.
 */

import { ConfigError } from "@/analysis/errors";
import type {
  CompiledPattern,
  DetectionKind,
  FrequencyRule,
  FrequencyRuleDefinition,
  PatternRule,
  PatternRuleDefinition,
  Rule,
  RuleDefinition,
} from "@/analysis/types";
import { escapeRegExp } from "./utils";

function compilePatterns(def: PatternRuleDefinition): CompiledPattern[] {
  if (def.patterns.length === 0) {
    throw new ConfigError("INVALID_RULE", "pattern rule has no patterns", def.id);
  }

  return def.patterns.map((p, i) => {
    if (p.pattern.length === 0) {
      throw new ConfigError("INVALID_RULE", `pattern #${i + 1} is empty`, def.id);
    }
    const source = p.literal ? escapeRegExp(p.pattern) : p.pattern;
    let regex: RegExp;
    try {
      regex = new RegExp(source, "i");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError("INVALID_RULE", `pattern #${i + 1} does not compile: ${reason}`, def.id);
    }
    return Object.freeze({ id: p.id ?? `${def.id}#${i + 1}`, regex, source: p.pattern });
  });
}

function compilePatternRule(def: PatternRuleDefinition): PatternRule {
  return Object.freeze({
    id: def.id,
    kind: def.kind,
    severity: def.severity,
    description: def.description ?? null,
    mitreTactic: def.mitreTactic ?? null,
    mitreTechnique: def.mitreTechnique ?? null,
    patterns: Object.freeze(compilePatterns(def)),
  });
}

function compileFrequencyRule(def: FrequencyRuleDefinition): FrequencyRule {
  if (!Number.isInteger(def.threshold) || def.threshold < 1) {
    throw new ConfigError("INVALID_RULE", `threshold must be an integer >= 1 (got ${def.threshold})`, def.id);
  }
  if (!Number.isFinite(def.windowSeconds) || def.windowSeconds <= 0) {
    throw new ConfigError("INVALID_RULE", `windowSeconds must be > 0 (got ${def.windowSeconds})`, def.id);
  }
  if (def.failureStatuses.length === 0) {
    throw new ConfigError("INVALID_RULE", "failureStatuses must not be empty", def.id);
  }
  for (const status of def.failureStatuses) {
    if (!Number.isInteger(status) || status < 100 || status > 599) {
      throw new ConfigError("INVALID_RULE", `invalid failure status ${status}`, def.id);
    }
  }

  return Object.freeze({
    id: def.id,
    kind: def.kind,
    severity: def.severity,
    description: def.description ?? null,
    mitreTactic: def.mitreTactic ?? null,
    mitreTechnique: def.mitreTechnique ?? null,
    threshold: def.threshold,
    windowMs: def.windowSeconds * 1000,
    failureStatuses: new Set(def.failureStatuses),
  });
}

export class RuleRegistry {
  private readonly rules: readonly Rule[];

  private constructor(rules: Rule[]) {
    this.rules = Object.freeze(rules);
  }

  /**
   * Validate and compile rule definitions. Disabled rules are dropped
   * after validation, so a broken rule fails the load even when disabled.
   */
  static load(definitions: readonly RuleDefinition[]): RuleRegistry {
    const seen = new Set<string>();
    const compiled: Rule[] = [];

    for (const def of definitions) {
      if (def.id.trim().length === 0) {
        throw new ConfigError("INVALID_RULE", "rule id must not be empty", def.id);
      }
      if (seen.has(def.id)) {
        throw new ConfigError("INVALID_RULE", "duplicate rule id", def.id);
      }
      seen.add(def.id);

      const rule = def.kind === "BRUTE_FORCE" ? compileFrequencyRule(def) : compilePatternRule(def);
      if (def.enabled !== false) compiled.push(rule);
    }

    return new RuleRegistry(compiled);
  }

  /** Active rules of one kind, in load order. */
  rulesFor(kind: DetectionKind): Rule[] {
    return this.rules.filter((r) => r.kind === kind);
  }

  all(): readonly Rule[] {
    return this.rules;
  }

  get size(): number {
    return this.rules.length;
  }
}
