import { readFile } from "fs/promises";
import { fileURLToPath } from "url";
import { z } from "zod/v4";
import { ConfigError } from "@/analysis/errors";
import type { EscalationPolicy, RuleDefinition } from "@/analysis/types";
import { DEFAULT_FAILURE_STATUSES } from "@/lib/constants";

/** Rule set shipped with the package. */
export const DEFAULT_RULES_PATH = fileURLToPath(
  new URL("../../rules/default-rules.json", import.meta.url)
);

const severitySchema = z.enum(["LOW", "MEDIUM", "HIGH", "CRITICAL"]);

const patternSchema = z.object({
  id: z.string().min(1).optional(),
  pattern: z.string(),
  literal: z.boolean().optional(),
});

const ruleMetadata = {
  id: z.string(),
  severity: severitySchema,
  enabled: z.boolean().optional(),
  description: z.string().optional(),
  mitreTactic: z.string().optional(),
  mitreTechnique: z.string().optional(),
};

const patternRuleSchema = z.object({
  ...ruleMetadata,
  kind: z.enum(["SQL_INJECTION", "SCANNING"]),
  patterns: z.array(patternSchema),
});

const bruteForceRuleSchema = z.object({
  ...ruleMetadata,
  kind: z.literal("BRUTE_FORCE"),
  threshold: z.number(),
  windowSeconds: z.number(),
  failureStatuses: z.array(z.number().int()).default([...DEFAULT_FAILURE_STATUSES]),
});

const escalationSchema = z.object({
  MEDIUM: z.number().int().positive().optional(),
  HIGH: z.number().int().positive().optional(),
  CRITICAL: z.number().int().positive().optional(),
});

export const ruleConfigSchema = z.object({
  version: z.literal(1),
  escalation: escalationSchema.optional(),
  rules: z.array(z.discriminatedUnion("kind", [patternRuleSchema, bruteForceRuleSchema])),
});

export interface RuleSetConfig {
  rules: RuleDefinition[];
  escalation: EscalationPolicy | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** The id of the rule an issue path points into, when it has one. */
function ruleIdAt(data: unknown, path: readonly PropertyKey[]): string | null {
  const [root, index] = path;
  if (root !== "rules" || typeof index !== "number") return null;
  if (!isRecord(data) || !Array.isArray(data.rules)) return null;
  const raw: unknown = data.rules[index];
  return isRecord(raw) && typeof raw.id === "string" ? raw.id : null;
}

/**
 * Validate a parsed rule-set document. Shape errors become a ConfigError
 * naming the rule they occur in; semantic checks (thresholds, windows,
 * pattern compilation) happen when the registry loads the rules.
 */
export function parseRuleConfig(data: unknown): RuleSetConfig {
  const parsed = z.safeParse(ruleConfigSchema, data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const ruleId = issue ? ruleIdAt(data, issue.path) : null;
    throw new ConfigError(
      ruleId === null ? "INVALID_CONFIG" : "INVALID_RULE",
      z.prettifyError(parsed.error),
      ruleId
    );
  }

  return {
    rules: parsed.data.rules,
    escalation: parsed.data.escalation ?? null,
  };
}

/**
 * Read and validate a JSON rule-set file.
 */
export async function loadRuleConfig(filePath: string): Promise<RuleSetConfig> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError("INVALID_CONFIG", `Cannot read rule file ${filePath}: ${reason}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError("INVALID_CONFIG", `Rule file ${filePath} is not valid JSON: ${reason}`);
  }

  const config = parseRuleConfig(data);
  console.log(`[Config] Loaded ${config.rules.length} rule(s) from ${filePath}`);
  return config;
}

/**
 * Rule file to load: RULES_PATH when set, otherwise the bundled defaults.
 */
export function resolveRulesPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.RULES_PATH?.trim();
  return override ? override : DEFAULT_RULES_PATH;
}
