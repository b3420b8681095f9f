import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { DEFAULT_RULES_PATH, type RuleSetConfig } from "@/lib/config";
import { ConfigError } from "../errors";
import { runAnalysisPipeline } from "../pipeline";

// ── Helpers ──────────────────────────────────────────────
const TMP_DIR = mkdtempSync(join(tmpdir(), "pipeline-"));

function line(ip: string, time: string, request: string, status: number, userAgent = "Mozilla/5.0"): string {
  return `${ip} - - [10/Oct/2023:${time} +0000] "${request}" ${status} 512 "-" "${userAgent}"`;
}

const MIXED_LOG = [
  line("10.0.0.2", "13:00:00", "GET /products?id=1%20UNION%20SELECT%20password%20FROM%20users HTTP/1.1", 200),
  line("10.0.0.1", "13:00:10", "POST /login HTTP/1.1", 401),
  line("10.0.0.1", "13:00:20", "POST /login HTTP/1.1", 401),
  line("10.0.0.1", "13:00:30", "POST /login HTTP/1.1", 401),
  line("10.0.0.1", "13:00:40", "POST /login HTTP/1.1", 401),
  line("10.0.0.1", "13:00:50", "POST /login HTTP/1.1", 401),
  '10.0.0.4 - - [10/Oct/2023:13:00:55 +0000] "GET / HTTP/1.1" "-" "curl/8.4.0"',
  line("10.0.0.3", "13:01:00", "GET / HTTP/1.1", 200, "Mozilla/5.0 (compatible; Nmap Scripting Engine)"),
];

function bruteOnly(threshold: number): RuleSetConfig {
  return {
    rules: [
      {
        id: "bf",
        kind: "BRUTE_FORCE",
        severity: "HIGH",
        threshold,
        windowSeconds: 60,
        failureStatuses: [401],
      },
    ],
    escalation: null,
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

afterAll(() => {
  rmSync(TMP_DIR, { recursive: true, force: true });
});

// ── Tests ────────────────────────────────────────────────
describe("runAnalysisPipeline", () => {
  it("reports SQL injection, brute force and scanning from the default rules", async () => {
    const result = await runAnalysisPipeline(MIXED_LOG, { rulesPath: DEFAULT_RULES_PATH });
    const { report } = result;

    expect(result.totalLinesAnalyzed).toBe(8);
    expect(result.skippedLineCount).toBe(1);
    expect(result.parseErrors).toEqual({ MALFORMED: 1, BAD_TIMESTAMP: 0 });
    expect(result.cancelled).toBe(false);

    expect(report.totalFindings).toBe(3);
    expect(report.addresses.map((a) => [a.sourceAddress, a.maxSeverity])).toEqual([
      ["10.0.0.2", "CRITICAL"],
      ["10.0.0.1", "HIGH"],
      ["10.0.0.3", "MEDIUM"],
    ]);
    expect(report.addresses.map((a) => a.findings[0].ruleId)).toEqual([
      "sqli-union-select",
      "brute-force-auth",
      "scan-tool-agent",
    ]);
    expect(report.addresses[1].findings[0].lineNumber).toBe(6);
    expect(report.severityCounts).toEqual({ CRITICAL: 1, HIGH: 1, MEDIUM: 1, LOW: 0 });
  });

  it("reads a log file from disk", async () => {
    const path = join(TMP_DIR, "access.log");
    writeFileSync(path, MIXED_LOG.join("\n") + "\n", "utf-8");

    const result = await runAnalysisPipeline(path, { rulesPath: DEFAULT_RULES_PATH });
    expect(result.totalLinesAnalyzed).toBe(8);
    expect(result.report.totalFindings).toBe(3);
    expect(console.log).toHaveBeenCalledWith(`[Pipeline] Starting analysis of "${path}" with 7 rule(s)`);
  });

  it("logs progress and skipped lines", async () => {
    await runAnalysisPipeline(MIXED_LOG, { rulesPath: DEFAULT_RULES_PATH });

    expect(console.log).toHaveBeenCalledWith(`[Config] Loaded 7 rule(s) from ${DEFAULT_RULES_PATH}`);
    expect(console.log).toHaveBeenCalledWith("[Pipeline] Starting analysis of in-memory input with 7 rule(s)");
    expect(console.warn).toHaveBeenCalledWith("[Pipeline] Skipped 1 line(s): 1 malformed, 0 bad timestamp");
    expect(console.log).toHaveBeenCalledWith(
      "[Pipeline] Finished in-memory input: 8 line(s), 3 finding(s) across 3 address(es)",
    );
  });

  it("produces the same report for the same input", async () => {
    const first = await runAnalysisPipeline(MIXED_LOG, { rulesPath: DEFAULT_RULES_PATH });
    const second = await runAnalysisPipeline(MIXED_LOG, { rulesPath: DEFAULT_RULES_PATH });
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it("returns an empty report for empty input", async () => {
    const result = await runAnalysisPipeline([], { rules: bruteOnly(2) });
    expect(result.totalLinesAnalyzed).toBe(0);
    expect(result.report.addresses).toEqual([]);
  });

  it("keeps input order unless told to sort by timestamp", async () => {
    const outOfOrder = [
      line("10.0.0.1", "13:01:40", "POST /login HTTP/1.1", 401),
      line("10.0.0.1", "13:00:00", "POST /login HTTP/1.1", 401),
      line("10.0.0.1", "13:00:30", "POST /login HTTP/1.1", 401),
    ];

    const asLogged = await runAnalysisPipeline(outOfOrder, { rules: bruteOnly(2) });
    expect(asLogged.report.totalFindings).toBe(0);

    const sorted = await runAnalysisPipeline(outOfOrder, { rules: bruteOnly(2), order: "timestamp" });
    expect(sorted.report.totalFindings).toBe(1);
    expect(sorted.totalLinesAnalyzed).toBe(3);
    expect(sorted.report.addresses[0].findings[0].lineNumber).toBe(3);
  });

  it("counts skipped lines when sorting by timestamp", async () => {
    const result = await runAnalysisPipeline(
      [line("10.0.0.1", "13:00:00", "GET / HTTP/1.1", 200), "", "garbage"],
      { rules: bruteOnly(2), order: "timestamp" },
    );
    expect(result.totalLinesAnalyzed).toBe(3);
    expect(result.skippedLineCount).toBe(2);
  });

  it("applies the escalation policy from the rule set", async () => {
    const config: RuleSetConfig = {
      rules: [
        {
          id: "env-probe",
          kind: "SCANNING",
          severity: "LOW",
          patterns: [{ pattern: "/.env", literal: true }],
        },
      ],
      escalation: { HIGH: 3 },
    };
    const lines = ["13:00:00", "13:00:01", "13:00:02"].map((t) => line("10.0.0.7", t, "GET /.env HTTP/1.1", 404));

    const [summary] = (await runAnalysisPipeline(lines, { rules: config })).report.addresses;
    expect(summary.maxSeverity).toBe("LOW");
    expect(summary.escalatedSeverity).toBe("HIGH");
  });

  it("returns a partial report when cancelled", async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await runAnalysisPipeline(MIXED_LOG, {
      rulesPath: DEFAULT_RULES_PATH,
      signal: controller.signal,
    });
    expect(result.cancelled).toBe(true);
    expect(result.totalLinesAnalyzed).toBe(0);
    expect(result.report.totalFindings).toBe(0);
    expect(console.warn).toHaveBeenCalledWith("[Pipeline] Cancelled after 0 line(s); report holds partial results");
  });

  it("closes a log file it opened when cancelled", async () => {
    const path = join(TMP_DIR, "cancelled.log");
    writeFileSync(path, MIXED_LOG.join("\n") + "\n", "utf-8");
    const controller = new AbortController();
    controller.abort();

    const result = await runAnalysisPipeline(path, { rulesPath: DEFAULT_RULES_PATH, signal: controller.signal });
    expect(result.cancelled).toBe(true);
    expect(result.totalLinesAnalyzed).toBe(0);
  });

  it("fails before reading input when a rule is invalid", async () => {
    const read = vi.fn();
    async function* lines(): AsyncGenerator<string> {
      read();
      yield MIXED_LOG[0];
    }

    const run = runAnalysisPipeline(lines(), { rules: bruteOnly(0) });
    await expect(run).rejects.toThrow(ConfigError);
    await expect(run).rejects.toMatchObject({ code: "INVALID_RULE", ruleId: "bf" });
    expect(read).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(
      '[Pipeline] Invalid rule configuration: Rule "bf": threshold must be an integer >= 1 (got 0)',
    );
  });

  it("fails when the rule file cannot be read", async () => {
    const run = runAnalysisPipeline(MIXED_LOG, { rulesPath: join(TMP_DIR, "missing.json") });
    await expect(run).rejects.toMatchObject({ name: "ConfigError", code: "INVALID_CONFIG" });
  });

  it("fails when the rule file is not valid JSON", async () => {
    const path = join(TMP_DIR, "broken.json");
    writeFileSync(path, "{ not json", "utf-8");

    await expect(runAnalysisPipeline(MIXED_LOG, { rulesPath: path })).rejects.toMatchObject({
      code: "INVALID_CONFIG",
    });
  });
});
