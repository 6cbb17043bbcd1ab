import {
  bronzeCompliance,
  formatTimestamp,
  hasCriticalWarnings,
  passedCount,
  percentage,
  totalCount,
  type ComplianceReport,
  type WarningLevel
} from "../lib/report.js";
import type { ComplianceLevel } from "../lib/levels.js";

export type JsonReport = {
  tool: "rhodibot";
  version: string;
  repository: string;
  verified_at: string;
  score: { passed: number; total: number; percentage: number };
  bronze_compliant: boolean;
  has_critical_warnings: boolean;
  checks: Array<{ category: string; item: string; passed: boolean; level: ComplianceLevel }>;
  warnings: Array<{ level: WarningLevel; message: string; path: string | null }>;
};

export function toJsonReport(report: ComplianceReport, opts: { version: string }): JsonReport {
  return {
    tool: "rhodibot",
    version: opts.version,
    repository: report.repository_path,
    verified_at: formatTimestamp(report.verified_at),
    score: {
      passed: passedCount(report),
      total: totalCount(report),
      percentage: Math.round(percentage(report) * 10) / 10
    },
    bronze_compliant: bronzeCompliance(report),
    has_critical_warnings: hasCriticalWarnings(report),
    checks: report.checks.map((c) => ({ category: c.category, item: c.item, passed: c.passed, level: c.required_for })),
    warnings: report.warnings.map((w) => ({ level: w.level, message: w.message, path: w.path }))
  };
}

export function renderJson(report: ComplianceReport, opts: { version: string }): string {
  return JSON.stringify(toJsonReport(report, opts), null, 2) + "\n";
}
