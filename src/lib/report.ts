import { COMPLIANCE_LEVELS, type ComplianceLevel } from "./levels.js";

export type WarningLevel = "info" | "warning" | "critical";

export type CheckResult = {
  readonly category: string;
  readonly item: string;
  readonly passed: boolean;
  readonly required_for: ComplianceLevel;
};

export type SecurityWarning = {
  readonly level: WarningLevel;
  readonly message: string;
  readonly path: string | null;
};

export type ComplianceReport = {
  readonly repository_path: string;
  readonly verified_at: number;
  readonly checks: readonly CheckResult[];
  readonly warnings: readonly SecurityWarning[];
};

export function passedCount(report: ComplianceReport): number {
  return report.checks.filter((c) => c.passed).length;
}

export function totalCount(report: ComplianceReport): number {
  return report.checks.length;
}

export function percentage(report: ComplianceReport): number {
  const total = totalCount(report);
  if (total === 0) return 0;
  return (passedCount(report) / total) * 100;
}

/** True when every check tagged with `level` passed (vacuously true for an untagged tier). */
export function levelCompliance(report: ComplianceReport, level: ComplianceLevel): boolean {
  return report.checks.filter((c) => c.required_for === level).every((c) => c.passed);
}

export function bronzeCompliance(report: ComplianceReport): boolean {
  return levelCompliance(report, "Bronze");
}

export function hasCriticalWarnings(report: ComplianceReport): boolean {
  return report.warnings.some((w) => w.level === "critical");
}

/**
 * Highest tier achieved. Bronze needs its checks passing and no critical warning;
 * each higher tier counts only once it has checks of its own, all passing.
 */
export function highestLevel(report: ComplianceReport): ComplianceLevel | null {
  if (!bronzeCompliance(report) || hasCriticalWarnings(report)) return null;

  let achieved: ComplianceLevel = "Bronze";
  for (const level of COMPLIANCE_LEVELS.slice(1)) {
    const checks = report.checks.filter((c) => c.required_for === level);
    if (checks.length === 0 || !checks.every((c) => c.passed)) break;
    achieved = level;
  }
  return achieved;
}

/** Groups checks by category, keeping first-seen category order. */
export function checksByCategory(report: ComplianceReport): Map<string, CheckResult[]> {
  const out = new Map<string, CheckResult[]>();
  for (const check of report.checks) {
    const group = out.get(check.category);
    if (group) {
      group.push(check);
    } else {
      out.set(check.category, [check]);
    }
  }
  return out;
}

export function formatTimestamp(epochMs: number): string {
  const d = new Date(epochMs);
  if (isNaN(d.getTime())) return "unknown";
  return d.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function formatPercentage(report: ComplianceReport): string {
  return percentage(report).toFixed(1);
}
