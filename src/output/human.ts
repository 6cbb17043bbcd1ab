import { EXIT_CODES, type ExitCodeName } from "../exitCodes.js";
import {
  bronzeCompliance,
  checksByCategory,
  formatPercentage,
  formatTimestamp,
  hasCriticalWarnings,
  passedCount,
  totalCount,
  type ComplianceReport,
  type WarningLevel
} from "../lib/report.js";

const RULE = "━".repeat(50);
const VERBOSE_RULE = "━".repeat(56);

const WARNING_ICONS: Record<WarningLevel, string> = {
  info: "ℹ️ ",
  warning: "⚠️ ",
  critical: "🚨"
};

const WARNING_TAGS: Record<WarningLevel, string> = {
  info: "[INFO]",
  warning: "[WARN]",
  critical: "[CRITICAL]"
};

type ComplianceState = "achieved" | "achieved_with_warnings" | "not_met";

function complianceState(report: ComplianceReport): ComplianceState {
  const bronze = bronzeCompliance(report);
  const critical = hasCriticalWarnings(report);
  if (bronze && !critical) return "achieved";
  if (bronze) return "achieved_with_warnings";
  return "not_met";
}

const STATE_LINES: Record<ComplianceState, string> = {
  achieved: "🏆 Bronze-level RSR compliance: ACHIEVED",
  achieved_with_warnings: "⚠️  Bronze-level RSR compliance: ACHIEVED (with warnings)",
  not_met: "⚠️  Bronze-level RSR compliance: NOT MET"
};

function checkLines(report: ComplianceReport): string[] {
  const lines: string[] = [];
  for (const [category, checks] of checksByCategory(report)) {
    lines.push("", `📋 ${category}`);
    for (const check of checks) {
      lines.push(`  ${check.passed ? "✅" : "❌"} ${check.item} [${check.required_for}]`);
    }
  }
  return lines;
}

function scoreLine(report: ComplianceReport): string {
  return `Score: ${passedCount(report)}/${totalCount(report)} checks passed (${formatPercentage(report)}%)`;
}

export function renderHuman(report: ComplianceReport): string {
  const lines: string[] = [
    "🤖 Rhodibot - RSR Compliance Report",
    RULE,
    `Repository: ${report.repository_path}`,
    `Verified:   ${formatTimestamp(report.verified_at)}`,
    ...checkLines(report)
  ];

  if (report.warnings.length > 0) {
    lines.push("", "🛡️  Security Warnings");
    for (const warning of report.warnings) {
      lines.push(`  ${WARNING_ICONS[warning.level]} ${warning.message}`);
    }
  }

  lines.push("", RULE, scoreLine(report));
  if (hasCriticalWarnings(report)) {
    lines.push("🚨 CRITICAL: Security warnings detected - review required");
  }
  lines.push(STATE_LINES[complianceState(report)]);

  return lines.join("\n") + "\n";
}

/** Like the human report, plus version, warning paths and the exit code the run ends with. */
export function renderVerbose(report: ComplianceReport, opts: { version: string; exit_code: ExitCodeName }): string {
  const lines: string[] = [
    "🤖 Rhodibot - RSR Compliance Report (Verbose)",
    VERBOSE_RULE,
    `Repository: ${report.repository_path}`,
    `Verified:   ${formatTimestamp(report.verified_at)}`,
    `Version:    ${opts.version}`,
    ...checkLines(report)
  ];

  if (report.warnings.length > 0) {
    lines.push("", `🛡️  Security Warnings (${report.warnings.length} total)`);
    for (const warning of report.warnings) {
      lines.push(`  ${WARNING_ICONS[warning.level]} ${WARNING_TAGS[warning.level]} ${warning.message}`);
      if (warning.path) lines.push(`      Path: ${warning.path}`);
    }
  }

  lines.push("", VERBOSE_RULE, scoreLine(report));
  if (hasCriticalWarnings(report)) {
    lines.push("🚨 CRITICAL: Security warnings detected - review required");
  }
  lines.push(STATE_LINES[complianceState(report)]);
  lines.push(`   Exit code: ${EXIT_CODES[opts.exit_code]} (${opts.exit_code})`);

  return lines.join("\n") + "\n";
}

export function renderQuiet(report: ComplianceReport): string {
  const critical = hasCriticalWarnings(report);
  if (bronzeCompliance(report) && !critical) return "PASS\n";
  if (critical) return "FAIL (security)\n";
  return "FAIL\n";
}
