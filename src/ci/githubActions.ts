import fs from "node:fs";
import {
  bronzeCompliance,
  formatPercentage,
  hasCriticalWarnings,
  passedCount,
  totalCount,
  type ComplianceReport,
  type WarningLevel
} from "../lib/report.js";

export type GithubActionsContext = {
  env: NodeJS.ProcessEnv;
  write: (line: string) => void;
};

const SUMMARY_ICONS: Record<WarningLevel, string> = {
  info: "ℹ️",
  warning: "⚠️",
  critical: "🚨"
};

export function setOutput(ctx: GithubActionsContext, name: string, value: string): void {
  const outputFile = ctx.env.GITHUB_OUTPUT;
  if (outputFile) {
    fs.appendFileSync(outputFile, `${name}=${value}\n`, "utf8");
    return;
  }
  ctx.write(`::set-output name=${name}::${value}`);
}

export function annotation(kind: "warning" | "error", message: string, file?: string | null, line?: number): string {
  let location = "";
  if (file) {
    location = ` file=${file}`;
    if (line !== undefined) location += `,line=${line}`;
  }
  return `::${kind}${location}::${message}`;
}

export function appendSummary(ctx: GithubActionsContext, markdown: string): void {
  const summaryFile = ctx.env.GITHUB_STEP_SUMMARY;
  if (!summaryFile) return;
  fs.appendFileSync(summaryFile, markdown + "\n", "utf8");
}

export function buildJobSummary(report: ComplianceReport): string {
  const lines: string[] = ["## 🤖 Rhodibot RSR Compliance Report", ""];
  if (bronzeCompliance(report) && !hasCriticalWarnings(report)) {
    lines.push("✅ **Bronze-level RSR compliance: ACHIEVED**", "");
  } else {
    lines.push("❌ **Bronze-level RSR compliance: NOT MET**", "");
  }
  lines.push(`**Score**: ${passedCount(report)}/${totalCount(report)} checks passed (${formatPercentage(report)}%)`, "");

  lines.push("### Checks", "", "| Category | Item | Status |", "|----------|------|--------|");
  for (const check of report.checks) {
    lines.push(`| ${check.category} | ${check.item} | ${check.passed ? "✅" : "❌"} |`);
  }

  if (report.warnings.length > 0) {
    lines.push("", "### Security Warnings", "");
    for (const warning of report.warnings) {
      lines.push(`- ${SUMMARY_ICONS[warning.level]} ${warning.message}`);
    }
  }

  return lines.join("\n");
}

/** Step outputs, annotations for failed checks and warnings, and the job summary. */
export function outputReport(report: ComplianceReport, ctx: GithubActionsContext): void {
  setOutput(ctx, "passed", String(passedCount(report)));
  setOutput(ctx, "total", String(totalCount(report)));
  setOutput(ctx, "percentage", formatPercentage(report));
  setOutput(ctx, "bronze_compliant", String(bronzeCompliance(report)));
  setOutput(ctx, "has_warnings", String(hasCriticalWarnings(report)));

  for (const check of report.checks) {
    if (check.passed) continue;
    ctx.write(annotation("warning", `RSR check failed: ${check.category} - ${check.item}`));
  }

  for (const warning of report.warnings) {
    const kind = warning.level === "critical" ? "error" : "warning";
    ctx.write(annotation(kind, warning.message, warning.path));
  }

  appendSummary(ctx, buildJobSummary(report));
}
