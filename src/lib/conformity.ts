import path from "node:path";
import { STANDARD_URL } from "./badge.js";
import {
  formatPercentage,
  formatTimestamp,
  highestLevel,
  passedCount,
  totalCount,
  type ComplianceReport
} from "./report.js";

/** Markdown conformity statement listing the requirements of the achieved tier. */
export function generateConformityDoc(report: ComplianceReport): string {
  const level = highestLevel(report);
  const levelName = level ?? "Not Met";
  const timestamp = formatTimestamp(report.verified_at);
  const project = path.basename(path.resolve(report.repository_path)) || "Unknown";

  const lines: string[] = [
    "# RSR Conformity Statement",
    "",
    `**Project**: ${project}`,
    `**RSR Level**: ${levelName}`,
    `**Standard**: [Rhodium Standard Repository](${STANDARD_URL})`,
    `**Last Verified**: ${timestamp.split("T")[0]}`,
    ""
  ];

  if (level) {
    lines.push(`## ${level} Requirements Met`, "", "| Requirement | Status |", "|-------------|--------|");
    for (const check of report.checks) {
      if (check.required_for !== level) continue;
      lines.push(`| ${check.item} | ${check.passed ? "Yes" : "No"} |`);
    }
    lines.push("");
  }

  lines.push(
    "## Verification",
    "",
    "Run self-verification:",
    "```bash",
    "rhodibot check .",
    "```",
    "",
    `Expected output: \`${passedCount(report)}/${totalCount(report)} checks passed (${formatPercentage(report)}%)\``,
    ""
  );

  return lines.join("\n");
}
