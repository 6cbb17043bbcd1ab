import {
  bronzeCompliance,
  formatPercentage,
  hasCriticalWarnings,
  passedCount,
  totalCount,
  type ComplianceReport
} from "../lib/report.js";

const ESC = "\u001b";
const SECTION = "rhodibot_report";

export type GitlabCiContext = {
  write: (line: string) => void;
  now_ms?: number;
};

export function dotenvLines(report: ComplianceReport): string[] {
  return [
    `RHODIBOT_PASSED=${passedCount(report)}`,
    `RHODIBOT_TOTAL=${totalCount(report)}`,
    `RHODIBOT_PERCENTAGE=${formatPercentage(report)}`,
    `RHODIBOT_BRONZE_COMPLIANT=${bronzeCompliance(report)}`,
    `RHODIBOT_HAS_WARNINGS=${hasCriticalWarnings(report)}`
  ];
}

/** Dotenv-style variables followed by a collapsible job-log section listing every check. */
export function outputReport(report: ComplianceReport, ctx: GitlabCiContext): void {
  for (const line of dotenvLines(report)) ctx.write(line);

  const seconds = Math.floor((ctx.now_ms ?? Date.now()) / 1000);
  ctx.write("");
  ctx.write(`${ESC}[0Ksection_start:${seconds}:${SECTION}[collapsed=false]\r${ESC}[0K${ESC}[36mRhodibot Report${ESC}[0m`);
  for (const check of report.checks) {
    const status = check.passed ? "✓" : "✗";
    const color = check.passed ? "32" : "31";
    ctx.write(`${ESC}[${color}m[${status}]${ESC}[0m ${check.category} - ${check.item}`);
  }
  ctx.write(`${ESC}[0Ksection_end:${seconds}:${SECTION}\r${ESC}[0K`);
}
