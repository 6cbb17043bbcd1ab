import { bronzeCompliance, hasCriticalWarnings, type ComplianceReport } from "./lib/report.js";

export const EXIT_CODES = {
  SUCCESS: 0,
  COMPLIANCE_FAILED: 1,
  SECURITY_WARNING: 2,
  INVALID_PATH: 3,
  INVALID_ARGS: 4
} as const;

export type ExitCodeName = keyof typeof EXIT_CODES;

export function exitCodeNameFor(report: ComplianceReport, opts: { fail_on_warning: boolean }): ExitCodeName {
  if (opts.fail_on_warning && hasCriticalWarnings(report)) return "SECURITY_WARNING";
  if (!bronzeCompliance(report)) return "COMPLIANCE_FAILED";
  return "SUCCESS";
}

export function exitCodeFor(report: ComplianceReport, opts: { fail_on_warning: boolean }): number {
  return EXIT_CODES[exitCodeNameFor(report, opts)];
}
