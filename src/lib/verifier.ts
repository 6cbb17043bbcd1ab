import path from "node:path";
import { inspectPath, isEntryOfKind, type EntryKind } from "./pathSecurity.js";
import type { CheckResult, ComplianceReport, SecurityWarning } from "./report.js";
import { BRONZE_REQUIREMENTS, type Requirement } from "./requirements.js";

export type ProbeOutcome = {
  passed: boolean;
  warning: SecurityWarning | null;
};

export type RequirementOutcome = {
  check: CheckResult;
  warnings: SecurityWarning[];
};

/**
 * Runs every requirement against `repoPath` in table order. The caller is
 * responsible for `repoPath` being an existing directory.
 */
export function verifyRepository(
  repoPath: string,
  opts: { now_ms?: number; requirements?: readonly Requirement[] } = {}
): ComplianceReport {
  const requirements = opts.requirements ?? BRONZE_REQUIREMENTS;
  const verifiedAt = opts.now_ms ?? Date.now();

  const passedByItem = new Map<string, boolean>();
  const checks: CheckResult[] = [];
  const warnings: SecurityWarning[] = [];

  for (const requirement of requirements) {
    const outcome = evaluateRequirement(repoPath, requirement, passedByItem);
    passedByItem.set(requirement.item, outcome.check.passed);
    checks.push(outcome.check);
    warnings.push(...outcome.warnings);
  }

  return { repository_path: repoPath, verified_at: verifiedAt, checks, warnings };
}

export function evaluateRequirement(
  repoPath: string,
  requirement: Requirement,
  passedByItem: ReadonlyMap<string, boolean>
): RequirementOutcome {
  const warnings: SecurityWarning[] = [];
  let passed = false;

  const prerequisiteMet = requirement.requires === undefined || passedByItem.get(requirement.requires) === true;
  if (prerequisiteMet) {
    for (const candidate of requirement.candidates) {
      const probe = probeEntry(repoPath, candidate, requirement.kind);
      if (probe.warning) warnings.push(probe.warning);
      if (probe.passed) {
        passed = true;
        break;
      }
    }
  }

  return {
    check: {
      category: requirement.category,
      item: requirement.item,
      passed,
      required_for: requirement.level
    },
    warnings
  };
}

/**
 * Probes one relative path. The outcome follows the resolved entry type only;
 * a symlink escaping the root is reported through the warning, not by failing.
 */
export function probeEntry(repoPath: string, relPath: string, kind: EntryKind): ProbeOutcome {
  const fullPath = path.join(repoPath, relPath);
  const security = inspectPath(fullPath, repoPath);
  const noun = kind === "dir" ? "symlink directory" : "symlink";

  let warning: SecurityWarning | null = null;
  if (security.is_symlink) {
    if (security.escapes_repo) {
      const label = kind === "dir" ? "Symlink directory" : "Symlink";
      warning = {
        level: "critical",
        message: `${label} '${relPath}' points outside repository to '${security.target ?? ""}'`,
        path: fullPath
      };
    } else {
      warning = {
        level: "info",
        message: `'${relPath}' is a ${noun} (within repository bounds)`,
        path: fullPath
      };
    }
  }

  return { passed: security.exists && isEntryOfKind(fullPath, kind), warning };
}
