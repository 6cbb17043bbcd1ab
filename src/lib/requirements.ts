import type { EntryKind } from "./pathSecurity.js";
import type { ComplianceLevel } from "./levels.js";

export type Requirement = {
  category: string;
  item: string;
  kind: EntryKind;
  /** Paths relative to the repository root, probed in order; the first present one satisfies the requirement. */
  candidates: string[];
  level: ComplianceLevel;
  /** Item of an earlier requirement that must have passed; otherwise this one fails unprobed. */
  requires?: string;
};

const WELL_KNOWN_DIR = ".well-known/ directory";

export const BRONZE_REQUIREMENTS: readonly Requirement[] = [
  { category: "Documentation", item: "README.md", kind: "file", candidates: ["README.md", "README.adoc"], level: "Bronze" },
  { category: "Documentation", item: "LICENSE.txt", kind: "file", candidates: ["LICENSE.txt"], level: "Bronze" },
  { category: "Documentation", item: "SECURITY.md", kind: "file", candidates: ["SECURITY.md"], level: "Bronze" },
  { category: "Documentation", item: "CONTRIBUTING.md", kind: "file", candidates: ["CONTRIBUTING.md"], level: "Bronze" },
  { category: "Documentation", item: "CODE_OF_CONDUCT.md", kind: "file", candidates: ["CODE_OF_CONDUCT.md"], level: "Bronze" },
  { category: "Documentation", item: "MAINTAINERS.md", kind: "file", candidates: ["MAINTAINERS.md"], level: "Bronze" },
  { category: "Documentation", item: "CHANGELOG.md", kind: "file", candidates: ["CHANGELOG.md"], level: "Bronze" },

  { category: "Well-Known", item: WELL_KNOWN_DIR, kind: "dir", candidates: [".well-known"], level: "Bronze" },
  { category: "Well-Known", item: "security.txt", kind: "file", candidates: [".well-known/security.txt"], level: "Bronze", requires: WELL_KNOWN_DIR },
  { category: "Well-Known", item: "ai.txt", kind: "file", candidates: [".well-known/ai.txt"], level: "Bronze", requires: WELL_KNOWN_DIR },
  { category: "Well-Known", item: "humans.txt", kind: "file", candidates: [".well-known/humans.txt"], level: "Bronze", requires: WELL_KNOWN_DIR },

  { category: "Build System", item: "justfile", kind: "file", candidates: ["justfile"], level: "Bronze" },
  { category: "Build System", item: "flake.nix", kind: "file", candidates: ["flake.nix"], level: "Bronze" },
  { category: "Build System", item: ".gitlab-ci.yml", kind: "file", candidates: [".gitlab-ci.yml"], level: "Bronze" },

  { category: "Source Structure", item: "src/ directory", kind: "dir", candidates: ["src"], level: "Bronze" },
  { category: "Source Structure", item: "tests/ directory", kind: "dir", candidates: ["tests", "test"], level: "Bronze" }
];
