import { badgeColor, type ComplianceLevel } from "./levels.js";

export const STANDARD_URL = "https://github.com/hyperpolymath/rhodium-standard-repositories";

export function generateBadge(level: ComplianceLevel): string {
  return `[![Rhodium Standard ${level}](https://img.shields.io/badge/RSR-${level}-${badgeColor(level)})](${STANDARD_URL})`;
}
