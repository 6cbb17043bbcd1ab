export const COMPLIANCE_LEVELS = ["Bronze", "Silver", "Gold", "Platinum"] as const;

export type ComplianceLevel = (typeof COMPLIANCE_LEVELS)[number];

const BADGE_COLORS: Record<ComplianceLevel, string> = {
  Bronze: "cd7f32",
  Silver: "c0c0c0",
  Gold: "ffd700",
  Platinum: "e5e4e2"
};

export function badgeColor(level: ComplianceLevel): string {
  return BADGE_COLORS[level];
}
