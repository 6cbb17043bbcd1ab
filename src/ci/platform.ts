export type CiPlatform = "github_actions" | "gitlab_ci" | "circleci" | "travis" | "jenkins" | "unknown";

const DETECTION_ORDER: Array<[envVar: string, platform: CiPlatform]> = [
  ["GITHUB_ACTIONS", "github_actions"],
  ["GITLAB_CI", "gitlab_ci"],
  ["CIRCLECI", "circleci"],
  ["TRAVIS", "travis"],
  ["JENKINS_URL", "jenkins"]
];

const PLATFORM_NAMES: Record<CiPlatform, string> = {
  github_actions: "GitHub Actions",
  gitlab_ci: "GitLab CI",
  circleci: "CircleCI",
  travis: "Travis CI",
  jenkins: "Jenkins",
  unknown: "Unknown"
};

export function detectPlatform(env: NodeJS.ProcessEnv): CiPlatform {
  for (const [envVar, platform] of DETECTION_ORDER) {
    if (env[envVar] !== undefined) return platform;
  }
  return "unknown";
}

export function platformName(platform: CiPlatform): string {
  return PLATFORM_NAMES[platform];
}
