import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { emitCiOutput } from "../src/ci/emit.js";
import { annotation, buildJobSummary, outputReport as githubOutput, setOutput } from "../src/ci/githubActions.js";
import { dotenvLines, outputReport as gitlabOutput } from "../src/ci/gitlabCi.js";
import { detectPlatform, platformName } from "../src/ci/platform.js";
import type { ComplianceReport } from "../src/lib/report.js";
import { cleanupTmpDirs, createTmpDir } from "./fixtures.js";

afterEach(() => {
  cleanupTmpDirs();
});

const ESC = "\u001b";

const REPORT: ComplianceReport = {
  repository_path: "/srv/repo",
  verified_at: 1705322445000,
  checks: [
    { category: "Documentation", item: "README.md", passed: true, required_for: "Bronze" },
    { category: "Build System", item: "justfile", passed: false, required_for: "Bronze" }
  ],
  warnings: [
    { level: "critical", message: "Symlink 'README.md' points outside repository to '/etc/motd'", path: "/srv/repo/README.md" },
    { level: "info", message: "'src' is a symlink directory (within repository bounds)", path: "/srv/repo/src" }
  ]
};

function collect(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = [];
  return { lines, write: (line) => lines.push(line) };
}

describe("detectPlatform", () => {
  test("picks the first matching marker variable", () => {
    expect(detectPlatform({ GITHUB_ACTIONS: "true" })).toBe("github_actions");
    expect(detectPlatform({ GITLAB_CI: "true", CIRCLECI: "true" })).toBe("gitlab_ci");
    expect(detectPlatform({ JENKINS_URL: "http://ci.local/" })).toBe("jenkins");
    expect(detectPlatform({ TRAVIS: "" })).toBe("travis");
    expect(detectPlatform({})).toBe("unknown");
  });

  test("names platforms for display", () => {
    expect(platformName("circleci")).toBe("CircleCI");
    expect(platformName("unknown")).toBe("Unknown");
  });
});

describe("GitHub Actions", () => {
  test("formats annotations with an optional location", () => {
    expect(annotation("warning", "msg")).toBe("::warning::msg");
    expect(annotation("error", "msg", "a.txt")).toBe("::error file=a.txt::msg");
    expect(annotation("error", "msg", "a.txt", 3)).toBe("::error file=a.txt,line=3::msg");
    expect(annotation("warning", "msg", null, 3)).toBe("::warning::msg");
  });

  test("falls back to the workflow command when no output file is configured", () => {
    const { lines, write } = collect();
    setOutput({ env: {}, write }, "passed", "16");
    expect(lines).toEqual(["::set-output name=passed::16"]);
  });

  test("writes outputs and the job summary to the runner files", () => {
    const dir = createTmpDir();
    const outputFile = path.join(dir, "output");
    const summaryFile = path.join(dir, "summary");
    const { lines, write } = collect();

    githubOutput(REPORT, { env: { GITHUB_OUTPUT: outputFile, GITHUB_STEP_SUMMARY: summaryFile }, write });

    expect(fs.readFileSync(outputFile, "utf8")).toBe(
      "passed=1\ntotal=2\npercentage=50.0\nbronze_compliant=false\nhas_warnings=true\n"
    );
    expect(lines).toEqual([
      "::warning::RSR check failed: Build System - justfile",
      "::error file=/srv/repo/README.md::Symlink 'README.md' points outside repository to '/etc/motd'",
      "::warning file=/srv/repo/src::'src' is a symlink directory (within repository bounds)"
    ]);
    expect(fs.readFileSync(summaryFile, "utf8")).toBe(buildJobSummary(REPORT) + "\n");
  });

  test("summarises checks and warnings as markdown", () => {
    expect(buildJobSummary(REPORT).split("\n")).toEqual([
      "## 🤖 Rhodibot RSR Compliance Report",
      "",
      "❌ **Bronze-level RSR compliance: NOT MET**",
      "",
      "**Score**: 1/2 checks passed (50.0%)",
      "",
      "### Checks",
      "",
      "| Category | Item | Status |",
      "|----------|------|--------|",
      "| Documentation | README.md | ✅ |",
      "| Build System | justfile | ❌ |",
      "",
      "### Security Warnings",
      "",
      "- 🚨 Symlink 'README.md' points outside repository to '/etc/motd'",
      "- ℹ️ 'src' is a symlink directory (within repository bounds)"
    ]);
  });
});

describe("GitLab CI", () => {
  test("exposes counts as dotenv variables", () => {
    expect(dotenvLines(REPORT)).toEqual([
      "RHODIBOT_PASSED=1",
      "RHODIBOT_TOTAL=2",
      "RHODIBOT_PERCENTAGE=50.0",
      "RHODIBOT_BRONZE_COMPLIANT=false",
      "RHODIBOT_HAS_WARNINGS=true"
    ]);
  });

  test("wraps the check list in a collapsible section", () => {
    const { lines, write } = collect();
    gitlabOutput(REPORT, { write, now_ms: 1705322445000 });

    expect(lines.slice(5)).toEqual([
      "",
      `${ESC}[0Ksection_start:1705322445:rhodibot_report[collapsed=false]\r${ESC}[0K${ESC}[36mRhodibot Report${ESC}[0m`,
      `${ESC}[32m[✓]${ESC}[0m Documentation - README.md`,
      `${ESC}[31m[✗]${ESC}[0m Build System - justfile`,
      `${ESC}[0Ksection_end:1705322445:rhodibot_report\r${ESC}[0K`
    ]);
  });
});

describe("emitCiOutput", () => {
  test("dispatches to the platform adapter", () => {
    const { lines, write } = collect();
    expect(emitCiOutput(REPORT, "gitlab_ci", { env: {}, write, now_ms: 0 })).toBe(true);
    expect(lines[0]).toBe("RHODIBOT_PASSED=1");
  });

  test("reports platforms without an adapter", () => {
    const { lines, write } = collect();
    expect(emitCiOutput(REPORT, "travis", { env: {}, write })).toBe(false);
    expect(lines).toEqual([]);
  });
});
