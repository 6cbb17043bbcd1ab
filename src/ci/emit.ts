import type { ComplianceReport } from "../lib/report.js";
import * as githubActions from "./githubActions.js";
import * as gitlabCi from "./gitlabCi.js";
import type { CiPlatform } from "./platform.js";

/** Returns false when the platform has no adapter. */
export function emitCiOutput(
  report: ComplianceReport,
  platform: CiPlatform,
  ctx: { env: NodeJS.ProcessEnv; write: (line: string) => void; now_ms?: number }
): boolean {
  switch (platform) {
    case "github_actions":
      githubActions.outputReport(report, { env: ctx.env, write: ctx.write });
      return true;
    case "gitlab_ci":
      gitlabCi.outputReport(report, { write: ctx.write, now_ms: ctx.now_ms });
      return true;
    default:
      return false;
  }
}
