import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { isEntryOfKind } from "../lib/pathSecurity.js";
import { DEFAULT_OUTPUT_PATHS } from "./generate.js";

export type PipelineValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

const GithubStepSchema = z
  .object({
    name: z.string().optional(),
    uses: z.string().optional(),
    run: z.string().optional()
  })
  .passthrough();

const GithubJobSchema = z
  .object({
    "runs-on": z.unknown().optional(),
    uses: z.string().optional(),
    steps: z.array(GithubStepSchema).optional()
  })
  .passthrough()
  .refine((job) => job["runs-on"] !== undefined || job.uses !== undefined, {
    message: "job must declare runs-on or uses"
  });

const GithubWorkflowSchema = z
  .object({
    on: z.unknown().refine((v) => v !== undefined && v !== null, { message: "missing 'on' trigger" }),
    jobs: z.record(z.string(), GithubJobSchema).refine((jobs) => Object.keys(jobs).length > 0, {
      message: "jobs must not be empty"
    })
  })
  .passthrough();

const GitlabConfigSchema = z.record(z.string(), z.unknown());

const CircleJobSchema = z
  .object({
    steps: z.array(z.unknown()).optional()
  })
  .passthrough()
  .refine((job) => job.steps !== undefined, { message: "job must define steps" });

const CircleConfigSchema = z
  .object({
    version: z.unknown().refine((v) => v !== undefined && v !== null, { message: "missing 'version'" }),
    jobs: z.record(z.string(), CircleJobSchema).refine((jobs) => Object.keys(jobs).length > 0, {
      message: "jobs must not be empty"
    })
  })
  .passthrough();

const JENKINS_BLOCK = /^\s*(pipeline|node)\b[^{\n]*\{/m;

const GitlabJobSchema = z
  .object({
    script: z.union([z.string(), z.array(z.unknown())]).optional(),
    trigger: z.unknown().optional(),
    extends: z.union([z.string(), z.array(z.string())]).optional()
  })
  .passthrough()
  .refine((job) => job.script !== undefined || job.trigger !== undefined || job.extends !== undefined, {
    message: "job must define script, trigger or extends"
  });

const GITLAB_KEYWORDS = new Set([
  "default",
  "include",
  "stages",
  "variables",
  "workflow",
  "image",
  "services",
  "cache",
  "before_script",
  "after_script",
  "types"
]);

/** Regular files only, so a directory named like a configuration file is ignored. */
export function findPipelineFiles(repoPath: string): string[] {
  const found: string[] = [];
  const workflowsDir = path.join(repoPath, ".github", "workflows");
  if (isEntryOfKind(workflowsDir, "dir")) {
    const names = fs
      .readdirSync(workflowsDir)
      .filter((n) => n.endsWith(".yml") || n.endsWith(".yaml"))
      .filter((n) => isEntryOfKind(path.join(workflowsDir, n), "file"))
      .sort();
    for (const name of names) found.push(path.join(".github", "workflows", name));
  }
  for (const file of [DEFAULT_OUTPUT_PATHS.gitlab, DEFAULT_OUTPUT_PATHS.circle, DEFAULT_OUTPUT_PATHS.jenkins]) {
    if (isEntryOfKind(path.join(repoPath, file), "file")) found.push(path.normalize(file));
  }
  return found;
}

function formatIssues(file: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${file}: ${where}${issue.message}`;
  });
}

function parseYaml(file: string, raw: string, errors: string[]): unknown {
  try {
    return YAML.parse(raw);
  } catch (e) {
    errors.push(`${file}: invalid YAML: ${e instanceof Error ? e.message : String(e)}`);
    return undefined;
  }
}

function readConfig(repoPath: string, file: string, errors: string[]): string | undefined {
  try {
    return fs.readFileSync(path.join(repoPath, file), "utf8");
  } catch (e) {
    errors.push(`${file}: cannot read: ${e instanceof Error ? e.message : String(e)}`);
    return undefined;
  }
}

function validateGithubWorkflow(file: string, parsed: unknown, errors: string[]): void {
  const result = GithubWorkflowSchema.safeParse(parsed);
  if (!result.success) errors.push(...formatIssues(file, result.error));
}

function validateGitlabConfig(file: string, parsed: unknown, errors: string[]): void {
  const config = GitlabConfigSchema.safeParse(parsed);
  if (!config.success) {
    errors.push(`${file}: configuration must be a mapping`);
    return;
  }

  let jobs = 0;
  for (const [name, value] of Object.entries(config.data)) {
    if (GITLAB_KEYWORDS.has(name) || name.startsWith(".")) continue;
    const job = GitlabJobSchema.safeParse(value);
    if (!job.success) {
      errors.push(...formatIssues(`${file}: ${name}`, job.error));
      continue;
    }
    jobs += 1;
  }
  if (jobs === 0) errors.push(`${file}: no jobs defined`);
}

function validateCircleConfig(file: string, parsed: unknown, errors: string[]): void {
  const result = CircleConfigSchema.safeParse(parsed);
  if (!result.success) errors.push(...formatIssues(file, result.error));
}

function validateJenkinsfile(file: string, raw: string, errors: string[]): void {
  if (!JENKINS_BLOCK.test(raw)) errors.push(`${file}: no pipeline or node block`);
}

/** Checks the repository's CI configuration files for shape and for a compliance step. */
export function validatePipeline(repoPath: string): PipelineValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  const files = findPipelineFiles(repoPath);
  if (files.length === 0) {
    errors.push("No CI/CD configuration found (.github/workflows/*.yml, .gitlab-ci.yml, .circleci/config.yml or Jenkinsfile)");
    return { valid: false, errors, warnings };
  }

  let runsCheck = false;
  for (const file of files) {
    const raw = readConfig(repoPath, file, errors);
    if (raw === undefined) continue;
    if (raw.includes("rhodibot")) runsCheck = true;

    if (file === DEFAULT_OUTPUT_PATHS.jenkins) {
      validateJenkinsfile(file, raw, errors);
      continue;
    }

    const before = errors.length;
    const parsed = parseYaml(file, raw, errors);
    if (errors.length > before) continue;

    if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
      errors.push(`${file}: configuration must be a mapping`);
      continue;
    }

    if (file === DEFAULT_OUTPUT_PATHS.gitlab) {
      validateGitlabConfig(file, parsed, errors);
    } else if (file === path.normalize(DEFAULT_OUTPUT_PATHS.circle)) {
      validateCircleConfig(file, parsed, errors);
    } else {
      validateGithubWorkflow(file, parsed, errors);
    }
  }

  if (!runsCheck) {
    warnings.push("No pipeline runs the rhodibot compliance check");
  }

  return { valid: errors.length === 0, errors, warnings };
}
