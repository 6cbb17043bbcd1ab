import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";

export const PipelinePlatformSchema = z.enum(["github", "gitlab", "circle", "jenkins"]);
export type PipelinePlatform = z.infer<typeof PipelinePlatformSchema>;

export type PipelineOptions = {
  project_name: string;
};

export const DEFAULT_OUTPUT_PATHS: Record<PipelinePlatform, string> = {
  github: ".github/workflows/rsr-compliance.yml",
  gitlab: ".gitlab-ci.yml",
  circle: ".circleci/config.yml",
  jenkins: "Jenkinsfile"
};

export const PLATFORM_LABELS: Record<PipelinePlatform, string> = {
  github: "GitHub Actions workflow",
  gitlab: "GitLab CI configuration",
  circle: "CircleCI configuration",
  jenkins: "Jenkinsfile"
};

const INSTALL_COMMAND = "npm install --global rhodibot";
const JSON_REPORT_FILE = "rhodibot-report.json";
const JSON_CHECK_COMMAND = `rhodibot check . --format json > ${JSON_REPORT_FILE} || true`;

function githubWorkflow(opts: PipelineOptions): Record<string, unknown> {
  return {
    name: `RSR Compliance (${opts.project_name})`,
    on: {
      push: { branches: ["main", "master"] },
      pull_request: { branches: ["main", "master"] },
      schedule: [{ cron: "0 0 * * 1" }]
    },
    jobs: {
      rhodibot: {
        name: "RSR Compliance Check",
        "runs-on": "ubuntu-latest",
        steps: [
          { name: "Checkout repository", uses: "actions/checkout@v4" },
          { name: "Set up Node.js", uses: "actions/setup-node@v4", with: { "node-version": 20 } },
          { name: "Install Rhodibot", run: INSTALL_COMMAND },
          {
            name: "Run RSR compliance check",
            id: "check",
            run: `${JSON_CHECK_COMMAND}\nrhodibot check . --ci\n`,
            "continue-on-error": true
          },
          { name: "Generate badge", run: "rhodibot badge > RSR_BADGE.md" },
          {
            name: "Upload report",
            uses: "actions/upload-artifact@v4",
            with: { name: "rhodibot-report", path: JSON_REPORT_FILE }
          },
          {
            name: "Check result",
            if: "steps.check.outcome == 'failure'",
            run: 'echo "RSR compliance check failed!"\nexit 1\n'
          }
        ]
      }
    }
  };
}

function gitlabConfig(): Record<string, unknown> {
  return {
    rhodibot: {
      stage: "test",
      image: "node:20",
      before_script: [INSTALL_COMMAND],
      script: [JSON_CHECK_COMMAND, "rhodibot check . --ci"],
      artifacts: { paths: [JSON_REPORT_FILE], when: "always" },
      allow_failure: false,
      rules: [
        { if: '$CI_PIPELINE_SOURCE == "merge_request_event"' },
        { if: "$CI_COMMIT_BRANCH == $CI_DEFAULT_BRANCH" },
        { if: '$CI_PIPELINE_SOURCE == "schedule"' }
      ]
    }
  };
}

function circleConfig(): Record<string, unknown> {
  return {
    version: 2.1,
    jobs: {
      rhodibot: {
        docker: [{ image: "cimg/node:20.11" }],
        steps: [
          "checkout",
          { run: { name: "Install Rhodibot", command: `sudo ${INSTALL_COMMAND}` } },
          { run: { name: "Run RSR compliance check", command: `${JSON_CHECK_COMMAND}\nrhodibot check .\n` } },
          { store_artifacts: { path: JSON_REPORT_FILE } }
        ]
      }
    },
    workflows: {
      "rsr-compliance": { jobs: ["rhodibot"] }
    }
  };
}

function jenkinsfile(opts: PipelineOptions): string {
  return [
    `// Rhodibot RSR compliance check for ${opts.project_name}`,
    "pipeline {",
    "    agent { docker { image 'node:20' } }",
    "    stages {",
    "        stage('RSR Compliance') {",
    "            steps {",
    `                sh '${INSTALL_COMMAND}'`,
    `                sh '${JSON_CHECK_COMMAND}'`,
    "                sh 'rhodibot check .'",
    "            }",
    "        }",
    "    }",
    "    post {",
    "        always {",
    `            archiveArtifacts artifacts: '${JSON_REPORT_FILE}', allowEmptyArchive: true`,
    "        }",
    "    }",
    "}",
    ""
  ].join("\n");
}

function yamlDocument(contents: Record<string, unknown>, comment: string): string {
  const doc = new YAML.Document(contents);
  doc.commentBefore = comment;
  return doc.toString();
}

export function generatePipeline(platform: PipelinePlatform, opts: PipelineOptions): string {
  const heading = ` Rhodibot RSR compliance check for ${opts.project_name}`;
  switch (platform) {
    case "github":
      return yamlDocument(githubWorkflow(opts), heading);
    case "gitlab":
      return yamlDocument(gitlabConfig(), `${heading}\n Add this job to your .gitlab-ci.yml`);
    case "circle":
      return yamlDocument(circleConfig(), heading);
    case "jenkins":
      return jenkinsfile(opts);
  }
}

export function writePipeline(outputPath: string, content: string, opts: { force: boolean }): void {
  if (fs.existsSync(outputPath) && !opts.force) {
    throw new Error(`${outputPath} already exists. Use --force to overwrite.`);
  }
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, content, "utf8");
}
