import fs from "node:fs";
import path from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";
import { emitCiOutput } from "./ci/emit.js";
import { detectPlatform, platformName } from "./ci/platform.js";
import { loadConfig, OutputFormatSchema, type BotConfig, type Verbosity } from "./config.js";
import { EXIT_CODES, exitCodeFor, exitCodeNameFor } from "./exitCodes.js";
import { generateBadge } from "./lib/badge.js";
import { generateConformityDoc } from "./lib/conformity.js";
import { highestLevel, type ComplianceReport } from "./lib/report.js";
import { verifyRepository } from "./lib/verifier.js";
import { renderHuman, renderQuiet, renderVerbose } from "./output/human.js";
import { renderJson } from "./output/json.js";
import {
  DEFAULT_OUTPUT_PATHS,
  generatePipeline,
  PipelinePlatformSchema,
  PLATFORM_LABELS,
  writePipeline
} from "./pipeline/generate.js";
import { validatePipeline } from "./pipeline/validate.js";

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
  now_ms?: number;
};

const CommandSchema = z.enum(["check", "badge", "conformity", "fix", "pipeline"]);
type Command = z.infer<typeof CommandSchema>;

const CLI_OPTIONS = {
  format: { type: "string", short: "f" },
  quiet: { type: "boolean", short: "q" },
  verbose: { type: "boolean", short: "v" },
  ci: { type: "boolean" },
  help: { type: "boolean", short: "h" },
  version: { type: "boolean", short: "V" },
  output: { type: "string", short: "o" },
  name: { type: "string", short: "n" },
  force: { type: "boolean" }
} as const;

type CliValues = {
  format?: string;
  quiet?: boolean;
  verbose?: boolean;
  ci?: boolean;
  help?: boolean;
  version?: boolean;
  output?: string;
  name?: string;
  force?: boolean;
};

export const HELP_TEXT = `Rhodibot - RSR Compliance Bot

Like Dependabot but for Rhodium Standard Repository compliance.

USAGE:
    rhodibot [COMMAND] [OPTIONS] [PATH]

COMMANDS:
    check                         Check RSR compliance (default)
    badge                         Generate RSR badge markdown
    conformity                    Generate RSR conformity document
    pipeline generate <platform>  Generate a CI configuration (github, gitlab, circle, jenkins)
    pipeline validate [PATH]      Validate existing CI configuration
    pipeline list                 List available pipeline templates

ARGS:
    [PATH]    Repository path to verify (default: current directory)

OPTIONS:
    -f, --format <FORMAT>    Output format: human, json (default: human)
    -q, --quiet              Quiet mode: only show pass/fail result
    -v, --verbose            Verbose mode: show all details
        --ci                 Also emit output for the detected CI platform
    -o, --output <PATH>      pipeline generate: write to a file instead of stdout
    -n, --name <NAME>        pipeline generate: project name (default: project)
        --force              pipeline generate: overwrite an existing file
    -h, --help               Print help information
    -V, --version            Print version information

ENVIRONMENT:
    RHODIBOT_FORMAT            Default output format
    RHODIBOT_VERBOSITY         quiet, normal or verbose
    RHODIBOT_CI_OUTPUT         Emit CI platform output without --ci
    RHODIBOT_FAIL_ON_WARNING   Exit 2 on critical security warnings (default: true)

EXIT CODES:
    0    Success - Bronze compliance achieved
    1    Failure - Bronze compliance not met
    2    Security - Critical security warnings detected
    3    Error - Invalid path provided
    4    Error - Invalid arguments

EXAMPLES:
    rhodibot                         # Check current directory
    rhodibot check /path/to/repo     # Check specific repository
    rhodibot badge                   # Generate badge for current directory
    rhodibot conformity              # Generate conformity document
    rhodibot --format json           # Output as JSON
    rhodibot pipeline generate github -o .github/workflows/rsr.yml
`;

function pipelineListText(): string {
  const lines = ["Available Templates:", "", "  Platforms:"];
  for (const platform of PipelinePlatformSchema.options) {
    lines.push(`    ${platform.padEnd(8)} - ${PLATFORM_LABELS[platform]} (${DEFAULT_OUTPUT_PATHS[platform]})`);
  }
  return lines.join("\n") + "\n";
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function usageError(io: CliIo, message: string): number {
  io.stderr(`Error: ${message}\nUse --help for usage information.\n`);
  return EXIT_CODES.INVALID_ARGS;
}

function resolveDirectory(io: CliIo, input: string): { ok: true; path: string } | { ok: false; code: number } {
  const resolved = path.resolve(io.cwd, input);
  if (!fs.existsSync(resolved)) {
    io.stderr(`Error: Path does not exist: ${resolved}\n`);
    return { ok: false, code: EXIT_CODES.INVALID_PATH };
  }
  if (!fs.statSync(resolved).isDirectory()) {
    io.stderr(`Error: Path is not a directory: ${resolved}\n`);
    return { ok: false, code: EXIT_CODES.INVALID_PATH };
  }
  return { ok: true, path: resolved };
}

export function runCli(argv: string[], io: CliIo): number {
  let config: BotConfig;
  try {
    config = loadConfig(io.env);
  } catch (e) {
    io.stderr(`Error: ${errorMessage(e)}\n`);
    return EXIT_CODES.INVALID_ARGS;
  }

  let values: CliValues;
  let positionals: string[];
  try {
    const parsed = parseArgs({ args: argv, options: CLI_OPTIONS, allowPositionals: true, strict: true });
    values = parsed.values;
    positionals = parsed.positionals;
  } catch (e) {
    return usageError(io, errorMessage(e));
  }

  if (values.help) {
    io.stdout(HELP_TEXT);
    return EXIT_CODES.SUCCESS;
  }
  if (values.version) {
    io.stdout(`rhodibot ${config.version}\n`);
    return EXIT_CODES.SUCCESS;
  }

  const first = CommandSchema.safeParse(positionals[0]);
  const command: Command = first.success ? first.data : "check";
  const rest = first.success ? positionals.slice(1) : positionals;

  if (command === "pipeline") {
    return runPipeline(rest, values, io);
  }

  if (rest.length > 1) {
    return usageError(io, "Multiple paths provided. Only one path is allowed.");
  }

  const format = OutputFormatSchema.safeParse(values.format ?? config.format);
  if (!format.success) {
    return usageError(io, `Unknown format: ${values.format ?? config.format}. Use 'human' or 'json'`);
  }

  if (values.quiet && values.verbose) {
    return usageError(io, "--quiet and --verbose cannot be combined");
  }
  const verbosity: Verbosity = values.quiet ? "quiet" : values.verbose ? "verbose" : config.verbosity;

  if (command === "fix") {
    io.stderr("Error: 'fix' action not yet implemented\nThis will automatically create missing RSR files in a future version.\n");
    return EXIT_CODES.INVALID_ARGS;
  }

  const target = resolveDirectory(io, rest[0] ?? ".");
  if (!target.ok) return target.code;

  const report = verifyRepository(target.path, { now_ms: io.now_ms });

  if (command === "badge") {
    io.stdout(generateBadge(highestLevel(report) ?? "Bronze") + "\n");
    return EXIT_CODES.SUCCESS;
  }
  if (command === "conformity") {
    io.stdout(generateConformityDoc(report));
    return EXIT_CODES.SUCCESS;
  }

  io.stdout(renderReport(report, format.data, verbosity, config));

  if (values.ci || config.ci_output) {
    const platform = detectPlatform(io.env);
    const emitted = emitCiOutput(report, platform, {
      env: io.env,
      write: (line) => io.stdout(line + "\n"),
      now_ms: io.now_ms
    });
    if (!emitted) {
      io.stderr(`No CI output adapter for platform: ${platformName(platform)}\n`);
    }
  }

  return exitCodeFor(report, { fail_on_warning: config.fail_on_warning });
}

function renderReport(report: ComplianceReport, format: "human" | "json", verbosity: Verbosity, config: BotConfig): string {
  if (format === "json") return renderJson(report, { version: config.version });
  if (verbosity === "quiet") return renderQuiet(report);
  if (verbosity === "verbose") {
    return renderVerbose(report, {
      version: config.version,
      exit_code: exitCodeNameFor(report, { fail_on_warning: config.fail_on_warning })
    });
  }
  return renderHuman(report);
}

function runPipeline(args: string[], values: CliValues, io: CliIo): number {
  const [action, arg] = args;

  if (action === "list") {
    io.stdout(pipelineListText());
    return EXIT_CODES.SUCCESS;
  }

  if (action === "generate") {
    if (!arg) return usageError(io, "Platform required. Use: github, gitlab, circle, jenkins");
    const platform = PipelinePlatformSchema.safeParse(arg);
    if (!platform.success) return usageError(io, `Unknown platform: ${arg}. Use 'github', 'gitlab', 'circle' or 'jenkins'`);

    const content = generatePipeline(platform.data, { project_name: values.name ?? "project" });
    if (!values.output) {
      io.stdout(content);
      return EXIT_CODES.SUCCESS;
    }

    const outputPath = path.resolve(io.cwd, values.output);
    try {
      writePipeline(outputPath, content, { force: values.force ?? false });
    } catch (e) {
      io.stderr(`Error: ${errorMessage(e)}\n`);
      return EXIT_CODES.COMPLIANCE_FAILED;
    }
    io.stdout(`Generated: ${outputPath}\n`);
    return EXIT_CODES.SUCCESS;
  }

  if (action === "validate") {
    const target = resolveDirectory(io, arg ?? ".");
    if (!target.ok) return target.code;

    const result = validatePipeline(target.path);
    const lines: string[] = [];
    if (result.errors.length > 0) {
      lines.push("Errors:", ...result.errors.map((e) => `  - ${e}`));
    }
    if (result.warnings.length > 0) {
      lines.push("Warnings:", ...result.warnings.map((w) => `  - ${w}`));
    }
    lines.push(result.valid ? "Pipeline configuration is valid." : "Pipeline configuration has issues.");
    io.stdout(lines.join("\n") + "\n");
    return result.valid ? EXIT_CODES.SUCCESS : EXIT_CODES.COMPLIANCE_FAILED;
  }

  return usageError(io, action ? `Unknown pipeline command: ${action}` : "Pipeline command required. Use: generate, validate, list");
}
