import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const BooleanFromEnv = z.preprocess((value) => {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on") return true;
    if (normalized === "false" || normalized === "0" || normalized === "no" || normalized === "off") return false;
  }
  return value;
}, z.boolean());

export const OutputFormatSchema = z.enum(["human", "json"]);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const VerbositySchema = z.enum(["quiet", "normal", "verbose"]);
export type Verbosity = z.infer<typeof VerbositySchema>;

function resolveDefaultVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }
  try {
    const thisFile = fileURLToPath(import.meta.url);
    const packageJsonPath = path.resolve(path.dirname(thisFile), "../package.json");
    const raw = fs.readFileSync(packageJsonPath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === "object" && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
    return "dev";
  } catch {
    return "dev";
  }
}

const EnvSchema = z.object({
  RHODIBOT_FORMAT: OutputFormatSchema.default("human"),
  RHODIBOT_VERBOSITY: VerbositySchema.default("normal"),
  RHODIBOT_CI_OUTPUT: BooleanFromEnv.default(false),
  RHODIBOT_FAIL_ON_WARNING: BooleanFromEnv.default(true),
  VERSION: z.string().min(1).optional()
});

export type BotConfig = {
  format: OutputFormat;
  verbosity: Verbosity;
  ci_output: boolean;
  fail_on_warning: boolean;
  version: string;
};

export function loadConfig(env: NodeJS.ProcessEnv): BotConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }

  return {
    format: parsed.data.RHODIBOT_FORMAT,
    verbosity: parsed.data.RHODIBOT_VERBOSITY,
    ci_output: parsed.data.RHODIBOT_CI_OUTPUT,
    fail_on_warning: parsed.data.RHODIBOT_FAIL_ON_WARNING,
    version: parsed.data.VERSION ?? resolveDefaultVersion()
  };
}
