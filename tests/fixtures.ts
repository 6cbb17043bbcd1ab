import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const tmpDirs: string[] = [];

export function createTmpDir(prefix = "rhodibot-test-"): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tmpDirs.push(dir);
  return dir;
}

export function cleanupTmpDirs(): void {
  while (tmpDirs.length > 0) {
    const dir = tmpDirs.pop();
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  }
}

export function writeFile(base: string, relPath: string, content = ""): string {
  const target = path.join(base, relPath);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content, "utf8");
  return target;
}

export function makeDir(base: string, relPath: string): string {
  const target = path.join(base, relPath);
  fs.mkdirSync(target, { recursive: true });
  return target;
}

export function makeSymlink(base: string, relPath: string, target: string): string {
  const linkPath = path.join(base, relPath);
  fs.mkdirSync(path.dirname(linkPath), { recursive: true });
  fs.symlinkSync(target, linkPath);
  return linkPath;
}

export const COMPLIANT_FILES: Record<string, string> = {
  "README.md": "# Test Project",
  "LICENSE.txt": "MIT License",
  "SECURITY.md": "# Security Policy",
  "CONTRIBUTING.md": "# Contributing",
  "CODE_OF_CONDUCT.md": "# Code of Conduct",
  "MAINTAINERS.md": "# Maintainers",
  "CHANGELOG.md": "# Changelog",
  ".well-known/security.txt": "Contact: security@example.org",
  ".well-known/ai.txt": "# AI Policy",
  ".well-known/humans.txt": "# Humans",
  justfile: "build:\n\techo building\n",
  "flake.nix": "{}",
  ".gitlab-ci.yml": "test:\n  script: echo test\n",
  "src/main.ts": "export {};\n",
  "tests/main.test.ts": "export {};\n"
};

/** A repository with every Bronze entry as a plain file or directory. */
export function createCompliantRepo(omit: string[] = []): string {
  const root = path.join(createTmpDir(), "repo");
  fs.mkdirSync(root);
  for (const [relPath, content] of Object.entries(COMPLIANT_FILES)) {
    if (omit.includes(relPath)) continue;
    writeFile(root, relPath, content);
  }
  return root;
}
