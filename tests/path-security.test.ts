import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { canonicalize, inspectPath, isEntryOfKind, isWithinRoot } from "../src/lib/pathSecurity.js";
import { cleanupTmpDirs, createTmpDir, makeDir, makeSymlink, writeFile } from "./fixtures.js";

afterEach(() => {
  cleanupTmpDirs();
});

function createRoot(): { base: string; root: string } {
  const base = createTmpDir();
  const root = makeDir(base, "repo");
  return { base, root };
}

describe("inspectPath", () => {
  test("reports a missing path as not existing", () => {
    const { root } = createRoot();
    expect(inspectPath(path.join(root, "README.md"), root)).toEqual({
      exists: false,
      is_symlink: false,
      escapes_repo: false,
      target: null
    });
  });

  test("reports regular files and directories without a target", () => {
    const { root } = createRoot();
    const file = writeFile(root, "README.md", "# hi");
    const dir = makeDir(root, "src");

    expect(inspectPath(file, root)).toEqual({ exists: true, is_symlink: false, escapes_repo: false, target: null });
    expect(inspectPath(dir, root)).toEqual({ exists: true, is_symlink: false, escapes_repo: false, target: null });
  });

  test("joins relative targets to the link's parent directory as written", () => {
    const { root } = createRoot();
    writeFile(root, "docs/readme.md", "# hi");
    const link = makeSymlink(root, "nested/README.md", "../docs/readme.md");

    expect(inspectPath(link, root)).toEqual({
      exists: true,
      is_symlink: true,
      escapes_repo: false,
      target: [root, "nested", "..", "docs", "readme.md"].join(path.sep)
    });
  });

  test("flags an absolute target outside the root", () => {
    const { base, root } = createRoot();
    const outside = writeFile(base, "outside/passwd", "root:x:0:0");
    const link = makeSymlink(root, "LICENSE.txt", outside);

    expect(inspectPath(link, root)).toEqual({
      exists: true,
      is_symlink: true,
      escapes_repo: true,
      target: outside
    });
  });

  test("flags a relative target that climbs out with ..", () => {
    const { base, root } = createRoot();
    writeFile(base, "secret.txt", "s");
    const link = makeSymlink(root, "SECURITY.md", "../secret.txt");

    const result = inspectPath(link, root);
    expect(result.escapes_repo).toBe(true);
    expect(result.target).toBe([root, "..", "secret.txt"].join(path.sep));
  });

  test("does not flag a .. path that stays inside the root", () => {
    const { root } = createRoot();
    writeFile(root, "CHANGELOG.md", "# log");
    const link = makeSymlink(root, "docs/a/changes.md", "../../docs/../CHANGELOG.md");

    expect(inspectPath(link, root).escapes_repo).toBe(false);
  });

  test("treats a sibling directory sharing the root's name prefix as outside", () => {
    const { base, root } = createRoot();
    const sibling = writeFile(base, "repo-evil/README.md", "# evil");
    const link = makeSymlink(root, "README.md", sibling);

    expect(inspectPath(link, root).escapes_repo).toBe(true);
  });

  test("follows chained links when canonicalizing", () => {
    const { base, root } = createRoot();
    const outside = writeFile(base, "elsewhere/notes.md", "x");
    makeSymlink(root, "hop.md", outside);
    const link = makeSymlink(root, "MAINTAINERS.md", "hop.md");

    const result = inspectPath(link, root);
    expect(result.target).toBe(path.join(root, "hop.md"));
    expect(result.escapes_repo).toBe(true);
  });

  test("resolves .. after a symlinked directory through the link, not as text", () => {
    const { base, root } = createRoot();
    const outsideDir = makeDir(base, "outside/deep/dir");
    writeFile(base, "outside/deep/secret.txt", "s");
    writeFile(root, "secret.txt", "decoy");
    makeSymlink(root, "alias", outsideDir);
    const link = makeSymlink(root, "LICENSE.txt", "alias/../secret.txt");

    expect(inspectPath(link, root)).toEqual({
      exists: true,
      is_symlink: true,
      escapes_repo: true,
      target: [root, "alias", "..", "secret.txt"].join(path.sep)
    });
  });

  test("flags a dangling target reached through .. after a symlinked directory", () => {
    const { base, root } = createRoot();
    makeSymlink(root, "alias", makeDir(base, "outside/deep/dir"));
    const link = makeSymlink(root, "LICENSE.txt", "alias/../missing.txt");

    expect(inspectPath(link, root).escapes_repo).toBe(true);
  });

  test("keeps .. after an in-root symlinked directory inside the root", () => {
    const { root } = createRoot();
    makeDir(root, "docs/guides");
    writeFile(root, "docs/CHANGELOG.md", "# log");
    makeSymlink(root, "guides", "docs/guides");
    const link = makeSymlink(root, "CHANGELOG.md", "guides/../CHANGELOG.md");

    expect(inspectPath(link, root).escapes_repo).toBe(false);
    expect(isEntryOfKind(link, "file")).toBe(true);
  });

  test("a dangling link inside the root exists but does not escape", () => {
    const { root } = createRoot();
    const link = makeSymlink(root, "README.md", "missing/readme.md");

    expect(inspectPath(link, root)).toEqual({
      exists: true,
      is_symlink: true,
      escapes_repo: false,
      target: path.join(root, "missing", "readme.md")
    });
  });

  test("a dangling link to a missing path outside the root escapes", () => {
    const { base, root } = createRoot();
    const link = makeSymlink(root, "README.md", path.join(base, "gone", "readme.md"));

    expect(inspectPath(link, root).escapes_repo).toBe(true);
  });

  test("compares canonical forms when the root is reached through a symlink", () => {
    const { base, root } = createRoot();
    const alias = path.join(base, "alias");
    fs.symlinkSync(root, alias);
    writeFile(root, "real.md", "x");
    makeSymlink(root, "README.md", path.join(root, "real.md"));

    expect(inspectPath(path.join(alias, "README.md"), alias).escapes_repo).toBe(false);
  });
});

describe("isEntryOfKind", () => {
  test("follows links to check the resolved type", () => {
    const { root } = createRoot();
    writeFile(root, "real.md", "x");
    makeDir(root, "realdir");
    const fileLink = makeSymlink(root, "file-link", "real.md");
    const dirLink = makeSymlink(root, "dir-link", "realdir");
    const broken = makeSymlink(root, "broken", "nope.md");

    expect(isEntryOfKind(fileLink, "file")).toBe(true);
    expect(isEntryOfKind(fileLink, "dir")).toBe(false);
    expect(isEntryOfKind(dirLink, "dir")).toBe(true);
    expect(isEntryOfKind(broken, "file")).toBe(false);
    expect(isEntryOfKind(path.join(root, "absent"), "dir")).toBe(false);
  });
});

describe("isWithinRoot", () => {
  test("matches whole path segments only", () => {
    expect(isWithinRoot("/srv/repo", "/srv/repo")).toBe(true);
    expect(isWithinRoot("/srv/repo", "/srv/repo/README.md")).toBe(true);
    expect(isWithinRoot("/srv/repo", "/srv/repository/README.md")).toBe(false);
    expect(isWithinRoot("/srv/repo", "/srv")).toBe(false);
    expect(isWithinRoot("/", "/etc/passwd")).toBe(true);
  });
});

describe("canonicalize", () => {
  test("re-appends missing segments to the deepest resolvable ancestor", () => {
    const { root } = createRoot();
    const real = fs.realpathSync(root);
    expect(canonicalize(path.join(root, "a", "b.txt"))).toBe(path.join(real, "a", "b.txt"));
  });

  test("walks .. physically through symlinked directories", () => {
    const { base, root } = createRoot();
    const target = makeDir(base, "outside/deep/dir");
    makeSymlink(root, "alias", target);
    const realDeep = fs.realpathSync(path.join(base, "outside", "deep"));

    expect(canonicalize([root, "alias", "..", "x.txt"].join(path.sep))).toBe(path.join(realDeep, "x.txt"));
  });
});
