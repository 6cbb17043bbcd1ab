import fs from "node:fs";
import path from "node:path";

export type EntryKind = "file" | "dir";

export type PathCheckResult = {
  exists: boolean;
  is_symlink: boolean;
  escapes_repo: boolean;
  target: string | null;
};

const MISSING: PathCheckResult = { exists: false, is_symlink: false, escapes_repo: false, target: null };

/**
 * Inspects one candidate path without following it. Absence and unreadable
 * entries are reported as `exists: false`; this never throws.
 *
 * For a symlink, `target` is the link's parent directory joined with the raw
 * link target, with any `..` segments left in place, and `escapes_repo`
 * tells whether the canonical target lies outside the canonical repository
 * root. An unreadable link target leaves `escapes_repo` false.
 */
export function inspectPath(candidate: string, repoRoot: string): PathCheckResult {
  let stat: fs.Stats;
  try {
    stat = fs.lstatSync(candidate);
  } catch {
    return { ...MISSING };
  }

  if (!stat.isSymbolicLink()) {
    return { exists: true, is_symlink: false, escapes_repo: false, target: null };
  }

  let rawTarget: string;
  try {
    rawTarget = fs.readlinkSync(candidate);
  } catch {
    return { exists: true, is_symlink: true, escapes_repo: false, target: null };
  }

  const joinedTarget = joinUnnormalized(path.resolve(path.dirname(candidate)), rawTarget);
  const canonicalRoot = canonicalize(path.resolve(repoRoot));
  const canonicalTarget = canonicalize(joinedTarget);

  return {
    exists: true,
    is_symlink: true,
    escapes_repo: !isWithinRoot(canonicalRoot, canonicalTarget),
    target: joinedTarget
  };
}

/**
 * `path.join` and `path.resolve` fold `a/link/..` into `a`, which is wrong once
 * `link` is a symlink; the segments are kept for the filesystem to resolve.
 */
function joinUnnormalized(dir: string, target: string): string {
  if (path.isAbsolute(target)) return target;
  return dir.endsWith(path.sep) ? dir + target : dir + path.sep + target;
}

/** Follows links and confirms the entry is a regular file or a directory. */
export function isEntryOfKind(candidate: string, kind: EntryKind): boolean {
  try {
    const stat = fs.statSync(candidate);
    return kind === "file" ? stat.isFile() : stat.isDirectory();
  } catch {
    return false;
  }
}

/** Segment-wise containment on already-normalized absolute paths. */
export function isWithinRoot(root: string, target: string): boolean {
  if (target === root) return true;
  const prefix = root.endsWith(path.sep) ? root : root + path.sep;
  return target.startsWith(prefix);
}

/**
 * Resolves symlinks, `.` and `..` through the filesystem. `realpathSync.native`
 * is used because the JS implementation folds `..` lexically before following
 * links. When the full path cannot be resolved (dangling link), trailing
 * segments are peeled off as written until a prefix resolves, and the missing
 * tail is re-appended to it; if nothing resolves the input is returned unchanged.
 */
export function canonicalize(absPath: string): string {
  const tail: string[] = [];
  let current = absPath;
  for (;;) {
    try {
      const real = fs.realpathSync.native(current);
      return tail.length === 0 ? real : path.join(real, ...tail.reverse());
    } catch {
      const parent = path.dirname(current);
      if (parent === current) return absPath;
      tail.push(path.basename(current));
      current = parent;
    }
  }
}
