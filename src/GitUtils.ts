import { execSync } from "node:child_process";

/** Commit the measurements were taken against */
export interface GitVersion {
  hash: string;
  /** ISO date of the commit */
  date: string;
  /** working tree had uncommitted changes */
  dirty?: boolean;
}

/** Get current git version info, or undefined outside a git checkout */
export function getCurrentGitVersion(cwd = "."): GitVersion | undefined {
  try {
    const exec = (cmd: string) =>
      execSync(cmd, {
        encoding: "utf-8",
        cwd,
        stdio: ["ignore", "pipe", "ignore"],
      }).trim();
    const hash = exec("git rev-parse --short HEAD");
    const date = exec("git log -1 --format=%aI");
    const dirty = exec("git status --porcelain").length > 0;
    return { hash, date, dirty };
  } catch {
    return undefined; // not a repository, or git not installed
  }
}

/** Format git version for display: "abc1234 (2026-01-09)" or "abc1234* (...)" if dirty */
export function formatGitVersion(version: GitVersion): string {
  const hashDisplay = version.dirty ? `${version.hash}*` : version.hash;
  return `${hashDisplay} (${version.date.slice(0, 10)})`;
}
