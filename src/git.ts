import { execFile } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import type { CloneOutcome, GitStatus } from "./types.ts";

export class GitError extends Error {
  code: number;
  stderr: string;
  constructor(message: string, code: number, stderr: string) {
    super(message);
    this.name = "GitError";
    this.code = code;
    this.stderr = stderr;
  }
}

type RunOptions = {
  cwd?: string;
  signal?: AbortSignal;
};

function runCommand(command: string, args: string[], opts?: RunOptions): Promise<{ stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { cwd: opts?.cwd, signal: opts?.signal, encoding: "utf8", windowsHide: true, maxBuffer: 4 * 1024 * 1024 },
      (err, stdout, stderr) => {
        if (err) {
          const code = typeof err.code === "number" ? err.code : 127;
          const detail = stderr.trim() || err.message;
          reject(new GitError(`${command} ${args.join(" ")} failed`, code, detail));
          return;
        }
        resolve({ stdout, stderr });
      },
    );
  });
}

export function isGitRepository(dir: string): boolean {
  return fs.existsSync(path.join(dir, ".git"));
}

/**
 * Branch and dirty flag for a project directory. Directories without their
 * own `.git` are reported as unavailable without running git; git failures
 * are thrown as GitError.
 */
export async function readGitStatus(dir: string, signal?: AbortSignal): Promise<GitStatus> {
  if (!isGitRepository(dir)) return { state: "unavailable" };

  const [branchRes, statusRes] = await Promise.all([
    runCommand("git", ["branch", "--show-current"], { cwd: dir, signal }),
    runCommand("git", ["status", "--porcelain"], { cwd: dir, signal }),
  ]);

  const branch = branchRes.stdout.trim();
  return {
    state: "ok",
    branch: branch.length ? branch : null,
    dirty: statusRes.stdout.trim().length > 0,
    fetchedAt: Date.now(),
  };
}

export function repoNameFromUrl(url: string): string {
  const segments = url
    .trim()
    .replace(/\/+$/, "")
    .split(/[/:]/)
    .filter(Boolean);
  const last = segments.at(-1) ?? "";
  const name = last.endsWith(".git") ? last.slice(0, -".git".length) : last;
  return name.length ? name : "new-project";
}

function describeFailure(err: unknown): string {
  if (err instanceof GitError) return err.stderr || err.message;
  return err instanceof Error ? err.message : String(err);
}

/** Clones `url` into `destDir` with `gh`, falling back to plain `git clone`. */
export async function cloneRepository(url: string, destDir: string): Promise<CloneOutcome> {
  const name = repoNameFromUrl(url);
  const projectPath = path.join(destDir, name);
  if (fs.existsSync(projectPath)) return { ok: false, error: `Already exists: ${projectPath}` };

  try {
    await runCommand("gh", ["repo", "clone", url, "--", "--quiet"], { cwd: destDir });
  } catch {
    try {
      await runCommand("git", ["clone", "--quiet", url], { cwd: destDir });
    } catch (err) {
      return { ok: false, error: describeFailure(err) };
    }
  }
  return { ok: true, projectPath, name };
}
