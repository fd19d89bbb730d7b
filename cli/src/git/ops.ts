import { execFile } from "node:child_process";
import { promisify } from "node:util";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ok, err, Result } from "neverthrow";
import { errorMessage } from "../domain/errors.js";

const execFileAsync = promisify(execFile);

// ─── Errors ─────────────────────────────────────────────

export class GitError extends Error {
  constructor(
    message: string,
    public readonly errorClass: "TRANSIENT" | "PERMANENT",
  ) {
    super(message);
    this.name = "GitError";
  }
}

// ─── Config ─────────────────────────────────────────────

export interface GitOpsConfig {
  repoRoot: string;
  remote: string;
  mainBranch: string;
}

// ─── GitOps ─────────────────────────────────────────────

/**
 * Thin wrapper over the `git` binary for one working copy.
 * Uses whatever committer identity git is configured with.
 */
export class GitOps {
  constructor(private readonly config: GitOpsConfig) {}

  get repoRoot(): string {
    return this.config.repoRoot;
  }

  private async git(...args: string[]): Promise<string> {
    const { stdout } = await execFileAsync("git", args, {
      cwd: this.config.repoRoot,
    });
    return stdout.trim();
  }

  /**
   * Stage every change under the repository root, deletions included.
   */
  async stageAll(): Promise<Result<void, GitError>> {
    try {
      await this.git("add", "-A", ".");
      return ok(undefined);
    } catch (e) {
      return err(new GitError(`Failed to stage changes: ${errorMessage(e)}`, "PERMANENT"));
    }
  }

  async hasStagedChanges(): Promise<Result<boolean, GitError>> {
    try {
      const staged = await this.git("diff", "--cached", "--name-only");
      return ok(staged.length > 0);
    } catch (e) {
      return err(
        new GitError(`Failed to inspect staged changes: ${errorMessage(e)}`, "PERMANENT"),
      );
    }
  }

  /**
   * Commit what is staged. Returns the new commit hash.
   */
  async commit(message: string): Promise<Result<string, GitError>> {
    try {
      await this.git("commit", "-m", message);
      const hash = await this.git("rev-parse", "HEAD");
      return ok(hash);
    } catch (e) {
      return err(new GitError(`Failed to commit: ${errorMessage(e)}`, "PERMANENT"));
    }
  }

  /**
   * Fetch the main branch from the configured remote. Never merges.
   */
  async fetch(): Promise<Result<void, GitError>> {
    try {
      await this.git("fetch", this.config.remote, this.config.mainBranch);
      return ok(undefined);
    } catch (e) {
      return err(
        new GitError(
          `Failed to fetch ${this.config.remote}/${this.config.mainBranch}: ${errorMessage(e)}`,
          "TRANSIENT",
        ),
      );
    }
  }

  /**
   * Get the current branch name. Fails when HEAD is detached.
   */
  async getCurrentBranch(): Promise<Result<string, GitError>> {
    try {
      const branch = await this.git("symbolic-ref", "--short", "-q", "HEAD");
      return ok(branch);
    } catch (e) {
      return err(
        new GitError(`Failed to get current branch: ${errorMessage(e)}`, "PERMANENT"),
      );
    }
  }

  /**
   * Get the latest commit hash on the current branch.
   */
  async getLatestCommitHash(): Promise<Result<string, GitError>> {
    try {
      const hash = await this.git("rev-parse", "--verify", "-q", "HEAD");
      return ok(hash);
    } catch (e) {
      return err(new GitError(`Failed to get commit hash: ${errorMessage(e)}`, "PERMANENT"));
    }
  }
}

// ─── Discovery ──────────────────────────────────────────

/**
 * A directory is backed by git when it holds a `.git` entry.
 * Returns null for a plain directory; no repository is ever created here.
 */
export async function openRepository(
  root: string,
  opts: { remote: string; mainBranch: string },
): Promise<GitOps | null> {
  try {
    await fs.access(path.join(root, ".git"));
  } catch {
    return null;
  }
  return new GitOps({ repoRoot: root, remote: opts.remote, mainBranch: opts.mainBranch });
}
