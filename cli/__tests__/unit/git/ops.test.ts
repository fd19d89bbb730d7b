import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { GitOps, openRepository } from "../../../src/git/ops.js";

const execFileAsync = promisify(execFile);

async function git(cwd: string, ...args: string[]): Promise<string> {
  const { stdout } = await execFileAsync("git", args, { cwd });
  return stdout.trim();
}

describe("GitOps", () => {
  let tmpDir: string;
  let gitOps: GitOps;

  beforeEach(async () => {
    tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "gitops-test-"));
    await git(tmpDir, "init", "--initial-branch=main");
    await git(tmpDir, "config", "user.email", "test@test.com");
    await git(tmpDir, "config", "user.name", "Test User");

    await fs.promises.writeFile(path.join(tmpDir, "README.md"), "# Test Repo\n");
    await git(tmpDir, "add", "README.md");
    await git(tmpDir, "commit", "-m", "Initial commit");

    gitOps = new GitOps({ repoRoot: tmpDir, remote: "origin", mainBranch: "main" });
  });

  afterEach(async () => {
    await fs.promises.rm(tmpDir, { recursive: true, force: true });
  });

  describe("stageAll / hasStagedChanges", () => {
    it("should report nothing staged on a clean tree", async () => {
      await gitOps.stageAll();
      const result = await gitOps.hasStagedChanges();
      expect(result._unsafeUnwrap()).toBe(false);
    });

    it("should stage new files", async () => {
      await fs.promises.writeFile(path.join(tmpDir, "notes.txt"), "hello\n");
      expect((await gitOps.stageAll()).isOk()).toBe(true);
      expect((await gitOps.hasStagedChanges())._unsafeUnwrap()).toBe(true);
    });

    it("should stage deletions", async () => {
      await fs.promises.rm(path.join(tmpDir, "README.md"));
      await gitOps.stageAll();
      const staged = await git(tmpDir, "diff", "--cached", "--name-status");
      expect(staged).toBe("D\tREADME.md");
    });
  });

  describe("commit", () => {
    it("should return the new HEAD hash", async () => {
      await fs.promises.writeFile(path.join(tmpDir, "a.txt"), "a\n");
      await gitOps.stageAll();
      const result = await gitOps.commit("Add a");
      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toBe(await git(tmpDir, "rev-parse", "HEAD"));
        expect(await git(tmpDir, "log", "-1", "--format=%s")).toBe("Add a");
      }
    });

    it("should fail when nothing is staged", async () => {
      const result = await gitOps.commit("Empty");
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.errorClass).toBe("PERMANENT");
      }
    });
  });

  describe("queries", () => {
    it("should return the current branch", async () => {
      expect((await gitOps.getCurrentBranch())._unsafeUnwrap()).toBe("main");
    });

    it("should fail on a detached HEAD", async () => {
      const head = await git(tmpDir, "rev-parse", "HEAD");
      await git(tmpDir, "checkout", "--detach", head);
      expect((await gitOps.getCurrentBranch()).isErr()).toBe(true);
    });

    it("should return the latest commit hash", async () => {
      const expected = await git(tmpDir, "rev-parse", "HEAD");
      expect((await gitOps.getLatestCommitHash())._unsafeUnwrap()).toBe(expected);
    });
  });

  describe("fetch", () => {
    it("should fetch the main branch from the remote without merging", async () => {
      const originDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "gitops-origin-"));
      try {
        await git(originDir, "init", "--bare", "--initial-branch=main");
        await git(tmpDir, "remote", "add", "origin", originDir);
        await git(tmpDir, "push", "origin", "main");

        const result = await gitOps.fetch();
        expect(result.isOk()).toBe(true);
        expect(await git(tmpDir, "rev-parse", "FETCH_HEAD")).toBe(
          await git(tmpDir, "rev-parse", "HEAD"),
        );
      } finally {
        await fs.promises.rm(originDir, { recursive: true, force: true });
      }
    });

    it("should classify a missing remote as transient", async () => {
      const result = await gitOps.fetch();
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.errorClass).toBe("TRANSIENT");
        expect(result.error.message).toMatch(/^Failed to fetch origin\/main: /);
      }
    });
  });
});

describe("openRepository", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "gitops-open-"));
  });

  afterEach(async () => {
    await fs.promises.rm(tmpDir, { recursive: true, force: true });
  });

  it("should return null for a plain directory", async () => {
    const repo = await openRepository(tmpDir, { remote: "origin", mainBranch: "main" });
    expect(repo).toBeNull();
    expect(fs.existsSync(path.join(tmpDir, ".git"))).toBe(false);
  });

  it("should open a working copy", async () => {
    await git(tmpDir, "init", "--initial-branch=main");
    const repo = await openRepository(tmpDir, { remote: "origin", mainBranch: "main" });
    expect(repo?.repoRoot).toBe(tmpDir);
  });
});
