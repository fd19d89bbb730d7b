import { ok, err, Result } from "neverthrow";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { nanoid } from "nanoid";
import type { Logger } from "pino";
import type { z } from "zod";
import type { Handoff } from "@handoff-relay/shared";
import { HANDOFF_FILE_EXTENSION, WIP_STATE_FILE } from "@handoff-relay/shared";
import { errorMessage } from "../domain/errors.js";
import { handoffFileName, parseHandoff, serializeHandoff } from "../domain/handoff.js";
import type { GitOps } from "../git/ops.js";
import type { IHandoffStore, SyncLayout } from "./interface.js";
import { StoreError } from "./interface.js";

const STATE_KEY_PATTERN = /^[A-Za-z0-9_.-]+$/;

export interface HandoffStoreDeps {
  /** Present only when the sync root is a git working copy. */
  git: GitOps | null;
  logger: Logger;
}

// ─── File Store Implementation ──────────────────────────

/**
 * Directory-backed handoff store. One JSON document per file; every write
 * replaces the whole file through a temp file and a rename.
 * No locking: concurrent writers to the WIP slot race and the last one wins.
 */
export class HandoffStore implements IHandoffStore {
  private readonly git: GitOps | null;
  private readonly logger: Logger;

  constructor(
    readonly layout: SyncLayout,
    deps: HandoffStoreDeps,
  ) {
    this.git = deps.git;
    this.logger = deps.logger.child({ component: "store" });
  }

  // ── Lifecycle ───────────────────────────────────────

  async initialize(): Promise<Result<void, StoreError>> {
    try {
      await fs.mkdir(this.layout.pendingDir, { recursive: true });
      await fs.mkdir(this.layout.archiveDir, { recursive: true });
      await fs.mkdir(this.layout.stateDir, { recursive: true });
      const ignore = path.join(this.layout.stateDir, ".gitignore");
      try {
        await fs.writeFile(ignore, "*\n", { encoding: "utf-8", flag: "wx" });
      } catch (e) {
        if (!this.isExistsError(e)) throw e;
      }
      this.logger.info({ root: this.layout.root }, "Sync store initialized");
      return ok(undefined);
    } catch (e) {
      return err(
        new StoreError(`Failed to initialize store: ${errorMessage(e)}`, "IO_ERROR"),
      );
    }
  }

  // ── Pending / Archive ───────────────────────────────

  async sendHandoff(handoff: Handoff): Promise<Result<string, StoreError>> {
    const encoded = this.encode(handoff);
    if (encoded.isErr()) return err(encoded.error);

    const filePath = path.join(this.layout.pendingDir, handoffFileName(handoff));
    const written = await this.writeFile(filePath, encoded.value);
    if (written.isErr()) return err(written.error);
    this.logger.debug({ file: filePath }, "Handoff written");

    if (this.layout.autoCommit) {
      const committed = await this.commitChanges(
        `relay handoff [${handoff.mode.kind}]: ${handoff.summary}`,
      );
      if (committed.isErr()) return err(committed.error);
    }

    return ok(filePath);
  }

  /** Newest first. Files that do not parse are skipped with a warning. */
  async receiveHandoffs(): Promise<Result<Handoff[], StoreError>> {
    return this.readHandoffDir(this.layout.pendingDir);
  }

  async hasPendingHandoffs(): Promise<Result<boolean, StoreError>> {
    const handoffs = await this.receiveHandoffs();
    if (handoffs.isErr()) return err(handoffs.error);
    return ok(handoffs.value.length > 0);
  }

  /**
   * Move the first pending file whose name contains `shortId` into the
   * archive. With several matches, the directory listing order decides.
   */
  async archiveHandoff(shortId: string): Promise<Result<string, StoreError>> {
    const entries = await this.listHandoffFiles(this.layout.pendingDir);
    if (entries.isErr()) return err(entries.error);

    const match = entries.value.find((name) => name.includes(shortId));
    if (match === undefined) {
      return err(new StoreError(`Handoff not found: ${shortId}`, "NOT_FOUND"));
    }

    const from = path.join(this.layout.pendingDir, match);
    const to = path.join(this.layout.archiveDir, match);
    try {
      await fs.mkdir(this.layout.archiveDir, { recursive: true });
      await fs.rename(from, to);
    } catch (e) {
      return err(
        new StoreError(`Failed to archive ${match}: ${errorMessage(e)}`, "IO_ERROR"),
      );
    }
    this.logger.debug({ from, to }, "Handoff archived");
    return ok(to);
  }

  async listArchivedHandoffs(): Promise<Result<Handoff[], StoreError>> {
    return this.readHandoffDir(this.layout.archiveDir);
  }

  // ── WIP Slot ────────────────────────────────────────

  async saveWip(handoff: Handoff): Promise<Result<void, StoreError>> {
    const encoded = this.encode(handoff);
    if (encoded.isErr()) return err(encoded.error);

    const result = await this.writeFile(this.wipPath(), encoded.value);
    if (result.isErr()) return result;
    this.logger.debug({ id: handoff.id }, "WIP saved");
    return ok(undefined);
  }

  async loadWip(): Promise<Result<Handoff | null, StoreError>> {
    const content = await this.readFile(this.wipPath());
    if (content.isErr()) return err(content.error);
    if (content.value === null) return ok(null);

    const parsed = parseHandoff(content.value);
    if (parsed.isErr()) {
      return err(
        new StoreError(`Malformed WIP handoff: ${parsed.error.message}`, "PARSE_ERROR"),
      );
    }
    return ok(parsed.value);
  }

  async clearWip(): Promise<Result<void, StoreError>> {
    try {
      await fs.rm(this.wipPath(), { force: true });
      return ok(undefined);
    } catch (e) {
      return err(new StoreError(`Failed to clear WIP: ${errorMessage(e)}`, "IO_ERROR"));
    }
  }

  // ── Key/Value State ─────────────────────────────────

  async readState<T>(
    key: string,
    schema: z.ZodType<T>,
  ): Promise<Result<T | null, StoreError>> {
    const filePath = this.statePath(key);
    if (filePath.isErr()) return err(filePath.error);

    const content = await this.readFile(filePath.value);
    if (content.isErr()) return err(content.error);
    if (content.value === null) return ok(null);

    let raw: unknown;
    try {
      raw = JSON.parse(content.value);
    } catch (e) {
      return err(
        new StoreError(`Malformed state entry ${key}: ${errorMessage(e)}`, "PARSE_ERROR"),
      );
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      return err(
        new StoreError(`Malformed state entry ${key}: ${parsed.error.message}`, "PARSE_ERROR"),
      );
    }
    return ok(parsed.data);
  }

  async writeState<T>(key: string, value: T): Promise<Result<void, StoreError>> {
    const filePath = this.statePath(key);
    if (filePath.isErr()) return err(filePath.error);
    return this.writeFile(filePath.value, JSON.stringify(value, null, 2));
  }

  // ── Version Control ─────────────────────────────────

  /**
   * Stage everything under the root and commit. Returns the new hash, or
   * null when the root is not a repository or nothing was staged.
   */
  async commitChanges(message: string): Promise<Result<string | null, StoreError>> {
    if (this.git === null) {
      this.logger.debug("No git repository; skipping commit");
      return ok(null);
    }

    const staged = await this.git.stageAll();
    if (staged.isErr()) return err(new StoreError(staged.error.message, "GIT_ERROR"));

    const changed = await this.git.hasStagedChanges();
    if (changed.isErr()) return err(new StoreError(changed.error.message, "GIT_ERROR"));
    if (!changed.value) {
      this.logger.debug("Nothing staged; skipping commit");
      return ok(null);
    }

    const committed = await this.git.commit(message);
    if (committed.isErr()) return err(new StoreError(committed.error.message, "GIT_ERROR"));
    this.logger.info({ commit: committed.value, message }, "Changes committed");
    return ok(committed.value);
  }

  async pull(): Promise<Result<void, StoreError>> {
    if (this.git === null) {
      this.logger.debug("No git repository; skipping fetch");
      return ok(undefined);
    }
    const fetched = await this.git.fetch();
    if (fetched.isErr()) return err(new StoreError(fetched.error.message, "GIT_ERROR"));
    return ok(undefined);
  }

  async currentCommit(): Promise<string | null> {
    if (this.git === null) return null;
    const hash = await this.git.getLatestCommitHash();
    return hash.isOk() ? hash.value : null;
  }

  async currentBranch(): Promise<string | null> {
    if (this.git === null) return null;
    const branch = await this.git.getCurrentBranch();
    return branch.isOk() ? branch.value : null;
  }

  // ── Helpers ─────────────────────────────────────────

  private wipPath(): string {
    return path.join(this.layout.stateDir, WIP_STATE_FILE);
  }

  private encode(handoff: Handoff): Result<string, StoreError> {
    const encoded = serializeHandoff(handoff);
    if (encoded.isErr()) {
      const message = `Invalid handoff ${handoff.id}: ${encoded.error.message}`;
      return err(new StoreError(message, "VALIDATION_ERROR"));
    }
    return ok(encoded.value);
  }

  private statePath(key: string): Result<string, StoreError> {
    if (!STATE_KEY_PATTERN.test(key)) {
      return err(new StoreError(`Invalid state key: ${key}`, "VALIDATION_ERROR"));
    }
    return ok(path.join(this.layout.stateDir, `${key}.json`));
  }

  /** Handoff file names in directory order; a missing directory has none. */
  private async listHandoffFiles(dir: string): Promise<Result<string[], StoreError>> {
    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch (e) {
      if (this.isNotFoundError(e)) return ok([]);
      return err(new StoreError(`Failed to list ${dir}: ${errorMessage(e)}`, "IO_ERROR"));
    }
    return ok(entries.filter((name) => name.endsWith(HANDOFF_FILE_EXTENSION)));
  }

  private async readHandoffDir(dir: string): Promise<Result<Handoff[], StoreError>> {
    const entries = await this.listHandoffFiles(dir);
    if (entries.isErr()) return err(entries.error);

    const handoffs: Handoff[] = [];
    for (const name of [...entries.value].sort()) {
      const filePath = path.join(dir, name);
      const content = await this.readFile(filePath);
      if (content.isErr()) return err(content.error);
      // Removed between listing and reading.
      if (content.value === null) continue;

      const parsed = parseHandoff(content.value);
      if (parsed.isErr()) {
        this.logger.warn(
          { file: filePath, reason: parsed.error.message },
          "Skipping unparseable handoff",
        );
        continue;
      }
      handoffs.push(parsed.value);
    }

    // Array sort is stable, so equal timestamps keep file-name order.
    handoffs.sort((a, b) => Date.parse(b.created_at) - Date.parse(a.created_at));
    this.logger.debug({ dir, count: handoffs.length }, "Handoffs read");
    return ok(handoffs);
  }

  private async atomicWrite(filePath: string, content: string): Promise<void> {
    const tmpPath = `${filePath}.tmp.${nanoid(8)}`;
    await fs.writeFile(tmpPath, content, "utf-8");
    await fs.rename(tmpPath, filePath);
  }

  private async writeFile(
    filePath: string,
    content: string,
  ): Promise<Result<void, StoreError>> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await this.atomicWrite(filePath, content);
      return ok(undefined);
    } catch (e) {
      return err(
        new StoreError(`Failed to write ${filePath}: ${errorMessage(e)}`, "IO_ERROR"),
      );
    }
  }

  /** File content, or null when the file does not exist. */
  private async readFile(filePath: string): Promise<Result<string | null, StoreError>> {
    try {
      return ok(await fs.readFile(filePath, "utf-8"));
    } catch (e) {
      if (this.isNotFoundError(e)) return ok(null);
      return err(
        new StoreError(`Failed to read ${filePath}: ${errorMessage(e)}`, "IO_ERROR"),
      );
    }
  }

  private isNotFoundError(e: unknown): boolean {
    return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
  }

  private isExistsError(e: unknown): boolean {
    return typeof e === "object" && e !== null && "code" in e && e.code === "EEXIST";
  }
}
