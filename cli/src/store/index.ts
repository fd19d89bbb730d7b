import type { Logger } from "pino";
import { openRepository } from "../git/ops.js";
import { HandoffStore } from "./file-store.js";
import type { IHandoffStore, SyncLayout } from "./interface.js";

export { HandoffStore } from "./file-store.js";
export type { HandoffStoreDeps } from "./file-store.js";
export { StoreError } from "./interface.js";
export type { IHandoffStore, StoreErrorCode, SyncLayout } from "./interface.js";

/**
 * Open the store for a layout, attaching git when the root is a working copy.
 */
export async function createStore(
  layout: SyncLayout,
  git: { remote: string; mainBranch: string },
  logger: Logger,
): Promise<IHandoffStore> {
  const repo = await openRepository(layout.root, git);
  return new HandoffStore(layout, { git: repo, logger });
}
