import * as path from "node:path";
import type { Logger } from "pino";
import { CONFIG_FILE_NAME, loadConfig, resolveSyncLayout } from "../config/index.js";
import { errorMessage } from "../domain/errors.js";
import { createLogger } from "../logging/logger.js";
import { createStore } from "../store/index.js";
import type { IHandoffStore } from "../store/index.js";
import { archiveCommand, handoffCommand, receiveCommand } from "./inbox.js";
import { debugCommand, deployCommand, planCommand } from "./modes.js";
import type { CliIo, CommandContext, CommandHandler } from "./shared.js";
import { UsageError } from "./shared.js";
import { wipCommand } from "./wip.js";
import { initCommand, statusCommand, syncCommand, whoamiCommand } from "./workspace.js";

export type { CliIo } from "./shared.js";

const COMMANDS = new Map<string, CommandHandler>([
  ["init", initCommand],
  ["whoami", whoamiCommand],
  ["status", statusCommand],
  ["sync", syncCommand],
  ["handoff", handoffCommand],
  ["receive", receiveCommand],
  ["archive", archiveCommand],
  ["deploy", deployCommand],
  ["debug", debugCommand],
  ["plan", planCommand],
  ["wip", wipCommand],
]);

export const USAGE = [
  "Usage: relay [--dir <path>] [--config <file>] [--verbose] <command>",
  "",
  "Commands:",
  "  init [path]                 create pending/, archive/ and the local state dir",
  "  whoami [--set <name>]       show or set who is working in this checkout",
  "  status                      identity, branch, pending handoffs and WIP",
  "  sync [--pull-only]          fetch from the remote, then commit local changes",
  "  handoff --mode <m> <summary> send a handoff in one step",
  "  receive [--prompt] [--mode <m>] [--full] [--archive]",
  "  archive <short-id>          move a pending handoff into the archive",
  "  deploy|debug|plan new ...   start a work-in-progress handoff",
  "  deploy|debug|plan <action>  add mode details to the WIP",
  "  deploy|debug|plan done      send the WIP and clear the slot",
  "  wip <action>                warm-up, tags and session activity on the WIP",
].join("\n");

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Replaces the pino logger built from config. */
  logger?: Logger;
}

interface GlobalArgs {
  dir: string | null;
  config: string | null;
  verbose: boolean;
  help: boolean;
  rest: string[];
}

/** Global flags must come before the command name. */
function splitGlobalArgs(argv: string[]): GlobalArgs {
  const globals: GlobalArgs = { dir: null, config: null, verbose: false, help: false, rest: [] };
  let i = 0;
  const valueOf = (flag: string): string => {
    const value = argv[i + 1];
    if (value === undefined) throw new UsageError(`${flag} needs a value`);
    i += 2;
    return value;
  };

  while (i < argv.length) {
    const arg = argv[i];
    if (!arg.startsWith("-")) break;
    if (arg === "--dir" || arg === "-d") {
      globals.dir = valueOf(arg);
    } else if (arg === "--config" || arg === "-c") {
      globals.config = valueOf(arg);
    } else if (arg === "--verbose" || arg === "-v") {
      globals.verbose = true;
      i += 1;
    } else if (arg === "--help" || arg === "-h") {
      globals.help = true;
      i += 1;
    } else {
      throw new UsageError(`unknown option '${arg}'`);
    }
  }

  globals.rest = argv.slice(i);
  return globals;
}

/**
 * Run one `relay` invocation. Returns the process exit code.
 */
export async function runCli(
  argv: string[],
  io: CliIo,
  opts: RunOptions = {},
): Promise<number> {
  try {
    const globals = splitGlobalArgs(argv);
    const [command, ...args] = globals.rest;
    if (globals.help || command === "help") {
      io.out(USAGE);
      return 0;
    }
    if (command === undefined) {
      io.err(USAGE);
      return 1;
    }
    const handler = COMMANDS.get(command);
    if (handler === undefined) {
      throw new UsageError(`unknown command '${command}'`);
    }

    const cwd = opts.cwd ?? process.cwd();
    const root = path.resolve(cwd, globals.dir ?? ".");
    const configPath =
      globals.config !== null ? path.resolve(cwd, globals.config) : path.join(root, CONFIG_FILE_NAME);
    const config = loadConfig(configPath, opts.env ?? process.env);
    const logger = opts.logger ?? createLogger(globals.verbose ? "debug" : config.logging.level);
    logger.debug({ command, root }, "Running command");

    const ctx: CommandContext = {
      io,
      logger,
      config,
      root,
      open: (dir?: string): Promise<IHandoffStore> =>
        createStore(
          resolveSyncLayout(config, dir ?? root),
          { remote: config.git.remote, mainBranch: config.git.main_branch },
          logger,
        ),
    };

    const result = await handler(ctx, args);
    if (result.isErr()) {
      io.err(`error: ${result.error.message}`);
      return 1;
    }
    return 0;
  } catch (e) {
    io.err(`error: ${errorMessage(e)}`);
    if (e instanceof UsageError) io.err("Run 'relay --help' for usage.");
    return 1;
  }
}
