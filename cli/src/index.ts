#!/usr/bin/env node
import { runCli } from "./commands/index.js";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
  });
}

main().catch((e: unknown) => {
  console.error("Fatal error:", e);
  process.exit(1);
});
