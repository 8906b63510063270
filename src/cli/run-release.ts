#!/usr/bin/env node
import { loadReleaseConfig } from "../config";
import { GitCli } from "../core/git";
import { LOG_PREFIX, runReleaseCommand } from "./commands";

async function main() {
  const config = loadReleaseConfig();
  runReleaseCommand(process.argv.slice(2), {
    config,
    git: new GitCli(config.cwd),
  });
}
main().catch((err) => {
  console.error(`${LOG_PREFIX} failed:`, err instanceof Error ? err.message : err);
  process.exit(1);
});
