#!/usr/bin/env node
import { spawn } from "node:child_process";
import { constants } from "node:os";
import { parseArgs } from "node:util";
import { loadEntrypointConfig, parseIntSetting, type EntrypointConfig } from "../config";
import { waitForPort } from "../core/port-wait";
import { ConfigError } from "../types/errors";

export interface EntrypointPlan {
  wait: EntrypointConfig;
  command: string;
  args: string[];
  env: Record<string, string>;
}

/**
 * `[--host h] [--port p] [--env K=V]... -- <cmd> [args...]`; flags override
 * the WAIT_* environment.
 */
export function parseEntrypointArgs(
  argv: string[],
  base: EntrypointConfig,
): EntrypointPlan {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      host: { type: "string" },
      port: { type: "string" },
      env: { type: "string", multiple: true },
    },
  });
  const [command, ...args] = positionals;
  if (!command) {
    throw new ConfigError("usage: release-ledger-entrypoint [--host h] [--port p] [--env K=V]... -- <cmd> [args...]");
  }
  const env: Record<string, string> = {};
  for (const pair of values.env ?? []) {
    const eq = pair.indexOf("=");
    if (eq <= 0) throw new ConfigError(`--env expects KEY=VALUE, got "${pair}"`);
    env[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return {
    wait: {
      ...base,
      host: values.host ?? base.host,
      port: values.port === undefined ? base.port : parseIntSetting("--port", values.port, 1, 65535),
    },
    command,
    args,
    env,
  };
}

/** Shell convention: a child killed by a signal exits with 128 + signal number. */
export function childExitCode(
  code: number | null,
  signal: NodeJS.Signals | null,
): number {
  if (code !== null) return code;
  if (signal === null) return 0;
  return 128 + (constants.signals[signal] ?? 0);
}

async function main() {
  const plan = parseEntrypointArgs(process.argv.slice(2), loadEntrypointConfig());
  const { host, port } = plan.wait;

  console.log(`Waiting for ${host}:${port}...`);
  await waitForPort(plan.wait);
  console.log(`${host}:${port} is reachable`);

  const child = spawn(plan.command, plan.args, {
    stdio: "inherit",
    env: { ...process.env, ...plan.env },
  });
  const code = await new Promise<number>((resolve, reject) => {
    child.once("error", reject);
    child.once("exit", (exitCode, signal) => resolve(childExitCode(exitCode, signal)));
  });
  process.exit(code);
}

if (require.main === module) {
  main().catch((err) => {
    console.error("[release-ledger-entrypoint] failed:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
