import * as path from "node:path";
import { ConfigError } from "./types/errors";

export interface ReleaseConfig {
  cwd: string;
  manifestFile: string;
  changelogFile: string;
  tagPrefix: string;
}

export interface EntrypointConfig {
  host: string;
  port: number;
  intervalMs: number;
  timeoutMs: number;
}

type Env = Record<string, string | undefined>;

export function loadReleaseConfig(env: Env = process.env): ReleaseConfig {
  const cwd = path.resolve(env["RELEASE_CWD"] || process.cwd());
  return {
    cwd,
    manifestFile: path.resolve(cwd, env["RELEASE_MANIFEST"] || "Cargo.toml"),
    changelogFile: path.resolve(cwd, env["CHANGELOG_FILE"] || "CHANGELOG.md"),
    tagPrefix: env["RELEASE_TAG_PREFIX"] ?? "v",
  };
}

export function loadEntrypointConfig(env: Env = process.env): EntrypointConfig {
  return {
    host: env["WAIT_HOST"] || "localhost",
    port: intFromEnv(env, "WAIT_PORT", 5432, 1, 65535),
    intervalMs: intFromEnv(env, "WAIT_INTERVAL_MS", 100, 1),
    timeoutMs: intFromEnv(env, "WAIT_TIMEOUT_MS", 0, 0),
  };
}

export function parseIntSetting(
  name: string,
  raw: string,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || value < min || value > max) {
    throw new ConfigError(`${name} must be an integer in [${min}, ${max}], got "${raw}"`);
  }
  return value;
}

function intFromEnv(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  max?: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  return parseIntSetting(name, raw, min, max);
}
