import { execFileSync } from "node:child_process";
import { SourceControlQueryError } from "../types/errors";

/**
 * Query interface over the repository. Every call runs one git command in
 * the repository's working directory and returns its stdout.
 */
export interface SourceControl {
  run(args: string[]): string;
}

export class GitCli implements SourceControl {
  constructor(private readonly cwd: string = process.cwd()) {}

  run(args: string[]): string {
    try {
      return execFileSync("git", args, {
        cwd: this.cwd,
        stdio: ["ignore", "pipe", "pipe"],
        encoding: "utf8",
      });
    } catch (err: unknown) {
      throw new SourceControlQueryError(args.join(" "), stderrOf(err));
    }
  }
}

function stderrOf(err: unknown): string {
  if (err instanceof Error && "stderr" in err) {
    const stderr = err.stderr;
    if (typeof stderr === "string") return stderr.trim();
    if (Buffer.isBuffer(stderr)) return stderr.toString("utf8").trim();
  }
  return err instanceof Error ? err.message : String(err);
}
