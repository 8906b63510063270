export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
export class ManifestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ManifestError";
  }
}
export class InvalidVersionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidVersionError";
  }
}
export class MissingTagError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MissingTagError";
  }
}
export class TagExistsError extends Error {
  constructor(tag: string) {
    super(`Tag ${tag} already exists`);
    this.name = "TagExistsError";
  }
}
export class SourceControlQueryError extends Error {
  readonly command: string;
  readonly stderr: string;
  constructor(command: string, stderr: string) {
    super(`git ${command} failed` + (stderr ? `: ${stderr}` : ""));
    this.name = "SourceControlQueryError";
    this.command = command;
    this.stderr = stderr;
  }
}
export class MissingChangelogError extends Error {
  constructor(file: string) {
    super(`Changelog ${file} does not exist (pass --init to create it)`);
    this.name = "MissingChangelogError";
  }
}
export class MalformedChangelogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedChangelogError";
  }
}
export class PortWaitTimeoutError extends Error {
  constructor(host: string, port: number, timeoutMs: number) {
    super(`${host}:${port} not reachable after ${timeoutMs}ms`);
    this.name = "PortWaitTimeoutError";
  }
}
