import * as fs from "node:fs";
import { writeFileAtomic } from "./atomic-write";
import type { SourceControl } from "./git";
import { MalformedChangelogError, MissingChangelogError } from "../types/errors";

export const CHANGELOG_HEADER_LINES: readonly string[] = [
  "# Changelog",
  "",
  "All notable changes to this project will be documented in this file.",
  "",
  "The format is based on [Keep a Changelog](https://keepachangelog.com/en/1.0.0/),",
  "and this project adheres to [Semantic Versioning](https://semver.org/spec/v2.0.0.html).",
  "",
  "This file is generated automatically by the release procedure, please do not edit.",
  "",
  "",
];

export const CHANGELOG_HEADER = CHANGELOG_HEADER_LINES.map((l) => l + "\n").join("");

export interface CommitRecord {
  hash: string;
  subject: string;
  author: string;
  date: string;
}

export type ParsedSubject =
  | { kind: "matched"; category: string; text: string }
  | { kind: "unmatched"; raw: string };

export interface ChangelogEntry {
  category: string;
  description: string;
  commit: CommitRecord;
}

export interface ChangelogResult {
  file: string;
  section: string;
  entries: ChangelogEntry[];
  /** `"<subject> -- <hash>"` of every commit without a `[Category]` prefix. */
  skipped: string[];
}

export interface GenerateOptions {
  newTag: string;
  sinceTag: string;
  /** Create the changelog from the header when it does not exist yet. */
  init?: boolean;
  now?: Date;
}

const CATEGORY_SUBJECT = /^\[([A-Za-z]+)\]\s*(.+)$/;
const FIELD_SEP = "\x1f";

export function parseSubject(subject: string): ParsedSubject {
  const m = CATEGORY_SUBJECT.exec(subject);
  if (!m) return { kind: "unmatched", raw: subject };
  return { kind: "matched", category: m[1], text: m[2].trim() };
}

/** Commits in `sinceTag..HEAD`, with author and date, in a single query. */
export function readCommits(git: SourceControl, sinceTag: string): CommitRecord[] {
  const out = git.run([
    "log",
    `--format=%h${FIELD_SEP}%s${FIELD_SEP}%an${FIELD_SEP}%ad`,
    "--date=short",
    `${sinceTag}..HEAD`,
  ]);
  const records: CommitRecord[] = [];
  for (const line of out.split("\n")) {
    if (!line.trim()) continue;
    const [hash, subject, author, date] = line.split(FIELD_SEP);
    records.push({
      hash: hash.trim(),
      subject: subject ?? "",
      author: author ?? "",
      date: (date ?? "").trim(),
    });
  }
  return records;
}

const sortKey = (c: CommitRecord) => `${c.subject} -- ${c.hash}`;

/**
 * Groups commits by the bracketed category of their subject. Commits are
 * ordered by `"<subject> -- <hash>"` first so the output is stable across runs.
 */
export function groupCommits(commits: CommitRecord[]): {
  groups: Map<string, ChangelogEntry[]>;
  skipped: string[];
} {
  const sorted = [...commits].sort((a, b) => {
    const ka = sortKey(a);
    const kb = sortKey(b);
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  });
  const groups = new Map<string, ChangelogEntry[]>();
  const skipped: string[] = [];
  for (const commit of sorted) {
    const parsed = parseSubject(commit.subject);
    if (parsed.kind === "unmatched") {
      skipped.push(sortKey(commit));
      continue;
    }
    const entry = { category: parsed.category, description: parsed.text, commit };
    const bucket = groups.get(parsed.category);
    if (bucket) bucket.push(entry);
    else groups.set(parsed.category, [entry]);
  }
  return { groups, skipped };
}

export function renderSection(
  newTag: string,
  date: string,
  groups: Map<string, ChangelogEntry[]>,
): string {
  let out = `## [${newTag}] ${date}\n\n`;
  for (const [category, entries] of groups) {
    out += `### ${category}:\n`;
    for (const e of entries) {
      out += `- ${e.description}, ${e.commit.author}, ${e.commit.date}, ${e.commit.hash}\n`;
    }
    out += "\n";
  }
  return out;
}

/**
 * Everything after the fixed header; throws if the header is not intact.
 * Expects LF line endings.
 */
export function stripHeader(file: string, content: string): string {
  const lines = content.split("\n");
  const n = CHANGELOG_HEADER_LINES.length;
  if (lines.length < n) {
    throw new MalformedChangelogError(
      `${file} is shorter than the ${n}-line changelog header`,
    );
  }
  const mismatch = CHANGELOG_HEADER_LINES.findIndex((l, i) => lines[i] !== l);
  if (mismatch !== -1) {
    throw new MalformedChangelogError(
      `${file} line ${mismatch + 1} does not match the changelog header`,
    );
  }
  return lines.slice(n).join("\n");
}

export function formatDate(d: Date): string {
  const mm = String(d.getMonth() + 1).padStart(2, "0");
  const dd = String(d.getDate()).padStart(2, "0");
  return `${d.getFullYear()}-${mm}-${dd}`;
}

/** A rendered changelog that has not been written yet. */
export interface PendingChangelog {
  result: ChangelogResult;
  /** Replaces the file with the rendered content. */
  write(): void;
}

export class ChangelogBuilder {
  constructor(
    private readonly git: SourceControl,
    readonly file: string,
  ) {}

  /**
   * Prepends a `## [newTag]` section for `sinceTag..HEAD` below the header.
   * The file is replaced atomically; on any failure it is left untouched.
   * Assumes no concurrent writer.
   */
  generate(opts: GenerateOptions): ChangelogResult {
    const pending = this.prepare(opts);
    pending.write();
    return pending.result;
  }

  /**
   * Reads the changelog, checks its header and queries the log without
   * writing anything. CRLF files are written back with CRLF.
   */
  prepare(opts: GenerateOptions): PendingChangelog {
    const existing = this.readExisting(opts.init ?? false);
    const crlf = existing.includes("\r\n");
    const rest = stripHeader(this.file, crlf ? existing.replace(/\r\n/g, "\n") : existing);

    const { groups, skipped } = groupCommits(readCommits(this.git, opts.sinceTag));
    const section = renderSection(opts.newTag, formatDate(opts.now ?? new Date()), groups);

    const content = CHANGELOG_HEADER + section + rest;
    const file = this.file;
    return {
      result: {
        file,
        section,
        entries: [...groups.values()].flat(),
        skipped,
      },
      write: () => writeFileAtomic(file, crlf ? content.replace(/\n/g, "\r\n") : content),
    };
  }

  private readExisting(init: boolean): string {
    if (!fs.existsSync(this.file)) {
      if (init) return CHANGELOG_HEADER;
      throw new MissingChangelogError(this.file);
    }
    return fs.readFileSync(this.file, "utf8");
  }
}
