import * as fs from "node:fs";
import * as path from "node:path";

/**
 * Writes `content` to a sibling temp file and renames it over `file`.
 * The temp file is removed if anything fails before the rename, so the
 * target is either fully replaced or left as it was.
 */
export function writeFileAtomic(file: string, content: string): void {
  const dir = path.dirname(file);
  const tmp = path.join(dir, `.${path.basename(file)}.${process.pid}.tmp`);
  try {
    fs.writeFileSync(tmp, content, "utf8");
    fs.renameSync(tmp, file);
  } finally {
    fs.rmSync(tmp, { force: true });
  }
}
