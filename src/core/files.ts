import { writeFileSync, renameSync, mkdirSync, rmSync } from "fs";
import { dirname, basename, join } from "path";

/**
 * Write `data` next to `path` first and rename it into place, so a crash
 * mid-write leaves the previous file intact.
 */
export function writeFileAtomic(path: string, data: string): void {
  const dir = dirname(path);
  mkdirSync(dir, { recursive: true });
  const tmpPath = join(dir, `.${basename(path)}.${process.pid}.tmp`);
  try {
    writeFileSync(tmpPath, data, "utf-8");
    renameSync(tmpPath, path);
  } catch (err) {
    rmSync(tmpPath, { force: true });
    throw err;
  }
}

export function toPrettyJson(value: unknown): string {
  return JSON.stringify(value, null, 2) + "\n";
}
