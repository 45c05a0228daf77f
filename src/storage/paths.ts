import { join, resolve } from "path";
import { existsSync } from "fs";
import { StoreMisuseError } from "./errors.js";

export const BACKUP_DIR = "backup";
export const QUARANTINE_DIR = "corrupted";

export interface StoragePaths {
  baseDir: string;
  file: string;
  backupDir: string;
  backup: string;
  quarantineDir: string;
}

// 255-byte file name limit minus room for `-<epochMs>-<n>` and `.<gen>.tmp`
export const MAX_NAME_BYTES = 200;

const RESERVED = new Set([".", "..", BACKUP_DIR, QUARANTINE_DIR]);

/** Names map 1:1 to file names, so no separators, no NUL, nothing that collides with our subdirectories. */
export function assertValidName(name: string): void {
  if (name.length === 0 || Buffer.byteLength(name, "utf-8") > MAX_NAME_BYTES) {
    throw new StoreMisuseError(`invalid store name '${name}': must be 1-${MAX_NAME_BYTES} bytes of UTF-8`);
  }
  if (/[/\\\0]/.test(name)) {
    throw new StoreMisuseError(`invalid store name '${name}': path separators are not allowed`);
  }
  if (RESERVED.has(name) || name.endsWith(".tmp")) {
    throw new StoreMisuseError(`invalid store name '${name}': reserved`);
  }
}

export function resolvePaths(baseDir: string, name: string): StoragePaths {
  assertValidName(name);
  const base = resolve(baseDir);
  const backupDir = join(base, BACKUP_DIR);
  return {
    baseDir: base,
    file: join(base, name),
    backupDir,
    backup: join(backupDir, name),
    quarantineDir: join(base, QUARANTINE_DIR),
  };
}

/** `<dir>/<name>-<epochMs>`, with `-<n>` appended until the path is free. */
export function quarantinePath(paths: StoragePaths, name: string, now: number = Date.now()): string {
  const stem = join(paths.quarantineDir, `${name}-${now}`);
  if (!existsSync(stem)) return stem;
  for (let n = 1; ; n++) {
    const candidate = `${stem}-${n}`;
    if (!existsSync(candidate)) return candidate;
  }
}
