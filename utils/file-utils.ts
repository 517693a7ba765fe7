import fs from "node:fs/promises";
import { constants as F } from "node:fs";

export type AccessResult = | { ok: true } | { ok: false, error: string };

export function reasonFromCode(code: string | undefined) {
  const reason = code || 'UNKNOWN';
  const map: Record<string, string> = {
    EACCES: 'permission_denied',
    EPERM: 'operation_not_permitted',
    ENOENT: 'file_not_found',
    ELOOP: 'symlink_loop',
    ENOTDIR: 'not_a_directory',
    EISDIR: 'is_a_directory',
    ENODATA: 'no_data',
    EIO: 'io_error'
  };
  return map[reason] || reason.toLowerCase();
}

export function extractErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object'
    && error !== null && 'code' in error
    && typeof error.code === 'string'
  ) {
    return error.code;
  }
  return undefined;
}

export async function accessReadable(file: string): Promise<AccessResult> {
  try {
    await fs.access(file, F.R_OK);
    return { ok: true };
  } catch (error) {
    const code = extractErrorCode(error);
    return { ok: false, error: reasonFromCode(code) };
  }
}

/**
 * true only if `path` exists and resolves (symlinks followed) to a directory.
 */
export async function isDirectory(path: string): Promise<boolean> {
  if (!path) return false;
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Directories and symlinks: sysfs class directories (power_supply, thermal)
 * expose their devices as symlinks.
 */
export async function listEntries(path: string): Promise<string[]> {
  const dirents = await fs.readdir(path, { withFileTypes: true });
  return dirents
    .filter((dirent) => dirent.isDirectory() || dirent.isSymbolicLink())
    .map((dirent) => dirent.name);
}
