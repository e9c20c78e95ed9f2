import { promises as fs } from 'fs';
import { constants } from 'fs';
import path from 'path';

/**
 * File utilities for atomic operations and safe file handling
 */

function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.access(dirPath, constants.F_OK);
  } catch {
    await fs.mkdir(dirPath, { recursive: true });
  }
}

/**
 * Write data to a file atomically using temp file + rename
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}.${Math.random().toString(36).slice(2, 11)}`;

  try {
    await ensureDirectory(path.dirname(filePath));
    await fs.writeFile(tempPath, data, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await removeFileSafe(tempPath);
    throw error;
  }
}

/**
 * Read a file safely, returning null if it doesn't exist
 */
export async function readFileSafe(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }
}

/**
 * Remove a file safely (no error if it doesn't exist)
 */
export async function removeFileSafe(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error: unknown) {
    if (!hasErrorCode(error, 'ENOENT')) {
      throw error;
    }
  }
}
