/**
 * Utilities for command processing
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { getErrorMessage } from '../types/index.js';

/**
 * Reads content from a file path if the value starts with '@', otherwise returns the value as-is
 */
export async function readContentFromFileOrValue(value: string): Promise<string> {
  if (value.startsWith('@')) {
    const filePath = value.slice(1);
    try {
      return await readFile(resolve(filePath), 'utf-8');
    } catch (error) {
      throw new Error(`Failed to read file '${filePath}': ${getErrorMessage(error)}`);
    }
  }
  return value;
}

/**
 * Last non-empty line of a diagnostic, used for one-line summaries
 */
export function lastLine(text: string): string {
  const lines = text.trim().split('\n');
  return (lines[lines.length - 1] ?? '').trim();
}
