import { AttemptMode } from '../types/index.js';

export interface ScriptArtifact {
  path: string;
  task: string;
  mode: AttemptMode;
  body: string;
}

/**
 * Storage for script artifacts.
 * One artifact per task lives at a path derived from the task text;
 * every write replaces it.
 */
export interface ArtifactStore {
  pathFor(task: string): string;
  write(task: string, mode: AttemptMode, body: string): Promise<ScriptArtifact>;
  read(task: string): Promise<ScriptArtifact | null>;
}

const SLUG_MAX_LENGTH = 50;

/**
 * Filesystem-safe slug of a task: ASCII letters, digits and underscores only
 */
export function slugify(text: string): string {
  const clean = text.replace(/[^a-zA-Z0-9\s]/g, '').toLowerCase();
  const slug = clean.replace(/\s+/g, '_').slice(0, SLUG_MAX_LENGTH);
  return slug.length > 0 ? slug : 'task';
}

export function artifactFileName(task: string, extension: string): string {
  return `generated_${slugify(task)}${extension}`;
}

function singleLine(text: string): string {
  return text.replace(/\s*\r?\n\s*/g, ' ');
}

/**
 * Render the artifact file: two header comment lines, then the body
 */
export function renderArtifact(task: string, mode: AttemptMode, body: string, commentPrefix: string): string {
  return `${commentPrefix} TASK: ${singleLine(task)}\n${commentPrefix} MODE: ${mode}\n${body}`;
}

/**
 * Parse an artifact file back into its parts, or null if the header is missing
 */
export function parseArtifact(
  content: string,
  commentPrefix: string
): Omit<ScriptArtifact, 'path'> | null {
  const lines = content.split('\n');
  const taskLine = lines[0] ?? '';
  const modeLine = lines[1] ?? '';
  const taskPrefix = `${commentPrefix} TASK: `;
  const modePrefix = `${commentPrefix} MODE: `;

  if (!taskLine.startsWith(taskPrefix) || !modeLine.startsWith(modePrefix)) {
    return null;
  }

  const mode = modeLine.slice(modePrefix.length);
  if (mode !== 'Generated' && mode !== 'Auto-Debugged') {
    return null;
  }

  return {
    task: taskLine.slice(taskPrefix.length),
    mode,
    body: lines.slice(2).join('\n'),
  };
}
