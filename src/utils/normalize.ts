/**
 * Deterministic clean-up of raw model output before it is executed.
 * Everything here is a pure text transformation.
 */

import { NormalizationRules, ScriptRuntime } from '../runtimes/ScriptRuntime.js';

interface FencedBlock {
  language: string;
  body: string;
}

const FENCED_BLOCK = /```([A-Za-z0-9_+.-]*)[ \t]*\r?\n([\s\S]*?)```/g;
const INLINE_FENCE = /```([\s\S]*?)```/;
const OPENING_FENCE = /```([A-Za-z0-9_+.-]*)[ \t]*\r?\n([\s\S]*)$/;

function findFencedBlocks(raw: string): FencedBlock[] {
  const blocks: FencedBlock[] = [];
  for (const match of raw.matchAll(FENCED_BLOCK)) {
    blocks.push({ language: (match[1] ?? '').toLowerCase(), body: match[2] ?? '' });
  }
  return blocks;
}

/**
 * Pull the script body out of a model response.
 *
 * When the response holds fenced blocks, only a block interior is used:
 * the first one tagged with one of `fenceLanguages`, else the first
 * untagged one, else the first block. Without any fence the trimmed
 * response is returned as-is.
 */
export function extractCodeBlock(raw: string, fenceLanguages: readonly string[] = []): string {
  const blocks = findFencedBlocks(raw);
  if (blocks.length > 0) {
    const preferred =
      blocks.find(block => fenceLanguages.includes(block.language)) ??
      blocks.find(block => block.language === '') ??
      blocks[0];
    return (preferred?.body ?? '').trim();
  }

  const inline = INLINE_FENCE.exec(raw);
  if (inline) {
    return (inline[1] ?? '').trim();
  }

  // Truncated response: an opening fence that never closes
  const opening = OPENING_FENCE.exec(raw);
  if (opening) {
    return (opening[2] ?? '').trim();
  }

  return raw.trim();
}

/**
 * Apply line filters, typo fixes and import injection
 */
export function normalizeCode(code: string, rules: NormalizationRules): string {
  const cleanedLines: string[] = [];

  for (const line of code.split('\n')) {
    const stripped = line.trim();
    if (rules.commandPrefixes.some(prefix => stripped.startsWith(prefix))) continue;

    const lowered = stripped.toLowerCase();
    if (rules.prosePrefixes.some(prefix => lowered.startsWith(prefix))) continue;

    if (rules.bareReturn && line.startsWith('return ')) {
      cleanedLines.push(rules.bareReturn(line.slice('return '.length)));
      continue;
    }

    cleanedLines.push(line);
  }

  let normalized = cleanedLines.join('\n');

  for (const [from, to] of rules.replacements) {
    normalized = normalized.replaceAll(from, to);
  }

  const injections = rules.importHints
    .filter(([usage, statement]) => usage.test(normalized) && !normalized.includes(statement))
    .map(([, statement]) => statement);

  if (injections.length > 0) {
    return injections.join('\n') + '\n\n' + normalized;
  }
  return normalized;
}

/**
 * Turn a raw model response into the body the loop will execute
 */
export function prepareScriptBody(raw: string, runtime: ScriptRuntime): string {
  return normalizeCode(extractCodeBlock(raw, runtime.fenceLanguages), runtime.normalization);
}
