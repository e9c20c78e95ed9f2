/**
 * Prompt templates sent to the model gateway
 */

import { replaceTemplateVariables } from '../utils/index.js';
import { PromptDefinition } from './types.js';
import { generateScriptPrompt } from './definitions/generate.js';
import { repairScriptPrompt } from './definitions/repair.js';

export const promptDefinitions: PromptDefinition[] = [
  generateScriptPrompt,
  repairScriptPrompt,
];

/**
 * Render a prompt, failing when a required argument is missing
 */
export function renderPrompt(def: PromptDefinition, args: Record<string, string>): string {
  const missing = def.arguments
    .filter(arg => arg.required && args[arg.name] === undefined)
    .map(arg => arg.name);

  if (missing.length > 0) {
    throw new Error(`Prompt '${def.name}' is missing arguments: ${missing.join(', ')}`);
  }

  return replaceTemplateVariables(def.template, args);
}

export { generateScriptPrompt, repairScriptPrompt };
export * from './types.js';
