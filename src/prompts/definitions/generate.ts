/**
 * First-generation prompt: no error context
 */

import { PromptDefinition } from '../types.js';

export const generateScriptPrompt: PromptDefinition = {
  name: 'generate-script',
  description: 'Ask the model for a flat, runnable script that performs a task',
  arguments: [
    { name: 'language', description: 'Display name of the script language', required: true },
    { name: 'task', description: 'Natural-language task', required: true },
    { name: 'install_hint', description: 'Install command the script must not contain', required: true },
  ],
  template:
    'Write a {{language}} script to {{task}}. ' +
    'Rules: Return ONLY valid {{language}} code. No functions (flat script). ' +
    "Do NOT use '{{install_hint}}'. Use standard libraries where possible.",
};
