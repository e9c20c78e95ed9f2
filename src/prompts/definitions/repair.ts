/**
 * Repair prompt: the failing body and its error transcript go back to the model
 */

import { PromptDefinition } from '../types.js';

export const repairScriptPrompt: PromptDefinition = {
  name: 'repair-script',
  description: 'Ask the model to rewrite a script that failed to run',
  arguments: [
    { name: 'language', description: 'Display name of the script language', required: true },
    { name: 'task', description: 'Natural-language task', required: true },
    { name: 'broken_code', description: 'Body of the script that failed', required: true },
    { name: 'error_log', description: 'Diagnostic text captured from the failed run', required: true },
  ],
  template: [
    'You are a Senior {{language}} Engineer. The following script failed to run.',
    'TASK: {{task}}',
    '',
    '--- BROKEN CODE ---',
    '{{broken_code}}',
    '',
    '--- ERROR LOG ---',
    '{{error_log}}',
    '',
    'INSTRUCTIONS: Rewrite the code to fix the error. Return ONLY the valid {{language}} code block.',
  ].join('\n'),
};
