import { describe, it, expect } from 'vitest';
import {
  generateScriptPrompt,
  promptDefinitions,
  renderPrompt,
  repairScriptPrompt,
} from '../../src/prompts/index.js';
import { extractTemplateVariables } from '../../src/utils/index.js';

describe('Prompts', () => {
  it('should declare every placeholder its template uses', () => {
    for (const def of promptDefinitions) {
      const declared = def.arguments.map(arg => arg.name).sort();
      expect(extractTemplateVariables(def.template).sort()).toEqual(declared);
    }
  });

  it('should render the generation prompt', () => {
    const prompt = renderPrompt(generateScriptPrompt, {
      language: 'Python',
      task: 'print current date',
      install_hint: 'pip install',
    });

    expect(prompt).toBe(
      'Write a Python script to print current date. ' +
        'Rules: Return ONLY valid Python code. No functions (flat script). ' +
        "Do NOT use 'pip install'. Use standard libraries where possible."
    );
  });

  it('should render the repair prompt with the broken code and error log', () => {
    const prompt = renderPrompt(repairScriptPrompt, {
      language: 'Python',
      task: 'divide',
      broken_code: 'print(1 / 0)',
      error_log: 'ZeroDivisionError: division by zero',
    });

    expect(prompt.split('\n')).toEqual([
      'You are a Senior Python Engineer. The following script failed to run.',
      'TASK: divide',
      '',
      '--- BROKEN CODE ---',
      'print(1 / 0)',
      '',
      '--- ERROR LOG ---',
      'ZeroDivisionError: division by zero',
      '',
      'INSTRUCTIONS: Rewrite the code to fix the error. Return ONLY the valid Python code block.',
    ]);
  });

  it('should not expand placeholders inside substituted values', () => {
    const prompt = renderPrompt(repairScriptPrompt, {
      language: 'Python',
      task: 'template {{language}}',
      broken_code: 'print("{{task}}")',
      error_log: 'none',
    });

    expect(prompt).toContain('TASK: template {{language}}');
    expect(prompt).toContain('print("{{task}}")');
  });

  it('should refuse to render with a missing argument', () => {
    expect(() => renderPrompt(generateScriptPrompt, { language: 'Python', task: 'x' })).toThrow(
      "Prompt 'generate-script' is missing arguments: install_hint"
    );
  });
});
