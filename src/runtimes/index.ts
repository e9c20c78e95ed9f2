import { ScriptMenderConfig } from '../config/index.js';
import { NodeRuntime } from './NodeRuntime.js';
import { PythonRuntime } from './PythonRuntime.js';
import { ScriptRuntime } from './ScriptRuntime.js';

/**
 * Create the script runtime named by configuration
 */
export function createScriptRuntime(config: ScriptMenderConfig): ScriptRuntime {
  switch (config.runtime.language) {
    case 'python':
      return new PythonRuntime(config.runtime.interpreter);

    case 'node':
      return new NodeRuntime(config.runtime.interpreter);

    default:
      throw new Error(`Unknown script runtime: ${String(config.runtime.language)}`);
  }
}

export * from './ScriptRuntime.js';
export * from './PythonRuntime.js';
export * from './NodeRuntime.js';
