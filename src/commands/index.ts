/**
 * Unified command definitions
 */

import { RegisteredCommand } from './types.js';
import { runTask } from './definitions/run.js';
import { classifyFailure, normalizeResponse } from './definitions/inspect.js';
import { healthCheck } from './definitions/system.js';

export const COMMAND_DEFINITIONS: readonly RegisteredCommand[] = [
  // Repair loop
  runTask,

  // Inspection
  classifyFailure,
  normalizeResponse,

  // System
  healthCheck,
];

export { runTask, classifyFailure, normalizeResponse, healthCheck };
export * from './types.js';
export * from './formatters.js';
export * from './generators.js';
export * from './context.js';
export * from './reporter.js';
