/**
 * scriptmender library entry point
 */

export * from './types/index.js';
export * from './config/index.js';
export * from './runtimes/index.js';
export * from './storage/index.js';
export * from './prompts/index.js';
export { prepareScriptBody, extractCodeBlock, normalizeCode } from './utils/normalize.js';
export { Logger, logger } from './utils/logger.js';
export type { LogLevel, LogContext, LogSink } from './utils/logger.js';
export { ValidationFailedError, isValidationError, validate } from './utils/validation.js';

export * from './services/ModelGateway.js';
export * from './services/BackendSupervisor.js';
export * from './services/OllamaGateway.js';
export * from './services/ScriptAuthorService.js';
export * from './services/ExecutionSandbox.js';
export * from './services/FailureClassifier.js';
export * from './services/DependencyInstaller.js';
export * from './services/RepairLoopService.js';

export { createServiceContext, createInstaller } from './commands/context.js';
export type { ServiceContext } from './commands/types.js';
export { runCLI } from './cli.js';
