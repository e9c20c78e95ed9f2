/**
 * Types for the unified command definition system
 */

import Joi from 'joi';
import { ScriptMenderConfig } from '../config/index.js';
import { ScriptRuntime } from '../runtimes/index.js';
import { BackendSupervisor } from '../services/BackendSupervisor.js';
import { DependencyInstaller } from '../services/DependencyInstaller.js';
import { ExecutionSandbox } from '../services/ExecutionSandbox.js';
import { FailureClassifier } from '../services/FailureClassifier.js';
import { ModelGateway } from '../services/ModelGateway.js';
import { RepairLoopService } from '../services/RepairLoopService.js';
import { ScriptAuthor } from '../services/ScriptAuthorService.js';
import { ArtifactStore } from '../storage/index.js';
import { validate } from '../utils/validation.js';

// Service context for command handlers
export interface ServiceContext {
  config: ScriptMenderConfig;
  runtime: ScriptRuntime;
  supervisor: BackendSupervisor;
  gateway: ModelGateway;
  author: ScriptAuthor;
  sandbox: ExecutionSandbox;
  classifier: FailureClassifier;
  installer: DependencyInstaller;
  artifacts: ArtifactStore;
  repairLoop: RepairLoopService;
}

export type CommandParameterType = 'string' | 'number' | 'boolean';

export interface CommandParameter {
  readonly name: string;
  readonly type: CommandParameterType;
  readonly description: string;
  readonly required?: boolean;
  readonly default?: string | number | boolean;
  readonly choices?: readonly string[];
  readonly alias?: string | readonly string[];
  readonly positional?: boolean;
  /** Positional that swallows the rest of the words (`<name..>`) */
  readonly variadic?: boolean;
  /** Accept `@path` and read the value from that file */
  readonly fromFile?: boolean;
}

// Result format for consistent output
export interface CommandResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}

export interface CommandDefinition<A, D> {
  // Identity
  name: string;
  cliName: string;
  description: string;
  /** Runs when no command name is given */
  isDefault?: boolean;

  parameters: readonly CommandParameter[];
  /** Validates and converts the raw arguments before the handler sees them */
  argsSchema: Joi.ObjectSchema<A>;

  handler(context: ServiceContext, args: A): Promise<CommandResult<D>>;

  // Human-readable rendering for the CLI
  formatResult(result: CommandResult<D>, args: A): string;

  examples?: string[];
}

export interface CommandExecution {
  result: CommandResult<unknown>;
  formatHuman(): string;
}

/**
 * A command with its argument and data types erased, so commands with
 * different shapes can share one registry
 */
export interface RegisteredCommand {
  readonly name: string;
  readonly cliName: string;
  readonly description: string;
  readonly isDefault: boolean;
  readonly parameters: readonly CommandParameter[];
  readonly examples: readonly string[];
  execute(context: ServiceContext, rawArgs: Record<string, unknown>): Promise<CommandExecution>;
}

export function defineCommand<A, D>(definition: CommandDefinition<A, D>): RegisteredCommand {
  return {
    name: definition.name,
    cliName: definition.cliName,
    description: definition.description,
    isDefault: definition.isDefault ?? false,
    parameters: definition.parameters,
    examples: definition.examples ?? [],
    async execute(context, rawArgs) {
      const args = validate<A>(definition.argsSchema, rawArgs);
      const result = await definition.handler(context, args);
      return {
        result,
        formatHuman: () => definition.formatResult(result, args),
      };
    },
  };
}
