/**
 * Generators for CLI commands from command definitions
 */

import type { Argv, Options, PositionalOptions } from 'yargs';
import { getErrorMessage, isGatewayUnavailableError } from '../types/index.js';
import { isValidationError } from '../utils/validation.js';
import { logger } from '../utils/logger.js';
import { formatCommandError, formatCommandResult, FormattedOutput, OutputFormat } from './formatters.js';
import { CommandParameter, RegisteredCommand, ServiceContext } from './types.js';
import { readContentFromFileOrValue } from './utils.js';

export interface CliCommand {
  command: string;
  aliases: string[];
  describe: string;
  builder: <T>(yargs: Argv<T>) => Argv<T>;
}

export interface CliOutput {
  out: (text: string) => void;
  err: (text: string) => void;
}

const consoleOutput: CliOutput = {
  out: text => console.log(text),
  err: text => console.error(text),
};

function logUnexpectedError(error: unknown, context: string): void {
  logger.error(`Unexpected error in ${context}`, {
    errorMessage: getErrorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
}

function positionalToken(param: CommandParameter): string {
  const name = param.variadic ? `${param.name}..` : param.name;
  return param.required ? `<${name}>` : `[${name}]`;
}

function toFormat(value: unknown): OutputFormat {
  return value === 'json' ? 'json' : 'human';
}

/**
 * Generate CLI command configuration from command definition
 */
export function generateCliCommand(def: RegisteredCommand): CliCommand {
  const positionals = def.parameters.filter(p => p.positional).map(positionalToken);
  const command = [def.cliName, ...positionals].join(' ');

  const builder = <T>(yargs: Argv<T>): Argv<T> => {
    for (const param of def.parameters) {
      if (param.positional) {
        const positional: PositionalOptions = {
          describe: param.description,
          type: param.type,
          ...(param.variadic && { array: true }),
          ...(param.default !== undefined && { default: param.default }),
          ...(param.choices && { choices: param.choices }),
        };
        yargs.positional(param.name, positional);
      } else {
        const option: Options = {
          describe: param.description,
          type: param.type,
          ...(param.alias && { alias: param.alias }),
          ...(param.default !== undefined && { default: param.default }),
          ...(param.choices && { choices: param.choices }),
        };
        yargs.option(param.name, option);
      }
    }

    for (const example of def.examples) {
      yargs.example(example, '');
    }

    return yargs;
  };

  return {
    command,
    // The default command also runs without its name
    aliases: def.isDefault ? ['$0'] : [],
    describe: def.description,
    builder,
  };
}

async function readFileArguments(def: RegisteredCommand, args: Record<string, unknown>): Promise<void> {
  for (const param of def.parameters) {
    const value = args[param.name];
    if (param.fromFile && typeof value === 'string') {
      args[param.name] = await readContentFromFileOrValue(value);
    }
  }
}

/**
 * Generate CLI handler from command definition. The handler resolves
 * with the process exit code instead of exiting.
 */
export function generateCliHandler(
  def: RegisteredCommand,
  getContext: (argv: Record<string, unknown>) => ServiceContext,
  output: CliOutput = consoleOutput
) {
  return async (argv: Record<string, unknown>): Promise<number> => {
    const format = toFormat(argv.format);
    let formatted: FormattedOutput;

    try {
      const args = { ...argv };
      delete args.format;
      await readFileArguments(def, args);

      const execution = await def.execute(getContext(argv), args);
      formatted = formatCommandResult(execution, format);
    } catch (error: unknown) {
      // Expected failures are reported without a stack
      if (!isGatewayUnavailableError(error) && !isValidationError(error)) {
        logUnexpectedError(error, `${def.cliName} command`);
      }
      formatted = formatCommandError(getErrorMessage(error), format);
    }

    if (formatted.text) {
      if (formatted.exitCode === 0) {
        output.out(formatted.text);
      } else {
        output.err(formatted.text);
      }
    }

    return formatted.exitCode;
  };
}
