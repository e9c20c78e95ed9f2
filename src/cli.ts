#!/usr/bin/env node

/**
 * scriptmender CLI - generated from unified command definitions
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import chalk from './utils/chalk.js';
import { ConfigOverrides, loadConfig, ScriptMenderConfig } from './config/index.js';
import { RuntimeName } from './runtimes/index.js';
import { LogLevel } from './utils/logger.js';
import {
  COMMAND_DEFINITIONS,
  createConsoleReporter,
  createServiceContext,
  generateCliCommand,
  generateCliHandler,
  ServiceContext,
} from './commands/index.js';

const RUNTIME_CHOICES: readonly RuntimeName[] = ['python', 'node'];
const LOG_LEVEL_CHOICES: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function asNumber(value: unknown): number | undefined {
  return typeof value === 'number' && !Number.isNaN(value) ? value : undefined;
}

function asBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function asRuntime(value: unknown): RuntimeName | undefined {
  return RUNTIME_CHOICES.find(choice => choice === value);
}

function asLogLevel(value: unknown): LogLevel | undefined {
  return LOG_LEVEL_CHOICES.find(choice => choice === value);
}

/**
 * Map global CLI flags onto configuration
 */
export function buildConfigOverrides(argv: Record<string, unknown>): ConfigOverrides {
  const json = argv.format === 'json';

  return {
    gateway: {
      model: asString(argv.model),
    },
    runtime: {
      language: asRuntime(argv.runtime),
    },
    loop: {
      maxAttempts: asNumber(argv.maxAttempts),
      outputDir: asString(argv.outputDir),
      // JSON output owns stdout, so the script's output is captured
      verbose: json ? false : asBoolean(argv.verbose),
      executionTimeoutMs: asNumber(argv.timeout),
    },
    logging: {
      level: asLogLevel(argv.logLevel),
    },
  };
}

function buildCli(args: string[]) {
  let context: ServiceContext | null = null;

  const getContext = (argv: Record<string, unknown>): ServiceContext => {
    if (context) return context;

    const config: ScriptMenderConfig = loadConfig(buildConfigOverrides(argv));
    const interactive = argv.format !== 'json';
    const print = (line: string) => console.log(line);

    context = createServiceContext(config, {
      observer: interactive ? createConsoleReporter(config.gateway.model, print) : undefined,
      onStatus: interactive ? message => print(chalk.gray(message)) : undefined,
    });
    return context;
  };

  let cli = yargs(args)
    .scriptName('scriptmender')
    .usage('$0 <task..>\n\nWrite, run and repair a script for a task described in plain words.')
    .option('max-attempts', {
      type: 'number',
      describe: 'Attempts before giving up (SCRIPTMENDER_MAX_ATTEMPTS)',
    })
    .option('runtime', {
      type: 'string',
      choices: RUNTIME_CHOICES,
      describe: 'Language of the generated script (SCRIPTMENDER_RUNTIME)',
    })
    .option('model', {
      type: 'string',
      describe: 'Ollama model name (SCRIPTMENDER_MODEL)',
    })
    .option('output-dir', {
      type: 'string',
      describe: 'Directory for generated scripts (SCRIPTMENDER_OUTPUT_DIR)',
    })
    .option('verbose', {
      type: 'boolean',
      describe: 'Stream the script output live; --no-verbose captures it (SCRIPTMENDER_VERBOSE)',
    })
    .option('timeout', {
      type: 'number',
      describe: 'Kill a script after this many milliseconds, 0 for no limit (SCRIPTMENDER_EXECUTION_TIMEOUT)',
    })
    .option('log-level', {
      type: 'string',
      choices: LOG_LEVEL_CHOICES,
      describe: 'Log level for the JSON log on stderr (SCRIPTMENDER_LOG_LEVEL)',
    })
    .option('format', {
      type: 'string',
      choices: ['human', 'json'],
      default: 'human',
      alias: 'f',
      describe: 'Output format',
    })
    .strict() // Reject unrecognized commands and options
    .fail((msg, err, y) => {
      if (err) {
        console.error(chalk.red('❌ Error:'), err.message);
      } else {
        y.showHelp(text => console.error(text));
        console.error('\n' + chalk.red(msg));
      }
      process.exitCode = 1;
    })
    .help()
    .version()
    .alias('h', 'help');

  for (const def of COMMAND_DEFINITIONS) {
    const commandConfig = generateCliCommand(def);
    const handler = generateCliHandler(def, getContext);

    cli = cli.command(
      [commandConfig.command, ...commandConfig.aliases],
      commandConfig.describe,
      commandConfig.builder,
      async argv => {
        process.exitCode = await handler(argv);
      }
    );
  }

  return {
    cli,
    // Stops a backend this process started
    shutdown: async () => {
      if (context) await context.supervisor.stop();
    },
  };
}

// Export for programmatic use
export async function runCLI(args: string[] = hideBin(process.argv)): Promise<void> {
  const { cli, shutdown } = buildCli(args);
  try {
    await cli.parseAsync();
  } finally {
    await shutdown();
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    // argv[1] is not a file (e.g. `node -e`)
    return false;
  }
}

if (isEntryPoint()) {
  runCLI().catch((error: unknown) => {
    console.error(chalk.red('❌ CLI error:'), error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
