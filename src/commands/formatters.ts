/**
 * Output formatters for CLI commands
 * Supports both human-readable and JSON formats
 */

import chalk from '../utils/chalk.js';
import { FailureClassification, RepairOutcome } from '../types/index.js';
import { CommandExecution } from './types.js';
import { lastLine } from './utils.js';

export type OutputFormat = 'human' | 'json';

export interface FormattedOutput {
  text: string;
  exitCode: number;
}

export interface HealthCheckData {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  backend: {
    url: string;
    reachable: boolean;
    managed: boolean;
  };
  model: string;
  runtime: string;
}

/**
 * Format an executed command for display
 */
export function formatCommandResult(
  execution: CommandExecution,
  format: OutputFormat = 'human'
): FormattedOutput {
  const exitCode = execution.result.success ? 0 : 1;

  if (format === 'json') {
    return {
      text: JSON.stringify(execution.result, null, 2),
      exitCode,
    };
  }

  return {
    text: execution.formatHuman().trim(),
    exitCode,
  };
}

/**
 * Format an error raised before or during a command
 */
export function formatCommandError(message: string, format: OutputFormat = 'human'): FormattedOutput {
  if (format === 'json') {
    return {
      text: JSON.stringify({ success: false, error: message }, null, 2),
      exitCode: 1,
    };
  }

  return {
    text: chalk.red(`❌ Error: ${message}`),
    exitCode: 1,
  };
}

export function formatRepairOutcome(outcome: RepairOutcome): string {
  if (outcome.status === 'succeeded') {
    let output = `${chalk.gray('Script:')} ${outcome.scriptPath}\n`;
    output += `${chalk.gray('Attempts:')} ${outcome.attempt + 1}\n`;
    if (outcome.stdout.trim()) {
      output += `\n${chalk.bold('Output:')}\n${outcome.stdout.trimEnd()}\n`;
    }
    return output;
  }

  let output = `${chalk.gray('Script:')} ${outcome.scriptPath}\n`;
  output += `${chalk.gray('Attempts:')} ${outcome.attemptsUsed}\n`;
  output += `\n${chalk.red.bold('Last error:')}\n${outcome.diagnostic.trimEnd()}\n`;
  return output;
}

export function formatClassification(classification: FailureClassification): string {
  if (classification.kind === 'missing-dependency') {
    let output = `${chalk.bold('Classification:')} ${chalk.yellow('missing dependency')}\n`;
    output += `${chalk.gray('Module:')} ${classification.moduleName}\n`;
    output += `${chalk.gray('Package:')} ${classification.packageName}\n`;
    return output;
  }

  let output = `${chalk.bold('Classification:')} ${chalk.red('generic failure')}\n`;
  output += `${chalk.gray('Last line:')} ${lastLine(classification.diagnostic)}\n`;
  return output;
}

export function formatHealthCheck(data: HealthCheckData): string {
  const statusColor = data.status === 'healthy' ? chalk.green : chalk.red;
  let output = `\n${chalk.bold('System Status:')} ${statusColor(data.status.toUpperCase())}\n`;
  output += `${chalk.gray('Timestamp:')} ${new Date(data.timestamp).toLocaleString()}\n`;

  output += `\n${chalk.bold('Model Backend:')}\n`;
  output += `  URL: ${data.backend.url}\n`;
  output += `  Status: ${data.backend.reachable ? chalk.green('✓ Reachable') : chalk.red('✗ Unreachable')}\n`;
  output += `  Model: ${data.model}\n`;
  output += `\n${chalk.gray('Runtime:')} ${data.runtime}\n`;

  return output;
}
