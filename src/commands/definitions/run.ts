/**
 * Run Command (the generate, execute, repair loop)
 */

import Joi from 'joi';
import chalk from '../../utils/chalk.js';
import { RepairOutcome } from '../../types/index.js';
import { formatRepairOutcome } from '../formatters.js';
import { CommandParameter, defineCommand } from '../types.js';

interface RunArgs {
  task: string[];
}

const runParams = [
  {
    name: 'task',
    type: 'string',
    description: 'What the script should do, in plain words',
    positional: true,
    variadic: true,
    required: true,
  },
] as const satisfies readonly CommandParameter[];

export const runTask = defineCommand<RunArgs, RepairOutcome>({
  name: 'run',
  cliName: 'run',
  description: 'Ask the model for a script, run it and repair it until it works',
  isDefault: true,
  parameters: runParams,
  argsSchema: Joi.object<RunArgs>({
    task: Joi.array().items(Joi.string()).single().min(1).required(),
  }),
  examples: [
    'scriptmender "print the first 10 prime numbers"',
    'scriptmender run --runtime node --max-attempts 6 "list files larger than 1 MB in this directory"',
  ],
  async handler(context, args) {
    const outcome = await context.repairLoop.run(args.task.join(' '));

    if (outcome.status === 'succeeded') {
      return {
        success: true,
        data: outcome,
        message: `Success on attempt ${outcome.attempt + 1}`,
      };
    }

    return {
      success: false,
      data: outcome,
      error: `Failed after ${outcome.attemptsUsed} attempts`,
    };
  },
  formatResult(result) {
    if (!result.data) {
      return chalk.red(`❌ Error: ${result.error ?? 'Command failed'}`);
    }
    return formatRepairOutcome(result.data);
  },
});
