/**
 * Inspection Commands (classify a diagnostic, normalize model output)
 */

import Joi from 'joi';
import { FailureClassification } from '../../types/index.js';
import { prepareScriptBody } from '../../utils/normalize.js';
import { diagnosticSchema } from '../../utils/validation.js';
import { formatClassification } from '../formatters.js';
import { CommandParameter, defineCommand } from '../types.js';

interface ClassifyArgs {
  diagnostic: string;
}

interface NormalizeArgs {
  text: string;
}

export interface NormalizeData {
  runtime: string;
  body: string;
}

const classifyParams = [
  {
    name: 'diagnostic',
    type: 'string',
    description: 'Error output to classify (use @path to read it from a file)',
    positional: true,
    required: true,
    fromFile: true,
  },
] as const satisfies readonly CommandParameter[];

const normalizeParams = [
  {
    name: 'text',
    type: 'string',
    description: 'Raw model response (use @path to read it from a file)',
    positional: true,
    required: true,
    fromFile: true,
  },
] as const satisfies readonly CommandParameter[];

export const classifyFailure = defineCommand<ClassifyArgs, FailureClassification>({
  name: 'classify',
  cliName: 'classify',
  description: 'Show how a failed run would be classified and which package would be installed',
  parameters: classifyParams,
  argsSchema: Joi.object<ClassifyArgs>({
    diagnostic: diagnosticSchema,
  }),
  examples: [
    `scriptmender classify "ModuleNotFoundError: No module named 'bs4'"`,
    'scriptmender classify @traceback.txt --format json',
  ],
  async handler(context, args) {
    return {
      success: true,
      data: context.classifier.classify(args.diagnostic),
    };
  },
  formatResult(result) {
    return result.data ? formatClassification(result.data) : '';
  },
});

export const normalizeResponse = defineCommand<NormalizeArgs, NormalizeData>({
  name: 'normalize',
  cliName: 'normalize',
  description: 'Print the script body that would be executed for a raw model response',
  parameters: normalizeParams,
  argsSchema: Joi.object<NormalizeArgs>({
    text: Joi.string().required(),
  }),
  examples: ['scriptmender normalize @response.md'],
  async handler(context, args) {
    return {
      success: true,
      data: {
        runtime: context.runtime.name,
        body: prepareScriptBody(args.text, context.runtime),
      },
    };
  },
  formatResult(result) {
    return result.data?.body ?? '';
  },
});
