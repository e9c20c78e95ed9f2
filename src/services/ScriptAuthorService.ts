import { ScriptRuntime } from '../runtimes/ScriptRuntime.js';
import { generateScriptPrompt, renderPrompt, repairScriptPrompt } from '../prompts/index.js';
import { prepareScriptBody } from '../utils/normalize.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';
import { ModelGateway } from './ModelGateway.js';

/**
 * Produces script bodies for a task, either from scratch or by repairing
 * a body that failed
 */
export interface ScriptAuthor {
  writeInitial(task: string): Promise<string>;
  repair(task: string, brokenBody: string, diagnostic: string): Promise<string>;
}

export class ScriptAuthorService implements ScriptAuthor {
  constructor(
    private gateway: ModelGateway,
    private runtime: ScriptRuntime,
    private logger: Logger = defaultLogger
  ) {}

  async writeInitial(task: string): Promise<string> {
    const prompt = renderPrompt(generateScriptPrompt, {
      language: this.runtime.displayName,
      task,
      install_hint: this.runtime.installHint,
    });

    return this.ask('generate-script', prompt);
  }

  async repair(task: string, brokenBody: string, diagnostic: string): Promise<string> {
    const prompt = renderPrompt(repairScriptPrompt, {
      language: this.runtime.displayName,
      task,
      broken_code: brokenBody,
      error_log: diagnostic,
    });

    return this.ask('repair-script', prompt);
  }

  private async ask(operation: string, prompt: string): Promise<string> {
    const raw = await this.logger.timeAsync(operation, () => this.gateway.complete(prompt), {
      promptLength: prompt.length,
    });
    return prepareScriptBody(raw, this.runtime);
  }
}
