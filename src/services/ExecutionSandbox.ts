import { spawn } from 'child_process';
import path from 'path';
import { performance } from 'perf_hooks';
import { ScriptRuntime } from '../runtimes/ScriptRuntime.js';
import { ExecutionResult, pickDiagnostic } from '../types/index.js';
import { logger } from '../utils/logger.js';

/**
 * Runs a script artifact as a separate OS process
 */
export interface ExecutionSandbox {
  execute(scriptPath: string): Promise<ExecutionResult>;
}

export interface ProcessSandboxOptions {
  /** Stream the script's stdout live instead of capturing it */
  verbose: boolean;
  /** Kill the script after this many milliseconds; 0 waits forever */
  timeoutMs?: number;
  stdin?: 'inherit' | 'ignore';
}

export class ProcessSandbox implements ExecutionSandbox {
  constructor(
    private runtime: ScriptRuntime,
    private options: ProcessSandboxOptions
  ) {}

  execute(scriptPath: string): Promise<ExecutionResult> {
    const command = this.runtime.command(scriptPath);
    const timeoutMs = this.options.timeoutMs ?? 0;
    const startTime = performance.now();

    logger.debug('Executing script', { scriptPath, command: command.file, verbose: this.options.verbose });

    return new Promise(resolve => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (exitCode: number | null, signal: string | null, spawnError?: string) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);

        const success = exitCode === 0 && !timedOut && spawnError === undefined;
        let diagnostic = '';
        if (!success) {
          if (spawnError !== undefined) {
            diagnostic = `Failed to start ${command.file}: ${spawnError}`;
          } else if (timedOut) {
            const captured = stderr.trimEnd();
            diagnostic = `${captured ? captured + '\n' : ''}Execution timed out after ${timeoutMs} ms`;
          } else {
            diagnostic = pickDiagnostic(stderr, stdout);
          }
        }

        resolve({
          success,
          exitCode,
          signal,
          stdout,
          stderr,
          diagnostic,
          durationMs: performance.now() - startTime,
          timedOut,
        });
      };

      const child = spawn(command.file, command.args, {
        cwd: path.dirname(scriptPath),
        env: process.env,
        stdio: [this.options.stdin ?? 'inherit', this.options.verbose ? 'inherit' : 'pipe', 'pipe'],
        windowsHide: true,
      });

      // decode across chunk boundaries so split multibyte characters survive
      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');

      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });

      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          child.kill('SIGKILL');
        }, timeoutMs);
      }

      child.on('error', err => {
        finish(null, null, err.message);
      });

      child.on('close', (code, signal) => {
        finish(code, signal);
      });
    });
  }
}
