import { spawn } from 'child_process';
import { ProcessCommand } from '../runtimes/ScriptRuntime.js';

export interface CommandOutcome {
  ok: boolean;
  exitCode: number | null;
  /** Set when the process could not be started at all */
  spawnError?: string;
}

export interface RunCommandOptions {
  cwd?: string;
  /** Discard the command's output instead of showing it */
  quiet?: boolean;
}

export type CommandRunner = (command: ProcessCommand, options?: RunCommandOptions) => Promise<CommandOutcome>;

/**
 * Run a command to completion. Never rejects: start-up failures
 * (such as a missing executable) are reported through `spawnError`.
 */
export const runCommand: CommandRunner = (command, options = {}) => {
  return new Promise(resolve => {
    let settled = false;
    const finish = (outcome: CommandOutcome) => {
      if (settled) return;
      settled = true;
      resolve(outcome);
    };

    const child = spawn(command.file, command.args, {
      cwd: options.cwd,
      env: process.env,
      stdio: options.quiet ? 'ignore' : 'inherit',
      windowsHide: true,
    });

    child.on('error', err => {
      finish({ ok: false, exitCode: null, spawnError: err.message });
    });

    child.on('close', code => {
      finish({ ok: code === 0, exitCode: code });
    });
  });
};

export function formatCommand(command: ProcessCommand): string {
  return [command.file, ...command.args].join(' ');
}
