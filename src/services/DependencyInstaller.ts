import path from 'path';
import Joi from 'joi';
import { ProcessCommand } from '../runtimes/ScriptRuntime.js';
import { CommandRunner, formatCommand, runCommand } from '../utils/process.js';
import { logger } from '../utils/logger.js';
import { npmPackageNameSchema, pipPackageNameSchema } from '../utils/validation.js';

/**
 * Makes a package importable. Opaque and side-effecting: it changes the
 * shared package environment with no locking, so concurrent runs
 * against one environment may race.
 */
export interface DependencyInstaller {
  install(packageName: string): Promise<boolean>;
}

function isValidPackageName(schema: Joi.Schema, packageName: string): boolean {
  const { error } = schema.validate(packageName);
  if (error) {
    logger.warn('Refusing to install package with invalid name', { packageName, reason: error.message });
    return false;
  }
  return true;
}

/**
 * Packages that ship with the OS rather than pip, keyed by platform
 */
export const SYSTEM_PACKAGES: Readonly<Record<string, Partial<Record<NodeJS.Platform, ProcessCommand>>>> = {
  tkinter: {
    linux: { file: 'sudo', args: ['apt-get', 'install', '-y', 'python3-tk'] },
    darwin: { file: 'brew', args: ['install', 'python-tk'] },
  },
};

export class PipInstaller implements DependencyInstaller {
  constructor(
    private interpreter: string = 'python3',
    private platform: NodeJS.Platform = process.platform,
    private run: CommandRunner = runCommand
  ) {}

  async install(packageName: string): Promise<boolean> {
    if (!isValidPackageName(pipPackageNameSchema, packageName)) return false;

    const systemPackage = SYSTEM_PACKAGES[packageName];
    if (systemPackage) {
      return this.installSystemPackage(packageName, systemPackage);
    }

    const command = { file: this.interpreter, args: ['-m', 'pip', 'install', packageName] };
    logger.info('Installing package with pip', { packageName });
    const outcome = await this.run(command, { quiet: true });
    if (!outcome.ok) {
      logger.warn('pip install failed', { packageName, exitCode: outcome.exitCode, spawnError: outcome.spawnError });
    }
    return outcome.ok;
  }

  private async installSystemPackage(
    packageName: string,
    commands: Partial<Record<NodeJS.Platform, ProcessCommand>>
  ): Promise<boolean> {
    const command = commands[this.platform];
    if (!command) {
      logger.warn('Cannot install system package automatically on this platform', {
        packageName,
        platform: this.platform,
      });
      return false;
    }

    logger.info('Installing system package', { packageName, command: formatCommand(command) });
    const outcome = await this.run(command, { quiet: false });
    if (outcome.ok) return true;

    if (outcome.spawnError !== undefined) {
      logger.warn(`Package manager not found (tried: ${command.file})`, { packageName });
    } else {
      logger.warn(`Failed to install '${packageName}'. Run this manually: ${formatCommand(command)}`, {
        packageName,
        exitCode: outcome.exitCode,
      });
    }
    return false;
  }
}

/**
 * Installs into `<prefixDir>/node_modules`, next to the generated scripts
 */
export class NpmInstaller implements DependencyInstaller {
  private prefixDir: string;

  constructor(
    prefixDir: string,
    private run: CommandRunner = runCommand
  ) {
    this.prefixDir = path.resolve(prefixDir);
  }

  async install(packageName: string): Promise<boolean> {
    if (!isValidPackageName(npmPackageNameSchema, packageName)) return false;

    logger.info('Installing package with npm', { packageName, prefix: this.prefixDir });
    const outcome = await this.run(
      { file: 'npm', args: ['install', '--no-save', '--prefix', this.prefixDir, packageName] },
      { quiet: true }
    );
    if (!outcome.ok) {
      logger.warn('npm install failed', { packageName, exitCode: outcome.exitCode, spawnError: outcome.spawnError });
    }
    return outcome.ok;
  }
}

/**
 * Used when automatic installation is switched off
 */
export class DisabledInstaller implements DependencyInstaller {
  async install(packageName: string): Promise<boolean> {
    logger.info('Automatic installation disabled', { packageName });
    return false;
  }
}
