import { spawn } from 'child_process';
import { setTimeout as delay } from 'timers/promises';
import fetch from 'node-fetch';
import { GatewayUnavailableError } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { FetchLike } from './ModelGateway.js';

/**
 * Lifecycle of the model backend, passed to whatever needs to query or
 * start it. A backend started here is stopped again at process exit.
 */
export interface BackendSupervisor {
  isReachable(): Promise<boolean>;
  ensureRunning(): Promise<void>;
  stop(): Promise<void>;
  /** True while a backend process started by this supervisor is alive */
  readonly ownsBackend: boolean;
}

export interface BackendProcess {
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'exit', listener: () => void): unknown;
}

export type BackendSpawner = (command: string, args: string[]) => BackendProcess;

export interface OllamaSupervisorOptions {
  baseUrl: string;
  command: string;
  autoStart: boolean;
  readinessAttempts: number;
  readinessIntervalMs: number;
  probeTimeoutMs?: number;
  stopGraceMs?: number;
  onStatus?: (message: string) => void;
}

const spawnDetachedFromOutput: BackendSpawner = (command, args) =>
  spawn(command, args, { stdio: 'ignore', windowsHide: true });

export class OllamaSupervisor implements BackendSupervisor {
  private child?: BackendProcess;
  private spawnError?: Error;
  private readonly exitHook = () => {
    this.child?.kill('SIGTERM');
  };

  constructor(
    private options: OllamaSupervisorOptions,
    private fetchImpl: FetchLike = fetch,
    private spawnBackend: BackendSpawner = spawnDetachedFromOutput
  ) {}

  get ownsBackend(): boolean {
    return this.child !== undefined;
  }

  async isReachable(): Promise<boolean> {
    try {
      await this.fetchImpl(this.options.baseUrl, {
        method: 'GET',
        signal: AbortSignal.timeout(this.options.probeTimeoutMs ?? 500),
      });
      return true;
    } catch (error) {
      logger.trace('Model backend probe failed', {
        baseUrl: this.options.baseUrl,
        reason: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async ensureRunning(): Promise<void> {
    if (await this.isReachable()) return;

    if (!this.options.autoStart) {
      throw new GatewayUnavailableError(
        `Model backend is not reachable at ${this.options.baseUrl} and auto-start is disabled`
      );
    }

    if (!this.child) {
      this.start();
    }
    await this.waitUntilReady();
  }

  async stop(): Promise<void> {
    const child = this.child;
    if (!child) return;

    this.child = undefined;
    process.removeListener('exit', this.exitHook);

    if (child.exitCode !== null || child.signalCode !== null) return;

    this.options.onStatus?.('Stopping model backend...');
    await new Promise<void>(resolve => {
      const timer = setTimeout(() => {
        child.kill('SIGKILL');
        resolve();
      }, this.options.stopGraceMs ?? 3000);
      child.once('exit', () => {
        clearTimeout(timer);
        resolve();
      });
      child.kill('SIGTERM');
    });
    logger.info('Model backend stopped', { command: this.options.command });
  }

  private start(): void {
    this.options.onStatus?.('Starting model backend (on demand)...');
    logger.info('Starting model backend', { command: this.options.command, baseUrl: this.options.baseUrl });

    this.spawnError = undefined;
    const child = this.spawnBackend(this.options.command, ['serve']);
    child.on('error', error => {
      this.spawnError = error;
    });
    this.child = child;
    process.once('exit', this.exitHook);
  }

  private async waitUntilReady(): Promise<void> {
    for (let attempt = 0; attempt < this.options.readinessAttempts; attempt++) {
      await delay(this.options.readinessIntervalMs);

      if (this.spawnError) {
        const reason = this.spawnError.message;
        this.forget();
        throw new GatewayUnavailableError(
          `Could not start '${this.options.command}': ${reason}. Install it first.`,
          { cause: reason }
        );
      }

      if (await this.isReachable()) {
        this.options.onStatus?.('Model backend is ready.');
        return;
      }

      const child = this.child;
      if (child && (child.exitCode !== null || child.signalCode !== null)) {
        this.forget();
        throw new GatewayUnavailableError(`'${this.options.command} serve' exited before becoming ready`);
      }
    }

    await this.stop();
    throw new GatewayUnavailableError(
      `Model backend failed to start within ${this.options.readinessAttempts} readiness checks`
    );
  }

  private forget(): void {
    this.child = undefined;
    process.removeListener('exit', this.exitHook);
  }
}
