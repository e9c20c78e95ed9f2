import { performance } from 'perf_hooks';
import { v4 as uuidv4 } from 'uuid';
import {
  AttemptAction,
  AttemptMode,
  AttemptRecord,
  ExhaustedOutcome,
  FailureClassification,
  MissingDependencyFailure,
  RepairOutcome,
  attemptModeFor,
  isMissingDependency,
} from '../types/index.js';
import { ArtifactStore } from '../storage/index.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';
import { maxAttemptsSchema, taskSchema, validate } from '../utils/validation.js';
import { DependencyInstaller } from './DependencyInstaller.js';
import { ExecutionSandbox } from './ExecutionSandbox.js';
import { FailureClassifier } from './FailureClassifier.js';
import { ScriptAuthor } from './ScriptAuthorService.js';

/**
 * Progress hooks for a repair run. Attempts are 0-based indexes.
 * Hooks are synchronous and never change what the loop does.
 */
export interface RepairLoopObserver {
  onGenerating?(task: string, kind: 'initial' | 'repair'): void;
  onAttemptStart?(attempt: number, mode: AttemptMode, scriptPath: string): void;
  onMissingDependency?(classification: MissingDependencyFailure, attempt: number): void;
  onInstallResult?(packageName: string, installed: boolean): void;
  onFailure?(classification: FailureClassification, attempt: number, isFinal: boolean): void;
  onRepairRequested?(attempt: number): void;
  onSucceeded?(attempt: number, scriptPath: string): void;
  onExhausted?(attemptsUsed: number, diagnostic: string): void;
}

export interface RepairLoopDependencies {
  author: ScriptAuthor;
  sandbox: ExecutionSandbox;
  classifier: FailureClassifier;
  installer: DependencyInstaller;
  artifacts: ArtifactStore;
  logger?: Logger;
  observer?: RepairLoopObserver;
}

export interface RepairLoopOptions {
  maxAttempts: number;
}

/**
 * Drives generate, execute, classify and repair until the script runs
 * or the attempt budget is spent. Errors from the model gateway are not
 * caught here and abort the run.
 */
export class RepairLoopService {
  private maxAttempts: number;
  private logger: Logger;
  private observer: RepairLoopObserver;

  constructor(
    private deps: RepairLoopDependencies,
    options: RepairLoopOptions
  ) {
    this.maxAttempts = validate(maxAttemptsSchema, options.maxAttempts);
    this.logger = deps.logger ?? defaultLogger;
    this.observer = deps.observer ?? {};
  }

  async run(rawTask: string, observer: RepairLoopObserver = this.observer): Promise<RepairOutcome> {
    const task = validate(taskSchema, rawTask);
    const log = this.logger.child({ runId: uuidv4(), task });
    const { author, sandbox, classifier, installer, artifacts } = this.deps;
    const attempts: AttemptRecord[] = [];
    const scriptPath = artifacts.pathFor(task);

    log.info('Repair run started', { maxAttempts: this.maxAttempts });

    observer.onGenerating?.(task, 'initial');
    let body = await author.writeInitial(task);
    let lastDiagnostic = '';

    for (let index = 0; index < this.maxAttempts; index++) {
      const isFinal = index === this.maxAttempts - 1;
      const mode = attemptModeFor(index);
      const startTime = performance.now();
      const record = (action: AttemptAction, classification?: FailureClassification) => {
        attempts.push({
          index,
          mode,
          action,
          classification,
          durationMs: performance.now() - startTime,
        });
      };

      const artifact = await artifacts.write(task, mode, body);
      observer.onAttemptStart?.(index, mode, artifact.path);

      const result = await sandbox.execute(artifact.path);
      if (result.success) {
        record('succeeded');
        log.info('Script succeeded', { attempt: index });
        observer.onSucceeded?.(index, artifact.path);
        return {
          status: 'succeeded',
          task,
          attempt: index,
          scriptPath: artifact.path,
          stdout: result.stdout,
          attempts,
        };
      }

      lastDiagnostic = result.diagnostic;
      const classification = classifier.classify(result.diagnostic);
      log.info('Attempt failed', { attempt: index, kind: classification.kind });

      let installFailed = false;
      if (isMissingDependency(classification)) {
        observer.onMissingDependency?.(classification, index);
        const installed = await installer.install(classification.packageName);
        observer.onInstallResult?.(classification.packageName, installed);

        if (installed) {
          // Same body again: the script itself may be fine
          record('installed', classification);
          continue;
        }
        installFailed = true;
      }
      observer.onFailure?.(classification, index, isFinal);

      if (isFinal) {
        record('exhausted', classification);
        break;
      }

      observer.onRepairRequested?.(index);
      observer.onGenerating?.(task, 'repair');
      body = await author.repair(task, body, result.diagnostic);
      record(installFailed ? 'install-failed-repaired' : 'repaired', classification);
    }

    return this.exhausted(task, scriptPath, lastDiagnostic, attempts, observer, log);
  }

  private exhausted(
    task: string,
    scriptPath: string,
    diagnostic: string,
    attempts: AttemptRecord[],
    observer: RepairLoopObserver,
    log: Logger
  ): ExhaustedOutcome {
    log.warn('Repair run exhausted', { attemptsUsed: attempts.length });
    observer.onExhausted?.(attempts.length, diagnostic);
    return {
      status: 'exhausted',
      task,
      attemptsUsed: attempts.length,
      scriptPath,
      diagnostic,
      attempts,
    };
  }
}
