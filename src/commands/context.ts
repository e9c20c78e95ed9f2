/**
 * Service context creation for command handlers
 */

import { ScriptMenderConfig } from '../config/index.js';
import { createScriptRuntime, ScriptRuntime } from '../runtimes/index.js';
import { BackendSpawner, OllamaSupervisor } from '../services/BackendSupervisor.js';
import {
  DependencyInstaller,
  DisabledInstaller,
  NpmInstaller,
  PipInstaller,
} from '../services/DependencyInstaller.js';
import { ProcessSandbox } from '../services/ExecutionSandbox.js';
import { FailureClassifier } from '../services/FailureClassifier.js';
import { FetchLike } from '../services/ModelGateway.js';
import { OllamaGateway } from '../services/OllamaGateway.js';
import { RepairLoopObserver, RepairLoopService } from '../services/RepairLoopService.js';
import { ScriptAuthorService } from '../services/ScriptAuthorService.js';
import { createArtifactStore } from '../storage/index.js';
import { logger } from '../utils/logger.js';
import { ServiceContext } from './types.js';

export interface ServiceContextOptions {
  observer?: RepairLoopObserver;
  /** Receives backend start and stop messages */
  onStatus?: (message: string) => void;
  fetch?: FetchLike;
  spawnBackend?: BackendSpawner;
  /** stdin of executed scripts; defaults to the terminal */
  scriptStdin?: 'inherit' | 'ignore';
}

export function createInstaller(config: ScriptMenderConfig, runtime: ScriptRuntime): DependencyInstaller {
  if (!config.installer.enabled) {
    return new DisabledInstaller();
  }

  switch (runtime.name) {
    case 'python':
      return new PipInstaller(config.runtime.interpreter ?? 'python3');
    case 'node':
      return new NpmInstaller(config.loop.outputDir);
  }
}

/**
 * Wire every service from configuration
 */
export function createServiceContext(
  config: ScriptMenderConfig,
  options: ServiceContextOptions = {}
): ServiceContext {
  logger.setLogLevel(config.logging.level);

  const runtime = createScriptRuntime(config);
  const supervisor = new OllamaSupervisor(
    {
      baseUrl: config.gateway.baseUrl,
      command: config.gateway.command,
      autoStart: config.gateway.autoStart,
      readinessAttempts: config.gateway.readinessAttempts,
      readinessIntervalMs: config.gateway.readinessIntervalMs,
      onStatus: options.onStatus,
    },
    options.fetch,
    options.spawnBackend
  );
  const gateway = new OllamaGateway(
    {
      baseUrl: config.gateway.baseUrl,
      model: config.gateway.model,
      requestTimeoutMs: config.gateway.requestTimeoutMs,
    },
    supervisor,
    options.fetch
  );
  const author = new ScriptAuthorService(gateway, runtime);
  const sandbox = new ProcessSandbox(runtime, {
    verbose: config.loop.verbose,
    timeoutMs: config.loop.executionTimeoutMs,
    stdin: options.scriptStdin,
  });
  const classifier = FailureClassifier.forRuntime(runtime);
  const installer = createInstaller(config, runtime);
  const artifacts = createArtifactStore(config, runtime);
  const repairLoop = new RepairLoopService(
    { author, sandbox, classifier, installer, artifacts, observer: options.observer },
    { maxAttempts: config.loop.maxAttempts }
  );

  return {
    config,
    runtime,
    supervisor,
    gateway,
    author,
    sandbox,
    classifier,
    installer,
    artifacts,
    repairLoop,
  };
}
