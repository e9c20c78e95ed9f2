import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import stripAnsi from 'strip-ansi';
import { loadConfig } from '../../src/config/index.js';
import {
  classifyFailure,
  COMMAND_DEFINITIONS,
  createServiceContext,
  generateCliCommand,
  generateCliHandler,
  healthCheck,
  normalizeResponse,
  runTask,
  ServiceContext,
} from '../../src/commands/index.js';
import { FailureClassifier } from '../../src/services/FailureClassifier.js';
import { RepairLoopService } from '../../src/services/RepairLoopService.js';
import { ScriptAuthorService } from '../../src/services/ScriptAuthorService.js';
import { GatewayUnavailableError, ExecutionResult } from '../../src/types/index.js';
import { Logger } from '../../src/utils/logger.js';
import {
  FakeGateway,
  MemoryArtifactStore,
  RecordingInstaller,
  ScriptedSandbox,
  createFailureResult,
  createHttpResponse,
  createSuccessResult,
} from '../fixtures/index.js';

const silentLogger = new Logger('scriptmender-test', 'error', 'test', {}, () => {});

describe('Commands', () => {
  let tempDir: string;
  let context: ServiceContext;

  const unreachable = async () => {
    throw new Error('connect ECONNREFUSED');
  };

  const withLoop = (gateway: FakeGateway, results: ExecutionResult[], maxAttempts = 1): ServiceContext => {
    const store = new MemoryArtifactStore();
    return {
      ...context,
      repairLoop: new RepairLoopService(
        {
          author: new ScriptAuthorService(gateway, context.runtime, silentLogger),
          sandbox: new ScriptedSandbox(store, results),
          classifier: FailureClassifier.forRuntime(context.runtime),
          installer: new RecordingInstaller(),
          artifacts: store,
          logger: silentLogger,
        },
        { maxAttempts }
      ),
    };
  };

  const capture = () => {
    const out: string[] = [];
    const err: string[] = [];
    return { out, err, output: { out: (t: string) => out.push(t), err: (t: string) => err.push(t) } };
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scriptmender-commands-'));
    context = createServiceContext(loadConfig({ loop: { outputDir: tempDir } }, {}), { fetch: unreachable });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('definitions', () => {
    it('should register run as the default command', () => {
      expect(COMMAND_DEFINITIONS.map(def => def.cliName)).toEqual(['run', 'classify', 'normalize', 'health-check']);
      expect(COMMAND_DEFINITIONS.filter(def => def.isDefault)).toEqual([runTask]);
    });

    it('should classify a diagnostic', async () => {
      const { result } = await classifyFailure.execute(context, {
        diagnostic: "ModuleNotFoundError: No module named 'sklearn'",
        _: [],
        $0: 'scriptmender',
      });

      expect(result).toEqual({
        success: true,
        data: {
          kind: 'missing-dependency',
          moduleName: 'sklearn',
          packageName: 'scikit-learn',
          diagnostic: "ModuleNotFoundError: No module named 'sklearn'",
        },
      });
    });

    it('should normalize a raw response', async () => {
      const execution = await normalizeResponse.execute(context, { text: 'Sure, here:\n```python\nreturn 42\n```' });

      expect(execution.result.data).toEqual({ runtime: 'python', body: 'print(42)' });
      expect(execution.formatHuman()).toBe('print(42)');
    });

    it('should report an unreachable backend as unhealthy', async () => {
      const { result } = await healthCheck.execute(context, {});

      expect(result.success).toBe(false);
      expect(result.error).toBe('Model backend not reachable at http://localhost:11434');
      expect(result.data).toMatchObject({ status: 'unhealthy', model: 'qwen2.5-coder:7b', runtime: 'python' });
    });

    it('should report a reachable backend as healthy', async () => {
      const healthy = createServiceContext(loadConfig({}, {}), {
        fetch: async () => createHttpResponse('Ollama is running'),
      });

      const { result } = await healthCheck.execute(healthy, {});

      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({ status: 'healthy', backend: { reachable: true, managed: false } });
    });

    it('should join the task words and run the loop', async () => {
      const gateway = new FakeGateway(['```python\nprint("hi")\n```']);
      const { result } = await runTask.execute(withLoop(gateway, [createSuccessResult()]), {
        task: ['say', 'hi'],
      });

      expect(result.success).toBe(true);
      expect(result.message).toBe('Success on attempt 1');
      expect(gateway.prompts[0]).toContain('script to say hi.');
    });

    it('should fail the run command when attempts are exhausted', async () => {
      const gateway = new FakeGateway(['```python\nprint(1 / 0)\n```']);
      const { result } = await runTask.execute(withLoop(gateway, [createFailureResult('ZeroDivisionError\n')]), {
        task: ['divide'],
      });

      expect(result.success).toBe(false);
      expect(result.error).toBe('Failed after 1 attempts');
    });

    it('should reject a run without a task', async () => {
      await expect(runTask.execute(context, { task: [] })).rejects.toThrow('Validation failed');
    });
  });

  describe('generateCliCommand', () => {
    it('should build variadic positionals and the default alias', () => {
      expect(generateCliCommand(runTask)).toMatchObject({ command: 'run <task..>', aliases: ['$0'] });
      expect(generateCliCommand(classifyFailure)).toMatchObject({ command: 'classify <diagnostic>', aliases: [] });
      expect(generateCliCommand(healthCheck)).toMatchObject({ command: 'health-check', aliases: [] });
    });
  });

  describe('generateCliHandler', () => {
    it('should read @file arguments and print JSON', async () => {
      const diagnosticFile = path.join(tempDir, 'traceback.txt');
      await fs.writeFile(diagnosticFile, "ModuleNotFoundError: No module named 'yaml'\n", 'utf8');
      const { out, err, output } = capture();

      const exitCode = await generateCliHandler(classifyFailure, () => context, output)({
        diagnostic: `@${diagnosticFile}`,
        format: 'json',
      });

      expect(exitCode).toBe(0);
      expect(err).toEqual([]);
      expect(JSON.parse(out[0] ?? '{}')).toMatchObject({
        success: true,
        data: { kind: 'missing-dependency', packageName: 'PyYAML' },
      });
    });

    it('should report a gateway failure and exit 1', async () => {
      const gateway = new FakeGateway().failWith(new GatewayUnavailableError('Model backend unreachable'));
      const { out, err, output } = capture();

      const exitCode = await generateCliHandler(runTask, () => withLoop(gateway, []), output)({ task: ['say', 'hi'] });

      expect(exitCode).toBe(1);
      expect(out).toEqual([]);
      expect(err.map(line => stripAnsi(line))).toEqual(['❌ Error: Model backend unreachable']);
    });

    it('should print the human result of an exhausted run to stderr', async () => {
      const gateway = new FakeGateway(['```python\nprint(1 / 0)\n```']);
      const { err, output } = capture();

      const exitCode = await generateCliHandler(
        runTask,
        () => withLoop(gateway, [createFailureResult('ZeroDivisionError: division by zero\n')]),
        output
      )({ task: ['divide'] });

      expect(exitCode).toBe(1);
      expect(stripAnsi(err[0] ?? '')).toBe(
        'Script: /scripts/generated_divide.py\nAttempts: 1\n\nLast error:\nZeroDivisionError: division by zero'
      );
    });

    it('should report a missing @file', async () => {
      const { err, output } = capture();

      const exitCode = await generateCliHandler(normalizeResponse, () => context, output)({
        text: `@${path.join(tempDir, 'absent.md')}`,
      });

      expect(exitCode).toBe(1);
      expect(stripAnsi(err[0] ?? '')).toMatch(/^❌ Error: Failed to read file '.*absent\.md': ENOENT/);
    });
  });
});
