import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { NodeRuntime } from '../../src/runtimes/index.js';
import { ProcessSandbox } from '../../src/services/ExecutionSandbox.js';
import { UNKNOWN_ERROR_DIAGNOSTIC } from '../../src/types/index.js';

describe('ProcessSandbox', () => {
  const runtime = new NodeRuntime(process.execPath);
  let tempDir: string;

  const writeScript = async (name: string, body: string): Promise<string> => {
    const scriptPath = path.join(tempDir, name);
    await fs.writeFile(scriptPath, body, 'utf8');
    return scriptPath;
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scriptmender-sandbox-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const quietSandbox = (timeoutMs?: number) =>
    new ProcessSandbox(runtime, { verbose: false, stdin: 'ignore', timeoutMs });

  it('should capture stdout of a successful run', async () => {
    const scriptPath = await writeScript('ok.mjs', "console.log('hello from script');\n");

    const result = await quietSandbox().execute(scriptPath);

    expect(result.success).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('hello from script\n');
    expect(result.diagnostic).toBe('');
  });

  it('should run the script from its own directory', async () => {
    const scriptPath = await writeScript('cwd.mjs', 'console.log(process.cwd());\n');

    const result = await quietSandbox().execute(scriptPath);

    expect(await fs.realpath(result.stdout.trim())).toBe(await fs.realpath(tempDir));
  });

  it('should use stderr as the diagnostic of a failed run', async () => {
    const scriptPath = await writeScript('fail.mjs', "console.log('partial');\nconsole.error('boom');\nprocess.exit(3);\n");

    const result = await quietSandbox().execute(scriptPath);

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(3);
    expect(result.diagnostic).toBe('boom\n');
  });

  it('should fall back to stdout when stderr is empty', async () => {
    const scriptPath = await writeScript('stdout-only.mjs', "console.log('only stdout');\nprocess.exit(1);\n");

    const result = await quietSandbox().execute(scriptPath);

    expect(result.diagnostic).toBe('only stdout\n');
  });

  it('should report an unknown error when the script prints nothing', async () => {
    const scriptPath = await writeScript('silent.mjs', 'process.exit(2);\n');

    const result = await quietSandbox().execute(scriptPath);

    expect(result.diagnostic).toBe(UNKNOWN_ERROR_DIAGNOSTIC);
  });

  it('should surface a missing package in the diagnostic', async () => {
    const scriptPath = await writeScript('missing.mjs', "import 'scriptmender-package-that-does-not-exist';\n");

    const result = await quietSandbox().execute(scriptPath);

    expect(result.success).toBe(false);
    expect(result.diagnostic).toContain("Cannot find package 'scriptmender-package-that-does-not-exist'");
  });

  it('should kill a script that runs past the timeout', async () => {
    const scriptPath = await writeScript('hang.mjs', 'setInterval(() => {}, 1000);\n');

    const result = await quietSandbox(200).execute(scriptPath);

    expect(result.success).toBe(false);
    expect(result.timedOut).toBe(true);
    expect(result.signal).toBe('SIGKILL');
    expect(result.diagnostic).toBe('Execution timed out after 200 ms');
  });

  it('should report an interpreter that cannot be started', async () => {
    const sandbox = new ProcessSandbox(new NodeRuntime(path.join(tempDir, 'no-such-node')), {
      verbose: false,
      stdin: 'ignore',
    });
    const scriptPath = await writeScript('any.mjs', '');

    const result = await sandbox.execute(scriptPath);

    expect(result.success).toBe(false);
    expect(result.exitCode).toBeNull();
    expect(result.diagnostic.startsWith(`Failed to start ${path.join(tempDir, 'no-such-node')}:`)).toBe(true);
  });

  it('should keep multibyte characters intact across output chunks', async () => {
    const scriptPath = await writeScript(
      'accents.mjs',
      "process.stderr.write('x' + 'é'.repeat(200000));\nprocess.exitCode = 1;\n"
    );

    const result = await quietSandbox().execute(scriptPath);

    expect(result.success).toBe(false);
    expect(result.diagnostic).toBe('x' + 'é'.repeat(200000));
  });
});
