import { describe, it } from 'node:test';
import assert from 'node:assert';
import { executeCommand } from './command.js';

describe('executeCommand', () => {
  it('should capture output and the exit code', async () => {
    const result = await executeCommand(process.execPath, [
      '-e',
      'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)',
    ]);

    assert.strictEqual(result.exitCode, 3);
    assert.strictEqual(result.stdout, 'out');
    assert.strictEqual(result.stderr, 'err');
    assert.strictEqual(result.timedOut, false);
  });

  it('should merge extra variables over the environment', async () => {
    const result = await executeCommand(
      process.execPath,
      ['-e', 'process.stdout.write(process.env.GHIDRA_INSTALL_DIR ?? "")'],
      { env: { GHIDRA_INSTALL_DIR: '/opt/ghidra' } }
    );

    assert.strictEqual(result.stdout, '/opt/ghidra');
  });

  it('should flag commands that run past the timeout', async () => {
    const result = await executeCommand(process.execPath, ['-e', 'setTimeout(() => {}, 10000)'], {
      timeout: 100,
    });

    assert.strictEqual(result.timedOut, true);
  });

  it('should reject when the executable does not exist', async () => {
    await assert.rejects(executeCommand('/nonexistent/tool', []), /ENOENT/);
  });

  it('should refuse to start once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await assert.rejects(
      executeCommand(process.execPath, ['-v'], { signal: controller.signal }),
      /aborted before start/
    );
  });
});
