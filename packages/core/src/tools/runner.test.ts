import { describe, it } from 'node:test';
import assert from 'node:assert';
import { silentLogger } from '@ghidra-dmg/utils';
import { getBinariesConfig } from '../config/binaries.js';
import { CommandExecutionError } from '../errors/index.js';
import { SystemToolRunner } from './runner.js';

describe('SystemToolRunner', () => {
  it('should run an executable and return its output', async () => {
    const runner = new SystemToolRunner({ logger: silentLogger() });
    const result = await runner.runExecutable(process.execPath, ['-e', 'process.stdout.write("ok")']);

    assert.strictEqual(result.stdout, 'ok');
  });

  it('should turn a non-zero exit into CommandExecutionError', async () => {
    const runner = new SystemToolRunner({ logger: silentLogger() });

    await assert.rejects(
      runner.runExecutable(process.execPath, ['-e', 'console.error("boom"); process.exit(2)']),
      (error: unknown) => {
        assert.ok(error instanceof CommandExecutionError);
        assert.strictEqual(error.exitCode, 2);
        assert.strictEqual(error.message, `${process.execPath} exited with code 2: boom`);
        return true;
      }
    );
  });

  it('should name the override variable when a tool is missing', async () => {
    const binaries = getBinariesConfig({});
    const runner = new SystemToolRunner({
      logger: silentLogger(),
      binaries: { ...binaries, hdiutil: { ...binaries.hdiutil, resolvedPath: '/nonexistent/hdiutil' } },
    });

    await assert.rejects(
      runner.run('hdiutil', ['info']),
      /hdiutil exited with code 127: \/nonexistent\/hdiutil not found \(install it or set HDIUTIL_PATH\)/
    );
  });
});
