import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CommanderError, type Command } from 'commander';
import type { BuildCommandOptions } from './commands/build.js';
import { createProgram } from './program.js';

async function parse(argv: string[]): Promise<BuildCommandOptions> {
  let received: BuildCommandOptions | undefined;
  const program: Command = createProgram(async (options) => {
    received = options;
  });
  program.exitOverride();
  program.configureOutput({ writeOut: () => {}, writeErr: () => {} });

  await program.parseAsync(argv, { from: 'user' });
  assert.ok(received);
  return received;
}

describe('ghidra-dmg program', () => {
  it('should map every flag onto build options', async () => {
    const options = await parse(['-o', 'out', '-d', '-p', 'ghidra.zip', '-j', '/opt/jdk', '-m', '--dock-icon', '--json']);

    assert.deepStrictEqual(options, {
      out: 'out',
      darkMode: true,
      path: 'ghidra.zip',
      jdk: '/opt/jdk',
      screenMenuBar: true,
      dockIcon: true,
      json: true,
    });
  });

  it('should collect extensions across repeated -e flags', async () => {
    const options = await parse(['-e', 'a.zip', 'b.git', '-o', 'out', '-e', 'c']);

    assert.deepStrictEqual(options.extension, ['a.zip', 'b.git', 'c']);
  });

  it('should accept a bare -e', async () => {
    const options = await parse(['--out', 'out', '-e']);

    assert.strictEqual(options.extension, true);
  });

  it('should accept the long output alias', async () => {
    const options = await parse(['--output-path', 'out.dmg']);

    assert.strictEqual(options.outputPath, 'out.dmg');
  });

  it('should reject --jdk together with --graal', async () => {
    await assert.rejects(parse(['-o', 'out', '-j', '/opt/jdk', '-g']), (error: unknown) => {
      assert.ok(error instanceof CommanderError);
      assert.strictEqual(error.code, 'commander.conflictingOption');
      return true;
    });
  });

  it('should exit cleanly for --help', async () => {
    await assert.rejects(parse(['--help']), (error: unknown) => {
      assert.ok(error instanceof CommanderError);
      assert.strictEqual(error.exitCode, 0);
      return true;
    });
  });

  it('should mark --out as required in the help text', () => {
    const help = createProgram(async () => {}).helpInformation();
    const outLine = help.split('\n').find((line) => line.includes('-o, --out <path>'));

    assert.ok(outLine);
    assert.match(outLine, /\(required\)$/);
  });
});
