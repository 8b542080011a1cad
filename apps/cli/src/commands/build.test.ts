import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert';
import { ConfigurationError } from '@ghidra-dmg/core';
import { buildCommand } from './build.js';

describe('buildCommand', () => {
  const previous = process.env['LOG_LEVEL'];

  afterEach(() => {
    if (previous === undefined) {
      delete process.env['LOG_LEVEL'];
    } else {
      process.env['LOG_LEVEL'] = previous;
    }
  });

  it('should report an invalid LOG_LEVEL as an environment error', async () => {
    process.env['LOG_LEVEL'] = 'verbose';

    await assert.rejects(
      buildCommand({ out: '/tmp', path: '/nonexistent', json: true }, new AbortController().signal),
      (error: unknown) => {
        assert.ok(error instanceof ConfigurationError);
        assert.match(error.message, /^Invalid environment: LOG_LEVEL: /);
        return true;
      }
    );
  });
});
