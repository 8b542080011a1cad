import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert';
import { configureLogger, createLogger, resolveLogLevel, silentLogger } from './logger.js';

describe('resolveLogLevel', () => {
  it('should accept pino levels', () => {
    assert.strictEqual(resolveLogLevel('debug'), 'debug');
    assert.strictEqual(resolveLogLevel('silent'), 'silent');
  });

  it('should fall back to info for unset or unknown levels', () => {
    assert.strictEqual(resolveLogLevel(undefined), 'info');
    assert.strictEqual(resolveLogLevel('verbose'), 'info');
    assert.strictEqual(resolveLogLevel('DEBUG'), 'info');
  });
});

describe('configureLogger', () => {
  afterEach(() => {
    configureLogger({ level: 'silent', nodeEnv: 'test' });
  });

  it('should apply the configured level to loggers created afterwards', () => {
    configureLogger({ level: 'debug', nodeEnv: 'test' });
    assert.strictEqual(createLogger({ component: 'test' }).level, 'debug');

    configureLogger({ level: 'error', nodeEnv: 'test' });
    assert.strictEqual(createLogger({ component: 'test' }).level, 'error');
  });

  it('should leave silent loggers silent', () => {
    configureLogger({ level: 'trace', nodeEnv: 'test' });
    assert.strictEqual(silentLogger().level, 'silent');
  });
});
