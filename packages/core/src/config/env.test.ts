import { describe, it } from 'node:test';
import assert from 'node:assert';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from '../errors/index.js';
import { loadConfig } from './env.js';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    const config = loadConfig({});

    assert.strictEqual(config.nodeEnv, 'development');
    assert.strictEqual(config.logLevel, 'info');
    assert.strictEqual(config.cacheDir, join(tmpdir(), 'ghidra_dmg_builder_downloads'));
    assert.deepStrictEqual(config.releases.graalAssetFilters, ['tar.gz', 'graalvm-ce-java11', 'darwin']);
    assert.deepStrictEqual(config.graal.components, [
      'llvm-toolchain',
      'native-image',
      'nodejs',
      'python',
      'ruby',
      'R',
      'wasm',
    ]);
    assert.strictEqual(config.repositories.darkMode, 'https://github.com/zackelia/ghidra-dark.git');
    assert.strictEqual(config.iconPath, undefined);
    assert.strictEqual(config.releases.githubToken, undefined);
  });

  it('should split comma-separated lists', () => {
    const config = loadConfig({ GRAALVM_COMPONENTS: ' python, ruby ,,', GRAALVM_ASSET_FILTERS: 'zip' });

    assert.deepStrictEqual(config.graal.components, ['python', 'ruby']);
    assert.deepStrictEqual(config.releases.graalAssetFilters, ['zip']);
  });

  it('should read overrides', () => {
    const config = loadConfig({
      GHIDRA_DMG_CACHE_DIR: '/var/cache/ghidra-dmg',
      GITHUB_TOKEN: 'test-token',
      GHIDRA_DMG_ICON: '/tmp/icon.png',
      LOG_LEVEL: 'debug',
      NODE_ENV: 'production',
    });

    assert.strictEqual(config.logLevel, 'debug');
    assert.strictEqual(config.nodeEnv, 'production');

    assert.strictEqual(config.cacheDir, '/var/cache/ghidra-dmg');
    assert.strictEqual(config.releases.githubToken, 'test-token');
    assert.strictEqual(config.iconPath, '/tmp/icon.png');
  });

  it('should reject invalid values', () => {
    assert.throws(
      () => loadConfig({ LOG_LEVEL: 'loud', GHIDRA_RELEASE_API_URL: 'not a url' }),
      (error: unknown) => {
        assert.ok(error instanceof ConfigurationError);
        assert.match(error.message, /^Invalid environment: /);
        assert.match(error.message, /LOG_LEVEL/);
        assert.match(error.message, /GHIDRA_RELEASE_API_URL/);
        return true;
      }
    );
  });
});
