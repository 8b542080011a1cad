import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MockAgent } from 'undici';
import { silentLogger } from '@ghidra-dmg/utils';
import { Downloader } from './downloader.js';
import { ReleaseFetcher } from './releaseFetcher.js';
import { GitHubReleaseClient } from './releases.js';

describe('ReleaseFetcher', () => {
  let agent: MockAgent;
  let cacheDir: string;

  beforeEach(async () => {
    agent = new MockAgent();
    agent.disableNetConnect();
    cacheDir = await mkdtemp(join(tmpdir(), 'ghidra-dmg-cache-'));
  });

  afterEach(async () => {
    await agent.close();
    await rm(cacheDir, { recursive: true, force: true });
  });

  it('should download the latest asset into the cache once', async () => {
    agent
      .get('https://api.github.com')
      .intercept({ path: '/repos/acme/ghidra/releases/latest', method: 'GET' })
      .reply(200, {
        assets: [
          {
            name: 'ghidra_11.0_PUBLIC_20240101.zip',
            browser_download_url: 'https://downloads.example.com/ghidra_11.0_PUBLIC_20240101.zip',
          },
        ],
      })
      .times(2);
    agent
      .get('https://downloads.example.com')
      .intercept({ path: '/ghidra_11.0_PUBLIC_20240101.zip', method: 'GET' })
      .reply(200, 'release');

    const fetcher = new ReleaseFetcher(
      new GitHubReleaseClient({ dispatcher: agent, logger: silentLogger() }),
      new Downloader({ dispatcher: agent, logger: silentLogger() }),
      cacheDir
    );

    const first = await fetcher.fetchLatest('https://api.github.com/repos/acme/ghidra/releases/latest');
    const second = await fetcher.fetchLatest('https://api.github.com/repos/acme/ghidra/releases/latest');

    const expectedPath = join(cacheDir, 'ghidra_11.0_PUBLIC_20240101.zip');
    assert.deepStrictEqual(first, { assetName: 'ghidra_11.0_PUBLIC_20240101.zip', path: expectedPath, cached: false });
    assert.deepStrictEqual(second, { assetName: 'ghidra_11.0_PUBLIC_20240101.zip', path: expectedPath, cached: true });
    assert.strictEqual(await readFile(expectedPath, 'utf8'), 'release');
  });
});
