import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MockAgent } from 'undici';
import { FetchError } from '@ghidra-dmg/core';
import { silentLogger } from '@ghidra-dmg/utils';
import { Downloader, type DownloadProgress } from './downloader.js';

const ORIGIN = 'https://downloads.example.com';
const DOWNLOAD_URL = `${ORIGIN}/ghidra.zip`;

describe('Downloader', () => {
  let agent: MockAgent;
  let dir: string;

  beforeEach(async () => {
    agent = new MockAgent();
    agent.disableNetConnect();
    dir = await mkdtemp(join(tmpdir(), 'ghidra-dmg-download-'));
  });

  afterEach(async () => {
    await agent.close();
    await rm(dir, { recursive: true, force: true });
  });

  function downloader(): Downloader {
    return new Downloader({ dispatcher: agent, logger: silentLogger(), retry: { initialDelay: 0 } });
  }

  it('should download to the destination and report progress', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/ghidra.zip', method: 'GET' })
      .reply(200, 'hello', { headers: { 'content-length': '5' } });

    const progress: DownloadProgress[] = [];
    const client = downloader();
    client.on('progress', (event: DownloadProgress) => progress.push(event));

    const destination = join(dir, 'ghidra.zip');
    const result = await client.download(DOWNLOAD_URL, destination);

    assert.deepStrictEqual(result, { path: destination, cached: false, bytes: 5 });
    assert.strictEqual(await readFile(destination, 'utf8'), 'hello');
    assert.deepStrictEqual(await readdir(dir), ['ghidra.zip']);
    assert.deepStrictEqual(progress.at(-1), { url: DOWNLOAD_URL, bytesDownloaded: 5, totalBytes: 5, percentage: 100 });
  });

  it('should reuse a cached file without a request', async () => {
    const destination = join(dir, 'ghidra.zip');
    await writeFile(destination, 'cached');

    const result = await downloader().download(DOWNLOAD_URL, destination);

    assert.deepStrictEqual(result, { path: destination, cached: true, bytes: 0 });
    assert.strictEqual(await readFile(destination, 'utf8'), 'cached');
  });

  it('should retry server errors', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: '/ghidra.zip', method: 'GET' }).reply(503, 'busy');
    pool.intercept({ path: '/ghidra.zip', method: 'GET' }).reply(200, 'hello');

    const result = await downloader().download(DOWNLOAD_URL, join(dir, 'ghidra.zip'));

    assert.strictEqual(result.bytes, 5);
  });

  it('should not retry client errors and leave nothing behind', async () => {
    let requests = 0;
    agent
      .get(ORIGIN)
      .intercept({ path: '/ghidra.zip', method: 'GET' })
      .reply(() => {
        requests++;
        return { statusCode: 404, data: 'missing' };
      })
      .persist();

    await assert.rejects(downloader().download(DOWNLOAD_URL, join(dir, 'ghidra.zip')), (error: unknown) => {
      assert.ok(error instanceof FetchError);
      assert.strictEqual(error.message, `Failed to fetch ${DOWNLOAD_URL}: server responded with status code 404`);
      return true;
    });

    assert.strictEqual(requests, 1);
    assert.deepStrictEqual(await readdir(dir), []);
  });
});
