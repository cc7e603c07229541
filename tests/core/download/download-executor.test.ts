import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { setTimeout as delay } from 'timers/promises';
import { Response } from 'node-fetch';

import { DownloadExecutor } from '../../../src/core/download/download-executor.js';
import type { FetchLike } from '../../../src/core/registry/modrinth-client.js';
import { sha1 } from '../../../src/utils/hash.js';
import { DownloadError, IntegrityError, ValidationError } from '../../../src/utils/errors.js';
import { listDir, makeTempDir, removeTempDir } from '../../helpers/fakes.js';

const BODY = 'jar-bytes-for-testing';
const URL = 'https://cdn.example.test/lib/1.0.0/lib-1.0.0.jar';

/** Fetch stand-in answering with the queued statuses, then 200 */
function scriptedFetch(statuses: number[], body = BODY): { fetchImpl: FetchLike; calls: string[] } {
  const calls: string[] = [];
  const queue = [...statuses];
  const fetchImpl: FetchLike = async url => {
    calls.push(url);
    const status = queue.shift() ?? 200;
    return status === 200
      ? new Response(Buffer.from(body), { status, headers: { 'content-length': String(Buffer.byteLength(body)) } })
      : new Response('unavailable', { status });
  };
  return { fetchImpl, calls };
}

describe('DownloadExecutor', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('download');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('streams the file into place after checking its hash', async () => {
    const { fetchImpl } = scriptedFetch([]);
    const progress: number[] = [];
    const executor = new DownloadExecutor({ fetchImpl, retryDelayMs: 0 });

    const handle = await executor.downloadFile({
      url: URL,
      expectedHash: sha1(BODY).toUpperCase(),
      fileName: 'lib-1.0.0.jar',
      destinationDir: join(dir, 'mods'),
      onProgress: received => progress.push(received)
    });

    assert.equal(handle.hash, sha1(BODY));
    assert.equal(handle.size, BODY.length);
    assert.equal(handle.reused, false);
    assert.equal(await fs.readFile(join(dir, 'mods', 'lib-1.0.0.jar'), 'utf8'), BODY);
    assert.deepEqual(await listDir(join(dir, 'mods')), ['lib-1.0.0.jar']);
    assert.equal(progress.at(-1), BODY.length);
  });

  it('reuses a file that is already in place', async () => {
    const { fetchImpl, calls } = scriptedFetch([]);
    const executor = new DownloadExecutor({ fetchImpl, retryDelayMs: 0 });
    await fs.writeFile(join(dir, 'lib.jar'), BODY);

    const handle = await executor.downloadFile({
      url: URL,
      expectedHash: sha1(BODY),
      fileName: 'lib.jar',
      destinationDir: dir
    });

    assert.equal(handle.reused, true);
    assert.equal(calls.length, 0);
  });

  it('rejects a body whose hash does not match and leaves nothing behind', async () => {
    const { fetchImpl, calls } = scriptedFetch([], 'tampered-bytes');
    const executor = new DownloadExecutor({ fetchImpl, retries: 2, retryDelayMs: 0 });

    await assert.rejects(
      executor.downloadFile({ url: URL, expectedHash: sha1(BODY), fileName: 'lib.jar', destinationDir: dir }),
      IntegrityError
    );
    assert.equal(calls.length, 1);
    assert.deepEqual(await listDir(dir), []);
  });

  it('retries server errors', async () => {
    const { fetchImpl, calls } = scriptedFetch([503, 502]);
    const executor = new DownloadExecutor({ fetchImpl, retries: 2, retryDelayMs: 0 });

    const handle = await executor.downloadFile({
      url: URL,
      expectedHash: sha1(BODY),
      fileName: 'lib.jar',
      destinationDir: dir
    });

    assert.equal(calls.length, 3);
    assert.equal(handle.hash, sha1(BODY));
  });

  it('gives up after the configured retries', async () => {
    const { fetchImpl, calls } = scriptedFetch([503, 503, 503]);
    const executor = new DownloadExecutor({ fetchImpl, retries: 1, retryDelayMs: 0 });

    await assert.rejects(
      executor.downloadFile({ url: URL, expectedHash: sha1(BODY), fileName: 'lib.jar', destinationDir: dir }),
      DownloadError
    );
    assert.equal(calls.length, 2);
  });

  it('does not retry a missing file', async () => {
    const { fetchImpl, calls } = scriptedFetch([404]);
    const executor = new DownloadExecutor({ fetchImpl, retries: 3, retryDelayMs: 0 });

    await assert.rejects(
      executor.downloadFile({ url: URL, expectedHash: sha1(BODY), fileName: 'lib.jar', destinationDir: dir }),
      (error: unknown) => error instanceof DownloadError && !error.retryable
    );
    assert.equal(calls.length, 1);
  });

  it('transfers different files into one directory at the same time', async () => {
    let inFlight = 0;
    let peak = 0;
    const requested: string[] = [];
    const fetchImpl: FetchLike = async url => {
      requested.push(url);
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(50);
      inFlight--;
      return new Response(Buffer.from(BODY), { status: 200 });
    };
    const executor = new DownloadExecutor({ fetchImpl, retryDelayMs: 0 });
    const names = ['a.jar', 'b.jar', 'c.jar', 'd.jar'];

    const handles = await Promise.all(
      names.map(fileName =>
        executor.downloadFile({
          url: `${URL}?${fileName}`,
          expectedHash: sha1(BODY),
          fileName,
          destinationDir: join(dir, 'mods')
        })
      )
    );

    assert.equal(peak, 4);
    assert.equal(requested.length, 4);
    assert.deepEqual(handles.map(handle => handle.reused), [false, false, false, false]);
    assert.deepEqual(await listDir(join(dir, 'mods')), names);
  });

  it('places the same file once when asked twice at the same time', async () => {
    const { fetchImpl, calls } = scriptedFetch([]);
    const executor = new DownloadExecutor({ fetchImpl, retryDelayMs: 0 });
    const request = { url: URL, expectedHash: sha1(BODY), fileName: 'lib.jar', destinationDir: dir };

    const [first, second] = await Promise.all([executor.downloadFile(request), executor.downloadFile(request)]);

    assert.equal(calls.length, 1);
    assert.equal(first.reused, false);
    assert.equal(second.reused, true);
    assert.deepEqual(await listDir(dir), ['lib.jar']);
  });

  it('refuses file names that leave the destination directory', async () => {
    const { fetchImpl } = scriptedFetch([]);
    const executor = new DownloadExecutor({ fetchImpl });

    await assert.rejects(
      executor.downloadFile({ url: URL, expectedHash: sha1(BODY), fileName: '../escape.jar', destinationDir: dir }),
      ValidationError
    );
  });
});
