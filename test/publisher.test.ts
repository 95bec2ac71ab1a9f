/**
 * Release publishing tests: publisher retries and release backends
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { asTagRef, type TagRef } from '../src/models/index.js';
import { DirectoryReleaseClient } from '../src/services/directory-releases.js';
import { GitHubReleaseClient } from '../src/services/github-releases.js';
import { ReleasePublisher, type PublisherOptions } from '../src/services/publisher.js';
import {
  ReleaseApiError,
  isTransientStatus,
  type ReleaseClient,
  type UploadRequest,
  type UploadedAsset,
} from '../src/services/release-client.js';
import { createSilentLogger } from '../src/utils/logger.js';
import { tempDir } from './helpers.js';

const TAG = asTagRef('refs/tags/v1.2.3');

const FAST_RETRY: PublisherOptions = {
  maxAttempts: 4,
  initialDelayMs: 1,
  backoffFactor: 1,
  maxDelayMs: 1,
  attemptTimeoutMs: 1000,
  token: 'test-secret',
};

/**
 * Client that fails with the queued errors before accepting uploads
 */
class ScriptedClient implements ReleaseClient {
  readonly name = 'scripted';
  readonly requests: UploadRequest[] = [];

  constructor(private readonly failures: Error[] = []) {}

  async uploadAsset(request: UploadRequest): Promise<UploadedAsset> {
    this.requests.push(request);
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    return { assetName: request.assetName, size: request.data.byteLength, replaced: false };
  }

  async listAssets(_tagRef: TagRef): Promise<string[]> {
    return this.requests.map((request) => request.assetName);
  }
}

describe('ReleasePublisher', () => {
  let work: { path: string; cleanup: () => Promise<void> };
  let artifact: string;

  beforeEach(async () => {
    work = await tempDir('release-matrix-publish');
    artifact = join(work.path, 'libisar_linux.so');
    await writeFile(artifact, 'ELF-bytes');
  });

  afterEach(async () => {
    await work.cleanup();
  });

  test('uploads the artifact bytes under the artifact name', async () => {
    const client = new ScriptedClient();
    const publisher = new ReleasePublisher(client, FAST_RETRY, createSilentLogger());

    const result = await publisher.publish(artifact, 'libisar_linux.so', { tagRef: TAG });
    expect(result).toEqual({
      ok: true,
      value: { assetName: 'libisar_linux.so', tagRef: 'refs/tags/v1.2.3', size: 9, attempts: 1 },
    });
    expect(client.requests[0]?.data.toString()).toBe('ELF-bytes');
    expect(client.requests[0]?.token).toBe('test-secret');
    expect(client.requests[0]?.signal).toBeInstanceOf(AbortSignal);
  });

  test('transient failures are retried', async () => {
    const client = new ScriptedClient([
      new ReleaseApiError('GitHub upload failed with HTTP 502', 502, true),
      new ReleaseApiError('Request to /upload failed: TypeError: fetch failed', undefined, true),
    ]);
    const publisher = new ReleasePublisher(client, FAST_RETRY, createSilentLogger());

    const result = await publisher.publish(artifact, 'libisar_linux.so', { tagRef: TAG });
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.attempts).toBe(3);
    expect(client.requests).toHaveLength(3);
  });

  test('permanent failures stop at the first attempt', async () => {
    const client = new ScriptedClient([new ReleaseApiError('GitHub upload failed with HTTP 401', 401, false)]);
    const publisher = new ReleasePublisher(client, FAST_RETRY, createSilentLogger());

    const result = await publisher.publish(artifact, 'libisar_linux.so', { tagRef: TAG });
    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'UPLOAD',
        message: 'Uploading libisar_linux.so to refs/tags/v1.2.3 failed: GitHub upload failed with HTTP 401',
        attempts: 1,
        status: 401,
      },
    });
    expect(client.requests).toHaveLength(1);
  });

  test('gives up after maxAttempts', async () => {
    const failures = Array.from({ length: 10 }, () => new ReleaseApiError('HTTP 503', 503, true));
    const client = new ScriptedClient(failures);
    const publisher = new ReleasePublisher(client, { ...FAST_RETRY, maxAttempts: 3 }, createSilentLogger());

    const result = await publisher.publish(artifact, 'libisar_linux.so', { tagRef: TAG });
    if (result.ok) throw new Error('expected failure');
    expect(result.error.attempts).toBe(3);
    expect(result.error.status).toBe(503);
    expect(client.requests).toHaveLength(3);
  });

  test('an unreadable artifact never reaches the client', async () => {
    const client = new ScriptedClient();
    const publisher = new ReleasePublisher(client, FAST_RETRY, createSilentLogger());

    const result = await publisher.publish(join(work.path, 'missing.so'), 'missing.so', { tagRef: TAG });
    if (result.ok) throw new Error('expected failure');
    expect(result.error.attempts).toBe(0);
    expect(result.error.message).toMatch(/^Cannot read artifact /);
    expect(client.requests).toHaveLength(0);
  });
});

describe('DirectoryReleaseClient', () => {
  let root: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    root = await tempDir('release-matrix-releases');
  });

  afterEach(async () => {
    await root.cleanup();
  });

  test('re-uploading an asset replaces it instead of duplicating it', async () => {
    const client = new DirectoryReleaseClient(root.path);

    const first = await client.uploadAsset({ tagRef: TAG, assetName: 'libisar_linux.so', data: Buffer.from('one') });
    const second = await client.uploadAsset({ tagRef: TAG, assetName: 'libisar_linux.so', data: Buffer.from('two!') });

    expect(first.replaced).toBe(false);
    expect(second).toEqual({
      assetName: 'libisar_linux.so',
      size: 4,
      url: `file://${join(root.path, 'v1.2.3', 'libisar_linux.so')}`,
      replaced: true,
    });
    expect(await client.listAssets(TAG)).toEqual(['libisar_linux.so']);
    expect(await readFile(join(root.path, 'v1.2.3', 'libisar_linux.so'), 'utf8')).toBe('two!');
  });

  test('an unknown tag has no assets', async () => {
    const client = new DirectoryReleaseClient(root.path);
    expect(await client.listAssets(asTagRef('v0.0.1'))).toEqual([]);
  });

  test('an aborted attempt writes nothing and may be retried', async () => {
    const client = new DirectoryReleaseClient(root.path);
    const controller = new AbortController();
    controller.abort(new Error('attempt timed out'));

    await expect(
      client.uploadAsset({
        tagRef: TAG,
        assetName: 'libisar_linux.so',
        data: Buffer.from('ELF'),
        signal: controller.signal,
      })
    ).rejects.toMatchObject({
      message: 'Writing libisar_linux.so was aborted: attempt timed out',
      retryable: true,
    });
    expect(await client.listAssets(TAG)).toEqual([]);
  });
});

interface RecordedCall {
  method: string;
  url: string;
  authorization: string | null;
  body: string | null;
}

type Route = (call: RecordedCall) => Response;

function json(body: unknown, status: number): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function fakeGitHub(routes: Record<string, Route>): { fetch: typeof fetch; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchStub: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const call: RecordedCall = {
      method: init?.method ?? 'GET',
      url,
      authorization: new Headers(init?.headers).get('authorization'),
      body: typeof init?.body === 'string' ? init.body : null,
    };
    calls.push(call);
    const route = routes[`${call.method} ${url}`];
    return route ? route(call) : json({ message: 'Not Found' }, 404);
  };
  return { fetch: fetchStub, calls };
}

const API = 'https://api.github.com/repos/octo/native-libs';
const UPLOADS = 'https://uploads.github.com/repos/octo/native-libs';

describe('GitHubReleaseClient', () => {
  test('replaces an existing asset of the same name', async () => {
    const github = fakeGitHub({
      [`GET ${API}/releases/tags/v1.2.3`]: () => json({ id: 7, tag_name: 'v1.2.3' }, 200),
      [`GET ${API}/releases/7/assets?per_page=100&page=1`]: () =>
        json(
          [
            { id: 42, name: 'libisar_linux.so', size: 3 },
            { id: 43, name: 'isar_windows.dll', size: 9 },
          ],
          200
        ),
      [`DELETE ${API}/releases/assets/42`]: () => new Response(null, { status: 204 }),
      [`POST ${UPLOADS}/releases/7/assets?name=libisar_linux.so`]: () =>
        json(
          {
            id: 44,
            name: 'libisar_linux.so',
            size: 4,
            browser_download_url: 'https://github.com/octo/native-libs/releases/download/v1.2.3/libisar_linux.so',
          },
          201
        ),
    });
    const client = new GitHubReleaseClient({ repository: 'octo/native-libs', token: 'test-secret', fetch: github.fetch });

    const uploaded = await client.uploadAsset({ tagRef: TAG, assetName: 'libisar_linux.so', data: Buffer.from('ELF!') });

    expect(uploaded).toEqual({
      assetName: 'libisar_linux.so',
      size: 4,
      url: 'https://github.com/octo/native-libs/releases/download/v1.2.3/libisar_linux.so',
      replaced: true,
    });
    expect(github.calls.map((call) => `${call.method} ${call.url}`)).toEqual([
      `GET ${API}/releases/tags/v1.2.3`,
      `GET ${API}/releases/7/assets?per_page=100&page=1`,
      `DELETE ${API}/releases/assets/42`,
      `POST ${UPLOADS}/releases/7/assets?name=libisar_linux.so`,
    ]);
    expect(github.calls.every((call) => call.authorization === 'Bearer test-secret')).toBe(true);
  });

  test('creates the release when the tag has none', async () => {
    const github = fakeGitHub({
      [`POST ${API}/releases`]: () => json({ id: 9, tag_name: 'v2.0.0' }, 201),
      [`GET ${API}/releases/9/assets?per_page=100&page=1`]: () => json([], 200),
      [`POST ${UPLOADS}/releases/9/assets?name=isar_windows.dll`]: () =>
        json({ id: 50, name: 'isar_windows.dll' }, 201),
    });
    const client = new GitHubReleaseClient({ repository: 'octo/native-libs', token: 'test-secret', fetch: github.fetch });

    const uploaded = await client.uploadAsset({
      tagRef: asTagRef('v2.0.0'),
      assetName: 'isar_windows.dll',
      data: Buffer.from('MZ'),
    });

    expect(uploaded).toEqual({ assetName: 'isar_windows.dll', size: 2, replaced: false });
    expect(github.calls[1]).toEqual({
      method: 'POST',
      url: `${API}/releases`,
      authorization: 'Bearer test-secret',
      body: JSON.stringify({ tag_name: 'v2.0.0', name: 'v2.0.0' }),
    });
  });

  test('server errors are retryable, auth errors are not', async () => {
    const failing = fakeGitHub({
      [`GET ${API}/releases/tags/v1.2.3`]: () => json({ message: 'Bad Gateway' }, 502),
    });
    const client = new GitHubReleaseClient({ repository: 'octo/native-libs', fetch: failing.fetch });
    await expect(
      client.uploadAsset({ tagRef: TAG, assetName: 'libisar_linux.so', data: Buffer.from('x') })
    ).rejects.toMatchObject({ status: 502, retryable: true });

    const denied = fakeGitHub({
      [`GET ${API}/releases/tags/v1.2.3`]: () => json({ message: 'Bad credentials' }, 401),
    });
    const unauthorized = new GitHubReleaseClient({ repository: 'octo/native-libs', fetch: denied.fetch });
    await expect(
      unauthorized.uploadAsset({ tagRef: TAG, assetName: 'libisar_linux.so', data: Buffer.from('x') })
    ).rejects.toMatchObject({ status: 401, retryable: false });
  });

  test('a release created concurrently by a sibling is picked up', async () => {
    let lookups = 0;
    const github = fakeGitHub({
      [`GET ${API}/releases/tags/v1.2.3`]: () =>
        ++lookups === 1 ? json({ message: 'Not Found' }, 404) : json({ id: 11, tag_name: 'v1.2.3' }, 200),
      [`POST ${API}/releases`]: () =>
        json({ message: 'Validation Failed', errors: [{ resource: 'Release', code: 'already_exists' }] }, 422),
      [`GET ${API}/releases/11/assets?per_page=100&page=1`]: () => json([], 200),
      [`POST ${UPLOADS}/releases/11/assets?name=libisar_linux.so`]: () =>
        json({ id: 60, name: 'libisar_linux.so', size: 4 }, 201),
    });
    const client = new GitHubReleaseClient({ repository: 'octo/native-libs', token: 'test-secret', fetch: github.fetch });

    const uploaded = await client.uploadAsset({ tagRef: TAG, assetName: 'libisar_linux.so', data: Buffer.from('ELF!') });

    expect(uploaded).toEqual({ assetName: 'libisar_linux.so', size: 4, replaced: false });
    expect(github.calls.map((call) => `${call.method} ${call.url}`)).toEqual([
      `GET ${API}/releases/tags/v1.2.3`,
      `POST ${API}/releases`,
      `GET ${API}/releases/tags/v1.2.3`,
      `GET ${API}/releases/11/assets?per_page=100&page=1`,
      `POST ${UPLOADS}/releases/11/assets?name=libisar_linux.so`,
    ]);
  });

  test('a network error is retryable', async () => {
    const offline: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };
    const client = new GitHubReleaseClient({ repository: 'octo/native-libs', fetch: offline });

    await expect(
      client.uploadAsset({ tagRef: TAG, assetName: 'libisar_linux.so', data: Buffer.from('x') })
    ).rejects.toMatchObject({
      message: 'Request to /repos/octo/native-libs/releases/tags/v1.2.3 failed: TypeError: fetch failed',
      status: undefined,
      retryable: true,
    });
  });

  test('the publisher retries an upload after a dropped connection', async () => {
    const github = fakeGitHub({
      [`GET ${API}/releases/tags/v1.2.3`]: () => json({ id: 7, tag_name: 'v1.2.3' }, 200),
      [`GET ${API}/releases/7/assets?per_page=100&page=1`]: () => json([], 200),
      [`POST ${UPLOADS}/releases/7/assets?name=libisar_linux.so`]: () =>
        json({ id: 61, name: 'libisar_linux.so', size: 3 }, 201),
    });
    let dropped = false;
    const flaky: typeof fetch = async (input, init) => {
      if (!dropped) {
        dropped = true;
        throw new TypeError('fetch failed');
      }
      return github.fetch(input, init);
    };
    const client = new GitHubReleaseClient({ repository: 'octo/native-libs', fetch: flaky });
    const dir = await tempDir('release-matrix-github');
    try {
      const artifact = join(dir.path, 'libisar_linux.so');
      await writeFile(artifact, 'ELF');
      const publisher = new ReleasePublisher(client, FAST_RETRY, createSilentLogger());

      const result = await publisher.publish(artifact, 'libisar_linux.so', { tagRef: TAG });

      expect(result).toEqual({
        ok: true,
        value: { assetName: 'libisar_linux.so', tagRef: TAG, size: 3, attempts: 2 },
      });
      expect(github.calls.map((call) => `${call.method} ${call.url}`)).toEqual([
        `GET ${API}/releases/tags/v1.2.3`,
        `GET ${API}/releases/7/assets?per_page=100&page=1`,
        `POST ${UPLOADS}/releases/7/assets?name=libisar_linux.so`,
      ]);
    } finally {
      await dir.cleanup();
    }
  });

  test('lists asset names of a tag', async () => {
    const github = fakeGitHub({
      [`GET ${API}/releases/tags/v1.2.3`]: () => json({ id: 7, tag_name: 'v1.2.3' }, 200),
      [`GET ${API}/releases/7/assets?per_page=100&page=1`]: () =>
        json(
          [
            { id: 43, name: 'libisar_macos.dylib' },
            { id: 42, name: 'isar_windows.dll' },
          ],
          200
        ),
    });
    const client = new GitHubReleaseClient({ repository: 'octo/native-libs', fetch: github.fetch });
    expect(await client.listAssets(TAG)).toEqual(['isar_windows.dll', 'libisar_macos.dylib']);
    expect(await client.listAssets(asTagRef('v9.9.9'))).toEqual([]);
  });
});

describe('isTransientStatus', () => {
  test('classifies HTTP statuses', () => {
    expect([408, 429, 500, 503].map(isTransientStatus)).toEqual([true, true, true, true]);
    expect([400, 401, 404, 422].map(isTransientStatus)).toEqual([false, false, false, false]);
  });
});
