import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Headers, Response } from 'node-fetch';

import {
  ModrinthRegistryClient,
  parseRelease,
  requiredDependencyIds,
  toPackageType,
  type FetchLike
} from '../../../src/core/registry/modrinth-client.js';
import { ResolutionSession } from '../../../src/core/registry/resolution-session.js';
import { DownloadError } from '../../../src/utils/errors.js';
import { FakeRegistry, makeDetail, makeRelease } from '../../helpers/fakes.js';

const BASE = 'https://registry.example.test/v2';

interface RecordedCall {
  path: string;
  params: Record<string, string>;
  userAgent: string | undefined;
}

/** Fetch stand-in serving JSON documents by path; unknown paths are 404 */
function routedFetch(routes: Record<string, unknown>, status = 200): { fetchImpl: FetchLike; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    const parsed = new URL(url);
    const userAgent = new Headers(init?.headers).get('user-agent') ?? undefined;
    calls.push({
      path: parsed.pathname.replace('/v2', ''),
      params: Object.fromEntries(parsed.searchParams.entries()),
      userAgent
    });
    if (status !== 200) {
      return new Response('error', { status });
    }
    const key = parsed.pathname.replace('/v2', '');
    if (!(key in routes)) {
      return new Response('not found', { status: 404 });
    }
    return new Response(JSON.stringify(routes[key]), {
      status: 200,
      headers: { 'content-type': 'application/json' }
    });
  };
  return { fetchImpl, calls };
}

function rawVersion(id: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    project_id: 'sodium',
    name: `Sodium ${id}`,
    version_number: id,
    loaders: ['Fabric'],
    game_versions: ['1.20.1'],
    date_published: '2024-01-01T00:00:00Z',
    files: [
      {
        url: `https://cdn.example.test/sodium/${id}.jar`,
        filename: `sodium-${id}.jar`,
        hashes: { sha1: 'ABCDEF0123', sha512: 'ignored' },
        primary: true,
        size: 1024
      }
    ],
    dependencies: [],
    ...overrides
  };
}

describe('registry payload parsing', () => {
  it('maps a version document onto a release', () => {
    assert.deepEqual(parseRelease(rawVersion('0.5.3')), {
      id: '0.5.3',
      projectId: 'sodium',
      name: 'Sodium 0.5.3',
      versionNumber: '0.5.3',
      loaders: ['fabric'],
      gameVersions: ['1.20.1'],
      files: [
        {
          url: 'https://cdn.example.test/sodium/0.5.3.jar',
          fileName: 'sodium-0.5.3.jar',
          hash: 'abcdef0123',
          primary: true,
          size: 1024
        }
      ],
      dependencies: [],
      publishedAt: '2024-01-01T00:00:00Z'
    });
  });

  it('drops files without a sha1 and documents without ids', () => {
    const release = parseRelease(rawVersion('1', { files: [{ url: 'u', filename: 'f.jar', hashes: {} }] }));
    assert.deepEqual(release?.files, []);
    assert.equal(parseRelease({ id: 'x' }), null);
    assert.equal(parseRelease('nope'), null);
  });

  it('keeps required dependency ids once, in order', () => {
    const release = parseRelease(
      rawVersion('1', {
        dependencies: [
          { project_id: 'fabric-api', dependency_type: 'required' },
          { project_id: 'modmenu', dependency_type: 'optional' },
          { project_id: 'fabric-api', dependency_type: 'required' },
          { version_id: 'abc', dependency_type: 'required' },
          { project_id: 'indium', dependency_type: 'required' }
        ]
      })
    );
    assert.deepEqual(requiredDependencyIds(release ?? undefined), ['fabric-api', 'indium']);
  });

  it('derives package types', () => {
    assert.equal(toPackageType('mod', ['fabric']), 'mod');
    assert.equal(toPackageType('mod', ['datapack']), 'datapack');
    assert.equal(toPackageType('shader', ['iris']), 'shader');
    assert.equal(toPackageType(undefined, []), 'mod');
  });
});

describe('ModrinthRegistryClient', () => {
  it('builds the detail from the project and its newest release', async () => {
    const { fetchImpl } = routedFetch({
      '/project/sodium': {
        id: 'AANobbMI',
        title: 'Sodium',
        project_type: 'mod',
        loaders: ['fabric', 'quilt'],
        game_versions: ['1.20.1', '1.20.4']
      },
      '/project/sodium/version': [
        rawVersion('old', {
          date_published: '2023-01-01T00:00:00Z',
          dependencies: [{ project_id: 'legacy-lib', dependency_type: 'required' }]
        }),
        rawVersion('new', {
          date_published: '2024-06-01T00:00:00Z',
          dependencies: [
            { project_id: 'fabric-api', dependency_type: 'required' },
            { project_id: 'AANobbMI', dependency_type: 'required' }
          ]
        })
      ]
    });
    const client = new ModrinthRegistryClient({ baseUrl: `${BASE}/`, fetchImpl });

    assert.deepEqual(await client.fetchProjectDetail('sodium'), {
      id: 'AANobbMI',
      title: 'Sodium',
      packageType: 'mod',
      gameVersions: ['1.20.1', '1.20.4'],
      loaders: ['fabric', 'quilt'],
      dependencies: ['fabric-api']
    });
  });

  it('returns null for unknown projects', async () => {
    const { fetchImpl } = routedFetch({});
    const client = new ModrinthRegistryClient({ baseUrl: BASE, fetchImpl });
    assert.equal(await client.fetchProjectDetail('ghost'), null);
    assert.deepEqual(await client.fetchCompatibleReleases('ghost', '1.20.1', 'fabric', 'mod'), []);
    assert.equal(await client.fetchReleaseByHash('ABC'), null);
  });

  it('queries compatible releases and re-applies the filter locally', async () => {
    const { fetchImpl, calls } = routedFetch({
      '/project/sodium/version': [
        rawVersion('a', { date_published: '2024-01-01T00:00:00Z' }),
        rawVersion('b', { date_published: '2024-03-01T00:00:00Z' }),
        rawVersion('forge-only', { loaders: ['forge'] }),
        rawVersion('old-game', { game_versions: ['1.19.2'] })
      ]
    });
    const client = new ModrinthRegistryClient({ baseUrl: BASE, userAgent: 'craftpkg-tests', fetchImpl });

    const releases = await client.fetchCompatibleReleases('sodium', '1.20.1', 'Fabric', 'mod');

    assert.deepEqual(releases.map(release => release.id), ['b', 'a']);
    assert.deepEqual(calls, [
      {
        path: '/project/sodium/version',
        params: { game_versions: '["1.20.1"]', loaders: '["fabric"]' },
        userAgent: 'craftpkg-tests'
      }
    ]);
  });

  it('asks for datapack releases by the datapack loader tag', async () => {
    const { fetchImpl, calls } = routedFetch({
      '/project/terralith/version': [rawVersion('dp', { project_id: 'terralith', loaders: ['datapack'] })]
    });
    const client = new ModrinthRegistryClient({ baseUrl: BASE, fetchImpl });

    const releases = await client.fetchCompatibleReleases('terralith', '1.20.1', 'fabric', 'datapack');

    assert.equal(releases.length, 1);
    assert.equal(calls[0]?.params.loaders, '["datapack"]');
  });

  it('looks releases up by normalised sha1', async () => {
    const { fetchImpl, calls } = routedFetch({ '/version_file/abcdef0123': rawVersion('x') });
    const client = new ModrinthRegistryClient({ baseUrl: BASE, fetchImpl });

    const release = await client.fetchReleaseByHash(' ABCDEF0123 ');

    assert.equal(release?.id, 'x');
    assert.deepEqual(calls[0]?.params, { algorithm: 'sha1' });
  });

  it('raises DownloadError for server failures', async () => {
    const { fetchImpl } = routedFetch({}, 500);
    const client = new ModrinthRegistryClient({ baseUrl: BASE, fetchImpl });
    await assert.rejects(client.fetchProjectDetail('sodium'), DownloadError);
  });

  it('raises DownloadError when the request itself fails', async () => {
    const fetchImpl: FetchLike = async () => {
      throw new Error('connection reset');
    };
    const client = new ModrinthRegistryClient({ baseUrl: BASE, fetchImpl });
    await assert.rejects(client.fetchReleaseByHash('abc'), DownloadError);
  });
});

describe('ResolutionSession', () => {
  it('hits the registry once per project and query', async () => {
    const registry = new FakeRegistry().addProject(makeDetail('lib'), [makeRelease('lib', '1.0.0')]);
    const session = new ResolutionSession(registry);

    const [first, second] = await Promise.all([
      session.fetchProjectDetail('lib'),
      session.fetchProjectDetail('lib')
    ]);
    await session.fetchCompatibleReleases('lib', '1.20.1', 'fabric', 'mod');
    await session.fetchCompatibleReleases('lib', '1.20.1', 'FABRIC', 'mod');
    await session.fetchCompatibleReleases('lib', '1.20.1', 'quilt', 'mod');

    assert.equal(first, second);
    assert.deepEqual(registry.detailCalls, ['lib']);
    assert.equal(registry.releaseCalls.length, 2);
  });

  it('forgets failed lookups', async () => {
    class FlakyRegistry extends FakeRegistry {
      attempts = 0;

      override async fetchProjectDetail(projectId: string) {
        this.attempts++;
        if (this.attempts === 1) {
          throw new DownloadError('registry responded 503');
        }
        return super.fetchProjectDetail(projectId);
      }
    }
    const registry = new FlakyRegistry().addProject(makeDetail('lib'));
    const session = new ResolutionSession(registry);

    await assert.rejects(session.fetchProjectDetail('lib'), DownloadError);
    assert.equal((await session.fetchProjectDetail('lib'))?.id, 'lib');
    assert.equal(registry.attempts, 2);
  });
});
