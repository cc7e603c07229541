import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { getEventListeners } from 'events';
import { promises as fs } from 'fs';
import { join } from 'path';

import { InstallationOrchestrator } from '../../../src/core/install/orchestrator/orchestrator.js';
import type { InstallActionState } from '../../../src/core/install/orchestrator/types.js';
import { InstalledIndexRegistry } from '../../../src/core/installed/index-registry.js';
import { createHashMetadataCache, type HashMetadataCache } from '../../../src/core/installed/hash-metadata-cache.js';
import { silentOutput } from '../../../src/core/ports/silent-output.js';
import type { PromptPort } from '../../../src/core/ports/prompt.js';
import type { InteractionPolicy } from '../../../src/core/interaction-policy.js';
import type { Installation, Project } from '../../../src/types/index.js';
import {
  DependencyBatchError,
  ResourceNotFoundError,
  UnsupportedPackageTypeError,
  ValidationError
} from '../../../src/utils/errors.js';
import {
  FakeDownloader,
  FakeRegistry,
  listDir,
  makeDetail,
  makeInstallation,
  makeRelease,
  makeTempDir,
  removeTempDir
} from '../../helpers/fakes.js';

const ROOT: Project = { id: 'root', title: 'Root Mod', packageType: 'mod' };

const alwaysPrompt: InteractionPolicy = {
  mode: 'always',
  canPrompt: () => true
};

function scriptedPrompt(answers: (message: string) => string): PromptPort & { asked: string[] } {
  const asked: string[] = [];
  return {
    asked,
    async select(message: string) {
      asked.push(message);
      return answers(message);
    }
  };
}

describe('InstallationOrchestrator install', () => {
  let dir: string;
  let installation: Installation;
  let registry: FakeRegistry;
  let downloader: FakeDownloader;
  let indexes: InstalledIndexRegistry;
  let metadata: HashMetadataCache;

  const mods = (): string => join(dir, 'mods');

  function createOrchestrator(overrides: { concurrency?: number; prompt?: PromptPort; interactionPolicy?: InteractionPolicy } = {}) {
    return new InstallationOrchestrator({
      registry,
      downloader,
      indexes,
      metadata,
      output: silentOutput,
      settings: { concurrency: overrides.concurrency ?? 4, policy: 'manual' },
      ...(overrides.prompt ? { prompt: overrides.prompt } : {}),
      ...(overrides.interactionPolicy ? { interactionPolicy: overrides.interactionPolicy } : {})
    });
  }

  beforeEach(async () => {
    dir = await makeTempDir('orchestrator');
    installation = makeInstallation(dir);
    registry = new FakeRegistry()
      .addProject(makeDetail('root', { title: 'Root Mod', dependencies: ['a', 'b', 'c'] }), [makeRelease('root', '1')])
      .addProject(makeDetail('a'), [makeRelease('a', '2'), makeRelease('a', '1')])
      .addProject(makeDetail('b'), [makeRelease('b', '1')])
      .addProject(makeDetail('c'), [makeRelease('c', '1')]);
    downloader = new FakeDownloader();
    indexes = new InstalledIndexRegistry({ registry });
    metadata = createHashMetadataCache(join(dir, 'cache'));
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('installs only the root with the main-only policy', async () => {
    const orchestrator = createOrchestrator();

    const outcome = await orchestrator.install(ROOT, installation, { policy: 'main-only' });

    assert.equal(outcome.status, 'installed');
    assert.deepEqual(await listDir(mods()), ['root-1.jar']);
    assert.equal(orchestrator.state, 'installed');
  });

  it('installs missing dependencies before the root with the auto policy', async () => {
    const orchestrator = createOrchestrator();
    const states: InstallActionState[] = [];
    orchestrator.onStateChange(state => states.push(state));

    const outcome = await orchestrator.install(ROOT, installation, { policy: 'auto' });

    assert.equal(outcome.status, 'installed');
    if (outcome.status !== 'installed') return;
    assert.equal(outcome.file.fileName, 'root-1.jar');
    assert.deepEqual(outcome.dependencies.map(handle => handle.fileName), ['a-2.jar', 'b-1.jar', 'c-1.jar']);
    assert.deepEqual(await listDir(mods()), ['a-2.jar', 'b-1.jar', 'c-1.jar', 'root-1.jar']);
    assert.deepEqual(states, ['loading', 'auto-installing', 'downloading', 'installed']);
    assert.equal(downloader.requested.at(-1), 'root-1.jar');

    const index = indexes.get(installation, 'mod');
    assert.equal(index.contains(outcome.file.hash), true);
    assert.equal((await metadata.get(outcome.file.hash))?.projectId, 'root');
  });

  it('stops the auto batch at the first failure and keeps finished dependencies', async () => {
    const orchestrator = createOrchestrator({ concurrency: 1 });
    const bUrl = makeRelease('b', '1').files[0]?.url ?? '';
    downloader.failNext(bUrl, 5);

    await assert.rejects(orchestrator.install(ROOT, installation, { policy: 'auto' }), (error: unknown) => {
      assert.ok(error instanceof DependencyBatchError);
      assert.deepEqual(error.failures.map(failure => failure.id), ['b']);
      assert.deepEqual(error.succeeded, ['a']);
      return true;
    });

    assert.deepEqual(downloader.requested, ['a-2.jar', 'b-1.jar']);
    assert.deepEqual(await listDir(mods()), ['a-2.jar']);
    assert.equal(orchestrator.state, 'failed');
  });

  it('hands the resolution back when it cannot prompt', async () => {
    const orchestrator = createOrchestrator();

    const outcome = await orchestrator.install(ROOT, installation);

    assert.equal(outcome.status, 'awaiting-confirmation');
    if (outcome.status !== 'awaiting-confirmation') return;
    const { resolution } = outcome;
    assert.deepEqual(resolution.missing.map(detail => detail.id), ['a', 'b', 'c']);
    assert.equal(resolution.selected.get('a')?.versionNumber, '2');
    assert.equal(orchestrator.state, 'manual-confirm');
    assert.deepEqual(downloader.requested, []);

    await assert.rejects(orchestrator.install(ROOT, installation), ValidationError);

    const finished = await orchestrator.downloadAllAndContinue(resolution);
    assert.equal(finished.status, 'installed');
    assert.equal(resolution.overallState, 'completed');
    assert.equal(orchestrator.state, 'installed');
  });

  it('retries only the dependencies that failed', async () => {
    const orchestrator = createOrchestrator();
    downloader.failNext(makeRelease('b', '1').files[0]?.url ?? '', 1);

    const outcome = await orchestrator.install(ROOT, installation);
    assert.equal(outcome.status, 'awaiting-confirmation');
    if (outcome.status !== 'awaiting-confirmation') return;
    const { resolution } = outcome;

    await assert.rejects(orchestrator.downloadAllAndContinue(resolution), DependencyBatchError);
    assert.equal(resolution.overallState, 'failed');
    assert.equal(resolution.states.get('a'), 'success');
    assert.equal(resolution.states.get('b'), 'failed');
    assert.equal(resolution.states.get('c'), 'success');
    assert.equal(resolution.errors.get('b'), 'Download failed: HTTP 503 for https://cdn.example.test/b/1/b-1.jar');
    assert.equal(resolution.allDependenciesDownloaded, false);
    assert.equal(orchestrator.state, 'failed');

    const handle = await orchestrator.retryDownloadDependency(resolution, 'b');
    assert.equal(handle.fileName, 'b-1.jar');
    assert.equal(resolution.allDependenciesDownloaded, true);
    assert.equal(resolution.overallState, 'idle');
    assert.equal(orchestrator.state, 'manual-confirm');

    const finished = await orchestrator.downloadAllAndContinue(resolution);
    assert.equal(finished.status, 'installed');
    assert.equal(downloader.requested.filter(name => name === 'a-2.jar').length, 1);
    assert.equal(downloader.requested.filter(name => name === 'b-1.jar').length, 2);
  });

  it('fails a retry when the dependency has no release to download', async () => {
    registry.addProject(makeDetail('c'), []);
    const orchestrator = createOrchestrator();

    const outcome = await orchestrator.install(ROOT, installation);
    if (outcome.status !== 'awaiting-confirmation') {
      assert.fail(`unexpected outcome ${outcome.status}`);
    }
    const { resolution } = outcome;

    await assert.rejects(orchestrator.retryDownloadDependency(resolution, 'c'), ResourceNotFoundError);
    assert.equal(resolution.states.get('c'), 'failed');
    assert.equal(resolution.overallState, 'failed');
    await assert.rejects(orchestrator.retryDownloadDependency(resolution, 'zzz'), ValidationError);
  });

  it('downloads the root alone when asked to skip dependencies', async () => {
    const orchestrator = createOrchestrator();
    const outcome = await orchestrator.install(ROOT, installation);
    if (outcome.status !== 'awaiting-confirmation') {
      assert.fail(`unexpected outcome ${outcome.status}`);
    }

    const finished = await orchestrator.downloadMainOnly(outcome.resolution);

    assert.equal(finished.status, 'installed');
    if (finished.status !== 'installed') return;
    assert.deepEqual(finished.skippedDependencies, ['a', 'b', 'c']);
    assert.deepEqual(await listDir(mods()), ['root-1.jar']);
  });

  it('cancels in-flight downloads and returns to idle', async () => {
    const orchestrator = createOrchestrator();
    const outcome = await orchestrator.install(ROOT, installation);
    if (outcome.status !== 'awaiting-confirmation') {
      assert.fail(`unexpected outcome ${outcome.status}`);
    }
    const { resolution } = outcome;

    let open: () => void = () => {};
    downloader.gate = new Promise<void>(resolve => {
      open = resolve;
    });
    const running = orchestrator.downloadAllAndContinue(resolution);
    orchestrator.cancel(resolution);
    open();

    assert.deepEqual(await running, { status: 'cancelled' });
    assert.equal(resolution.overallState, 'cancelled');
    assert.equal(resolution.states.get('a'), 'idle');
    assert.equal(orchestrator.state, 'idle');
    assert.deepEqual(await listDir(mods()), []);

    downloader.gate = null;
    const again = await orchestrator.install(ROOT, installation, { policy: 'main-only' });
    assert.equal(again.status, 'installed');
  });

  it('accepts one batch per resolution at a time', async () => {
    const orchestrator = createOrchestrator();
    const outcome = await orchestrator.install(ROOT, installation);
    if (outcome.status !== 'awaiting-confirmation') {
      assert.fail(`unexpected outcome ${outcome.status}`);
    }
    const { resolution } = outcome;

    let open: () => void = () => {};
    downloader.gate = new Promise<void>(resolve => {
      open = resolve;
    });
    const running = orchestrator.downloadAllAndContinue(resolution);

    await assert.rejects(orchestrator.downloadAllAndContinue(resolution), ValidationError);
    await assert.rejects(orchestrator.downloadMainOnly(resolution), ValidationError);
    await assert.rejects(orchestrator.retryDownloadDependency(resolution, 'a'), ValidationError);
    open();

    const finished = await running;
    assert.equal(finished.status, 'installed');
    assert.deepEqual(downloader.requested, ['a-2.jar', 'b-1.jar', 'c-1.jar', 'root-1.jar']);
    assert.deepEqual(resolution.pendingIds, []);
    assert.equal(resolution.overallState, 'completed');
  });

  it('reports nothing missing once the prepared dependencies are installed', async () => {
    const orchestrator = createOrchestrator();

    const resolution = await orchestrator.prepareManualDependencies(ROOT, installation);
    assert.ok(resolution);
    assert.deepEqual(resolution.missing.map(detail => detail.id), ['a', 'b', 'c']);
    const selectedHash = resolution.selected.get('a')?.files[0]?.hash ?? '';

    const outcome = await orchestrator.downloadAllAndContinue(resolution);
    assert.equal(outcome.status, 'installed');
    const index = indexes.get(installation, 'mod');
    assert.equal(index.contains(selectedHash), true);

    // Answered from the recorded hashes: with the files gone a rescan would report them again
    await fs.rm(mods(), { recursive: true, force: true });
    assert.equal(await orchestrator.prepareManualDependencies(ROOT, installation), null);
  });

  it('stops listening to the caller signal once the install settles', async () => {
    const controller = new AbortController();
    const orchestrator = createOrchestrator();

    const outcome = await orchestrator.install(ROOT, installation, { signal: controller.signal });
    if (outcome.status !== 'awaiting-confirmation') {
      assert.fail(`unexpected outcome ${outcome.status}`);
    }
    assert.equal(getEventListeners(controller.signal, 'abort').length, 1);

    await orchestrator.downloadAllAndContinue(outcome.resolution);
    assert.equal(getEventListeners(controller.signal, 'abort').length, 0);

    await orchestrator.install(ROOT, installation, { signal: controller.signal, policy: 'auto' });
    assert.equal(getEventListeners(controller.signal, 'abort').length, 0);
  });

  it('cancels a waiting resolution when the caller signal aborts', async () => {
    const controller = new AbortController();
    const orchestrator = createOrchestrator();

    const outcome = await orchestrator.install(ROOT, installation, { signal: controller.signal });
    if (outcome.status !== 'awaiting-confirmation') {
      assert.fail(`unexpected outcome ${outcome.status}`);
    }
    controller.abort();

    assert.equal(outcome.resolution.overallState, 'cancelled');
    assert.equal(outcome.resolution.signal.aborted, true);
    assert.equal(getEventListeners(controller.signal, 'abort').length, 0);
  });

  it('lets the user pick releases and confirm when prompting is allowed', async () => {
    const prompt = scriptedPrompt(message => (message === 'Release of A' ? 'a-v1' : 'all'));
    const orchestrator = createOrchestrator({ prompt, interactionPolicy: alwaysPrompt });

    const outcome = await orchestrator.install(ROOT, installation);

    assert.equal(outcome.status, 'installed');
    assert.deepEqual(prompt.asked, ['Release of A', 'Install dependencies?']);
    assert.deepEqual(await listDir(mods()), ['a-1.jar', 'b-1.jar', 'c-1.jar', 'root-1.jar']);
  });

  it('reports a cancelled confirmation', async () => {
    const prompt = scriptedPrompt(message => (message === 'Install dependencies?' ? 'cancel' : 'a-v2'));
    const orchestrator = createOrchestrator({ prompt, interactionPolicy: alwaysPrompt });

    const outcome = await orchestrator.install(ROOT, installation);

    assert.deepEqual(outcome, { status: 'cancelled' });
    assert.equal(orchestrator.state, 'idle');
    assert.deepEqual(downloader.requested, []);
  });

  it('installs the root directly when nothing is missing', async () => {
    registry.addProject(makeDetail('solo', { title: 'Solo' }), [makeRelease('solo', '3')]);
    const orchestrator = createOrchestrator();

    const outcome = await orchestrator.install({ id: 'solo', title: 'Solo', packageType: 'mod' }, installation);

    assert.equal(outcome.status, 'installed');
    assert.deepEqual(await listDir(mods()), ['solo-3.jar']);
  });

  it('installs a requested version of the root', async () => {
    registry.addProject(makeDetail('solo'), [makeRelease('solo', '3'), makeRelease('solo', '2')]);
    const orchestrator = createOrchestrator();
    const project: Project = { id: 'solo', title: 'Solo', packageType: 'mod' };

    await orchestrator.install(project, installation, { versionId: '2' });
    assert.deepEqual(await listDir(mods()), ['solo-2.jar']);

    await assert.rejects(orchestrator.install(project, installation, { versionId: '9' }), ResourceNotFoundError);
  });

  it('fails when the root has no compatible release', async () => {
    const orchestrator = createOrchestrator();
    const project: Project = { id: 'root', title: 'Root Mod', packageType: 'mod' };

    await assert.rejects(
      orchestrator.install(project, { ...installation, gameVersion: '1.8.9' }),
      ResourceNotFoundError
    );
    assert.equal(orchestrator.state, 'failed');
  });

  it('rejects modpacks and empty ids before doing anything', async () => {
    const orchestrator = createOrchestrator();

    await assert.rejects(
      orchestrator.install({ id: 'pack', title: 'Pack', packageType: 'modpack' }, installation),
      UnsupportedPackageTypeError
    );
    await assert.rejects(
      orchestrator.install({ id: '', title: '', packageType: 'mod' }, installation),
      ValidationError
    );
    assert.equal(orchestrator.state, 'idle');
    assert.deepEqual(registry.releaseCalls, []);
  });

  it('reports installed state by hash for mods', async () => {
    const orchestrator = createOrchestrator();
    assert.equal(await orchestrator.isInstalled(ROOT, installation), false);

    await orchestrator.install(ROOT, installation, { policy: 'main-only' });

    assert.equal(await orchestrator.isInstalled(ROOT, installation), true);
    assert.equal(await orchestrator.isInstalled({ id: 'p', title: 'P', packageType: 'modpack' }, installation), false);
  });
});
