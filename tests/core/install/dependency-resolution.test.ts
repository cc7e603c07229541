import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { DependencyResolution } from '../../../src/core/install/dependency-resolution.js';
import { ResourceNotFoundError, ValidationError } from '../../../src/utils/errors.js';
import { makeDetail, makeInstallation, makeRelease } from '../../helpers/fakes.js';

function createResolution(): DependencyResolution {
  return new DependencyResolution({
    root: makeDetail('app', { dependencies: ['lib', 'api'] }),
    rootPackageType: 'mod',
    rootReleases: [makeRelease('app', '2.0.0'), makeRelease('app', '1.0.0')],
    installation: makeInstallation('/games/survival'),
    missing: [
      { detail: makeDetail('lib'), releases: [makeRelease('lib', '1.1.0'), makeRelease('lib', '1.0.0')] },
      { detail: makeDetail('api'), releases: [] }
    ],
    unresolved: ['ghost']
  });
}

describe('DependencyResolution', () => {
  it('preselects the default release of the root and each dependency', () => {
    const resolution = createResolution();

    assert.equal(resolution.rootRelease?.id, 'app-v2.0.0');
    assert.equal(resolution.selected.get('lib')?.id, 'lib-v1.1.0');
    assert.equal(resolution.selected.has('api'), false);
    assert.deepEqual(resolution.pendingIds, ['lib', 'api']);
    assert.deepEqual(resolution.unresolved, ['ghost']);
    assert.equal(resolution.overallState, 'idle');
  });

  it('overrides the selected release', () => {
    const resolution = createResolution();

    assert.equal(resolution.selectRelease('lib', '1.0.0').id, 'lib-v1.0.0');
    assert.equal(resolution.selected.get('lib')?.id, 'lib-v1.0.0');
    assert.equal(resolution.selectRelease('app', 'app-v1.0.0').id, 'app-v1.0.0');
    assert.equal(resolution.rootRelease?.id, 'app-v1.0.0');
  });

  it('rejects selections outside the resolution', () => {
    const resolution = createResolution();

    assert.throws(() => resolution.selectRelease('other', '1.0.0'), ValidationError);
    assert.throws(() => resolution.selectRelease('lib', '9.9.9'), ResourceNotFoundError);
    assert.throws(() => resolution.selectRelease('api', '1.0.0'), ResourceNotFoundError);
  });

  it('tracks per-item states and errors', () => {
    const resolution = createResolution();

    resolution.setItemState('lib', 'success');
    resolution.setItemState('api', 'failed', 'no compatible release');
    assert.equal(resolution.allDependenciesDownloaded, false);
    assert.deepEqual(resolution.pendingIds, ['api']);
    assert.deepEqual(resolution.failedIds, ['api']);
    assert.equal(resolution.errors.get('api'), 'no compatible release');

    resolution.setItemState('api', 'success');
    assert.equal(resolution.allDependenciesDownloaded, true);
    assert.equal(resolution.errors.has('api'), false);
  });

  it('gets a fresh signal after cancellation', () => {
    const resolution = createResolution();
    const first = resolution.signal;

    resolution.cancel();
    assert.equal(first.aborted, true);
    assert.equal(resolution.overallState, 'cancelled');

    resolution.renewSignal();
    assert.notEqual(resolution.signal, first);
    assert.equal(resolution.signal.aborted, false);
  });
});
