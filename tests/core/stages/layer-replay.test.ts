import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'node:path';

import { parseLayerInstruction, planReplay, stagePrefixDir } from '../../../src/core/stages/layer-replay.js';
import { compose } from '../../../src/core/stages/stage-composer.js';
import { createBuildContext } from '../../../src/core/build-context.js';
import { ValidationError } from '../../../src/utils/errors.js';
import { recipe } from '../../test-helpers.js';

const win64 = createBuildContext({ target: 'win64', variant: 'gpl' });

const toolchain = recipe('toolchain', {
  hooks: {
    dockerLayer: [{ lines: ['COPY --link --from=${SELFLAYER} /opt/toolchain/. /'] }],
    dockerFinal: [{ lines: ['COPY --link --from=${PREVLAYER} /opt/toolchain/. /'] }]
  }
});
const zlib = recipe('zlib');
const dav1d = recipe('dav1d', { dependencies: ['zlib'] });

describe('parseLayerInstruction', () => {
  it('reads the stage, sources and destination of a copy', () => {
    assert.deepEqual(parseLayerInstruction('COPY --link --from=stage-01 /opt/a/. /opt/b/lib /usr', zlib), {
      kind: 'copy',
      from: 'stage-01',
      sources: ['/opt/a/.', '/opt/b/lib'],
      destination: '/usr'
    });
  });

  it('turns both ENV forms into assignments', () => {
    assert.deepEqual(parseLayerInstruction('ENV PATH=/opt/bin:$PATH', zlib), { kind: 'env', assignment: 'PATH=/opt/bin:$PATH' });
    assert.deepEqual(parseLayerInstruction('ENV CROSS_HOME /opt/cross tools', zlib), {
      kind: 'env',
      assignment: `CROSS_HOME='/opt/cross tools'`
    });
  });

  it('keeps shell-form RUN commands', () => {
    assert.deepEqual(parseLayerInstruction('RUN ldconfig', zlib), { kind: 'run', command: 'ldconfig' });
  });

  it('rejects instructions without a shell equivalent', () => {
    assert.throws(() => parseLayerInstruction('WORKDIR /opt', zlib), ValidationError);
    assert.throws(() => parseLayerInstruction('RUN ["ldconfig"]', zlib), ValidationError);
    assert.throws(() => parseLayerInstruction('COPY --from=stage-01 /opt', zlib), ValidationError);
  });
});

describe('stagePrefixDir', () => {
  it('keeps each stage prefix under its stage directory', () => {
    const [stage] = compose([zlib], win64);
    assert.equal(stagePrefixDir('/work', stage), join('/work', 'stages', 'stage-01', 'deps'));
  });
});

describe('planReplay', () => {
  it('captures layered paths and restores them in later stages and the final build', () => {
    const plan = [toolchain, zlib, dav1d];
    const stages = compose(plan, win64, { perRecipe: true });
    const replay = planReplay(plan, stages, win64);

    const restore = [
      `mkdir -p '/'`,
      `cp -a '/ffbuild/stages/stage-01/layer/0'/. '/'`
    ];
    assert.deepEqual(replay.stages[0], {
      setup: [],
      teardown: [
        `mkdir -p '/ffbuild/stages/stage-01/layer/0'`,
        `if [ -d '/opt/toolchain/.' ]; then cp -a '/opt/toolchain/.'/. '/ffbuild/stages/stage-01/layer/0'/; ` +
          `else cp -a '/opt/toolchain/.' '/ffbuild/stages/stage-01/layer/0'/; fi`
      ]
    });
    assert.deepEqual(replay.stages[1], {
      setup: [`cp -a '/ffbuild/stages/stage-01/deps'/. "$FFBUILD_PREFIX"`, ...restore],
      teardown: []
    });
    assert.deepEqual(replay.stages[2].setup, [
      `cp -a '/ffbuild/stages/stage-01/deps'/. "$FFBUILD_PREFIX"`,
      `cp -a '/ffbuild/stages/stage-02/deps'/. "$FFBUILD_PREFIX"`,
      ...restore
    ]);
    assert.deepEqual(replay.final, [
      ...restore,
      `cp -a '/ffbuild/stages/stage-01/deps'/. "$FFBUILD_PREFIX"`,
      `cp -a '/ffbuild/stages/stage-02/deps'/. "$FFBUILD_PREFIX"`,
      `cp -a '/ffbuild/stages/stage-03/deps'/. "$FFBUILD_PREFIX"`,
      ...restore
    ]);
  });

  it('merges stage prefixes in plan order without sharing them', () => {
    const plan = [zlib, recipe('svtav1')];
    const stages = compose(plan, win64, { perRecipe: true });
    const replay = planReplay(plan, stages, win64);

    assert.deepEqual(replay.stages, [
      { setup: [], teardown: [] },
      { setup: [], teardown: [] }
    ]);
    assert.deepEqual(replay.final, [
      `cp -a '/ffbuild/stages/stage-01/deps'/. "$FFBUILD_PREFIX"`,
      `cp -a '/ffbuild/stages/stage-02/deps'/. "$FFBUILD_PREFIX"`
    ]);
  });

  it('runs stage instructions inside their own stage', () => {
    const staged = recipe('cross', { hooks: { dockerStage: [{ lines: ['ENV CROSS=1', 'RUN ldconfig'] }] } });
    const stages = compose([staged], win64);

    assert.deepEqual(planReplay([staged], stages, win64).stages[0].setup, ['export CROSS=1', 'ldconfig']);
  });

  it('fails on copies from images outside the plan', () => {
    const external = recipe('cross', {
      hooks: { dockerStage: [{ lines: ['COPY --from=ghcr.io/example/cross:1 /opt/cross /opt/cross'] }] }
    });
    const plan = [zlib, external];

    assert.throws(
      () => planReplay(plan, compose(plan, win64), win64),
      (error: unknown) => error instanceof ValidationError && error.message.includes(`Recipe 'cross'`)
    );
  });
});
