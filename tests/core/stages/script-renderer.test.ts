import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  collectFfmpegFlags,
  renderDownload,
  renderFinalScript,
  renderRecipeSection,
  renderStageScript,
  shellQuote
} from '../../../src/core/stages/script-renderer.js';
import { createBuildContext } from '../../../src/core/build-context.js';
import { createRegistry } from '../../../src/core/registry/recipe-registry.js';
import { compose } from '../../../src/core/stages/stage-composer.js';
import type { Addin, FlagSet, Variant } from '../../../src/types/index.js';
import { recipe } from '../../test-helpers.js';

const win64 = createBuildContext({ target: 'win64', variant: 'gpl', addins: ['debug'] });

const DEFAULT_CHECKOUT = [
  'ffbuild_retry git clone --filter=blob:none --no-checkout "$SCRIPT_REPO" .',
  'git checkout "$SCRIPT_COMMIT"'
];

function flags(overrides: Partial<FlagSet> = {}): FlagSet {
  return { configure: [], cflags: [], cxxflags: [], ldflags: [], ldexeflags: [], libs: [], ...overrides };
}

const zlib = recipe('zlib', {
  source: { repo: 'https://example.invalid/zlib.git', commit: 'abc123' },
  hooks: {
    build: [{ lines: ['./configure --static --prefix="$FFBUILD_PREFIX"', 'make install'] }],
    configure: [{ lines: ['--enable-zlib'] }]
  }
});

describe('shellQuote', () => {
  it('wraps values in single quotes', () => {
    assert.equal(shellQuote('win64'), `'win64'`);
    assert.equal(shellQuote(`it's`), `'it'\\''s'`);
  });
});

describe('renderDownload', () => {
  it('uses the default checkout when a recipe has a source and no hook', () => {
    assert.deepEqual(renderDownload(zlib, win64), DEFAULT_CHECKOUT);
  });

  it('expands the source token inside a custom hook', () => {
    const shaderc = recipe('shaderc', {
      source: { repo: 'https://example.invalid/shaderc.git', commit: 'def456' },
      hooks: { download: [{ lines: ['@source', './utils/git-sync-deps'] }] }
    });

    assert.deepEqual(renderDownload(shaderc, win64), [...DEFAULT_CHECKOUT, './utils/git-sync-deps']);
  });

  it('renders nothing for recipes without source or hook', () => {
    assert.deepEqual(renderDownload(recipe('meta'), win64), []);
  });
});

describe('renderRecipeSection', () => {
  it('runs the recipe in a sub-shell inside its source directory', () => {
    assert.deepEqual(renderRecipeSection(zlib, win64), [
      '',
      '# zlib',
      '(',
      `export SCRIPT_NAME='zlib'`,
      `export SCRIPT_REPO='https://example.invalid/zlib.git'`,
      `export SCRIPT_COMMIT='abc123'`,
      `rm -rf '/ffbuild/src/zlib'`,
      `mkdir -p '/ffbuild/src/zlib'`,
      `cd '/ffbuild/src/zlib'`,
      ...DEFAULT_CHECKOUT,
      './configure --static --prefix="$FFBUILD_PREFIX"',
      'make install',
      ')'
    ]);
  });

  it('leaves out build fragments whose condition does not hold', () => {
    const mingw = recipe('mingw', {
      hooks: { build: [{ lines: ['make'] }, { when: { notTarget: ['win*'] }, lines: ['exit 1'] }] }
    });

    const section = renderRecipeSection(mingw, win64);
    assert.deepEqual(section.slice(-2), ['make', ')']);
    assert.equal(section.includes('exit 1'), false);
  });
});

describe('renderStageScript', () => {
  it('exports the build context before the recipe sections', () => {
    const [stage] = compose([zlib, recipe('dav1d')], win64);
    const lines = renderStageScript(stage, win64).split('\n');

    assert.deepEqual(lines.slice(0, 7), [
      '#!/bin/bash',
      'set -xe',
      `export FFBUILD_TARGET='win64'`,
      `export FFBUILD_VARIANT='gpl'`,
      `export FFBUILD_ADDINS='debug'`,
      'export FFBUILD_PREFIX=/ffbuild/deps',
      'mkdir -p "$FFBUILD_PREFIX"'
    ]);
    assert.ok(lines.includes('# stage-01: zlib, dav1d'));
    assert.ok(lines.includes('# zlib'));
    assert.ok(lines.includes('# dav1d'));
    assert.equal(lines[lines.length - 1], '');
    assert.equal(lines[lines.length - 2], ')');
  });

  it('wraps the recipe sections in setup and teardown lines', () => {
    const [stage] = compose([recipe('dav1d')], win64);
    const lines = renderStageScript(stage, win64, { setup: ['echo setup'], teardown: ['echo teardown'] }).split('\n');

    const header = lines.indexOf('# stage-01: dav1d');
    assert.deepEqual(lines.slice(header, header + 4), ['# stage-01: dav1d', 'echo setup', '', '# dav1d']);
    assert.deepEqual(lines.slice(-4), [')', '', 'echo teardown', '']);
  });
});

describe('collectFfmpegFlags', () => {
  const svtav1 = recipe('svtav1', {
    hooks: {
      configure: [{ lines: ['--enable-libsvtav1'] }],
      unconfigure: [{ lines: ['--disable-libsvtav1'] }]
    }
  });
  const vulkan = recipe('vulkan', {
    hooks: { libs: [{ lines: ['-lvulkan'] }], cflags: [{ when: { addin: ['debug'] }, lines: ['-DVK_DEBUG'] }] }
  });
  const registry = createRegistry([zlib, svtav1, vulkan]);
  const variant: Variant = {
    target: 'win64',
    variant: 'gpl',
    file: '/variants/win64-gpl.yml',
    dependencies: [],
    flags: flags({ configure: ['--enable-gpl'], ldexeflags: ['-static'] }),
    targetFlags: [],
    packageRules: []
  };
  const debug: Addin = {
    name: 'debug',
    file: '/addins/debug.yml',
    dependencies: [],
    flags: flags({ configure: ['--disable-stripping'], cflags: ['-g'] })
  };

  it('orders variant flags, recipe flags, then addin flags', () => {
    const result = collectFfmpegFlags({ registry, plan: [zlib, vulkan], variant, addins: [debug] }, win64);

    assert.deepEqual(result.configure, ['--enable-gpl', '--enable-zlib', '--disable-libsvtav1', '--disable-stripping']);
    assert.deepEqual(result.cflags, ['-I/ffbuild/deps/include', '-DVK_DEBUG', '-g']);
    assert.deepEqual(result.cxxflags, ['-I/ffbuild/deps/include']);
    assert.deepEqual(result.ldflags, ['-L/ffbuild/deps/lib']);
    assert.deepEqual(result.ldexeflags, ['-static']);
    assert.deepEqual(result.libs, ['-lvulkan']);
  });

  it('takes configure flags only from planned recipes', () => {
    const result = collectFfmpegFlags({ registry, plan: [svtav1], variant, addins: [] }, win64);

    assert.deepEqual(result.configure, ['--enable-gpl', '--enable-libsvtav1']);
  });
});

describe('renderFinalScript', () => {
  it('clones the branch and configures against the dependency prefix', () => {
    const script = renderFinalScript(
      {
        ffmpegRepo: 'https://example.invalid/ffmpeg.git',
        gitBranch: 'release/7.1',
        flags: flags({ configure: ['--enable-gpl'], cflags: ['-I/ffbuild/deps/include', '-g'], libs: ['-lm'] }),
        targetFlags: ['--target-os=mingw32']
      },
      win64
    );
    const lines = script.split('\n');

    assert.ok(lines.includes(`git clone --filter=blob:none --branch='release/7.1' 'https://example.invalid/ffmpeg.git' ffmpeg`));
    const configure = lines.indexOf('./configure --prefix=/ffbuild/prefix --pkg-config-flags="--static" \\');
    assert.deepEqual(lines.slice(configure + 1, configure + 3), ['    --target-os=mingw32 \\', '    --enable-gpl \\']);
    assert.equal(lines.filter(line => line.includes('$FFBUILD_TARGET_FLAGS')).length, 0);
    assert.ok(lines.includes('    --enable-gpl \\'));
    assert.ok(lines.includes(`    --extra-cflags='-I/ffbuild/deps/include -g' --extra-cxxflags='' \\`));
    assert.ok(lines.includes(`    --extra-ldflags='' --extra-ldexeflags='' --extra-libs='-lm' \\`));
    assert.deepEqual(lines.slice(-3), ['make -j$(nproc) V=1', 'make install install-doc', '']);
  });

  it('falls back to the image target flags when the variant has none', () => {
    const lines = renderFinalScript(
      { ffmpegRepo: 'https://example.invalid/ffmpeg.git', gitBranch: 'master', flags: flags({}), targetFlags: [] },
      win64
    ).split('\n');

    const configure = lines.indexOf('./configure --prefix=/ffbuild/prefix --pkg-config-flags="--static" \\');
    assert.equal(lines[configure + 1], '    $FFBUILD_TARGET_FLAGS \\');
  });

  it('runs setup lines before the checkout', () => {
    const lines = renderFinalScript(
      {
        ffmpegRepo: 'https://example.invalid/ffmpeg.git',
        gitBranch: 'master',
        flags: flags({}),
        targetFlags: [],
        setup: ['cp -a /ffbuild/stages/stage-01/deps/. "$FFBUILD_PREFIX"']
      },
      win64
    ).split('\n');

    const setup = lines.indexOf('cp -a /ffbuild/stages/stage-01/deps/. "$FFBUILD_PREFIX"');
    assert.equal(lines[setup - 1], '}');
    assert.deepEqual(lines.slice(setup + 1, setup + 3), ['', 'cd /ffbuild']);
  });
});
