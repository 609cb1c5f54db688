import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { parseAddinYml, parseRecipeYml, parseVariantYml, replaceCommitPin } from '../../src/utils/recipe-yml.js';
import { RecipeFormatError } from '../../src/utils/errors.js';
import { DEFAULT_PACKAGE_RULES } from '../../src/constants/index.js';

describe('parseRecipeYml', () => {
  it('reads source, condition, dependencies and hooks', () => {
    const parsed = parseRecipeYml(
      [
        'source:',
        '  repo: https://example.com/shaderc.git',
        '  commit: "abc1234"',
        '  branch: main',
        'enabled:',
        '  notAddin: ["4.4"]',
        '  ffver: ">=5.0"',
        'depends: [vulkan]',
        'download:',
        '  - "@source"',
        '  - ./utils/git-sync-deps',
        'build: |',
        '  cmake ..',
        '  ninja install',
        'unconfigure:',
        '  - when: { notAddin: ["4.4"] }',
        '    run: --disable-libshaderc',
        ''
      ].join('\n'),
      'shaderc.yml'
    );

    assert.deepEqual(parsed.source, {
      repo: 'https://example.com/shaderc.git',
      commit: 'abc1234',
      branch: 'main',
      tagFilter: undefined
    });
    assert.deepEqual(parsed.enabled, { notAddin: ['4.4'], ffver: '>=5.0' });
    assert.deepEqual(parsed.dependencies, ['vulkan']);
    assert.equal(parsed.skip, false);
    assert.deepEqual(parsed.hooks.download, [{ lines: ['@source'] }, { lines: ['./utils/git-sync-deps'] }]);
    assert.deepEqual(parsed.hooks.build, [{ lines: ['cmake ..\nninja install\n'] }]);
    assert.deepEqual(parsed.hooks.unconfigure, [{ when: { notAddin: ['4.4'] }, lines: ['--disable-libshaderc'] }]);
    assert.equal(parsed.hooks.configure, undefined);
  });

  it('accepts numeric scalars where text is expected', () => {
    const parsed = parseRecipeYml('source:\n  repo: r\n  commit: 1234567\n', 'numeric.yml');
    assert.equal(parsed.source?.commit, '1234567');
  });

  it('treats source none as a meta recipe', () => {
    const parsed = parseRecipeYml('source: none\nskip: true\ndepends: [a, b]\n', 'final.yml');
    assert.equal(parsed.source, undefined);
    assert.equal(parsed.skip, true);
    assert.deepEqual(parsed.dependencies, ['a', 'b']);
  });

  it('rejects unknown fields', () => {
    assert.throws(
      () => parseRecipeYml('bogus: 1\n', 'test.yml'),
      (error: unknown) => {
        assert.ok(error instanceof RecipeFormatError);
        assert.equal(error.message, "Invalid declaration in test.yml: unknown field 'bogus' in recipe");
        return true;
      }
    );
  });

  it('requires a commit next to the repo', () => {
    assert.throws(() => parseRecipeYml('source:\n  repo: r\n', 'test.yml'), RecipeFormatError);
  });

  it('rejects invalid version ranges', () => {
    assert.throws(() => parseRecipeYml('enabled:\n  ffver: "not a range"\n', 'test.yml'), RecipeFormatError);
  });

  it('rejects a non-boolean skip', () => {
    assert.throws(() => parseRecipeYml('skip: "yes"\n', 'test.yml'), RecipeFormatError);
  });
});

describe('parseVariantYml', () => {
  it('defaults the package rules', () => {
    const variant = parseVariantYml('target: win64\nvariant: gpl\ndepends: [final]\nconfigure: --enable-gpl\n', 'v.yml');

    assert.equal(variant.target, 'win64');
    assert.deepEqual(variant.dependencies, ['final']);
    assert.deepEqual(variant.flags.configure, ['--enable-gpl']);
    assert.deepEqual(variant.flags.cflags, []);
    assert.deepEqual(variant.packageRules, DEFAULT_PACKAGE_RULES);
  });

  it('fills in copy rule defaults', () => {
    const variant = parseVariantYml('target: win64\nvariant: gpl\npackage:\n  - from: bin\n', 'v.yml');
    assert.deepEqual(variant.packageRules, [{ from: 'bin', to: 'bin', include: ['*'], recursive: false, optional: false }]);
  });

  it('requires target and variant', () => {
    assert.throws(() => parseVariantYml('target: win64\n', 'v.yml'), RecipeFormatError);
  });
});

describe('parseAddinYml', () => {
  it('reads the version as text', () => {
    const addin = parseAddinYml('ffmpegVersion: 4.4\ngitBranch: release/4.4\n', '4.4.yml', '4.4');
    assert.equal(addin.name, '4.4');
    assert.equal(addin.ffmpegVersion, '4.4');
    assert.equal(addin.gitBranch, 'release/4.4');
  });
});

describe('replaceCommitPin', () => {
  it('keeps indentation, quotes and comments', () => {
    const content = 'source:\n  repo: https://example.com/x.git\n  commit: "abc" # pinned\n';
    assert.equal(
      replaceCommitPin(content, 'def'),
      'source:\n  repo: https://example.com/x.git\n  commit: "def" # pinned\n'
    );
  });

  it('rewrites unquoted pins', () => {
    assert.equal(replaceCommitPin('source:\n  commit: abc\n', 'def'), 'source:\n  commit: def\n');
  });

  it('returns null without a commit line', () => {
    assert.equal(replaceCommitPin('source: none\n', 'def'), null);
  });
});
