import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  CycleError,
  DuplicateRecipeError,
  PackagingError,
  StageExecutionError,
  UnknownDependencyError,
  handleError
} from '../../src/utils/errors.js';
import { BuildError, ErrorCodes } from '../../src/types/index.js';

describe('error messages', () => {
  it('names both files of a duplicate recipe', () => {
    const error = new DuplicateRecipeError('zlib', '/a/20-zlib.yml', '/b/zlib.yml');
    assert.equal(error.message, "Recipe 'zlib' is declared twice: /a/20-zlib.yml and /b/zlib.yml");
    assert.equal(error.code, ErrorCodes.DUPLICATE_RECIPE);
  });

  it('names the missing dependency and who needs it', () => {
    assert.equal(new UnknownDependencyError('x265', 'final').message, "Unknown recipe 'x265' (required by 'final')");
    assert.equal(new UnknownDependencyError('x265').message, "Unknown recipe 'x265' (requested by the build)");
  });

  it('prints the cycle path', () => {
    const error = new CycleError(['a', 'b', 'a']);
    assert.equal(error.message, 'Circular dependency detected: a -> b -> a');
    assert.deepEqual(error.path, ['a', 'b', 'a']);
  });

  it('names the stage and its recipes', () => {
    const error = new StageExecutionError(1, 'stage-02', 2, ['dav1d', 'svtav1']);
    assert.equal(error.message, 'Stage stage-02 (dav1d, svtav1) failed with exit code 2');
    assert.equal(error.stageIndex, 1);
    assert.equal(error.exitCode, 2);
  });

  it('keeps packaging errors apart from build errors', () => {
    const error = new PackagingError('no files');
    assert.equal(error.message, 'Packaging failed: no files');
    assert.equal(error.code, ErrorCodes.PACKAGING_FAILED);
    assert.ok(error instanceof BuildError);
  });
});

describe('handleError', () => {
  it('uses the exit code of a failed stage', () => {
    const result = handleError(new StageExecutionError(0, 'stage-01', 42));
    assert.deepEqual(result, { success: false, error: 'Stage stage-01 failed with exit code 42', exitCode: 42 });
  });

  it('exits with 1 for other errors', () => {
    assert.equal(handleError(new CycleError(['a', 'a'])).exitCode, 1);
    assert.deepEqual(handleError(new Error('boom')), { success: false, error: 'boom', exitCode: 1 });
    assert.deepEqual(handleError('boom'), { success: false, error: 'An unknown error occurred', exitCode: 1 });
  });
});
