import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { createBuildContext } from '../../src/core/build-context.js';
import { evaluateCondition, hasHook, isRecipeEnabled, renderFragments, renderHook } from '../../src/core/conditions.js';
import { recipe } from '../test-helpers.js';

const win64 = createBuildContext({ target: 'win64', variant: 'gpl' });
const winarm64 = createBuildContext({ target: 'winarm64', variant: 'gpl' });
const linux44 = createBuildContext({ target: 'linux64', variant: 'lgpl', addins: ['4.4'], ffmpegVersion: '4.4' });

describe('evaluateCondition', () => {
  it('holds when there is no condition', () => {
    assert.equal(evaluateCondition(undefined, win64), true);
    assert.equal(evaluateCondition({}, win64), true);
  });

  it('matches targets as globs', () => {
    assert.equal(evaluateCondition({ target: ['win*'] }, win64), true);
    assert.equal(evaluateCondition({ target: ['win*'] }, linux44), false);
    assert.equal(evaluateCondition({ notTarget: ['winarm*'] }, win64), true);
    assert.equal(evaluateCondition({ notTarget: ['winarm*'] }, winarm64), false);
  });

  it('matches variants', () => {
    assert.equal(evaluateCondition({ variant: ['gpl'] }, win64), true);
    assert.equal(evaluateCondition({ notVariant: ['lgpl'] }, linux44), false);
  });

  it('checks addins by name', () => {
    assert.equal(evaluateCondition({ addin: ['4.4'] }, linux44), true);
    assert.equal(evaluateCondition({ addin: ['4.4'] }, win64), false);
    assert.equal(evaluateCondition({ notAddin: ['4.4'] }, linux44), false);
    assert.equal(evaluateCondition({ notAddin: ['4.4'] }, win64), true);
  });

  it('compares the FFmpeg version against a range', () => {
    const v71 = createBuildContext({ target: 'win64', variant: 'gpl', ffmpegVersion: '7.1' });

    assert.equal(evaluateCondition({ ffver: '>=7.1' }, win64), true);
    assert.equal(evaluateCondition({ ffver: '>=7.1' }, v71), true);
    assert.equal(evaluateCondition({ ffver: '>=7.1' }, linux44), false);
  });

  it('requires every clause to hold', () => {
    assert.equal(evaluateCondition({ target: ['win*'], notTarget: ['winarm*'] }, winarm64), false);
    assert.equal(evaluateCondition({ target: ['win*'], notTarget: ['winarm*'] }, win64), true);
  });
});

describe('hook rendering', () => {
  const mingw = recipe('mingw', {
    enabled: { target: ['win*'] },
    hooks: {
      dockerLayer: [{ when: { notTarget: ['winarm*'] }, lines: ['COPY a', 'COPY b'] }],
      configure: [{ lines: ['--enable-pthreads'] }, { when: { addin: ['debug'] }, lines: ['--enable-debug'] }]
    }
  });

  it('keeps fragments whose condition holds, in order', () => {
    assert.deepEqual(renderHook(mingw, 'dockerLayer', win64), ['COPY a', 'COPY b']);
    assert.deepEqual(renderHook(mingw, 'dockerLayer', winarm64), []);
    assert.deepEqual(renderHook(mingw, 'configure', win64), ['--enable-pthreads']);
  });

  it('renders nothing for undefined hooks', () => {
    assert.deepEqual(renderFragments(undefined, win64), []);
    assert.deepEqual(renderHook(mingw, 'build', win64), []);
  });

  it('treats a hook that renders no line as absent', () => {
    assert.equal(hasHook(mingw, 'dockerLayer', win64), true);
    assert.equal(hasHook(mingw, 'dockerLayer', winarm64), false);
  });

  it('evaluates the recipe enablement', () => {
    assert.equal(isRecipeEnabled(mingw, win64), true);
    assert.equal(isRecipeEnabled(mingw, linux44), false);
  });
});
