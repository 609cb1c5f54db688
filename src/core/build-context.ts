/**
 * Build context construction.
 *
 * The context replaces the process-wide TARGET / VARIANT / ADDINS state a
 * shell build would read implicitly; it is frozen so predicates and hooks
 * cannot alter it mid-build.
 */

import * as semver from 'semver';
import type { BuildContext, BuildContextOptions } from '../types/index.js';
import { MASTER_FFMPEG_SEMVER, MASTER_FFMPEG_VERSION } from '../constants/index.js';
import { ValidationError } from '../utils/errors.js';

const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._]*$/;

function assertName(kind: string, value: string): void {
  if (!NAME_PATTERN.test(value)) {
    throw new ValidationError(`${kind} '${value}' must be alphanumeric (dots and underscores allowed)`);
  }
}

export function createBuildContext(options: BuildContextOptions): BuildContext {
  assertName('target', options.target);
  assertName('variant', options.variant);
  const addins = Object.freeze([...(options.addins ?? [])]);
  for (const addin of addins) {
    assertName('addin', addin);
  }

  const ffmpegVersion = options.ffmpegVersion ?? MASTER_FFMPEG_VERSION;
  if (ffmpegVersion !== MASTER_FFMPEG_VERSION && !semver.coerce(ffmpegVersion)) {
    throw new ValidationError(`FFmpeg version '${ffmpegVersion}' is neither '${MASTER_FFMPEG_VERSION}' nor a release number`);
  }

  return Object.freeze({
    target: options.target,
    variant: options.variant,
    addins,
    addinsStr: addins.join('-'),
    ffmpegVersion
  });
}

/**
 * FFmpeg version as a full semver string, "7.1" -> "7.1.0".
 */
export function getFfmpegSemver(context: BuildContext): string {
  if (context.ffmpegVersion === MASTER_FFMPEG_VERSION) {
    return MASTER_FFMPEG_SEMVER;
  }
  const coerced = semver.coerce(context.ffmpegVersion);
  if (!coerced) {
    throw new ValidationError(`Cannot interpret FFmpeg version '${context.ffmpegVersion}'`);
  }
  return coerced.version;
}

/**
 * `<target>-<variant>[-<addins>]`, the suffix used in build and artifact names.
 */
export function getContextLabel(context: BuildContext): string {
  const base = `${context.target}-${context.variant}`;
  return context.addinsStr ? `${base}-${context.addinsStr}` : base;
}
