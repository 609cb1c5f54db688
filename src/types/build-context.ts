/**
 * Build Context Types
 *
 * Immutable snapshot of one build invocation. Every enablement
 * predicate and hook receives it explicitly.
 */

export interface BuildContext {
  /** Target platform, e.g. win64, linux64, winarm64 */
  readonly target: string;

  /** Build variant, e.g. gpl, lgpl-shared */
  readonly variant: string;

  /** Active addins in command-line order */
  readonly addins: readonly string[];

  /** Addins joined by '-', empty when none are active */
  readonly addinsStr: string;

  /**
   * FFmpeg version being built: a release such as "7.1", or "master".
   */
  readonly ffmpegVersion: string;
}

export interface BuildContextOptions {
  target: string;
  variant: string;
  addins?: readonly string[];
  ffmpegVersion?: string;
}
