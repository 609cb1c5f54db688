/**
 * Recipe, variant and addin declarations as loaded from YAML.
 */

/**
 * Enablement predicate over a build context.
 * Every clause that is present must hold; an empty condition always holds.
 */
export interface Condition {
  /** Glob patterns; holds when any matches the target */
  target?: readonly string[];
  notTarget?: readonly string[];
  variant?: readonly string[];
  notVariant?: readonly string[];
  /** Holds when any of these addins is active */
  addin?: readonly string[];
  /** Holds when none of these addins is active */
  notAddin?: readonly string[];
  /** Semver range tested against the FFmpeg version being built */
  ffver?: string;
}

/**
 * One piece of a lifecycle hook. Lines are emitted only when `when` holds.
 */
export interface HookFragment {
  when?: Condition;
  lines: readonly string[];
}

export type HookName =
  | 'download'
  | 'build'
  | 'dockerLayer'
  | 'dockerStage'
  | 'dockerFinal'
  | 'configure'
  | 'unconfigure'
  | 'cflags'
  | 'cxxflags'
  | 'ldflags'
  | 'ldexeflags'
  | 'libs';

export type RecipeHooks = Partial<Record<HookName, readonly HookFragment[]>>;

export interface RecipeSource {
  repo: string;
  commit: string;
  branch?: string;
  /** Tag glob passed to `git ls-remote refs/tags/<tagFilter>` when refreshing the pin */
  tagFilter?: string;
}

export interface Recipe {
  name: string;
  /** Absolute path of the declaring file */
  file: string;
  /** Sub-directory of the search path the recipe was found in */
  group?: string;
  source?: RecipeSource;
  enabled?: Condition;
  dependencies: readonly string[];
  /** Aggregator-only: resolved but never built in a container stage */
  skip: boolean;
  hooks: RecipeHooks;
}

export type RecipeRegistry = ReadonlyMap<string, Recipe>;

export type FlagField = 'configure' | 'cflags' | 'cxxflags' | 'ldflags' | 'ldexeflags' | 'libs';

export type FlagSet = Record<FlagField, readonly string[]>;

export interface PackageRule {
  /** Directory relative to the installation prefix */
  from: string;
  /** Directory relative to the package root */
  to: string;
  include: readonly string[];
  recursive: boolean;
  optional: boolean;
}

export interface Variant {
  target: string;
  variant: string;
  file: string;
  image?: string;
  dependencies: readonly string[];
  flags: FlagSet;
  targetFlags: readonly string[];
  licenseFile?: string;
  packageRules: readonly PackageRule[];
}

export interface Addin {
  name: string;
  file: string;
  ffmpegVersion?: string;
  gitBranch?: string;
  dependencies: readonly string[];
  flags: FlagSet;
}

export interface Stage {
  index: number;
  name: string;
  recipes: readonly Recipe[];
  /** Indices of earlier stages holding a direct dependency of one of this stage's recipes */
  dependsOn: readonly number[];
}
