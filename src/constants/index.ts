/**
 * Shared constants for the ffbuild CLI application
 * Single source of truth for directory names, file patterns,
 * container paths and defaults.
 */

import type { FfbuildConfig, HookName, FlagField, PackageRule } from '../types/index.js';

export const FILE_PATTERNS = {
  CONFIG_FILES: ['ffbuild.config.jsonc', 'ffbuild.config.json'],
  YAML_EXTENSIONS: ['.yml', '.yaml'],
  DOCKERFILE: 'Dockerfile',
  FINAL_SCRIPT: 'final.sh'
} as const;

export const DEFAULT_DIRS = {
  RECIPES: 'recipes',
  VARIANTS: 'variants',
  ADDINS: 'addins',
  WORK: 'ffbuild',
  ARTIFACTS: 'artifacts'
} as const;

/**
 * Layout of the work directory, which is mounted at CONTAINER_PATHS.ROOT
 */
export const WORK_LAYOUT = {
  STAGES: 'stages',
  /** Captured layer paths, per stage directory */
  LAYER: 'layer',
  SOURCES: 'src',
  DEPS_PREFIX: 'deps',
  PREFIX: 'prefix',
  FFMPEG: 'ffmpeg',
  PKGROOT: 'pkgroot'
} as const;

export const CONTAINER_PATHS = {
  ROOT: '/ffbuild',
  SCRIPT: '/build.sh',
  STAGES: `/ffbuild/${WORK_LAYOUT.STAGES}`,
  SOURCES: `/ffbuild/${WORK_LAYOUT.SOURCES}`,
  DEPS_PREFIX: `/ffbuild/${WORK_LAYOUT.DEPS_PREFIX}`,
  PREFIX: `/ffbuild/${WORK_LAYOUT.PREFIX}`,
  OUT: '/out'
} as const;

/** FFmpeg versions compare as semver; the development branch outranks every release */
export const MASTER_FFMPEG_VERSION = 'master';
export const MASTER_FFMPEG_SEMVER = '9999.0.0';

export const HOOK_NAMES: readonly HookName[] = [
  'download',
  'build',
  'dockerLayer',
  'dockerStage',
  'dockerFinal',
  'configure',
  'unconfigure',
  'cflags',
  'cxxflags',
  'ldflags',
  'ldexeflags',
  'libs'
];

export const FLAG_FIELDS: readonly FlagField[] = ['configure', 'cflags', 'cxxflags', 'ldflags', 'ldexeflags', 'libs'];

/** Placeholder a download hook may use to include the default git checkout */
export const DEFAULT_DOWNLOAD_TOKEN = '@source';

export const LAYER_PLACEHOLDERS = {
  SELF: '${SELFLAYER}',
  PREV: '${PREVLAYER}'
} as const;

export const DEFAULT_CONFIG: FfbuildConfig = {
  recipePaths: [DEFAULT_DIRS.RECIPES],
  variantPaths: [DEFAULT_DIRS.VARIANTS],
  addinPaths: [DEFAULT_DIRS.ADDINS],
  workDir: DEFAULT_DIRS.WORK,
  artifactsDir: DEFAULT_DIRS.ARTIFACTS,
  registry: 'ghcr.io',
  imageRepo: 'ffbuild',
  ffmpegRepo: 'https://github.com/FFmpeg/FFmpeg.git',
  gitBranch: 'master',
  jobs: 1
};

/**
 * Static install layout: executables, static libraries, pkg-config files,
 * headers and documentation.
 */
export const DEFAULT_PACKAGE_RULES: readonly PackageRule[] = [
  { from: 'bin', to: 'bin', include: ['*'], recursive: false, optional: false },
  { from: 'lib', to: 'lib', include: ['*.a'], recursive: false, optional: false },
  { from: 'lib/pkgconfig', to: 'lib/pkgconfig', include: ['*.pc'], recursive: false, optional: false },
  { from: 'include', to: 'include', include: ['**'], recursive: true, optional: false },
  { from: 'share/doc/ffmpeg', to: 'doc', include: ['**'], recursive: true, optional: false }
];
