/**
 * Shell script rendering for container stages and the final FFmpeg build.
 */

import type { Addin, BuildContext, FlagField, FlagSet, Recipe, RecipeRegistry, Stage, Variant } from '../../types/index.js';
import { CONTAINER_PATHS, DEFAULT_DOWNLOAD_TOKEN, FLAG_FIELDS } from '../../constants/index.js';
import { renderHook } from '../conditions.js';

/**
 * Quote a value for POSIX shells.
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

const RETRY_FUNCTION = [
  'ffbuild_retry() {',
  '    local attempt',
  '    for attempt in 1 2 3; do',
  '        "$@" && return 0',
  '        echo "Attempt $attempt failed: $*" >&2',
  '        sleep $((attempt * 5))',
  '    done',
  '    return 1',
  '}'
];

function renderPrelude(context: BuildContext): string[] {
  return [
    '#!/bin/bash',
    'set -xe',
    `export FFBUILD_TARGET=${shellQuote(context.target)}`,
    `export FFBUILD_VARIANT=${shellQuote(context.variant)}`,
    `export FFBUILD_ADDINS=${shellQuote(context.addinsStr)}`,
    `export FFBUILD_PREFIX=${CONTAINER_PATHS.DEPS_PREFIX}`,
    'mkdir -p "$FFBUILD_PREFIX"',
    '',
    ...RETRY_FUNCTION
  ];
}

function defaultDownload(): string[] {
  return [
    'ffbuild_retry git clone --filter=blob:none --no-checkout "$SCRIPT_REPO" .',
    'git checkout "$SCRIPT_COMMIT"'
  ];
}

/**
 * Download commands of a recipe: its own download hook (where `@source`
 * stands for the default checkout), else the default checkout when it
 * has a source, else nothing.
 */
export function renderDownload(recipe: Recipe, context: BuildContext): string[] {
  const hook = renderHook(recipe, 'download', context);
  if (hook.length === 0) {
    return recipe.source ? defaultDownload() : [];
  }
  return hook.flatMap(line => (line.trim() === DEFAULT_DOWNLOAD_TOKEN ? defaultDownload() : [line]));
}

/**
 * One sub-shell per recipe so `cd` and exported variables stay local.
 * Hook lines are emitted unindented; recipes may contain heredocs.
 */
export function renderRecipeSection(recipe: Recipe, context: BuildContext): string[] {
  const workDir = `${CONTAINER_PATHS.SOURCES}/${recipe.name}`;
  const lines = [
    '',
    `# ${recipe.name}`,
    '(',
    `export SCRIPT_NAME=${shellQuote(recipe.name)}`
  ];
  if (recipe.source) {
    lines.push(`export SCRIPT_REPO=${shellQuote(recipe.source.repo)}`);
    lines.push(`export SCRIPT_COMMIT=${shellQuote(recipe.source.commit)}`);
  }
  lines.push(`rm -rf ${shellQuote(workDir)}`);
  lines.push(`mkdir -p ${shellQuote(workDir)}`);
  lines.push(`cd ${shellQuote(workDir)}`);
  lines.push(...renderDownload(recipe, context));
  lines.push(...renderHook(recipe, 'build', context));
  lines.push(')');
  return lines;
}

export interface StageShell {
  /** Run after the prelude, before the first recipe */
  setup?: readonly string[];
  /** Run after the last recipe */
  teardown?: readonly string[];
}

export function renderStageScript(stage: Stage, context: BuildContext, shell: StageShell = {}): string {
  const lines = [
    ...renderPrelude(context),
    '',
    `# ${stage.name}: ${stage.recipes.map(r => r.name).join(', ')}`,
    ...(shell.setup ?? [])
  ];
  for (const recipe of stage.recipes) {
    lines.push(...renderRecipeSection(recipe, context));
  }
  if (shell.teardown && shell.teardown.length > 0) {
    lines.push('', ...shell.teardown);
  }
  return lines.join('\n') + '\n';
}

export interface FlagSources {
  registry: RecipeRegistry;
  plan: readonly Recipe[];
  variant: Variant;
  addins: readonly Addin[];
}

/**
 * Flags for FFmpeg's configure. Planned recipes contribute their configure
 * flags; every other registered recipe contributes its unconfigure flags.
 * Variant flags come first and addin flags last.
 */
export function collectFfmpegFlags(sources: FlagSources, context: BuildContext): FlagSet {
  const planned = new Set(sources.plan.map(recipe => recipe.name));
  const collected: Record<FlagField, string[]> = {
    configure: [...sources.variant.flags.configure],
    cflags: [`-I${CONTAINER_PATHS.DEPS_PREFIX}/include`, ...sources.variant.flags.cflags],
    cxxflags: [`-I${CONTAINER_PATHS.DEPS_PREFIX}/include`, ...sources.variant.flags.cxxflags],
    ldflags: [`-L${CONTAINER_PATHS.DEPS_PREFIX}/lib`, ...sources.variant.flags.ldflags],
    ldexeflags: [...sources.variant.flags.ldexeflags],
    libs: [...sources.variant.flags.libs]
  };

  for (const recipe of sources.registry.values()) {
    if (!planned.has(recipe.name)) {
      collected.configure.push(...renderHook(recipe, 'unconfigure', context));
      continue;
    }
    for (const field of FLAG_FIELDS) {
      collected[field].push(...renderHook(recipe, field, context));
    }
  }

  for (const addin of sources.addins) {
    for (const field of FLAG_FIELDS) {
      collected[field].push(...addin.flags[field]);
    }
  }

  return collected;
}

export interface FinalScriptOptions {
  ffmpegRepo: string;
  gitBranch: string;
  flags: FlagSet;
  /** Overrides the base image's $FFBUILD_TARGET_FLAGS when not empty */
  targetFlags: readonly string[];
  /** Run after the prelude, before the checkout */
  setup?: readonly string[];
}

/**
 * The FFmpeg build: clone, configure against the dependency prefix,
 * compile and install into the shared installation prefix.
 */
export function renderFinalScript(options: FinalScriptOptions, context: BuildContext): string {
  const extra = (field: FlagField): string => shellQuote(options.flags[field].join(' '));
  const targetFlags = options.targetFlags.length > 0 ? options.targetFlags : ['$FFBUILD_TARGET_FLAGS'];
  const configure = [
    `./configure --prefix=${CONTAINER_PATHS.PREFIX} --pkg-config-flags="--static"`,
    ...targetFlags,
    ...options.flags.configure,
    `--extra-cflags=${extra('cflags')} --extra-cxxflags=${extra('cxxflags')}`,
    `--extra-ldflags=${extra('ldflags')} --extra-ldexeflags=${extra('ldexeflags')} --extra-libs=${extra('libs')}`,
    '--cc="$CC" --cxx="$CXX" --ar="$AR" --ranlib="$RANLIB" --nm="$NM"',
    '--extra-version="$(date +%Y%m%d)"'
  ];

  const lines = [
    ...renderPrelude(context),
    ...(options.setup ?? []),
    '',
    `cd ${CONTAINER_PATHS.ROOT}`,
    'rm -rf ffmpeg prefix',
    '',
    `git clone --filter=blob:none --branch=${shellQuote(options.gitBranch)} ${shellQuote(options.ffmpegRepo)} ffmpeg`,
    'cd ffmpeg',
    '',
    'export PKG_CONFIG_PATH="$FFBUILD_PREFIX/lib/pkgconfig${PKG_CONFIG_PATH:+:$PKG_CONFIG_PATH}"',
    configure.join(' \\\n    '),
    'make -j$(nproc) V=1',
    'make install install-doc'
  ];
  return lines.join('\n') + '\n';
}
