import { isAbsolute, join, relative, resolve } from 'path';
import type { FfbuildConfig } from '../types/index.js';
import { DEFAULT_CONFIG, FILE_PATTERNS } from '../constants/index.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Configuration for the ffbuild CLI.
 * An optional ffbuild.config.jsonc (or .json) in the working directory is
 * merged over the defaults, then environment overrides apply. Relative
 * paths are resolved against the working directory.
 */

const PATH_LIST_KEYS = ['recipePaths', 'variantPaths', 'addinPaths'] as const;
const STRING_KEYS = ['workDir', 'artifactsDir', 'registry', 'imageRepo', 'ffmpegRepo', 'gitBranch', 'outputDir'] as const;
const KNOWN_KEYS: ReadonlySet<string> = new Set<string>([...PATH_LIST_KEYS, ...STRING_KEYS, 'jobs']);

type PathListKey = typeof PATH_LIST_KEYS[number];
type StringKey = typeof STRING_KEYS[number];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJobs(value: unknown, origin: string): number {
  const jobs = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof jobs !== 'number' || !Number.isInteger(jobs) || jobs < 1) {
    throw new ConfigError(`${origin} must be a positive integer, got ${JSON.stringify(value)}`);
  }
  return jobs;
}

/**
 * Validate a parsed config file and merge it over the defaults.
 */
export function parseConfig(raw: unknown, file: string): FfbuildConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${file} must contain an object`);
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigError(`Unknown option '${key}' in ${file}`);
    }
  }

  const config: FfbuildConfig = { ...DEFAULT_CONFIG };

  const readPathList = (key: PathListKey): void => {
    const value = raw[key];
    if (value === undefined) return;
    if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === 'string')) {
      throw new ConfigError(`'${key}' in ${file} must be a list of paths`);
    }
    config[key] = [...value];
  };

  const readString = (key: StringKey): void => {
    const value = raw[key];
    if (value === undefined) return;
    if (typeof value !== 'string' || value === '') {
      throw new ConfigError(`'${key}' in ${file} must be a non-empty string`);
    }
    config[key] = value;
  };

  PATH_LIST_KEYS.forEach(readPathList);
  STRING_KEYS.forEach(readString);
  if (raw.jobs !== undefined) {
    config.jobs = parseJobs(raw.jobs, `'jobs' in ${file}`);
  }
  return config;
}

/**
 * Environment overrides. The addin-level branch override sits between
 * GIT_BRANCH and GIT_BRANCH_OVERRIDE and is applied by resolveGitBranch.
 */
export function applyEnvOverrides(config: FfbuildConfig, env: NodeJS.ProcessEnv): FfbuildConfig {
  const result: FfbuildConfig = { ...config };
  const ffmpegRepo = env.FFMPEG_REPO_OVERRIDE || env.FFMPEG_REPO;
  if (ffmpegRepo) result.ffmpegRepo = ffmpegRepo;
  if (env.GIT_BRANCH) result.gitBranch = env.GIT_BRANCH;
  if (env.FFBUILD_OUTPUT_DIR) result.outputDir = env.FFBUILD_OUTPUT_DIR;
  if (env.REGISTRY) result.registry = env.REGISTRY;
  if (env.REPO) result.imageRepo = env.REPO;
  if (env.FFBUILD_JOBS) result.jobs = parseJobs(env.FFBUILD_JOBS, 'FFBUILD_JOBS');
  return result;
}

function resolvePaths(config: FfbuildConfig, cwd: string): FfbuildConfig {
  const abs = (path: string): string => (isAbsolute(path) ? path : resolve(cwd, path));
  return {
    ...config,
    recipePaths: config.recipePaths.map(abs),
    variantPaths: config.variantPaths.map(abs),
    addinPaths: config.addinPaths.map(abs),
    workDir: abs(config.workDir),
    artifactsDir: abs(config.artifactsDir),
    outputDir: config.outputDir === undefined ? undefined : abs(config.outputDir)
  };
}

async function findConfigFile(cwd: string): Promise<string | null> {
  for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
    const path = join(cwd, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Load the configuration for a working directory.
 */
export async function loadConfig(cwd: string, env: NodeJS.ProcessEnv = process.env): Promise<FfbuildConfig> {
  const configPath = await findConfigFile(cwd);
  let config: FfbuildConfig;

  if (configPath) {
    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      throw new ConfigError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`, {
        file: configPath
      });
    }
    config = parseConfig(raw, configPath);
  } else {
    logger.debug('Config file not found, using defaults');
    config = { ...DEFAULT_CONFIG };
  }

  const resolved = resolvePaths(applyEnvOverrides(config, env), cwd);
  // The work directory is wiped before every build.
  const fromWorkDir = relative(resolved.workDir, cwd);
  if (fromWorkDir === '' || (!fromWorkDir.startsWith('..') && !isAbsolute(fromWorkDir))) {
    throw new ConfigError(`'workDir' must not contain the working directory: ${resolved.workDir}`);
  }
  return resolved;
}

/**
 * Branch of the FFmpeg checkout: GIT_BRANCH_OVERRIDE, then the addin's
 * branch, then the configured branch (which already includes GIT_BRANCH).
 */
export function resolveGitBranch(
  config: FfbuildConfig,
  addinBranch: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  return env.GIT_BRANCH_OVERRIDE || addinBranch || config.gitBranch;
}

export function getImageName(config: FfbuildConfig, target: string, variantImage?: string): string {
  return variantImage ?? `${config.registry}/${config.imageRepo}/base-${target}:latest`;
}
