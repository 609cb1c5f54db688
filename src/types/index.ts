/**
 * Common types and interfaces for the ffbuild CLI application
 */

export * from './recipe.js';
export * from './build-context.js';

// Core application types
export interface FfbuildConfig {
  recipePaths: string[];
  variantPaths: string[];
  addinPaths: string[];
  workDir: string;
  artifactsDir: string;
  registry: string;
  imageRepo: string;
  ffmpegRepo: string;
  gitBranch: string;
  jobs: number;
  outputDir?: string;
}

// Command option types

export interface BuildOptions {
  outputDir?: string;
  jobs?: number;
  stagePerRecipe?: boolean;
  dryRun?: boolean;
}

export interface GenerateOptions {
  output?: string;
  stagePerRecipe?: boolean;
}

export interface PlanOptions {
  stagePerRecipe?: boolean;
  flags?: boolean;
}

export interface UpdateOptions {
  dryRun?: boolean;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  exitCode?: number;
  warnings?: string[];
}

// Error types
export class BuildError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'BuildError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  DUPLICATE_RECIPE = 'DUPLICATE_RECIPE',
  UNKNOWN_DEPENDENCY = 'UNKNOWN_DEPENDENCY',
  DEPENDENCY_CYCLE = 'DEPENDENCY_CYCLE',
  STAGE_FAILED = 'STAGE_FAILED',
  PACKAGING_FAILED = 'PACKAGING_FAILED',
  INVALID_RECIPE = 'INVALID_RECIPE',
  UNKNOWN_VARIANT = 'UNKNOWN_VARIANT',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
