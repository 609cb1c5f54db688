import { BuildError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in the ffbuild CLI
 */

export class DuplicateRecipeError extends BuildError {
  constructor(
    public readonly recipeName: string,
    public readonly firstFile: string,
    public readonly secondFile: string
  ) {
    super(
      `Recipe '${recipeName}' is declared twice: ${firstFile} and ${secondFile}`,
      ErrorCodes.DUPLICATE_RECIPE,
      { recipeName, firstFile, secondFile }
    );
    this.name = 'DuplicateRecipeError';
  }
}

export class UnknownDependencyError extends BuildError {
  constructor(
    public readonly dependencyName: string,
    public readonly requiredBy?: string
  ) {
    const origin = requiredBy ? `required by '${requiredBy}'` : 'requested by the build';
    super(
      `Unknown recipe '${dependencyName}' (${origin})`,
      ErrorCodes.UNKNOWN_DEPENDENCY,
      { dependencyName, requiredBy }
    );
    this.name = 'UnknownDependencyError';
  }
}

export class CycleError extends BuildError {
  constructor(public readonly path: readonly string[]) {
    super(`Circular dependency detected: ${path.join(' -> ')}`, ErrorCodes.DEPENDENCY_CYCLE, { path: [...path] });
    this.name = 'CycleError';
  }
}

export class StageExecutionError extends BuildError {
  constructor(
    public readonly stageIndex: number,
    public readonly stageName: string,
    public readonly exitCode: number,
    public readonly recipes: readonly string[] = []
  ) {
    const which = recipes.length > 0 ? ` (${recipes.join(', ')})` : '';
    super(
      `Stage ${stageName}${which} failed with exit code ${exitCode}`,
      ErrorCodes.STAGE_FAILED,
      { stageIndex, stageName, exitCode, recipes: [...recipes] }
    );
    this.name = 'StageExecutionError';
  }
}

export class PackagingError extends BuildError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Packaging failed: ${message}`, ErrorCodes.PACKAGING_FAILED, details);
    this.name = 'PackagingError';
  }
}

export class RecipeFormatError extends BuildError {
  constructor(file: string, reason: string) {
    super(`Invalid declaration in ${file}: ${reason}`, ErrorCodes.INVALID_RECIPE, { file, reason });
    this.name = 'RecipeFormatError';
  }
}

export class UnknownVariantError extends BuildError {
  constructor(kind: 'variant' | 'addin', name: string, searched: readonly string[]) {
    super(
      `Unknown ${kind} '${name}' (searched: ${searched.join(', ') || 'nothing'})`,
      ErrorCodes.UNKNOWN_VARIANT,
      { kind, name, searched: [...searched] }
    );
    this.name = 'UnknownVariantError';
  }
}

export class FileSystemError extends BuildError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends BuildError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends BuildError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof StageExecutionError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message,
      exitCode: error.exitCode
    };
  } else if (error instanceof BuildError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message,
      exitCode: 1
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message,
      exitCode: 1
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred',
      exitCode: 1
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(`❌ ${result.error}`);
      process.exit(result.exitCode ?? 1);
    }
  };
}
