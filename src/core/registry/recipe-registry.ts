/**
 * Recipe registry.
 * Discovers every recipe file under the search paths and keys it by name.
 * Enablement is not evaluated here; that needs a build context.
 */

import { basename, extname, join, posix } from 'path';
import type { Recipe, RecipeRegistry } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { isDirectory, readTextFile, walkFiles } from '../../utils/fs.js';
import { parseRecipeYml } from '../../utils/recipe-yml.js';
import { DuplicateRecipeError, RecipeFormatError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const ORDER_PREFIX = /^\d+-/;

function isYamlFile(fileName: string): boolean {
  const extension = extname(fileName);
  return FILE_PATTERNS.YAML_EXTENSIONS.some(candidate => candidate === extension);
}

/**
 * `50-svtav1.yml` -> `svtav1`
 */
export function recipeNameFromFile(fileName: string): string {
  const base = basename(fileName, extname(fileName));
  return base.replace(ORDER_PREFIX, '');
}

/**
 * Load all recipes. Declaration order is the search path order, then the
 * sorted walk of each path, so numeric file prefixes control it.
 */
export async function loadRegistry(searchPaths: readonly string[]): Promise<RecipeRegistry> {
  const registry = new Map<string, Recipe>();

  for (const searchPath of searchPaths) {
    if (!(await isDirectory(searchPath))) {
      logger.warn(`Recipe search path does not exist: ${searchPath}`);
      continue;
    }

    for await (const relativePath of walkFiles(searchPath)) {
      if (!isYamlFile(relativePath)) {
        continue;
      }

      const file = join(searchPath, relativePath);
      const parsed = parseRecipeYml(await readTextFile(file), file);
      const name = parsed.name ?? recipeNameFromFile(relativePath);
      if (!name) {
        throw new RecipeFormatError(file, 'recipe name is empty');
      }

      const existing = registry.get(name);
      if (existing) {
        throw new DuplicateRecipeError(name, existing.file, file);
      }

      const groupDir = posix.dirname(relativePath);
      registry.set(name, {
        ...parsed,
        name,
        file,
        group: groupDir === '.' ? undefined : groupDir
      });
    }
  }

  logger.debug(`Loaded ${registry.size} recipes`, { searchPaths: [...searchPaths] });
  return registry;
}

/**
 * Build a registry from in-memory recipes; later duplicates are rejected like on disk.
 */
export function createRegistry(recipes: readonly Recipe[]): RecipeRegistry {
  const registry = new Map<string, Recipe>();
  for (const recipe of recipes) {
    const existing = registry.get(recipe.name);
    if (existing) {
      throw new DuplicateRecipeError(recipe.name, existing.file, recipe.file);
    }
    registry.set(recipe.name, recipe);
  }
  return registry;
}
