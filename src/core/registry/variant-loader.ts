/**
 * Variant and addin lookup.
 * A variant lives in `<target>-<variant>.yml`, an addin in `<name>.yml`;
 * the first search path holding the file wins.
 */

import { join } from 'path';
import type { Addin, Variant } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { parseAddinYml, parseVariantYml } from '../../utils/recipe-yml.js';
import { RecipeFormatError, UnknownVariantError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

async function findDeclaration(searchPaths: readonly string[], baseName: string): Promise<string | null> {
  for (const searchPath of searchPaths) {
    for (const extension of FILE_PATTERNS.YAML_EXTENSIONS) {
      const candidate = join(searchPath, `${baseName}${extension}`);
      if (await exists(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

export async function loadVariant(searchPaths: readonly string[], target: string, variant: string): Promise<Variant> {
  const file = await findDeclaration(searchPaths, `${target}-${variant}`);
  if (!file) {
    throw new UnknownVariantError('variant', `${target}-${variant}`, searchPaths);
  }

  const declared = parseVariantYml(await readTextFile(file), file);
  if (declared.target !== target || declared.variant !== variant) {
    throw new RecipeFormatError(
      file,
      `declares ${declared.target}-${declared.variant} but was selected as ${target}-${variant}`
    );
  }

  logger.debug(`Loaded variant ${target}-${variant}`, { file });
  return declared;
}

export async function loadAddins(searchPaths: readonly string[], names: readonly string[]): Promise<Addin[]> {
  const addins: Addin[] = [];
  for (const name of names) {
    const file = await findDeclaration(searchPaths, name);
    if (!file) {
      throw new UnknownVariantError('addin', name, searchPaths);
    }
    addins.push(parseAddinYml(await readTextFile(file), file, name));
  }
  return addins;
}

/**
 * The FFmpeg version is set by the last addin that declares one.
 */
export function selectFfmpegVersion(addins: readonly Addin[]): string | undefined {
  let version: string | undefined;
  for (const addin of addins) {
    version = addin.ffmpegVersion ?? version;
  }
  return version;
}

export function selectGitBranch(addins: readonly Addin[]): string | undefined {
  let branch: string | undefined;
  for (const addin of addins) {
    branch = addin.gitBranch ?? branch;
  }
  return branch;
}
