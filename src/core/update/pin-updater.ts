/**
 * Pin updater.
 * Looks up the newest commit of each recipe's source with `git ls-remote`
 * and rewrites the `commit:` line of the recipe file when it moved.
 */

import type { Recipe, RecipeRegistry, RecipeSource } from '../../types/index.js';
import type { ProcessRunner } from '../ports/process.js';
import { readTextFile, writeTextFile } from '../../utils/fs.js';
import { replaceCommitPin } from '../../utils/recipe-yml.js';
import { spawnRunner } from '../../utils/process.js';
import { UnknownDependencyError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export type PinStatus = 'updated' | 'current' | 'manual' | 'failed';

export interface PinReport {
  name: string;
  file: string;
  status: PinStatus;
  from?: string;
  to?: string;
  reason?: string;
}

export interface UpdatePinsOptions {
  /** Report what would change without writing recipe files */
  dryRun?: boolean;
  onReport?: (report: PinReport) => void;
}

function firstField(line: string | undefined): string | null {
  const field = line?.trim().split(/\s+/)[0];
  return field ? field : null;
}

export class PinUpdater {
  constructor(private readonly processes: ProcessRunner = spawnRunner) {}

  private async lsRemote(args: string[]): Promise<string[]> {
    const result = await this.processes.run('git', ['ls-remote', ...args], {
      stdio: 'pipe',
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' }
    });
    if (result.exitCode !== 0) {
      throw new Error(result.stderr.trim() || `git ls-remote exited with ${result.exitCode}`);
    }
    return result.stdout.split('\n').filter(line => line.trim() !== '');
  }

  /**
   * The remote's default branch, from the symbolic HEAD ref.
   */
  async getDefaultBranch(repo: string): Promise<string | null> {
    const lines = await this.lsRemote(['--symref', repo, 'HEAD']);
    for (const line of lines) {
      const match = /^ref:\s+refs\/heads\/(\S+)\s+HEAD$/.exec(line.trim());
      if (match) {
        return match[1];
      }
    }
    return null;
  }

  /**
   * Newest commit for a source: the last tag matching its tag filter, or
   * the head of its branch (the remote's default branch when unset).
   */
  async getLatestCommit(source: RecipeSource): Promise<string | null> {
    if (source.tagFilter) {
      const lines = await this.lsRemote(['--tags', '--refs', source.repo, `refs/tags/${source.tagFilter}`]);
      return firstField(lines[lines.length - 1]);
    }

    const branch = source.branch ?? (await this.getDefaultBranch(source.repo));
    if (!branch) {
      return null;
    }
    const lines = await this.lsRemote(['--heads', source.repo, `refs/heads/${branch}`]);
    return firstField(lines[0]);
  }

  async updateRecipe(recipe: Recipe, options: UpdatePinsOptions = {}): Promise<PinReport> {
    const base = { name: recipe.name, file: recipe.file };
    if (!recipe.source) {
      return { ...base, status: 'manual', reason: 'no source to check' };
    }

    let latest: string | null;
    try {
      latest = await this.getLatestCommit(recipe.source);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.debug(`Pin lookup failed for ${recipe.name}`, { repo: recipe.source.repo, reason });
      return { ...base, status: 'failed', from: recipe.source.commit, reason };
    }

    if (!latest) {
      return { ...base, status: 'failed', from: recipe.source.commit, reason: 'no matching ref on the remote' };
    }
    if (latest === recipe.source.commit) {
      return { ...base, status: 'current', from: latest };
    }

    if (!options.dryRun) {
      const updated = replaceCommitPin(await readTextFile(recipe.file), latest);
      if (updated === null) {
        return { ...base, status: 'failed', from: recipe.source.commit, reason: 'no commit line in the recipe file' };
      }
      await writeTextFile(recipe.file, updated);
    }
    return { ...base, status: 'updated', from: recipe.source.commit, to: latest };
  }

  /**
   * Update the named recipes, or every recipe with its own stage when no
   * names are given. Recipes are processed one at a time in registry order.
   */
  async updatePins(
    registry: RecipeRegistry,
    names: readonly string[] = [],
    options: UpdatePinsOptions = {}
  ): Promise<PinReport[]> {
    const selected: Recipe[] = [];
    if (names.length > 0) {
      for (const name of names) {
        const recipe = registry.get(name);
        if (!recipe) {
          throw new UnknownDependencyError(name);
        }
        selected.push(recipe);
      }
    } else {
      selected.push(...[...registry.values()].filter(recipe => !recipe.skip));
    }

    const reports: PinReport[] = [];
    for (const recipe of selected) {
      const report = await this.updateRecipe(recipe, options);
      options.onReport?.(report);
      reports.push(report);
    }
    return reports;
  }
}

export function updatePins(
  registry: RecipeRegistry,
  names?: readonly string[],
  options?: UpdatePinsOptions & { processes?: ProcessRunner }
): Promise<PinReport[]> {
  return new PinUpdater(options?.processes).updatePins(registry, names, options);
}
