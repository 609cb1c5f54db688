/**
 * Dependency resolver.
 * Depth-first, post-order walk from the requested recipes producing the
 * build order: every recipe follows all of its enabled dependencies.
 */

import type { BuildContext, Recipe, RecipeRegistry } from '../../types/index.js';
import { isRecipeEnabled } from '../conditions.js';
import { CycleError, UnknownDependencyError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export class DependencyResolver {
  private readonly order: Recipe[] = [];
  private readonly settled: Set<string> = new Set();
  private readonly disabled: string[] = [];
  private readonly path: string[] = [];
  private readonly visiting: Set<string> = new Set();

  constructor(
    private readonly registry: RecipeRegistry,
    private readonly context: BuildContext
  ) {}

  /**
   * Resolve the requested names in order. Ties are broken by declaration
   * order of the requested list and of each recipe's dependencies, so the
   * result is stable for a given registry and context.
   */
  resolve(requestedNames: readonly string[]): readonly Recipe[] {
    for (const name of requestedNames) {
      this.visit(name, undefined);
    }
    return Object.freeze([...this.order]);
  }

  /** Recipes reached during resolution whose condition did not hold */
  getDisabled(): readonly string[] {
    return [...this.disabled];
  }

  private visit(name: string, requiredBy: string | undefined): void {
    const recipe = this.registry.get(name);
    if (!recipe) {
      throw new UnknownDependencyError(name, requiredBy);
    }

    if (this.visiting.has(name)) {
      const start = this.path.indexOf(name);
      throw new CycleError([...this.path.slice(start), name]);
    }

    if (this.settled.has(name)) {
      return;
    }

    // Disabled recipes count as satisfied; their own dependencies are not needed.
    if (!isRecipeEnabled(recipe, this.context)) {
      logger.debug(`Recipe '${name}' is disabled for this build`, { requiredBy });
      this.settled.add(name);
      this.disabled.push(name);
      return;
    }

    this.visiting.add(name);
    this.path.push(name);
    for (const dependency of recipe.dependencies) {
      this.visit(dependency, name);
    }
    this.path.pop();
    this.visiting.delete(name);

    this.settled.add(name);
    this.order.push(recipe);
  }
}

/**
 * Resolve the build order for the requested recipes.
 */
export function resolve(
  registry: RecipeRegistry,
  context: BuildContext,
  requestedNames: readonly string[]
): readonly Recipe[] {
  return new DependencyResolver(registry, context).resolve(requestedNames);
}
