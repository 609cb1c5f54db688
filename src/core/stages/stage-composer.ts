/**
 * Stage composer.
 * Groups the resolved plan into container stages. A recipe that brings its
 * own layer or stage instructions opens a new stage; recipes without them
 * join the current one, which keeps the image layer count down. A stage
 * with layer instructions comes before every stage after it.
 */

import type { BuildContext, Recipe, Stage } from '../../types/index.js';
import { hasHook } from '../conditions.js';

export interface ComposeOptions {
  /** One stage per recipe, trading cache reuse for simpler stages */
  perRecipe?: boolean;
}

export function formatStageName(index: number): string {
  return `stage-${String(index + 1).padStart(2, '0')}`;
}

function definesLayer(recipe: Recipe, context: BuildContext): boolean {
  return hasHook(recipe, 'dockerLayer', context) || hasHook(recipe, 'dockerStage', context);
}

export function compose(
  plan: readonly Recipe[],
  context: BuildContext,
  options: ComposeOptions = {}
): readonly Stage[] {
  const groups: Recipe[][] = [];
  const stageOf = new Map<string, number>();

  for (const recipe of plan) {
    if (recipe.skip) {
      continue;
    }
    const current = groups[groups.length - 1];
    if (!current || options.perRecipe || definesLayer(recipe, context)) {
      groups.push([recipe]);
    } else {
      current.push(recipe);
    }
    stageOf.set(recipe.name, groups.length - 1);
  }

  // Stages each planned recipe needs, looking through aggregator recipes
  // that have no stage of their own.
  const provides = new Map<string, ReadonlySet<number>>();
  const dependsOn: Array<Set<number>> = groups.map(() => new Set<number>());

  for (const recipe of plan) {
    const needed = new Set<number>();
    for (const dependency of recipe.dependencies) {
      for (const index of provides.get(dependency) ?? []) {
        needed.add(index);
      }
    }

    const own = stageOf.get(recipe.name);
    if (own === undefined) {
      provides.set(recipe.name, needed);
      continue;
    }

    for (const index of needed) {
      if (index !== own) {
        dependsOn[own].add(index);
      }
    }
    provides.set(recipe.name, new Set([own]));
  }

  // Layer instructions change the filesystem every later stage builds on.
  groups.forEach((recipes, index) => {
    if (recipes.some(recipe => hasHook(recipe, 'dockerLayer', context))) {
      for (let later = index + 1; later < groups.length; later++) {
        dependsOn[later].add(index);
      }
    }
  });

  return Object.freeze(groups.map((recipes, index): Stage => ({
    index,
    name: formatStageName(index),
    recipes: Object.freeze([...recipes]),
    dependsOn: Object.freeze([...dependsOn[index]].sort((a, b) => a - b))
  })));
}
