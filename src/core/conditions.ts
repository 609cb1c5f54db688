/**
 * Evaluation of enablement conditions and conditional hook fragments.
 */

import { minimatch } from 'minimatch';
import * as semver from 'semver';
import type { BuildContext, Condition, HookFragment, HookName, Recipe } from '../types/index.js';
import { getFfmpegSemver } from './build-context.js';

function matchesAny(value: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => minimatch(value, pattern));
}

/**
 * True when every clause present in the condition holds for the context.
 * A missing condition always holds.
 */
export function evaluateCondition(condition: Condition | undefined, context: BuildContext): boolean {
  if (!condition) {
    return true;
  }

  if (condition.target && !matchesAny(context.target, condition.target)) return false;
  if (condition.notTarget && matchesAny(context.target, condition.notTarget)) return false;
  if (condition.variant && !matchesAny(context.variant, condition.variant)) return false;
  if (condition.notVariant && matchesAny(context.variant, condition.notVariant)) return false;

  if (condition.addin && !condition.addin.some(addin => context.addins.includes(addin))) return false;
  if (condition.notAddin && condition.notAddin.some(addin => context.addins.includes(addin))) return false;

  if (condition.ffver !== undefined && !semver.satisfies(getFfmpegSemver(context), condition.ffver)) {
    return false;
  }

  return true;
}

export function isRecipeEnabled(recipe: Recipe, context: BuildContext): boolean {
  return evaluateCondition(recipe.enabled, context);
}

/**
 * Lines of every fragment whose condition holds, in declaration order.
 */
export function renderFragments(fragments: readonly HookFragment[] | undefined, context: BuildContext): string[] {
  if (!fragments) {
    return [];
  }
  const lines: string[] = [];
  for (const fragment of fragments) {
    if (evaluateCondition(fragment.when, context)) {
      lines.push(...fragment.lines);
    }
  }
  return lines;
}

export function renderHook(recipe: Recipe, hook: HookName, context: BuildContext): string[] {
  return renderFragments(recipe.hooks[hook], context);
}

/**
 * A hook is defined for a context when it renders at least one line.
 */
export function hasHook(recipe: Recipe, hook: HookName, context: BuildContext): boolean {
  return renderHook(recipe, hook, context).length > 0;
}
