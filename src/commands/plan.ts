import { Command } from 'commander';

import type { PlanOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { loadConfig } from '../core/config.js';
import { preparePlan, type BuildPlan } from '../core/build/build-driver.js';
import { getContextLabel } from '../core/build-context.js';
import { FLAG_FIELDS } from '../constants/index.js';
import { getCliOutput, getWorkingDir } from '../cli/context.js';

const DIM = '\x1b[2m';
const RESET = '\x1b[0m';

function dim(text: string): string {
  return `${DIM}${text}${RESET}`;
}

export function formatRecipeList(plan: BuildPlan): string {
  return plan.recipes
    .map((recipe, index) => {
      const notes = [recipe.group, recipe.skip ? 'aggregate' : undefined].filter(note => note !== undefined);
      const suffix = notes.length > 0 ? ` ${dim(`(${notes.join(', ')})`)}` : '';
      return `${String(index + 1).padStart(3)}. ${recipe.name}${suffix}`;
    })
    .join('\n');
}

export function formatStageList(plan: BuildPlan): string {
  return plan.stages
    .map(stage => {
      const after = stage.dependsOn.length > 0
        ? ` ${dim(`after ${stage.dependsOn.map(index => plan.stages[index].name).join(', ')}`)}`
        : '';
      return `${stage.name}: ${stage.recipes.map(recipe => recipe.name).join(', ')}${after}`;
    })
    .join('\n');
}

export function formatFlags(plan: BuildPlan): string {
  return FLAG_FIELDS
    .filter(field => plan.flags[field].length > 0)
    .map(field => `${field}: ${plan.flags[field].join(' ')}`)
    .join('\n');
}

export function setupPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('show the resolved recipes and stages of a build')
    .argument('<target>', 'target platform')
    .argument('<variant>', 'variant')
    .argument('[addins...]', 'addins')
    .option('--stage-per-recipe', 'build every recipe in its own stage')
    .option('--flags', 'also show the FFmpeg configure flags')
    .action(
      withErrorHandling(async (target: string, variant: string, addins: string[], options: PlanOptions, command: Command) => {
        const config = await loadConfig(getWorkingDir(command));
        const plan = await preparePlan({ target, variant, addins }, config, { stagePerRecipe: options.stagePerRecipe });
        const out = getCliOutput();

        out.info(`${getContextLabel(plan.context)} on ${plan.image}, FFmpeg ${plan.context.ffmpegVersion} (${plan.gitBranch})`);
        out.note(formatRecipeList(plan), `Recipes (${plan.recipes.length})`);
        if (plan.disabled.length > 0) {
          out.message(dim(`disabled: ${plan.disabled.join(', ')}`));
        }
        out.note(formatStageList(plan), `Stages (${plan.stages.length})`);
        if (options.flags) {
          out.note(formatFlags(plan), 'FFmpeg flags');
        }
      })
    );
}
