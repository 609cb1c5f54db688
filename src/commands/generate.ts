import { Command } from 'commander';
import { join, resolve } from 'path';

import type { GenerateOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { writeTextFile } from '../utils/fs.js';
import { loadConfig } from '../core/config.js';
import { preparePlan, writeBuildScripts } from '../core/build/build-driver.js';
import { renderDockerfile } from '../core/stages/dockerfile-generator.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { getCliOutput, getWorkingDir } from '../cli/context.js';

export function setupGenerateCommand(program: Command): void {
  program
    .command('generate')
    .description('write a multi-stage Dockerfile and its stage scripts')
    .argument('<target>', 'target platform')
    .argument('<variant>', 'variant')
    .argument('[addins...]', 'addins')
    .option('-o, --output <dir>', 'output directory', 'docker')
    .option('--stage-per-recipe', 'build every recipe in its own stage')
    .action(
      withErrorHandling(async (target: string, variant: string, addins: string[], options: GenerateOptions, command: Command) => {
        const cwd = getWorkingDir(command);
        const config = await loadConfig(cwd);
        const out = getCliOutput();
        const spinner = out.spinner();
        spinner.start('Resolving recipes');
        const plan = await preparePlan({ target, variant, addins }, config, { stagePerRecipe: options.stagePerRecipe });
        spinner.stop(`Resolved ${plan.recipes.length} recipes into ${plan.stages.length} stages`);
        const outDir = resolve(cwd, options.output ?? 'docker');

        await writeBuildScripts(plan, outDir);
        const dockerfile = renderDockerfile(plan.recipes, plan.stages, plan.context, { image: plan.image });
        await writeTextFile(join(outDir, FILE_PATTERNS.DOCKERFILE), dockerfile);

        out.success(`Wrote ${FILE_PATTERNS.DOCKERFILE} and ${plan.stages.length} stage scripts to ${outDir}`);
      })
    );
}
