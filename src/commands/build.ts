import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'path';

import type { BuildOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { loadConfig } from '../core/config.js';
import { preparePlan, runBuild } from '../core/build/build-driver.js';
import { getCliOutput, getWorkingDir } from '../cli/context.js';

export function parseJobs(value: string): number {
  const jobs = Number(value);
  if (!Number.isInteger(jobs) || jobs < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return jobs;
}

export function setupBuildCommand(program: Command): void {
  program
    .command('build')
    .description('build FFmpeg for a target and variant, with optional addins')
    .argument('<target>', 'target platform, e.g. win64 or linux64')
    .argument('<variant>', 'variant, e.g. gpl or lgpl')
    .argument('[addins...]', 'addins such as 7.1 or debug')
    .option('-o, --output-dir <dir>', 'write the packaged tree here instead of archiving it')
    .option('-j, --jobs <n>', 'run up to n independent stages at once', parseJobs)
    .option('--stage-per-recipe', 'build every recipe in its own stage')
    .option('--dry-run', 'write the stage scripts without running containers')
    .action(
      withErrorHandling(async (target: string, variant: string, addins: string[], options: BuildOptions, command: Command) => {
        const cwd = getWorkingDir(command);
        const config = await loadConfig(cwd);
        const plan = await preparePlan({ target, variant, addins }, config, { stagePerRecipe: options.stagePerRecipe });

        const exitCode = await runBuild(plan, {
          outputDir: options.outputDir ? resolve(cwd, options.outputDir) : undefined,
          jobs: options.jobs,
          dryRun: options.dryRun,
          output: getCliOutput()
        });
        if (exitCode !== 0) {
          process.exit(exitCode);
        }
      })
    );
}
