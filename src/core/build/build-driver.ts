/**
 * Build driver.
 *
 * Turns a target/variant/addins selection into a plan (registry, resolved
 * recipes, stages, FFmpeg flags), then runs one container per stage, the
 * final FFmpeg build and packaging. Each stage installs into a prefix of its
 * own; the FFmpeg build merges them in plan order. A failing stage stops the
 * build and its exit code becomes the driver's.
 */

import { join } from 'path';
import type {
  Addin,
  BuildContext,
  BuildOptions,
  FfbuildConfig,
  FlagSet,
  Recipe,
  RecipeRegistry,
  Stage,
  Variant
} from '../../types/index.js';
import type { OutputPort } from '../ports/output.js';
import type { ProcessRunner } from '../ports/process.js';
import { resolveOutput } from '../ports/resolve.js';
import { CONTAINER_PATHS, FILE_PATTERNS, WORK_LAYOUT } from '../../constants/index.js';
import { createBuildContext, getContextLabel } from '../build-context.js';
import { getImageName, resolveGitBranch } from '../config.js';
import { loadRegistry } from '../registry/recipe-registry.js';
import { loadAddins, loadVariant, selectFfmpegVersion, selectGitBranch } from '../registry/variant-loader.js';
import { DependencyResolver } from '../resolver/dependency-resolver.js';
import { compose } from '../stages/stage-composer.js';
import { stageScriptPath } from '../stages/dockerfile-generator.js';
import { planReplay, stagePrefixDir, type ReplayPlan } from '../stages/layer-replay.js';
import { collectFfmpegFlags, renderFinalScript, renderStageScript } from '../stages/script-renderer.js';
import { packageBuild } from '../package/packager.js';
import { DockerContainerRunner, type ContainerRunner } from './container-runner.js';
import { runStages } from './stage-scheduler.js';
import { ensureDir, remove, writeTextFile } from '../../utils/fs.js';
import { spawnRunner } from '../../utils/process.js';
import { StageExecutionError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface BuildSelection {
  target: string;
  variant: string;
  addins?: readonly string[];
}

export interface BuildPlan {
  context: BuildContext;
  config: FfbuildConfig;
  registry: RecipeRegistry;
  variant: Variant;
  addins: readonly Addin[];
  /** Root recipe names: the variant's dependencies, then each addin's */
  requested: readonly string[];
  recipes: readonly Recipe[];
  disabled: readonly string[];
  stages: readonly Stage[];
  flags: FlagSet;
  image: string;
  gitBranch: string;
}

export interface PreparePlanOptions {
  stagePerRecipe?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load declarations and resolve everything a build needs. All resolution
 * errors surface here, before any container work.
 */
export async function preparePlan(
  selection: BuildSelection,
  config: FfbuildConfig,
  options: PreparePlanOptions = {}
): Promise<BuildPlan> {
  const env = options.env ?? process.env;
  const addins = await loadAddins(config.addinPaths, selection.addins ?? []);
  const context = createBuildContext({
    target: selection.target,
    variant: selection.variant,
    addins: addins.map(addin => addin.name),
    ffmpegVersion: selectFfmpegVersion(addins)
  });

  const variant = await loadVariant(config.variantPaths, context.target, context.variant);
  const registry = await loadRegistry(config.recipePaths);

  const requested = [...variant.dependencies, ...addins.flatMap(addin => addin.dependencies)];
  const resolver = new DependencyResolver(registry, context);
  const recipes = resolver.resolve(requested);
  const stages = compose(recipes, context, { perRecipe: options.stagePerRecipe });

  logger.debug(`Resolved ${recipes.length} recipes into ${stages.length} stages for ${getContextLabel(context)}`);

  return {
    context,
    config,
    registry,
    variant,
    addins,
    requested,
    recipes,
    disabled: resolver.getDisabled(),
    stages,
    flags: collectFfmpegFlags({ registry, plan: recipes, variant, addins }, context),
    image: getImageName(config, context.target, variant.image),
    gitBranch: resolveGitBranch(config, selectGitBranch(addins), env)
  };
}

/**
 * Write every stage script and the final FFmpeg script under `dir`.
 * Scripts for container runs carry the layer replay; scripts for an image
 * build leave layers to the Dockerfile. Returns the host paths of the stage
 * scripts, by stage index.
 */
export async function writeBuildScripts(plan: BuildPlan, dir: string, replay?: ReplayPlan): Promise<string[]> {
  const paths: string[] = [];
  for (const stage of plan.stages) {
    const path = join(dir, stageScriptPath(stage));
    await writeTextFile(path, renderStageScript(stage, plan.context, replay?.stages[stage.index]));
    paths.push(path);
  }

  const finalScript = renderFinalScript(
    {
      ffmpegRepo: plan.config.ffmpegRepo,
      gitBranch: plan.gitBranch,
      flags: plan.flags,
      targetFlags: plan.variant.targetFlags,
      setup: replay?.final
    },
    plan.context
  );
  await writeTextFile(join(dir, FILE_PATTERNS.FINAL_SCRIPT), finalScript);
  return paths;
}

export interface RunBuildOptions extends BuildOptions {
  output?: OutputPort;
  containers?: ContainerRunner;
  processes?: ProcessRunner;
  env?: NodeJS.ProcessEnv;
}

/**
 * Run a prepared plan in a fresh work directory. Resolves to 0 on success
 * or to the exit code of the first failing stage. Packaging errors are
 * thrown.
 */
export async function runBuild(plan: BuildPlan, options: RunBuildOptions = {}): Promise<number> {
  const out = resolveOutput(options);
  const processes = options.processes ?? spawnRunner;
  const containers = options.containers ?? new DockerContainerRunner({ processes });
  const workDir = plan.config.workDir;
  const label = getContextLabel(plan.context);
  const replay = planReplay(plan.recipes, plan.stages, plan.context);

  await remove(workDir);
  await ensureDir(join(workDir, WORK_LAYOUT.DEPS_PREFIX));
  for (const stage of plan.stages) {
    await ensureDir(stagePrefixDir(workDir, stage));
  }
  const scripts = await writeBuildScripts(plan, workDir, replay);

  if (options.dryRun) {
    out.info(`Dry run: ${plan.stages.length} stage scripts for ${label} written to ${workDir}`);
    return 0;
  }

  out.step(`Building ${label} with ${plan.image}`);

  const execute = async (stage: Stage): Promise<number> => {
    out.step(`${stage.name}: ${stage.recipes.map(recipe => recipe.name).join(', ')}`);
    const exitCode = await containers.run({
      image: plan.image,
      workDir,
      script: scripts[stage.index],
      mounts: [{ host: stagePrefixDir(workDir, stage), container: CONTAINER_PATHS.DEPS_PREFIX }]
    });
    if (exitCode === 0) {
      out.success(`${stage.name} done`);
    }
    return exitCode;
  };

  try {
    await runStages(plan.stages, execute, { jobs: options.jobs ?? plan.config.jobs });

    out.step(`Building FFmpeg (${plan.gitBranch})`);
    const finalExit = await containers.run({
      image: plan.image,
      workDir,
      script: join(workDir, FILE_PATTERNS.FINAL_SCRIPT)
    });
    if (finalExit !== 0) {
      throw new StageExecutionError(plan.stages.length, 'ffmpeg', finalExit, ['ffmpeg']);
    }
  } catch (error) {
    if (error instanceof StageExecutionError) {
      out.error(error.message);
      return error.exitCode;
    }
    throw error;
  }

  const result = await packageBuild({
    context: plan.context,
    variant: plan.variant,
    workDir,
    artifactsDir: plan.config.artifactsDir,
    outputDir: options.outputDir ?? plan.config.outputDir,
    image: plan.image,
    containers,
    processes,
    env: options.env
  });

  await remove(workDir);
  out.success(`Built ${result.archive ?? result.packageDir} (${result.files} files)`);
  return 0;
}
