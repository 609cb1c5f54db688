/**
 * Multi-stage Dockerfile rendering.
 *
 * Each stage builds from the base image, pulls in the dependency prefix and
 * layers of the stages it depends on and runs its stage script. The final
 * image collects the stages through their layer instructions.
 */

import type { BuildContext, Recipe, Stage } from '../../types/index.js';
import { CONTAINER_PATHS, LAYER_PLACEHOLDERS, WORK_LAYOUT } from '../../constants/index.js';
import { renderHook } from '../conditions.js';

export interface DockerfileOptions {
  image: string;
}

export function stageScriptPath(stage: Stage): string {
  return `${WORK_LAYOUT.STAGES}/${stage.name}.sh`;
}

function copyPrefixFrom(stageName: string): string {
  return `COPY --link --from=${stageName} ${CONTAINER_PATHS.DEPS_PREFIX}/. ${CONTAINER_PATHS.DEPS_PREFIX}`;
}

function substitute(line: string, placeholder: string, stageName: string): string {
  return line.split(placeholder).join(stageName);
}

export function renderDockerfile(
  plan: readonly Recipe[],
  stages: readonly Stage[],
  context: BuildContext,
  options: DockerfileOptions
): string {
  const lines: string[] = ['# syntax=docker/dockerfile:1'];
  const stageNameOf = new Map<string, string>();

  const layers = stages.map(stage =>
    stage.recipes.flatMap(recipe =>
      renderHook(recipe, 'dockerLayer', context).map(line => substitute(line, LAYER_PLACEHOLDERS.SELF, stage.name))
    )
  );

  for (const stage of stages) {
    lines.push('', `FROM ${options.image} AS ${stage.name}`);
    for (const dependency of stage.dependsOn) {
      lines.push(copyPrefixFrom(stages[dependency].name));
    }
    for (const dependency of stage.dependsOn) {
      lines.push(...layers[dependency]);
    }
    for (const recipe of stage.recipes) {
      stageNameOf.set(recipe.name, stage.name);
      lines.push(...renderHook(recipe, 'dockerStage', context));
    }
    lines.push(`COPY ${stageScriptPath(stage)} ${CONTAINER_PATHS.SCRIPT}`);
    lines.push(`RUN bash ${CONTAINER_PATHS.SCRIPT}`);
  }

  lines.push('', `FROM ${options.image}`);
  for (const stage of stages) {
    // Recipes without layer instructions install into the dependency prefix.
    let installsPrefix = false;
    for (const recipe of stage.recipes) {
      const layer = renderHook(recipe, 'dockerLayer', context);
      if (layer.length === 0) {
        installsPrefix = true;
      }
      lines.push(...layer.map(line => substitute(line, LAYER_PLACEHOLDERS.SELF, stage.name)));
    }
    if (installsPrefix) {
      lines.push(copyPrefixFrom(stage.name));
    }
  }

  // Aggregator recipes have no stage; they refer to the last one.
  const lastStage = stages[stages.length - 1];
  for (const recipe of plan) {
    const stageName = stageNameOf.get(recipe.name) ?? lastStage?.name;
    for (const line of renderHook(recipe, 'dockerFinal', context)) {
      if (stageName) {
        lines.push(substitute(line, LAYER_PLACEHOLDERS.PREV, stageName));
      } else if (!line.includes(LAYER_PLACEHOLDERS.PREV)) {
        lines.push(line);
      }
    }
  }

  lines.push(`ENV FFBUILD_PREFIX=${CONTAINER_PATHS.DEPS_PREFIX}`);
  return lines.join('\n') + '\n';
}
