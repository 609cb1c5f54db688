/**
 * Layer replay for container runs.
 *
 * `build` runs each stage in a throwaway container rather than as an image
 * build step. Every stage installs into its own dependency prefix
 * (stages/<name>/deps, mounted over /ffbuild/deps), seeded from the
 * prefixes of the stages it depends on. The paths a stage's layer
 * instructions copy are captured under stages/<name>/layer when it ends,
 * and restored at the start of every later stage and of the FFmpeg build,
 * so a run sees the same filesystem the generated Dockerfile would give it.
 */

import { join } from 'path';
import type { BuildContext, Recipe, Stage } from '../../types/index.js';
import { CONTAINER_PATHS, LAYER_PLACEHOLDERS, WORK_LAYOUT } from '../../constants/index.js';
import { renderHook } from '../conditions.js';
import { ValidationError } from '../../utils/errors.js';
import { shellQuote, type StageShell } from './script-renderer.js';

export type LayerInstruction =
  | { kind: 'copy'; from: string | undefined; sources: string[]; destination: string }
  | { kind: 'env'; assignment: string }
  | { kind: 'run'; command: string };

export interface ReplayPlan {
  stages: readonly StageShell[];
  /** Setup of the FFmpeg build: merged prefixes, then every layer */
  final: readonly string[];
}

function unsupported(recipe: Recipe, line: string, reason: string): ValidationError {
  return new ValidationError(`Recipe '${recipe.name}': cannot replay '${line.trim()}' in a container run: ${reason}`, {
    recipe: recipe.name,
    file: recipe.file
  });
}

/**
 * Parse the Dockerfile instructions a layer can be replayed from:
 * COPY between stages, ENV and shell-form RUN.
 */
export function parseLayerInstruction(line: string, recipe: Recipe): LayerInstruction {
  const match = /^(\w+)\s+([\s\S]+)$/.exec(line.trim());
  if (!match) {
    throw unsupported(recipe, line, 'not an instruction');
  }
  const keyword = match[1].toUpperCase();
  const rest = match[2].trim();

  switch (keyword) {
    case 'COPY': {
      let from: string | undefined;
      const paths: string[] = [];
      for (const token of rest.split(/\s+/)) {
        if (paths.length === 0 && token.startsWith('--')) {
          if (token.startsWith('--from=')) {
            from = token.slice('--from='.length);
          }
          continue;
        }
        paths.push(token);
      }
      const destination = paths.pop();
      if (destination === undefined || paths.length === 0) {
        throw unsupported(recipe, line, 'COPY needs a source and a destination');
      }
      return { kind: 'copy', from, sources: paths, destination };
    }
    case 'ENV': {
      if (/^[^\s=]+=/.test(rest)) {
        return { kind: 'env', assignment: rest };
      }
      const legacy = /^(\S+)\s+([\s\S]+)$/.exec(rest);
      if (!legacy) {
        throw unsupported(recipe, line, 'ENV needs a value');
      }
      return { kind: 'env', assignment: `${legacy[1]}=${shellQuote(legacy[2])}` };
    }
    case 'RUN':
      if (rest.startsWith('[')) {
        throw unsupported(recipe, line, 'exec-form RUN');
      }
      return { kind: 'run', command: rest };
    default:
      throw unsupported(recipe, line, `${keyword} has no shell equivalent`);
  }
}

/** Host directory mounted as a stage's dependency prefix */
export function stagePrefixDir(workDir: string, stage: Stage): string {
  return join(workDir, WORK_LAYOUT.STAGES, stage.name, WORK_LAYOUT.DEPS_PREFIX);
}

function containerStageDir(stageName: string): string {
  return `${CONTAINER_PATHS.STAGES}/${stageName}`;
}

function mergePrefixFrom(stageName: string): string {
  return `cp -a ${shellQuote(`${containerStageDir(stageName)}/${WORK_LAYOUT.DEPS_PREFIX}`)}/. "$FFBUILD_PREFIX"`;
}

function substitute(line: string, placeholder: string, stageName: string): string {
  return line.split(placeholder).join(stageName);
}

/**
 * Source paths each stage has to keep, numbered in the order they are
 * first referenced.
 */
class Captures {
  private readonly byStage = new Map<string, Map<string, string>>();

  dirFor(stageName: string, source: string): string {
    let entries = this.byStage.get(stageName);
    if (!entries) {
      entries = new Map();
      this.byStage.set(stageName, entries);
    }
    let dir = entries.get(source);
    if (!dir) {
      dir = `${containerStageDir(stageName)}/${WORK_LAYOUT.LAYER}/${entries.size}`;
      entries.set(source, dir);
    }
    return dir;
  }

  lines(stageName: string): string[] {
    const lines: string[] = [];
    for (const [source, dir] of this.byStage.get(stageName) ?? []) {
      const from = shellQuote(source);
      const to = shellQuote(dir);
      lines.push(`mkdir -p ${to}`);
      lines.push(`if [ -d ${from} ]; then cp -a ${from}/. ${to}/; else cp -a ${from} ${to}/; fi`);
    }
    return lines;
  }
}

function replayLines(
  line: string,
  recipe: Recipe,
  readable: ReadonlySet<string>,
  captures: Captures
): string[] {
  const instruction = parseLayerInstruction(line, recipe);
  switch (instruction.kind) {
    case 'env':
      return [`export ${instruction.assignment}`];
    case 'run':
      return [instruction.command];
    case 'copy': {
      const from = instruction.from;
      if (from === undefined || !readable.has(from)) {
        throw unsupported(recipe, line, 'COPY must come from a finished stage');
      }
      const destination = shellQuote(instruction.destination);
      return instruction.sources.flatMap(source => [
        `mkdir -p ${destination}`,
        `cp -a ${shellQuote(captures.dirFor(from, source))}/. ${destination}`
      ]);
    }
  }
}

/**
 * Shell equivalents of the Dockerfile that `renderDockerfile` produces for
 * the same plan. Throws a ValidationError for instructions that only an
 * image build can run.
 */
export function planReplay(plan: readonly Recipe[], stages: readonly Stage[], context: BuildContext): ReplayPlan {
  const captures = new Captures();
  const everyStage = new Set(stages.map(stage => stage.name));

  const layers = stages.map(stage =>
    stage.recipes.flatMap(recipe =>
      renderHook(recipe, 'dockerLayer', context).flatMap(line =>
        replayLines(substitute(line, LAYER_PLACEHOLDERS.SELF, stage.name), recipe, new Set([stage.name]), captures)
      )
    )
  );

  const setups = stages.map(stage => {
    const dependencies = stage.dependsOn.map(index => stages[index].name);
    const readable = new Set(dependencies);
    return [
      ...dependencies.map(mergePrefixFrom),
      ...stage.dependsOn.flatMap(index => layers[index]),
      ...stage.recipes.flatMap(recipe =>
        renderHook(recipe, 'dockerStage', context).flatMap(line => replayLines(line, recipe, readable, captures))
      )
    ];
  });

  const final = stages.flatMap((stage, index) => [...layers[index], mergePrefixFrom(stage.name)]);

  // Aggregator recipes have no stage; they refer to the last one.
  const stageNameOf = new Map<string, string>();
  for (const stage of stages) {
    for (const recipe of stage.recipes) {
      stageNameOf.set(recipe.name, stage.name);
    }
  }
  const lastStage = stages[stages.length - 1];
  for (const recipe of plan) {
    const stageName = stageNameOf.get(recipe.name) ?? lastStage?.name;
    for (const line of renderHook(recipe, 'dockerFinal', context)) {
      if (stageName) {
        final.push(...replayLines(substitute(line, LAYER_PLACEHOLDERS.PREV, stageName), recipe, everyStage, captures));
      } else if (!line.includes(LAYER_PLACEHOLDERS.PREV)) {
        final.push(...replayLines(line, recipe, everyStage, captures));
      }
    }
  }

  return {
    stages: stages.map((stage, index) => ({ setup: setups[index], teardown: captures.lines(stage.name) })),
    final
  };
}
