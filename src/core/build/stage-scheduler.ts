/**
 * Stage scheduler.
 * Runs stages in plan order, up to `jobs` at a time. A stage starts only
 * once every stage it depends on has succeeded. After the first failure no
 * new stage starts; running ones are awaited and the first failure wins.
 */

import type { Stage } from '../../types/index.js';
import { StageExecutionError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/** Runs one stage and yields its exit code */
export type StageExecutor = (stage: Stage) => Promise<number>;

export interface SchedulerOptions {
  jobs?: number;
}

interface StageOutcome {
  stage: Stage;
  exitCode: number;
  error?: unknown;
}

export async function runStages(
  stages: readonly Stage[],
  execute: StageExecutor,
  options: SchedulerOptions = {}
): Promise<void> {
  const jobs = Math.max(1, options.jobs ?? 1);
  const pending: Stage[] = [...stages];
  const running = new Map<number, Promise<StageOutcome>>();
  const succeeded = new Set<number>();
  let failure: StageOutcome | undefined;

  const start = (stage: Stage): void => {
    logger.debug(`Starting ${stage.name}`, { recipes: stage.recipes.map(recipe => recipe.name) });
    running.set(
      stage.index,
      execute(stage).then(
        (exitCode): StageOutcome => ({ stage, exitCode }),
        (error: unknown): StageOutcome => ({ stage, exitCode: 1, error })
      )
    );
  };

  while (pending.length > 0 || running.size > 0) {
    if (!failure) {
      let cursor = 0;
      while (cursor < pending.length && running.size < jobs) {
        const stage = pending[cursor];
        if (stage.dependsOn.every(index => succeeded.has(index))) {
          pending.splice(cursor, 1);
          start(stage);
        } else {
          cursor++;
        }
      }
    }

    if (running.size === 0) {
      break;
    }

    const outcome = await Promise.race(running.values());
    running.delete(outcome.stage.index);
    if (outcome.exitCode === 0 && outcome.error === undefined) {
      succeeded.add(outcome.stage.index);
    } else {
      logger.debug(`${outcome.stage.name} failed`, { exitCode: outcome.exitCode });
      failure ??= outcome;
    }
  }

  if (failure) {
    if (failure.error !== undefined) {
      throw failure.error;
    }
    throw new StageExecutionError(
      failure.stage.index,
      failure.stage.name,
      failure.exitCode,
      failure.stage.recipes.map(recipe => recipe.name)
    );
  }

  if (pending.length > 0) {
    throw new ValidationError(`Stages with unsatisfiable dependencies: ${pending.map(stage => stage.name).join(', ')}`);
  }
}
