import { FatalError } from '../utils/errors.js';
import type { CancellationToken } from '../utils/cancellation.js';
import type { Logger } from '../utils/logger.js';

export type StageOutcome =
  | { kind: 'continue' }
  | { kind: 'retry'; reason: string }
  | { kind: 'back' }
  | { kind: 'stop'; reason: string };

export const CONTINUE: StageOutcome = { kind: 'continue' };

export interface Stage<C> {
  name: string;
  /** Context fields that must be set before the stage runs */
  requires?: readonly (keyof C)[];
  /** Earlier stages a `back` outcome may return to */
  reenterable?: boolean;
  run(context: C): Promise<StageOutcome>;
}

export interface StageRunOptions {
  logger: Logger;
  /** Total `retry` and `back` transitions allowed in one run */
  transitionBudget: number;
  cancellation?: CancellationToken;
}

export type StageRunResult =
  | { status: 'completed' }
  | { status: 'stopped'; stage: string; reason: string };

function missingInputs<C>(stage: Stage<C>, context: C): string[] {
  return (stage.requires ?? []).filter(key => context[key] === undefined).map(String);
}

function backTarget<C>(stages: readonly Stage<C>[], from: number): number {
  for (let i = from - 1; i >= 0; i--) {
    if (stages[i].reenterable) return i;
  }
  return from;
}

/**
 * Run stages in order over a shared context. `retry` re-enters the same
 * stage, `back` the closest earlier re-enterable stage.
 */
export async function runStages<C>(
  stages: readonly Stage<C>[],
  context: C,
  options: StageRunOptions
): Promise<StageRunResult> {
  const { logger, transitionBudget, cancellation } = options;
  let transitions = 0;
  let index = 0;

  while (index < stages.length) {
    cancellation?.throwIfCancelled();

    const stage = stages[index];
    const missing = missingInputs(stage, context);
    if (missing.length > 0) {
      throw new Error(`Stage "${stage.name}" is missing inputs: ${missing.join(', ')}`);
    }

    logger.debug(`Stage: ${stage.name}`);
    const outcome = await stage.run(context);

    switch (outcome.kind) {
      case 'continue':
        index++;
        break;
      case 'stop':
        logger.warn(`Stopped at ${stage.name}: ${outcome.reason}`);
        return { status: 'stopped', stage: stage.name, reason: outcome.reason };
      case 'retry':
      case 'back':
        transitions++;
        if (transitions > transitionBudget) {
          throw new FatalError(
            'retry-budget-exhausted',
            `Stage "${stage.name}" did not complete after ${transitionBudget} attempts - aborting`
          );
        }
        if (outcome.kind === 'retry') {
          logger.info(`${stage.name}: ${outcome.reason}`);
        } else {
          index = backTarget(stages, index);
          logger.info(`Going back to ${stages[index].name}`);
        }
        break;
    }
  }

  return { status: 'completed' };
}
