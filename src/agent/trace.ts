import {nanoid} from 'nanoid';
import type {Step, StepDraft, Task} from './types.js';

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

export const createTask = (goal: string, clock: Clock = systemClock): Task =>
  Object.freeze({
    id: nanoid(),
    goal: goal.trim(),
    createdAt: clock().toISOString()
  });

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

/**
 * Append-only step log for a single run. Steps are copied and frozen on the way
 * in, so every earlier view of the trace stays a prefix of every later one.
 */
export class Trace {
  private readonly entries: Step[] = [];

  constructor(readonly task: Task, private readonly clock: Clock = systemClock) {}

  append(draft: StepDraft): Step {
    const step: Step = deepFreeze({
      index: this.entries.length,
      reasoning: draft.reasoning,
      action: draft.action ? structuredClone(draft.action) : null,
      finalAnswer: draft.finalAnswer,
      observation: draft.observation ? {...draft.observation} : null,
      status: draft.status,
      error: draft.error,
      timestamp: this.clock().toISOString()
    });

    this.entries.push(step);
    return step;
  }

  get length(): number {
    return this.entries.length;
  }

  get steps(): readonly Step[] {
    return this.entries.slice();
  }
}
