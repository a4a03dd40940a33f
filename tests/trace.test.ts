import {describe, it, expect} from 'vitest';
import {Trace, createTask} from '../src/agent/trace.js';
import type {StepDraft} from '../src/agent/types.js';

const clock = () => new Date('2026-01-02T03:04:05.000Z');

const okStep = (text: string): StepDraft => ({
  reasoning: `echo ${text}`,
  action: {toolName: 'echo', arguments: {text}},
  finalAnswer: null,
  observation: {output: text, exitStatus: 0, durationMs: 1, truncated: false},
  status: 'ok',
  error: null
});

describe('createTask', () => {
  it('creates an immutable task with an id', () => {
    const task = createTask('  count the files  ', clock);
    expect(task.goal).toBe('count the files');
    expect(task.createdAt).toBe('2026-01-02T03:04:05.000Z');
    expect(task.id.length).toBeGreaterThan(0);
    expect(Object.isFrozen(task)).toBe(true);
  });

  it('gives every task its own id', () => {
    expect(createTask('a').id).not.toBe(createTask('a').id);
  });
});

describe('Trace', () => {
  it('assigns monotonically increasing indexes from zero', () => {
    const trace = new Trace(createTask('t'), clock);
    const first = trace.append(okStep('a'));
    const second = trace.append(okStep('b'));

    expect(first.index).toBe(0);
    expect(second.index).toBe(1);
    expect(second.timestamp).toBe('2026-01-02T03:04:05.000Z');
    expect(trace.length).toBe(2);
    expect(trace.steps[1]).toBe(second);
  });

  it('keeps earlier views as a prefix of later ones', () => {
    const trace = new Trace(createTask('t'), clock);
    trace.append(okStep('a'));
    const before = trace.steps;
    trace.append(okStep('b'));
    const after = trace.steps;

    expect(before).toHaveLength(1);
    expect(after.slice(0, before.length)).toEqual(before);
    expect(after[0]).toBe(before[0]);
  });

  it('freezes appended steps including nested arguments', () => {
    const trace = new Trace(createTask('t'), clock);
    const draft = okStep('a');
    const step = trace.append(draft);

    expect(Object.isFrozen(step)).toBe(true);
    expect(Object.isFrozen(step.action?.arguments)).toBe(true);
    expect(Object.isFrozen(step.observation)).toBe(true);
    expect(() => {
      Object.assign(step, {status: 'tool_error'});
    }).toThrow(TypeError);
  });

  it('is not affected by later changes to the draft', () => {
    const trace = new Trace(createTask('t'), clock);
    const args: Record<string, unknown> = {text: 'a'};
    trace.append({...okStep('a'), action: {toolName: 'echo', arguments: args}});
    args.text = 'changed';

    expect(trace.steps[0].action?.arguments).toEqual({text: 'a'});
  });

  it('returns a copy of the step list', () => {
    const trace = new Trace(createTask('t'), clock);
    trace.append(okStep('a'));
    const view = trace.steps;
    expect(view).not.toBe(trace.steps);
  });
});
