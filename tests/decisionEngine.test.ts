import {describe, it, expect} from 'vitest';
import {LlmDecisionEngine, type LanguageModel} from '../src/agent/decisionEngine.js';
import {MalformedDecisionError} from '../src/agent/errors.js';
import {createTask} from '../src/agent/trace.js';
import type {ChatMessage, DecisionInput, Step, ToolDescriptor} from '../src/agent/types.js';

class StubModel implements LanguageModel {
  readonly requests: ChatMessage[][] = [];

  constructor(private readonly reply: string) {}

  async complete(messages: ChatMessage[]): Promise<string> {
    this.requests.push(messages);
    return this.reply;
  }
}

const listFiles: ToolDescriptor = {
  name: 'list_files',
  description: 'List files.',
  inputGuide: 'JSON: {"path": "."}',
  timeoutMs: 10_000,
  sideEffect: 'read-only',
  maxOutputChars: 4000
};

const step = (overrides: Partial<Step>): Step => ({
  index: 0,
  reasoning: 'look around',
  action: {toolName: 'list_files', arguments: {path: '.'}},
  finalAnswer: null,
  observation: {output: 'dates.txt', exitStatus: 0, durationMs: 3, truncated: false},
  status: 'ok',
  error: null,
  timestamp: '2026-01-02T03:04:05.000Z',
  ...overrides
});

const input = (overrides: Partial<DecisionInput> = {}): DecisionInput => ({
  task: createTask('Count the Wednesdays in dates.txt'),
  steps: [],
  catalogue: [listFiles],
  ...overrides
});

describe('LlmDecisionEngine', () => {
  it('turns the completion into a decision', async () => {
    const model = new StubModel('Thought: look\nAction: list_files\nAction Input: {"path": "."}');
    const engine = new LlmDecisionEngine(model, {instructions: 'Be careful.'});

    const decision = await engine.decide(input(), new AbortController().signal);
    expect(decision).toEqual({kind: 'invoke', reasoning: 'look', toolName: 'list_files', arguments: {path: '.'}});
  });

  it('describes the tool catalogue in the system prompt', async () => {
    const model = new StubModel('Final Response: ok');
    const engine = new LlmDecisionEngine(model, {instructions: 'Be careful.'});
    await engine.decide(input(), new AbortController().signal);

    const [system, user] = model.requests[0];
    expect(system.role).toBe('system');
    expect(system.content).toContain('Be careful.');
    expect(system.content).toContain('- list_files (read-only, 10s limit): List files.\n  Input: JSON: {"path": "."}');
    expect(user).toEqual({role: 'user', content: 'Count the Wednesdays in dates.txt'});
  });

  it('serialises earlier steps and the corrective note', async () => {
    const model = new StubModel('Final Response: ok');
    const engine = new LlmDecisionEngine(model, {instructions: ''});
    await engine.decide(
      input({
        steps: [
          step({}),
          step({
            index: 1,
            reasoning: '',
            action: {toolName: 'nope', arguments: {}},
            observation: null,
            status: 'invalid_action',
            error: 'Unknown tool "nope".'
          })
        ],
        correction: 'Use a listed tool.'
      }),
      new AbortController().signal
    );

    expect(model.requests[0][1].content).toBe(
      [
        'Count the Wednesdays in dates.txt',
        '',
        'Scratchpad:',
        'Thought: look around',
        'Action: list_files',
        'Action Input: {"path":"."}',
        'Observation (exit status 0):',
        'dates.txt',
        '',
        'Thought: (none)',
        'Action: nope',
        'Action Input: {}',
        'Observation [invalid_action]: Unknown tool "nope".',
        '',
        'Correction: Use a listed tool.'
      ].join('\n')
    );
  });

  it('raises MalformedDecisionError for unparseable completions', async () => {
    const engine = new LlmDecisionEngine(new StubModel('no idea'), {instructions: ''});
    await expect(engine.decide(input(), new AbortController().signal)).rejects.toBeInstanceOf(MalformedDecisionError);
  });
});
