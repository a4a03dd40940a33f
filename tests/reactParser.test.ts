import {describe, it, expect} from 'vitest';
import {MalformedDecisionError} from '../src/agent/errors.js';
import {parseReactOutput} from '../src/agent/reactParser.js';

describe('parseReactOutput', () => {
  it('parses a final response', () => {
    const decision = parseReactOutput('Thought: the file is written.\nFinal Response: Done, 3 Wednesdays.');
    expect(decision).toEqual({
      kind: 'finish',
      reasoning: 'the file is written.',
      finalAnswer: 'Done, 3 Wednesdays.'
    });
  });

  it('parses an action with JSON arguments', () => {
    const decision = parseReactOutput(
      'Thought: look at the data first\nAction: read_file\nAction Input: {"path": "dates.txt"}'
    );
    expect(decision).toEqual({
      kind: 'invoke',
      reasoning: 'look at the data first',
      toolName: 'read_file',
      arguments: {path: 'dates.txt'}
    });
  });

  it('accepts fenced JSON and ignores a hallucinated observation', () => {
    const decision = parseReactOutput(
      'Thought: list\nAction: list_files\nAction Input: ```json\n{"path": "."}\n```\nObservation: a.txt'
    );
    expect(decision).toMatchObject({kind: 'invoke', toolName: 'list_files', arguments: {path: '.'}});
  });

  it('treats an empty action input as no arguments', () => {
    const decision = parseReactOutput('Thought: list\nAction: list_files\nAction Input:');
    expect(decision).toMatchObject({kind: 'invoke', toolName: 'list_files', arguments: {}});
  });

  it('rejects action input that is not JSON', () => {
    expect(() => parseReactOutput('Thought: x\nAction: shell\nAction Input: ls -la')).toThrow(
      'Action Input is not valid JSON. Provide a single JSON object.'
    );
  });

  it('rejects action input that is a JSON array', () => {
    expect(() => parseReactOutput('Action: shell\nAction Input: ["ls"]')).toThrow(MalformedDecisionError);
  });

  it('rejects an invalid tool name', () => {
    expect(() => parseReactOutput('Action: run the shell\nAction Input: {}')).toThrow(
      '"run the shell" is not a valid tool name.'
    );
  });

  it('keeps the raw output on malformed responses', () => {
    try {
      parseReactOutput('I am not sure what to do.');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedDecisionError);
      expect(error).toHaveProperty('rawOutput', 'I am not sure what to do.');
    }
  });
});
