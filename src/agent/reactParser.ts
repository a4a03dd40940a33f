import {MalformedDecisionError} from './errors.js';
import type {Decision} from './types.js';

const TOOL_NAME = /^[A-Za-z_][\w.-]*$/;

const extractThought = (output: string): string => {
  const thoughtMatch = output.match(/Thought:\s*([\s\S]*?)(?:\n[A-Z][^:\n]+:|$)/i);
  return thoughtMatch ? thoughtMatch[1].trim() : '';
};

const stripCodeFence = (value: string): string => {
  const fenced = value.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced ? fenced[1] : value;
};

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseArguments = (rawInput: string, output: string): Record<string, unknown> => {
  const candidate = stripCodeFence(rawInput.trim());
  if (!candidate.length) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    throw new MalformedDecisionError('Action Input is not valid JSON. Provide a single JSON object.', output);
  }

  if (!isPlainObject(parsed)) {
    throw new MalformedDecisionError('Action Input must be a JSON object, not an array or scalar.', output);
  }
  return parsed;
};

/**
 * Parses a ReAct-formatted completion into a Decision. A Final Response wins
 * over an Action when both appear.
 */
export const parseReactOutput = (output: string): Decision => {
  const trimmed = output.trim();
  const reasoning = extractThought(trimmed);

  const finalMatch = trimmed.match(/Final Response:\s*([\s\S]+)/i);
  if (finalMatch) {
    return {
      kind: 'finish',
      reasoning,
      finalAnswer: finalMatch[1].trim()
    };
  }

  const actionMatch = trimmed.match(/Action:\s*([^\n]+)\n\s*Action Input:\s*([\s\S]*?)(?:\n\s*Observation:|$)/i);
  if (actionMatch) {
    const toolName = actionMatch[1].trim().replace(/^`|`$/g, '');
    if (!TOOL_NAME.test(toolName)) {
      throw new MalformedDecisionError(`"${toolName}" is not a valid tool name.`, output);
    }
    return {
      kind: 'invoke',
      reasoning,
      toolName,
      arguments: parseArguments(actionMatch[2], output)
    };
  }

  throw new MalformedDecisionError(
    'Unable to parse the response. Reply with Thought/Action/Action Input or Thought/Final Response.',
    output
  );
};
