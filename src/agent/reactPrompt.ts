import type {ChatMessage, DecisionInput, Step, ToolDescriptor} from './types.js';

const FORMAT_GUIDE = `Use the ReAct pattern to solve the task.
Respond using the following blocks:
Thought: describe what you are considering.
Action: the name of a tool, exactly matching one of the provided tools.
Action Input: the tool arguments as a single JSON object.

If you have finished, reply with:
Thought: describe how you solved it.
Final Response: the final answer for the user.`;

const SAFETY_RULES = `- Think before acting; never guess commands.
- Prefer reading files before writing to them.
- Execute at most one tool per response.
- Only touch files inside the sandbox root; never delete data.
- If a tool fails, change your approach instead of repeating the same call.
- Never fabricate tool names or capabilities.`;

export const describeTool = (tool: ToolDescriptor): string => {
  const access = tool.sideEffect === 'read-only' ? 'read-only' : 'may modify state';
  return `- ${tool.name} (${access}, ${Math.round(tool.timeoutMs / 1000)}s limit): ${tool.description}\n  Input: ${tool.inputGuide}`;
};

const describeObservation = (step: Step): string => {
  if (step.status === 'ok' && step.observation) {
    const {exitStatus, truncated, output} = step.observation;
    const flags = [`exit status ${exitStatus}`, ...(truncated ? ['truncated'] : [])].join(', ');
    return `Observation (${flags}):\n${output}`;
  }
  return `Observation [${step.status}]: ${step.error ?? 'no details'}`;
};

export const renderStep = (step: Step): string => {
  const lines = [`Thought: ${step.reasoning || '(none)'}`];
  if (step.action) {
    lines.push(`Action: ${step.action.toolName}`, `Action Input: ${JSON.stringify(step.action.arguments)}`);
  }
  if (step.finalAnswer !== null) {
    lines.push(`Final Response: ${step.finalAnswer}`);
    return lines.join('\n');
  }
  lines.push(describeObservation(step));
  return lines.join('\n');
};

export interface ReactPromptOptions extends DecisionInput {
  instructions: string;
}

export const buildReactMessages = ({
  instructions,
  task,
  steps,
  catalogue,
  correction
}: ReactPromptOptions): ChatMessage[] => {
  const toolDescriptions = catalogue.map(describeTool).join('\n');

  const systemPrompt = `You are an autonomous task agent working inside a sandboxed workspace.
${instructions.trim()}

Available tools:\n${toolDescriptions}\n\n${FORMAT_GUIDE}\n\n${SAFETY_RULES}`;

  const scratchpad = steps.map(renderStep).join('\n\n');
  const scratchpadBlock = scratchpad.length ? `\n\nScratchpad:\n${scratchpad}` : '';
  const correctionBlock = correction ? `\n\nCorrection: ${correction}` : '';

  return [
    {role: 'system', content: systemPrompt},
    {role: 'user', content: `${task.goal}${scratchpadBlock}${correctionBlock}`}
  ];
};
