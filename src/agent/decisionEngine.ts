import {buildReactMessages} from './reactPrompt.js';
import {parseReactOutput} from './reactParser.js';
import type {ChatMessage, Decision, DecisionEngine, DecisionInput} from './types.js';

/** The opaque completion service: messages in, text out. */
export interface LanguageModel {
  complete(messages: ChatMessage[], signal: AbortSignal): Promise<string>;
}

export interface LlmDecisionEngineOptions {
  instructions: string;
}

/**
 * Decision engine backed by a chat completion model speaking the ReAct text
 * format. Throws MalformedDecisionError for replies that are neither an action
 * nor a final response; completion failures propagate from the model.
 */
export class LlmDecisionEngine implements DecisionEngine {
  constructor(
    private readonly llm: LanguageModel,
    private readonly options: LlmDecisionEngineOptions
  ) {}

  async decide(input: DecisionInput, signal: AbortSignal): Promise<Decision> {
    const messages = buildReactMessages({...input, instructions: this.options.instructions});
    const output = await this.llm.complete(messages, signal);
    return parseReactOutput(output);
  }
}
