import {z} from 'zod';
import type {LanguageModel} from '../agent/decisionEngine.js';
import {CompletionServiceError, formatErrorMessage} from '../agent/errors.js';
import type {ChatMessage} from '../agent/types.js';
import {forwardAbort} from '../utils/abort.js';

const completionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            role: z.string().optional(),
            content: z.string().nullable().optional()
          })
          .optional()
      })
    )
    .optional(),
  error: z
    .object({
      message: z.string(),
      type: z.string().optional()
    })
    .optional()
});

export interface ChatCompletionClientOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  temperature?: number;
  requestTimeoutMs?: number;
}

/** Client for any OpenAI-compatible `/chat/completions` endpoint. */
export class ChatCompletionClient implements LanguageModel {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly temperature: number;
  private readonly requestTimeoutMs: number;

  constructor(options: ChatCompletionClientOptions) {
    if (!options.apiKey) {
      throw new CompletionServiceError('An API key for the completion service is required.');
    }

    this.apiKey = options.apiKey;
    this.model = options.model ?? 'gpt-4o-mini';
    this.baseUrl = (options.baseUrl ?? 'https://api.openai.com/v1').replace(/\/+$/, '');
    this.temperature = options.temperature ?? 0;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 60_000;
  }

  async complete(messages: ChatMessage[], signal: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const detach = forwardAbort(signal, controller);
    const timer = setTimeout(
      () => controller.abort(new CompletionServiceError(`Completion request timed out after ${this.requestTimeoutMs}ms.`)),
      this.requestTimeoutMs
    );

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          temperature: this.temperature
        }),
        signal: controller.signal
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new CompletionServiceError(`Completion service error (${response.status}): ${errorText}`);
      }

      const payload = completionResponseSchema.safeParse(await response.json());
      if (!payload.success) {
        throw new CompletionServiceError('Completion service returned an unexpected payload.');
      }

      const message = payload.data.choices?.[0]?.message?.content?.trim();
      if (!message) {
        const details = payload.data.error?.message ?? 'Empty completion payload.';
        throw new CompletionServiceError(`Completion response missing content: ${details}`);
      }

      return message;
    } catch (error) {
      if (controller.signal.aborted) {
        throw controller.signal.reason;
      }
      if (error instanceof CompletionServiceError) {
        throw error;
      }
      throw new CompletionServiceError(`Completion request failed: ${formatErrorMessage(error)}`, {cause: error});
    } finally {
      clearTimeout(timer);
      detach();
    }
  }
}
