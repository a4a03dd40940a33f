import {performance} from 'node:perf_hooks';
import type {z} from 'zod';
import {
  AgentError,
  InvalidToolArgumentsError,
  ToolCancelledError,
  ToolExecutionError,
  ToolTimeoutError,
  formatErrorMessage
} from '../agent/errors.js';
import type {Observation, Tool, ToolDescriptor, ToolExecutionContext, ToolOutput} from '../agent/types.js';
import {abortable, forwardAbort} from '../utils/abort.js';

export const TRUNCATION_MARKER = '\n...truncated...';

export const truncateOutput = (value: string, limit: number): {output: string; truncated: boolean} =>
  value.length > limit
    ? {output: `${value.slice(0, limit)}${TRUNCATION_MARKER}`, truncated: true}
    : {output: value, truncated: false};

export interface ToolDefinition<Schema extends z.ZodTypeAny> {
  descriptor: ToolDescriptor;
  schema: Schema;
  execute(args: z.infer<Schema>, context: ToolExecutionContext): Promise<ToolOutput>;
}

/** Binds a zod input schema to an executor so the registry can hold tools of any argument shape. */
export const defineTool = <Schema extends z.ZodTypeAny>(definition: ToolDefinition<Schema>): Tool => ({
  descriptor: definition.descriptor,
  async invoke(input, context) {
    const parsed = definition.schema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidToolArgumentsError(
        definition.descriptor.name,
        parsed.error.issues.map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
      );
    }
    return definition.execute(parsed.data, context);
  }
});

/**
 * Runs one tool invocation under the descriptor's timeout and the run's signal.
 *
 * Resolves with a bounded Observation whenever the tool itself reports a result,
 * including a failing target. Rejects with InvalidToolArgumentsError,
 * ToolTimeoutError, ToolCancelledError, PathEscapeError or ToolExecutionError.
 */
export const executeTool = async (
  tool: Tool,
  args: Record<string, unknown>,
  context: ToolExecutionContext
): Promise<Observation> => {
  const {name, timeoutMs, maxOutputChars} = tool.descriptor;
  const controller = new AbortController();
  const detach = forwardAbort(context.signal, controller);
  const timer = setTimeout(() => controller.abort(new ToolTimeoutError(name, timeoutMs)), timeoutMs);
  const startedAt = performance.now();

  try {
    const result = await abortable(tool.invoke(args, {...context, signal: controller.signal}), controller.signal);
    const {output, truncated} = result.truncated
      ? {output: `${result.output.slice(0, maxOutputChars)}${TRUNCATION_MARKER}`, truncated: true}
      : truncateOutput(result.output, maxOutputChars);
    return {
      output,
      exitStatus: result.exitStatus,
      durationMs: Math.round(performance.now() - startedAt),
      truncated
    };
  } catch (error) {
    if (controller.signal.aborted) {
      const reason: unknown = controller.signal.reason;
      if (reason instanceof ToolTimeoutError) {
        throw reason;
      }
      throw new ToolCancelledError(name, formatErrorMessage(reason));
    }
    if (error instanceof AgentError) {
      throw error;
    }
    throw new ToolExecutionError(name, formatErrorMessage(error), {cause: error});
  } finally {
    clearTimeout(timer);
    detach();
  }
};
