import {executeTool} from '../tools/execution.js';
import type {ToolRegistry} from '../tools/registry.js';
import {getLogger, type Logger} from '../logger.js';
import {abortable} from '../utils/abort.js';
import {stableStringify} from '../utils/stableStringify.js';
import {
  InvalidToolArgumentsError,
  MalformedDecisionError,
  ToolTimeoutError,
  UnknownToolError,
  formatErrorMessage
} from './errors.js';
import {Trace, createTask, type Clock} from './trace.js';
import type {
  AbortReason,
  Decision,
  DecisionEngine,
  LoopLimits,
  LoopState,
  RunResult,
  Step,
  StepDraft,
  StepStatus,
  Tool,
  ToolInvocation
} from './types.js';

export const DEFAULT_LIMITS: LoopLimits = {
  maxIterations: 15,
  timeBudgetMs: 300_000,
  maxConsecutiveInvalidActions: 2,
  repeatedFailureThreshold: 2
};

export interface ReactAgentOptions {
  engine: DecisionEngine;
  registry: ToolRegistry;
  sandboxRoot: string;
  limits?: Partial<LoopLimits>;
  logger?: Logger;
  clock?: Clock;
}

export interface AgentRunOptions {
  signal?: AbortSignal;
  env?: Record<string, string>;
  onStep?: (step: Step) => void;
  onStateChange?: (state: LoopState) => void;
}

/** Abort reason carried on the run's signal. */
class RunAborted extends Error {
  constructor(readonly reason: AbortReason, message: string) {
    super(message);
    this.name = 'RunAborted';
  }
}

const toRunAborted = (reason: unknown): RunAborted =>
  reason instanceof RunAborted ? reason : new RunAborted('cancelled', formatErrorMessage(reason));

interface RunSession {
  trace: Trace;
  signal: AbortSignal;
  log: Logger;
  options: AgentRunOptions;
  state: LoopState;
  consecutiveInvalid: number;
  lastFailureKey: string | null;
  identicalFailures: number;
  correction: string | undefined;
}

const invalidStep = (reasoning: string, action: ToolInvocation | null, error: string): StepDraft => ({
  reasoning,
  action,
  finalAnswer: null,
  observation: null,
  status: 'invalid_action',
  error
});

/**
 * Think → Act → Observe loop. Each run owns its trace; the registry and the
 * decision engine are shared and only read.
 *
 * Tool and decision faults become steps and feed the next decision. Runs end
 * FINISHED on a final answer, or ABORTED on an exhausted iteration or time
 * budget, repeated invalid actions, repeated identical tool failures,
 * cancellation, or a failing completion service. `run` never rejects for any
 * of these.
 */
export class ReactAgent {
  private readonly engine: DecisionEngine;
  private readonly registry: ToolRegistry;
  private readonly sandboxRoot: string;
  private readonly limits: LoopLimits;
  private readonly logger: Logger;
  private readonly clock: Clock | undefined;

  constructor(options: ReactAgentOptions) {
    this.engine = options.engine;
    this.registry = options.registry;
    this.sandboxRoot = options.sandboxRoot;
    this.limits = {...DEFAULT_LIMITS, ...options.limits};
    this.logger = options.logger ?? getLogger();
    this.clock = options.clock;
  }

  async run(goal: string, options: AgentRunOptions = {}): Promise<RunResult> {
    const task = createTask(goal, this.clock);
    const controller = new AbortController();
    const session: RunSession = {
      trace: new Trace(task, this.clock),
      signal: controller.signal,
      log: this.logger.child({runId: task.id}),
      options,
      state: 'RUNNING',
      consecutiveInvalid: 0,
      lastFailureKey: null,
      identicalFailures: 0,
      correction: undefined
    };

    const onCallerAbort = () => controller.abort(new RunAborted('cancelled', 'Run cancelled by the caller.'));
    if (options.signal?.aborted) {
      onCallerAbort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, {once: true});
    }

    const {timeBudgetMs} = this.limits;
    const timer = setTimeout(
      () =>
        controller.abort(
          new RunAborted('budget_exhausted', `Time budget of ${timeBudgetMs}ms exhausted after ${session.trace.length} steps.`)
        ),
      timeBudgetMs
    );

    session.log.info({goal: task.goal, limits: this.limits}, 'run started');
    options.onStateChange?.('RUNNING');

    try {
      const result = await this.loop(session);
      if (result.status === 'finished') {
        session.log.info({steps: result.steps.length}, 'run finished');
      } else {
        session.log.warn({steps: result.steps.length, reason: result.reason, detail: result.detail}, 'run aborted');
      }
      return result;
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
      // releases anything still listening on the run signal
      if (!controller.signal.aborted) {
        controller.abort(new RunAborted('cancelled', 'Run ended.'));
      }
    }
  }

  private async loop(session: RunSession): Promise<RunResult> {
    const {trace} = session;
    const catalogue = this.registry.catalogue();

    for (;;) {
      if (session.signal.aborted) {
        return this.abortFromSignal(session);
      }

      if (trace.length >= this.limits.maxIterations) {
        return this.abort(session, 'budget_exhausted', `Iteration budget of ${this.limits.maxIterations} exhausted.`);
      }

      let decision: Decision;
      try {
        decision = await abortable(
          this.engine.decide(
            {task: trace.task, steps: trace.steps, catalogue, correction: session.correction},
            session.signal
          ),
          session.signal
        );
      } catch (error) {
        if (session.signal.aborted) {
          return this.abortFromSignal(session);
        }
        if (error instanceof MalformedDecisionError) {
          const aborted = this.recordInvalid(session, invalidStep('', null, error.message));
          if (aborted) {
            return aborted;
          }
          continue;
        }
        return this.abort(session, 'decision_failed', formatErrorMessage(error));
      }

      if (decision.kind === 'finish') {
        this.record(session, {
          reasoning: decision.reasoning,
          action: null,
          finalAnswer: decision.finalAnswer,
          observation: null,
          status: 'ok',
          error: null
        });
        this.transition(session, 'FINISHED');
        return {status: 'finished', task: trace.task, answer: decision.finalAnswer, steps: trace.steps};
      }

      const action: ToolInvocation = {toolName: decision.toolName, arguments: decision.arguments};

      let tool: Tool;
      try {
        tool = this.registry.resolve(decision.toolName);
      } catch (error) {
        if (!(error instanceof UnknownToolError)) {
          throw error;
        }
        const aborted = this.recordInvalid(session, invalidStep(decision.reasoning, action, error.message));
        if (aborted) {
          return aborted;
        }
        continue;
      }

      const aborted = await this.dispatch(session, tool, action, decision.reasoning);
      if (aborted) {
        return aborted;
      }
    }
  }

  private async dispatch(
    session: RunSession,
    tool: Tool,
    action: ToolInvocation,
    reasoning: string
  ): Promise<RunResult | null> {
    this.transition(session, 'AWAITING_TOOL');

    try {
      const observation = await executeTool(tool, action.arguments, {
        sandboxRoot: this.sandboxRoot,
        signal: session.signal,
        env: session.options.env
      });
      this.record(session, {reasoning, action, finalAnswer: null, observation, status: 'ok', error: null});
      session.consecutiveInvalid = 0;
      session.lastFailureKey = null;
      session.identicalFailures = 0;
      session.correction = undefined;
    } catch (error) {
      if (error instanceof InvalidToolArgumentsError) {
        this.transition(session, 'RUNNING');
        return this.recordInvalid(session, invalidStep(reasoning, action, error.message));
      }

      const status: StepStatus = error instanceof ToolTimeoutError ? 'timeout' : 'tool_error';
      const message = formatErrorMessage(error);
      this.record(session, {reasoning, action, finalAnswer: null, observation: null, status, error: message});
      session.log.warn({tool: action.toolName, status, error: message}, 'tool failed');
      session.consecutiveInvalid = 0;
      session.correction = undefined;

      const failureKey = stableStringify([action.toolName, action.arguments, status, message]);
      session.identicalFailures = failureKey === session.lastFailureKey ? session.identicalFailures + 1 : 1;
      session.lastFailureKey = failureKey;

      if (!session.signal.aborted && session.identicalFailures >= this.limits.repeatedFailureThreshold) {
        return this.abort(
          session,
          'repeated_tool_failure',
          `${action.toolName} failed identically ${session.identicalFailures} times in a row: ${message}`
        );
      }
    }

    this.transition(session, 'RUNNING');
    return null;
  }

  /** Records an invalid step; returns the aborted result once the retry bound is reached. */
  private recordInvalid(session: RunSession, draft: StepDraft): RunResult | null {
    this.record(session, draft);
    session.consecutiveInvalid += 1;
    session.lastFailureKey = null;
    session.identicalFailures = 0;
    session.log.warn({error: draft.error, consecutive: session.consecutiveInvalid}, 'invalid action');

    if (session.consecutiveInvalid >= this.limits.maxConsecutiveInvalidActions) {
      return this.abort(
        session,
        'repeated_invalid_action',
        `${session.consecutiveInvalid} consecutive invalid actions. Last: ${draft.error ?? 'unknown'}`
      );
    }

    const tools = this.registry
      .catalogue()
      .map(tool => tool.name)
      .join(', ');
    session.correction = `Your previous response was rejected: ${draft.error ?? 'invalid action'} Use exactly one of these tools (${tools}) with a JSON object as Action Input, or give a Final Response.`;
    return null;
  }

  private record(session: RunSession, draft: StepDraft): Step {
    const step = session.trace.append(draft);
    session.log.debug(
      {index: step.index, status: step.status, tool: step.action?.toolName, durationMs: step.observation?.durationMs},
      'step recorded'
    );
    session.options.onStep?.(step);
    return step;
  }

  private transition(session: RunSession, next: LoopState) {
    if (session.state === next) {
      return;
    }
    session.state = next;
    session.options.onStateChange?.(next);
  }

  private abortFromSignal(session: RunSession): RunResult {
    const {reason, message} = toRunAborted(session.signal.reason);
    return this.abort(session, reason, message);
  }

  private abort(session: RunSession, reason: AbortReason, detail: string): RunResult {
    this.transition(session, 'ABORTED');
    return {status: 'aborted', task: session.trace.task, reason, detail, steps: session.trace.steps};
  }
}
