export type Role = 'system' | 'user' | 'assistant' | 'tool';

export interface ChatMessage {
  role: Role;
  content: string;
  name?: string;
}

export type SideEffectClass = 'read-only' | 'mutating';

export interface ToolDescriptor {
  name: string;
  description: string;
  inputGuide: string;
  timeoutMs: number;
  sideEffect: SideEffectClass;
  maxOutputChars: number;
}

export interface ToolExecutionContext {
  sandboxRoot: string;
  signal: AbortSignal;
  env?: Record<string, string>;
}

/** What an executor reports before the dispatch layer bounds and times it. */
export interface ToolOutput {
  output: string;
  exitStatus: number;
  /** Set when the tool already dropped part of its output. */
  truncated?: boolean;
}

export interface Observation {
  output: string;
  exitStatus: number;
  durationMs: number;
  truncated: boolean;
}

export interface Tool {
  readonly descriptor: ToolDescriptor;
  /**
   * Validates the decision's arguments against the tool's input schema and runs it.
   * Throws InvalidToolArgumentsError before doing any work when validation fails.
   */
  invoke(input: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput>;
}

export interface Task {
  readonly id: string;
  readonly goal: string;
  readonly createdAt: string;
}

export interface ToolInvocation {
  toolName: string;
  arguments: Record<string, unknown>;
}

export type StepStatus = 'ok' | 'tool_error' | 'timeout' | 'invalid_action';

export interface Step {
  readonly index: number;
  readonly reasoning: string;
  readonly action: Readonly<ToolInvocation> | null;
  readonly finalAnswer: string | null;
  readonly observation: Readonly<Observation> | null;
  readonly status: StepStatus;
  readonly error: string | null;
  readonly timestamp: string;
}

export type StepDraft = Omit<Step, 'index' | 'timestamp'>;

export type Decision =
  | {
      kind: 'invoke';
      toolName: string;
      arguments: Record<string, unknown>;
      reasoning: string;
    }
  | {
      kind: 'finish';
      finalAnswer: string;
      reasoning: string;
    };

export interface DecisionInput {
  task: Task;
  steps: readonly Step[];
  catalogue: readonly ToolDescriptor[];
  /** Note for the engine after an invalid action on the previous step. */
  correction?: string;
}

export interface DecisionEngine {
  decide(input: DecisionInput, signal: AbortSignal): Promise<Decision>;
}

export type LoopState = 'RUNNING' | 'AWAITING_TOOL' | 'FINISHED' | 'ABORTED';

export type AbortReason =
  | 'budget_exhausted'
  | 'repeated_invalid_action'
  | 'repeated_tool_failure'
  | 'cancelled'
  | 'decision_failed';

export type RunResult =
  | {
      status: 'finished';
      task: Task;
      answer: string;
      steps: readonly Step[];
    }
  | {
      status: 'aborted';
      task: Task;
      reason: AbortReason;
      detail: string;
      steps: readonly Step[];
    };

export interface LoopLimits {
  maxIterations: number;
  timeBudgetMs: number;
  /** Consecutive invalid steps that abort the run; 2 allows one corrective retry. */
  maxConsecutiveInvalidActions: number;
  /** Back-to-back identical tool failures that abort the run. */
  repeatedFailureThreshold: number;
}
