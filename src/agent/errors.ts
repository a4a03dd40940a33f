export type AgentErrorCode =
  | 'duplicate_tool'
  | 'unknown_tool'
  | 'invalid_tool_arguments'
  | 'tool_execution'
  | 'tool_cancelled'
  | 'path_escape'
  | 'tool_timeout'
  | 'malformed_decision'
  | 'completion_service'
  | 'configuration';

export class AgentError extends Error {
  constructor(
    readonly code: AgentErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DuplicateToolError extends AgentError {
  constructor(readonly toolName: string) {
    super('duplicate_tool', `Tool "${toolName}" is already registered.`);
  }
}

export class UnknownToolError extends AgentError {
  constructor(readonly toolName: string, available: readonly string[] = []) {
    const hint = available.length ? ` Available tools: ${available.join(', ')}.` : '';
    super('unknown_tool', `Unknown tool "${toolName}".${hint}`);
  }
}

export class InvalidToolArgumentsError extends AgentError {
  constructor(readonly toolName: string, readonly issues: string[]) {
    super('invalid_tool_arguments', `Invalid arguments for ${toolName}: ${issues.join('; ')}`);
  }
}

/**
 * Environment-level fault while running a tool: the process could not be
 * spawned, a file could not be opened, the network was unreachable.
 * A target that merely fails (nonzero exit, HTTP 404) is not one of these.
 */
export class ToolExecutionError extends AgentError {
  constructor(
    readonly toolName: string,
    message: string,
    options?: ErrorOptions & {code?: AgentErrorCode}
  ) {
    super(options?.code ?? 'tool_execution', message, options);
  }
}

export class PathEscapeError extends ToolExecutionError {
  constructor(toolName: string, readonly requestedPath: string) {
    super(toolName, `Path "${requestedPath}" resolves outside of the sandbox root.`, {
      code: 'path_escape'
    });
  }
}

/** Raised when the enclosing run is aborted while a tool is still running. */
export class ToolCancelledError extends ToolExecutionError {
  constructor(toolName: string, reason: string) {
    super(toolName, `${toolName} was cancelled: ${reason}`, {code: 'tool_cancelled'});
  }
}

export class ToolTimeoutError extends AgentError {
  constructor(readonly toolName: string, readonly timeoutMs: number) {
    super('tool_timeout', `${toolName} timed out after ${timeoutMs}ms.`);
  }
}

export class MalformedDecisionError extends AgentError {
  constructor(message: string, readonly rawOutput: string) {
    super('malformed_decision', message);
  }
}

export class CompletionServiceError extends AgentError {
  constructor(message: string, options?: ErrorOptions) {
    super('completion_service', message, options);
  }
}

export class ConfigurationError extends AgentError {
  constructor(message: string) {
    super('configuration', message);
  }
}

export const formatErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
