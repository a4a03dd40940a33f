import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {z} from 'zod';
import type {
  Decision,
  DecisionEngine,
  DecisionInput,
  Tool,
  ToolExecutionContext,
  ToolOutput
} from '../src/agent/types.js';
import {createLogger} from '../src/logger.js';
import {defineTool} from '../src/tools/execution.js';

export const silentLogger = createLogger({level: 'silent', pretty: false});

export const createTempRoot = async (): Promise<string> =>
  fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'tasklooper-test-')));

export const removeTempRoot = (root: string) => fs.rm(root, {recursive: true, force: true});

export const createCtx = (sandboxRoot: string, signal = new AbortController().signal): ToolExecutionContext => ({
  sandboxRoot,
  signal
});

export const invoke = (toolName: string, args: Record<string, unknown> = {}, reasoning = ''): Decision => ({
  kind: 'invoke',
  toolName,
  arguments: args,
  reasoning
});

export const finish = (finalAnswer: string, reasoning = ''): Decision => ({kind: 'finish', finalAnswer, reasoning});

/**
 * Engine replaying a fixed list of decisions (the last one repeats forever),
 * or computing each decision from the call input.
 */
export class ScriptedEngine implements DecisionEngine {
  readonly calls: DecisionInput[] = [];

  constructor(private readonly script: Decision[] | ((input: DecisionInput, call: number) => Promise<Decision>)) {}

  async decide(input: DecisionInput): Promise<Decision> {
    this.calls.push(input);
    const call = this.calls.length - 1;
    if (typeof this.script === 'function') {
      return this.script(input, call);
    }
    return this.script[Math.min(call, this.script.length - 1)];
  }
}

export const createEchoTool = (name = 'echo'): Tool =>
  defineTool({
    descriptor: {
      name,
      description: 'Echo the given text.',
      inputGuide: 'JSON: {"text": "..."}',
      timeoutMs: 1000,
      sideEffect: 'read-only',
      maxOutputChars: 100
    },
    schema: z.object({text: z.string()}),
    async execute({text}) {
      return {output: text, exitStatus: 0};
    }
  });

export const createFailingTool = (name: string, message: string): Tool =>
  defineTool({
    descriptor: {
      name,
      description: 'Always fails.',
      inputGuide: 'JSON: {}',
      timeoutMs: 1000,
      sideEffect: 'mutating',
      maxOutputChars: 100
    },
    schema: z.object({}).passthrough(),
    async execute() {
      throw new Error(message);
    }
  });

/** Tool that never settles on its own; records the signal it was given. */
export const createHangingTool = (name: string, timeoutMs: number, signals: AbortSignal[] = []): Tool =>
  defineTool({
    descriptor: {
      name,
      description: 'Never finishes.',
      inputGuide: 'JSON: {}',
      timeoutMs,
      sideEffect: 'read-only',
      maxOutputChars: 100
    },
    schema: z.object({}).passthrough(),
    execute(_args, ctx) {
      signals.push(ctx.signal);
      return new Promise<ToolOutput>(() => {});
    }
  });

/** True while `pid` exists and has not exited; zombies count as exited. */
export const isProcessRunning = async (pid: number): Promise<boolean> => {
  try {
    const stat = await fs.readFile(`/proc/${pid}/stat`, 'utf8');
    return !/\)\s+Z\s/.test(stat);
  } catch {
    return false;
  }
};
