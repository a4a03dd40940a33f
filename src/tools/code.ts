import {z} from 'zod';
import type {Tool} from '../agent/types.js';
import {defineTool} from './execution.js';
import {formatProcessOutput, runProcess} from './process.js';

export interface CodeToolOptions {
  timeoutMs: number;
  maxOutputChars: number;
}

const RUNTIMES = {
  javascript: {command: process.execPath, flag: '-e'},
  python: {command: 'python3', flag: '-c'}
} as const;

const codeArgs = z.object({
  language: z.enum(['javascript', 'python']).default('javascript'),
  code: z.string().min(1, 'Provide code to execute.')
});

/**
 * Runs a snippet in a separate interpreter process, so a timeout or a
 * cancelled run can always kill it.
 */
export const createCodeTool = ({timeoutMs, maxOutputChars}: CodeToolOptions): Tool =>
  defineTool({
    descriptor: {
      name: 'run_code',
      description: 'Execute a JavaScript (Node.js) or Python snippet. Print results to stdout.',
      inputGuide: 'JSON: {"language": "javascript" | "python", "code": "console.log(21 * 2)"}',
      timeoutMs,
      sideEffect: 'mutating',
      maxOutputChars
    },
    schema: codeArgs,
    async execute({language, code}, ctx) {
      const runtime = RUNTIMES[language];
      const result = await runProcess('run_code', runtime.command, [runtime.flag, code], {
        cwd: ctx.sandboxRoot,
        env: ctx.env,
        signal: ctx.signal,
        maxOutputChars
      });
      return {output: formatProcessOutput(result), exitStatus: result.exitCode, truncated: result.truncated};
    }
  });
