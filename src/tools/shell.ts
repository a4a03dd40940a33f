import {z} from 'zod';
import type {Tool} from '../agent/types.js';
import {defineTool} from './execution.js';
import {resolveRealSandboxPath} from './pathUtils.js';
import {formatProcessOutput, runProcess} from './process.js';

export interface ShellToolOptions {
  timeoutMs: number;
  maxOutputChars: number;
}

const shellArgs = z.object({
  command: z.string().trim().min(1, 'Provide a shell command to run.'),
  cwd: z.string().optional()
});

export const createShellTool = ({timeoutMs, maxOutputChars}: ShellToolOptions): Tool =>
  defineTool({
    descriptor: {
      name: 'shell',
      description: 'Run a POSIX shell command from the sandbox root. Each call starts a fresh shell.',
      inputGuide: 'JSON: {"command": "ls -la", "cwd": "optional/sub/directory"}',
      timeoutMs,
      sideEffect: 'mutating',
      maxOutputChars
    },
    schema: shellArgs,
    async execute({command, cwd}, ctx) {
      const workingDirectory = await resolveRealSandboxPath(cwd ?? '.', ctx, 'shell');
      const result = await runProcess('shell', 'sh', ['-c', command], {
        cwd: workingDirectory,
        env: ctx.env,
        signal: ctx.signal,
        maxOutputChars
      });
      return {output: formatProcessOutput(result), exitStatus: result.exitCode, truncated: result.truncated};
    }
  });
