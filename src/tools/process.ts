import {spawn, type ChildProcess} from 'node:child_process';
import {ToolExecutionError} from '../agent/errors.js';

export interface ProcessOptions {
  cwd: string;
  signal: AbortSignal;
  env?: Record<string, string>;
  /** Characters kept per stream; the rest is read and dropped. */
  maxOutputChars: number;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  truncated: boolean;
}

const SIGNAL_EXIT_BASE = 128;
const SIGNAL_NUMBERS: Record<string, number> = {SIGHUP: 1, SIGINT: 2, SIGKILL: 9, SIGTERM: 15};

// The shell may already have exited while a backgrounded grandchild still
// holds the pipes, so the group is signalled even when the child is gone.
const killGroup = (child: ChildProcess) => {
  if (child.pid === undefined) {
    return;
  }
  try {
    process.kill(-child.pid, 'SIGKILL');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ESRCH') {
      child.kill('SIGKILL');
    }
  }
};

class OutputBuffer {
  private text = '';
  truncated = false;

  constructor(private readonly limit: number) {}

  append(chunk: string) {
    if (this.truncated) {
      return;
    }
    const room = this.limit - this.text.length;
    if (chunk.length > room) {
      this.text += chunk.slice(0, room);
      this.truncated = true;
      return;
    }
    this.text += chunk;
  }

  toString() {
    return this.text;
  }
}

/**
 * Runs a process in its own group and collects up to `maxOutputChars` of each
 * stream. A nonzero exit is a normal result; only a failure to spawn rejects.
 * Aborting the signal kills the group and rejects with the signal's reason.
 */
export const runProcess = (toolName: string, command: string, args: string[], options: ProcessOptions) =>
  new Promise<ProcessResult>((resolve, reject) => {
    if (options.signal.aborted) {
      reject(options.signal.reason);
      return;
    }

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: {...process.env, ...(options.env ?? {})},
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true
    });

    const stdout = new OutputBuffer(options.maxOutputChars);
    const stderr = new OutputBuffer(options.maxOutputChars);
    let settled = false;
    let closed = false;

    const onAbort = () => {
      if (!closed) {
        killGroup(child);
      }
      if (!settled) {
        settled = true;
        reject(options.signal.reason);
      }
    };
    options.signal.addEventListener('abort', onAbort, {once: true});

    child.stdout.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout.append(chunk);
    });

    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      stderr.append(chunk);
    });

    child.on('error', error => {
      options.signal.removeEventListener('abort', onAbort);
      if (settled) {
        return;
      }
      settled = true;
      reject(new ToolExecutionError(toolName, `Failed to start ${command}: ${error.message}`, {cause: error}));
    });

    child.on('close', (exitCode, exitSignal) => {
      closed = true;
      options.signal.removeEventListener('abort', onAbort);
      if (settled) {
        return;
      }
      settled = true;
      resolve({
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        exitCode: exitCode ?? SIGNAL_EXIT_BASE + (exitSignal ? SIGNAL_NUMBERS[exitSignal] ?? 0 : 0),
        truncated: stdout.truncated || stderr.truncated
      });
    });
  });

export const formatProcessOutput = ({stdout, stderr, exitCode}: ProcessResult): string => {
  const sections: string[] = [];
  if (stdout.trim().length) {
    sections.push(stdout.trimEnd());
  }
  if (stderr.trim().length) {
    sections.push(`[stderr]\n${stderr.trimEnd()}`);
  }
  if (!sections.length) {
    sections.push(exitCode === 0 ? '(no output)' : `(no output, exit code ${exitCode})`);
  }
  return sections.join('\n');
};
