import type {Stats} from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import {z} from 'zod';
import {ToolExecutionError} from '../agent/errors.js';
import type {Tool, ToolExecutionContext} from '../agent/types.js';
import {defineTool} from './execution.js';
import {pathFromSandboxRoot, resolveRealSandboxPath} from './pathUtils.js';

export interface FileToolOptions {
  timeoutMs: number;
  maxOutputChars: number;
}

const MAX_READ_BYTES = 500_000;

const fsFault = (toolName: string, target: string, error: unknown) => {
  const code = (error as NodeJS.ErrnoException).code;
  const reason = code === 'ENOENT' ? 'no such file or directory' : (error as Error).message;
  return new ToolExecutionError(toolName, `Cannot access ${target}: ${reason}`, {cause: error});
};

const formatDirEntry = async (target: string, entry: string) => {
  try {
    const stat = await fs.stat(path.join(target, entry));
    return stat.isDirectory() ? `${entry}/` : entry;
  } catch (error) {
    return `${entry} (error: ${(error as Error).message})`;
  }
};

/**
 * Reads a UTF-8 file inside the sandbox root. Shared by the read_file tool and
 * the CLI's `/read` command.
 */
export const readSandboxFile = async (
  inputPath: string,
  ctx: ToolExecutionContext,
  toolName = 'read_file'
): Promise<string> => {
  const target = await resolveRealSandboxPath(inputPath, ctx, toolName);

  let stat: Stats;
  try {
    stat = await fs.stat(target);
  } catch (error) {
    throw fsFault(toolName, inputPath, error);
  }

  if (stat.isDirectory()) {
    throw new ToolExecutionError(toolName, `${inputPath} is a directory. Provide a file path.`);
  }
  if (stat.size > MAX_READ_BYTES) {
    throw new ToolExecutionError(toolName, `${inputPath} is too large to read (${MAX_READ_BYTES} byte limit).`);
  }

  try {
    return await fs.readFile(target, 'utf8');
  } catch (error) {
    throw fsFault(toolName, inputPath, error);
  }
};

export const createReadFileTool = ({timeoutMs, maxOutputChars}: FileToolOptions): Tool =>
  defineTool({
    descriptor: {
      name: 'read_file',
      description: 'Read the contents of a UTF-8 text file inside the sandbox root.',
      inputGuide: 'JSON: {"path": "notes/todo.txt"}',
      timeoutMs,
      sideEffect: 'read-only',
      maxOutputChars
    },
    schema: z.object({path: z.string().trim().min(1, 'Provide a file path.')}),
    async execute({path: inputPath}, ctx) {
      return {output: await readSandboxFile(inputPath, ctx), exitStatus: 0};
    }
  });

export const createWriteFileTool = ({timeoutMs, maxOutputChars}: FileToolOptions): Tool =>
  defineTool({
    descriptor: {
      name: 'write_file',
      description: 'Create or overwrite a UTF-8 text file inside the sandbox root. Parent directories are created.',
      inputGuide: 'JSON: {"path": "out/result.txt", "content": "..."}',
      timeoutMs,
      sideEffect: 'mutating',
      maxOutputChars
    },
    schema: z.object({
      path: z.string().trim().min(1, 'Provide a file path.'),
      content: z.string()
    }),
    async execute({path: inputPath, content}, ctx) {
      const target = await resolveRealSandboxPath(inputPath, ctx, 'write_file');
      try {
        await fs.mkdir(path.dirname(target), {recursive: true});
        await fs.writeFile(target, content, 'utf8');
      } catch (error) {
        throw fsFault('write_file', inputPath, error);
      }
      return {
        output: `Wrote ${content.length} characters to ${pathFromSandboxRoot(target, ctx)}`,
        exitStatus: 0
      };
    }
  });

export const createListFilesTool = ({timeoutMs, maxOutputChars}: FileToolOptions): Tool =>
  defineTool({
    descriptor: {
      name: 'list_files',
      description: 'List files and directories inside the sandbox root (directories end with /).',
      inputGuide: 'JSON: {"path": "."}',
      timeoutMs,
      sideEffect: 'read-only',
      maxOutputChars
    },
    schema: z.object({path: z.string().default('.')}),
    async execute({path: inputPath}, ctx) {
      const target = await resolveRealSandboxPath(inputPath, ctx, 'list_files');
      let entries: string[];
      try {
        entries = await fs.readdir(target);
      } catch (error) {
        throw fsFault('list_files', inputPath, error);
      }
      if (!entries.length) {
        return {output: '(empty directory)', exitStatus: 0};
      }
      const formatted = await Promise.all(entries.sort().map(entry => formatDirEntry(target, entry)));
      return {output: formatted.join('\n'), exitStatus: 0};
    }
  });
