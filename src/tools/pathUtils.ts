import fs from 'node:fs/promises';
import path from 'node:path';
import {PathEscapeError} from '../agent/errors.js';
import type {ToolExecutionContext} from '../agent/types.js';

const isInside = (root: string, target: string) =>
  target === root || target.startsWith(`${root}${path.sep}`);

/**
 * Resolves a tool-supplied path against the sandbox root. Relative paths are
 * taken from the root; absolute paths must already point inside it.
 */
export const resolveSandboxPath = (inputPath: string, ctx: ToolExecutionContext, toolName: string): string => {
  const root = path.resolve(ctx.sandboxRoot);
  const normalized = inputPath.trim().length ? inputPath.trim() : '.';
  const target = path.resolve(root, normalized);

  if (!isInside(root, target)) {
    throw new PathEscapeError(toolName, inputPath);
  }

  return target;
};

const nearestExisting = async (target: string): Promise<string> => {
  let current = target;
  for (;;) {
    try {
      return await fs.realpath(current);
    } catch (error) {
      const parent = path.dirname(current);
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT' || parent === current) {
        throw error;
      }
      current = parent;
    }
  }
};

/**
 * Like resolveSandboxPath, and also follows symlinks on the existing part of
 * the path so a link inside the root cannot lead outside it.
 */
export const resolveRealSandboxPath = async (
  inputPath: string,
  ctx: ToolExecutionContext,
  toolName: string
): Promise<string> => {
  const target = resolveSandboxPath(inputPath, ctx, toolName);
  const realRoot = await fs.realpath(path.resolve(ctx.sandboxRoot));
  const realTarget = await nearestExisting(target);

  if (!isInside(realRoot, realTarget)) {
    throw new PathEscapeError(toolName, inputPath);
  }

  return target;
};

export const pathFromSandboxRoot = (absolutePath: string, ctx: ToolExecutionContext): string => {
  const root = path.resolve(ctx.sandboxRoot);
  return path.relative(root, absolutePath) || '.';
};
