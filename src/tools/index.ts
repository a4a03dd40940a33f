import type {Tool} from '../agent/types.js';
import type {ToolsConfig} from '../config.js';
import {createCodeTool} from './code.js';
import {createListFilesTool, createReadFileTool, createWriteFileTool} from './filesystem.js';
import {ToolRegistry} from './registry.js';
import {createShellTool} from './shell.js';
import {createHttpRequestTool, createWebFetchTool} from './web.js';

const FILE_TIMEOUT_MS = 10_000;

export const createDefaultTools = (config: ToolsConfig): Tool[] => {
  const maxOutputChars = config.maxOutputChars;
  return [
    createShellTool({timeoutMs: config.shellTimeoutMs, maxOutputChars}),
    createCodeTool({timeoutMs: config.codeTimeoutMs, maxOutputChars}),
    createWebFetchTool({timeoutMs: config.httpTimeoutMs, maxOutputChars}),
    createHttpRequestTool({timeoutMs: config.httpTimeoutMs, maxOutputChars}),
    createReadFileTool({timeoutMs: FILE_TIMEOUT_MS, maxOutputChars}),
    createWriteFileTool({timeoutMs: FILE_TIMEOUT_MS, maxOutputChars}),
    createListFilesTool({timeoutMs: FILE_TIMEOUT_MS, maxOutputChars})
  ];
};

export const createDefaultRegistry = (config: ToolsConfig): ToolRegistry =>
  new ToolRegistry(createDefaultTools(config));
