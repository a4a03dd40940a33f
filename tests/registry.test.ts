import {describe, it, expect} from 'vitest';
import {DuplicateToolError, UnknownToolError} from '../src/agent/errors.js';
import {createDefaultRegistry} from '../src/tools/index.js';
import {ToolRegistry} from '../src/tools/registry.js';
import {createEchoTool, createFailingTool} from './helpers.js';

const toolsConfig = {
  sandboxRoot: '/tmp/sandbox',
  shellTimeoutMs: 30_000,
  codeTimeoutMs: 20_000,
  httpTimeoutMs: 10_000,
  maxOutputChars: 4000
};

describe('ToolRegistry', () => {
  it('resolves registered tools by name', () => {
    const echo = createEchoTool();
    const registry = new ToolRegistry([echo]);
    expect(registry.resolve('echo')).toBe(echo);
    expect(registry.has('echo')).toBe(true);
  });

  it('rejects a second tool with the same name', () => {
    const registry = new ToolRegistry([createEchoTool()]);
    expect(() => registry.register(createEchoTool())).toThrow(DuplicateToolError);
  });

  it('fails to resolve unknown tools and lists the available ones', () => {
    const registry = new ToolRegistry([createEchoTool(), createFailingTool('flaky', 'no')]);
    expect(() => registry.resolve('missing_tool')).toThrow(UnknownToolError);
    expect(() => registry.resolve('missing_tool')).toThrow(
      'Unknown tool "missing_tool". Available tools: echo, flaky.'
    );
  });

  it('presents the catalogue in registration order', () => {
    const registry = new ToolRegistry([createFailingTool('zeta', 'no'), createEchoTool('alpha')]);
    expect(registry.catalogue().map(tool => tool.name)).toEqual(['zeta', 'alpha']);
  });
});

describe('createDefaultRegistry', () => {
  it('registers every built-in tool with its configured policy', () => {
    const catalogue = createDefaultRegistry(toolsConfig).catalogue();

    expect(catalogue.map(tool => tool.name)).toEqual([
      'shell',
      'run_code',
      'web_fetch',
      'http_request',
      'read_file',
      'write_file',
      'list_files'
    ]);
    expect(catalogue.find(tool => tool.name === 'shell')).toMatchObject({
      timeoutMs: 30_000,
      sideEffect: 'mutating',
      maxOutputChars: 4000
    });
    expect(catalogue.find(tool => tool.name === 'run_code')?.timeoutMs).toBe(20_000);
    expect(catalogue.find(tool => tool.name === 'read_file')?.sideEffect).toBe('read-only');
  });
});
