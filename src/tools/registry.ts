import {DuplicateToolError, UnknownToolError} from '../agent/errors.js';
import type {Tool, ToolDescriptor} from '../agent/types.js';

/**
 * Name → tool lookup table. Filled once at startup and only read afterwards,
 * so concurrent runs can share one instance.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  constructor(tools: Tool[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: Tool): void {
    const {name} = tool.descriptor;
    if (this.tools.has(name)) {
      throw new DuplicateToolError(name);
    }
    this.tools.set(name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  resolve(name: string): Tool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name, [...this.tools.keys()]);
    }
    return tool;
  }

  catalogue(): readonly ToolDescriptor[] {
    return Array.from(this.tools.values(), tool => tool.descriptor);
  }
}
