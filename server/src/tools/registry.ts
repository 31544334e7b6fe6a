/**
 * Tool Registry
 *
 * Maps tool names to capabilities for one session. Registering a name twice
 * replaces the earlier tool.
 */

import { toFunctionDefinition, type FunctionDefinition, type Tool, type ToolArguments, type ToolResult } from './types.js';

export class ToolNotFoundError extends Error {
  constructor(readonly toolName: string) {
    super(`Tool not found: ${toolName}`);
    this.name = 'ToolNotFoundError';
  }
}

export class ToolRegistry {
  private tools = new Map<string, Tool>();

  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      console.warn(`[Tools] Replacing existing tool: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
    console.log(`[Tools] Registered tool: ${tool.name}`);
  }

  unregister(name: string): void {
    if (this.tools.delete(name)) {
      console.log(`[Tools] Unregistered tool: ${name}`);
    }
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  list(): Tool[] {
    return Array.from(this.tools.values());
  }

  getFunctionDefinitions(): FunctionDefinition[] {
    return this.list().map(toFunctionDefinition);
  }

  /**
   * @throws ToolNotFoundError when no tool is registered under `name`
   */
  async execute(name: string, args: ToolArguments): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }

    console.log(`[Tools] Executing ${name} with arguments: ${JSON.stringify(args)}`);
    const result = await tool.execute(args);
    console.log(`[Tools] ${name} result: ${JSON.stringify(result)}`);
    return result;
  }
}
