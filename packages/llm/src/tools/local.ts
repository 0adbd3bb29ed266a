import type { ExecutionContext } from '../context/execution-context.js';
import type { ToolDescriptor } from '../types/index.js';
import { ToolNotFoundError, ValidationError } from '../types/index.js';
import type { ToolProvider } from './types.js';

export type ToolHandler = (
  args: Record<string, unknown>,
  context: ExecutionContext,
) => Promise<string> | string;

export type LocalTool = ToolDescriptor & {
  readonly execute: ToolHandler;
};

/**
 * In-process tool provider backed by handler functions.
 */
export class LocalToolProvider implements ToolProvider {
  private readonly tools = new Map<string, LocalTool>();

  constructor(tools: ReadonlyArray<LocalTool> = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: LocalTool): void {
    if (this.tools.has(tool.name)) {
      throw new ValidationError(`tool '${tool.name}' is already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  async listTools(): Promise<ReadonlyArray<ToolDescriptor>> {
    return Array.from(this.tools.values(), ({ name, description, parameters }) => ({
      name,
      description,
      parameters,
    }));
  }

  async callTool(context: ExecutionContext, name: string, args: Record<string, unknown>): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }
    return tool.execute(args, context);
  }
}
