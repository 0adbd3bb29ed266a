import type { ExecutionContext } from '../context/execution-context.js';
import type { ToolCall, ToolDescriptor } from '../types/index.js';

/**
 * A source of executable tools. A provider with a `namespace` owns every tool
 * name starting with that namespace and the router's separator; it lists and
 * receives names in that prefixed form.
 */
export interface ToolProvider {
  readonly namespace?: string;
  listTools(context: ExecutionContext): Promise<ReadonlyArray<ToolDescriptor>>;
  /** Resolves to the tool's result text, or throws when the tool fails. */
  callTool(context: ExecutionContext, name: string, args: Record<string, unknown>): Promise<string>;
}

/**
 * Notified around every tool dispatch the loop performs. A throwing observer
 * aborts the turn.
 */
export interface ToolObserver {
  onCall(call: ToolCall): void | Promise<void>;
  onResult(toolCallId: string, toolName: string, result: string): void | Promise<void>;
}

export type ToolFilter = {
  /** Keep only these names. */
  readonly include?: ReadonlyArray<string>;
  readonly exclude?: ReadonlyArray<string>;
};
