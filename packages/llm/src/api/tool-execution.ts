import type { ToolCall, ToolResult } from '../types/index.js';
import { ToolExecutionError, ToolObserverError, toError } from '../types/index.js';
import type { ExecutionContext } from '../context/execution-context.js';
import { raceSignal, throwIfCancelled } from '../context/execution-context.js';
import type { ToolObserver } from '../tools/types.js';
import type { ToolRouter } from '../tools/router.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

export type ExecuteToolCallsOptions = {
  readonly observer?: ToolObserver;
  /** Abort on the first failing tool instead of folding the failure into its result. */
  readonly stopOnError?: boolean;
  readonly logger?: Logger;
};

async function notify(toolName: string, notification: () => void | Promise<void>): Promise<void> {
  try {
    await notification();
  } catch (error) {
    throw new ToolObserverError(toolName, toError(error));
  }
}

/**
 * Runs tool calls one after another through the router, in the order the
 * model emitted them.
 *
 * A failing tool becomes an `Error: <message>` result the model can react to,
 * unless `stopOnError` is set. Observer failures and cancellation always
 * abort.
 */
export async function executeToolCalls(
  context: ExecutionContext,
  router: ToolRouter,
  toolCalls: ReadonlyArray<ToolCall>,
  options: ExecuteToolCallsOptions = {},
): Promise<Array<ToolResult>> {
  const { observer, stopOnError = false, logger = silentLogger } = options;
  const results: Array<ToolResult> = [];

  for (const call of toolCalls) {
    throwIfCancelled(context);

    if (observer) {
      await notify(call.toolName, () => observer.onCall(call));
    }

    let content: string;
    let isError = false;
    try {
      content = await raceSignal(router.callTool(context, call.toolName, call.args), context.signal);
    } catch (error) {
      throwIfCancelled(context);
      const cause = toError(error);
      if (stopOnError) {
        throw new ToolExecutionError(call.toolName, call.toolCallId, cause);
      }
      logger.warn('tool call failed', { toolName: call.toolName, toolCallId: call.toolCallId, error: cause });
      content = `Error: ${cause.message}`;
      isError = true;
    }

    if (observer) {
      await notify(call.toolName, () => observer.onResult(call.toolCallId, call.toolName, content));
    }

    results.push({ toolCallId: call.toolCallId, toolName: call.toolName, content, isError });
  }

  return results;
}
