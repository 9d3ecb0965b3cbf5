import type { ToolInvocation, ToolParameters } from '../calls/types';
import { errorMessage } from '../errors';
import { log } from '../log';
import { incToolInvocation } from '../metrics';
import { BUILTIN_TOOLS } from './builtinTools';
import type { ExecutableTool, ToolCall, ToolContext, ToolEffect } from './types';

export const TOOL_DISABLED = 'tool disabled for this restaurant';
export const UNKNOWN_TOOL = 'unknown tool';

export interface DispatchResult {
  invocation: ToolInvocation;
  effect?: ToolEffect;
}

export class ToolDispatcher {
  private readonly tools = new Map<string, ExecutableTool>();
  private readonly now: () => Date;

  constructor(tools: readonly ExecutableTool[] = BUILTIN_TOOLS, now: () => Date = () => new Date()) {
    this.now = now;
    for (const tool of tools) {
      this.register(tool);
    }
  }

  public register(tool: ExecutableTool): void {
    this.tools.set(tool.name, tool);
  }

  public has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Never throws; every call yields exactly one invocation record. */
  public async dispatch(call: ToolCall, context: ToolContext): Promise<DispatchResult> {
    const invokedAt = this.now();
    const parameters: ToolParameters = Object.freeze({ ...call.parameters });

    const record = (
      status: ToolInvocation['status'],
      result: ToolParameters,
      reason?: string,
    ): ToolInvocation => {
      incToolInvocation(call.name, status);
      return Object.freeze({
        toolCallId: call.toolCallId,
        name: call.name,
        parameters,
        invokedAt,
        status,
        result: Object.freeze({ ...result }),
        reason,
      });
    };

    if (!context.restaurant.enabledTools.has(call.name)) {
      return { invocation: record('rejected', { error: TOOL_DISABLED }, TOOL_DISABLED) };
    }

    const tool = this.tools.get(call.name);
    if (!tool) {
      return { invocation: record('rejected', { error: UNKNOWN_TOOL }, UNKNOWN_TOOL) };
    }

    try {
      const outcome = await tool.execute({ ...call, parameters }, context);
      if (outcome.status === 'rejected') {
        return {
          invocation: record('rejected', outcome.result ?? { error: outcome.reason }, outcome.reason),
        };
      }
      return { invocation: record('executed', outcome.result), effect: outcome.effect };
    } catch (error) {
      const message = errorMessage(error);
      log.warn(
        { err: error, call_id: context.session.callId, tool: call.name },
        'tool execution failed',
      );
      return { invocation: record('failed', { error: message }, message) };
    }
  }
}
