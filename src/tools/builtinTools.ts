import type { ExecutableTool, ToolOutcome } from './types';

export const FORWARDING_UNAVAILABLE = 'forwarding unavailable for this restaurant';

function readReason(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() ? value.trim() : fallback;
}

export const endCallTool: ExecutableTool = {
  name: 'end_call',
  execute(call, { session }): ToolOutcome {
    if (session.terminationRequested) {
      return { status: 'executed', result: { noop: true } };
    }
    const reason = readReason(call.parameters.reason, 'agent_end_call');
    return {
      status: 'executed',
      result: { ended: true },
      effect: { kind: 'end_call', reason },
    };
  },
};

export const getAddressTool: ExecutableTool = {
  name: 'get_address',
  execute(_call, { restaurant }): ToolOutcome {
    return {
      status: 'executed',
      result: { name: restaurant.name, address: restaurant.address },
    };
  },
};

export const forwardCallTool: ExecutableTool = {
  name: 'forward_call',
  execute(_call, { session, restaurant }): ToolOutcome {
    const target = restaurant.forwardingNumber?.trim();
    if (!target) {
      return { status: 'rejected', reason: FORWARDING_UNAVAILABLE };
    }
    if (session.forwardingRequested) {
      return { status: 'executed', result: { noop: true, forwarding_to: target } };
    }
    return {
      status: 'executed',
      result: { forwarding_to: target },
      effect: { kind: 'forward_call', target },
    };
  },
};

export const BUILTIN_TOOLS: readonly ExecutableTool[] = [endCallTool, getAddressTool, forwardCallTool];
