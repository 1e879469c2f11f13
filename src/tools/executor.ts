import { UnknownToolError } from '../errors';
import type { ToolCallRequest } from '../llm/types';
import { logger } from '../observability/logger';
import type { ToolRegistry, ToolResult } from './registry';

export function stringifyResult(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value) ?? String(value);
}

export class ToolExecutor {
  constructor(readonly registry: ToolRegistry) {}

  async execute(call: ToolCallRequest): Promise<ToolResult> {
    const tool = this.registry.get(call.name);
    if (!tool) throw new UnknownToolError(call.name);

    logger.info('tool call', { id: call.id, name: call.name, arguments: call.arguments });
    const value = await tool.invoke(call.arguments);
    const content = stringifyResult(value);
    logger.info('tool result', { id: call.id, content });
    return { toolCallId: call.id, content };
  }
}
