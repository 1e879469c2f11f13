import type { MessageParam, ToolCallRequest } from '../llm/types';
import type { ToolResult } from '../tools/registry';

export type Message =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; toolCalls?: ToolCallRequest[] }
  | { role: 'tool'; toolCallId: string; content: string };

/**
 * Ordered, append-only message history for one session. It is replayed in full on every
 * completion call, so entries are never edited or removed once appended.
 */
export class Conversation {
  private history: Message[] = [];
  private callIds = new Set<string>();

  get messages(): readonly Message[] {
    return this.history;
  }

  get length() {
    return this.history.length;
  }

  addSystem(content: string) {
    this.history.push({ role: 'system', content });
  }

  addUser(content: string) {
    this.history.push({ role: 'user', content });
  }

  addAssistantText(content: string) {
    this.history.push({ role: 'assistant', content });
  }

  addAssistantToolCalls(calls: ToolCallRequest[]) {
    for (const call of calls) this.callIds.add(call.id);
    this.history.push({ role: 'assistant', content: null, toolCalls: calls.map((call) => ({ ...call })) });
  }

  addToolResult(result: ToolResult) {
    if (!this.callIds.has(result.toolCallId)) {
      throw new Error(`tool result ${result.toolCallId} answers no earlier tool call`);
    }
    this.history.push({ role: 'tool', toolCallId: result.toolCallId, content: result.content });
  }

  /** Appends the assistant message carrying `call`, then the tool message answering it. */
  foldToolCall(call: ToolCallRequest, result: ToolResult) {
    if (result.toolCallId !== call.id) {
      throw new Error(`tool result ${result.toolCallId} does not answer call ${call.id}`);
    }
    this.addAssistantToolCalls([call]);
    this.addToolResult(result);
  }

  toParams(): MessageParam[] {
    return this.history.map(toParam);
  }
}

function toParam(message: Message): MessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: 'assistant',
          content: message.content,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: 'function',
            function: { name: call.name, arguments: call.arguments }
          }))
        };
      }
      return { role: 'assistant', content: message.content };
    case 'tool':
      return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
  }
}
