import { UnexpectedToolCallError } from '../errors';
import type { LLMClient } from '../llm/llm-base';
import type { ToolCallRequest } from '../llm/types';
import { logger } from '../observability/logger';
import type { ToolExecutor } from '../tools/executor';
import type { ToolResult } from '../tools/registry';
import { Conversation } from './context';

export interface SessionOutcome {
  answer: string;
  toolCall?: ToolCallRequest;
  toolResult?: ToolResult;
}

export type SessionOptions = {
  llm: LLMClient;
  executor: ToolExecutor;
  systemPrompt?: string;
};

/**
 * One question, at most one tool call. The model is asked once with the tool schemas; if it
 * requests a tool, the first requested call is executed and folded back, and the model is
 * asked once more for the final answer.
 */
export class ToolCallSession {
  readonly conversation = new Conversation();
  private llm: LLMClient;
  private executor: ToolExecutor;
  private systemPrompt?: string;

  constructor(options: SessionOptions) {
    this.llm = options.llm;
    this.executor = options.executor;
    this.systemPrompt = options.systemPrompt;
  }

  async ask(question: string): Promise<SessionOutcome> {
    if (this.systemPrompt && this.conversation.length === 0) {
      this.conversation.addSystem(this.systemPrompt);
    }
    this.conversation.addUser(question);

    const tools = this.executor.registry.schemas();
    const first = await this.llm.complete(this.conversation.toParams(), tools);
    if (first.kind === 'text') {
      this.conversation.addAssistantText(first.content);
      return { answer: first.content };
    }

    const [call, ...ignored] = first.calls;
    if (ignored.length > 0) {
      logger.warn('model requested several tool calls; only the first is executed', {
        executed: call.id,
        ignored: ignored.map((c) => c.id)
      });
    }

    const toolResult = await this.executor.execute(call);
    this.conversation.foldToolCall(call, toolResult);

    const final = await this.llm.complete(this.conversation.toParams(), tools);
    if (final.kind === 'tool_calls') {
      throw new UnexpectedToolCallError(final.calls[0].name);
    }
    this.conversation.addAssistantText(final.content);
    return { answer: final.content, toolCall: call, toolResult };
  }
}
