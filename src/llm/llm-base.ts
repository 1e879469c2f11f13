import OpenAI from 'openai';
import type { Config } from '../config';
import { EmptyReplyError } from '../errors';
import { logger } from '../observability/logger';
import type {
  ChatReply,
  CompletionBackend,
  CompletionResponse,
  MessageParam,
  ToolCallRequest,
  ToolSchema
} from './types';

export function openaiBackend(config: Config): CompletionBackend {
  const client = new OpenAI({
    apiKey: config.openaiApiKey,
    baseURL: config.openaiBaseUrl
  });
  return {
    create: (request) => client.chat.completions.create(request)
  };
}

export function toChatReply(response: CompletionResponse): ChatReply {
  const message = response.choices[0]?.message;
  if (!message) throw new EmptyReplyError();

  const calls: ToolCallRequest[] = (message.tool_calls ?? []).map((call) => ({
    id: call.id,
    name: call.function.name,
    arguments: call.function.arguments
  }));
  const [first, ...rest] = calls;
  if (first) {
    if (message.content) logger.debug('dropping content that accompanied tool calls', message.content);
    return { kind: 'tool_calls', calls: [first, ...rest] };
  }
  if (message.content !== null) {
    return { kind: 'text', content: message.content };
  }
  throw new EmptyReplyError();
}

export class LLMClient {
  private backend: CompletionBackend;
  private model: string;

  constructor(config: Config, backend: CompletionBackend = openaiBackend(config)) {
    this.backend = backend;
    this.model = config.openaiModel;
  }

  // Single blocking round trip: no streaming, no retry. Transport and API errors propagate.
  async complete(messages: MessageParam[], tools: ToolSchema[] = []): Promise<ChatReply> {
    logger.debug('chat completion request', { model: this.model, messages: messages.length, tools: tools.length });
    const response = await this.backend.create({
      model: this.model,
      messages,
      ...(tools.length > 0 ? { tools } : {})
    });
    const reply = toChatReply(response);
    logger.debug('chat completion reply', reply.kind);
    return reply;
  }
}
