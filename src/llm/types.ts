import type OpenAI from 'openai';

export type ToolSchema = OpenAI.ChatCompletionTool;
export type MessageParam = OpenAI.ChatCompletionMessageParam;
export type CompletionRequest = OpenAI.ChatCompletionCreateParamsNonStreaming;

/** A function invocation proposed by the model; `arguments` is the raw JSON text it produced. */
export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: string;
}

export type ChatReply =
  | { kind: 'text'; content: string }
  | { kind: 'tool_calls'; calls: [ToolCallRequest, ...ToolCallRequest[]] };

// The slice of a chat completion response the client reads. OpenAI's ChatCompletion satisfies it.
export interface CompletionResponse {
  choices: Array<{
    message: {
      content: string | null;
      tool_calls?: Array<{ id: string; function: { name: string; arguments: string } }> | null;
    };
  }>;
}

export interface CompletionBackend {
  create(request: CompletionRequest): Promise<CompletionResponse>;
}
