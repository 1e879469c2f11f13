import type { z } from 'zod';
import { ToolArgumentsError } from '../errors';
import type { ToolSchema } from '../llm/types';

export interface ToolResult {
  toolCallId: string;
  content: string;
}

export interface ToolDefinition<Params extends z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: Params;
  // Sent to the model as-is; `parameters` validates what comes back.
  jsonSchema: Record<string, unknown>;
  strict?: boolean;
  handler: (args: z.infer<Params>) => Promise<unknown>;
}

export interface RegisteredTool {
  name: string;
  schema: ToolSchema;
  invoke(rawArguments: string): Promise<unknown>;
}

function decodeArguments(name: string, rawArguments: string): unknown {
  try {
    return JSON.parse(rawArguments);
  } catch (err) {
    throw new ToolArgumentsError(name, err instanceof Error ? err.message : String(err));
  }
}

export function defineTool<Params extends z.ZodTypeAny>(definition: ToolDefinition<Params>): RegisteredTool {
  const { name, description, parameters, jsonSchema, strict = true, handler } = definition;
  return {
    name,
    schema: {
      type: 'function',
      function: { name, description, parameters: jsonSchema, strict }
    },
    async invoke(rawArguments: string) {
      const parsed = parameters.safeParse(decodeArguments(name, rawArguments));
      if (!parsed.success) {
        const detail = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        throw new ToolArgumentsError(name, detail);
      }
      return handler(parsed.data);
    }
  };
}

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();

  register(tool: RegisteredTool) {
    if (this.tools.has(tool.name)) {
      throw new Error(`tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  schemas(): ToolSchema[] {
    return [...this.tools.values()].map((tool) => tool.schema);
  }
}
