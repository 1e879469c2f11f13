export class MissingCredentialError extends Error {
  constructor(readonly variable: string) {
    super(`${variable} is not set`);
    this.name = 'MissingCredentialError';
  }
}

export class EmptyReplyError extends Error {
  constructor() {
    super('model reply carried neither content nor tool calls');
    this.name = 'EmptyReplyError';
  }
}

export class UnexpectedToolCallError extends Error {
  constructor(readonly toolName: string) {
    super(`model requested another tool call (${toolName}) after the tool result was folded`);
    this.name = 'UnexpectedToolCallError';
  }
}

export class UnknownToolError extends Error {
  constructor(readonly toolName: string) {
    super(`unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

export class ToolArgumentsError extends Error {
  constructor(readonly toolName: string, detail: string) {
    super(`invalid arguments for ${toolName}: ${detail}`);
    this.name = 'ToolArgumentsError';
  }
}

export class WeatherApiError extends Error {
  constructor(readonly status: number, statusText: string) {
    super(`weather api responded ${status} ${statusText}`.trim());
    this.name = 'WeatherApiError';
  }
}
