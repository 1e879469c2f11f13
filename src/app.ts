import { loadConfig } from './config';
import type { Config } from './config';
import { ToolCallSession } from './core/session';
import { LLMClient } from './llm/llm-base';
import type { CompletionBackend } from './llm/types';
import { ToolExecutor } from './tools/executor';
import { ToolRegistry } from './tools/registry';
import { getWeatherTool } from './tools/weather';
import { WeatherClient } from './weather/client';
import type { FetchLike } from './weather/client';

export type AssistantOptions = {
  env?: NodeJS.ProcessEnv;
  backend?: CompletionBackend;
  fetch?: FetchLike;
};

export interface Assistant {
  config: Config;
  registry: ToolRegistry;
  createSession(): ToolCallSession;
}

// Config is loaded before any client exists, so a missing credential stops everything up front.
export function createAssistant(options: AssistantOptions = {}): Assistant {
  const config = loadConfig(options.env);

  const registry = new ToolRegistry();
  registry.register(getWeatherTool(new WeatherClient(config.weatherApiUrl, options.fetch)));

  const llm = new LLMClient(config, options.backend);
  const executor = new ToolExecutor(registry);

  return {
    config,
    registry,
    createSession: () => new ToolCallSession({ llm, executor, systemPrompt: config.systemPrompt })
  };
}
