import { MissingCredentialError } from './errors';

export type Config = {
  openaiApiKey: string;
  openaiBaseUrl?: string;
  openaiModel: string;
  weatherApiUrl: string;
  systemPrompt?: string;
  port: number;
  host: string;
};

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_WEATHER_API_URL = 'https://api.open-meteo.com/v1/forecast';

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// Built once at startup and handed to every component; nothing else reads the credential from env.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const openaiApiKey = optional(env.OPENAI_API_KEY);
  if (!openaiApiKey) {
    throw new MissingCredentialError('OPENAI_API_KEY');
  }
  return {
    openaiApiKey,
    openaiBaseUrl: optional(env.OPENAI_BASE_URL),
    openaiModel: optional(env.OPENAI_MODEL) ?? DEFAULT_MODEL,
    weatherApiUrl: optional(env.WEATHER_API_URL) ?? DEFAULT_WEATHER_API_URL,
    systemPrompt: optional(env.SYSTEM_PROMPT),
    port: Number(env.PORT ?? 3000),
    host: optional(env.HOST) ?? '0.0.0.0'
  };
}
