import { API_HOST } from './api/constants';

export const CLI_NAME = 'foxess';
export const LOG_PREFIX = 'foxess';
// Request timeout plus 30 s of slack for the whole run.
export const RUN_DEADLINE_MS = 60_000;

export interface Settings {
  apiKey?: string;
  baseURL: string;
}

export function loadSettings(env: NodeJS.ProcessEnv): Settings {
  const apiKey = env.FOXESS_API_KEY?.trim();
  return {
    apiKey: apiKey ? apiKey : undefined,
    baseURL: env.FOXESS_BASE_URL?.trim() || API_HOST,
  };
}
