/**
 * 환경 변수 관리
 *
 * Keys and server settings only; analysis settings are read by
 * src/config/analysisConfig.ts. All variables are optional: a provider that
 * needs a key fails when it is selected, not at import time.
 */

/**
 * Optional variable with default.
 */
export function getEnv(key: string, defaultValue: string = ''): string {
  return process.env[key] || defaultValue;
}

export const env = {
  // API keys
  GITHUB_TOKEN: () => getEnv('GITHUB_TOKEN'),
  OPENAI_API_KEY: () => getEnv('OPENAI_API_KEY'),
  CLAUDE_API_KEY: () => getEnv('CLAUDE_API_KEY'),

  // Server
  API_PORT: () => getEnv('API_PORT', '3001'),
  CORS_ORIGINS: () => getEnv('CORS_ORIGINS'),
  NODE_ENV: () => getEnv('NODE_ENV', 'development'),
} as const;
