// Environment configuration for the course assistant
// Load backend credentials and retrieval settings from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseTemperature(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed < 0 || parsed > 1) {
    console.error(`Invalid ANTHROPIC_TEMPERATURE "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Generation backend (Anthropic Messages API)
  ANTHROPIC_API_KEY: strEnv(process.env.ANTHROPIC_API_KEY),
  ANTHROPIC_BASE_URL: strEnv(process.env.ANTHROPIC_BASE_URL, 'https://api.anthropic.com'),
  ANTHROPIC_MODEL: strEnv(process.env.ANTHROPIC_MODEL, 'claude-sonnet-4-20250514'),
  ANTHROPIC_MAX_TOKENS: parsePositiveInt(process.env.ANTHROPIC_MAX_TOKENS, 800, 'ANTHROPIC_MAX_TOKENS'),
  ANTHROPIC_TEMPERATURE: parseTemperature(process.env.ANTHROPIC_TEMPERATURE, 0),

  // Embeddings for the course vector store
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  EMBEDDING_MODEL: strEnv(process.env.EMBEDDING_MODEL, 'text-embedding-3-small'),

  // Retrieval and sessions
  MAX_RESULTS: parsePositiveInt(process.env.MAX_RESULTS, 5, 'MAX_RESULTS'),
  MAX_HISTORY: parsePositiveInt(process.env.MAX_HISTORY, 2, 'MAX_HISTORY'),
  SESSION_TTL_MS: parsePositiveInt(process.env.SESSION_TTL_MS, 60 * 60 * 1000, 'SESSION_TTL_MS'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function isBackendConfigured(): boolean {
  return !!env.ANTHROPIC_API_KEY;
}

export function areEmbeddingsConfigured(): boolean {
  return !!env.OPENAI_API_KEY;
}

// Log configuration on startup (redact secrets)
export function logConfiguration(log: (line: string) => void = console.log): void {
  log('Course assistant configuration:');
  log(`  Environment: ${env.NODE_ENV}`);
  log(`  Generation backend: ${isBackendConfigured() ? `anthropic (${env.ANTHROPIC_MODEL})` : 'not configured'}`);
  log(`  Embeddings: ${areEmbeddingsConfigured() ? env.EMBEDDING_MODEL : 'not configured'}`);
  log(`  Max search results: ${env.MAX_RESULTS}`);
  log(`  Session history (exchanges): ${env.MAX_HISTORY}`);
}
