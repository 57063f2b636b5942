export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type SessionStoreKind = 'memory' | 'redis';

export interface GroqConfig {
  apiKey: string;
  model: string;
  temperature: number;
}

export interface SessionConfig {
  store: SessionStoreKind;
  ttlSeconds: number;
}

export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
}

export interface ServerConfig {
  port: number;
  frontendUrl: string;
  environment: string;
}

export interface AppConfig {
  groq: GroqConfig;
  session: SessionConfig;
  redis: RedisConfig;
  server: ServerConfig;
}

const parseNumber = (raw: string | undefined, fallback: number, name: string): number => {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}".`);
  }
  return value;
};

const parseStoreKind = (raw: string | undefined): SessionStoreKind => {
  const value = (raw || 'memory').trim().toLowerCase();
  if (value !== 'memory' && value !== 'redis') {
    throw new ConfigError(`SESSION_STORE must be "memory" or "redis", got "${raw}".`);
  }
  return value;
};

/**
 * Reads the process configuration once at startup. The Groq credential is the
 * only required value; everything else has a local-development default.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const apiKey = env.GROQ_API_KEY?.trim() || '';
  if (!apiKey) {
    throw new ConfigError('GROQ_API_KEY is not set in the environment variables.');
  }

  const ttlSeconds = parseNumber(env.SESSION_TTL_SECONDS, 3600, 'SESSION_TTL_SECONDS');
  if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
    throw new ConfigError('SESSION_TTL_SECONDS must be a positive integer.');
  }

  const redisPort = parseNumber(env.REDIS_PORT, 6379, 'REDIS_PORT');
  if (!Number.isInteger(redisPort) || redisPort <= 0 || redisPort > 65535) {
    throw new ConfigError('REDIS_PORT must be a port number between 1 and 65535.');
  }

  return {
    groq: {
      apiKey,
      model: env.GROQ_MODEL?.trim() || 'llama-3.3-70b-versatile',
      temperature: parseNumber(env.GROQ_TEMPERATURE, 0.7, 'GROQ_TEMPERATURE'),
    },
    session: {
      store: parseStoreKind(env.SESSION_STORE),
      ttlSeconds,
    },
    redis: {
      host: env.REDIS_HOST?.trim() || 'localhost',
      port: redisPort,
      password: env.REDIS_PASSWORD || undefined,
    },
    server: {
      port: parseNumber(env.PORT, 5000, 'PORT'),
      frontendUrl: env.FRONTEND_URL || 'http://localhost:3000',
      environment: env.NODE_ENV || 'development',
    },
  };
};
