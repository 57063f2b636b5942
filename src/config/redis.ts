import { createClient } from 'redis';
import type { RedisConfig } from './services';

export type RedisClient = ReturnType<typeof createClient>;

let client: RedisClient | null = null;

/** Opens the shared connection used by the Redis session stores. */
export const connectRedis = async ({ host, port, password }: RedisConfig): Promise<RedisClient> => {
  if (client) return client;

  const next = createClient({ socket: { host, port }, password });
  next.on('error', (err) => console.error('Redis Client Error', err));

  try {
    await next.connect();
  } catch (error) {
    console.error(`❌ Could not reach Redis at ${host}:${port}:`, error);
    throw error;
  }

  console.log(`✓ Redis connected at ${host}:${port}`);
  client = next;
  return client;
};

export const getRedisClient = (): RedisClient => {
  if (!client) {
    throw new Error('Redis is not connected; set SESSION_STORE=redis and start the server first.');
  }
  return client;
};

export const disconnectRedis = async (): Promise<void> => {
  if (!client) return;
  const current = client;
  client = null;
  await current.quit();
};
