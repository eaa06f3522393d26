import { createClient } from 'redis';
import type { Logger } from 'pino';

type RedisClient = ReturnType<typeof createClient>;

/** The hash and set commands the repositories use. */
export type RedisCommands = {
  hGet(key: string, field: string): Promise<string | null | undefined>;
  hSet(key: string, field: string, value: string): Promise<number>;
  hDel(key: string, field: string): Promise<number>;
  sAdd(key: string, member: string): Promise<number>;
  sRem(key: string, member: string): Promise<number>;
  sMembers(key: string): Promise<string[]>;
};

export type RedisConnection = {
  getCommands(): Promise<RedisCommands>;
  close(): Promise<void>;
};

function toCommands(client: RedisClient): RedisCommands {
  return {
    hGet: (key, field) => client.hGet(key, field),
    hSet: (key, field, value) => client.hSet(key, field, value),
    hDel: (key, field) => client.hDel(key, field),
    sAdd: (key, member) => client.sAdd(key, member),
    sRem: (key, member) => client.sRem(key, member),
    sMembers: (key) => client.sMembers(key),
  };
}

/**
 * Lazily connects on first use and shares the connection. A failed connect is not cached,
 * so the next call retries.
 */
export function createRedisConnection(url: string, logger: Logger): RedisConnection {
  let client: RedisClient | null = null;
  let connecting: Promise<RedisCommands> | null = null;

  const getCommands = (): Promise<RedisCommands> => {
    if (connecting) {
      return connecting;
    }

    const nextClient = createClient({ url });
    nextClient.on('error', (error: unknown) => {
      logger.warn({ err: error }, 'redis.error');
    });

    connecting = nextClient
      .connect()
      .then(() => {
        client = nextClient;
        return toCommands(nextClient);
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'redis.connect.failed');
        connecting = null;
        throw error;
      });
    return connecting;
  };

  const close = async (): Promise<void> => {
    const current = client;
    client = null;
    connecting = null;
    if (current) {
      await current.quit();
    }
  };

  return { getCommands, close };
}
