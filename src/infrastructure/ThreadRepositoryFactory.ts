import { Redis } from 'ioredis';
import type { Logger } from '../utils/logger.js';
import { IThreadRepository } from '../core/interfaces/IThreadRepository.js';
import { KeyValueClient, RedisThreadRepository } from './cache/RedisThreadRepository.js';
import { DatabaseConnection } from './database/DatabaseConnection.js';
import { SqliteThreadRepository } from './database/repositories/SqliteThreadRepository.js';

export interface ThreadRepositoryOptions {
  redisUrl?: string;
  sqlitePath: string;
}

/**
 * Pick the persistence backend once at start-up: Redis when a URL is given and
 * answers PING, SQLite otherwise.
 */
export async function createThreadRepository(
  options: ThreadRepositoryOptions,
  logger: Logger,
  connectRedis: (url: string, logger: Logger) => Promise<KeyValueClient> = connectAndPing
): Promise<IThreadRepository> {
  if (options.redisUrl) {
    try {
      const client = await connectRedis(options.redisUrl, logger);
      logger.info('Connected to Redis for thread persistence');
      return new RedisThreadRepository(client);
    } catch (error) {
      logger.warn(
        { err: error },
        'Failed to connect to Redis, falling back to SQLite'
      );
    }
  }

  const connection = new DatabaseConnection(options.sqlitePath);
  logger.info({ path: connection.getDatabasePath() }, 'Using SQLite for thread persistence');
  return new SqliteThreadRepository(connection);
}

async function connectAndPing(url: string, logger: Logger): Promise<Redis> {
  const client = new Redis(url, {
    lazyConnect: true,
    connectTimeout: 5000,
    maxRetriesPerRequest: 1,
  });
  client.on('error', (error: Error) => {
    logger.warn({ err: error }, 'Redis connection error');
  });

  try {
    await client.connect();
    await client.ping();
    return client;
  } catch (error) {
    client.disconnect();
    throw error;
  }
}
