import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './core/errors.js';
import type { Logger } from './utils/logger.js';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    port: number;
    debug: boolean;
  };
  assistant: {
    apiKey: string;
    baseUrl: string;
    requestTimeoutMs: number;
    intakeAssistantId: string;
    adviceAssistantId: string;
  };
  run: {
    pollIntervalMs: number;
    maxRunWaitMs: number;
  };
  history: {
    maxMessages: number;
  };
  retry: {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
  };
  store: {
    redisUrl?: string;
    sqlitePath: string;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    port: z.number().int().min(1).max(65535),
    debug: z.boolean(),
  }),
  assistant: z.object({
    apiKey: z.string().min(1, 'OPENAI_API_KEY is required'),
    baseUrl: z.string().url('Invalid assistant API URL format'),
    requestTimeoutMs: z.number().int().min(1000).max(120000),
    intakeAssistantId: z.string().min(1, 'ASSISTANT_INTAKE_ID is required'),
    adviceAssistantId: z.string().min(1, 'ASSISTANT_ADVICE_ID is required'),
  }),
  run: z.object({
    pollIntervalMs: z.number().int().min(10).max(5000),
    maxRunWaitMs: z.number().int().min(1000).max(600000),
  }),
  history: z.object({
    maxMessages: z.number().int().min(2).max(100),
  }),
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10),
    initialDelayMs: z.number().int().min(0).max(10000),
    maxDelayMs: z.number().int().min(0).max(60000),
  }),
  store: z.object({
    redisUrl: z.string().url('Invalid Redis URL format').optional(),
    sqlitePath: z.string().min(1),
  }),
});

/**
 * Parse command line arguments
 * Usage: node dist/index.js --port 8080 --redis-url redis://localhost:6379 --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build configuration from CLI arguments, environment variables and defaults,
 * in that order of priority. Throws ConfigurationError listing every invalid field.
 */
export function getConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string | null, envKey: string, defaultValue: string): string => {
    const cliValue = cliKey ? cliArgs[cliKey] : undefined;
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    const value = getString(cliKey, envKey, '');
    return value === '' ? undefined : value;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : (envValue === 'false' ? false : defaultValue);
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'assistant-thread-broker'),
      port: getNumber('port', 'PORT', 8080),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    assistant: {
      apiKey: getString(null, 'OPENAI_API_KEY', ''),
      baseUrl: getString('openai-base-url', 'OPENAI_BASE_URL', 'https://api.openai.com/v1'),
      requestTimeoutMs: getNumber('request-timeout', 'OPENAI_REQUEST_TIMEOUT_MS', 25000),
      intakeAssistantId: getString(null, 'ASSISTANT_INTAKE_ID', ''),
      adviceAssistantId: getString(null, 'ASSISTANT_ADVICE_ID', ''),
    },
    run: {
      pollIntervalMs: getNumber('poll-interval', 'RUN_POLL_INTERVAL_MS', 200),
      maxRunWaitMs: getNumber('max-run-wait', 'RUN_MAX_WAIT_MS', 60000),
    },
    history: {
      maxMessages: getNumber('history-max', 'HISTORY_MAX_MESSAGES', 25),
    },
    retry: {
      maxAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 3),
      initialDelayMs: getNumber('retry-initial-delay', 'RETRY_INITIAL_DELAY_MS', 1000),
      maxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 10000),
    },
    store: {
      redisUrl: getOptionalString('redis-url', 'REDIS_URL'),
      sqlitePath: getString('db-path', 'THREADS_DB_PATH', 'threads.db'),
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`);
    throw new ConfigurationError(`Configuration validation failed: ${issues.join('; ')}`, issues);
  }

  return parsed.data;
}

/**
 * Log the effective configuration without secrets
 */
export function logConfigInfo(logger: Logger, config: Config): void {
  logger.info(
    {
      server: config.server,
      assistant: {
        baseUrl: config.assistant.baseUrl,
        requestTimeoutMs: config.assistant.requestTimeoutMs,
        intakeAssistantId: config.assistant.intakeAssistantId,
        adviceAssistantId: config.assistant.adviceAssistantId,
      },
      run: config.run,
      history: config.history,
      retry: config.retry,
      store: {
        redis: config.store.redisUrl !== undefined,
        sqlitePath: config.store.sqlitePath,
      },
    },
    'Configuration loaded'
  );
}
