#!/usr/bin/env node

/**
 * Assistant Thread Broker - Entry Point
 */

import { Config, getConfig, logConfigInfo } from './config.js';
import { ConfigurationError } from './core/errors.js';
import { createLogger, Logger } from './utils/logger.js';
import { AssistantApiClient } from './infrastructure/http/AssistantApiClient.js';
import { createThreadRepository } from './infrastructure/ThreadRepositoryFactory.js';
import { WebServer } from './infrastructure/web/WebServer.js';
import { ThreadService } from './application/services/ThreadService.js';
import { HistoryService } from './application/services/HistoryService.js';
import { RunService } from './application/services/RunService.js';
import { AssistantService } from './application/services/AssistantService.js';
import { IntentService } from './application/services/IntentService.js';
import { DEFAULT_RETRY_CONFIG } from './utils/retry.js';

export interface Application {
  webServer: WebServer;
  threadService: ThreadService;
}

/**
 * Wire every component from configuration. The thread store backend is
 * chosen here, once.
 */
export async function createApplication(config: Config, logger: Logger): Promise<Application> {
  const client = new AssistantApiClient({
    apiKey: config.assistant.apiKey,
    baseUrl: config.assistant.baseUrl,
    requestTimeoutMs: config.assistant.requestTimeoutMs,
  });

  const repository = await createThreadRepository(config.store, logger.child({ component: 'store' }));
  const threadService = new ThreadService(repository, logger.child({ component: 'threads' }));
  const historyService = new HistoryService(
    client,
    logger.child({ component: 'history' }),
    config.history.maxMessages
  );
  const runService = new RunService(
    client,
    threadService,
    historyService,
    logger.child({ component: 'run' }),
    config.run
  );
  const assistantService = new AssistantService(runService, logger.child({ component: 'assistant' }), {
    ...DEFAULT_RETRY_CONFIG,
    ...config.retry,
  });
  const intentService = new IntentService(
    assistantService,
    config.assistant,
    logger.child({ component: 'intent' })
  );

  const webServer = new WebServer(intentService, logger.child({ component: 'http' }), {
    port: config.server.port,
    storeBackend: threadService.backend,
  });

  return { webServer, threadService };
}

function exitWithError(logger: Logger, error: unknown): never {
  if (error instanceof ConfigurationError) {
    logger.fatal({ issues: error.issues }, 'Configuration validation failed');
  } else {
    logger.fatal({ err: error }, 'Fatal error during start-up');
  }
  process.exit(1);
}

function loadConfig(logger: Logger): Config {
  try {
    return getConfig();
  } catch (error) {
    return exitWithError(logger, error);
  }
}

async function main() {
  const config = loadConfig(createLogger());
  const logger = createLogger({ level: config.server.debug ? 'debug' : 'info', name: config.server.name });
  logConfigInfo(logger, config);

  const app = await createApplication(config, logger).catch((error: unknown) => exitWithError(logger, error));
  await app.webServer.start().catch(async (error: unknown) => {
    await app.threadService.close();
    return exitWithError(logger, error);
  });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    try {
      await app.webServer.stop();
      await app.threadService.close();
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });
}

if (require.main === module) {
  void main();
}
