import type { RequestListener } from 'node:http';
import {
  createDb,
  closeDb,
  SqliteTaskStore,
  HttpInstructionProvider,
  UnconfiguredInstructionProvider,
  InstructionEnricher,
  BackgroundEnrichmentQueue,
  TaskService,
} from '@taskd/core';
import type { AppConfig, Logger, TaskdDb, TaskStore, InstructionProvider } from '@taskd/core';
import type { SessionValidator } from './http/auth.js';
import { HttpSessionValidator } from './http/auth.js';
import { createRouter } from './http/register.js';
import { createRequestListener } from './http/app.js';

/** Wired service graph. Everything is built from the config passed in */
export interface Container {
  readonly config: AppConfig;
  readonly db: TaskdDb;
  readonly store: TaskStore;
  readonly queue: BackgroundEnrichmentQueue;
  readonly service: TaskService;
  readonly listener: RequestListener;
  /** Drain enrichment and close the database */
  dispose(): Promise<void>;
}

/** Seams tests replace with in-process stand-ins */
export interface ContainerOverrides {
  db?: TaskdDb;
  sessions?: SessionValidator;
  provider?: InstructionProvider;
  now?: () => Date;
}

export function createContainer(config: AppConfig, logger: Logger, overrides: ContainerOverrides = {}): Container {
  const db = overrides.db ?? createDb(config.databasePath);
  const store = new SqliteTaskStore(db, { now: overrides.now });

  const provider = overrides.provider ?? (config.instructionBackend
    ? new HttpInstructionProvider(config.instructionBackend, logger.child('instructions'))
    : new UnconfiguredInstructionProvider());
  if (!overrides.provider && !config.instructionBackend) {
    logger.warn('INSTRUCTION_API_URL is not set, tasks will not receive suggested instructions');
  }

  const enricher = new InstructionEnricher(provider, store, logger.child('enrichment'));
  const queue = new BackgroundEnrichmentQueue(enricher, logger.child('enrichment'));
  const service = new TaskService(store, queue, logger.child('tasks'));

  const sessions = overrides.sessions ?? new HttpSessionValidator({
    baseUrl: config.authServiceUrl,
    timeoutMs: config.authTimeoutMs,
  });
  const router = createRouter({ service, logger });
  const listener = createRequestListener({ router, sessions, logger });

  return {
    config,
    db,
    store,
    queue,
    service,
    listener,
    async dispose() {
      await queue.close();
      closeDb(db);
    },
  };
}
