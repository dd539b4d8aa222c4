import type { Logger } from '../logger/index.js';
import type { TaskStore } from '../store/task-store.js';
import type { TaskId } from '../types/task.js';
import type { InstructionProvider } from './instruction-provider.js';

export const INSTRUCTION_SEPARATOR = '; ';

/** A pure work item: the task and the text its instructions are derived from */
export interface EnrichmentJob {
  readonly taskId: TaskId;
  readonly title: string;
  readonly description: string;
}

export type EnrichmentOutcome = 'applied' | 'no-instructions' | 'not-found' | 'stale';

export function flattenInstructions(instructions: readonly string[]): string {
  return instructions.join(INSTRUCTION_SEPARATOR);
}

/**
 * Runs one enrichment job: generate instructions, then write them onto the
 * freshly loaded row if it still exists and still has the same text.
 */
export class InstructionEnricher {
  private readonly provider: InstructionProvider;
  private readonly store: TaskStore;
  private readonly logger: Logger;

  constructor(provider: InstructionProvider, store: TaskStore, logger: Logger) {
    this.provider = provider;
    this.store = store;
    this.logger = logger;
  }

  async enrich(job: EnrichmentJob): Promise<EnrichmentOutcome> {
    const result = await this.provider.generate(job.title, job.description);
    if (result.type === 'error' || result.instructions.length === 0) {
      const reason = result.type === 'error' ? result.message : 'empty list';
      this.logger.warn(`No instructions generated for task ${job.taskId}: ${reason}`);
      return 'no-instructions';
    }

    const outcome = this.store.setSuggestedInstructions(
      job.taskId,
      flattenInstructions(result.instructions),
      { title: job.title, description: job.description },
    );

    switch (outcome) {
      case 'applied':
        this.logger.info(`Stored ${result.instructions.length} instructions on task ${job.taskId}`);
        break;
      case 'not-found':
        this.logger.info(`Task ${job.taskId} was deleted before its instructions were ready`);
        break;
      case 'stale':
        this.logger.info(`Task ${job.taskId} changed since enrichment was scheduled, discarding instructions`);
        break;
    }
    return outcome;
  }
}
