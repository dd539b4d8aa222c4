import type { Logger } from '../logger/index.js';
import { errorMessage } from '../errors/index.js';
import type { EnrichmentJob, InstructionEnricher } from './instruction-enricher.js';

/** Handle the task service submits enrichment work to */
export interface EnrichmentQueue {
  submit(job: EnrichmentJob): void;
}

export type Defer = (callback: () => void) => void;

const deferToNextTick: Defer = (callback) => {
  setImmediate(callback);
};

/**
 * Fire-and-forget queue on the event loop. Jobs start after the current
 * request path finished; if deferral is unavailable they start immediately
 * instead of being dropped. Nothing thrown by a job reaches the submitter.
 */
export class BackgroundEnrichmentQueue implements EnrichmentQueue {
  private readonly enricher: InstructionEnricher;
  private readonly logger: Logger;
  private readonly defer: Defer;
  private readonly pending = new Set<Promise<void>>();
  private closed = false;

  constructor(enricher: InstructionEnricher, logger: Logger, defer: Defer = deferToNextTick) {
    this.enricher = enricher;
    this.logger = logger;
    this.defer = defer;
  }

  get size(): number {
    return this.pending.size;
  }

  submit(job: EnrichmentJob): void {
    let release: () => void = () => {};
    const started = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      if (this.closed) throw new Error('queue is closed');
      this.defer(release);
    } catch (err: unknown) {
      this.logger.warn(`Could not defer enrichment for task ${job.taskId} (${errorMessage(err)}), running it standalone`);
      release();
    }

    this.track(started.then(() => this.run(job)));
    this.logger.debug(`Enrichment queued for task ${job.taskId}`);
  }

  /** Resolves once every job submitted so far, and any they caused, has settled */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }

  /** Stop deferring new jobs and wait for outstanding ones */
  async close(): Promise<void> {
    this.closed = true;
    await this.drain();
  }

  private async run(job: EnrichmentJob): Promise<void> {
    try {
      await this.enricher.enrich(job);
    } catch (err: unknown) {
      this.logger.error(`Enrichment failed for task ${job.taskId}: ${errorMessage(err)}`, err);
    }
  }

  private track(work: Promise<void>): void {
    this.pending.add(work);
    void work.finally(() => this.pending.delete(work));
  }
}
