export {
  HttpInstructionProvider,
  UnconfiguredInstructionProvider,
  validateInstructions,
  MIN_INSTRUCTIONS,
  MAX_INSTRUCTIONS,
} from './instruction-provider.js';
export type { InstructionProvider, InstructionResult } from './instruction-provider.js';
export { InstructionEnricher, flattenInstructions, INSTRUCTION_SEPARATOR } from './instruction-enricher.js';
export type { EnrichmentJob, EnrichmentOutcome } from './instruction-enricher.js';
export { BackgroundEnrichmentQueue } from './enrichment-queue.js';
export type { EnrichmentQueue, Defer } from './enrichment-queue.js';
