/**
 * Instruction generation through an external text-generation backend.
 *
 * The backend receives `{ title, description }` as JSON and must answer with
 * a JSON array of 3 to 10 single-sentence strings. Anything else is a failure;
 * callers never get a partial list.
 */

import { z } from 'zod';
import type { Logger } from '../logger/index.js';
import type { InstructionBackendConfig } from '../config/index.js';
import { InstructionBackendError, errorMessage } from '../errors/index.js';
import { hasText } from '../queries/task-helpers.js';

export const MIN_INSTRUCTIONS = 3;
export const MAX_INSTRUCTIONS = 10;

export type InstructionResult =
  | { readonly type: 'success'; readonly instructions: string[] }
  | { readonly type: 'error'; readonly message: string };

export interface InstructionProvider {
  generate(title: string, description: string): Promise<InstructionResult>;
}

/** At most one period: more means several sentences were run together */
function isSingleSentence(text: string): boolean {
  return text.split('.').length <= 2;
}

const instructionListSchema = z
  .array(
    z.string()
      .trim()
      .min(1, 'instruction must not be empty')
      .refine(isSingleSentence, 'instruction must be a single sentence'),
  )
  .min(MIN_INSTRUCTIONS, `expected at least ${MIN_INSTRUCTIONS} instructions`)
  .max(MAX_INSTRUCTIONS, `expected at most ${MAX_INSTRUCTIONS} instructions`);

/** Validate a decoded backend payload into a trimmed instruction list */
export function validateInstructions(payload: unknown): InstructionResult {
  const parsed = instructionListSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at [${issue.path.join('.')}]` : '';
    return { type: 'error', message: `Invalid instructions${where}: ${issue?.message ?? 'unknown issue'}` };
  }
  return { type: 'success', instructions: parsed.data };
}

export function checkInput(title: string, description: string): InstructionResult | null {
  if (!hasText(title) || !hasText(description)) {
    return { type: 'error', message: 'Title and description are required to generate instructions' };
  }
  return null;
}

export class HttpInstructionProvider implements InstructionProvider {
  private readonly config: InstructionBackendConfig;
  private readonly logger: Logger;

  constructor(config: InstructionBackendConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
  }

  async generate(title: string, description: string): Promise<InstructionResult> {
    const rejected = checkInput(title, description);
    if (rejected) return rejected;

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (this.config.token) {
      headers['Authorization'] = `Bearer ${this.config.token}`;
    }

    let payload: unknown;
    try {
      const response = await fetch(this.config.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ title, description }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (!response.ok) {
        throw new InstructionBackendError(response.status, response.statusText);
      }

      payload = await response.json();
    } catch (err: unknown) {
      this.logger.error(`Instruction backend call failed: ${errorMessage(err)}`, err);
      return { type: 'error', message: errorMessage(err) };
    }

    const result = validateInstructions(payload);
    if (result.type === 'error') {
      this.logger.error(`Instruction backend returned an unusable payload: ${result.message}`);
    }
    return result;
  }
}

/** Stands in when no backend URL is configured */
export class UnconfiguredInstructionProvider implements InstructionProvider {
  async generate(title: string, description: string): Promise<InstructionResult> {
    return checkInput(title, description)
      ?? { type: 'error', message: 'Instruction backend is not configured' };
  }
}
