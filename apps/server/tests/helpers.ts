import type { Server } from 'node:http';
import type { InstructionProvider, InstructionResult } from '@taskd/core';
import type { SessionCheck, SessionValidator } from '../src/http/auth.js';

export const VALID_TOKEN = 'test-token';
export const EXPIRED_TOKEN = 'expired-token';
/** Makes the fake session service fail outright */
export const BROKEN_TOKEN = 'broken-token';

export class FakeSessionValidator implements SessionValidator {
  readonly seen: string[] = [];

  async validate(token: string): Promise<SessionCheck> {
    this.seen.push(token);
    if (token === BROKEN_TOKEN) throw new Error('session service unreachable');
    return token === VALID_TOKEN ? 'valid' : 'invalid';
  }
}

/** Instruction provider that answers from a fixed function of the input */
export class FakeInstructionProvider implements InstructionProvider {
  readonly calls: Array<{ title: string; description: string }> = [];
  answer: (title: string, description: string) => InstructionResult = (title) => ({
    type: 'success',
    instructions: [`Open ${title}.`, 'Do the work.', 'Close it out.'],
  });

  async generate(title: string, description: string): Promise<InstructionResult> {
    this.calls.push({ title, description });
    return this.answer(title, description);
  }
}

/** A clock that advances one second per reading */
export function steppingClock(start: string = '2030-01-01T00:00:00.000Z'): () => Date {
  let t = Date.parse(start);
  return () => {
    const now = new Date(t);
    t += 1000;
    return now;
  };
}

export function baseUrl(server: Server): string {
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server is not listening on TCP');
  return `http://127.0.0.1:${address.port}`;
}
