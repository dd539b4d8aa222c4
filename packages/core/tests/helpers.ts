import { vi } from 'vitest';
import type { Logger } from '../src/logger/index.js';

export interface RecordingLogger extends Logger {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
  /** Every message logged at the given level */
  messages(level: 'debug' | 'info' | 'warn' | 'error'): string[];
}

/** A logger whose calls can be asserted on; children share the same spies */
export function createRecordingLogger(): RecordingLogger {
  const logger: RecordingLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
    messages: (level) => logger[level].mock.calls.map((call: unknown[]) => String(call[0])),
  };
  return logger;
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
