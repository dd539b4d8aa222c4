/** Unexpected persistence failure. The transaction was rolled back before this was thrown. */
export class StoreError extends Error {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(`StoreError: ${operation} failed${causeSuffix(options?.cause)}`, options);
    this.name = 'StoreError';
  }
}

/** Environment configuration did not validate */
export class ConfigError extends Error {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** The instruction backend answered with a non-2xx status */
export class InstructionBackendError extends Error {
  public readonly statusCode: number;

  constructor(statusCode: number, statusText?: string) {
    super(`InstructionBackendError: ${statusText || `HTTP ${statusCode}`}`);
    this.name = 'InstructionBackendError';
    this.statusCode = statusCode;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function causeSuffix(cause: unknown): string {
  return cause === undefined ? '' : `: ${errorMessage(cause)}`;
}
