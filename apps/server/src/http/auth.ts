/**
 * Session authentication. Every request carries X-Session-Token, which is
 * checked against the external session service before routing.
 */

import type { IncomingMessage } from 'node:http';
import { errorMessage } from '@taskd/core';

export const SESSION_HEADER = 'x-session-token';

export type SessionCheck = 'valid' | 'invalid';

export interface SessionValidator {
  /** @throws SessionServiceError when the service cannot give an answer */
  validate(token: string): Promise<SessionCheck>;
}

export class SessionServiceError extends Error {
  public readonly statusCode: number | undefined;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(`SessionServiceError: ${message}`, options);
    this.name = 'SessionServiceError';
    this.statusCode = statusCode;
  }
}

export interface HttpSessionValidatorOptions {
  readonly baseUrl: string;
  readonly timeoutMs: number;
}

/** Asks `GET {baseUrl}/validate` whether a token is live */
export class HttpSessionValidator implements SessionValidator {
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(options: HttpSessionValidatorOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/validate`;
    this.timeoutMs = options.timeoutMs;
  }

  async validate(token: string): Promise<SessionCheck> {
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'GET',
        headers: { 'X-Session-Token': token },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err: unknown) {
      throw new SessionServiceError(`session service unreachable: ${errorMessage(err)}`, undefined, { cause: err });
    }

    if (response.ok) return 'valid';
    if (response.status === 401 || response.status === 403) return 'invalid';
    throw new SessionServiceError(response.statusText || `HTTP ${response.status}`, response.status);
  }
}

export type AuthResult =
  | { readonly type: 'authenticated'; readonly token: string }
  | { readonly type: 'rejected'; readonly status: 401; readonly detail: string };

export function readSessionToken(req: IncomingMessage): string | null {
  const raw = req.headers[SESSION_HEADER];
  const token = Array.isArray(raw) ? raw[0] : raw;
  return token && token.trim() !== '' ? token.trim() : null;
}

/** Service errors propagate; the listener turns them into a 500 */
export async function authenticate(req: IncomingMessage, sessions: SessionValidator): Promise<AuthResult> {
  const token = readSessionToken(req);
  if (!token) return { type: 'rejected', status: 401, detail: 'Session token is missing' };

  const check = await sessions.validate(token);
  if (check === 'invalid') return { type: 'rejected', status: 401, detail: 'Invalid or expired session token' };
  return { type: 'authenticated', token };
}
