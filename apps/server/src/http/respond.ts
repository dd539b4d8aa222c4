import type { IncomingMessage, ServerResponse } from 'node:http';
import type { ParseResult } from '@taskd/core';

const MAX_BODY_BYTES = 1024 * 1024;

export class BodyParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BodyParseError';
  }
}

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

export function sendDetail(res: ServerResponse, status: number, detail: string): void {
  sendJson(res, status, { detail });
}

export function sendEmpty(res: ServerResponse, status: number = 204): void {
  res.writeHead(status);
  res.end();
}

type Failure = Exclude<ParseResult<unknown>, { type: 'success' }>;

export function statusFor(failure: Failure): number {
  switch (failure.type) {
    case 'invalid': return 400;
    case 'invalid-status': return 400;
    case 'unprocessable': return 422;
    case 'not-found': return 404;
    case 'error': return 500;
  }
}

export function sendFailure(res: ServerResponse, failure: Failure): void {
  sendDetail(res, statusFor(failure), failure.message);
}

/** Read and decode a JSON body. An empty body decodes to `{}` */
export async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new BodyParseError('Request body too large');
    chunks.push(buf);
  }

  const text = Buffer.concat(chunks).toString('utf8').trim();
  if (text === '') return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new BodyParseError('Invalid JSON body');
  }
}
