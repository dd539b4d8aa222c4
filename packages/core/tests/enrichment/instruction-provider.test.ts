import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  HttpInstructionProvider,
  UnconfiguredInstructionProvider,
  validateInstructions,
} from '../../src/enrichment/instruction-provider.js';
import { createRecordingLogger, type RecordingLogger } from '../helpers.js';

const THREE = ['Instruction one.', 'Instruction two.', 'Instruction three.'];

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('validateInstructions', () => {
  it('accepts 3 to 10 single-sentence strings and trims them', () => {
    const result = validateInstructions(['  Step one.  ', 'Step two', 'Step three.']);
    expect(result).toEqual({ type: 'success', instructions: ['Step one.', 'Step two', 'Step three.'] });
  });

  it('accepts exactly ten', () => {
    const ten = Array.from({ length: 10 }, (_, i) => `Instruction ${i + 1}.`);
    expect(validateInstructions(ten).type).toBe('success');
  });

  it('rejects fewer than three', () => {
    const result = validateInstructions(['Only one instruction.']);
    expect(result).toEqual({ type: 'error', message: 'Invalid instructions: expected at least 3 instructions' });
  });

  it('rejects more than ten', () => {
    const eleven = Array.from({ length: 11 }, (_, i) => `Instruction ${i + 1}.`);
    expect(validateInstructions(eleven)).toEqual({
      type: 'error',
      message: 'Invalid instructions: expected at most 10 instructions',
    });
  });

  it('rejects an instruction with two periods', () => {
    const result = validateInstructions(['Do this. Then that.', 'Step two.', 'Step three.']);
    expect(result).toEqual({ type: 'error', message: 'Invalid instructions at [0]: instruction must be a single sentence' });
  });

  it('rejects blank instructions', () => {
    const result = validateInstructions(['Step one.', '   ', 'Step three.']);
    expect(result).toEqual({ type: 'error', message: 'Invalid instructions at [1]: instruction must not be empty' });
  });

  it('rejects payloads that are not string arrays', () => {
    expect(validateInstructions({ error: 'Not a list' }).type).toBe('error');
    expect(validateInstructions(['a', 2, 'c']).type).toBe('error');
    expect(validateInstructions(null).type).toBe('error');
  });
});

describe('HttpInstructionProvider', () => {
  const mockFetch = vi.fn();
  let logger: RecordingLogger;
  let provider: HttpInstructionProvider;

  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch);
    logger = createRecordingLogger();
    provider = new HttpInstructionProvider(
      { url: 'http://instructions.test/generate', token: 'test-token', timeoutMs: 10_000 },
      logger,
    );
  });

  afterEach(() => {
    mockFetch.mockReset();
    vi.unstubAllGlobals();
  });

  it('posts title and description with a bearer token', async () => {
    mockFetch.mockResolvedValue(jsonResponse(THREE));

    const result = await provider.generate('Test Task', 'Test Description');

    expect(result).toEqual({ type: 'success', instructions: THREE });
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe('http://instructions.test/generate');
    expect(init).toMatchObject({
      method: 'POST',
      headers: expect.objectContaining({
        'Content-Type': 'application/json',
        Authorization: 'Bearer test-token',
      }),
      body: JSON.stringify({ title: 'Test Task', description: 'Test Description' }),
    });
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it('omits Authorization without a token', async () => {
    mockFetch.mockResolvedValue(jsonResponse(THREE));
    const anonymous = new HttpInstructionProvider(
      { url: 'http://instructions.test/generate', token: null, timeoutMs: 10_000 },
      logger,
    );

    await anonymous.generate('Task', 'Description');

    const init = mockFetch.mock.calls[0]?.[1];
    expect(init.headers).not.toHaveProperty('Authorization');
  });

  it.each([
    ['', 'Test Description'],
    ['Test Task', ''],
    ['   ', 'Test Description'],
    ['Test Task', '   '],
  ])('fails without calling the backend for title %j and description %j', async (title, description) => {
    const result = await provider.generate(title, description);
    expect(result.type).toBe('error');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('fails on a non-2xx status', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ error: 'down' }, 503, 'Service Unavailable'));

    const result = await provider.generate('Task', 'Description');

    expect(result).toEqual({ type: 'error', message: 'InstructionBackendError: Service Unavailable' });
    expect(logger.messages('error')).toEqual([
      'Instruction backend call failed: InstructionBackendError: Service Unavailable',
    ]);
  });

  it('fails on a network error and logs it', async () => {
    mockFetch.mockRejectedValue(new Error('API failure'));

    const result = await provider.generate('Task', 'Description');

    expect(result).toEqual({ type: 'error', message: 'API failure' });
    expect(logger.messages('error')).toEqual(['Instruction backend call failed: API failure']);
  });

  it('fails on malformed JSON', async () => {
    mockFetch.mockResolvedValue(new Response('not json', { status: 200 }));
    const result = await provider.generate('Task', 'Description');
    expect(result.type).toBe('error');
  });

  it('fails when the payload does not validate', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ error: 'Not a list' }));

    const result = await provider.generate('Task', 'Description');

    expect(result.type).toBe('error');
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('fails when the backend is slower than the timeout', async () => {
    mockFetch.mockImplementation((_url: string, init: RequestInit) => new Promise((_resolve, reject) => {
      init.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted due to timeout')));
    }));
    const slow = new HttpInstructionProvider(
      { url: 'http://instructions.test/generate', token: null, timeoutMs: 20 },
      logger,
    );

    const result = await slow.generate('Task', 'Description');

    expect(result).toEqual({ type: 'error', message: 'The operation was aborted due to timeout' });
  });
});

describe('UnconfiguredInstructionProvider', () => {
  it('always fails', async () => {
    const result = await new UnconfiguredInstructionProvider().generate('Task', 'Description');
    expect(result).toEqual({ type: 'error', message: 'Instruction backend is not configured' });
  });
});
