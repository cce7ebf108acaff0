import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { HttpToolExecutor } from './toolRegistryClient';
import { CollaboratorTimeoutError, CollaboratorUnavailableError } from '../errors';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('HttpToolExecutor', () => {
  const fetchMock = vi.fn<typeof fetch>();
  const executor = new HttpToolExecutor('http://registry.test/');

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should post the tool call and return its result', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ tool: 'get_claims', result: [{ claim_id: 'CLM-1' }], metadata: {}, timestamp: '2024-05-01T00:00:00Z' })
    );

    const result = await executor.execute('get_claims', { patient_id: 'P-1' });

    expect(result).toEqual({ ok: true, data: [{ claim_id: 'CLM-1' }] });
    expect(fetchMock).toHaveBeenCalledWith('http://registry.test/tools/execute', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"tool_name":"get_claims","parameters":{"patient_id":"P-1"}}',
      signal: expect.any(AbortSignal)
    });
  });

  it('should return the error detail of a failed call', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ detail: 'Tool not found: get_clams' }, 404));

    expect(await executor.execute('get_clams', {})).toEqual({ ok: false, error: 'Tool not found: get_clams' });
  });

  it('should describe a failed call without a readable body', async () => {
    fetchMock.mockResolvedValue(new Response('Bad Gateway', { status: 502 }));

    expect(await executor.execute('get_claims', {})).toEqual({ ok: false, error: 'Tool registry responded 502' });
  });

  it('should pass an error reported inside the result', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ tool: 'get_claims', result: { error: 'Patient P-9 not found' } }));

    expect(await executor.execute('get_claims', { patient_id: 'P-9' })).toEqual({
      ok: false,
      error: 'Patient P-9 not found'
    });
  });

  it('should surface a condition the user can resolve', async () => {
    const condition = {
      tag: 'constraint_conflict',
      constraint: 'export_size',
      parameter: 'count',
      requested: 50000,
      limit: 10000
    };
    fetchMock.mockResolvedValue(jsonResponse({ tool: 'export_claims', result: null, metadata: { condition } }));

    expect(await executor.execute('export_claims', { count: 50000 })).toEqual({
      ok: false,
      error: 'Tool export_claims needs clarification',
      condition
    });
  });

  it('should abort a call that outlives its timeout', async () => {
    fetchMock.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        })
    );
    const slow = new HttpToolExecutor('http://registry.test', 20);

    await expect(slow.execute('get_claims', { patient_id: 'P-1' })).rejects.toThrow(
      new CollaboratorTimeoutError('tool get_claims', 20)
    );
    expect(fetchMock.mock.calls[0][1]?.signal?.aborted).toBe(true);
  });

  it('should report an unreachable registry as unavailable', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(executor.execute('get_claims', {})).rejects.toBeInstanceOf(CollaboratorUnavailableError);
  });
});
