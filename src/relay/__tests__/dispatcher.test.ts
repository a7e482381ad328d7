import { describe, it, expect, vi } from 'vitest';
import { DispatchRejectedError } from '../../errors.js';
import { silentLogger } from '../../__tests__/helpers.js';
import { HttpDispatcher, joinTarget, type FetchLike } from '../dispatcher.js';
import { DispatchRequestSchema } from '../model-output.js';

function fakeFetch(status = 200) {
  return vi.fn<FetchLike>().mockResolvedValue(new Response(null, { status }));
}

describe('HttpDispatcher', () => {
  it('posts params as a JSON body', async () => {
    const fetchImpl = fakeFetch(200);
    const dispatcher = new HttpDispatcher(['localhost'], silentLogger(), fetchImpl);

    const result = await dispatcher.dispatch(
      DispatchRequestSchema.parse({
        url: 'http://localhost:3001',
        endpoint: '/students/fetch_conflicts_over_threshold',
        params: { threshold: 3 },
      })
    );

    expect(result).toEqual({ url: 'http://localhost:3001/students/fetch_conflicts_over_threshold', status: 200 });
    expect(fetchImpl).toHaveBeenCalledWith('http://localhost:3001/students/fetch_conflicts_over_threshold', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"threshold":3}',
      signal: undefined,
    });
  });

  it('sends GET params in the query string', async () => {
    const fetchImpl = fakeFetch(404);
    const dispatcher = new HttpDispatcher(['localhost'], silentLogger(), fetchImpl);

    const result = await dispatcher.dispatch(
      DispatchRequestSchema.parse({
        url: 'http://localhost:3001/',
        endpoint: 'health',
        method: 'get',
        params: { verbose: true, country: 'Spain' },
      })
    );

    expect(result.status).toBe(404);
    expect(fetchImpl.mock.calls[0][0]).toBe('http://localhost:3001/health?verbose=true&country=Spain');
    expect(fetchImpl.mock.calls[0][1].body).toBeUndefined();
  });

  it('refuses hosts outside the allow list', async () => {
    const fetchImpl = fakeFetch();
    const dispatcher = new HttpDispatcher(['localhost'], silentLogger(), fetchImpl);

    await expect(
      dispatcher.dispatch(DispatchRequestSchema.parse({ url: 'https://example.com', endpoint: '/students' }))
    ).rejects.toBeInstanceOf(DispatchRejectedError);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('checks the host after resolving an absolute endpoint', () => {
    const dispatcher = new HttpDispatcher(['localhost'], silentLogger(), fakeFetch());

    expect(() =>
      dispatcher.resolveTarget(
        DispatchRequestSchema.parse({ url: 'http://localhost:3001', endpoint: 'http://example.com/x' })
      )
    ).toThrow('Refusing to call http://example.com: host is not in the allow list');
  });
});

describe('joinTarget', () => {
  it('keeps the path of the base url', () => {
    expect(joinTarget('http://localhost:3001/api', '/students/import').href).toBe(
      'http://localhost:3001/api/students/import'
    );
    expect(joinTarget('http://localhost:3001/api/', 'students/import').href).toBe(
      'http://localhost:3001/api/students/import'
    );
  });

  it('joins onto the root', () => {
    expect(joinTarget('http://localhost:3001', '/').href).toBe('http://localhost:3001/');
    expect(joinTarget('http://localhost:3001', 'health?verbose=1').href).toBe(
      'http://localhost:3001/health?verbose=1'
    );
  });

  it('cannot switch hosts with a protocol-relative endpoint', () => {
    expect(joinTarget('http://localhost:3001', '//example.com/x').href).toBe(
      'http://localhost:3001/example.com/x'
    );
  });

  it('uses an absolute endpoint as is', () => {
    expect(joinTarget('http://localhost:3001/api', 'http://127.0.0.1:4000/x').href).toBe('http://127.0.0.1:4000/x');
  });
});
