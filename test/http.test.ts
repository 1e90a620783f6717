import { describe, expect, it } from 'vitest';
import { HttpError, requestJson } from '../src/http.js';

function sequence(responses: Array<Response | Error>) {
  const calls: Array<{ url: string; init?: RequestInit }> = [];
  const fetcher: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    const next = responses.shift();
    if (!next) throw new Error('no more responses');
    if (next instanceof Error) throw next;
    return next;
  };
  return { fetcher, calls };
}

describe('requestJson', () => {
  it('adds the query and a JSON body', async () => {
    const { fetcher, calls } = sequence([new Response('{"ok":true}', { status: 200 })]);

    const res = await requestJson<{ ok: boolean }>(
      'https://api.example.com/items',
      { method: 'POST', query: { q: 'a b', page: 2, skip: undefined }, body: { x: 1 } },
      fetcher,
    );

    expect(res).toEqual({ ok: true });
    expect(calls[0]?.url).toBe('https://api.example.com/items?q=a+b&page=2');
    expect(calls[0]?.init?.body).toBe('{"x":1}');
    expect(calls[0]?.init?.headers).toEqual({ accept: 'application/json', 'content-type': 'application/json' });
  });

  it('retries transient statuses and network errors', async () => {
    const { fetcher, calls } = sequence([
      new Response('busy', { status: 503 }),
      new Error('socket hang up'),
      new Response('slow down', { status: 429, headers: { 'retry-after': '0' } }),
      new Response('{"n":1}', { status: 200 }),
    ]);

    expect(await requestJson('https://api.example.com/x', { backoffMs: 0 }, fetcher)).toEqual({ n: 1 });
    expect(calls).toHaveLength(4);
  });

  it('throws HttpError without retrying a client error', async () => {
    const { fetcher, calls } = sequence([new Response('nope', { status: 404 })]);

    const err = await requestJson('https://api.example.com/x', { backoffMs: 0 }, fetcher).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HttpError);
    expect(err instanceof HttpError && [err.status, err.responseText]).toEqual([404, 'nope']);
    expect(calls).toHaveLength(1);
  });

  it('gives up after the configured retries', async () => {
    const { fetcher, calls } = sequence([
      new Response('a', { status: 500 }),
      new Response('b', { status: 500 }),
      new Response('c', { status: 500 }),
    ]);

    await expect(requestJson('https://api.example.com/x', { retries: 2, backoffMs: 0 }, fetcher)).rejects.toThrow(
      'HTTP 500 for https://api.example.com/x',
    );
    expect(calls).toHaveLength(3);
  });

  it('resolves empty bodies to undefined', async () => {
    const { fetcher } = sequence([new Response(null, { status: 204 }), new Response('', { status: 200 })]);
    expect(await requestJson('https://api.example.com/x', {}, fetcher)).toBeUndefined();
    expect(await requestJson('https://api.example.com/x', {}, fetcher)).toBeUndefined();
  });
});
