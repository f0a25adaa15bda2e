import { describe, expect, test, vi } from 'vitest';

import type {
  NavigationOptions,
  NavigationRequest,
  Transport,
  TransportKind,
  TransportRequest,
  TransportResponse,
} from '../../../src/config/types.js';
import {
  InfiniteRedirectError,
  UrlValidationError,
} from '../../../src/errors/app-error.js';
import {
  isRedirect,
  resolveNavigation,
} from '../../../src/services/redirects.js';

function respond(
  status: number,
  headers: Record<string, string> = {},
  body = ''
): TransportResponse {
  return { status, statusText: '', headers, body: Buffer.from(body) };
}

function createTransport(
  kind: TransportKind,
  handler: (request: TransportRequest) => TransportResponse
): Transport & { requests: TransportRequest[] } {
  const requests: TransportRequest[] = [];
  return {
    kind,
    requests,
    send: vi.fn((request: TransportRequest) => {
      requests.push(request);
      return Promise.resolve(handler(request));
    }),
  };
}

function countdown(request: TransportRequest): TransportResponse {
  const match = /\/hops\/(\d+)$/.exec(new URL(request.url).pathname);
  const remaining = Number(match?.[1] ?? 0);
  if (remaining === 0) return respond(200, {}, 'done');
  return respond(302, { location: `/hops/${remaining - 1}` });
}

function navigation(url: string, target = url): NavigationRequest {
  return { method: 'GET', target, url, headers: {} };
}

function options(
  transport: Transport,
  overrides: Partial<NavigationOptions> = {}
): NavigationOptions {
  return {
    selectTransport: () => transport,
    followRedirects: true,
    redirectLimit: 5,
    headers: {},
    ...overrides,
  };
}

describe('isRedirect', () => {
  test('needs a 3xx status and a location', () => {
    expect(isRedirect(respond(302, { location: '/x' }))).toBe(true);
    expect(isRedirect(respond(399, { location: '/x' }))).toBe(true);
    expect(isRedirect(respond(302))).toBe(false);
    expect(isRedirect(respond(200, { location: '/x' }))).toBe(false);
    expect(isRedirect(respond(400, { location: '/x' }))).toBe(false);
  });
});

describe('resolveNavigation', () => {
  test('returns a non-redirect response as is', async () => {
    const transport = createTransport('local', () => respond(200, {}, 'ok'));

    const result = await resolveNavigation(
      navigation('http://app.test/'),
      options(transport)
    );

    expect(result.response.body.toString()).toBe('ok');
    expect(result.url).toBe('http://app.test/');
    expect(result.method).toBe('GET');
    expect(result.remote).toBe(false);
    expect(result.chain).toEqual(['http://app.test/']);
  });

  test('follows exactly the redirect limit', async () => {
    const transport = createTransport('local', countdown);

    const result = await resolveNavigation(
      navigation('http://app.test/hops/5'),
      options(transport)
    );

    expect(result.url).toBe('http://app.test/hops/0');
    expect(result.chain).toHaveLength(6);
    expect(transport.requests).toHaveLength(6);
  });

  test('fails one redirect past the limit', async () => {
    const transport = createTransport('local', countdown);

    const error = await resolveNavigation(
      navigation('http://app.test/hops/6'),
      options(transport)
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InfiniteRedirectError);
    if (!(error instanceof InfiniteRedirectError)) return;
    expect(error.limit).toBe(5);
    expect(error.url).toBe('http://app.test/hops/1');
    expect(error.chain).toHaveLength(6);
  });

  test('honours a custom limit', async () => {
    const transport = createTransport('local', countdown);

    await expect(
      resolveNavigation(
        navigation('http://app.test/hops/2'),
        options(transport, { redirectLimit: 1 })
      )
    ).rejects.toThrow(InfiniteRedirectError);
  });

  test('returns the first response when not following redirects', async () => {
    const transport = createTransport('local', countdown);

    const result = await resolveNavigation(
      navigation('http://app.test/hops/3'),
      options(transport, { followRedirects: false })
    );

    expect(result.response.status).toBe(302);
    expect(result.response.headers.location).toBe('/hops/2');
    expect(result.url).toBe('http://app.test/hops/3');
    expect(transport.requests).toHaveLength(1);
  });

  test('attaches configured headers to every hop', async () => {
    const transport = createTransport('local', countdown);

    await resolveNavigation(
      navigation('http://app.test/hops/2'),
      options(transport, { headers: { 'X-Trace': 'abc' } })
    );

    expect(transport.requests.map((r) => r.headers['X-Trace'])).toEqual([
      'abc',
      'abc',
      'abc',
    ]);
  });

  test('re-selects the transport on every hop', async () => {
    const local = createTransport('local', () =>
      respond(302, { location: 'http://remote.test/landing' })
    );
    const remote = createTransport('remote', () => respond(200, {}, 'remote'));
    const selectTransport = vi.fn((target: string) =>
      target.startsWith('http://remote.test') ? remote : local
    );

    const result = await resolveNavigation(
      navigation('http://app.test/start', '/start'),
      options(local, { selectTransport })
    );

    expect(selectTransport.mock.calls).toEqual([
      ['/start'],
      ['http://remote.test/landing'],
    ]);
    expect(result.remote).toBe(true);
    expect(result.url).toBe('http://remote.test/landing');
  });

  test('keeps method and body on 307', async () => {
    const transport = createTransport('local', (request) =>
      request.url.endsWith('/submit')
        ? respond(307, { location: '/accepted' })
        : respond(201)
    );

    await resolveNavigation(
      {
        method: 'POST',
        target: 'http://app.test/submit',
        url: 'http://app.test/submit',
        headers: { 'Content-Type': 'text/plain' },
        body: 'payload',
      },
      options(transport)
    );

    expect(transport.requests[1]).toEqual({
      method: 'POST',
      url: 'http://app.test/accepted',
      headers: { 'Content-Type': 'text/plain' },
      body: 'payload',
    });
  });

  test('switches to GET and drops the body on 303', async () => {
    const transport = createTransport('local', (request) =>
      request.url.endsWith('/submit')
        ? respond(303, { location: '/done' })
        : respond(200)
    );

    await resolveNavigation(
      {
        method: 'POST',
        target: 'http://app.test/submit',
        url: 'http://app.test/submit',
        headers: { 'Content-Type': 'text/plain', 'X-Keep': '1' },
        body: 'payload',
      },
      options(transport)
    );

    expect(transport.requests[1]).toEqual({
      method: 'GET',
      url: 'http://app.test/done',
      headers: { 'X-Keep': '1' },
      body: undefined,
    });
  });

  test('rejects redirects to non-http locations', async () => {
    const transport = createTransport('local', () =>
      respond(302, { location: 'javascript:alert(1)' })
    );

    await expect(
      resolveNavigation(navigation('http://app.test/'), options(transport))
    ).rejects.toThrow(UrlValidationError);
  });
});
