import diagnosticsChannel from 'node:diagnostics_channel';

import { afterEach, describe, expect, test } from 'vitest';

import { NetworkError } from '../../../src/errors/app-error.js';
import {
  InProcessTransport,
} from '../../../src/services/transports/in-process.js';
import { NetworkTransport } from '../../../src/services/transports/network.js';
import {
  createRemoteClient,
  createUnreachableClient,
  type RecordedRequest,
} from '../../fixtures/remote-client.js';
import { createTestApp } from '../../fixtures/test-app.js';

describe('transports', () => {
  describe('InProcessTransport', () => {
    const transport = new InProcessTransport(createTestApp());

    test('sends the URL host in the Host header', async () => {
      const response = await transport.send({
        method: 'GET',
        url: 'http://www.local.com:3000/host',
        headers: { Host: 'ignored.test' },
      });

      expect(response.status).toBe(200);
      expect(response.body.toString()).toBe(
        'Current host is http://www.local.com:3000'
      );
    });

    test('returns redirects without following them', async () => {
      const response = await transport.send({
        method: 'GET',
        url: 'http://www.local.com/redirect',
        headers: {},
      });

      expect(response.status).toBe(302);
      expect(response.statusText).toBe('Found');
      expect(response.headers.location).toBe('/redirect_again');
    });

    test('passes bodies to the application', async () => {
      const response = await transport.send({
        method: 'POST',
        url: 'http://www.local.com/form?page=1',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: 'name=Ada',
      });

      expect(JSON.parse(response.body.toString())).toEqual({
        method: 'POST',
        query: { page: '1' },
        body: { name: 'Ada' },
      });
    });
  });

  describe('NetworkTransport', () => {
    const unsubscribers: (() => void)[] = [];

    afterEach(() => {
      for (const unsubscribe of unsubscribers.splice(0)) unsubscribe();
    });

    test('returns redirects and error statuses as responses', async () => {
      const recorded: RecordedRequest[] = [];
      const transport = new NetworkTransport(
        createRemoteClient(createTestApp(), recorded)
      );

      const redirect = await transport.send({
        method: 'GET',
        url: 'http://remote.test/redirect',
        headers: { 'X-Foo': 'bar' },
      });
      const failure = await transport.send({
        method: 'GET',
        url: 'http://remote.test/error',
        headers: {},
      });

      expect(redirect.status).toBe(302);
      expect(redirect.headers.location).toBe('/redirect_again');
      expect(failure.status).toBe(500);
      expect(recorded.map((request) => request.url)).toEqual([
        'http://remote.test/redirect',
        'http://remote.test/error',
      ]);
      expect(recorded[0]?.headers['x-foo']).toBe('bar');
    });

    test('maps unreachable hosts to NetworkError', async () => {
      const transport = new NetworkTransport(createUnreachableClient());

      const sending = transport.send({
        method: 'GET',
        url: 'http://down.test/',
        headers: {},
      });

      await expect(sending).rejects.toBeInstanceOf(NetworkError);
      await expect(sending).rejects.toMatchObject({
        url: 'http://down.test/',
        causeCode: 'ENOTFOUND',
        message: 'Network error: Could not reach http://down.test/ (ENOTFOUND)',
      });
    });

    test('instruments a shared client once', async () => {
      const events: unknown[] = [];
      const listener = (message: unknown): void => {
        events.push(message);
      };
      diagnosticsChannel.subscribe('hostswitch.network', listener);
      unsubscribers.push(() =>
        diagnosticsChannel.unsubscribe('hostswitch.network', listener)
      );

      const client = createRemoteClient(createTestApp());
      new NetworkTransport(client);
      const transport = new NetworkTransport(client);
      await transport.send({
        method: 'GET',
        url: 'http://remote.test/',
        headers: {},
      });

      expect(events).toHaveLength(2);
    });

    test('publishes request events', async () => {
      const events: unknown[] = [];
      const listener = (message: unknown): void => {
        events.push(message);
      };
      diagnosticsChannel.subscribe('hostswitch.network', listener);
      unsubscribers.push(() =>
        diagnosticsChannel.unsubscribe('hostswitch.network', listener)
      );

      const transport = new NetworkTransport(
        createRemoteClient(createTestApp())
      );
      await transport.send({
        method: 'GET',
        url: 'http://remote.test/',
        headers: {},
      });

      expect(events).toEqual([
        expect.objectContaining({
          type: 'start',
          method: 'GET',
          url: 'http://remote.test/',
        }),
        expect.objectContaining({ type: 'end', status: 200 }),
      ]);
    });
  });
});
