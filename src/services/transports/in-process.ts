import inject from 'light-my-request';

import type {
  ApplicationHandler,
  Transport,
  TransportKind,
  TransportRequest,
  TransportResponse,
} from '../../config/types.js';

import { logDebug } from '../logger.js';

import { normalizeResponseHeaders, withoutHeaders } from './headers.js';

/**
 * Dispatches requests straight into the application's request listener.
 * No socket is opened; the URL's host travels in the Host header.
 */
export class InProcessTransport implements Transport {
  readonly kind: TransportKind = 'local';

  constructor(private readonly app: ApplicationHandler) {}

  async send(request: TransportRequest): Promise<TransportResponse> {
    const url = new URL(request.url);
    const headers = {
      ...withoutHeaders(request.headers, ['host']),
      host: url.host,
    };

    logDebug('In-process request', {
      method: request.method,
      url: request.url,
    });

    const response = await inject(this.app, {
      method: request.method,
      url: `${url.pathname}${url.search}`,
      headers,
      ...(request.body !== undefined ? { payload: request.body } : {}),
    });

    return {
      status: response.statusCode,
      statusText: response.statusMessage,
      headers: normalizeResponseHeaders(response.headers),
      body: response.rawPayload,
    };
  }
}
