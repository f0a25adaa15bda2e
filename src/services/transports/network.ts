import axios, { type AxiosInstance } from 'axios';

import { config } from '../../config/index.js';
import type {
  Transport,
  TransportKind,
  TransportRequest,
  TransportResponse,
} from '../../config/types.js';

import { AppError, NetworkError } from '../../errors/app-error.js';

import { getErrorMessage } from '../../utils/error-utils.js';

import { normalizeResponseHeaders } from './headers.js';
import { installInterceptors } from './interceptors.js';

export function createHttpClient(): AxiosInstance {
  return axios.create({
    timeout: config.network.timeout,
    maxRedirects: 0,
    maxContentLength: config.network.maxContentLength,
    headers: {
      'User-Agent': config.network.userAgent,
      Accept:
        'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    },
  });
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === 'string') return Buffer.from(data);
  if (data === null || data === undefined) return Buffer.alloc(0);
  return Buffer.from(JSON.stringify(data));
}

/**
 * Sends requests over the network. Redirects and error statuses come back
 * as plain responses; only failures without a response throw.
 */
export class NetworkTransport implements Transport {
  readonly kind: TransportKind = 'remote';
  readonly client: AxiosInstance;

  constructor(client: AxiosInstance = createHttpClient()) {
    this.client = client;
    installInterceptors(client);
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    try {
      const response = await this.client.request<ArrayBuffer>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
        maxRedirects: 0,
        responseType: 'arraybuffer',
        validateStatus: () => true,
      });

      return {
        status: response.status,
        statusText: response.statusText,
        headers: normalizeResponseHeaders(response.headers),
        body: toBuffer(response.data),
      };
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new NetworkError(request.url, undefined, getErrorMessage(error));
    }
  }
}
