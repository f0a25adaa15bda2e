import type {
  HeaderMap,
  NavigationOptions,
  NavigationRequest,
  NavigationResult,
  TransportResponse,
} from '../config/types.js';

import { InfiniteRedirectError } from '../errors/app-error.js';

import { resolveUrl } from '../utils/url-validator.js';

import { logDebug, logWarn } from './logger.js';
import { mergeHeaders, withoutHeaders } from './transports/headers.js';

const METHOD_PRESERVING_STATUSES = new Set([307, 308]);
const BODY_HEADERS = ['content-type', 'content-length'];

export function isRedirect(response: TransportResponse): boolean {
  return (
    response.status >= 300 &&
    response.status < 400 &&
    Boolean(response.headers.location)
  );
}

function nextHop(
  current: NavigationRequest,
  response: TransportResponse,
  configuredHeaders: HeaderMap
): NavigationRequest {
  const location = response.headers.location ?? '';
  const url = resolveUrl(location, current.url);

  if (METHOD_PRESERVING_STATUSES.has(response.status)) {
    return {
      ...current,
      target: url,
      url,
      headers: mergeHeaders(current.headers, configuredHeaders),
    };
  }

  return {
    method: current.method === 'HEAD' ? 'HEAD' : 'GET',
    target: url,
    url,
    headers: mergeHeaders(
      withoutHeaders(current.headers, BODY_HEADERS),
      configuredHeaders
    ),
  };
}

/**
 * Issues a request and follows Location redirects, picking the transport
 * again for every hop. More than `redirectLimit` redirects is an error.
 */
export async function resolveNavigation(
  request: NavigationRequest,
  options: NavigationOptions
): Promise<NavigationResult> {
  const chain: string[] = [];
  let current: NavigationRequest = {
    ...request,
    headers: mergeHeaders(request.headers, options.headers),
  };

  for (let hops = 0; ; hops += 1) {
    const transport = options.selectTransport(current.target);
    chain.push(current.url);

    const response = await transport.send({
      method: current.method,
      url: current.url,
      headers: current.headers,
      body: current.body,
    });

    if (!options.followRedirects || !isRedirect(response)) {
      return {
        response,
        method: current.method,
        url: current.url,
        remote: transport.kind === 'remote',
        chain,
      };
    }

    if (hops >= options.redirectLimit) {
      logWarn('Redirect limit exceeded', {
        limit: options.redirectLimit,
        chain,
      });
      throw new InfiniteRedirectError(
        current.url,
        options.redirectLimit,
        chain
      );
    }

    current = nextHop(current, response, options.headers);
    logDebug('Following redirect', {
      status: response.status,
      from: chain[chain.length - 1],
      to: current.url,
      hop: hops + 1,
    });
  }
}
