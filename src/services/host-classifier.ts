import type { HostRoots, SessionContext } from '../config/types.js';

import { ValidationError } from '../errors/app-error.js';

import { parseTarget, rootHostname } from '../utils/url-validator.js';

function formatHostForUrl(hostname: string): string {
  if (hostname.includes(':') && !hostname.startsWith('[')) {
    return `[${hostname}]`;
  }
  return hostname;
}

function normalizeLocalHost(entry: string): string {
  const hostname = entry.trim().toLowerCase();
  if (!hostname) {
    throw new ValidationError('localHosts entries must not be empty', {
      localHosts: entry,
    });
  }
  return formatHostForUrl(hostname);
}

function localHostnames(
  defaultHost: string,
  hostRoots: HostRoots
): Set<string> {
  const hostnames = new Set([rootHostname(defaultHost, 'defaultHost')]);
  for (const entry of hostRoots.localHosts ?? []) {
    hostnames.add(normalizeLocalHost(entry));
  }
  return hostnames;
}

function isRemoteHostname(hostname: string, hostRoots: HostRoots): boolean {
  if (hostRoots.appHost) {
    return hostname !== rootHostname(hostRoots.appHost, 'appHost');
  }
  if (hostRoots.defaultHost) {
    return !localHostnames(hostRoots.defaultHost, hostRoots).has(hostname);
  }
  return true;
}

/**
 * Decides whether a request target goes over the network. Relative targets
 * go wherever the last navigation went (or, given only a last URL, follow
 * its classification) and are local when nothing has been visited yet.
 */
export function isRemote(
  url: string,
  session: SessionContext,
  hostRoots: HostRoots
): boolean {
  const target = parseTarget(url);
  if (target.kind === 'relative') {
    if (session.lastRemote !== undefined) return session.lastRemote;
    if (!session.lastUrl) return false;
    return isRemote(session.lastUrl, {}, hostRoots);
  }
  return isRemoteHostname(target.hostname, hostRoots);
}
