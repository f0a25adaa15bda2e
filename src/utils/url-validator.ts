import { UrlValidationError, ValidationError } from '../errors/app-error.js';

const RELATIVE_PARSE_BASE = 'http://relative.invalid/';

export type ParsedTarget =
  | { kind: 'absolute'; hostname: string }
  | { kind: 'relative' };

function assertUrlProvided(urlString: string): void {
  if (typeof urlString !== 'string') {
    throw new UrlValidationError('URL is required', String(urlString));
  }
}

function assertUrlNotEmpty(trimmedUrl: string, original: string): void {
  if (!trimmedUrl) {
    throw new UrlValidationError('URL cannot be empty', original);
  }
}

function assertProtocolAllowed(url: URL, original: string): void {
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new UrlValidationError(
      `Invalid protocol: ${url.protocol}. Only http: and https: are allowed`,
      original
    );
  }
}

function assertHostnamePresent(url: URL, original: string): void {
  if (!url.hostname) {
    throw new UrlValidationError('URL must have a valid hostname', original);
  }
}

function parseAbsolute(candidate: string, original: string): URL {
  if (!URL.canParse(candidate)) {
    throw new UrlValidationError('Invalid URL format', original);
  }
  const url = new URL(candidate);
  assertProtocolAllowed(url, original);
  assertHostnamePresent(url, original);
  return url;
}

function hasScheme(trimmedUrl: string): boolean {
  return /^[a-z][a-z\d+.-]*:/i.test(trimmedUrl);
}

/**
 * Splits a request target into absolute (with a hostname) or relative.
 * Anything else is rejected rather than guessed at.
 */
export function parseTarget(urlString: string): ParsedTarget {
  assertUrlProvided(urlString);

  const trimmedUrl = urlString.trim();
  assertUrlNotEmpty(trimmedUrl, urlString);

  if (trimmedUrl.startsWith('//')) {
    const url = parseAbsolute(`http:${trimmedUrl}`, urlString);
    return { kind: 'absolute', hostname: url.hostname };
  }

  if (hasScheme(trimmedUrl)) {
    const url = parseAbsolute(trimmedUrl, urlString);
    return { kind: 'absolute', hostname: url.hostname };
  }

  if (!URL.canParse(trimmedUrl, RELATIVE_PARSE_BASE)) {
    throw new UrlValidationError('Invalid URL format', urlString);
  }
  return { kind: 'relative' };
}

export function resolveUrl(target: string, baseUrl: string): string {
  const trimmedUrl = target.trim();
  if (!URL.canParse(trimmedUrl, baseUrl)) {
    throw new UrlValidationError('Invalid URL format', target);
  }
  const url = new URL(trimmedUrl, baseUrl);
  assertProtocolAllowed(url, target);
  assertHostnamePresent(url, target);
  return url.href;
}

/**
 * Hostname of a configured root URL such as appHost.
 */
export function rootHostname(rootUrl: string, field: string): string {
  if (!URL.canParse(rootUrl)) {
    throw new ValidationError(`${field} must be an absolute URL`, {
      [field]: rootUrl,
    });
  }
  const url = new URL(rootUrl);
  if (!url.hostname) {
    throw new ValidationError(`${field} must include a hostname`, {
      [field]: rootUrl,
    });
  }
  return url.hostname;
}

export function requestPath(urlString: string): string {
  const url = new URL(urlString);
  return `${url.pathname}${url.search}`;
}

export function isSameDocument(target: string): boolean {
  return target.trim().startsWith('#');
}
