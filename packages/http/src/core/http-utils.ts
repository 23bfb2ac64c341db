// Pure HTTP utility functions
// All functions are pure - no side effects

import { err, ok, type Result } from 'neverthrow';

import type { Header } from '../request.js';

import type { StatusClass } from './types.js';

export const DEFAULT_ACCEPT = 'application/json';

export const JSON_CONTENT_TYPE = 'application/json; utf-8';

/** Value reported in place of a redirect's body when it carries no Location */
export const MISSING_LOCATION_BODY = 'No Location header';

/**
 * Sanitize URL for logging (remove sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);

    // List of sensitive parameter names to redact
    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'secret', 'password'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    if (urlObj.password) {
      urlObj.password = '***';
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};

/**
 * Parse a request URL the engine can dispatch: absolute, http or https.
 */
export const parseTargetUrl = (url: string): Result<URL, Error> => {
  let target: URL;
  try {
    target = new URL(url);
  } catch {
    return err(new Error(`Invalid URL: ${url}`));
  }

  if (target.protocol !== 'http:' && target.protocol !== 'https:') {
    return err(new Error(`Unsupported URL scheme: ${target.protocol}`));
  }

  return ok(target);
};

export const classifyStatus = (status: number): StatusClass => {
  if (status >= 200 && status < 300) return 'success';
  if (status >= 300 && status < 400) return 'redirect';
  return 'failure';
};

/**
 * Flat name/value list for the wire. Accept comes first, then the request's
 * headers in order. With a body, any caller Content-Type is replaced by the
 * JSON one.
 */
export const buildRequestHeaders = (headers: readonly Header[], hasBody: boolean): string[] => {
  const flat: string[] = ['Accept', DEFAULT_ACCEPT];

  for (const header of headers) {
    if (hasBody && header.name.toLowerCase() === 'content-type') continue;
    flat.push(header.name, header.value);
  }

  if (hasBody) {
    flat.push('Content-Type', JSON_CONTENT_TYPE);
  }

  return flat;
};

/**
 * Lower-case names, repeated fields joined with ','. Absent values are skipped.
 */
export const collectResponseHeaders = (
  headers: Readonly<Record<string, string | string[] | undefined>>
): Record<string, string> => {
  const collected: Record<string, string> = {};

  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    collected[name.toLowerCase()] = Array.isArray(value) ? value.join(',') : value;
  }

  return collected;
};

/** First non-empty value of a header, looked up case-insensitively */
export const firstHeaderValue = (
  headers: Readonly<Record<string, string | string[] | undefined>>,
  name: string
): string | undefined => {
  const wanted = name.toLowerCase();

  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) continue;

    const first = Array.isArray(value) ? value[0] : value;
    if (first) return first;
  }

  return undefined;
};

/**
 * Absolute locations are kept as sent; relative ones resolve against the URL
 * that answered with the redirect.
 */
export const resolveRedirectLocation = (location: string, currentUrl: string): string => {
  if (URL.canParse(location)) {
    return location;
  }

  try {
    return new URL(location, currentUrl).toString();
  } catch {
    return location;
  }
};
