import type { HttpEffects } from './core/types.js';
import type { InstrumentationCollector } from './instrumentation.js';

export interface HttpClientOptions {
  hooks?: HttpClientHooks | undefined;
  instrumentation?: InstrumentationCollector | undefined;
  /** Replace side effects, e.g. inject an undici MockAgent as dispatcher */
  effects?: Partial<HttpEffects> | undefined;
}

/**
 * Per-hop observation points. Every hop reports onRequestStart followed by
 * exactly one of onRedirect, onRequestSuccess or onRequestFailure. URLs are
 * sanitized.
 */
export interface HttpClientHooks {
  onRequestStart?: ((event: { method: string; timestamp: number; url: string }) => void) | undefined;

  onRequestSuccess?:
    | ((event: { durationMs: number; method: string; status: number; url: string }) => void)
    | undefined;

  onRequestFailure?:
    | ((event: {
        durationMs: number;
        error: string;
        method: string;
        status?: number | undefined;
        url: string;
      }) => void)
    | undefined;

  onRedirect?: ((event: { from: string; status: number; to: string }) => void) | undefined;
}

// HTTP-related error classes

/** Network or I/O failure: DNS, refused connection, timeout, TLS handshake or trust, stream error */
export class TransportError extends Error {
  constructor(
    public readonly requestUrl: string,
    public override readonly cause: Error
  ) {
    super(`Request to ${requestUrl} failed: ${cause.message}`);
    this.name = 'TransportError';
  }
}

export class RedirectError extends Error {
  constructor(
    public readonly requestUrl: string,
    public readonly statusCode: number,
    public readonly responseBody: string
  ) {
    super(
      `Request to ${requestUrl} was redirected (status code ${statusCode}). See error responseBody for details.`
    );
    this.name = 'RedirectError';
  }
}

export class UnsuccessfulStatusError extends Error {
  constructor(
    public readonly requestUrl: string,
    public readonly statusCode: number,
    public readonly errorBody: string
  ) {
    super(`Request to ${requestUrl} failed with status code ${statusCode}. See error errorBody for details.`);
    this.name = 'UnsuccessfulStatusError';
  }
}

export class TooManyRedirectsError extends Error {
  constructor(
    public readonly requestUrl: string,
    public readonly maxRedirects: number
  ) {
    super(`Request to ${requestUrl} exceeded the limit of ${maxRedirects} redirects`);
    this.name = 'TooManyRedirectsError';
  }
}

/** No trust delegate accepted a certificate chain */
export class TrustFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TrustFailure';
  }
}

/** A configured trust anchor could not be parsed as an X.509 certificate */
export class TrustAnchorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TrustAnchorError';
  }
}

export type HttpClientError = TransportError | RedirectError | UnsuccessfulStatusError | TooManyRedirectsError;
