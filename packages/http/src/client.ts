import { getLogger, type Logger } from '@tether/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, type Dispatcher } from 'undici';

import {
  createHttpClientConfiguration,
  type HttpClientConfiguration,
  type HttpClientConfigurationOptions,
} from './configuration.js';
import * as HttpUtils from './core/http-utils.js';
import type { DispatchOutcome, HttpEffects } from './core/types.js';
import { hostOf, sanitizeEndpoint, type InstrumentationCollector } from './instrumentation.js';
import { InterceptorChain, type RequestInterceptor } from './interceptor.js';
import {
  GetRequest,
  RequestWithBody,
  type DeleteRequest,
  type HeadRequest,
  type OptionsRequest,
  type PatchRequest,
  type PostRequest,
  type PutRequest,
  type Request,
} from './request.js';
import { Response } from './response.js';
import { parseCertificate } from './security/certificates.js';
import { createTrustingConnector } from './security/connector.js';
import { TrustAggregator } from './security/trust-aggregator.js';
import { TrustStore } from './security/trust-store.js';
import { readTextAndClose } from './stream.js';
import type { HttpClientError, HttpClientHooks, HttpClientOptions } from './types.js';
import { RedirectError, TooManyRedirectsError, TransportError, UnsuccessfulStatusError } from './types.js';

type HopError = TransportError | RedirectError | UnsuccessfulStatusError;

export class HttpClient {
  readonly configuration: HttpClientConfiguration;
  readonly trustAggregator: TrustAggregator;

  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;
  private readonly hooks: HttpClientHooks | undefined;
  private readonly instrumentation: InstrumentationCollector | undefined;
  private readonly interceptors = new InterceptorChain();

  // Close state (for idempotent cleanup)
  private closePromise?: Promise<void>;
  private isClosed = false;

  /**
   * Throws a ZodError for invalid options and a TrustAnchorError when
   * `customTrustAnchor` is not a certificate.
   */
  constructor(configuration: HttpClientConfigurationOptions = {}, options: HttpClientOptions = {}) {
    this.configuration = createHttpClientConfiguration(configuration);
    this.hooks = options.hooks;
    this.instrumentation = options.instrumentation;
    this.logger = getLogger('HttpClient');

    const { customTrustAnchor } = this.configuration;
    const customStores =
      customTrustAnchor === undefined ? [] : [TrustStore.fromCertificates([parseCertificate(customTrustAnchor)])];
    this.trustAggregator = TrustAggregator.fromTrustStores(customStores);

    this.agent = new Agent({
      connect: createTrustingConnector(this.trustAggregator, {
        connectTimeoutMs: this.configuration.connectTimeoutMs,
      }),
      headersTimeout: this.configuration.readTimeoutMs,
      bodyTimeout: this.configuration.readTimeoutMs,
    });

    // Initialize effects with production defaults
    this.effects = {
      dispatcher: this.agent,
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      now: () => Date.now(),
      ...options.effects,
    };

    this.logger.debug(
      `HTTP client initialized - ReadTimeout: ${this.configuration.readTimeoutMs}ms, ConnectTimeout: ${this.configuration.connectTimeoutMs}ms, FollowRedirects: ${this.configuration.followRedirects}, MaxRedirects: ${this.configuration.maxRedirects}, TrustDelegates: ${this.trustAggregator.size}`
    );
  }

  /**
   * Run the interceptors, send the request and classify the answer. Redirects
   * are followed with a GET carrying the same headers when configured.
   *
   * Every failure is returned as an error result; only an exception thrown by
   * an interceptor rejects the promise.
   */
  async execute(request: Request): Promise<Result<Response, HttpClientError>> {
    return this.executeHop(request, 0);
  }

  async executeGetRequest(request: GetRequest): Promise<Result<Response, HttpClientError>> {
    return this.execute(request);
  }

  async executePostRequest(request: PostRequest): Promise<Result<Response, HttpClientError>> {
    return this.execute(request);
  }

  async executePutRequest(request: PutRequest): Promise<Result<Response, HttpClientError>> {
    return this.execute(request);
  }

  async executePatchRequest(request: PatchRequest): Promise<Result<Response, HttpClientError>> {
    return this.execute(request);
  }

  async executeDeleteRequest(request: DeleteRequest): Promise<Result<Response, HttpClientError>> {
    return this.execute(request);
  }

  async executeHeadRequest(request: HeadRequest): Promise<Result<Response, HttpClientError>> {
    return this.execute(request);
  }

  async executeOptionsRequest(request: OptionsRequest): Promise<Result<Response, HttpClientError>> {
    return this.execute(request);
  }

  addRequestInterceptor(interceptor: RequestInterceptor): void {
    this.interceptors.add(interceptor);
  }

  removeRequestInterceptor(interceptor: RequestInterceptor): boolean {
    return this.interceptors.remove(interceptor);
  }

  removeAllRequestInterceptors(): void {
    this.interceptors.clear();
  }

  /**
   * Cleanup resources.
   * Closes the undici agent so the process can exit without open sockets.
   *
   * Idempotent: safe to call multiple times. Subsequent calls return the same promise.
   */
  async close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    if (this.isClosed) {
      return;
    }

    this.closePromise = (async () => {
      this.logger.debug('Closing HTTP agent connections');
      try {
        await this.agent.close();
        this.isClosed = true;
        this.logger.debug('HTTP agent closed successfully');
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
        throw new Error(`HTTP agent cleanup failed: ${errorMessage}`);
      }
    })();

    return this.closePromise;
  }

  private async executeHop(request: Request, redirectCount: number): Promise<Result<Response, HttpClientError>> {
    this.interceptors.apply(request);

    const { method, url } = request;
    const displayUrl = HttpUtils.sanitizeUrl(url);
    const startTime = this.effects.now();

    this.hooks?.onRequestStart?.({ method, timestamp: startTime, url: displayUrl });
    this.effects.log('debug', `Making HTTP request - URL: ${displayUrl}, Method: ${method}, Hop: ${redirectCount}`);

    const result = await this.dispatch(request);
    const durationMs = this.effects.now() - startTime;

    if (result.isErr()) {
      const error = result.error;
      const status = error instanceof TransportError ? undefined : error.statusCode;

      if (error instanceof TransportError) {
        this.effects.log('warn', `Request failed - URL: ${displayUrl}, Method: ${method}, Error: ${error.cause.message}`);
      }

      this.hooks?.onRequestFailure?.({ durationMs, error: error.message, method, status, url: displayUrl });
      this.recordMetric(url, method, status ?? 0, durationMs, error.name);
      return err(error);
    }

    const outcome = result.value;
    if (outcome.kind === 'response') {
      const status = outcome.response.statusCode;
      this.hooks?.onRequestSuccess?.({ durationMs, method, status, url: displayUrl });
      this.recordMetric(url, method, status, durationMs);
      return ok(outcome.response);
    }

    this.recordMetric(url, method, outcome.statusCode, durationMs);

    if (redirectCount >= this.configuration.maxRedirects) {
      const error = new TooManyRedirectsError(url, this.configuration.maxRedirects);
      this.effects.log('warn', `Redirect limit reached - URL: ${displayUrl}, MaxRedirects: ${error.maxRedirects}`);
      this.hooks?.onRequestFailure?.({
        durationMs,
        error: error.message,
        method,
        status: outcome.statusCode,
        url: displayUrl,
      });
      return err(error);
    }

    const location = HttpUtils.resolveRedirectLocation(outcome.location, url);
    const displayLocation = HttpUtils.sanitizeUrl(location);
    this.hooks?.onRedirect?.({ from: displayUrl, status: outcome.statusCode, to: displayLocation });
    this.effects.log(
      'debug',
      `Following redirect - Status: ${outcome.statusCode}, From: ${displayUrl}, To: ${displayLocation}`
    );

    const next = new GetRequest(location);
    next.headers.push(...request.headers);
    return this.executeHop(next, redirectCount + 1);
  }

  private async dispatch(request: Request): Promise<Result<DispatchOutcome, HopError>> {
    const target = HttpUtils.parseTargetUrl(request.url);
    if (target.isErr()) {
      return err(new TransportError(request.url, target.error));
    }

    const body = request instanceof RequestWithBody ? Buffer.from(request.body, 'utf8') : null;

    let response: Dispatcher.ResponseData | undefined;
    try {
      response = await this.effects.dispatcher.request({
        origin: target.value.origin,
        path: `${target.value.pathname}${target.value.search}`,
        method: request.method,
        headers: HttpUtils.buildRequestHeaders(request.headers, body !== null),
        body,
        reset: true,
        headersTimeout: this.configuration.readTimeoutMs,
        bodyTimeout: this.configuration.readTimeoutMs,
      });
      return await this.classify(request.url, response);
    } catch (error) {
      return err(new TransportError(request.url, error instanceof Error ? error : new Error(String(error))));
    } finally {
      response?.body.destroy();
    }
  }

  private async classify(
    url: string,
    response: Dispatcher.ResponseData
  ): Promise<Result<DispatchOutcome, RedirectError | UnsuccessfulStatusError>> {
    const { body, headers, statusCode } = response;

    switch (HttpUtils.classifyStatus(statusCode)) {
      case 'success': {
        const text = await readTextAndClose(body);
        const outcome: DispatchOutcome = {
          kind: 'response',
          response: new Response(statusCode, text, HttpUtils.collectResponseHeaders(headers)),
        };
        return ok(outcome);
      }
      case 'redirect': {
        if (!this.configuration.followRedirects) {
          return err(new RedirectError(url, statusCode, await readTextAndClose(body)));
        }

        const location = HttpUtils.firstHeaderValue(headers, 'location');
        if (location === undefined) {
          return err(new RedirectError(url, statusCode, HttpUtils.MISSING_LOCATION_BODY));
        }
        const outcome: DispatchOutcome = { kind: 'redirect', location, statusCode };
        return ok(outcome);
      }
      case 'failure':
        return err(new UnsuccessfulStatusError(url, statusCode, await readTextAndClose(body)));
    }
  }

  /**
   * Record request metric if instrumentation is enabled
   */
  private recordMetric(url: string, method: string, status: number, durationMs: number, error?: string): void {
    if (!this.instrumentation) {
      return;
    }

    this.instrumentation.record({
      durationMs,
      endpoint: sanitizeEndpoint(url),
      error,
      host: hostOf(url),
      method,
      status,
      timestamp: this.effects.now(),
    });
  }
}
