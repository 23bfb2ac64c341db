import type { X509Certificate } from 'node:crypto';

import { err, ok, type Result } from 'neverthrow';

import { TrustFailure } from '../types.js';

import {
  PlatformTrustDelegate,
  X509TrustDelegate,
  type HandshakeVerdict,
  type TrustDelegate,
  type TrustRole,
} from './trust-delegate.js';
import type { TrustStore } from './trust-store.js';

export const NO_TRUSTED_DELEGATE_MESSAGE = 'None of the trust delegates trust this certificate chain';

/**
 * Combines several trust delegates: a chain is trusted as soon as one
 * delegate accepts it, in construction order. Rejections from individual
 * delegates are not reported.
 */
export class TrustAggregator {
  private readonly delegates: readonly TrustDelegate[];

  constructor(delegates: readonly TrustDelegate[]) {
    this.delegates = [...delegates];
  }

  /**
   * Platform trust first, then one delegate per store.
   */
  static fromTrustStores(stores: readonly TrustStore[] = []): TrustAggregator {
    return new TrustAggregator([
      new PlatformTrustDelegate(),
      ...stores.map((store) => new X509TrustDelegate(store)),
    ]);
  }

  get size(): number {
    return this.delegates.length;
  }

  validate(
    chain: readonly X509Certificate[],
    authType: string,
    role: TrustRole,
    handshake?: HandshakeVerdict
  ): Result<void, TrustFailure> {
    const trusted = this.delegates.some((delegate) => delegate.checkTrusted(chain, authType, role, handshake).isOk());
    return trusted ? ok() : err(new TrustFailure(NO_TRUSTED_DELEGATE_MESSAGE));
  }

  checkServerTrusted(
    chain: readonly X509Certificate[],
    authType: string,
    handshake?: HandshakeVerdict
  ): Result<void, TrustFailure> {
    return this.validate(chain, authType, 'server', handshake);
  }

  checkClientTrusted(
    chain: readonly X509Certificate[],
    authType: string,
    handshake?: HandshakeVerdict
  ): Result<void, TrustFailure> {
    return this.validate(chain, authType, 'client', handshake);
  }

  acceptedIssuers(): X509Certificate[] {
    return this.delegates.flatMap((delegate) => [...delegate.acceptedIssuers()]);
  }
}
