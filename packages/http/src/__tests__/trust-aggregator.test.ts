import type { X509Certificate } from 'node:crypto';

import { err, ok, type Result } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { NO_TRUSTED_DELEGATE_MESSAGE, TrustAggregator } from '../security/trust-aggregator.js';
import type { HandshakeVerdict, TrustDelegate, TrustRole } from '../security/trust-delegate.js';
import { TrustStore } from '../security/trust-store.js';
import { TrustFailure } from '../types.js';

import { loadCertificate } from './helpers/fixtures.js';

const ca = loadCertificate('ca-cert.pem');
const otherCa = loadCertificate('other-ca-cert.pem');
const server = loadCertificate('server-cert.pem');

class FakeDelegate implements TrustDelegate {
  readonly calls: { authType: string; role: TrustRole; length: number; handshake?: HandshakeVerdict }[] = [];

  constructor(
    private readonly trusts: boolean,
    private readonly issuers: X509Certificate[] = []
  ) {}

  checkTrusted(
    chain: readonly X509Certificate[],
    authType: string,
    role: TrustRole,
    handshake?: HandshakeVerdict
  ): Result<void, TrustFailure> {
    this.calls.push({ authType, role, length: chain.length, ...(handshake ? { handshake } : {}) });
    return this.trusts ? ok() : err(new TrustFailure('fake rejection'));
  }

  acceptedIssuers(): readonly X509Certificate[] {
    return this.issuers;
  }
}

describe('TrustAggregator', () => {
  it('accepts as soon as one delegate trusts the chain', () => {
    const rejecting = new FakeDelegate(false);
    const accepting = new FakeDelegate(true);
    const unreached = new FakeDelegate(true);

    const result = new TrustAggregator([rejecting, accepting, unreached]).checkServerTrusted([server], 'RSA');

    expect(result.isOk()).toBe(true);
    expect(rejecting.calls).toEqual([{ authType: 'RSA', role: 'server', length: 1 }]);
    expect(accepting.calls).toHaveLength(1);
    expect(unreached.calls).toHaveLength(0);
  });

  it('fails with a single TrustFailure when every delegate rejects', () => {
    const result = new TrustAggregator([new FakeDelegate(false), new FakeDelegate(false)]).checkServerTrusted(
      [server],
      'RSA'
    );

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(TrustFailure);
    expect(error.message).toBe(NO_TRUSTED_DELEGATE_MESSAGE);
  });

  it('trusts nothing without delegates', () => {
    expect(new TrustAggregator([]).checkServerTrusted([server], 'RSA').isErr()).toBe(true);
  });

  it('validates client chains for the client role', () => {
    const delegate = new FakeDelegate(true);

    new TrustAggregator([delegate]).checkClientTrusted([server, ca], 'EC');

    expect(delegate.calls).toEqual([{ authType: 'EC', role: 'client', length: 2 }]);
  });

  it('passes the handshake verdict to each delegate it asks', () => {
    const first = new FakeDelegate(false);
    const second = new FakeDelegate(true);
    const verdict = { authorized: false, authorizationError: 'CERT_HAS_EXPIRED' };

    new TrustAggregator([first, second]).checkServerTrusted([server], 'RSA', verdict);

    expect(first.calls).toEqual([{ authType: 'RSA', role: 'server', length: 1, handshake: verdict }]);
    expect(second.calls).toEqual([{ authType: 'RSA', role: 'server', length: 1, handshake: verdict }]);
  });

  it('accepts through the platform delegate when the handshake was authorized', () => {
    const aggregator = TrustAggregator.fromTrustStores();

    expect(aggregator.checkServerTrusted([server], 'RSA', { authorized: true }).isOk()).toBe(true);
  });

  it('concatenates accepted issuers in delegate order', () => {
    const aggregator = new TrustAggregator([new FakeDelegate(true, [ca]), new FakeDelegate(true, [otherCa, ca])]);

    expect(aggregator.acceptedIssuers()).toEqual([ca, otherCa, ca]);
  });

  it('puts the platform roots before custom stores', () => {
    const aggregator = TrustAggregator.fromTrustStores([TrustStore.fromCertificates([ca])]);
    const systemCount = TrustStore.system().certificates.length;

    const issuers = aggregator.acceptedIssuers();

    expect(aggregator.size).toBe(2);
    expect(issuers).toHaveLength(systemCount + 1);
    expect(issuers[systemCount]).toBe(ca);
    expect(aggregator.checkServerTrusted([server], 'RSA').isOk()).toBe(true);
  });

  it('uses only the platform roots without custom stores', () => {
    const aggregator = TrustAggregator.fromTrustStores();

    expect(aggregator.size).toBe(1);
    expect(aggregator.checkServerTrusted([server], 'RSA')._unsafeUnwrapErr().message).toBe(
      NO_TRUSTED_DELEGATE_MESSAGE
    );
  });
});
