import type { X509Certificate } from 'node:crypto';

import { err, ok, type Result } from 'neverthrow';

import { TrustFailure } from '../types.js';

import { isIssuedBy, isWithinValidity, readPathLengthConstraint } from './certificates.js';
import { TrustStore } from './trust-store.js';

/** Which side of the handshake presented the chain */
export type TrustRole = 'client' | 'server';

/** OpenSSL's verdict on a peer chain under Node's default CA set */
export interface HandshakeVerdict {
  authorized: boolean;
  authorizationError?: string | undefined;
}

/**
 * One source of trust decisions. Chains are ordered leaf first. `handshake`
 * is present when the chain comes from a live TLS connection.
 */
export interface TrustDelegate {
  checkTrusted(
    chain: readonly X509Certificate[],
    authType: string,
    role: TrustRole,
    handshake?: HandshakeVerdict
  ): Result<void, TrustFailure>;
  acceptedIssuers(): readonly X509Certificate[];
}

const ANY_EXTENDED_KEY_USAGE = '2.5.29.37.0';

const EXTENDED_KEY_USAGE_BY_ROLE: Record<TrustRole, string> = {
  client: '1.3.6.1.5.5.7.3.2',
  server: '1.3.6.1.5.5.7.3.1',
};

export interface X509TrustDelegateOptions {
  now?: (() => Date) | undefined;
}

/**
 * Path validation against a single trust store: walk from the leaf until a
 * certificate is an anchor or was issued by one. Every link's signature and
 * every certificate's validity window are checked, and each issuer must be a
 * CA whose path length constraint allows the intermediates below it. An
 * anchor presented as the leaf is trusted as pinned.
 */
export class X509TrustDelegate implements TrustDelegate {
  private readonly now: () => Date;

  constructor(
    private readonly store: TrustStore,
    options: X509TrustDelegateOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  checkTrusted(chain: readonly X509Certificate[], _authType: string, role: TrustRole): Result<void, TrustFailure> {
    const [leaf] = chain;
    if (!leaf) {
      return err(new TrustFailure('Empty certificate chain'));
    }

    if (!permitsRole(leaf, role)) {
      return err(new TrustFailure(`Leaf certificate is not valid for ${role} authentication`));
    }

    const now = this.now();
    for (const [index, certificate] of chain.entries()) {
      if (!isWithinValidity(certificate, now)) {
        return err(new TrustFailure(`Certificate ${index} of the chain is outside its validity period`));
      }

      if (this.store.isAnchor(certificate)) {
        return ok();
      }

      const anchor = this.store.findIssuer(certificate);
      if (anchor) {
        return checkIssuer(anchor, index);
      }

      const next = chain[index + 1];
      if (!next || !isIssuedBy(certificate, next)) {
        return err(new TrustFailure('Certificate chain does not lead to a trusted anchor'));
      }

      const link = checkIssuer(next, index);
      if (link.isErr()) {
        return link;
      }
    }

    return err(new TrustFailure('Certificate chain does not lead to a trusted anchor'));
  }

  acceptedIssuers(): readonly X509Certificate[] {
    return this.store.certificates;
  }
}

function permitsRole(leaf: X509Certificate, role: TrustRole): boolean {
  // Undefined when the certificate has no extended key usage extension
  const usages: readonly string[] | undefined = leaf.keyUsage;
  if (!usages || usages.length === 0) return true;

  return usages.includes(EXTENDED_KEY_USAGE_BY_ROLE[role]) || usages.includes(ANY_EXTENDED_KEY_USAGE);
}

// Every certificate between the leaf and `issuer` counts against its path length constraint
function checkIssuer(issuer: X509Certificate, intermediatesBelow: number): Result<void, TrustFailure> {
  if (!issuer.ca) {
    return err(new TrustFailure(`Issuer ${issuer.subject} is not a certificate authority`));
  }

  const limit = readPathLengthConstraint(issuer);
  if (limit.isErr()) {
    return err(new TrustFailure(limit.error.message));
  }
  if (limit.value !== undefined && intermediatesBelow > limit.value) {
    return err(new TrustFailure(`Path length constraint of ${issuer.subject} exceeded`));
  }

  return ok();
}

/**
 * Trust the platform has. On a live connection the verdict is the one OpenSSL
 * reached under Node's default CA set, which includes NODE_EXTRA_CA_CERTS and
 * the OpenSSL store when Node runs with --use-openssl-ca. Without a handshake
 * the chain is validated against Node's bundled roots.
 */
export class PlatformTrustDelegate implements TrustDelegate {
  private readonly bundled: X509TrustDelegate;

  constructor(options: X509TrustDelegateOptions = {}) {
    this.bundled = new X509TrustDelegate(TrustStore.system(), options);
  }

  checkTrusted(
    chain: readonly X509Certificate[],
    authType: string,
    role: TrustRole,
    handshake?: HandshakeVerdict
  ): Result<void, TrustFailure> {
    if (!handshake) {
      return this.bundled.checkTrusted(chain, authType, role);
    }
    if (handshake.authorized) {
      return ok();
    }
    return err(
      new TrustFailure(`Platform trust rejected the chain: ${handshake.authorizationError ?? 'unknown reason'}`)
    );
  }

  acceptedIssuers(): readonly X509Certificate[] {
    return this.bundled.acceptedIssuers();
  }
}
