import type { X509Certificate } from 'node:crypto';
import { rootCertificates } from 'node:tls';

import { isIssuedBy, parseCertificate } from './certificates.js';

let systemStore: TrustStore | undefined;

/**
 * Anchor certificates a chain may terminate in.
 */
export class TrustStore {
  private readonly fingerprints: ReadonlySet<string>;

  private constructor(readonly certificates: readonly X509Certificate[]) {
    this.fingerprints = new Set(certificates.map((certificate) => certificate.fingerprint256));
  }

  static fromCertificates(certificates: readonly X509Certificate[]): TrustStore {
    return new TrustStore([...certificates]);
  }

  /** Node's bundled root certificates, parsed on first use */
  static system(): TrustStore {
    systemStore ??= new TrustStore(rootCertificates.map((pem) => parseCertificate(pem)));
    return systemStore;
  }

  isAnchor(certificate: X509Certificate): boolean {
    return this.fingerprints.has(certificate.fingerprint256);
  }

  findIssuer(certificate: X509Certificate): X509Certificate | undefined {
    return this.certificates.find((anchor) => isIssuedBy(certificate, anchor));
  }
}
