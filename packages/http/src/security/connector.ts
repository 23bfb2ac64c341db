import { X509Certificate } from 'node:crypto';
import type { Socket } from 'node:net';
import { checkServerIdentity, TLSSocket, type DetailedPeerCertificate } from 'node:tls';

import { buildConnector } from 'undici';

import type { TrustAggregator } from './trust-aggregator.js';
import type { HandshakeVerdict } from './trust-delegate.js';

export interface TrustingConnectorOptions {
  connectTimeoutMs: number;
}

/**
 * undici connector whose TLS trust decision comes from a TrustAggregator
 * instead of Node's built-in CA check. The handshake completes without
 * rejecting; OpenSSL's verdict under the default CA set and the peer chain
 * then go to the aggregator, and the host name is checked before the socket
 * is handed to undici.
 */
export function createTrustingConnector(
  aggregator: TrustAggregator,
  options: TrustingConnectorOptions
): buildConnector.connector {
  const connect = buildConnector({
    rejectUnauthorized: false,
    timeout: options.connectTimeoutMs,
  });

  return (connectOptions, callback) => {
    connect(connectOptions, (error: Error | null, socket: Socket | TLSSocket | null) => {
      if (!socket) {
        callback(error ?? new Error(`Failed to connect to ${connectOptions.hostname}`), null);
        return;
      }

      if (socket instanceof TLSSocket) {
        const hostname = connectOptions.servername || stripBrackets(connectOptions.hostname);
        const failure = verifyPeer(socket, aggregator, hostname);
        if (failure) {
          socket.destroy();
          callback(failure, null);
          return;
        }
      }

      callback(null, socket);
    });
  };
}

function verifyPeer(socket: TLSSocket, aggregator: TrustAggregator, hostname: string): Error | undefined {
  const chain = peerCertificateChain(socket);
  const [leaf] = chain;
  const authType = leaf?.publicKey.asymmetricKeyType?.toUpperCase() ?? 'UNKNOWN';

  const trust = aggregator.checkServerTrusted(chain, authType, handshakeVerdict(socket));
  if (trust.isErr()) {
    return trust.error;
  }

  return checkServerIdentity(hostname, socket.getPeerCertificate());
}

export function handshakeVerdict(socket: TLSSocket): HandshakeVerdict {
  if (socket.authorized) {
    return { authorized: true };
  }
  // Node reports the OpenSSL error code as a string here despite the declared type
  const reason: unknown = socket.authorizationError;
  return {
    authorized: false,
    authorizationError: reason instanceof Error ? reason.message : typeof reason === 'string' ? reason : undefined,
  };
}

/**
 * Leaf-first chain as presented by the peer. Node links each certificate to its
 * issuer; a self-signed root links to itself.
 */
export function peerCertificateChain(socket: TLSSocket): X509Certificate[] {
  const chain: X509Certificate[] = [];
  const seen = new Set<string>();
  let current: DetailedPeerCertificate | undefined = socket.getPeerCertificate(true);

  while (current?.raw && !seen.has(current.fingerprint256)) {
    seen.add(current.fingerprint256);
    chain.push(new X509Certificate(current.raw));
    current = current.issuerCertificate;
  }

  return chain;
}

function stripBrackets(hostname: string): string {
  return hostname.startsWith('[') && hostname.endsWith(']') ? hostname.slice(1, -1) : hostname;
}
