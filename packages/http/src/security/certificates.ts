import { X509Certificate } from 'node:crypto';
import type { Readable } from 'node:stream';

import { err, ok, type Result } from 'neverthrow';

import { readBytesAndClose } from '../stream.js';
import { TrustAnchorError } from '../types.js';

export type CertificateSource = string | Buffer;

/**
 * Parse one X.509 certificate from PEM text or DER bytes. Only the first
 * certificate of a PEM bundle is read.
 */
export function parseCertificate(source: CertificateSource): X509Certificate {
  try {
    return new X509Certificate(source);
  } catch (error) {
    throw new TrustAnchorError('Failed to parse trust anchor as an X.509 certificate', { cause: error });
  }
}

export async function readCertificate(stream: Readable): Promise<X509Certificate> {
  const bytes = await readBytesAndClose(stream);
  return parseCertificate(bytes);
}

/** Whether `now` lies inside the certificate's validity window. Unreadable dates fail the check. */
export function isWithinValidity(certificate: Pick<X509Certificate, 'validFrom' | 'validTo'>, now: Date): boolean {
  const notBefore = Date.parse(certificate.validFrom);
  const notAfter = Date.parse(certificate.validTo);
  if (Number.isNaN(notBefore) || Number.isNaN(notAfter)) return false;

  const time = now.getTime();
  return time >= notBefore && time <= notAfter;
}

/** `issuer` issued `certificate` and its key verifies the signature */
export function isIssuedBy(certificate: X509Certificate, issuer: X509Certificate): boolean {
  return certificate.checkIssued(issuer) && certificate.verify(issuer.publicKey);
}

// id-ce-basicConstraints (2.5.29.19)
const BASIC_CONSTRAINTS_OID = Buffer.from([0x55, 0x1d, 0x13]);
const INTEGER_TAG = 0x02;
const EXTENSIONS_TAG = 0xa3;

interface DerNode {
  tag: number;
  start: number;
  end: number;
}

function readNode(der: Buffer, offset: number, limit: number): DerNode | undefined {
  const tag = der[offset];
  const first = der[offset + 1];
  if (tag === undefined || first === undefined) return undefined;

  let start = offset + 2;
  let length = first;
  if (first & 0x80) {
    const octets = first & 0x7f;
    if (octets === 0 || octets > 4 || start + octets > limit) return undefined;
    length = der.readUIntBE(start, octets);
    start += octets;
  }

  const end = start + length;
  return end <= limit ? { tag, start, end } : undefined;
}

function readChildren(der: Buffer, parent: DerNode): DerNode[] | undefined {
  const nodes: DerNode[] = [];
  let offset = parent.start;
  while (offset < parent.end) {
    const node = readNode(der, offset, parent.end);
    if (!node) return undefined;
    nodes.push(node);
    offset = node.end;
  }
  return nodes;
}

/**
 * pathLenConstraint of the basic constraints extension: how many intermediate
 * CAs may follow this certificate in a path. `undefined` when unconstrained.
 */
export function readPathLengthConstraint(certificate: X509Certificate): Result<number | undefined, Error> {
  const der = certificate.raw;
  const malformed = err(new Error(`Malformed extensions in certificate ${certificate.subject}`));

  const root = readNode(der, 0, der.length);
  const tbs = root && readChildren(der, root)?.[0];
  const fields = tbs && readChildren(der, tbs);
  if (!fields) return malformed;

  const wrapper = fields.find((node) => node.tag === EXTENSIONS_TAG);
  if (!wrapper) return ok(undefined);

  const list = readChildren(der, wrapper)?.[0];
  const extensions = list && readChildren(der, list);
  if (!extensions) return malformed;

  for (const extension of extensions) {
    const parts = readChildren(der, extension);
    const oid = parts?.[0];
    const value = parts?.at(-1);
    if (!oid || !value) return malformed;
    if (!der.subarray(oid.start, oid.end).equals(BASIC_CONSTRAINTS_OID)) continue;

    const sequence = readNode(der, value.start, value.end);
    const members = sequence && readChildren(der, sequence);
    if (!members) return malformed;

    const pathLength = members.find((node) => node.tag === INTEGER_TAG);
    if (!pathLength) return ok(undefined);

    const width = pathLength.end - pathLength.start;
    if (width < 1 || width > 6) return malformed;
    return ok(der.readUIntBE(pathLength.start, width));
  }

  return ok(undefined);
}
