import type { X509Certificate } from 'node:crypto';
import { readFileSync } from 'node:fs';

import { parseCertificate } from '../../security/certificates.js';

export const readFixture = (name: string): string =>
  readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf8');

export const loadCertificate = (name: string): X509Certificate => parseCertificate(readFixture(name));
