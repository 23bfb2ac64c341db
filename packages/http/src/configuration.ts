import { z } from 'zod';

export const DEFAULT_READ_TIMEOUT_MS = 3000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 3000;
export const DEFAULT_MAX_REDIRECTS = 10;

const nonNegativeInteger = (label: string) =>
  z
    .number({ invalid_type_error: `${label} must be a number` })
    .int({ message: `${label} must be an integer` })
    .nonnegative({ message: `${label} must be non-negative` });

export const httpClientConfigurationSchema = z.object({
  /** Headers and body inactivity timeout; 0 disables it */
  readTimeoutMs: nonNegativeInteger('Read timeout').default(DEFAULT_READ_TIMEOUT_MS),
  /** TCP and TLS establishment timeout; 0 disables it */
  connectTimeoutMs: nonNegativeInteger('Connect timeout').default(DEFAULT_CONNECT_TIMEOUT_MS),
  /** One X.509 certificate, PEM text or DER bytes, trusted alongside the platform roots */
  customTrustAnchor: z
    .union([
      z.string().min(1, { message: 'Custom trust anchor must not be empty' }),
      z.custom<Buffer>((value) => Buffer.isBuffer(value), { message: 'Custom trust anchor must be a string or Buffer' }),
    ])
    .optional(),
  followRedirects: z.boolean().default(true),
  maxRedirects: nonNegativeInteger('Max redirects').default(DEFAULT_MAX_REDIRECTS),
});

export type HttpClientConfiguration = Readonly<z.output<typeof httpClientConfigurationSchema>>;

export type HttpClientConfigurationOptions = z.input<typeof httpClientConfigurationSchema>;

/**
 * Validate options and freeze the result. Throws a ZodError naming the
 * offending fields.
 */
export function createHttpClientConfiguration(options: HttpClientConfigurationOptions = {}): HttpClientConfiguration {
  return Object.freeze(httpClientConfigurationSchema.parse(options));
}
