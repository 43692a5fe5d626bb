import {z} from 'zod';

export const SIGNING_ALGORITHM = 'HS256';
export const ENVELOPE_CONTENT_TYPE = 'application/json';
export const API_VERSION_PREFIX = '/v3';

export type JsonValue = string | number | boolean | null | JsonValue[] | {[key: string]: JsonValue};

export const SigningSecretSchema = z.union([
  z.string().min(1, 'signing secret must not be empty'),
  z.instanceof(Uint8Array).refine(value => value.byteLength > 0, 'signing secret must not be empty')
]);

export const SigningCredentialSchema = z
  .object({
    keyId: z.string().trim().min(1, 'signing key id must not be empty'),
    secret: SigningSecretSchema
  })
  .strict();

export type SigningCredential = z.infer<typeof SigningCredentialSchema>;

export const SignRequestInputSchema = z
  .object({
    method: z
      .string()
      .trim()
      .min(1)
      .regex(/^[A-Za-z]+$/u, 'method must be an HTTP token')
      .transform(value => value.toUpperCase()),
    path: z.string().min(1),
    queryString: z.string().default(''),
    body: z.unknown().optional(),
    issuedAtMillis: z.number().int().nonnegative().optional()
  })
  .strict();

export type SignRequestInput = z.input<typeof SignRequestInputSchema>;

export type SignedEnvelopeHeader = {
  alg: typeof SIGNING_ALGORITHM;
  kid: string;
  method: string;
  'content-type': typeof ENVELOPE_CONTENT_TYPE;
  uri: string;
  'query-string': string;
  issuedAt: number;
};

export type SignedEnvelope = {
  /** Compact JWS serialization sent as the transport body. */
  jws: string;
  header: SignedEnvelopeHeader;
  /** Exact payload bytes (as text) covered by the signature. */
  payload: string;
};
