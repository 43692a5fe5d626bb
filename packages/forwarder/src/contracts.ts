import type {StructuredLogger} from '@signed-api-tools/logging';
import type {QueryParams} from '@signed-api-tools/signer';
import {z} from 'zod';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const VALIDATION_PATH = '/jws/validate';

export type FetchLike = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>;

const isAbsoluteHttpUrl = (value: string) => {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
};

export const AbsoluteHttpUrlSchema = z
  .string()
  .trim()
  .refine(isAbsoluteHttpUrl, 'must be an absolute http(s) URL');

export const TimeoutMsSchema = z.number().int().positive();

export type SigningHttpClientOptions = {
  credential: {keyId: string; secret: string | Uint8Array};
  validationUrl: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: StructuredLogger;
  now?: () => number;
};

export type SignedRequestOptions = {
  /** Structured query params merged after any query already on the path. */
  query?: QueryParams;
  /** JSON body wrapped into the signed payload; never sent as-is. */
  json?: unknown;
  headers?: Record<string, string>;
  /** Overrides the validation URL for this call only. */
  endpoint?: string;
  cookies?: Record<string, string>;
  followRedirects?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type VerbOptions = Omit<SignedRequestOptions, 'json'>;
export type VerbWithBodyOptions = SignedRequestOptions;

export type SigningHttpClient = {
  readonly validationUrl: string;
  request: (method: string, path: string, options?: SignedRequestOptions) => Promise<Response>;
  get: (path: string, options?: VerbOptions) => Promise<Response>;
  post: (path: string, options?: VerbWithBodyOptions) => Promise<Response>;
  put: (path: string, options?: VerbWithBodyOptions) => Promise<Response>;
  patch: (path: string, options?: VerbWithBodyOptions) => Promise<Response>;
  delete: (path: string, options?: VerbOptions) => Promise<Response>;
};

export const buildValidationUrl = (apiHost: string) => `${apiHost.trim().replace(/\/+$/u, '')}${VALIDATION_PATH}`;
