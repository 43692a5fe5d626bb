export const signingClientErrorCodes = [
  'invalid_credential',
  'invalid_validation_url',
  'invalid_timeout',
  'invalid_header_name',
  'invalid_header_value',
  'invalid_request',
  'signing_failed'
] as const;

export type SigningClientErrorCode = (typeof signingClientErrorCodes)[number];

/** Raised once, at construction, when the client cannot be configured. */
export class SigningClientConfigurationError extends Error {
  public readonly code: SigningClientErrorCode;

  public constructor(code: SigningClientErrorCode, message: string) {
    super(message);
    this.name = 'SigningClientConfigurationError';
    this.code = code;
  }
}

/** Raised per call when the request itself cannot be turned into a signed envelope. */
export class SignedRequestError extends Error {
  public readonly code: SigningClientErrorCode;

  public constructor(code: SigningClientErrorCode, message: string) {
    super(message);
    this.name = 'SignedRequestError';
    this.code = code;
  }
}

export type SigningClientError = {
  code: SigningClientErrorCode;
  message: string;
};

export type SigningClientSuccess<T> = {ok: true; value: T};
export type SigningClientFailure = {ok: false; error: SigningClientError};
export type SigningClientResult<T> = SigningClientSuccess<T> | SigningClientFailure;

export const ok = <T>(value: T): SigningClientSuccess<T> => ({ok: true, value});

export const err = (code: SigningClientErrorCode, message: string): SigningClientFailure => ({
  ok: false,
  error: {code, message}
});
