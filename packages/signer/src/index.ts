export {
  API_VERSION_PREFIX,
  ENVELOPE_CONTENT_TYPE,
  SIGNING_ALGORITHM,
  SignRequestInputSchema,
  SigningCredentialSchema,
  SigningSecretSchema,
  type JsonValue,
  type SignRequestInput,
  type SignedEnvelope,
  type SignedEnvelopeHeader,
  type SigningCredential
} from './contracts';
export {
  err,
  ok,
  signerErrorCodeSchema,
  type SignerError,
  type SignerErrorCode,
  type SignerFailure,
  type SignerResult,
  type SignerSuccess
} from './errors';
export {
  applyApiVersionPrefix,
  encodeQueryParams,
  mergeQueryString,
  resolveRequestTarget,
  type QueryParamValue,
  type QueryParams,
  type RequestTarget
} from './request-target';
export {buildEnvelopePayload, createRequestSigner, signRequest, type RequestSigner, type SignerOptions} from './sign';
export {toWireJson} from './wire-json';
