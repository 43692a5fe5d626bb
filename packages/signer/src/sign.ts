import {createNoopLogger, type StructuredLogger} from '@signed-api-tools/logging';
import {CompactSign} from 'jose';

import {
  ENVELOPE_CONTENT_TYPE,
  SIGNING_ALGORITHM,
  SignRequestInputSchema,
  SigningCredentialSchema,
  type SignRequestInput,
  type SignedEnvelope,
  type SignedEnvelopeHeader,
  type SigningCredential
} from './contracts';
import {err, ok, type SignerResult} from './errors';
import {applyApiVersionPrefix} from './request-target';
import {toWireJson} from './wire-json';

const textEncoder = new TextEncoder();

export type SignerOptions = {
  now?: () => number;
  logger?: StructuredLogger;
};

export type RequestSigner = {
  readonly keyId: string;
  sign: (input: SignRequestInput) => Promise<SignerResult<SignedEnvelope>>;
};

const toSecretBytes = (secret: SigningCredential['secret']) =>
  typeof secret === 'string' ? textEncoder.encode(secret) : secret;

export const buildEnvelopePayload = (body: unknown): SignerResult<string> => {
  try {
    return ok(toWireJson({data: body ?? {}}));
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'unknown error';
    return err('payload_not_serializable', `Request body cannot be serialized: ${reason}`);
  }
};

const signWithCredential = async ({
  input,
  credential,
  now,
  logger
}: {
  input: SignRequestInput;
  credential: SigningCredential;
  now: () => number;
  logger: StructuredLogger;
}): Promise<SignerResult<SignedEnvelope>> => {
  const parsedInput = SignRequestInputSchema.safeParse(input);
  if (!parsedInput.success) {
    return err('invalid_input', parsedInput.error.message);
  }

  const payload = buildEnvelopePayload(parsedInput.data.body);
  if (!payload.ok) {
    return payload;
  }

  const header: SignedEnvelopeHeader = {
    alg: SIGNING_ALGORITHM,
    kid: credential.keyId,
    method: parsedInput.data.method,
    'content-type': ENVELOPE_CONTENT_TYPE,
    uri: applyApiVersionPrefix(parsedInput.data.path),
    'query-string': parsedInput.data.queryString,
    issuedAt: parsedInput.data.issuedAtMillis ?? now()
  };

  let jws: string;
  try {
    jws = await new CompactSign(textEncoder.encode(payload.value))
      .setProtectedHeader(header)
      .sign(toSecretBytes(credential.secret));
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'unknown error';
    return err('signing_failed', `Unable to sign request envelope: ${reason}`);
  }

  if (logger.isLevelEnabled('debug')) {
    logger.debug({
      event: 'signer.envelope.created',
      component: 'signer',
      method: header.method,
      route: header.uri,
      metadata: {
        kid: header.kid,
        query_string: header['query-string'],
        issued_at: header.issuedAt,
        signature: jws.split('.')[2] ?? ''
      }
    });
  }

  return ok({jws, header, payload: payload.value});
};

/**
 * Signs one logical request into a compact JWS envelope.
 *
 * The `issuedAt` header is taken from `input.issuedAtMillis` when given and
 * from the clock otherwise, so two calls at different instants never share a
 * signature.
 */
export const signRequest = async (
  input: SignRequestInput & {credential: unknown},
  {now = Date.now, logger = createNoopLogger()}: SignerOptions = {}
): Promise<SignerResult<SignedEnvelope>> => {
  const {credential: rawCredential, ...requestInput} = input;
  const credential = SigningCredentialSchema.safeParse(rawCredential);
  if (!credential.success) {
    return err('invalid_credential', credential.error.message);
  }

  return signWithCredential({input: requestInput, credential: credential.data, now, logger});
};

export const createRequestSigner = ({
  credential: rawCredential,
  now = Date.now,
  logger = createNoopLogger()
}: SignerOptions & {credential: unknown}): SignerResult<RequestSigner> => {
  const credential = SigningCredentialSchema.safeParse(rawCredential);
  if (!credential.success) {
    return err('invalid_credential', credential.error.message);
  }

  const frozenCredential: SigningCredential = Object.freeze({...credential.data});

  return ok({
    keyId: frozenCredential.keyId,
    sign: input => signWithCredential({input, credential: frozenCredential, now, logger})
  });
};
