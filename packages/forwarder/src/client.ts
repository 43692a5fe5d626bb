import {createNoopLogger} from '@signed-api-tools/logging';
import {createRequestSigner, resolveRequestTarget} from '@signed-api-tools/signer';

import {
  AbsoluteHttpUrlSchema,
  DEFAULT_TIMEOUT_MS,
  TimeoutMsSchema,
  type SignedRequestOptions,
  type SigningHttpClient,
  type SigningHttpClientOptions
} from './contracts';
import {SignedRequestError, SigningClientConfigurationError} from './errors';
import {buildTransportHeaders} from './headers';

const TRANSPORT_METHOD = 'POST';

const combineSignals = ({signal, timeoutMs}: {signal?: AbortSignal; timeoutMs: number}) => {
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;
};

/**
 * Creates the signing transport. Every logical request is wrapped into a JWS
 * envelope and POSTed as `text/plain` to the validation endpoint; the upstream
 * `Response` is handed back untouched and fetch failures propagate unchanged.
 */
export const createSigningHttpClient = ({
  credential,
  validationUrl,
  timeoutMs = DEFAULT_TIMEOUT_MS,
  fetchImpl,
  logger = createNoopLogger(),
  now
}: SigningHttpClientOptions): SigningHttpClient => {
  const signer = createRequestSigner({credential, now, logger});
  if (!signer.ok) {
    throw new SigningClientConfigurationError('invalid_credential', signer.error.message);
  }

  const parsedUrl = AbsoluteHttpUrlSchema.safeParse(validationUrl);
  if (!parsedUrl.success) {
    throw new SigningClientConfigurationError('invalid_validation_url', `Invalid validation URL: ${validationUrl}`);
  }

  const parsedTimeout = TimeoutMsSchema.safeParse(timeoutMs);
  if (!parsedTimeout.success) {
    throw new SigningClientConfigurationError('invalid_timeout', `Timeout must be a positive integer, got ${timeoutMs}`);
  }

  const defaultUrl = parsedUrl.data;
  const defaultTimeoutMs = parsedTimeout.data;
  const requestSigner = signer.value;

  const request = async (method: string, path: string, options: SignedRequestOptions = {}): Promise<Response> => {
    const target = resolveRequestTarget({path, params: options.query});
    const envelope = await requestSigner.sign({
      method,
      path: target.path,
      queryString: target.queryString,
      body: options.json
    });
    if (!envelope.ok) {
      throw new SignedRequestError(
        envelope.error.code === 'invalid_input' ? 'invalid_request' : 'signing_failed',
        envelope.error.message
      );
    }

    const headers = buildTransportHeaders({headers: options.headers, cookies: options.cookies});
    if (!headers.ok) {
      throw new SignedRequestError(headers.error.code, headers.error.message);
    }

    const callTimeout = TimeoutMsSchema.safeParse(options.timeoutMs ?? defaultTimeoutMs);
    if (!callTimeout.success) {
      throw new SignedRequestError('invalid_timeout', `Timeout must be a positive integer, got ${options.timeoutMs}`);
    }

    const destination = options.endpoint ?? defaultUrl;
    logger.debug({
      event: 'forwarder.request.dispatched',
      component: 'forwarder',
      method: envelope.value.header.method,
      route: envelope.value.header.uri,
      metadata: {endpoint: destination, query_string: envelope.value.header['query-string']}
    });

    const requestFetch = fetchImpl ?? globalThis.fetch;
    return requestFetch(destination, {
      method: TRANSPORT_METHOD,
      headers: headers.value,
      body: envelope.value.jws,
      redirect: options.followRedirects ? 'follow' : 'manual',
      signal: combineSignals({signal: options.signal, timeoutMs: callTimeout.data})
    });
  };

  return {
    validationUrl: defaultUrl,
    request,
    get: (path, options) => request('GET', path, options),
    post: (path, options) => request('POST', path, options),
    put: (path, options) => request('PUT', path, options),
    patch: (path, options) => request('PATCH', path, options),
    delete: (path, options) => request('DELETE', path, options)
  };
};
