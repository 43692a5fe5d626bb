import {compactVerify, decodeProtectedHeader} from 'jose';
import {describe, expect, it, vi} from 'vitest';

import {
  buildValidationUrl,
  createSigningHttpClient,
  SignedRequestError,
  SigningClientConfigurationError,
  type FetchLike
} from '../index';

const VALIDATION_URL = 'https://api.example.test/jws/validate';
const credential = {keyId: 'test-key', secret: 'test-secret'};
const textDecoder = new TextDecoder();

const createClient = (fetchImpl: FetchLike, timeoutMs?: number) =>
  createSigningHttpClient({
    credential,
    validationUrl: VALIDATION_URL,
    fetchImpl,
    timeoutMs,
    now: () => 1_700_000_000_000
  });

const okFetch = () => vi.fn<FetchLike>(async () => new Response('{"data": []}', {status: 200}));

const firstCall = (fetchMock: ReturnType<typeof okFetch>) => {
  const call = fetchMock.mock.calls[0];
  if (!call) {
    throw new Error('expected fetch to be called');
  }

  const [input, init] = call;
  return {input, init, headers: new Headers(init?.headers)};
};

const bodyText = (init: RequestInit | undefined) => {
  if (typeof init?.body !== 'string') {
    throw new Error('expected a string body');
  }

  return init.body;
};

describe('createSigningHttpClient', () => {
  it('posts the signed envelope as text/plain to the validation endpoint', async () => {
    const fetchMock = okFetch();
    const client = createClient(fetchMock);

    await client.get('/reporting/devices?page=1', {query: {status: 'active'}});

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const {input, init, headers} = firstCall(fetchMock);
    expect(input).toBe(VALIDATION_URL);
    expect(init?.method).toBe('POST');
    expect(headers.get('content-type')).toBe('text/plain');

    const jws = bodyText(init);
    expect(decodeProtectedHeader(jws)).toEqual({
      alg: 'HS256',
      kid: 'test-key',
      method: 'GET',
      'content-type': 'application/json',
      uri: '/v3/reporting/devices',
      'query-string': 'page=1&status=active',
      issuedAt: 1_700_000_000_000
    });

    const verified = await compactVerify(jws, new TextEncoder().encode('test-secret'));
    expect(textDecoder.decode(verified.payload)).toBe('{"data": {}}');
  });

  it('wraps the json body into the signed payload for body verbs', async () => {
    const fetchMock = okFetch();
    const client = createClient(fetchMock);

    await client.put('/v3/devices/d-1', {json: {name: 'Laptop'}});

    const jws = bodyText(firstCall(fetchMock).init);
    const verified = await compactVerify(jws, new TextEncoder().encode('test-secret'));
    expect(verified.protectedHeader.method).toBe('PUT');
    expect(verified.protectedHeader.uri).toBe('/v3/devices/d-1');
    expect(textDecoder.decode(verified.payload)).toBe('{"data": {"name": "Laptop"}}');
  });

  it('ignores a caller content-type in any casing and keeps other headers', async () => {
    const fetchMock = okFetch();
    const client = createClient(fetchMock);

    await client.post('/items', {
      headers: {'Content-Type': 'application/json', 'X-Trace': 'abc'}
    });

    const {headers} = firstCall(fetchMock);
    expect(headers.get('content-type')).toBe('text/plain');
    expect(headers.get('x-trace')).toBe('abc');
  });

  it('sends cookies as one cookie header', async () => {
    const fetchMock = okFetch();
    const client = createClient(fetchMock);

    await client.get('/items', {cookies: {session: 'one', theme: 'dark'}});

    expect(firstCall(fetchMock).headers.get('cookie')).toBe('session=one; theme=dark');
  });

  it('targets a per-call endpoint override', async () => {
    const fetchMock = okFetch();
    const client = createClient(fetchMock);

    await client.request('GET', '/items', {endpoint: 'https://other.example.test/jws/validate'});

    expect(firstCall(fetchMock).input).toBe('https://other.example.test/jws/validate');
  });

  it('does not follow redirects unless asked', async () => {
    const fetchMock = okFetch();
    const client = createClient(fetchMock);

    await client.get('/items');
    await client.get('/items', {followRedirects: true});

    expect(fetchMock.mock.calls[0]?.[1]?.redirect).toBe('manual');
    expect(fetchMock.mock.calls[1]?.[1]?.redirect).toBe('follow');
  });

  it('returns non-2xx responses untouched', async () => {
    const upstream = new Response('denied', {status: 403});
    const client = createClient(vi.fn<FetchLike>(async () => upstream));

    const response = await client.delete('/items/1');

    expect(response).toBe(upstream);
    expect(response.status).toBe(403);
  });

  it('rethrows network errors unchanged without retrying', async () => {
    const failure = new TypeError('fetch failed');
    const fetchMock = vi.fn<FetchLike>(async () => {
      throw failure;
    });
    const client = createClient(fetchMock);

    await expect(client.get('/items')).rejects.toBe(failure);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('forwards the caller abort signal', async () => {
    const fetchMock = okFetch();
    const client = createClient(fetchMock);
    const controller = new AbortController();
    controller.abort();

    await client.get('/items', {signal: controller.signal});

    expect(firstCall(fetchMock).init?.signal?.aborted).toBe(true);
  });

  it('aborts the transport when the per-call timeout elapses', async () => {
    const fetchMock = vi.fn<FetchLike>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) {
            reject(new Error('missing signal'));
            return;
          }

          signal.addEventListener('abort', () => reject(signal.reason));
        })
    );
    const client = createClient(fetchMock);

    await expect(client.get('/slow', {timeoutMs: 5})).rejects.toMatchObject({name: 'TimeoutError'});
  });

  it('rejects invalid caller headers before calling the transport', async () => {
    const fetchMock = okFetch();
    const client = createClient(fetchMock);

    const call = client.get('/items', {headers: {'bad header': 'x'}});

    await expect(call).rejects.toBeInstanceOf(SignedRequestError);
    await expect(call).rejects.toMatchObject({code: 'invalid_header_name'});
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('fails construction for bad configuration', () => {
    const fetchImpl = okFetch();

    expect(() =>
      createSigningHttpClient({credential: {keyId: '', secret: 'test-secret'}, validationUrl: VALIDATION_URL, fetchImpl})
    ).toThrow(SigningClientConfigurationError);
    expect(() =>
      createSigningHttpClient({credential: {keyId: 'test-key', secret: ''}, validationUrl: VALIDATION_URL, fetchImpl})
    ).toThrow(SigningClientConfigurationError);
    expect(() => createSigningHttpClient({credential, validationUrl: 'ftp://api.example.test', fetchImpl})).toThrow(
      'Invalid validation URL: ftp://api.example.test'
    );
    expect(() => createSigningHttpClient({credential, validationUrl: VALIDATION_URL, timeoutMs: 0, fetchImpl})).toThrow(
      'Timeout must be a positive integer, got 0'
    );
  });
});

describe('buildValidationUrl', () => {
  it('appends the validation path to the API host', () => {
    expect(buildValidationUrl('https://api.example.test')).toBe(VALIDATION_URL);
    expect(buildValidationUrl('https://api.example.test/')).toBe(VALIDATION_URL);
  });
});
