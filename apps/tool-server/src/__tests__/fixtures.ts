import type {FetchLike} from '@signed-api-tools/forwarder'
import {decodeProtectedHeader} from 'jose'
import {vi} from 'vitest'

import type {ServiceConfig} from '../config'

export const API_HOST = 'https://api.example.test'
export const SPEC_URL = `${API_HOST}/api-doc/spec/openapi.json`
export const VALIDATION_URL = `${API_HOST}/jws/validate`

export const createServiceConfig = (overrides: Partial<ServiceConfig> = {}): ServiceConfig => ({
  nodeEnv: 'test',
  apiHost: API_HOST,
  apiKey: 'test-key',
  apiSecret: 'test-secret',
  httpTimeoutMs: 5_000,
  host: '127.0.0.1',
  port: 8000,
  logLevel: 'silent',
  transportMode: 'http',
  advancedApiBlocklistEnabled: true,
  openApiSpecUrl: SPEC_URL,
  featureFlags: {'device-reporting': true},
  ...overrides
})

export const createOpenApiDocument = () => ({
  openapi: '3.0.3',
  info: {title: 'Vendor API', version: '3.0', description: '<h1>Vendor</h1>'},
  paths: {
    '/reporting/devices': {
      get: {
        operationId: 'getDevices',
        tags: ['Device Reporting'],
        summary: 'List devices',
        description: '<p>Returns <b>all</b> devices. See <a href="https://docs.example.test">docs</a>.</p>',
        parameters: [
          {name: 'pageSize', in: 'query', description: 'Page size', schema: {type: 'integer'}},
          {$ref: '#/components/parameters/Filter'}
        ]
      }
    },
    '/reporting/devices/{deviceUid}': {
      parameters: [{name: 'deviceUid', in: 'path', required: true, schema: {type: 'string'}}],
      get: {operationId: 'getDevice', tags: ['Device Reporting'], summary: 'Get one device'},
      patch: {
        operationId: 'updateDevice',
        tags: ['Device Reporting'],
        requestBody: {
          required: true,
          content: {'application/json': {schema: {$ref: '#/components/schemas/DeviceUpdate'}}}
        }
      }
    },
    '/reporting/software': {
      get: {operationId: 'getSoftware', tags: ['Software Reporting'], summary: 'List software'}
    },
    '/reporting/devices-advanced': {
      get: {operationId: 'getDevicesAdvanced', tags: ['Device Reporting']}
    },
    '/health': {
      get: {summary: 'Health'}
    }
  },
  components: {
    parameters: {
      Filter: {name: 'filter', in: 'query', schema: {type: 'string'}}
    },
    schemas: {
      DeviceUpdate: {
        type: 'object',
        properties: {name: {type: 'string'}, location: {$ref: '#/components/schemas/Location'}}
      },
      Location: {type: 'object', properties: {city: {type: 'string'}}}
    }
  }
})

export type SignedCall = {
  method: unknown
  uri: unknown
  queryString: unknown
  payload: string
}

export const decodeSignedCall = (jws: string): SignedCall => {
  const header = decodeProtectedHeader(jws)
  return {
    method: header.method,
    uri: header.uri,
    queryString: header['query-string'],
    payload: Buffer.from(jws.split('.')[1] ?? '', 'base64url').toString('utf8')
  }
}

/**
 * In-process stand-in for the vendor API: serves the interface description and
 * answers signed calls through `respond`.
 */
export const createVendorFetch = ({
  document = createOpenApiDocument(),
  respond = () => new Response('{"ok": true}', {status: 200})
}: {
  document?: unknown
  respond?: (call: SignedCall) => Response | Promise<Response>
} = {}) =>
  vi.fn<FetchLike>(async (input, init) => {
    const url = String(input)
    if (url === SPEC_URL) {
      return new Response(JSON.stringify(document), {status: 200, headers: {'content-type': 'application/json'}})
    }

    if (url === VALIDATION_URL && typeof init?.body === 'string') {
      return respond(decodeSignedCall(init.body))
    }

    return new Response('not found', {status: 404})
  })
