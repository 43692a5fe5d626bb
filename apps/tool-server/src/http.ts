import type {ServerResponse} from 'node:http'

export const DEFAULT_MAX_BODY_BYTES = 4 * 1024 * 1024

const DEFAULT_SECURITY_HEADERS: Record<string, string> = {
  'x-content-type-options': 'nosniff',
  'cache-control': 'no-store'
}

export class RequestBodyError extends Error {
  public readonly status: 400 | 413
  public readonly rpcCode: number

  public constructor({status, rpcCode, message}: {status: 400 | 413; rpcCode: number; message: string}) {
    super(message)
    this.name = 'RequestBodyError'
    this.status = status
    this.rpcCode = rpcCode
  }
}

const readBodyBuffer = async ({request, maxBodyBytes}: {request: AsyncIterable<unknown>; maxBodyBytes: number}) => {
  const chunks: Buffer[] = []
  let size = 0

  for await (const chunk of request) {
    let bufferChunk: Buffer
    if (typeof chunk === 'string') {
      bufferChunk = Buffer.from(chunk, 'utf8')
    } else if (chunk instanceof Uint8Array) {
      bufferChunk = Buffer.from(chunk)
    } else {
      throw new RequestBodyError({status: 400, rpcCode: -32600, message: 'Request body contains an invalid chunk type'})
    }

    size += bufferChunk.length
    if (size > maxBodyBytes) {
      throw new RequestBodyError({status: 413, rpcCode: -32600, message: `Request body exceeds ${maxBodyBytes} bytes`})
    }

    chunks.push(bufferChunk)
  }

  return Buffer.concat(chunks)
}

/** Reads a JSON-RPC request body; an empty body yields `undefined`. */
export const readJsonBody = async ({
  request,
  maxBodyBytes = DEFAULT_MAX_BODY_BYTES
}: {
  request: AsyncIterable<unknown>
  maxBodyBytes?: number
}): Promise<unknown> => {
  const raw = await readBodyBuffer({request, maxBodyBytes})
  if (raw.length === 0) {
    return undefined
  }

  try {
    return JSON.parse(raw.toString('utf8'))
  } catch {
    throw new RequestBodyError({status: 400, rpcCode: -32700, message: 'Parse error: request body is not valid JSON'})
  }
}

export const sendJson = ({
  response,
  status,
  payload,
  headers
}: {
  response: ServerResponse
  status: number
  payload: unknown
  headers?: Record<string, string>
}) => {
  const body = Buffer.from(JSON.stringify(payload), 'utf8')

  response.writeHead(status, {
    ...DEFAULT_SECURITY_HEADERS,
    'content-type': 'application/json; charset=utf-8',
    'content-length': String(body.length),
    ...(headers ?? {})
  })

  response.end(body)
}

export const sendRpcError = ({
  response,
  status,
  code,
  message
}: {
  response: ServerResponse
  status: number
  code: number
  message: string
}) =>
  sendJson({
    response,
    status,
    payload: {jsonrpc: '2.0', error: {code, message}, id: null}
  })
