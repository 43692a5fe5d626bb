import type {FetchLike} from '@signed-api-tools/forwarder'
import {createNoopLogger, type StructuredLogger} from '@signed-api-tools/logging'
import {ApiOperationSchema, type ApiOperation} from '@signed-api-tools/schemas'
import {convert, type HtmlToTextOptions} from 'html-to-text'
import {z} from 'zod'

import {UpstreamFetchError} from './errors'
import {isRecord, resolveRefObject, type JsonObject} from './refs'

export const OpenApiDocumentSchema = z.looseObject({
  paths: z.record(z.string(), z.record(z.string(), z.unknown())),
  components: z.record(z.string(), z.unknown()).optional()
})

export type OpenApiDocument = z.infer<typeof OpenApiDocumentSchema>

const PATH_ITEM_NON_OPERATION_KEYS = new Set(['parameters', 'summary', 'description', 'servers', '$ref'])

const HTML_TO_TEXT_OPTIONS: HtmlToTextOptions = {
  wordwrap: false,
  selectors: [
    {selector: 'a', options: {ignoreHref: true}},
    {selector: 'img', format: 'skip'}
  ]
}

export const fetchInterfaceDescription = async ({
  url,
  fetchImpl,
  timeoutMs,
  logger = createNoopLogger()
}: {
  url: string
  fetchImpl?: FetchLike
  timeoutMs: number
  logger?: StructuredLogger
}): Promise<OpenApiDocument> => {
  const requestFetch = fetchImpl ?? globalThis.fetch
  const startedAt = Date.now()

  let response: Response
  try {
    response = await requestFetch(url, {
      method: 'GET',
      headers: {accept: 'application/json'},
      signal: AbortSignal.timeout(timeoutMs)
    })
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'unknown error'
    throw new UpstreamFetchError({message: `Unable to fetch interface description from ${url}: ${reason}`})
  }

  if (!response.ok) {
    throw new UpstreamFetchError({
      message: `Interface description request to ${url} returned status ${response.status}`,
      status: response.status
    })
  }

  let body: unknown
  try {
    body = await response.json()
  } catch {
    throw new UpstreamFetchError({message: `Interface description at ${url} is not valid JSON`, status: response.status})
  }

  const parsed = OpenApiDocumentSchema.safeParse(body)
  if (!parsed.success) {
    throw new UpstreamFetchError({
      message: `Interface description at ${url} does not contain a paths object`,
      status: response.status
    })
  }

  logger.info({
    event: 'openapi.description.fetched',
    component: 'openapi',
    status_code: response.status,
    duration_ms: Date.now() - startedAt,
    metadata: {url, path_count: Object.keys(parsed.data.paths).length}
  })

  return parsed.data
}

export const htmlToPlainText = (html: string) => convert(html, HTML_TO_TEXT_OPTIONS).trim()

const stripDescriptions = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(stripDescriptions)
  }

  if (!isRecord(value)) {
    return value
  }

  const stripped: JsonObject = {}
  for (const [key, entry] of Object.entries(value)) {
    stripped[key] = key === 'description' && typeof entry === 'string' ? htmlToPlainText(entry) : stripDescriptions(entry)
  }

  return stripped
}

/** Returns a copy of the document with every string `description` reduced to plain text. */
export const stripHtmlFromDescriptions = (document: OpenApiDocument): OpenApiDocument =>
  OpenApiDocumentSchema.parse(stripDescriptions(document))

const parameterKey = (parameter: JsonObject) => `${String(parameter.in)}:${String(parameter.name)}`

const resolveParameters = (document: OpenApiDocument, parameters: unknown): JsonObject[] => {
  if (!Array.isArray(parameters)) {
    return []
  }

  const resolved: JsonObject[] = []
  for (const parameter of parameters) {
    const target = resolveRefObject(document, parameter)
    if (target && typeof target.name === 'string' && typeof target.in === 'string') {
      resolved.push(target)
    }
  }

  return resolved
}

const mergeParameters = (pathLevel: JsonObject[], operationLevel: JsonObject[]) => {
  const merged = new Map<string, JsonObject>()
  for (const parameter of [...pathLevel, ...operationLevel]) {
    merged.set(parameterKey(parameter), parameter)
  }

  return [...merged.values()]
}

const optionalString = (value: unknown) => (typeof value === 'string' && value.length > 0 ? value : undefined)

/**
 * Flattens `paths` into one operation per HTTP method. Parameters declared on
 * the path item apply to each operation unless the operation redeclares the
 * same `in` and `name`. Entries that are not valid operations are skipped.
 */
export const listOperations = (document: OpenApiDocument): ApiOperation[] => {
  const operations: ApiOperation[] = []

  for (const [path, pathItem] of Object.entries(document.paths)) {
    const pathParameters = resolveParameters(document, pathItem.parameters)

    for (const [method, rawOperation] of Object.entries(pathItem)) {
      if (PATH_ITEM_NON_OPERATION_KEYS.has(method) || method.startsWith('x-') || !isRecord(rawOperation)) {
        continue
      }

      const tags = Array.isArray(rawOperation.tags)
        ? rawOperation.tags.filter((tag): tag is string => typeof tag === 'string')
        : []
      const requestBody = resolveRefObject(document, rawOperation.requestBody)

      const operation = ApiOperationSchema.safeParse({
        path,
        method,
        tags,
        operationId: optionalString(rawOperation.operationId),
        summary: optionalString(rawOperation.summary),
        description: optionalString(rawOperation.description),
        parameters: mergeParameters(pathParameters, resolveParameters(document, rawOperation.parameters)),
        ...(requestBody ? {requestBody} : {})
      })
      if (operation.success) {
        operations.push(operation.data)
      }
    }
  }

  return operations
}
