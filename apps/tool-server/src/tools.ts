import type {SigningHttpClient} from '@signed-api-tools/forwarder'
import {createNoopLogger, type StructuredLogger} from '@signed-api-tools/logging'
import type {RoutePolicyEngine} from '@signed-api-tools/policy-engine'
import type {ApiOperation} from '@signed-api-tools/schemas'
import type {QueryParamValue, QueryParams} from '@signed-api-tools/signer'

import {ToolInvocationError} from './errors'
import {isRecord, resolveRefObject, SchemaRefCollector, type JsonObject} from './refs'

export const MAX_TOOL_NAME_LENGTH = 64

const BOUND_PARAMETER_LOCATIONS = new Set(['path', 'query', 'header'])
const JSON_MEDIA_TYPE = /^application\/(?:[\w.+-]+\+)?json\b/iu

export type ToolInputSchema = {
  type: 'object'
  properties: Record<string, JsonObject>
  required?: string[]
  $defs?: Record<string, JsonObject>
}

export type BoundParameter = {
  name: string
  location: 'path' | 'query' | 'header'
  required: boolean
}

export type BoundTool = {
  name: string
  description?: string
  inputSchema: ToolInputSchema
  operation: ApiOperation
  parameters: BoundParameter[]
  bodyArgument?: {name: string; required: boolean}
}

export type ToolCatalog = {
  tools: BoundTool[]
  skipped: number
  find: (name: string) => BoundTool | undefined
}

export type ToolCallResult = {
  content: Array<{type: 'text'; text: string}>
  isError: boolean
  status: number
}

const sanitizeToolName = (value: string) =>
  value
    .replace(/[^A-Za-z0-9_-]+/gu, '_')
    .replace(/^_+|_+$/gu, '')
    .slice(0, MAX_TOOL_NAME_LENGTH)

export const buildToolName = (operation: Pick<ApiOperation, 'operationId' | 'method' | 'path'>) => {
  const fromOperationId = operation.operationId ? sanitizeToolName(operation.operationId) : ''
  if (fromOperationId.length > 0) {
    return fromOperationId
  }

  return sanitizeToolName(`${operation.method.toLowerCase()} ${operation.path}`) || 'operation'
}

const claimUniqueName = (base: string, taken: Set<string>) => {
  let candidate = base
  for (let suffix = 2; taken.has(candidate); suffix += 1) {
    const tail = `_${suffix}`
    candidate = `${base.slice(0, MAX_TOOL_NAME_LENGTH - tail.length)}${tail}`
  }

  taken.add(candidate)
  return candidate
}

const isBoundLocation = (value: unknown): value is BoundParameter['location'] =>
  typeof value === 'string' && BOUND_PARAMETER_LOCATIONS.has(value)

const findJsonBodySchema = (requestBody: JsonObject): unknown => {
  const content = requestBody.content
  if (!isRecord(content)) {
    return undefined
  }

  for (const [mediaType, media] of Object.entries(content)) {
    if (JSON_MEDIA_TYPE.test(mediaType) && isRecord(media)) {
      return media.schema ?? {}
    }
  }

  return undefined
}

const withDescription = (schema: JsonObject, description: unknown): JsonObject =>
  typeof description === 'string' && description.length > 0 && schema.description === undefined
    ? {...schema, description}
    : schema

/**
 * Builds the JSON Schema a tool accepts: one property per path, query or
 * header parameter plus a `body` property for JSON request bodies.
 */
export const buildInputSchema = ({document, operation}: {document: JsonObject; operation: ApiOperation}) => {
  const collector = new SchemaRefCollector(document)
  const properties: Record<string, JsonObject> = {}
  const required: string[] = []
  const parameters: BoundParameter[] = []

  for (const parameter of operation.parameters) {
    const name = parameter.name
    const location = parameter.in
    if (typeof name !== 'string' || !isBoundLocation(location) || name in properties) {
      continue
    }

    const isRequired = location === 'path' || parameter.required === true
    properties[name] = withDescription(collector.rewrite(parameter.schema ?? {type: 'string'}), parameter.description)
    parameters.push({name, location, required: isRequired})
    if (isRequired) {
      required.push(name)
    }
  }

  let bodyArgument: BoundTool['bodyArgument']
  const requestBody = operation.requestBody ? resolveRefObject(document, operation.requestBody) : undefined
  const bodySchema = requestBody ? findJsonBodySchema(requestBody) : undefined
  if (requestBody && bodySchema !== undefined) {
    const name = 'body' in properties ? 'requestBody' : 'body'
    const isRequired = requestBody.required === true
    properties[name] = withDescription(collector.rewrite(bodySchema), requestBody.description)
    bodyArgument = {name, required: isRequired}
    if (isRequired) {
      required.push(name)
    }
  }

  const definitions = collector.definitions()
  const inputSchema: ToolInputSchema = {
    type: 'object',
    properties,
    ...(required.length > 0 ? {required} : {}),
    ...(definitions ? {$defs: definitions} : {})
  }

  return {inputSchema, parameters, bodyArgument}
}

const describeOperation = (operation: ApiOperation) => {
  const parts = [operation.summary, operation.description].filter(
    (part): part is string => typeof part === 'string' && part.trim().length > 0
  )
  return parts.length > 0 ? parts.join('\n\n') : undefined
}

/**
 * Offers every operation to the route policy and binds the admitted ones as
 * tools. Anything the policy does not classify as a tool is skipped.
 */
export const bindTools = ({
  document,
  operations,
  engine,
  logger = createNoopLogger()
}: {
  document: JsonObject
  operations: ApiOperation[]
  engine: RoutePolicyEngine
  logger?: StructuredLogger
}): ToolCatalog => {
  const tools: BoundTool[] = []
  const taken = new Set<string>()
  let skipped = 0

  for (const operation of operations) {
    const decision = engine.evaluate({path: operation.path, method: operation.method, defaultClassification: 'tool'})
    if (decision.classification !== 'tool') {
      skipped += 1
      logger.debug({
        event: 'tools.operation.skipped',
        component: 'tools',
        route: operation.path,
        method: operation.method,
        reason_code: decision.reason
      })
      continue
    }

    const {inputSchema, parameters, bodyArgument} = buildInputSchema({document, operation})
    const name = claimUniqueName(buildToolName(operation), taken)
    const description = describeOperation(operation)
    tools.push({
      name,
      ...(description ? {description} : {}),
      inputSchema,
      operation,
      parameters,
      ...(bodyArgument ? {bodyArgument} : {})
    })
    logger.debug({
      event: 'tools.operation.bound',
      component: 'tools',
      tool_name: name,
      route: operation.path,
      method: operation.method,
      reason_code: decision.reason
    })
  }

  const byName = new Map(tools.map(tool => [tool.name, tool]))
  return {tools, skipped, find: name => byName.get(name)}
}

const isScalar = (value: unknown): value is Exclude<QueryParamValue, undefined> =>
  value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'

const toQueryValue = (value: unknown): QueryParamValue | QueryParamValue[] => {
  if (Array.isArray(value)) {
    const items: unknown[] = value
    return items.map(item => (isScalar(item) ? item : JSON.stringify(item)))
  }

  return isScalar(value) ? value : JSON.stringify(value)
}

const toHeaderValue = (value: unknown) => (typeof value === 'string' ? value : JSON.stringify(value))

const toPathSegment = (value: unknown) =>
  encodeURIComponent(typeof value === 'string' ? value : JSON.stringify(value))

const PATH_TEMPLATE = /\{([^}]+)\}/gu

/** Calls the bound operation through the signing client and renders the response as tool output. */
export const invokeTool = async ({
  tool,
  args,
  client,
  signal
}: {
  tool: BoundTool
  args: unknown
  client: SigningHttpClient
  signal?: AbortSignal
}): Promise<ToolCallResult> => {
  if (args !== undefined && !isRecord(args)) {
    throw new ToolInvocationError('tool_arguments_invalid', `Arguments for ${tool.name} must be an object`)
  }

  const values = args ?? {}
  const missing = [
    ...tool.parameters.filter(parameter => parameter.required).map(parameter => parameter.name),
    ...(tool.bodyArgument?.required ? [tool.bodyArgument.name] : [])
  ].filter(name => values[name] === undefined || values[name] === null)
  if (missing.length > 0) {
    throw new ToolInvocationError('tool_arguments_invalid', `Missing required arguments for ${tool.name}: ${missing.join(', ')}`)
  }

  const query: QueryParams = {}
  const headers: Record<string, string> = {}
  const pathValues = new Map<string, unknown>()
  for (const parameter of tool.parameters) {
    const value = values[parameter.name]
    if (value === undefined) {
      continue
    }

    if (parameter.location === 'path') {
      pathValues.set(parameter.name, value)
    } else if (parameter.location === 'query') {
      query[parameter.name] = toQueryValue(value)
    } else {
      headers[parameter.name] = toHeaderValue(value)
    }
  }

  const path = tool.operation.path.replace(PATH_TEMPLATE, (placeholder: string, name: string) => {
    const value = pathValues.get(name)
    if (value === undefined) {
      throw new ToolInvocationError('tool_arguments_invalid', `Missing path argument ${name} for ${tool.name}`)
    }

    return toPathSegment(value)
  })

  const response = await client.request(tool.operation.method, path, {
    query,
    headers,
    ...(tool.bodyArgument && values[tool.bodyArgument.name] !== undefined ? {json: values[tool.bodyArgument.name]} : {}),
    ...(signal ? {signal} : {})
  })
  const text = await response.text()

  return {
    content: [{type: 'text', text: response.ok ? text : `HTTP ${response.status}: ${text}`}],
    isError: !response.ok,
    status: response.status
  }
}
