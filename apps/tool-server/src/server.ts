import {randomUUID} from 'node:crypto'

import {Server} from '@modelcontextprotocol/sdk/server/index.js'
import {CallToolRequestSchema, ErrorCode, ListToolsRequestSchema, McpError} from '@modelcontextprotocol/sdk/types.js'
import {buildValidationUrl, createSigningHttpClient, type FetchLike} from '@signed-api-tools/forwarder'
import {runWithLogContext, type StructuredLogger} from '@signed-api-tools/logging'
import {createRoutePolicyEngine, extractFeatureGroups, FeatureFlagRegistry} from '@signed-api-tools/policy-engine'

import type {ServiceConfig} from './config'
import {AppError, ToolInvocationError} from './errors'
import {fetchInterfaceDescription, listOperations, stripHtmlFromDescriptions} from './openapi'
import {bindTools, invokeTool, type ToolCatalog, type ToolInputSchema} from './tools'
import {startTransport, type RunningTransport} from './transports'

export const SERVER_NAME = 'signed-api-tools'
export const SERVER_VERSION = '0.1.0'

export type ToolDescriptor = {
  name: string
  description?: string
  inputSchema: ToolInputSchema
}

export type ToolCallOutcome = {
  content: Array<{type: 'text'; text: string}>
  isError: boolean
}

const isHttpStatus = (status: number) => Number.isInteger(status) && status >= 100 && status <= 599

export const createToolServer = ({
  config,
  logger,
  fetchImpl,
  now
}: {
  config: ServiceConfig
  logger: StructuredLogger
  fetchImpl?: FetchLike
  now?: () => number
}) => {
  const client = createSigningHttpClient({
    credential: {keyId: config.apiKey, secret: config.apiSecret},
    validationUrl: buildValidationUrl(config.apiHost),
    timeoutMs: config.httpTimeoutMs,
    fetchImpl,
    logger,
    now
  })

  let catalogLoad: Promise<ToolCatalog> | undefined
  let catalog: ToolCatalog | undefined
  let running: RunningTransport | undefined

  const loadCatalog = async (): Promise<ToolCatalog> => {
    const description = await fetchInterfaceDescription({
      url: config.openApiSpecUrl,
      fetchImpl,
      timeoutMs: config.httpTimeoutMs,
      logger
    })
    const document = stripHtmlFromDescriptions(description)
    const operations = listOperations(document)

    const registry = new FeatureFlagRegistry(config.featureFlags)
    const groups = extractFeatureGroups({registry, operations, logger})
    const engine = createRoutePolicyEngine({
      registry,
      blocklistEnabled: config.advancedApiBlocklistEnabled,
      logger
    })
    const bound = bindTools({document, operations, engine, logger})

    logger.info({
      event: 'server.initialized',
      component: 'server',
      metadata: {
        operations: operations.length,
        tools: bound.tools.length,
        skipped: bound.skipped,
        groups,
        enabled_groups: registry.enabledGroups(),
        disabled_groups: registry.disabledGroups(),
        advanced_blocklist: config.advancedApiBlocklistEnabled
      }
    })

    return bound
  }

  /** Fetch, strip, group, seal and bind. Runs once; later calls share the first result. */
  const initialize = async (): Promise<ToolCatalog> => {
    if (!catalogLoad) {
      catalogLoad = loadCatalog()
    }

    catalog = await catalogLoad
    return catalog
  }

  const requireCatalog = (): ToolCatalog => {
    if (!catalog) {
      throw new AppError({code: 'server_not_initialized', message: 'Tools are not available before initialization'})
    }

    return catalog
  }

  const listTools = (): ToolDescriptor[] =>
    requireCatalog().tools.map(tool => ({
      name: tool.name,
      ...(tool.description ? {description: tool.description} : {}),
      inputSchema: tool.inputSchema
    }))

  const callTool = async ({
    name,
    args,
    signal,
    requestId
  }: {
    name: string
    args?: unknown
    signal?: AbortSignal
    requestId?: string
  }): Promise<ToolCallOutcome> => {
    const tool = requireCatalog().find(name)
    if (!tool) {
      throw new ToolInvocationError('tool_not_found', `Unknown tool: ${name}`)
    }

    return runWithLogContext(
      {
        correlation_id: randomUUID(),
        ...(requestId ? {request_id: requestId} : {}),
        tool_name: tool.name,
        route: tool.operation.path,
        method: tool.operation.method
      },
      async () => {
        const startedAt = Date.now()
        try {
          const result = await invokeTool({tool, args, client, signal})
          logger.info({
            event: 'tools.call.completed',
            component: 'tools',
            duration_ms: Date.now() - startedAt,
            ...(isHttpStatus(result.status) ? {status_code: result.status} : {})
          })

          return {content: result.content, isError: result.isError}
        } catch (error) {
          if (error instanceof ToolInvocationError) {
            throw error
          }

          const reason = error instanceof Error ? error.message : String(error)
          logger.error({
            event: 'tools.call.failed',
            component: 'tools',
            reason_code: 'upstream_request_failed',
            duration_ms: Date.now() - startedAt,
            metadata: {error: reason}
          })

          return {content: [{type: 'text', text: `Request failed: ${reason}`}], isError: true}
        }
      }
    )
  }

  const createMcpServer = () => {
    const server = new Server({name: SERVER_NAME, version: SERVER_VERSION}, {capabilities: {tools: {}}})

    server.setRequestHandler(ListToolsRequestSchema, async () => ({tools: listTools()}))
    server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      try {
        return await callTool({
          name: request.params.name,
          args: request.params.arguments,
          signal: extra.signal,
          requestId: String(extra.requestId)
        })
      } catch (error) {
        if (error instanceof ToolInvocationError) {
          throw new McpError(ErrorCode.InvalidParams, error.message)
        }

        throw error
      }
    })

    return server
  }

  const start = async (): Promise<RunningTransport> => {
    await initialize()
    if (!running) {
      running = await startTransport({
        mode: config.transportMode,
        host: config.host,
        port: config.port,
        dependencies: {
          createMcpServer,
          toolCount: () => requireCatalog().tools.length,
          logger
        }
      })
    }

    return running
  }

  const stop = async () => {
    const current = running
    running = undefined
    if (current) {
      await current.close()
      logger.info({event: 'server.stopped', component: 'server', metadata: {mode: current.mode}})
    }
  }

  return {
    client,
    initialize,
    start,
    stop,
    listTools,
    callTool,
    createMcpServer
  }
}

export type ToolServer = ReturnType<typeof createToolServer>
