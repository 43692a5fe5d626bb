import {randomUUID} from 'node:crypto'
import {createServer, type IncomingMessage, type ServerResponse} from 'node:http'

import type {Server as McpServer} from '@modelcontextprotocol/sdk/server/index.js'
import {SSEServerTransport} from '@modelcontextprotocol/sdk/server/sse.js'
import {StdioServerTransport} from '@modelcontextprotocol/sdk/server/stdio.js'
import {StreamableHTTPServerTransport} from '@modelcontextprotocol/sdk/server/streamableHttp.js'
import {isInitializeRequest} from '@modelcontextprotocol/sdk/types.js'
import {runWithLogContext, type StructuredLogger} from '@signed-api-tools/logging'

import type {TransportMode} from './config'
import {readJsonBody, RequestBodyError, sendJson, sendRpcError} from './http'
import {createHttpRuntime} from './runtime'

export const MCP_PATH = '/mcp'
export const HEALTH_PATH = '/health'
export const SSE_PATH = '/sse'
export const SSE_MESSAGES_PATH = '/messages'

const SESSION_HEADER = 'mcp-session-id'

export type RunningTransport = {
  mode: TransportMode
  close: () => Promise<void>
}

export type TransportDependencies = {
  createMcpServer: () => McpServer
  toolCount: () => number
  logger: StructuredLogger
}

type Session<TTransport> = {
  transport: TTransport
  server: McpServer
}

type RouteHandler = (request: IncomingMessage, response: ServerResponse, url: URL) => Promise<boolean>

const closeQuietly = ({server, logger}: {server: McpServer; logger: StructuredLogger}) => {
  server.close().catch((error: unknown) => {
    logger.warn({
      event: 'server.session.close_failed',
      component: 'transport',
      metadata: {error: error instanceof Error ? error.message : String(error)}
    })
  })
}

const createRequestListener = ({
  routes,
  toolCount,
  logger
}: {
  routes: RouteHandler[]
  toolCount: () => number
  logger: StructuredLogger
}) => {
  const handle = async (request: IncomingMessage, response: ServerResponse) => {
    const url = new URL(request.url ?? '/', 'http://localhost')

    try {
      if (request.method === 'GET' && url.pathname === HEALTH_PATH) {
        sendJson({response, status: 200, payload: {status: 'ok', tools: toolCount()}})
        return
      }

      for (const route of routes) {
        if (await route(request, response, url)) {
          return
        }
      }

      sendJson({response, status: 404, payload: {error: 'not_found', message: `No route for ${url.pathname}`}})
    } catch (error) {
      if (error instanceof RequestBodyError) {
        sendRpcError({response, status: error.status, code: error.rpcCode, message: error.message})
        return
      }

      logger.error({
        event: 'server.request.failed',
        component: 'transport',
        route: url.pathname,
        method: request.method,
        metadata: {error: error instanceof Error ? error.message : String(error)}
      })
      if (!response.headersSent) {
        sendRpcError({response, status: 500, code: -32603, message: 'Internal server error'})
      }
    }
  }

  return (request: IncomingMessage, response: ServerResponse) => {
    const context = {request_id: randomUUID(), ...(request.method ? {method: request.method} : {})}
    void runWithLogContext(context, () => handle(request, response))
  }
}

/** Streamable HTTP at `/mcp`; one MCP server instance per session. */
export const createStreamableHttpRoutes = ({createMcpServer, logger}: TransportDependencies) => {
  const sessions = new Map<string, Session<StreamableHTTPServerTransport>>()

  const route: RouteHandler = async (request, response, url) => {
    if (url.pathname !== MCP_PATH) {
      return false
    }

    const sessionHeader = request.headers[SESSION_HEADER]
    const sessionId = Array.isArray(sessionHeader) ? sessionHeader[0] : sessionHeader
    const body = request.method === 'POST' ? await readJsonBody({request}) : undefined

    const existing = sessionId ? sessions.get(sessionId) : undefined
    if (existing) {
      await existing.transport.handleRequest(request, response, body)
      return true
    }

    if (!sessionId && request.method === 'POST' && isInitializeRequest(body)) {
      const server = createMcpServer()
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: id => {
          sessions.set(id, {transport, server})
          logger.info({event: 'server.session.opened', component: 'transport', metadata: {session_id: id}})
        }
      })
      transport.onclose = () => {
        if (transport.sessionId) {
          sessions.delete(transport.sessionId)
        }
      }

      await server.connect(transport)
      await transport.handleRequest(request, response, body)
      return true
    }

    sendRpcError({response, status: 400, code: -32000, message: 'Bad Request: No valid session ID provided'})
    return true
  }

  const closeAll = () => {
    for (const session of sessions.values()) {
      closeQuietly({server: session.server, logger})
    }
    sessions.clear()
  }

  return {route, closeAll, sessionCount: () => sessions.size}
}

/** Legacy server-sent events: `GET /sse` opens a stream, `POST /messages?sessionId=` feeds it. */
export const createSseRoutes = ({createMcpServer, logger}: TransportDependencies) => {
  const sessions = new Map<string, Session<SSEServerTransport>>()

  const route: RouteHandler = async (request, response, url) => {
    if (request.method === 'GET' && url.pathname === SSE_PATH) {
      const transport = new SSEServerTransport(SSE_MESSAGES_PATH, response)
      const server = createMcpServer()
      sessions.set(transport.sessionId, {transport, server})
      response.on('close', () => {
        sessions.delete(transport.sessionId)
        closeQuietly({server, logger})
      })

      await server.connect(transport)
      return true
    }

    if (request.method === 'POST' && url.pathname === SSE_MESSAGES_PATH) {
      const sessionId = url.searchParams.get('sessionId') ?? ''
      const session = sessions.get(sessionId)
      if (!session) {
        sendJson({response, status: 404, payload: {error: 'session_not_found', message: `Unknown session ${sessionId}`}})
        return true
      }

      const body = await readJsonBody({request})
      await session.transport.handlePostMessage(request, response, body)
      return true
    }

    return false
  }

  const closeAll = () => {
    for (const session of sessions.values()) {
      closeQuietly({server: session.server, logger})
    }
    sessions.clear()
  }

  return {route, closeAll, sessionCount: () => sessions.size}
}

const startHttpTransport = async ({
  mode,
  host,
  port,
  dependencies
}: {
  mode: 'http' | 'sse'
  host: string
  port: number
  dependencies: TransportDependencies
}): Promise<RunningTransport> => {
  const routes = mode === 'http' ? createStreamableHttpRoutes(dependencies) : createSseRoutes(dependencies)
  const runtime = createHttpRuntime({
    server: createServer(
      createRequestListener({routes: [routes.route], toolCount: dependencies.toolCount, logger: dependencies.logger})
    ),
    host,
    port
  })

  await runtime.start()
  dependencies.logger.info({
    event: 'server.transport.started',
    component: 'transport',
    metadata: {
      mode,
      url: `http://${host}:${port}${mode === 'http' ? MCP_PATH : SSE_PATH}`,
      health: `http://${host}:${port}${HEALTH_PATH}`
    }
  })

  return {
    mode,
    close: async () => {
      routes.closeAll()
      await runtime.stop()
    }
  }
}

const startStdioTransport = async (dependencies: TransportDependencies): Promise<RunningTransport> => {
  const server = dependencies.createMcpServer()
  await server.connect(new StdioServerTransport())
  dependencies.logger.info({event: 'server.transport.started', component: 'transport', metadata: {mode: 'stdio'}})

  return {
    mode: 'stdio',
    close: async () => {
      await server.close()
    }
  }
}

export const startTransport = async ({
  mode,
  host,
  port,
  dependencies
}: {
  mode: TransportMode
  host: string
  port: number
  dependencies: TransportDependencies
}): Promise<RunningTransport> => {
  if (mode === 'stdio') {
    return startStdioTransport(dependencies)
  }

  if (mode === 'sse') {
    dependencies.logger.warn({
      event: 'server.transport.deprecated',
      component: 'transport',
      message: 'The SSE transport is deprecated; use TRANSPORT_MODE=http'
    })
  }

  return startHttpTransport({mode, host, port, dependencies})
}
