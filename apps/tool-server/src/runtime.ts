import type {Server} from 'node:http'

export type HttpRuntime = {
  server: Server
  start: () => Promise<void>
  stop: () => Promise<void>
}

export const createHttpRuntime = ({server, host, port}: {server: Server; host: string; port: number}): HttpRuntime => {
  const start = async () =>
    new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(port, host, () => {
        server.off('error', reject)
        resolve()
      })
    })

  // Event streams never end on their own.
  const stop = async () =>
    new Promise<void>(resolve => {
      server.close(() => resolve())
      server.closeAllConnections()
    })

  return {
    server,
    start,
    stop
  }
}
