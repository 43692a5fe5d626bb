import {fileURLToPath} from 'node:url'

import {createStderrOnlyWriter, createStructuredLogger} from '@signed-api-tools/logging'
import {config as loadDotenv} from 'dotenv'

import {loadConfig} from './config'
import {createToolServer} from './server'

export const appName = 'tool-server'

export * from './config'
export * from './errors'
export * from './http'
export * from './openapi'
export * from './refs'
export * from './runtime'
export * from './server'
export * from './tools'
export * from './transports'

const main = async () => {
  loadDotenv({quiet: true})
  const config = loadConfig(process.env)
  const logger = createStructuredLogger({
    service: appName,
    env: config.nodeEnv,
    level: config.logLevel,
    extraSensitiveKeys: ['jws'],
    ...(config.transportMode === 'stdio' ? {writer: createStderrOnlyWriter()} : {})
  })

  const toolServer = createToolServer({config, logger})

  const shutdown = async (signal: string) => {
    logger.info({event: 'process.shutdown', component: 'process.entrypoint', metadata: {signal}})
    await toolServer.stop()
    process.exit(0)
  }

  process.on('SIGINT', () => {
    void shutdown('SIGINT')
  })
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM')
  })

  await toolServer.start()
}

const isMainModule = (() => {
  const currentFile = fileURLToPath(import.meta.url)
  const entryFile = process.argv[1]
  if (!entryFile) {
    return false
  }

  return currentFile === entryFile
})()

if (isMainModule) {
  void main().catch(error => {
    const env = process.env.NODE_ENV === 'production' ? 'production' : process.env.NODE_ENV === 'test' ? 'test' : 'development'
    const startupLogger = createStructuredLogger({
      service: appName,
      env,
      level: 'error',
      writer: createStderrOnlyWriter()
    })
    startupLogger.fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'Tool server startup failed',
      reason_code: error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : 'startup_failed',
      metadata: {
        error
      }
    })
    process.exit(1)
  })
}
