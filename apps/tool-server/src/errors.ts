export type AppErrorCode =
  | 'configuration_invalid'
  | 'upstream_fetch_failed'
  | 'tool_not_found'
  | 'tool_arguments_invalid'
  | 'server_not_initialized'

export class AppError extends Error {
  public readonly code: AppErrorCode

  public constructor({code, message}: {code: AppErrorCode; message: string}) {
    super(message)
    this.name = 'AppError'
    this.code = code
  }
}

export class ConfigurationError extends AppError {
  public constructor(message: string) {
    super({code: 'configuration_invalid', message})
    this.name = 'ConfigurationError'
  }
}

/** The interface description could not be fetched or is not an OpenAPI document. */
export class UpstreamFetchError extends AppError {
  public readonly status?: number

  public constructor({message, status}: {message: string; status?: number}) {
    super({code: 'upstream_fetch_failed', message})
    this.name = 'UpstreamFetchError'
    this.status = status
  }
}

export class ToolInvocationError extends AppError {
  public constructor(code: 'tool_not_found' | 'tool_arguments_invalid', message: string) {
    super({code, message})
    this.name = 'ToolInvocationError'
  }
}
