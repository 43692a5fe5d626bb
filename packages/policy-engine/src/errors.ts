import {z} from 'zod'

export const PolicyEngineErrorCodeSchema = z.enum(['registry_sealed', 'registry_not_sealed', 'invalid_member'])
export type PolicyEngineErrorCode = z.infer<typeof PolicyEngineErrorCodeSchema>

export class PolicyEngineError extends Error {
  public readonly code: PolicyEngineErrorCode

  public constructor(code: PolicyEngineErrorCode, message: string) {
    super(message)
    this.name = 'PolicyEngineError'
    this.code = code
  }
}
