import {z} from 'zod'

export const TOOL_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const
export type ToolMethod = (typeof TOOL_METHODS)[number]

export const RouteClassificationSchema = z.enum(['excluded', 'tool'])
export type RouteClassification = z.infer<typeof RouteClassificationSchema>

export const DecisionReasonSchema = z.enum(['blocklisted', 'flag_disabled', 'method_tool', 'default_passthrough'])
export type DecisionReason = z.infer<typeof DecisionReasonSchema>

export const FeatureFlagsSchema = z.record(z.string().trim().min(1), z.boolean())
export type FeatureFlags = z.infer<typeof FeatureFlagsSchema>

export const RegisterMemberInputSchema = z
  .object({
    groupName: z.string(),
    path: z.string().min(1),
    method: z
      .string()
      .trim()
      .min(1)
      .transform(value => value.toUpperCase())
  })
  .strict()

export type GroupMember = {
  path: string
  method: string
}

export type GroupableOperation = {
  path: string
  method: string
  tags: string[]
}

export type RouteDecision<TDefault> = {
  classification: RouteClassification | TDefault
  reason: DecisionReason
}

export type DecideInput<TDefault> = {
  path: string
  method: string
  defaultClassification: TDefault
}
