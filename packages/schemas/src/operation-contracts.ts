import {z} from 'zod'

export const HttpMethodSchema = z
  .string()
  .trim()
  .min(1)
  .regex(/^[A-Za-z]+$/u, 'HTTP method must be a token of letters')
  .transform(value => value.toUpperCase())

export const ApiOperationSchema = z
  .object({
    path: z.string().min(1).startsWith('/'),
    method: HttpMethodSchema,
    tags: z.array(z.string()).default([]),
    operationId: z.string().min(1).optional(),
    summary: z.string().optional(),
    description: z.string().optional(),
    parameters: z.array(z.record(z.string(), z.unknown())).default([]),
    requestBody: z.record(z.string(), z.unknown()).optional()
  })
  .strict()

export type ApiOperation = z.infer<typeof ApiOperationSchema>
export type ApiOperationInput = z.input<typeof ApiOperationSchema>
