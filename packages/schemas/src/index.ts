export {LogEventSchema, type LogEvent} from './log-contracts'
export {
  ApiOperationSchema,
  HttpMethodSchema,
  type ApiOperation,
  type ApiOperationInput
} from './operation-contracts'
