import {createNoopLogger, type StructuredLogger} from '@signed-api-tools/logging'

import {isAdvancedOperationPath} from './blocklist'
import {TOOL_METHODS, type DecideInput, type RouteClassification, type RouteDecision} from './contracts'
import {PolicyEngineError} from './errors'
import type {FeatureFlagRegistry} from './flags'

const TOOL_METHOD_SET: ReadonlySet<string> = new Set(TOOL_METHODS)

export type RoutePolicyEngine = {
  evaluate: <TDefault>(input: DecideInput<TDefault>) => RouteDecision<TDefault>
  decide: <TDefault>(input: DecideInput<TDefault>) => RouteClassification | TDefault
}

export const createRoutePolicyEngine = ({
  registry,
  blocklistEnabled = true,
  logger = createNoopLogger()
}: {
  registry: FeatureFlagRegistry
  blocklistEnabled?: boolean
  logger?: StructuredLogger
}): RoutePolicyEngine => {
  const classify = <TDefault>({path, method, defaultClassification}: DecideInput<TDefault>): RouteDecision<TDefault> => {
    // Blocklisted paths never reach the flag lookup.
    if (blocklistEnabled && isAdvancedOperationPath(path)) {
      return {classification: 'excluded', reason: 'blocklisted'}
    }

    if (!registry.isEnabled(path, method)) {
      return {classification: 'excluded', reason: 'flag_disabled'}
    }

    if (TOOL_METHOD_SET.has(method.toUpperCase())) {
      return {classification: 'tool', reason: 'method_tool'}
    }

    return {classification: defaultClassification, reason: 'default_passthrough'}
  }

  const evaluate = <TDefault>(input: DecideInput<TDefault>): RouteDecision<TDefault> => {
    if (!registry.isSealed) {
      throw new PolicyEngineError('registry_not_sealed', 'Feature groups must be extracted before routes are decided')
    }

    const decision = classify(input)
    logger.debug({
      event: 'policy.route.decided',
      component: 'policy-engine',
      route: input.path,
      method: input.method.toUpperCase(),
      reason_code: decision.reason,
      metadata: {classification: String(decision.classification)}
    })

    return decision
  }

  return {
    evaluate,
    decide: <TDefault>(input: DecideInput<TDefault>) => evaluate(input).classification
  }
}
