import {createNoopLogger, type StructuredLogger} from '@signed-api-tools/logging'

import type {GroupableOperation} from './contracts'
import {PolicyEngineError} from './errors'
import type {FeatureFlagRegistry} from './flags'

export const toGroupName = (tag: string) => tag.toLowerCase().replace(/ /gu, '-')

export type GroupExtractionSummary = Record<string, number>

/**
 * One-time pass that registers every tagged operation under its tag's group
 * and seals the registry. Untagged operations stay ungated; a blank tag is
 * a group of its own, which no flag can name, so its members are disabled.
 */
export const extractFeatureGroups = ({
  registry,
  operations,
  logger = createNoopLogger()
}: {
  registry: FeatureFlagRegistry
  operations: Iterable<GroupableOperation>
  logger?: StructuredLogger
}): GroupExtractionSummary => {
  if (registry.isSealed) {
    throw new PolicyEngineError('registry_sealed', 'Feature groups have already been extracted')
  }

  for (const operation of operations) {
    for (const tag of operation.tags) {
      const groupName = toGroupName(tag)
      registry.registerMember(groupName, operation.path, operation.method)
      logger.debug({
        event: 'policy.group.registered',
        component: 'policy-engine',
        route: operation.path,
        method: operation.method.toUpperCase(),
        metadata: {group: groupName}
      })
    }
  }

  registry.seal()

  const summary: GroupExtractionSummary = {}
  for (const groupName of registry.groupNames()) {
    summary[groupName] = registry.membersOf(groupName).length
  }

  return summary
}
