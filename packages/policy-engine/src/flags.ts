import {FeatureFlagsSchema, RegisterMemberInputSchema, type FeatureFlags, type GroupMember} from './contracts'
import {PolicyEngineError} from './errors'

const memberKey = (path: string, method: string) => `${method.toUpperCase()} ${path}`

const parseMemberKey = (key: string): GroupMember => {
  const separator = key.indexOf(' ')
  return {method: key.slice(0, separator), path: key.slice(separator + 1)}
}

/**
 * Maps capability groups to their member operations and answers whether an
 * operation is enabled. Groups are scanned in lexicographic order, so an
 * operation registered under several groups always resolves to the same one.
 */
export class FeatureFlagRegistry {
  private readonly flags: ReadonlyMap<string, boolean>
  private readonly groups = new Map<string, Set<string>>()
  private sealed = false

  public constructor(flags: FeatureFlags = {}) {
    this.flags = new Map(Object.entries(FeatureFlagsSchema.parse(flags)))
  }

  public get isSealed(): boolean {
    return this.sealed
  }

  public registerMember(groupName: string, path: string, method: string): void {
    if (this.sealed) {
      throw new PolicyEngineError('registry_sealed', `Cannot register ${method} ${path}: the registry is sealed`)
    }

    const parsed = RegisterMemberInputSchema.safeParse({groupName, path, method})
    if (!parsed.success) {
      throw new PolicyEngineError('invalid_member', parsed.error.message)
    }

    const members = this.groups.get(parsed.data.groupName) ?? new Set<string>()
    members.add(memberKey(parsed.data.path, parsed.data.method))
    this.groups.set(parsed.data.groupName, members)
  }

  public seal(): void {
    this.sealed = true
  }

  public isEnabled(path: string, method: string): boolean {
    if (this.groups.size === 0) {
      return true
    }

    const key = memberKey(path, method)
    for (const groupName of this.groupNames()) {
      if (this.groups.get(groupName)?.has(key)) {
        return this.flags.get(groupName) ?? false
      }
    }

    return true
  }

  public enabledGroups(): string[] {
    return [...this.flags].filter(([, enabled]) => enabled).map(([name]) => name).sort()
  }

  public disabledGroups(): string[] {
    return [...this.flags].filter(([, enabled]) => !enabled).map(([name]) => name).sort()
  }

  public groupNames(): string[] {
    return [...this.groups.keys()].sort()
  }

  public membersOf(groupName: string): GroupMember[] {
    return [...(this.groups.get(groupName) ?? [])].sort().map(parseMemberKey)
  }
}
