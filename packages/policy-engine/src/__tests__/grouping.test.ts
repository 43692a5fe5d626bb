import {createStructuredLogger} from '@signed-api-tools/logging'
import {describe, expect, it} from 'vitest'

import {extractFeatureGroups, FeatureFlagRegistry, PolicyEngineError, toGroupName} from '../index'

describe('toGroupName', () => {
  it('lower-cases and dashes spaces', () => {
    expect(toGroupName('Device Reporting')).toBe('device-reporting')
    expect(toGroupName('Software  Reporting')).toBe('software--reporting')
    expect(toGroupName('devices')).toBe('devices')
  })
})

describe('extractFeatureGroups', () => {
  it('registers every tag of every operation and seals the registry', () => {
    const registry = new FeatureFlagRegistry()

    const summary = extractFeatureGroups({
      registry,
      operations: [
        {path: '/reporting/devices', method: 'get', tags: ['Device Reporting']},
        {path: '/reporting/devices/{id}', method: 'GET', tags: ['Device Reporting', 'Inventory']},
        {path: '/health', method: 'GET', tags: []}
      ]
    })

    expect(summary).toEqual({'device-reporting': 2, inventory: 1})
    expect(registry.isSealed).toBe(true)
    expect(registry.membersOf('inventory')).toEqual([{method: 'GET', path: '/reporting/devices/{id}'}])
    expect(registry.isEnabled('/health', 'GET')).toBe(true)
  })

  it('registers blank tags as their own disabled groups', () => {
    const registry = new FeatureFlagRegistry({'device-reporting': true})

    const summary = extractFeatureGroups({
      registry,
      operations: [
        {path: '/reporting/devices', method: 'GET', tags: ['Device Reporting']},
        {path: '/misc', method: 'GET', tags: ['']},
        {path: '/other', method: 'GET', tags: ['\t']}
      ]
    })

    expect(summary).toEqual({'': 1, '\t': 1, 'device-reporting': 1})
    expect(registry.isSealed).toBe(true)
    expect(registry.isEnabled('/reporting/devices', 'GET')).toBe(true)
    expect(registry.isEnabled('/misc', 'GET')).toBe(false)
    expect(registry.isEnabled('/other', 'GET')).toBe(false)
  })

  it('runs only once', () => {
    const registry = new FeatureFlagRegistry()
    extractFeatureGroups({registry, operations: []})

    expect(() => extractFeatureGroups({registry, operations: []})).toThrow(PolicyEngineError)
  })

  it('logs one debug event per registration', () => {
    const lines: string[] = []
    const stream = {
      write: (chunk: string | Uint8Array) => {
        lines.push(String(chunk))
        return true
      }
    }

    extractFeatureGroups({
      registry: new FeatureFlagRegistry(),
      operations: [{path: '/reporting/devices', method: 'get', tags: ['Device Reporting', 'Inventory']}],
      logger: createStructuredLogger({
        service: 'policy-test',
        env: 'test',
        level: 'debug',
        writer: {stdout: stream, stderr: stream}
      })
    })

    expect(lines.map(line => JSON.parse(line))).toMatchObject([
      {event: 'policy.group.registered', method: 'GET', route: '/reporting/devices', metadata: {group: 'device-reporting'}},
      {event: 'policy.group.registered', method: 'GET', route: '/reporting/devices', metadata: {group: 'inventory'}}
    ])
  })
})
