export type JsonObject = Record<string, unknown>

export const isRecord = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const decodePointerSegment = (segment: string) => segment.replace(/~1/gu, '/').replace(/~0/gu, '~')

/** Follows a document-local JSON pointer such as `#/components/parameters/Page`. */
export const resolvePointer = (document: JsonObject, ref: string): JsonObject | undefined => {
  if (!ref.startsWith('#/')) {
    return undefined
  }

  let current: unknown = document
  for (const segment of ref.slice(2).split('/')) {
    if (!isRecord(current)) {
      return undefined
    }

    current = current[decodePointerSegment(segment)]
  }

  return isRecord(current) ? current : undefined
}

const MAX_REF_HOPS = 16

/** Resolves an object that is itself a `$ref`, following chains of references. */
export const resolveRefObject = (document: JsonObject, value: unknown): JsonObject | undefined => {
  let current = value
  for (let hop = 0; hop < MAX_REF_HOPS; hop += 1) {
    if (!isRecord(current)) {
      return undefined
    }

    const ref = current.$ref
    if (typeof ref !== 'string') {
      return current
    }

    current = resolvePointer(document, ref)
  }

  return undefined
}

const COMPONENT_SCHEMA_REF = /^#\/components\/schemas\/([^/]+)$/u

const rewriteSchemaRefs = (value: unknown, referenced: Set<string>): unknown => {
  if (Array.isArray(value)) {
    return value.map(item => rewriteSchemaRefs(item, referenced))
  }

  if (!isRecord(value)) {
    return value
  }

  const rewritten: JsonObject = {}
  for (const [key, entry] of Object.entries(value)) {
    const match = key === '$ref' && typeof entry === 'string' ? COMPONENT_SCHEMA_REF.exec(entry) : null
    const segment = match?.[1]
    if (segment !== undefined) {
      referenced.add(decodePointerSegment(segment))
      rewritten[key] = `#/$defs/${segment}`
      continue
    }

    rewritten[key] = rewriteSchemaRefs(entry, referenced)
  }

  return rewritten
}

/**
 * Collects schemas into one self-contained JSON Schema fragment set:
 * component refs become `#/$defs/<Name>` and every referenced component is
 * attached, transitively.
 */
export class SchemaRefCollector {
  private readonly referenced = new Set<string>()

  public constructor(private readonly document: JsonObject) {}

  public rewrite(schema: unknown): JsonObject {
    const rewritten = rewriteSchemaRefs(schema, this.referenced)
    return isRecord(rewritten) ? rewritten : {}
  }

  public definitions(): Record<string, JsonObject> | undefined {
    const definitions: Record<string, JsonObject> = {}
    let pending = [...this.referenced]

    while (pending.length > 0) {
      for (const name of pending) {
        const component = resolvePointer(this.document, `#/components/schemas/${name.replace(/~/gu, '~0').replace(/\//gu, '~1')}`)
        definitions[name] = component ? this.rewrite(component) : {}
      }

      pending = [...this.referenced].filter(name => !(name in definitions))
    }

    return Object.keys(definitions).length > 0 ? definitions : undefined
  }
}
