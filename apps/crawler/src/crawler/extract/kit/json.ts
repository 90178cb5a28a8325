export type SafeJsonParseResult<T = unknown> =
  | { ok: true; value: T }
  | { ok: false; error: string }

export function safeJsonParse(input: string): SafeJsonParseResult {
  try {
    const value: unknown = JSON.parse(input)
    return { ok: true, value }
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : 'Invalid JSON',
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function asString(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  return undefined
}

/**
 * Flatten JSON-LD payloads: arrays and @graph containers become a flat list
 * of nodes.
 */
export function flattenJsonLd(value: unknown): Record<string, unknown>[] {
  const queue: unknown[] = [value]
  const nodes: Record<string, unknown>[] = []

  while (queue.length > 0) {
    const current = queue.shift()
    if (Array.isArray(current)) {
      queue.push(...current)
      continue
    }
    if (!isRecord(current)) continue

    const graph = current['@graph']
    if (graph !== undefined) {
      queue.push(graph)
    }
    nodes.push(current)
  }

  return nodes
}

export function hasJsonLdType(node: Record<string, unknown>, type: string): boolean {
  const declared = node['@type']
  if (Array.isArray(declared)) {
    return declared.some(entry => entry === type)
  }
  return declared === type
}
