import type { Node, NodeKind } from '@hotgraph/graph'
import type { GraphIndex } from './graph-index'
import { isDeepStrictEqual } from 'node:util'
import { NotFoundError } from '@hotgraph/utils/errors'

/**
 * Declarative zone membership rule
 */
export type ZoneRule
  = | { members: string[] }
    | { match: ZoneMatch }
    | { predicate: (node: Node) => boolean }

export interface ZoneMatch {
  kind?: NodeKind
  category?: string
  /** Every listed attribute must deep-equal the node's value */
  attrs?: Record<string, unknown>
}

export type ZoneRules = Record<string, ZoneRule>

/**
 * Zone name → member ids, recomputed from the rules on every index build.
 * Members are always node ids of the index, in graph insertion order.
 */
export class ZoneIndex {
  private constructor(
    readonly revision: number,
    private readonly zones: ReadonlyMap<string, readonly string[]>,
  ) {}

  static build(rules: ZoneRules, index: GraphIndex): ZoneIndex {
    const zones = new Map<string, readonly string[]>()
    const nodes = index.nodes()
    for (const [name, rule] of Object.entries(rules)) {
      const test = compileRule(rule)
      zones.set(name, Object.freeze(nodes.filter(test).map(node => node.id)))
    }
    return new ZoneIndex(index.revision, zones)
  }

  members(name: string): readonly string[] {
    const members = this.zones.get(name)
    if (!members) {
      throw new NotFoundError('zone', name)
    }
    return members
  }

  has(name: string): boolean {
    return this.zones.has(name)
  }

  names(): string[] {
    return [...this.zones.keys()]
  }
}

function compileRule(rule: ZoneRule): (node: Node) => boolean {
  if ('members' in rule) {
    const ids = new Set(rule.members)
    return node => ids.has(node.id)
  }
  if ('match' in rule) {
    return node => matches(rule.match, node)
  }
  return rule.predicate
}

function matches(match: ZoneMatch, node: Node): boolean {
  if (match.kind !== undefined && node.kind !== match.kind)
    return false
  if (match.category !== undefined && node.category !== match.category)
    return false
  for (const [key, value] of Object.entries(match.attrs ?? {})) {
    if (!isDeepStrictEqual(node.attrs[key], value))
      return false
  }
  return true
}
