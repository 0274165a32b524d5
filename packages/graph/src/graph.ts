import { MalformedGraphError } from '@hotgraph/utils/errors'
import { z } from 'zod/v4'
import { EdgeSchema } from './edge'
import { NodeSchema } from './node'

/**
 * Nodes and edges of one revision, in insertion order
 */
export const GraphSchema = z.object({
  nodes: z.array(NodeSchema),
  edges: z.array(EdgeSchema),
})

export type Graph = z.infer<typeof GraphSchema>

/**
 * Validate an untrusted graph document (e.g. an imported JSON file).
 * Only the shape is checked here; endpoint integrity is checked at index build.
 */
export function parseGraph(input: unknown): Graph {
  const result = GraphSchema.safeParse(input)
  if (!result.success) {
    throw new MalformedGraphError(formatIssues(result.error.issues))
  }
  return result.data
}

export function formatIssues(issues: ReadonlyArray<{ path: PropertyKey[], message: string }>): string {
  return issues
    .map(issue => `${issue.path.length > 0 ? issue.path.map(String).join('.') : '<root>'}: ${issue.message}`)
    .join('; ')
}
