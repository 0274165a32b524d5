import { z } from 'zod/v4'

/**
 * Node kinds in the component graph
 */
export const NodeKind = {
  Hardware: 'hardware',
  Software: 'software',
} as const

export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind]

/**
 * Finer classification of hardware components
 */
export const HardwareCategory = {
  IC: 'ic',
  Resistor: 'resistor',
  Capacitor: 'capacitor',
  Connector: 'connector',
  Module: 'module',
  Bus: 'bus',
} as const

export type HardwareCategory = (typeof HardwareCategory)[keyof typeof HardwareCategory]

/**
 * Finer classification of software components
 */
export const SoftwareCategory = {
  Class: 'class',
  Function: 'function',
  Thread: 'thread',
  Module: 'module',
  Driver: 'driver',
  Buffer: 'buffer',
} as const

export type SoftwareCategory = (typeof SoftwareCategory)[keyof typeof SoftwareCategory]

/**
 * Base node schema with common properties
 */
export const BaseNodeSchema = z.object({
  /** Unique node identifier */
  id: z.string().min(1),
  /** Node kind (hardware or software) */
  kind: z.enum(['hardware', 'software']),
  /** Opaque attributes (part numbers, rails, file paths, ...) */
  attrs: z.record(z.string(), z.unknown()).default({}),
})

export type BaseNode = z.infer<typeof BaseNodeSchema>

/**
 * Hardware block: IC, passive, connector, sheet or bus
 */
export const HardwareNodeSchema = BaseNodeSchema.extend({
  kind: z.literal('hardware'),
  category: z.enum(['ic', 'resistor', 'capacitor', 'connector', 'module', 'bus']).optional(),
})

export type HardwareNode = z.infer<typeof HardwareNodeSchema>

/**
 * Software module: class, function, thread, driver or buffer
 */
export const SoftwareNodeSchema = BaseNodeSchema.extend({
  kind: z.literal('software'),
  category: z.enum(['class', 'function', 'thread', 'module', 'driver', 'buffer']).optional(),
})

export type SoftwareNode = z.infer<typeof SoftwareNodeSchema>

/**
 * Union type for all node kinds
 */
export const NodeSchema = z.discriminatedUnion('kind', [HardwareNodeSchema, SoftwareNodeSchema])

export type Node = z.infer<typeof NodeSchema>

/** Node as accepted by the schema (attrs may be omitted) */
export type NodeInput = z.input<typeof NodeSchema>

/**
 * Create a hardware node
 */
export function createHardwareNode(params: {
  id: string
  category?: HardwareCategory
  attrs?: Record<string, unknown>
}): HardwareNode {
  return HardwareNodeSchema.parse({
    ...params,
    kind: NodeKind.Hardware,
  })
}

/**
 * Create a software node
 */
export function createSoftwareNode(params: {
  id: string
  category?: SoftwareCategory
  attrs?: Record<string, unknown>
}): SoftwareNode {
  return SoftwareNodeSchema.parse({
    ...params,
    kind: NodeKind.Software,
  })
}

export function isHardwareNode(node: Node): node is HardwareNode {
  return node.kind === NodeKind.Hardware
}

export function isSoftwareNode(node: Node): node is SoftwareNode {
  return node.kind === NodeKind.Software
}

/** The kind on the other side of the hardware/software boundary */
export function oppositeKind(kind: NodeKind): NodeKind {
  return kind === NodeKind.Hardware ? NodeKind.Software : NodeKind.Hardware
}
