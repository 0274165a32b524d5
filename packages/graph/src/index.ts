// Adapters: component-graph types ↔ generic store attrs
export {
  attrsToEdge,
  attrsToNode,
  edgeToAttrs,
  edgeToStored,
  graphToSerialized,
  nodeToAttrs,
  serializedToGraph,
} from './adapters'

// Edge types and utilities
export {
  createEdge,
  DEFAULT_EDGE_WEIGHT,
  EdgeKind,
  EdgeSchema,
  edgeWeight,
  isDirectedEdge,
  sameEdge,
} from './edge'

export type { Edge } from './edge'

// Graph document
export { formatIssues, GraphSchema, parseGraph } from './graph'

export type { Graph } from './graph'

// Node types and utilities
export {
  BaseNodeSchema,
  createHardwareNode,
  createSoftwareNode,
  HardwareCategory,
  HardwareNodeSchema,
  isHardwareNode,
  isSoftwareNode,
  NodeKind,
  NodeSchema,
  oppositeKind,
  SoftwareCategory,
  SoftwareNodeSchema,
} from './node'

export type { BaseNode, HardwareNode, Node, NodeInput, SoftwareNode } from './node'
