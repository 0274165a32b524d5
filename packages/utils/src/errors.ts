/**
 * Error codes shared by every hotgraph package
 */
export const HotGraphErrorCode = {
  NOT_FOUND: 'NOT_FOUND',
  NOT_REACHABLE: 'NOT_REACHABLE',
  MALFORMED_GRAPH: 'MALFORMED_GRAPH',
  PERSISTENCE_FAILED: 'PERSISTENCE_FAILED',
  CONFLICT: 'CONFLICT',
  INVALID_INPUT: 'INVALID_INPUT',
} as const

export type HotGraphErrorCode = (typeof HotGraphErrorCode)[keyof typeof HotGraphErrorCode]

/**
 * Base class for all hotgraph errors
 */
export class HotGraphError extends Error {
  constructor(
    public readonly code: HotGraphErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'HotGraphError'
  }
}

/** Referenced node id or zone does not exist in the current snapshot */
export class NotFoundError extends HotGraphError {
  constructor(
    public readonly subject: 'node' | 'zone',
    public readonly key: string,
  ) {
    super(HotGraphErrorCode.NOT_FOUND, `${subject === 'node' ? 'Node' : 'Zone'} not found: ${key}`)
    this.name = 'NotFoundError'
  }
}

/** Path search exhausted the hop bound without reaching the target */
export class NotReachableError extends HotGraphError {
  constructor(
    public readonly start: string,
    public readonly end: string,
    public readonly maxHops: number,
  ) {
    super(HotGraphErrorCode.NOT_REACHABLE, `No path from ${start} to ${end} within ${maxHops} hop(s)`)
    this.name = 'NotReachableError'
  }
}

/** Structural violation detected while building an index or parsing a graph */
export class MalformedGraphError extends HotGraphError {
  constructor(message: string) {
    super(HotGraphErrorCode.MALFORMED_GRAPH, `Malformed graph: ${message}`)
    this.name = 'MalformedGraphError'
  }
}

/** Store I/O failure; the original error is kept as `cause` */
export class PersistenceError extends HotGraphError {
  constructor(message: string, cause?: unknown) {
    super(HotGraphErrorCode.PERSISTENCE_FAILED, `Persistence failed: ${message}`, { cause })
    this.name = 'PersistenceError'
  }
}

/** The revision the caller worked against is no longer current */
export class ConflictError extends HotGraphError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(HotGraphErrorCode.CONFLICT, `Revision conflict: expected ${expected}, store is at ${actual}`)
    this.name = 'ConflictError'
  }
}

export class InvalidInputError extends HotGraphError {
  constructor(reason: string) {
    super(HotGraphErrorCode.INVALID_INPUT, `Invalid input: ${reason}`)
    this.name = 'InvalidInputError'
  }
}

export function isHotGraphError(error: unknown): error is HotGraphError {
  return error instanceof HotGraphError
}

export interface ErrorInfo {
  code: string
  message: string
}

/**
 * Flatten any thrown value into a `{ code, message }` pair for explicit results
 */
export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof HotGraphError) {
    return { code: error.code, message: error.message }
  }
  if (error instanceof Error) {
    return { code: 'UNKNOWN_ERROR', message: error.message }
  }
  return { code: 'UNKNOWN_ERROR', message: String(error) }
}
