export { LocalGraphStore } from './graph-store'
export type { LocalGraphStoreConfig } from './graph-store'
