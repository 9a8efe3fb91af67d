export { createLatestView, selectExpired } from './manager.js'
export type { LatestEntry, LatestView, LatestViewOptions } from './manager.js'
