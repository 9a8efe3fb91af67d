export {
  createIndexStore,
  diffListings,
  isTempName,
  TEMP_INFIX,
} from './store.js'

export type { IndexStore, IndexStoreOptions } from './store.js'
