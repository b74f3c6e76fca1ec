export { CacheStore } from './cache-store'
export { classifyPath, isSafePath } from './classifier'
export { contentTypeFor, DEFAULT_CONTENT_TYPE } from './content-type'
export {
  StaticAssetHandler,
  type StaticAssetHandlerOptions,
} from './handler'
export { InflightTasks } from './inflight'
export {
  buildOriginUrl,
  DEFAULT_FETCH_TIMEOUT_MS,
  type FetchFn,
  OriginFetcher,
  type OriginFetcherOptions,
  ORIGIN_URL,
} from './origin-fetcher'
export type {
  Asset,
  AssetResult,
  AssetSource,
  Bytes,
  LocalAsset,
  RemoteAsset,
} from './types'
export { assetKey } from './types'
