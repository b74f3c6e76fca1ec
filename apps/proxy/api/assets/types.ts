/**
 * Asset Types
 */

/** A file under the static root, addressed by its relative path */
export interface LocalAsset {
  kind: 'local'
  name: string
}

/** A file inside a published package version, served through the cache */
export interface RemoteAsset {
  kind: 'remote'
  package: string
  version: string
  file: string
}

export type Asset = LocalAsset | RemoteAsset

export type AssetSource = 'local' | 'cache' | 'origin'

/** ArrayBuffer-backed bytes, usable directly as a Response body */
export type Bytes = Uint8Array<ArrayBuffer>

export interface AssetResult {
  status: number
  body: Bytes
  contentType: string
  /** Set on successful responses only */
  source?: AssetSource
}

export function assetKey(asset: RemoteAsset): string {
  return `${asset.package}@${asset.version}/${asset.file}`
}
