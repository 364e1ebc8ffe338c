/**
 * Asset Registry Model
 *
 * Content-hash keyed records of uploaded assets.
 * Stored at: <course>/_course_metadata/asset_registry.json
 */

/** `content-hash-` followed by 12 hex chars of the md5 digest */
export type AssetKey = string;

export const ASSET_KEY_PREFIX = 'content-hash-';

export const ASSET_REGISTRY_VERSION = '1.0';

/**
 * What the platform returned for an upload
 */
export interface RemoteDescriptor {
  remoteId: string;
  /** URL or path the platform serves the file from */
  locator: string;
}

/**
 * One record per distinct byte sequence
 */
export interface AssetRecord {
  key: AssetKey;

  /** Course-relative path spellings that resolved to this content */
  localPaths: string[];

  remoteId: string;

  remoteLocator: string;

  /** Full md5 hex digest */
  contentHash: string;

  /** ISO-8601 */
  uploadedAt: string;

  fileSize: number;

  filename: string;
}

/**
 * Bytes plus the path they were reached through
 */
export interface AssetSource {
  /** Course-relative POSIX path */
  path: string;
  filename: string;
  read(): Promise<Buffer>;
}

export type UploadCallback = (source: AssetSource) => Promise<RemoteDescriptor>;

/**
 * Result of resolving a reference written in an item body
 */
export interface ResolvedAsset extends AssetSource {
  key: AssetKey;
  contentHash: string;
  absolutePath: string;
  fileSize: number;
  /** Which resolution step matched */
  via: 'container' | 'relative' | 'shared-assets';
}

/**
 * On-disk JSON form. Field names are snake_case to keep the file stable.
 */
export interface PersistedAssetRecord {
  local_paths: string[];
  remote_id: string;
  remote_locator: string;
  content_hash: string;
  uploaded_at: string;
  file_size: number;
  filename: string;
}

export interface PersistedAssetRegistry {
  version: string;
  assets: Record<AssetKey, PersistedAssetRecord>;
  path_lookup: Record<string, AssetKey>;
}

export interface AssetRegistryStats {
  totalAssets: number;
  totalPaths: number;
  totalBytes: number;
}
