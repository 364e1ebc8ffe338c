/**
 * Content-Hash Asset Registry
 *
 * Maps local asset references to content-hash keys and remembers what the
 * remote platform returned for each key, so that a given byte sequence is
 * uploaded at most once no matter how many paths or items reference it.
 *
 * Resolution order for a reference written in an item body:
 * 1. path relative to the item's own folder
 * 2. explicit relative path reaching outside it, then course-root relative
 * 3. bare filename searched across the shared assets tree
 *
 * The registry is loaded once at the start of a run and saved once at the end.
 */

import * as fs from 'fs';
import * as path from 'path';

import { globSync } from 'glob';
import { z } from 'zod';

import {
  AmbiguousReferenceError,
  UnresolvedReferenceError,
} from '../errors/errors';
import {
  ASSET_KEY_PREFIX,
  ASSET_REGISTRY_VERSION,
  AssetKey,
  AssetRecord,
  AssetRegistryStats,
  AssetSource,
  PersistedAssetRegistry,
  RemoteDescriptor,
  ResolvedAsset,
  UploadCallback,
} from '../models/asset.model';
import { KeyedMutex } from '../utils/keyed-mutex';
import { createLogger, Logger } from '../utils/logger';

import { ContentAddressableStore, md5Hex } from './content-store';

export const DEFAULT_REGISTRY_PATH = '_course_metadata/asset_registry.json';
export const DEFAULT_SHARED_ASSETS_DIR = 'assets';

export interface AssetRegistryOptions {
  /** Absolute course root */
  courseRoot: string;
  /** Shared assets folder relative to the course root */
  sharedAssetsDir?: string;
  /** Registry file relative to the course root */
  registryPath?: string;
  logger?: Logger;
}

const persistedRecordSchema = z.object({
  local_paths: z.array(z.string()),
  remote_id: z.union([z.string(), z.number()]).transform(String),
  remote_locator: z.string(),
  content_hash: z.string(),
  uploaded_at: z.string(),
  file_size: z.number(),
  filename: z.string(),
});

const persistedRegistrySchema = z.object({
  version: z.string(),
  assets: z.record(persistedRecordSchema),
  path_lookup: z.record(z.string()),
});

/** Convert any separator style to forward slashes */
export function toPosixPath(p: string): string {
  return p.split('\\').join('/');
}

function safeDecodeURIComponent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Strip query/fragment, URL-decode and normalize separators of a reference.
 */
export function cleanReference(reference: string): string {
  let ref = reference.trim().split('#')[0].split('?')[0];
  ref = toPosixPath(safeDecodeURIComponent(ref));
  while (ref.startsWith('./')) {
    ref = ref.slice(2);
  }
  return ref;
}

/**
 * True for references that point off the local file system (URLs, data URIs,
 * anchors, package file-base tokens).
 */
export function isRemoteReference(reference: string): boolean {
  const ref = reference.trim();
  return (
    ref === '' ||
    ref.startsWith('#') ||
    ref.startsWith('//') ||
    ref.startsWith('$IMS-CC-FILEBASE$') ||
    /^[a-z][a-z0-9+.-]*:/i.test(ref)
  );
}

/** Predicate for prune: does a course-relative path still exist on disk */
export function existsUnder(courseRoot: string): (relativePath: string) => boolean {
  return relativePath => fs.existsSync(path.join(courseRoot, relativePath));
}

function isFile(absolutePath: string): boolean {
  try {
    return fs.statSync(absolutePath).isFile();
  } catch {
    return false;
  }
}

export class AssetRegistry {
  private readonly store = new ContentAddressableStore<Buffer, AssetRecord>({
    prefix: ASSET_KEY_PREFIX,
    normalize: bytes => bytes,
  });
  private readonly pathLookup = new Map<string, AssetKey>();
  private readonly locks = new KeyedMutex<AssetKey>();
  private readonly logger: Logger;
  private sharedIndex: Map<string, string[]> | undefined;

  readonly courseRoot: string;
  readonly sharedAssetsDir: string;
  readonly registryPath: string;

  constructor(options: AssetRegistryOptions) {
    this.courseRoot = path.resolve(options.courseRoot);
    this.sharedAssetsDir = options.sharedAssetsDir ?? DEFAULT_SHARED_ASSETS_DIR;
    this.registryPath = path.resolve(this.courseRoot, options.registryPath ?? DEFAULT_REGISTRY_PATH);
    this.logger = options.logger ?? createLogger('asset-registry');
  }

  /**
   * Load the registry file, or start empty when it is missing or unreadable.
   */
  static load(options: AssetRegistryOptions): AssetRegistry {
    const registry = new AssetRegistry(options);
    if (!fs.existsSync(registry.registryPath)) {
      return registry;
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(registry.registryPath, 'utf-8'));
      registry.restore(persistedRegistrySchema.parse(raw));
    } catch (err) {
      registry.logger.warn('Failed to load asset registry, starting empty', {
        registryPath: registry.registryPath,
        error: String(err),
      });
    }
    return registry;
  }

  /** Write the registry file */
  save(): void {
    fs.mkdirSync(path.dirname(this.registryPath), { recursive: true });
    fs.writeFileSync(this.registryPath, JSON.stringify(this.toJSON(), null, 2), 'utf-8');
    this.logger.debug('Saved asset registry', { assets: this.store.size });
  }

  toJSON(): PersistedAssetRegistry {
    const assets: PersistedAssetRegistry['assets'] = {};
    for (const [key, record] of this.store.entries()) {
      assets[key] = {
        local_paths: [...record.localPaths],
        remote_id: record.remoteId,
        remote_locator: record.remoteLocator,
        content_hash: record.contentHash,
        uploaded_at: record.uploadedAt,
        file_size: record.fileSize,
        filename: record.filename,
      };
    }
    return {
      version: ASSET_REGISTRY_VERSION,
      assets,
      path_lookup: Object.fromEntries(this.pathLookup),
    };
  }

  private restore(data: z.infer<typeof persistedRegistrySchema>): void {
    for (const [key, entry] of Object.entries(data.assets)) {
      this.store.set(key, {
        key,
        localPaths: entry.local_paths,
        remoteId: entry.remote_id,
        remoteLocator: entry.remote_locator,
        contentHash: entry.content_hash,
        uploadedAt: entry.uploaded_at,
        fileSize: entry.file_size,
        filename: entry.filename,
      });
    }
    for (const [spelling, key] of Object.entries(data.path_lookup)) {
      this.pathLookup.set(spelling, key);
    }
  }

  /**
   * Resolve a reference written in an item body to a hashed local file.
   *
   * @param itemDir - item folder, absolute or relative to the course root
   * @throws AmbiguousReferenceError when a bare filename matches several shared assets
   * @throws UnresolvedReferenceError when nothing matches
   */
  resolve(reference: string, itemDir: string): ResolvedAsset {
    if (isRemoteReference(reference)) {
      throw new UnresolvedReferenceError(reference);
    }

    const ref = cleanReference(reference).replace(/^\/+/, '');
    const itemAbs = path.resolve(this.courseRoot, itemDir);
    const segments = ref.split('/');
    const searched: string[] = [];

    if (!segments.includes('..')) {
      const candidate = path.resolve(itemAbs, ref);
      searched.push(candidate);
      if (this.isInsideCourse(candidate) && isFile(candidate)) {
        return this.describe(candidate, 'container');
      }
    }

    if (segments.length > 1) {
      for (const candidate of [path.resolve(itemAbs, ref), path.resolve(this.courseRoot, ref)]) {
        searched.push(candidate);
        if (this.isInsideCourse(candidate) && isFile(candidate)) {
          return this.describe(candidate, 'relative');
        }
      }
    } else {
      const matches = this.findSharedAsset(ref);
      if (matches.length > 1) {
        throw new AmbiguousReferenceError(reference, matches);
      }
      if (matches.length === 1) {
        return this.describe(path.join(this.courseRoot, matches[0]), 'shared-assets');
      }
      searched.push(path.join(this.courseRoot, this.sharedAssetsDir, '**', ref));
    }

    throw new UnresolvedReferenceError(reference, searched);
  }

  /**
   * Return the stored descriptor for `key`, or call `upload` once and record it.
   * The source path is always added to the key's path set. Upload failures
   * propagate unchanged and leave no record.
   */
  async ensureUploaded(
    key: AssetKey,
    source: AssetSource,
    upload: UploadCallback
  ): Promise<RemoteDescriptor> {
    return this.locks.runExclusive(key, async () => {
      const existing = this.store.get(key);
      if (existing && existing.remoteId) {
        this.addPath(existing, source.path);
        return { remoteId: existing.remoteId, locator: existing.remoteLocator };
      }

      const descriptor = await upload(source);
      const bytes = await source.read();
      const record: AssetRecord = {
        key,
        localPaths: [],
        remoteId: descriptor.remoteId,
        remoteLocator: descriptor.locator,
        contentHash: md5Hex(bytes),
        uploadedAt: new Date().toISOString(),
        fileSize: bytes.length,
        filename: source.filename,
      };
      this.store.set(key, record);
      this.addPath(record, source.path);
      this.logger.info(`Uploaded ${source.path}`, { key, remoteId: descriptor.remoteId });
      return descriptor;
    });
  }

  /**
   * Remote locator for a local reference, for transient rendered output only.
   * With `itemDir` the reference is resolved afresh so changed bytes are seen.
   */
  remoteLocatorFor(reference: string, itemDir?: string): string | undefined {
    if (itemDir !== undefined) {
      try {
        const resolved = this.resolve(reference, itemDir);
        return this.store.get(resolved.key)?.remoteLocator || undefined;
      } catch (err) {
        if (err instanceof UnresolvedReferenceError || err instanceof AmbiguousReferenceError) {
          return undefined;
        }
        throw err;
      }
    }

    const key = this.pathLookup.get(cleanReference(reference).replace(/^\/+/, ''));
    return key ? this.store.get(key)?.remoteLocator || undefined : undefined;
  }

  /**
   * Reverse lookup from a remote id or locator to a course-relative path.
   * The most recently uploaded record wins.
   */
  localPathForRemote(remoteIdOrLocator: string): string | undefined {
    let best: AssetRecord | undefined;
    for (const [, record] of this.store.entries()) {
      if (record.remoteId === remoteIdOrLocator || record.remoteLocator === remoteIdOrLocator) {
        if (!best || record.uploadedAt > best.uploadedAt) {
          best = record;
        }
      }
    }
    return best?.localPaths[0];
  }

  /**
   * Remove records none of whose paths still exist. Returns the number removed.
   */
  prune(stillExists: (relativePath: string) => boolean = existsUnder(this.courseRoot)): number {
    let removed = 0;
    for (const [key, record] of this.store.entries()) {
      if (!record.localPaths.some(p => stillExists(p))) {
        this.store.delete(key);
        removed++;
      }
    }
    for (const [spelling, key] of Array.from(this.pathLookup.entries())) {
      if (!this.store.has(key)) {
        this.pathLookup.delete(spelling);
      }
    }
    if (removed > 0) {
      this.logger.info(`Pruned ${removed} asset records`);
    }
    return removed;
  }

  getRecord(key: AssetKey): AssetRecord | undefined {
    return this.store.get(key);
  }

  /** Key the given path spelling last resolved to */
  keyForPath(relativePath: string): AssetKey | undefined {
    return this.pathLookup.get(relativePath);
  }

  records(): AssetRecord[] {
    return this.store.entries().map(([, record]) => record);
  }

  stats(): AssetRegistryStats {
    const records = this.records();
    return {
      totalAssets: records.length,
      totalPaths: this.pathLookup.size,
      totalBytes: records.reduce((sum, r) => sum + r.fileSize, 0),
    };
  }

  /** Forget the cached shared-assets listing */
  refreshSharedAssets(): void {
    this.sharedIndex = undefined;
  }

  private addPath(record: AssetRecord, relativePath: string): void {
    if (!record.localPaths.includes(relativePath)) {
      record.localPaths.push(relativePath);
    }
    this.pathLookup.set(relativePath, record.key);
  }

  private isInsideCourse(absolutePath: string): boolean {
    const relative = path.relative(this.courseRoot, absolutePath);
    return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
  }

  private findSharedAsset(filename: string): string[] {
    if (!this.sharedIndex) {
      this.sharedIndex = new Map();
      const sharedRoot = path.join(this.courseRoot, this.sharedAssetsDir);
      if (fs.existsSync(sharedRoot)) {
        for (const file of globSync('**/*', { cwd: sharedRoot, nodir: true, posix: true })) {
          const relative = `${toPosixPath(this.sharedAssetsDir)}/${toPosixPath(file)}`;
          const name = path.posix.basename(relative);
          const bucket = this.sharedIndex.get(name) ?? [];
          bucket.push(relative);
          this.sharedIndex.set(name, bucket);
        }
      }
    }
    return [...(this.sharedIndex.get(filename) ?? [])].sort();
  }

  private describe(absolutePath: string, via: ResolvedAsset['via']): ResolvedAsset {
    const bytes = fs.readFileSync(absolutePath);
    const contentHash = md5Hex(bytes);
    return {
      key: this.store.keyForDigest(contentHash),
      contentHash,
      absolutePath,
      path: toPosixPath(path.relative(this.courseRoot, absolutePath)),
      filename: path.basename(absolutePath),
      fileSize: bytes.length,
      via,
      read: () => fs.promises.readFile(absolutePath),
    };
  }
}
