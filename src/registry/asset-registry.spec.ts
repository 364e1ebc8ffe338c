/**
 * Asset Registry Tests
 *
 * Resolution order, upload deduplication, persistence and pruning,
 * exercised against a temporary course tree.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { AmbiguousReferenceError, UnresolvedReferenceError } from '../errors/errors';
import { AssetSource, RemoteDescriptor } from '../models/asset.model';
import { Logger } from '../utils/logger';

import {
  AssetRegistry,
  cleanReference,
  isRemoteReference,
  DEFAULT_REGISTRY_PATH,
} from './asset-registry';

function silentLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

function writeFile(root: string, relative: string, content: string): void {
  const target = path.join(root, relative);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content);
}

describe('asset-registry', () => {
  let courseRoot: string;
  let logger: jest.Mocked<Logger>;
  let uploadCount: number;
  let upload: jest.Mock<Promise<RemoteDescriptor>, [AssetSource]>;

  beforeEach(() => {
    courseRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'course-sync-registry-'));
    logger = silentLogger();
    uploadCount = 0;
    upload = jest.fn(async (source: AssetSource) => {
      uploadCount++;
      return { remoteId: String(100 + uploadCount), locator: `/files/${100 + uploadCount}/${source.filename}` };
    });
    writeFile(courseRoot, 'content/01-Week 1.module/intro.page/index.md', '# Intro');
    writeFile(courseRoot, 'content/01-Week 1.module/intro.page/diagram.png', 'diagram-bytes');
    writeFile(courseRoot, 'assets/images/photo.jpg', 'photo-bytes');
  });

  afterEach(() => {
    fs.rmSync(courseRoot, { recursive: true, force: true });
  });

  const itemDir = 'content/01-Week 1.module/intro.page';

  describe('cleanReference', () => {
    it('should strip query and fragment and decode escapes', () => {
      expect(cleanReference('./my%20photo.jpg?v=2#top')).toBe('my photo.jpg');
    });

    it('should keep malformed escapes as written', () => {
      expect(cleanReference('100%.png')).toBe('100%.png');
    });
  });

  describe('isRemoteReference', () => {
    it('should recognise URLs and file-base tokens', () => {
      expect(isRemoteReference('https://example.com/a.png')).toBe(true);
      expect(isRemoteReference('$IMS-CC-FILEBASE$/a.png')).toBe(true);
      expect(isRemoteReference('data:image/png;base64,AAA')).toBe(true);
      expect(isRemoteReference('images/a.png')).toBe(false);
    });
  });

  describe('resolve', () => {
    it('should resolve a path relative to the item folder first', () => {
      const registry = new AssetRegistry({ courseRoot, logger });

      const resolved = registry.resolve('diagram.png', itemDir);

      expect(resolved.via).toBe('container');
      expect(resolved.path).toBe('content/01-Week 1.module/intro.page/diagram.png');
      expect(resolved.key).toMatch(/^content-hash-[0-9a-f]{12}$/);
    });

    it('should resolve an explicit relative path reaching outside the item', () => {
      const registry = new AssetRegistry({ courseRoot, logger });

      const resolved = registry.resolve('../../../assets/images/photo.jpg', itemDir);

      expect(resolved.via).toBe('relative');
      expect(resolved.path).toBe('assets/images/photo.jpg');
    });

    it('should resolve a course-root relative path', () => {
      const registry = new AssetRegistry({ courseRoot, logger });
      expect(registry.resolve('assets/images/photo.jpg', itemDir).via).toBe('relative');
    });

    it('should find a bare filename in the shared assets tree', () => {
      const registry = new AssetRegistry({ courseRoot, logger });

      const resolved = registry.resolve('photo.jpg', itemDir);

      expect(resolved.via).toBe('shared-assets');
      expect(resolved.path).toBe('assets/images/photo.jpg');
    });

    it('should list every candidate when a bare filename is ambiguous', () => {
      // Arrange
      writeFile(courseRoot, 'assets/a/logo.png', 'logo-a');
      writeFile(courseRoot, 'assets/b/logo.png', 'logo-b');
      const registry = new AssetRegistry({ courseRoot, logger });

      // Act
      let caught: unknown;
      try {
        registry.resolve('logo.png', itemDir);
      } catch (err) {
        caught = err;
      }

      // Assert
      expect(caught).toBeInstanceOf(AmbiguousReferenceError);
      if (caught instanceof AmbiguousReferenceError) {
        expect(caught.candidates).toEqual(['assets/a/logo.png', 'assets/b/logo.png']);
        expect(caught.message).toContain('assets/a/logo.png');
        expect(caught.message).toContain('assets/b/logo.png');
      }
    });

    it('should throw UnresolvedReferenceError when nothing matches', () => {
      const registry = new AssetRegistry({ courseRoot, logger });
      expect(() => registry.resolve('missing.png', itemDir)).toThrow(UnresolvedReferenceError);
    });

    it('should refuse paths escaping the course root', () => {
      const registry = new AssetRegistry({ courseRoot, logger });
      expect(() => registry.resolve('../../../../outside.png', itemDir)).toThrow(UnresolvedReferenceError);
    });

    it('should refuse remote URLs', () => {
      const registry = new AssetRegistry({ courseRoot, logger });
      expect(() => registry.resolve('https://example.com/a.png', itemDir)).toThrow(UnresolvedReferenceError);
    });
  });

  describe('ensureUploaded', () => {
    it('should upload identical bytes once across paths and items', async () => {
      // Arrange
      writeFile(courseRoot, 'content/other.page/copy.jpg', 'photo-bytes');
      const registry = new AssetRegistry({ courseRoot, logger });
      const first = registry.resolve('photo.jpg', itemDir);
      const second = registry.resolve('copy.jpg', 'content/other.page');

      // Act
      const a = await registry.ensureUploaded(first.key, first, upload);
      const b = await registry.ensureUploaded(second.key, second, upload);

      // Assert
      expect(first.key).toBe(second.key);
      expect(upload).toHaveBeenCalledTimes(1);
      expect(b).toEqual(a);
      expect(registry.getRecord(first.key)?.localPaths).toEqual([
        'assets/images/photo.jpg',
        'content/other.page/copy.jpg',
      ]);
    });

    it('should upload once when the same key is ensured concurrently', async () => {
      const registry = new AssetRegistry({ courseRoot, logger });
      const resolved = registry.resolve('photo.jpg', itemDir);

      await Promise.all([
        registry.ensureUploaded(resolved.key, resolved, upload),
        registry.ensureUploaded(resolved.key, resolved, upload),
        registry.ensureUploaded(resolved.key, resolved, upload),
      ]);

      expect(upload).toHaveBeenCalledTimes(1);
    });

    it('should give changed bytes a new key, upload once and retain the old record', async () => {
      // Arrange
      const registry = new AssetRegistry({ courseRoot, logger });
      const before = registry.resolve('photo.jpg', itemDir);
      await registry.ensureUploaded(before.key, before, upload);

      // Act
      writeFile(courseRoot, 'assets/images/photo.jpg', 'photo-bytes-v2');
      const after = registry.resolve('photo.jpg', itemDir);
      await registry.ensureUploaded(after.key, after, upload);
      await registry.ensureUploaded(after.key, after, upload);

      // Assert
      expect(after.key).not.toBe(before.key);
      expect(upload).toHaveBeenCalledTimes(2);
      expect(registry.getRecord(before.key)?.remoteId).toBe('101');
      expect(registry.getRecord(after.key)?.remoteId).toBe('102');
      expect(registry.keyForPath('assets/images/photo.jpg')).toBe(after.key);
    });

    it('should propagate upload failures without recording anything', async () => {
      const registry = new AssetRegistry({ courseRoot, logger });
      const resolved = registry.resolve('photo.jpg', itemDir);
      const failing = jest.fn(async () => {
        throw new Error('quota exceeded');
      });

      await expect(registry.ensureUploaded(resolved.key, resolved, failing)).rejects.toThrow('quota exceeded');
      expect(registry.getRecord(resolved.key)).toBeUndefined();

      await registry.ensureUploaded(resolved.key, resolved, upload);
      expect(upload).toHaveBeenCalledTimes(1);
    });

    it('should record file size, filename and the full content hash', async () => {
      const registry = new AssetRegistry({ courseRoot, logger });
      const resolved = registry.resolve('photo.jpg', itemDir);

      await registry.ensureUploaded(resolved.key, resolved, upload);

      const record = registry.getRecord(resolved.key);
      expect(record?.fileSize).toBe('photo-bytes'.length);
      expect(record?.filename).toBe('photo.jpg');
      expect(record?.contentHash).toBe(resolved.contentHash);
      expect(resolved.key).toBe(`content-hash-${resolved.contentHash.slice(0, 12)}`);
    });
  });

  describe('lookups', () => {
    it('should map local references to remote locators and back', async () => {
      const registry = new AssetRegistry({ courseRoot, logger });
      const resolved = registry.resolve('photo.jpg', itemDir);
      await registry.ensureUploaded(resolved.key, resolved, upload);

      expect(registry.remoteLocatorFor('photo.jpg', itemDir)).toBe('/files/101/photo.jpg');
      expect(registry.remoteLocatorFor('assets/images/photo.jpg')).toBe('/files/101/photo.jpg');
      expect(registry.remoteLocatorFor('nothing.png', itemDir)).toBeUndefined();
      expect(registry.localPathForRemote('101')).toBe('assets/images/photo.jpg');
      expect(registry.localPathForRemote('/files/101/photo.jpg')).toBe('assets/images/photo.jpg');
    });
  });

  describe('persistence', () => {
    it('should save and load the snake_case registry file', async () => {
      // Arrange
      const registry = new AssetRegistry({ courseRoot, logger });
      const resolved = registry.resolve('photo.jpg', itemDir);
      await registry.ensureUploaded(resolved.key, resolved, upload);

      // Act
      registry.save();
      const raw = JSON.parse(fs.readFileSync(path.join(courseRoot, DEFAULT_REGISTRY_PATH), 'utf-8'));
      const reloaded = AssetRegistry.load({ courseRoot, logger });

      // Assert
      expect(raw.version).toBe('1.0');
      expect(raw.assets[resolved.key].local_paths).toEqual(['assets/images/photo.jpg']);
      expect(raw.assets[resolved.key].remote_id).toBe('101');
      expect(raw.path_lookup['assets/images/photo.jpg']).toBe(resolved.key);
      expect(reloaded.getRecord(resolved.key)?.remoteLocator).toBe('/files/101/photo.jpg');
    });

    it('should accept numeric remote ids in an existing file', () => {
      writeFile(
        courseRoot,
        DEFAULT_REGISTRY_PATH,
        JSON.stringify({
          version: '1.0',
          assets: {
            'content-hash-aaaaaaaaaaaa': {
              local_paths: ['assets/a.png'],
              remote_id: 42,
              remote_locator: '/files/42',
              content_hash: 'aaaaaaaaaaaa',
              uploaded_at: '2024-01-01T00:00:00Z',
              file_size: 3,
              filename: 'a.png',
            },
          },
          path_lookup: { 'assets/a.png': 'content-hash-aaaaaaaaaaaa' },
        })
      );

      const registry = AssetRegistry.load({ courseRoot, logger });

      expect(registry.getRecord('content-hash-aaaaaaaaaaaa')?.remoteId).toBe('42');
    });

    it('should start empty and warn when the file is corrupt', () => {
      writeFile(courseRoot, DEFAULT_REGISTRY_PATH, '{ not json');

      const registry = AssetRegistry.load({ courseRoot, logger });

      expect(registry.records()).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith(
        'Failed to load asset registry, starting empty',
        expect.objectContaining({ registryPath: path.join(courseRoot, DEFAULT_REGISTRY_PATH) })
      );
    });
  });

  describe('prune', () => {
    it('should remove records whose every path is gone and keep the rest', async () => {
      // Arrange
      const registry = new AssetRegistry({ courseRoot, logger });
      const photo = registry.resolve('photo.jpg', itemDir);
      const diagram = registry.resolve('diagram.png', itemDir);
      await registry.ensureUploaded(photo.key, photo, upload);
      await registry.ensureUploaded(diagram.key, diagram, upload);
      fs.rmSync(path.join(courseRoot, 'assets/images/photo.jpg'));

      // Act
      const removed = registry.prune();

      // Assert
      expect(removed).toBe(1);
      expect(registry.getRecord(photo.key)).toBeUndefined();
      expect(registry.getRecord(diagram.key)).toBeDefined();
      expect(registry.keyForPath('assets/images/photo.jpg')).toBeUndefined();
      expect(registry.stats()).toEqual({ totalAssets: 1, totalPaths: 1, totalBytes: 'diagram-bytes'.length });
    });
  });
});
