/**
 * Course Import Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { ArchiveFormatError } from '../errors/errors';
import { createEmptyCourse } from '../models/content.model';
import { exportCoursePackage } from '../package/package-exporter.service';
import { RemoteCourseReader } from '../remote/remote.types';
import { buildLink, buildPage, findItem } from '../utils/content-item-builder';
import { deriveItemId } from '../utils/id-generator';
import { Logger } from '../utils/logger';

import { loadCourseConfig } from './config.service';
import { isRemoteCourseId, runCourseImport } from './course-import.service';
import { loadCourse } from './course-loader.service';

function silentLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

function fakeReader(): RemoteCourseReader {
  return {
    getCourse: async () => ({ id: '7', name: 'Remote Geo' }),
    listPages: async () => [{ id: '11', url: 'welcome', title: 'Welcome', body: '<p>Hi</p>', published: true }],
    listAssignments: async () => [],
    listQuizzes: async () => [],
    listQuizQuestions: async () => [],
    listModules: async () => [
      {
        id: '1',
        name: 'Week 1',
        position: 1,
        published: true,
        items: [{ id: '100', title: 'Welcome', type: 'Page', position: 1, indent: 0, published: true, pageUrl: 'welcome' }],
      },
    ],
  };
}

describe('course-import.service', () => {
  let workDir: string;
  let outputDir: string;
  let logger: jest.Mocked<Logger>;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'course-sync-import-'));
    outputDir = path.join(workDir, 'course');
    fs.mkdirSync(outputDir);
    logger = silentLogger();
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  describe('isRemoteCourseId', () => {
    it('should treat digits as a course id and anything else as a path', () => {
      expect(isRemoteCourseId('1234')).toBe(true);
      expect(isRemoteCourseId('course.imscc')).toBe(false);
      expect(isRemoteCourseId('./42')).toBe(false);
    });
  });

  it('should write an exported archive back as author source', async () => {
    // Arrange
    const course = createEmptyCourse('Intro to Geography');
    course.items.push(
      buildPage({ id: 'p1', title: 'Welcome', body: '# Hello', published: true, modules: [{ module: 'Week 1', indent: 0 }] }),
      buildLink({ id: 'l1', title: 'Atlas', url: 'https://example.com/atlas', modules: [{ module: 'Week 1', indent: 0 }] })
    );
    course.modules.push({ id: 'm1', title: 'Week 1', position: 1, published: true, itemIds: ['p1', 'l1'] });
    const archivePath = path.join(workDir, 'geo.imscc');
    await exportCoursePackage(course, archivePath, { identifier: 'c1', logger });

    // Act
    const result = await runCourseImport({
      source: archivePath,
      outputDir,
      config: loadCourseConfig(outputDir, {}),
      logger,
    });

    // Assert
    expect(result.origin).toBe('package');
    expect(result.title).toBe('Intro to Geography');
    expect(result.written).toContain('content/01-Week 1.module/01-welcome.page/index.md');

    const loaded = await loadCourse(outputDir, { logger });
    expect(loaded.errors).toEqual([]);
    expect(findItem(loaded.course, 'p1')?.body).toBe('# Hello\n');
    expect(loaded.course.modules.map(m => [m.title, m.itemIds])).toEqual([['Week 1', ['p1', 'l1']]]);
  });

  it('should write a remote course back as author source', async () => {
    // Act
    const result = await runCourseImport({
      source: '7',
      outputDir,
      config: loadCourseConfig(outputDir, {}),
      reader: fakeReader(),
      logger,
    });

    // Assert
    const id = deriveItemId('remote/page/11');
    expect(result.origin).toBe('remote');
    expect(result.title).toBe('Remote Geo');
    expect(result.items).toBe(1);
    expect(fs.readFileSync(path.join(outputDir, 'content/01-Week 1.module/01-welcome.page/index.md'), 'utf-8')).toBe(
      `---\nname: Welcome\nidentifier: ${id}\npublished: true\n---\n\nHi\n`
    );
  });

  it('should write nothing when the archive is unreadable', async () => {
    // Arrange
    const archivePath = path.join(workDir, 'broken.imscc');
    fs.writeFileSync(archivePath, 'not a zip');

    // Act + Assert
    await expect(
      runCourseImport({ source: archivePath, outputDir, config: loadCourseConfig(outputDir, {}), logger })
    ).rejects.toThrow(ArchiveFormatError);
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });
});
