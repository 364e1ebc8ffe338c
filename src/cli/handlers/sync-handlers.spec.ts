/**
 * Sync Handler Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { PublishOptions, PublishResult } from '../../models/publish-context.model';
import { AssetRegistry } from '../../registry/asset-registry';
import { CourseImportOptions, CourseImportResult } from '../../services/course-import.service';
import { IncludeCandidate, IncludeSuggestionOptions } from '../../services/include-suggestions.service';
import { Logger } from '../../utils/logger';
import { IConsole, IProcess, ServiceContainer, ServiceContainerConfig } from '../service-container';

import {
  handleImport,
  handlePublish,
  handlePruneAssets,
  handleRegistryStats,
  handleSuggestIncludes,
} from './sync-handlers';

function silentLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

function publishResult(overrides: Partial<PublishResult> = {}): PublishResult {
  return {
    startedAt: '2026-01-01T00:00:00.000Z',
    completedAt: '2026-01-01T00:00:01.000Z',
    items: [
      { id: 'p1', kind: 'page', title: 'Welcome', remoteId: 'welcome' },
      { id: 'l1', kind: 'link', title: 'Atlas', remoteId: 'https://example.com/atlas' },
    ],
    uploads: 1,
    errors: [],
    warnings: [],
    ...overrides,
  };
}

describe('sync-handlers', () => {
  let courseRoot: string;
  let fakeConsole: jest.Mocked<IConsole>;
  let fakeProcess: jest.Mocked<IProcess>;

  beforeEach(() => {
    courseRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'course-sync-cli-'));
    fakeConsole = { log: jest.fn(), error: jest.fn() };
    fakeProcess = {
      exit: jest.fn(),
      env: { CANVAS_API_URL: 'https://canvas.test', CANVAS_API_TOKEN: 'test-secret' },
    };
  });

  afterEach(() => {
    fs.rmSync(courseRoot, { recursive: true, force: true });
  });

  function containerWith(overrides: ServiceContainerConfig = {}): ServiceContainer {
    return new ServiceContainer({ console: fakeConsole, process: fakeProcess, logger: silentLogger(), ...overrides });
  }

  describe('handlePublish', () => {
    it('should run the pipeline and report the result', async () => {
      // Arrange
      const runPublishPipeline = jest.fn(async (_options: PublishOptions): Promise<PublishResult> => publishResult());
      const container = containerWith({ services: { runPublishPipeline } });

      // Act
      await handlePublish({ courseRoot, prune: false }, container);

      // Assert
      expect(runPublishPipeline).toHaveBeenCalledWith(
        expect.objectContaining({ courseRoot, prune: false, packagePath: undefined })
      );
      expect(fakeConsole.log.mock.calls).toEqual([['✓ Published 2 items'], ['  Uploads: 1']]);
      expect(fakeProcess.exit).not.toHaveBeenCalled();
    });

    it('should list skipped items and exit with 1', async () => {
      // Arrange
      const runPublishPipeline = jest.fn(
        async (_options: PublishOptions): Promise<PublishResult> =>
          publishResult({ errors: ['broken.page: missing name'], warnings: ['Welcome: Cannot resolve asset reference "x.png"'] })
      );
      const container = containerWith({ services: { runPublishPipeline } });

      // Act
      await handlePublish({ courseRoot, prune: false }, container);

      // Assert
      expect(fakeConsole.log.mock.calls.slice(2)).toEqual([
        ['Warnings:'],
        ['  - Welcome: Cannot resolve asset reference "x.png"'],
        ['Skipped 1 invalid items:'],
        ['  - broken.page: missing name'],
      ]);
      expect(fakeProcess.exit).toHaveBeenCalledWith(1);
    });

    it('should fail when the token is missing', async () => {
      // Arrange
      fakeProcess.env = { CANVAS_API_URL: 'https://canvas.test' };
      const runPublishPipeline = jest.fn(async (_options: PublishOptions): Promise<PublishResult> => publishResult());
      const container = containerWith({ services: { runPublishPipeline } });

      // Act
      await handlePublish({ courseRoot, prune: false }, container);

      // Assert
      expect(runPublishPipeline).not.toHaveBeenCalled();
      expect(fakeConsole.error).toHaveBeenCalledWith(
        '\n✗ Publish failed: Platform connection is not configured: set CANVAS_API_TOKEN'
      );
      expect(fakeProcess.exit).toHaveBeenCalledWith(1);
    });
  });

  describe('handleImport', () => {
    it('should pass the source through and report what was written', async () => {
      // Arrange
      const runCourseImport = jest.fn(
        async (_options: CourseImportOptions): Promise<CourseImportResult> => ({
          origin: 'remote',
          title: 'Remote Geo',
          items: 1,
          written: ['course.yaml', 'content/welcome.page/index.md'],
          skipped: [],
          warnings: [],
        })
      );
      const container = containerWith({ services: { runCourseImport } });

      // Act
      await handleImport('1234', { output: courseRoot }, container);

      // Assert
      expect(runCourseImport).toHaveBeenCalledWith(expect.objectContaining({ source: '1234', outputDir: courseRoot }));
      expect(fakeConsole.log.mock.calls).toEqual([
        [`✓ Imported Remote Geo (1 items) into ${courseRoot}`],
        ['  Files written: 2'],
      ]);
    });

    it('should report a failed import', async () => {
      // Arrange
      const runCourseImport = jest.fn(async (_options: CourseImportOptions): Promise<CourseImportResult> => {
        throw new Error('not a package');
      });
      const container = containerWith({ services: { runCourseImport } });

      // Act
      await handleImport('broken.imscc', { output: courseRoot }, container);

      // Assert
      expect(fakeConsole.error).toHaveBeenCalledWith('\n✗ Import failed: not a package');
      expect(fakeProcess.exit).toHaveBeenCalledWith(1);
    });
  });

  describe('registry commands', () => {
    it('should prune and save the registry', () => {
      // Arrange
      const registry = AssetRegistry.load({ courseRoot, logger: silentLogger() });
      const prune = jest.spyOn(registry, 'prune');
      const save = jest.spyOn(registry, 'save');
      const container = containerWith({ services: { loadRegistry: () => registry } });

      // Act
      handlePruneAssets({ courseRoot }, container);

      // Assert
      expect(prune).toHaveBeenCalledTimes(1);
      expect(save).toHaveBeenCalledTimes(1);
      expect(fakeConsole.log).toHaveBeenCalledWith('✓ Removed 0 registry records');
    });

    it('should print registry statistics', () => {
      // Arrange
      const container = containerWith();

      // Act
      handleRegistryStats({ courseRoot }, container);

      // Assert
      expect(fakeConsole.log.mock.calls).toEqual([
        ['Asset Registry'],
        ['=============='],
        ['Assets: 0'],
        ['Path spellings: 0'],
        ['Bytes: 0'],
      ]);
    });
  });

  describe('handleSuggestIncludes', () => {
    it('should list each candidate with its files and target include', async () => {
      // Arrange
      const suggestIncludes = jest.fn(
        async (_root: string, _options?: IncludeSuggestionOptions): Promise<IncludeCandidate[]> => [
          {
            slug: 'policy',
            text: 'Be kind.\nAlways.',
            chars: 16,
            files: ['content/a.page/index.md', 'content/b.page/index.md'],
          },
        ]
      );
      const container = containerWith({ services: { suggestIncludes } });

      // Act
      await handleSuggestIncludes({ courseRoot }, container);

      // Assert
      expect(suggestIncludes).toHaveBeenCalledWith(courseRoot, expect.objectContaining({ logger: container.logger }));
      expect(fakeConsole.log.mock.calls).toEqual([
        ['Include candidates (1):'],
        ['\npolicy: 2 files, 16 chars'],
        ['  - content/a.page/index.md'],
        ['  - content/b.page/index.md'],
        ['  Preview: "Be kind. Always."'],
        ['  Move to includes/policy.md and write {{include:policy}}'],
        ['\nNo files were modified.'],
      ]);
    });

    it('should say so when nothing repeats', async () => {
      // Arrange
      const container = containerWith();

      // Act
      await handleSuggestIncludes({ courseRoot }, container);

      // Assert
      expect(fakeConsole.log.mock.calls).toEqual([
        ['✓ No repeated prose blocks found (200+ chars in 3+ files or 400+ chars in 2+ files)'],
      ]);
      expect(fakeProcess.exit).not.toHaveBeenCalled();
    });
  });
});
