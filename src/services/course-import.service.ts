/**
 * Course Import Service
 *
 * Import mode: turn a package archive or a live platform course into author
 * source. Nothing is written until the whole source has been decoded, so a
 * malformed archive leaves the output folder untouched.
 */

import * as path from 'path';

import { SkippedResource } from '../models/package.model';
import { importCoursePackage } from '../package/package-importer.service';
import { AssetRegistry } from '../registry/asset-registry';
import { importRemoteCourse, registryPathResolver } from '../remote/remote-importer.service';
import { RemoteCourseReader } from '../remote/remote.types';
import { Logger, createLogger } from '../utils/logger';

import { CourseConfig, createCanvasClient, loadCourseConfig, loadCourseTemplate } from './config.service';
import { writeCourseSource } from './course-writer.service';

export interface CourseImportOptions {
  /** Archive path, or a numeric remote course id */
  source: string;

  /** Folder the author source is written to */
  outputDir: string;

  /** Settings of the output course; defaults to its course.yaml plus the environment */
  config?: CourseConfig;

  /** Reader for remote imports; defaults to a client built from the config */
  reader?: RemoteCourseReader;

  logger?: Logger;
}

export interface CourseImportResult {
  origin: 'package' | 'remote';
  title: string;
  items: number;
  written: string[];
  skipped: SkippedResource[];
  warnings: string[];
}

/** A numeric source names a remote course */
export function isRemoteCourseId(source: string): boolean {
  return /^\d+$/.test(source.trim());
}

/**
 * Import `source` and write it as author source under `outputDir`.
 * @throws ArchiveFormatError when the archive cannot be read
 * @throws RemoteOperationError when the platform rejects a call
 */
export async function runCourseImport(options: CourseImportOptions): Promise<CourseImportResult> {
  const logger = options.logger ?? createLogger('import');
  const outputDir = path.resolve(options.outputDir);
  const config = options.config ?? loadCourseConfig(outputDir);
  const template = loadCourseTemplate(config);

  if (isRemoteCourseId(options.source)) {
    const courseId = options.source.trim();
    const reader = options.reader ?? createCanvasClient(config, { courseId, logger });
    // Files uploaded from this folder before map back to their local paths
    const registry = AssetRegistry.load({
      courseRoot: outputDir,
      sharedAssetsDir: config.sharedAssetsDir,
      registryPath: config.registryPath,
      logger,
    });
    const outcome = await importRemoteCourse(reader, courseId, {
      template,
      resolveAssetPath: registryPathResolver(registry),
      logger,
    });
    const { written } = await writeCourseSource(outcome.course, outputDir, { logger });
    return {
      origin: 'remote',
      title: outcome.course.title,
      items: outcome.course.items.length,
      written,
      skipped: [],
      warnings: outcome.warnings,
    };
  }

  const outcome = await importCoursePackage(options.source, { template, logger });
  const { written } = await writeCourseSource(outcome.course, outputDir, { logger });
  if (outcome.skipped.length > 0) {
    logger.warn(`Skipped ${outcome.skipped.length} resources`, {
      identifiers: outcome.skipped.map(skipped => skipped.identifier),
    });
  }
  return {
    origin: 'package',
    title: outcome.course.title,
    items: outcome.course.items.length,
    written,
    skipped: outcome.skipped,
    warnings: outcome.warnings,
  };
}
