/**
 * Course Export Service
 *
 * Author source -> package archive, without touching the platform.
 */

import * as path from 'path';

import { createFileIncludeResolver, createMapResolver } from '../markup/placeholder-resolver';
import { PackageExportOptions, exportCoursePackage, registryAssetResolver } from '../package/package-exporter.service';
import { AssetRegistry } from '../registry/asset-registry';
import { Logger, createLogger } from '../utils/logger';
import { sanitizeFilename } from '../utils/text-formatters';

import { CourseConfig, INCLUDES_DIR, loadCourseConfig, loadCourseTemplate } from './config.service';
import { loadCourse } from './course-loader.service';

export const PACKAGE_EXTENSION = '.imscc';

export interface CourseExportOptions {
  courseRoot: string;
  /** Defaults to `<course title>.imscc` in the working directory */
  outputPath?: string;
  /** Overrides the course.yaml title */
  title?: string;
  config?: CourseConfig;
  logger?: Logger;
}

export interface CourseExportResult {
  outputPath: string;
  bytes: number;
  items: number;
  /** Items skipped by the loader, as messages */
  errors: string[];
}

/** Course registry, loaded from its configured location */
export function loadCourseRegistry(config: CourseConfig, logger?: Logger): AssetRegistry {
  return AssetRegistry.load({
    courseRoot: config.courseRoot,
    sharedAssetsDir: config.sharedAssetsDir,
    registryPath: config.registryPath,
    logger,
  });
}

/**
 * Package options for a course: its template, includes and variables, with
 * references resolved the way the registry resolves them.
 */
export function packageOptionsFor(config: CourseConfig, registry: AssetRegistry, logger: Logger): PackageExportOptions {
  return {
    template: loadCourseTemplate(config),
    includes: createFileIncludeResolver(path.join(config.courseRoot, INCLUDES_DIR)),
    variables: createMapResolver(config.variables),
    assetResolver: registryAssetResolver(registry, logger),
    logger,
  };
}

export async function runCourseExport(options: CourseExportOptions): Promise<CourseExportResult> {
  const logger = options.logger ?? createLogger('export');
  const config = options.config ?? loadCourseConfig(options.courseRoot);
  const { course, errors } = await loadCourse(config.courseRoot, {
    title: options.title ?? config.title,
    sharedAssetsDir: config.sharedAssetsDir,
    logger,
  });

  const outputPath = path.resolve(options.outputPath ?? `${sanitizeFilename(course.title)}${PACKAGE_EXTENSION}`);
  const registry = loadCourseRegistry(config, logger);
  const exported = await exportCoursePackage(course, outputPath, packageOptionsFor(config, registry, logger));

  return {
    outputPath: exported.outputPath,
    bytes: exported.bytes,
    items: course.items.length,
    errors: errors.map(err => err.message),
  };
}
