/**
 * Course Sync
 *
 * Keeps a course authored as markdown folders in sync with the learning
 * platform and with Common Cartridge packages.
 *
 * Entry points:
 * - CLI: `course-sync publish | export | import | prune-assets | registry-stats | suggest-includes`
 * - Programmatic: `runPublishPipeline`, `runCourseExport`, `runCourseImport`
 */

// Models
export * from './models/asset.model';
export * from './models/content.model';
export * from './models/package.model';
export * from './models/publish-context.model';

// Errors and logging
export * from './errors/errors';
export { Logger, LogLevel, createLogger } from './utils/logger';

// Author source
export { loadCourse, LoadCourseOptions, LoadedCourse, ItemRenderHints } from './services/course-loader.service';
export { writeCourseSource, WriteSourceOptions, WriteSourceResult } from './services/course-writer.service';
export { CourseConfig, loadCourseConfig, createCanvasClient } from './services/config.service';
export { suggestIncludes, IncludeCandidate, IncludeSuggestionOptions } from './services/include-suggestions.service';

// Assets
export { AssetRegistry, AssetRegistryOptions } from './registry/asset-registry';

// Rendering
export { markdownToHtml, renderMarkdownForPlatform } from './markup/markdown-renderer';
export { htmlToMarkdown } from './markup/html-to-markdown';

// Packages
export { exportCoursePackage, buildCoursePackage, PackageExportOptions } from './package/package-exporter.service';
export { importCoursePackage, PackageImportOptions } from './package/package-importer.service';

// Platform
export { CanvasClient, CanvasClientConfig } from './remote/canvas-client.service';
export { RemotePublisher, RemoteCourseReader } from './remote/remote.types';
export { importRemoteCourse } from './remote/remote-importer.service';

// Pipelines
export { runPublishPipeline } from './services/publish-pipeline.service';
export { runCourseExport, CourseExportOptions, CourseExportResult } from './services/course-export.service';
export { runCourseImport, CourseImportOptions, CourseImportResult, isRemoteCourseId } from './services/course-import.service';
