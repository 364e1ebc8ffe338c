/**
 * Sync Command Handlers
 *
 * Business logic for the course-sync CLI commands.
 * Handlers accept services via dependency injection for testability.
 */

import * as path from 'path';

import { toError } from '../../errors/errors';
import { INCLUDES_DIR } from '../../services/config.service';
import { INCLUDE_THRESHOLDS } from '../../services/include-suggestions.service';
import { ServiceContainer } from '../service-container';

export interface CourseRootOptions {
  courseRoot: string;
}

export interface PublishCommandOptions extends CourseRootOptions {
  prune: boolean;
  package?: string;
}

export interface ExportCommandOptions extends CourseRootOptions {
  output?: string;
  title?: string;
}

export interface ImportCommandOptions {
  output: string;
}

function listProblems(container: ServiceContainer, heading: string, problems: string[]): void {
  if (problems.length === 0) {
    return;
  }
  container.console.log(heading);
  for (const problem of problems) {
    container.console.log(`  - ${problem}`);
  }
}

function fail(container: ServiceContainer, action: string, err: unknown): void {
  container.console.error(`\n✗ ${action} failed: ${toError(err).message}`);
  container.process.exit(1);
}

/**
 * Handle publish command
 */
export async function handlePublish(options: PublishCommandOptions, container: ServiceContainer): Promise<void> {
  const { services, logger } = container;
  const courseRoot = path.resolve(options.courseRoot);

  try {
    const config = services.loadCourseConfig(courseRoot, container.process.env);
    const publisher = services.createCanvasClient(config, { logger });
    const result = await services.runPublishPipeline({
      courseRoot,
      publisher,
      config,
      prune: options.prune,
      packagePath: options.package ? path.resolve(options.package) : undefined,
      logger,
    });

    container.console.log(`✓ Published ${result.items.length} items`);
    container.console.log(`  Uploads: ${result.uploads}`);
    if (result.pruned !== undefined) {
      container.console.log(`  Pruned registry records: ${result.pruned}`);
    }
    if (result.packagePath) {
      container.console.log(`  Package: ${result.packagePath} (${result.packageBytes ?? 0} bytes)`);
    }
    listProblems(container, 'Warnings:', result.warnings);
    if (result.errors.length > 0) {
      listProblems(container, `Skipped ${result.errors.length} invalid items:`, result.errors);
      container.process.exit(1);
    }
  } catch (err) {
    fail(container, 'Publish', err);
  }
}

/**
 * Handle export command
 */
export async function handleExport(options: ExportCommandOptions, container: ServiceContainer): Promise<void> {
  const { services, logger } = container;
  const courseRoot = path.resolve(options.courseRoot);

  try {
    const result = await services.runCourseExport({
      courseRoot,
      outputPath: options.output ? path.resolve(options.output) : undefined,
      title: options.title,
      config: services.loadCourseConfig(courseRoot, container.process.env),
      logger,
    });

    container.console.log(`✓ Exported ${result.items} items to ${result.outputPath} (${result.bytes} bytes)`);
    if (result.errors.length > 0) {
      listProblems(container, `Skipped ${result.errors.length} invalid items:`, result.errors);
      container.process.exit(1);
    }
  } catch (err) {
    fail(container, 'Export', err);
  }
}

/**
 * Handle import command. A numeric source is a remote course id.
 */
export async function handleImport(
  source: string,
  options: ImportCommandOptions,
  container: ServiceContainer
): Promise<void> {
  const { services, logger } = container;
  const outputDir = path.resolve(options.output);

  try {
    const result = await services.runCourseImport({
      source,
      outputDir,
      config: services.loadCourseConfig(outputDir, container.process.env),
      logger,
    });

    container.console.log(`✓ Imported ${result.title} (${result.items} items) into ${outputDir}`);
    container.console.log(`  Files written: ${result.written.length}`);
    listProblems(container, 'Warnings:', result.warnings);
    listProblems(
      container,
      'Skipped resources:',
      result.skipped.map(skipped => `${skipped.identifier} (${skipped.kind}): ${skipped.reason}`)
    );
  } catch (err) {
    fail(container, 'Import', err);
  }
}

/**
 * Handle prune-assets command
 */
export function handlePruneAssets(options: CourseRootOptions, container: ServiceContainer): void {
  const { services, logger } = container;

  try {
    const config = services.loadCourseConfig(path.resolve(options.courseRoot), container.process.env);
    const registry = services.loadRegistry(config, logger);
    const removed = registry.prune();
    registry.save();
    container.console.log(`✓ Removed ${removed} registry records`);
  } catch (err) {
    fail(container, 'Prune', err);
  }
}

/**
 * Handle registry-stats command
 */
export function handleRegistryStats(options: CourseRootOptions, container: ServiceContainer): void {
  const { services, logger } = container;

  try {
    const config = services.loadCourseConfig(path.resolve(options.courseRoot), container.process.env);
    const stats = services.loadRegistry(config, logger).stats();

    container.console.log('Asset Registry');
    container.console.log('==============');
    container.console.log(`Assets: ${stats.totalAssets}`);
    container.console.log(`Path spellings: ${stats.totalPaths}`);
    container.console.log(`Bytes: ${stats.totalBytes}`);
  } catch (err) {
    fail(container, 'Registry stats', err);
  }
}

/**
 * Handle suggest-includes command. Reports only; no file is changed.
 */
export async function handleSuggestIncludes(options: CourseRootOptions, container: ServiceContainer): Promise<void> {
  const { services, logger } = container;

  try {
    const candidates = await services.suggestIncludes(path.resolve(options.courseRoot), { logger });
    if (candidates.length === 0) {
      const thresholds = INCLUDE_THRESHOLDS.map(t => `${t.minChars}+ chars in ${t.minFiles}+ files`).join(' or ');
      container.console.log(`✓ No repeated prose blocks found (${thresholds})`);
      return;
    }

    container.console.log(`Include candidates (${candidates.length}):`);
    for (const candidate of candidates) {
      const preview = candidate.text.length > 120 ? `${candidate.text.slice(0, 120)}…` : candidate.text;
      container.console.log(`\n${candidate.slug}: ${candidate.files.length} files, ${candidate.chars} chars`);
      for (const file of candidate.files) {
        container.console.log(`  - ${file}`);
      }
      container.console.log(`  Preview: "${preview.replace(/\n/g, ' ')}"`);
      container.console.log(`  Move to ${INCLUDES_DIR}/${candidate.slug}.md and write {{include:${candidate.slug}}}`);
    }
    container.console.log('\nNo files were modified.');
  } catch (err) {
    fail(container, 'Suggest includes', err);
  }
}
