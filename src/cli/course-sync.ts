#!/usr/bin/env node
/**
 * Course Sync CLI
 *
 * Usage:
 *   course-sync publish --course-root ./my-course --prune
 *   course-sync export --output ./dist/course.imscc
 *   course-sync import ./course.imscc --output ./my-course
 *   course-sync import 1234 --output ./my-course   # remote course id
 *   course-sync prune-assets
 *   course-sync registry-stats
 *   course-sync suggest-includes --course-root ./my-course
 *
 * Platform credentials come from CANVAS_API_URL and CANVAS_API_TOKEN.
 */

import { Command } from 'commander';

import {
  CourseRootOptions,
  ExportCommandOptions,
  ImportCommandOptions,
  PublishCommandOptions,
  handleExport,
  handleImport,
  handlePruneAssets,
  handlePublish,
  handleRegistryStats,
  handleSuggestIncludes,
} from './handlers/sync-handlers';
import { ServiceContainer } from './service-container';

export function createProgram(container: ServiceContainer = new ServiceContainer()): Command {
  const program = new Command();

  program
    .name('course-sync')
    .description('Keep a course authored as files in sync with the learning platform')
    .version('1.0.0');

  program
    .command('publish')
    .description('Render the course, upload its assets and update the remote course')
    .option('-c, --course-root <dir>', 'Course source directory', '.')
    .option('--prune', 'Drop registry records whose files are gone', false)
    .option('-p, --package <file>', 'Also write a package archive')
    .action(async (options: PublishCommandOptions) => {
      await handlePublish(options, container);
    });

  program
    .command('export')
    .description('Write the course as a package archive')
    .option('-c, --course-root <dir>', 'Course source directory', '.')
    .option('-o, --output <file>', 'Archive path (default: <title>.imscc)')
    .option('-t, --title <title>', 'Course title for the package')
    .action(async (options: ExportCommandOptions) => {
      await handleExport(options, container);
    });

  program
    .command('import <source>')
    .description('Write a package archive or a remote course (numeric id) back as course source')
    .option('-o, --output <dir>', 'Directory to write the course source into', '.')
    .action(async (source: string, options: ImportCommandOptions) => {
      await handleImport(source, options, container);
    });

  program
    .command('prune-assets')
    .description('Remove registry records for assets that no longer exist')
    .option('-c, --course-root <dir>', 'Course source directory', '.')
    .action((options: CourseRootOptions) => {
      handlePruneAssets(options, container);
    });

  program
    .command('registry-stats')
    .description('Show asset registry statistics')
    .option('-c, --course-root <dir>', 'Course source directory', '.')
    .action((options: CourseRootOptions) => {
      handleRegistryStats(options, container);
    });

  program
    .command('suggest-includes')
    .description('Report paragraphs repeated across pages and assignments that could become includes')
    .option('-c, --course-root <dir>', 'Course source directory', '.')
    .action(async (options: CourseRootOptions) => {
      await handleSuggestIncludes(options, container);
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
}
