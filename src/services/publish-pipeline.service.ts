/**
 * Publish Pipeline Service
 *
 * Pushes author source to the platform:
 * 1. load-registry  read the asset registry
 * 2. parse          load the course from author source
 * 3. render-upload  render every item, uploading the assets it references
 * 4. remote-sync    upsert items, then bring modules in line
 * 5. prune          (optional) drop registry records whose files are gone
 * 6. package        (optional) also write a package
 * 7. save-registry  always, even when a stage fails
 *
 * Author source files are only ever read.
 */

import * as path from 'path';

import { AmbiguousReferenceError, UnresolvedReferenceError } from '../errors/errors';
import { TemplateFragments, loadTemplateFragments, markdownToHtml, renderMarkdownForPlatform } from '../markup/markdown-renderer';
import {
  AssetRewriter,
  IncludeResolver,
  chainResolvers,
  createFileIncludeResolver,
  createMapResolver,
} from '../markup/placeholder-resolver';
import { AssetSource, RemoteDescriptor } from '../models/asset.model';
import { ContentItem, Course } from '../models/content.model';
import {
  PublishContext,
  PublishItemResult,
  PublishOptions,
  PublishResult,
} from '../models/publish-context.model';
import { exportCoursePackage } from '../package/package-exporter.service';
import { AssetRegistry } from '../registry/asset-registry';
import { ModulePlan, RemoteRef } from '../remote/remote.types';
import { indentIn, itemsInModule, resolveRubric } from '../utils/content-item-builder';
import { Logger, createLogger } from '../utils/logger';
import { RunCache } from '../utils/run-cache';

import { CourseConfig, INCLUDES_DIR, TEMPLATES_DIR, loadCourseConfig, loadCourseTemplate } from './config.service';
import { loadCourseRegistry, packageOptionsFor } from './course-export.service';
import { ItemRenderHints, loadCourse } from './course-loader.service';

interface Renderer {
  /** Rendered item body (or quiz description) */
  html(item: ContentItem): Promise<string>;
  /** Upload what `reference` points at from `itemDir`; undefined when it does not resolve */
  uploadReference(reference: string, itemDir: string, item: ContentItem): Promise<RemoteDescriptor | undefined>;
  cache: RunCache<string>;
}

function createRenderer(
  context: PublishContext,
  config: CourseConfig,
  registry: AssetRegistry,
  renderHints: Map<string, ItemRenderHints>,
  logger: Logger
): Renderer {
  const { publisher } = context.options;
  const cache = new RunCache<string>('rendered-html');
  const courseTemplate = loadCourseTemplate(config);
  const templates = new Map<string, TemplateFragments>();
  const includes: IncludeResolver = createFileIncludeResolver(path.join(config.courseRoot, INCLUDES_DIR));
  const courseVariables = createMapResolver(config.variables);

  const warn = (message: string, ctx?: Record<string, unknown>): void => {
    context.warnings.push(message);
    logger.warn(message, ctx);
  };

  const upload = (source: AssetSource) => {
    context.uploads++;
    return publisher.uploadFile(source);
  };

  const templateFor = (name: string | undefined): TemplateFragments => {
    if (!name || name === config.template) {
      return courseTemplate;
    }
    let fragments = templates.get(name);
    if (!fragments) {
      fragments = loadTemplateFragments(path.join(config.courseRoot, TEMPLATES_DIR, name));
      templates.set(name, fragments);
    }
    return fragments;
  };

  const uploadReference = async (
    reference: string,
    itemDir: string,
    item: ContentItem
  ): Promise<RemoteDescriptor | undefined> => {
    try {
      const resolved = registry.resolve(reference, itemDir);
      return await registry.ensureUploaded(resolved.key, resolved, upload);
    } catch (err) {
      if (err instanceof AmbiguousReferenceError || err instanceof UnresolvedReferenceError) {
        warn(`${item.title}: ${err.message}`, { itemId: item.id, reference });
        return undefined;
      }
      throw err;
    }
  };

  const rewriterFor =
    (item: ContentItem): AssetRewriter =>
    async reference =>
      (await uploadReference(reference, item.sourcePath ?? '.', item))?.locator;

  const html = (item: ContentItem): Promise<string> =>
    cache.getOrCompute(item.id, () => {
      const hints = renderHints.get(item.id);
      const isQuiz = item.kind === 'quiz';
      return renderMarkdownForPlatform(isQuiz ? item.description : item.body, {
        template: isQuiz ? undefined : templateFor(hints?.template),
        includes,
        variables: chainResolvers(hints ? createMapResolver(hints.variables) : undefined, courseVariables),
        rewriteAsset: rewriterFor(item),
        warn,
      });
    });

  return { html, uploadReference, cache };
}

/**
 * Upload the file behind a file item. The path is course-relative.
 */
async function uploadFileItem(
  item: Extract<ContentItem, { kind: 'file' }>,
  renderer: Renderer
): Promise<RemoteRef | undefined> {
  const descriptor = await renderer.uploadReference(item.filePath, '.', item);
  return descriptor && { remoteId: descriptor.remoteId };
}

type PendingUpsert = (item: ContentItem) => Promise<RemoteRef | undefined>;

function createUpserter(
  course: Course,
  options: PublishOptions,
  rendered: Map<string, string>,
  files: Map<string, RemoteRef>
): PendingUpsert {
  const { publisher } = options;
  return async item => {
    const html = rendered.get(item.id) ?? '';
    switch (item.kind) {
      case 'page':
        return publisher.upsertPage({ id: item.id, title: item.title, html, published: item.published });

      case 'assignment':
        return publisher.upsertAssignment({
          id: item.id,
          title: item.title,
          html,
          published: item.published,
          settings: item.settings,
          rubric: resolveRubric(course, item),
        });

      case 'quiz':
        return publisher.upsertQuiz({
          id: item.id,
          title: item.title,
          descriptionHtml: html,
          published: item.published,
          settings: item.settings,
          questions: item.questions.map(question => ({ ...question, stem: markdownToHtml(question.stem) })),
          groups: item.questionGroups.map(group => ({
            name: group.bank,
            pick: group.pick,
            pointsPerQuestion: group.pointsPerQuestion,
          })),
        });

      case 'link':
        return publisher.upsertLink({ id: item.id, title: item.title, url: item.url, newTab: item.newTab });

      case 'file':
        return files.get(item.id);
    }
  };
}

function modulePlans(course: Course, refs: Map<string, RemoteRef>): ModulePlan[] {
  return [...course.modules]
    .sort((a, b) => a.position - b.position)
    .map(module => ({
      title: module.title,
      position: module.position,
      published: module.published,
      items: itemsInModule(course, module).flatMap(item => {
        const remote = refs.get(item.id);
        if (!remote) {
          return [];
        }
        return [
          {
            title: item.title,
            kind: item.kind,
            remote,
            indent: indentIn(item, module.title),
            url: item.kind === 'link' ? item.url : undefined,
            newTab: item.kind === 'link' ? item.newTab : undefined,
          },
        ];
      }),
    }));
}

/**
 * Run the publish pipeline.
 * @throws RemoteOperationError when the platform rejects a call; the registry is still saved
 */
export async function runPublishPipeline(options: PublishOptions): Promise<PublishResult> {
  const startedAt = new Date().toISOString();
  const logger = options.logger ?? createLogger('publish');
  const context: PublishContext = { options, stage: 'load-registry', warnings: [], uploads: 0 };
  const config = options.config ?? loadCourseConfig(options.courseRoot);

  const registry = loadCourseRegistry(config, logger);

  let renderer: Renderer | undefined;
  try {
    context.stage = 'parse';
    const { course, errors, renderHints } = await loadCourse(config.courseRoot, {
      title: config.title,
      sharedAssetsDir: config.sharedAssetsDir,
      logger,
    });

    context.stage = 'render-upload';
    const active = createRenderer(context, config, registry, renderHints, logger);
    renderer = active;
    const rendered = new Map<string, string>();
    const files = new Map<string, RemoteRef>();
    // Every upload settles before a failure propagates, so the registry saved
    // below records each upload that reached the platform.
    const settled = await Promise.allSettled(
      course.items.map(async item => {
        if (item.kind === 'file') {
          const ref = await uploadFileItem(item, active);
          if (ref) {
            files.set(item.id, ref);
          }
        } else if (item.kind !== 'link') {
          rendered.set(item.id, await active.html(item));
        }
      })
    );
    const failure = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    if (failure) {
      throw failure.reason;
    }
    logger.info(`Rendered ${rendered.size} items`, { uploads: context.uploads });

    context.stage = 'remote-sync';
    const upsert = createUpserter(course, options, rendered, files);
    const refs = new Map<string, RemoteRef>();
    const items: PublishItemResult[] = [];
    for (const item of course.items) {
      const ref = await upsert(item);
      if (ref) {
        refs.set(item.id, ref);
        items.push({ id: item.id, kind: item.kind, title: item.title, remoteId: ref.remoteId });
      }
    }
    await options.publisher.syncModules(modulePlans(course, refs));

    const result: PublishResult = {
      startedAt,
      completedAt: '',
      items,
      uploads: context.uploads,
      errors: errors.map(err => err.message),
      warnings: context.warnings,
    };

    if (options.prune) {
      context.stage = 'prune';
      result.pruned = registry.prune();
    }

    if (options.packagePath) {
      context.stage = 'package';
      const exported = await exportCoursePackage(course, options.packagePath, packageOptionsFor(config, registry, logger));
      result.packagePath = exported.outputPath;
      result.packageBytes = exported.bytes;
    }

    context.stage = 'complete';
    result.completedAt = new Date().toISOString();
    logger.info(`Published ${items.length} items`, {
      uploads: result.uploads,
      errors: result.errors.length,
      warnings: result.warnings.length,
    });
    return result;
  } catch (err) {
    logger.error(`Publish failed during ${context.stage}`, err);
    throw err;
  } finally {
    context.stage = 'save-registry';
    registry.save();
    if (renderer && options.cacheDumpPath) {
      await renderer.cache.dump(options.cacheDumpPath);
    }
  }
}
