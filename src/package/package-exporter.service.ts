/**
 * Package Exporter
 *
 * Builds a Common Cartridge archive from the canonical course. The package
 * is derived from scratch on every export:
 *
 *   course -> render bodies (assets rewritten to $IMS-CC-FILEBASE$)
 *          -> per-item resources -> course_settings/* -> imsmanifest.xml
 *
 * Every file written to the archive is listed by some manifest resource.
 */

import * as fs from 'fs';
import * as path from 'path';

import { AmbiguousReferenceError, UnresolvedReferenceError } from '../errors/errors';
import { ASSET_KEY_PREFIX } from '../models/asset.model';
import {
  AssignmentItem,
  ContentItem,
  Course,
  FileItem,
  LinkItem,
  PageItem,
  QuizItem,
} from '../models/content.model';
import {
  CoursePackage,
  ManifestModule,
  ManifestResource,
  PackageFileContent,
} from '../models/package.model';
import { TemplateFragments, renderMarkdownForPlatform } from '../markup/markdown-renderer';
import { IncludeResolver, VariableResolver } from '../markup/placeholder-resolver';
import { splitQuizDescription } from '../parsers/quiz-text-parser';
import { AssetRegistry } from '../registry/asset-registry';
import { RubricStore } from '../registry/rubric-store';
import {
  bankByName,
  indentIn,
  itemsInModule,
  quizPointsPossible,
  resolveRubric,
} from '../utils/content-item-builder';
import { SlugAllocator, shortHash } from '../utils/id-generator';
import { Logger, createLogger } from '../utils/logger';

import { writePackageArchive } from './archive-reader';
import { encodeManifest } from './manifest-codec';
import {
  ASSIGNMENT_GROUPS_PATH,
  COURSE_SETTINGS_PATH,
  FILES_META_PATH,
  MANIFEST_PATH,
  MODULE_CONTENT_TYPES,
  MODULE_META_PATH,
  RESOURCE_TYPES,
  RUBRICS_PATH,
  SENTINEL_CONTENT,
  SENTINEL_PATH,
  WEB_RESOURCES_DIR,
  assignmentHtmlPath,
  assignmentSettingsPath,
  fileBaseUrl,
  flatQtiPath,
  linkPath,
  pagePath,
  quizMetaPath,
  quizQtiPath,
  webResourcePath,
} from './package-layout';
import { EncodedQuestionGroup, encodeAssessment } from './qti-codec';
import {
  AssignmentGroup,
  ModuleMeta,
  encodeAssignmentGroups,
  encodeAssignmentSettings,
  encodeCourseSettings,
  encodeFilesMeta,
  encodeModuleMeta,
  encodePageHtml,
  encodeQuizMeta,
  encodeRubrics,
  encodeWebLink,
} from './settings-codec';

/** An asset file the package should carry */
export interface PackageAsset {
  key: string;
  /** Course-relative path */
  path: string;
  filename: string;
  read(): Promise<Buffer>;
}

/** Finds the file a body reference points at, relative to the item folder */
export type PackageAssetResolver = (reference: string, itemDir: string | undefined) => Promise<PackageAsset | undefined>;

export interface PackageExportOptions {
  identifier?: string;
  template?: TemplateFragments;
  includes?: IncludeResolver;
  variables?: VariableResolver;
  assetResolver?: PackageAssetResolver;
  logger?: Logger;
}

export interface PackageExportResult {
  package: CoursePackage;
  outputPath: string;
  bytes: number;
}

/**
 * Resolve references against the files the course carries in memory: the
 * item folder first, then the course root, then a unique basename under
 * `assets/`.
 */
export function courseAssetResolver(course: Course): PackageAssetResolver {
  const byPath = new Map(course.assets.map(asset => [asset.path, asset]));
  return async (reference, itemDir) => {
    const ref = reference.split(/[?#]/)[0].replace(/^\.\//, '');
    const candidates = [itemDir ? path.posix.normalize(`${itemDir}/${ref}`) : undefined, path.posix.normalize(ref)];
    let found = candidates.flatMap(c => (c && byPath.has(c) ? [byPath.get(c)] : []))[0];
    if (!found && !ref.includes('/')) {
      const matches = course.assets.filter(a => a.path.startsWith('assets/') && path.posix.basename(a.path) === ref);
      found = matches.length === 1 ? matches[0] : undefined;
    }
    if (!found) {
      return undefined;
    }
    const bytes = await found.read();
    return {
      key: `${ASSET_KEY_PREFIX}${shortHash(bytes)}`,
      path: found.path,
      filename: path.posix.basename(found.path),
      read: async () => bytes,
    };
  };
}

/**
 * Resolve references through the asset registry's resolution rules.
 */
export function registryAssetResolver(registry: AssetRegistry, logger?: Logger): PackageAssetResolver {
  return async (reference, itemDir) => {
    try {
      const resolved = registry.resolve(reference, itemDir ?? '.');
      return { key: resolved.key, path: resolved.path, filename: resolved.filename, read: resolved.read };
    } catch (err) {
      if (err instanceof AmbiguousReferenceError || err instanceof UnresolvedReferenceError) {
        logger?.warn(err.message, { reference, itemDir });
        return undefined;
      }
      throw err;
    }
  };
}

class PackageBuilder {
  readonly files = new Map<string, PackageFileContent>();
  readonly resources: ManifestResource[] = [];
  readonly emitted = new Set<string>();
  readonly rubrics = new RubricStore();
  readonly groups = new Map<string, AssignmentGroup>();
  private readonly webResources = new Map<string, string>();
  private readonly slugs = new SlugAllocator();

  constructor(
    private readonly course: Course,
    private readonly options: PackageExportOptions,
    private readonly logger: Logger
  ) {}

  private resolveAsset(reference: string, itemDir: string | undefined): Promise<PackageAsset | undefined> {
    return (this.options.assetResolver ?? courseAssetResolver(this.course))(reference, itemDir);
  }

  addResource(resource: ManifestResource, files: Array<[string, PackageFileContent]>): void {
    for (const [file, content] of files) {
      this.files.set(file, content);
    }
    this.resources.push(resource);
    this.emitted.add(resource.identifier);
  }

  /** Adds the asset once per content key; returns its package path */
  async addAsset(asset: PackageAsset): Promise<string> {
    const existing = this.webResources.get(asset.key);
    if (existing) {
      return existing;
    }
    let packagePath = asset.path.startsWith('assets/')
      ? webResourcePath(asset.path)
      : `${WEB_RESOURCES_DIR}/${asset.key}/${asset.filename}`;
    if (this.files.has(packagePath)) {
      packagePath = `${WEB_RESOURCES_DIR}/${asset.key}/${asset.filename}`;
    }
    this.webResources.set(asset.key, packagePath);
    this.addResource(
      { identifier: asset.key, type: RESOURCE_TYPES.webcontent, href: packagePath, files: [packagePath], dependencies: [] },
      [[packagePath, await asset.read()]]
    );
    return packagePath;
  }

  assetEntries(): Array<{ identifier: string; displayName: string }> {
    return Array.from(this.webResources.entries()).map(([key, packagePath]) => ({
      identifier: key,
      displayName: path.posix.basename(packagePath),
    }));
  }

  async render(item: ContentItem, markdown: string, withTemplate: boolean): Promise<string> {
    const warn = (message: string, context?: Record<string, unknown>): void =>
      this.logger.warn(message, { item: item.id, ...context });
    return renderMarkdownForPlatform(markdown, {
      template: withTemplate ? this.options.template : undefined,
      includes: this.options.includes,
      variables: this.options.variables,
      warn,
      rewriteAsset: async reference => {
        const asset = await this.resolveAsset(reference, item.sourcePath);
        if (!asset) {
          warn(`Asset not found: ${reference}`, { reference });
          return undefined;
        }
        return fileBaseUrl(await this.addAsset(asset));
      },
    });
  }

  async addPage(item: PageItem): Promise<void> {
    const file = pagePath(this.slugs.allocate(item.title));
    const bodyHtml = await this.render(item, item.body, true);
    this.addResource(
      { identifier: item.id, type: RESOURCE_TYPES.webcontent, href: file, files: [file], dependencies: [] },
      [[file, encodePageHtml({ identifier: item.id, title: item.title, published: item.published, bodyHtml })]]
    );
  }

  async addAssignment(item: AssignmentItem): Promise<void> {
    const html = assignmentHtmlPath(item.id, this.slugs.allocate(item.title));
    const settingsFile = assignmentSettingsPath(item.id);
    const bodyHtml = await this.render(item, item.body, true);

    let groupRef: string | undefined;
    const groupTitle = item.settings.assignmentGroup;
    if (groupTitle) {
      groupRef = `g${shortHash(groupTitle)}`;
      if (!this.groups.has(groupRef)) {
        this.groups.set(groupRef, { identifier: groupRef, title: groupTitle, position: this.groups.size + 1 });
      }
    }

    const rubric = resolveRubric(this.course, item);
    if (item.rubric && !rubric) {
      this.logger.warn(`Unknown shared rubric for ${item.title}`, { item: item.id });
    }
    const preferredName = item.rubric?.kind === 'shared' ? item.rubric.name : undefined;
    const rubricRef = rubric ? this.rubrics.add(rubric, item.id, preferredName).key : undefined;

    this.addResource(
      {
        identifier: item.id,
        type: RESOURCE_TYPES.learningApplication,
        href: html,
        files: [html, settingsFile],
        dependencies: [],
      },
      [
        [html, encodePageHtml({ identifier: item.id, title: item.title, published: item.published, bodyHtml })],
        [
          settingsFile,
          encodeAssignmentSettings({
            identifier: item.id,
            title: item.title,
            published: item.published,
            settings: item.settings,
            assignmentGroupRef: groupRef,
            rubricRef,
          }),
        ],
      ]
    );
  }

  async addQuiz(item: QuizItem): Promise<void> {
    const description = item.description || splitQuizDescription(item.body).description;
    const descriptionHtml = description.trim() ? await this.render(item, description, false) : undefined;

    const groups: EncodedQuestionGroup[] = item.questionGroups.flatMap(group => {
      const bank = bankByName(this.course, group.bank);
      if (!bank) {
        this.logger.warn(`Quiz ${item.title} draws from unknown bank "${group.bank}"`, { item: item.id });
        return [];
      }
      return [{ bankId: bank.id, title: group.bank, pick: group.pick, pointsPerQuestion: group.pointsPerQuestion }];
    });

    const pointsPossible = item.settings.pointsPossible ?? quizPointsPossible(item);
    const qti = encodeAssessment({
      identifier: item.id,
      title: item.title,
      placement: 'inline',
      descriptionHtml,
      questions: item.questions,
      groups,
      metadata: {
        cc_maxattempts: item.settings.allowedAttempts,
        qmd_timelimit: item.settings.timeLimit,
        points_possible: pointsPossible,
      },
    });
    const meta = encodeQuizMeta({
      identifier: item.id,
      title: item.title,
      published: item.published,
      descriptionHtml,
      settings: { ...item.settings, pointsPossible },
    });

    const metaId = `${item.id}-meta`;
    this.addResource(
      {
        identifier: item.id,
        type: RESOURCE_TYPES.assessment,
        href: quizQtiPath(item.id),
        files: [quizQtiPath(item.id)],
        dependencies: [metaId],
      },
      [[quizQtiPath(item.id), qti]]
    );
    this.addResource(
      {
        identifier: metaId,
        type: RESOURCE_TYPES.learningApplication,
        href: quizMetaPath(item.id),
        files: [quizMetaPath(item.id), flatQtiPath(item.id)],
        dependencies: [],
      },
      [
        [quizMetaPath(item.id), meta],
        [flatQtiPath(item.id), qti],
      ]
    );
  }

  addLink(item: LinkItem): void {
    const file = linkPath(item.id);
    this.addResource(
      { identifier: item.id, type: RESOURCE_TYPES.webLink, href: file, files: [file], dependencies: [] },
      [[file, encodeWebLink(item.title, item.url, item.newTab)]]
    );
  }

  async addFile(item: FileItem): Promise<void> {
    const asset = await this.resolveAsset(item.filePath, undefined);
    if (!asset) {
      this.logger.warn(`File not found for ${item.title}: ${item.filePath}`, { item: item.id });
      return;
    }
    const packagePath = await this.addAsset(asset);
    this.resources.push({
      identifier: item.id,
      type: RESOURCE_TYPES.webcontent,
      href: packagePath,
      files: [packagePath],
      dependencies: [],
    });
    this.emitted.add(item.id);
  }

  addBanks(): void {
    for (const bank of this.course.banks) {
      const file = flatQtiPath(bank.id);
      this.addResource(
        { identifier: bank.id, type: RESOURCE_TYPES.learningApplication, href: file, files: [file], dependencies: [] },
        [[file, encodeAssessment({ identifier: bank.id, title: bank.title, placement: 'bank', questions: bank.questions })]]
      );
    }
  }

  moduleMeta(): ModuleMeta[] {
    return this.sortedModules().map(module => ({
      identifier: module.id,
      title: module.title,
      position: module.position,
      published: module.published,
      items: itemsInModule(this.course, module)
        .filter(item => this.emitted.has(item.id))
        .map((item, index) => ({
          identifier: `${module.id}-${item.id}`,
          contentType: MODULE_CONTENT_TYPES[item.kind],
          title: item.title,
          identifierRef: item.id,
          url: item.kind === 'link' ? item.url : undefined,
          position: index + 1,
          indent: indentIn(item, module.title),
          published: item.published,
        })),
    }));
  }

  manifestModules(): ManifestModule[] {
    return this.moduleMeta().map(module => ({
      identifier: module.identifier,
      title: module.title,
      items: module.items.map(item => ({
        identifier: item.identifier,
        title: item.title,
        identifierRef: item.identifierRef,
      })),
    }));
  }

  addSettings(identifier: string): void {
    const stored = this.rubrics.all();
    const entries: Array<[string, PackageFileContent]> = [
      [SENTINEL_PATH, SENTINEL_CONTENT],
      [COURSE_SETTINGS_PATH, encodeCourseSettings({ identifier, title: this.course.title, code: this.course.code })],
      [MODULE_META_PATH, encodeModuleMeta(this.moduleMeta())],
      [ASSIGNMENT_GROUPS_PATH, encodeAssignmentGroups(Array.from(this.groups.values()))],
      [FILES_META_PATH, encodeFilesMeta(this.assetEntries())],
      [RUBRICS_PATH, encodeRubrics(stored.map(s => ({ identifier: s.key, rubric: s.rubric })))],
    ];
    this.addResource(
      {
        identifier: `${identifier}-settings`,
        type: RESOURCE_TYPES.learningApplication,
        href: SENTINEL_PATH,
        files: entries.map(([file]) => file),
        dependencies: [],
      },
      entries
    );
  }

  private sortedModules() {
    return [...this.course.modules].sort((a, b) => a.position - b.position);
  }
}

/**
 * Derive the package for a course.
 */
export async function buildCoursePackage(course: Course, options: PackageExportOptions = {}): Promise<CoursePackage> {
  const logger = options.logger ?? createLogger('package-exporter');
  const identifier = options.identifier ?? `c${shortHash(course.title)}`;
  const builder = new PackageBuilder(course, options, logger);

  for (const item of course.items) {
    switch (item.kind) {
      case 'page':
        await builder.addPage(item);
        break;
      case 'assignment':
        await builder.addAssignment(item);
        break;
      case 'quiz':
        await builder.addQuiz(item);
        break;
      case 'link':
        builder.addLink(item);
        break;
      case 'file':
        await builder.addFile(item);
        break;
    }
  }
  builder.addBanks();
  builder.addSettings(identifier);

  logger.info(`Built package for ${course.title}`, {
    resources: builder.resources.length,
    files: builder.files.size,
  });

  return {
    manifest: {
      identifier,
      title: course.title,
      modules: builder.manifestModules(),
      resources: builder.resources,
    },
    files: builder.files,
  };
}

/** Zip a package, manifest included */
export async function packCoursePackage(pkg: CoursePackage): Promise<Buffer> {
  const files = new Map<string, PackageFileContent>([[MANIFEST_PATH, encodeManifest(pkg.manifest)]]);
  for (const [name, content] of pkg.files) {
    files.set(name, content);
  }
  return writePackageArchive(files);
}

/**
 * Build the package and write it to `outputPath`.
 */
export async function exportCoursePackage(
  course: Course,
  outputPath: string,
  options: PackageExportOptions = {}
): Promise<PackageExportResult> {
  const pkg = await buildCoursePackage(course, options);
  const archive = await packCoursePackage(pkg);
  await fs.promises.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  await fs.promises.writeFile(outputPath, archive);
  (options.logger ?? createLogger('package-exporter')).info(`Wrote ${outputPath}`, { bytes: archive.length });
  return { package: pkg, outputPath, bytes: archive.length };
}
