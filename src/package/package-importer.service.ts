/**
 * Package Importer
 *
 * Reconstructs the canonical course from a Common Cartridge archive.
 *
 *   extract -> parse-manifest -> decode-resources -> resolve-modules
 *           -> resolve-rubrics -> done
 *
 * Archives carrying the platform's export sentinel are read the way the
 * platform itself reads them (platform mode): the course settings file must
 * be listed, quizzes come only from their flat QTI index and pages must
 * carry an identifier marker matching their resource. Other archives are
 * read from their structured files (generic mode).
 */

import * as fs from 'fs';
import * as path from 'path';

import {
  ArchiveFormatError,
  CourseSyncError,
  ResourceDecodeError,
  toError,
} from '../errors/errors';
import { AssetFile, ContentItem, Course, QuizItem, Rubric, createEmptyCourse } from '../models/content.model';
import {
  ImportOutcome,
  ImportStage,
  ManifestResource,
  PackageManifest,
  ResourceKind,
  SkippedResource,
} from '../models/package.model';
import { convertPlatformHtmlToMarkdown, fileBasePath, htmlToMarkdown } from '../markup/html-to-markdown';
import { TemplateFragments } from '../markup/markdown-renderer';
import { renderQuizText } from '../parsers/quiz-text-parser';
import { promoteSharedRubrics } from '../registry/rubric-store';
import {
  buildAssignment,
  buildFile,
  buildLink,
  buildPage,
  buildQuestionBank,
  buildQuiz,
  findItem,
} from '../utils/content-item-builder';
import { deriveItemId, isValidIdentifier } from '../utils/id-generator';
import { Logger, createLogger } from '../utils/logger';

import { ArchiveReadOptions, readPackageArchive } from './archive-reader';
import { decodeManifest, listedFiles } from './manifest-codec';
import {
  ASSIGNMENT_GROUPS_PATH,
  COURSE_SETTINGS_PATH,
  MANIFEST_PATH,
  MODULE_CONTENT_TYPES,
  MODULE_META_PATH,
  PLACEMENT_FIELD,
  Placement,
  RUBRICS_PATH,
  SENTINEL_PATH,
  assetPathFromWebResource,
  flatQtiPath,
  quizMetaPath,
} from './package-layout';
import { DecodedAssessment, decodeAssessment } from './qti-codec';
import { DEFAULT_MATCHERS, ResourceMatcher, classifyResource } from './resource-classifier';
import {
  ModuleMeta,
  QuizMetaDocument,
  decodeAssignmentGroups,
  decodeAssignmentSettings,
  decodeCourseSettings,
  decodeModuleMeta,
  decodePageHtml,
  decodeQuizMeta,
  decodeRubricDocument,
  decodeRubrics,
  decodeWebLink,
} from './settings-codec';

export interface PackageImportOptions extends ArchiveReadOptions {
  /** Template to strip from page and assignment bodies */
  template?: TemplateFragments;
  matchers?: readonly ResourceMatcher[];
  logger?: Logger;
}

const BANK_KEYWORDS = /bank|pool/i;

/**
 * bank or inline: the placement flag when present, otherwise an objectbank
 * root or a bank keyword in the identifier or title means bank.
 */
export function decidePlacement(decoded: DecodedAssessment): Placement {
  const flag = decoded.metadata[PLACEMENT_FIELD];
  if (flag === 'bank' || flag === 'inline') {
    return flag;
  }
  if (decoded.structure === 'bank' || BANK_KEYWORDS.test(decoded.identifier) || BANK_KEYWORDS.test(decoded.title)) {
    return 'bank';
  }
  return 'inline';
}

function decodeText(content: Buffer | string): string {
  const text = typeof content === 'string' ? content : content.toString('utf-8');
  return text.replace(/^﻿/, '');
}

class PackageDecoder {
  stage: ImportStage = 'parse-manifest';
  readonly skipped: SkippedResource[] = [];
  readonly warnings: string[] = [];
  private course: Course = createEmptyCourse('');
  private manifest: PackageManifest = { identifier: '', title: '', modules: [], resources: [] };
  private platformMode = false;
  private assignmentGroups = new Map<string, string>();
  private rubricsById = new Map<string, Rubric>();
  private moduleMeta: ModuleMeta[] | undefined;
  private readonly assetResources = new Map<string, string>();
  private readonly pendingGroups = new Map<string, Array<{ bankId?: string; title: string }>>();

  constructor(
    private readonly files: Map<string, Buffer | string>,
    private readonly options: PackageImportOptions,
    private readonly logger: Logger
  ) {}

  run(): ImportOutcome {
    this.parseManifest();
    this.enter('decode-resources');
    this.decodeResources();
    this.enter('resolve-modules');
    this.resolveModules();
    this.enter('resolve-rubrics');
    this.resolveRubrics();
    this.enter('done');

    this.logger.info(`Imported ${this.course.title}`, {
      items: this.course.items.length,
      banks: this.course.banks.length,
      modules: this.course.modules.length,
      skipped: this.skipped.length,
      platformMode: this.platformMode,
    });
    return { course: this.course, skipped: this.skipped, warnings: this.warnings, platformMode: this.platformMode };
  }

  private enter(stage: ImportStage): void {
    this.stage = stage;
    this.logger.debug(`Import stage: ${stage}`);
  }

  private warn(message: string, context: Record<string, unknown> = {}): void {
    this.warnings.push(message);
    this.logger.warn(message, context);
  }

  private text(file: string): string | undefined {
    const content = this.files.get(file);
    return content === undefined ? undefined : decodeText(content);
  }

  private requireText(file: string | undefined, resourceId: string): string {
    const content = file ? this.text(file) : undefined;
    if (content === undefined) {
      throw new ResourceDecodeError(`File ${file ?? '(none)'} is missing from the archive`, resourceId);
    }
    return content;
  }

  /** Optional auxiliary file; a broken one is a warning */
  private auxiliary<T>(file: string, decode: (xml: string) => T): T | undefined {
    const xml = this.text(file);
    if (xml === undefined) {
      return undefined;
    }
    try {
      return decode(xml);
    } catch (err) {
      this.warn(`Ignoring unreadable ${file}: ${toError(err).message}`, { file });
      return undefined;
    }
  }

  private parseManifest(): void {
    const xml = this.text(MANIFEST_PATH);
    if (xml === undefined) {
      throw new ArchiveFormatError('Archive has no imsmanifest.xml');
    }
    try {
      this.manifest = decodeManifest(xml);
    } catch (err) {
      throw new ArchiveFormatError('imsmanifest.xml could not be parsed', {}, toError(err));
    }

    this.platformMode = this.files.has(SENTINEL_PATH);
    if (this.platformMode && !listedFiles(this.manifest).has(COURSE_SETTINGS_PATH)) {
      throw new ArchiveFormatError(`${COURSE_SETTINGS_PATH} is not listed in the manifest`, {
        sentinel: SENTINEL_PATH,
      });
    }

    const settings = this.auxiliary(COURSE_SETTINGS_PATH, decodeCourseSettings);
    this.course = createEmptyCourse(settings?.title || this.manifest.title || 'Imported course');
    this.course.code = settings?.code;
    this.assignmentGroups = this.auxiliary(ASSIGNMENT_GROUPS_PATH, decodeAssignmentGroups) ?? new Map();
    this.rubricsById = this.auxiliary(RUBRICS_PATH, decodeRubrics) ?? new Map();
    this.moduleMeta = this.auxiliary(MODULE_META_PATH, decodeModuleMeta);
  }

  private decodeResources(): void {
    for (const resource of this.manifest.resources) {
      const { kind, signal } = classifyResource(resource, this.options.matchers ?? DEFAULT_MATCHERS);
      this.logger.debug(`Resource ${resource.identifier} is ${kind}`, { signal });
      try {
        this.decodeResource(resource, kind);
      } catch (err) {
        const error = toError(err);
        const reason = error instanceof CourseSyncError ? error.message : `${kind} could not be decoded: ${error.message}`;
        this.skipped.push({ identifier: resource.identifier, kind, reason });
        this.logger.warn(`Skipped resource ${resource.identifier}`, { kind, reason });
      }
    }

    for (const [quizId, groups] of this.pendingGroups) {
      const quiz = findItem(this.course, quizId);
      if (quiz?.kind !== 'quiz') {
        continue;
      }
      quiz.questionGroups = quiz.questionGroups.map((group, i) => {
        const bankId = groups[i]?.bankId;
        const bank = bankId ? this.course.banks.find(b => b.id === bankId) : undefined;
        return bank ? { ...group, bank: bank.title } : group;
      });
    }
  }

  private decodeResource(resource: ManifestResource, kind: ResourceKind): void {
    switch (kind) {
      case 'page':
        this.course.items.push(this.decodePage(resource));
        return;
      case 'assignment':
        this.course.items.push(this.decodeAssignment(resource));
        return;
      case 'quiz':
        this.decodeQuiz(resource);
        return;
      case 'question-bank':
        this.decodeBank(resource);
        return;
      case 'link': {
        const file = resource.href ?? resource.files[0];
        const link = decodeWebLink(this.requireText(file, resource.identifier), file ?? resource.identifier);
        this.course.items.push(
          buildLink({ id: resource.identifier, title: link.title || link.url, url: link.url, newTab: link.newTab, published: true })
        );
        return;
      }
      case 'asset':
        this.registerAsset(resource);
        return;
      case 'course-settings':
      case 'quiz-meta':
        return;
      case 'unknown':
        throw new ResourceDecodeError(`Unrecognised resource type "${resource.type}"`, resource.identifier);
    }
  }

  private bodyToMarkdown(html: string): string {
    return convertPlatformHtmlToMarkdown(html, {
      template: this.options.template,
      resolveAssetPath: url => {
        const relative = fileBasePath(url);
        return relative === undefined ? undefined : `assets/${relative}`;
      },
    }).markdown;
  }

  private decodePage(resource: ManifestResource): ContentItem {
    const html = this.requireText(resource.href, resource.identifier);
    const head = decodePageHtml(html);
    if (this.platformMode && head.identifier !== resource.identifier) {
      throw new ResourceDecodeError(
        `Page identifier marker "${head.identifier ?? ''}" does not match resource ${resource.identifier}`,
        resource.identifier
      );
    }
    return buildPage({
      id: resource.identifier,
      title: head.title ?? path.posix.basename(resource.href ?? resource.identifier, '.html'),
      body: this.bodyToMarkdown(html),
      published: head.published,
    });
  }

  private decodeAssignment(resource: ManifestResource): ContentItem {
    const settingsFile = resource.files.find(f => /(^|\/)(assignment_settings|assignment)\.xml$/.test(f));
    const settingsXml = settingsFile ? this.text(settingsFile) : undefined;
    const doc = settingsXml && settingsFile ? decodeAssignmentSettings(settingsXml, settingsFile) : undefined;

    const htmlFile = [resource.href, ...resource.files].find(f => f !== undefined && /\.html?$/i.test(f));
    const html = htmlFile ? this.text(htmlFile) : undefined;
    const head = html ? decodePageHtml(html) : undefined;

    let rubric: Rubric | undefined;
    if (doc?.rubricRef) {
      rubric = this.rubricsById.get(doc.rubricRef);
      if (!rubric) {
        this.warn(`Assignment ${resource.identifier} references unknown rubric ${doc.rubricRef}`);
      }
    }
    const dir = path.posix.dirname(htmlFile ?? settingsFile ?? resource.identifier);
    const rubricFile = `${dir}/rubric.xml`;
    const rubricXml = rubric ? undefined : this.text(rubricFile);
    if (rubricXml !== undefined) {
      rubric = decodeRubricDocument(rubricXml, rubricFile);
    }

    return buildAssignment({
      id: resource.identifier,
      title: doc?.title || head?.title || resource.identifier,
      body: html ? this.bodyToMarkdown(html) : '',
      published: doc?.published ?? head?.published ?? true,
      settings: doc
        ? {
            ...doc.settings,
            assignmentGroup: doc.assignmentGroupRef ? this.assignmentGroups.get(doc.assignmentGroupRef) : undefined,
          }
        : undefined,
      rubric: rubric ? { kind: 'inline', rubric } : undefined,
    });
  }

  private quizSource(resource: ManifestResource): string {
    if (this.platformMode) {
      const flat = flatQtiPath(resource.identifier);
      if (!this.files.has(flat)) {
        throw new ResourceDecodeError(`Quiz has no ${flat}; conforming importers would drop it`, resource.identifier);
      }
      return flat;
    }
    const file = [resource.href, ...resource.files].find(
      f => f !== undefined && /\.(xml|qti)$/i.test(f) && !/assessment_meta\.xml$/.test(f)
    );
    if (!file) {
      throw new ResourceDecodeError('Quiz resource lists no QTI file', resource.identifier);
    }
    return file;
  }

  private quizMeta(resource: ManifestResource): QuizMetaDocument | undefined {
    const dependencyFiles = resource.dependencies.flatMap(
      dep => this.manifest.resources.find(r => r.identifier === dep)?.files ?? []
    );
    const metaFile = [quizMetaPath(resource.identifier), ...dependencyFiles, ...resource.files].find(
      f => /(^|\/)assessment_meta\.xml$/.test(f) && this.files.has(f)
    );
    return metaFile ? this.auxiliary(metaFile, xml => decodeQuizMeta(xml, metaFile)) : undefined;
  }

  private decodeQuiz(resource: ManifestResource): void {
    const file = this.quizSource(resource);
    const decoded = decodeAssessment(this.requireText(file, resource.identifier), file, message =>
      this.warn(message, { resource: resource.identifier })
    );

    if (decidePlacement(decoded) === 'bank') {
      this.course.banks.push(
        buildQuestionBank({ id: resource.identifier, title: decoded.title || resource.identifier, questions: decoded.questions })
      );
      return;
    }

    const meta = this.quizMeta(resource);
    const descriptionHtml = decoded.descriptionHtml || meta?.descriptionHtml || '';
    const description = descriptionHtml ? htmlToMarkdown(descriptionHtml) : '';
    const number = (value: string | undefined): number | undefined =>
      value !== undefined && value !== '' && Number.isFinite(Number(value)) ? Number(value) : undefined;

    const quiz: QuizItem = buildQuiz({
      id: resource.identifier,
      title: meta?.title || decoded.title || resource.identifier,
      description,
      body: renderQuizText(description, decoded.questions),
      questions: decoded.questions,
      questionGroups: decoded.groups.map(group => ({
        bank: group.title || group.bankId || 'Question bank',
        pick: group.pick,
        pointsPerQuestion: group.pointsPerQuestion,
      })),
      published: meta?.published ?? true,
      settings: {
        ...meta?.settings,
        allowedAttempts: meta?.settings.allowedAttempts ?? number(decoded.metadata.cc_maxattempts),
        timeLimit: meta?.settings.timeLimit ?? number(decoded.metadata.qmd_timelimit),
        pointsPossible: meta?.settings.pointsPossible ?? number(decoded.metadata.points_possible),
      },
    });
    this.course.items.push(quiz);
    if (decoded.groups.length > 0) {
      this.pendingGroups.set(quiz.id, decoded.groups);
    }
  }

  private decodeBank(resource: ManifestResource): void {
    const file = [resource.href, ...resource.files].find(f => f !== undefined && /\.(xml|qti)$/i.test(f));
    const decoded = decodeAssessment(this.requireText(file, resource.identifier), file ?? resource.identifier, message =>
      this.warn(message, { resource: resource.identifier })
    );
    this.course.banks.push(
      buildQuestionBank({ id: resource.identifier, title: decoded.title || resource.identifier, questions: decoded.questions })
    );
  }

  private registerAsset(resource: ManifestResource): void {
    const paths = resource.files.length > 0 ? resource.files : resource.href ? [resource.href] : [];
    for (const file of paths) {
      const content = this.files.get(file);
      if (content === undefined) {
        this.warn(`Asset ${file} is listed but missing from the archive`, { resource: resource.identifier });
        continue;
      }
      const assetPath = assetPathFromWebResource(file) ?? `assets/${file}`;
      if (!this.course.assets.some(a => a.path === assetPath)) {
        const asset: AssetFile = {
          path: assetPath,
          read: async () => (typeof content === 'string' ? Buffer.from(content, 'utf-8') : content),
        };
        this.course.assets.push(asset);
      }
      if (!this.assetResources.has(resource.identifier)) {
        this.assetResources.set(resource.identifier, assetPath);
      }
    }
  }

  /** File item for an asset resource a module places, created once */
  private fileItem(resourceId: string, title: string): ContentItem | undefined {
    const existing = findItem(this.course, resourceId);
    if (existing) {
      return existing;
    }
    const filePath = this.assetResources.get(resourceId);
    if (!filePath) {
      return undefined;
    }
    const item = buildFile({ id: resourceId, title: title || path.posix.basename(filePath), filePath, published: true });
    this.course.items.push(item);
    return item;
  }

  private placeItem(
    moduleTitle: string,
    entry: { identifier: string; title: string; identifierRef?: string; contentType?: string; url?: string },
    position: number,
    indent: number
  ): string | undefined {
    let item: ContentItem | undefined;
    const ref = entry.identifierRef;

    if (ref && this.assetResources.has(ref)) {
      item = this.fileItem(ref, entry.title);
    } else if (ref) {
      item = findItem(this.course, ref);
    }
    if (!item && entry.contentType === MODULE_CONTENT_TYPES.link && entry.url) {
      const id = isValidIdentifier(entry.identifier) ? entry.identifier : deriveItemId(entry.url, 'l');
      item = findItem(this.course, id);
      if (!item) {
        item = buildLink({ id, title: entry.title || entry.url, url: entry.url, published: true });
        this.course.items.push(item);
      }
    }
    if (!item) {
      if (ref) {
        this.warn(`Module "${moduleTitle}" references missing resource ${ref}`, { item: entry.identifier });
      }
      return undefined;
    }
    item.modules.push({ module: moduleTitle, position, indent });
    return item.id;
  }

  private resolveModules(): void {
    if (this.moduleMeta) {
      const ordered = [...this.moduleMeta].sort((a, b) => a.position - b.position);
      ordered.forEach((module, index) => {
        const itemIds = [...module.items]
          .sort((a, b) => a.position - b.position)
          .map((entry, i) => this.placeItem(module.title, entry, i + 1, entry.indent))
          .filter((id): id is string => id !== undefined);
        this.course.modules.push({
          id: module.identifier,
          title: module.title,
          position: index + 1,
          published: module.published,
          itemIds,
        });
      });
      return;
    }

    this.manifest.modules.forEach((module, index) => {
      const itemIds = module.items
        .map((entry, i) => this.placeItem(module.title, entry, i + 1, 0))
        .filter((id): id is string => id !== undefined);
      this.course.modules.push({
        id: module.identifier,
        title: module.title,
        position: index + 1,
        published: true,
        itemIds,
      });
    });
  }

  private resolveRubrics(): void {
    promoteSharedRubrics(this.course);
  }
}

/**
 * Decode an already extracted archive (path -> content, manifest included).
 * Throws ArchiveFormatError before producing anything when the archive is
 * not importable; individual resources are skipped instead.
 */
export function decodeCoursePackage(
  files: Map<string, Buffer | string>,
  options: PackageImportOptions = {}
): ImportOutcome {
  const logger = options.logger ?? createLogger('package-importer');
  return new PackageDecoder(files, options, logger).run();
}

/**
 * Read and decode a package archive from a path or buffer.
 */
export async function importCoursePackage(
  source: string | Buffer,
  options: PackageImportOptions = {}
): Promise<ImportOutcome> {
  const logger = options.logger ?? createLogger('package-importer');
  logger.debug('Import stage: extract');

  let archive: Buffer;
  if (typeof source === 'string') {
    try {
      archive = await fs.promises.readFile(source);
    } catch (err) {
      throw new ArchiveFormatError(`Cannot read archive ${source}`, { source }, toError(err));
    }
  } else {
    archive = source;
  }

  const files = await readPackageArchive(archive, options);
  return decodeCoursePackage(files, { ...options, logger });
}
