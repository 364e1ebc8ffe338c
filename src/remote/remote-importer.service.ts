/**
 * Remote Course Importer
 *
 * Rebuilds the canonical course from a live platform course, through the
 * same builders and reverse Markup Normalizer the package importer uses.
 * Files are not downloaded: file items and body references map back to local
 * paths only where the asset registry knows the remote file.
 */

import {
  ContentItem,
  Course,
  Question,
  QuestionType,
  createEmptyCourse,
} from '../models/content.model';
import { AssetPathResolver, convertPlatformHtmlToMarkdown, htmlToMarkdown, platformFileId } from '../markup/html-to-markdown';
import { TemplateFragments } from '../markup/markdown-renderer';
import { mapQuestionType } from '../package/qti-codec';
import { renderQuizText } from '../parsers/quiz-text-parser';
import { AssetRegistry } from '../registry/asset-registry';
import { promoteSharedRubrics } from '../registry/rubric-store';
import {
  buildAssignment,
  buildFile,
  buildLink,
  buildPage,
  buildQuiz,
  findItem,
} from '../utils/content-item-builder';
import { deriveItemId } from '../utils/id-generator';
import { Logger, createLogger } from '../utils/logger';

import { RemoteCourseReader, RemoteModuleItem, RemoteQuizQuestion } from './remote.types';

export interface RemoteImportOptions {
  template?: TemplateFragments;
  resolveAssetPath?: AssetPathResolver;
  logger?: Logger;
}

export interface RemoteImportOutcome {
  course: Course;
  warnings: string[];
}

/** Full score on an answer marks it correct */
const CORRECT_WEIGHT = 100;

/**
 * Map platform file URLs (or bare file ids) to the local paths the registry
 * recorded when they were uploaded.
 */
export function registryPathResolver(registry: AssetRegistry): AssetPathResolver {
  return url => {
    const fileId = platformFileId(url);
    return (fileId ? registry.localPathForRemote(fileId) : undefined) ?? registry.localPathForRemote(url);
  };
}

function toQuestion(remote: RemoteQuizQuestion, number: number, resolve?: AssetPathResolver): Question {
  const type: QuestionType = mapQuestionType(remote.questionType);
  const answers =
    type === 'essay' || type === 'file_upload'
      ? []
      : remote.answers.map(answer => ({
          text: answer.text.trim(),
          correct: type === 'short_answer' || answer.weight >= CORRECT_WEIGHT,
        }));
  return {
    number,
    stem: htmlToMarkdown(remote.questionText, resolve),
    type,
    answers,
    points: remote.pointsPossible,
  };
}

class RemoteCourseConverter {
  private readonly course: Course = createEmptyCourse('');
  private readonly warnings: string[] = [];
  private readonly byPageUrl = new Map<string, string>();
  private readonly byContentId = new Map<string, string>();

  constructor(
    private readonly reader: RemoteCourseReader,
    private readonly courseId: string,
    private readonly options: RemoteImportOptions,
    private readonly logger: Logger
  ) {}

  async run(): Promise<RemoteImportOutcome> {
    const info = await this.reader.getCourse(this.courseId);
    this.course.title = info.name;
    this.course.code = info.courseCode;

    await this.importPages();
    await this.importAssignments();
    await this.importQuizzes();
    await this.importModules();
    promoteSharedRubrics(this.course);

    this.logger.info(`Imported ${info.name}`, {
      items: this.course.items.length,
      modules: this.course.modules.length,
      warnings: this.warnings.length,
    });
    return { course: this.course, warnings: this.warnings };
  }

  private warn(message: string, context: Record<string, unknown> = {}): void {
    this.warnings.push(message);
    this.logger.warn(message, context);
  }

  private toMarkdown(html: string): string {
    return convertPlatformHtmlToMarkdown(html, {
      template: this.options.template,
      resolveAssetPath: this.options.resolveAssetPath,
    }).markdown;
  }

  private async importPages(): Promise<void> {
    for (const page of await this.reader.listPages(this.courseId)) {
      const item = buildPage({
        id: deriveItemId(`remote/page/${page.id}`),
        title: page.title,
        body: this.toMarkdown(page.body),
        published: page.published,
      });
      this.course.items.push(item);
      this.byPageUrl.set(page.url, item.id);
    }
  }

  private async importAssignments(): Promise<void> {
    for (const assignment of await this.reader.listAssignments(this.courseId)) {
      const item = buildAssignment({
        id: deriveItemId(`remote/assignment/${assignment.id}`),
        title: assignment.name,
        body: this.toMarkdown(assignment.description),
        published: assignment.published,
        settings: assignment.settings,
        rubric: assignment.rubric ? { kind: 'inline', rubric: assignment.rubric } : undefined,
      });
      this.course.items.push(item);
      this.byContentId.set(`Assignment:${assignment.id}`, item.id);
    }
  }

  private async importQuizzes(): Promise<void> {
    for (const quiz of await this.reader.listQuizzes(this.courseId)) {
      const remoteQuestions = await this.reader.listQuizQuestions(this.courseId, quiz.id);
      const questions = [...remoteQuestions]
        .sort((a, b) => a.position - b.position)
        .map((question, index) => toQuestion(question, index + 1, this.options.resolveAssetPath));
      const description = quiz.description ? htmlToMarkdown(quiz.description, this.options.resolveAssetPath) : '';
      const item = buildQuiz({
        id: deriveItemId(`remote/quiz/${quiz.id}`),
        title: quiz.title,
        description,
        body: renderQuizText(description, questions),
        questions,
        published: quiz.published,
        settings: quiz.settings,
      });
      this.course.items.push(item);
      this.byContentId.set(`Quiz:${quiz.id}`, item.id);
    }
  }

  private itemFor(remote: RemoteModuleItem, moduleTitle: string): ContentItem | undefined {
    switch (remote.type) {
      case 'Page': {
        const id = remote.pageUrl ? this.byPageUrl.get(remote.pageUrl) : undefined;
        return id ? findItem(this.course, id) : undefined;
      }
      case 'Assignment':
      case 'Quiz': {
        const id = this.byContentId.get(`${remote.type}:${remote.contentId ?? ''}`);
        return id ? findItem(this.course, id) : undefined;
      }
      case 'ExternalUrl': {
        if (!remote.externalUrl) {
          return undefined;
        }
        const link = buildLink({
          id: deriveItemId(`remote/link/${remote.id}`),
          title: remote.title,
          url: remote.externalUrl,
          newTab: remote.newTab ?? true,
          published: remote.published,
        });
        this.course.items.push(link);
        return link;
      }
      case 'File': {
        const filePath = remote.contentId ? this.options.resolveAssetPath?.(`/files/${remote.contentId}`) : undefined;
        if (!filePath) {
          this.warn(`File "${remote.title}" in module "${moduleTitle}" is not in the asset registry`, {
            contentId: remote.contentId,
          });
          return undefined;
        }
        const id = deriveItemId(`remote/file/${remote.contentId ?? remote.id}`);
        const existing = findItem(this.course, id);
        if (existing) {
          return existing;
        }
        const file = buildFile({ id, title: remote.title, filePath, published: remote.published });
        this.course.items.push(file);
        return file;
      }
      default:
        this.warn(`Module item type ${remote.type} is not imported`, { module: moduleTitle, title: remote.title });
        return undefined;
    }
  }

  private async importModules(): Promise<void> {
    const modules = [...(await this.reader.listModules(this.courseId))].sort((a, b) => a.position - b.position);
    modules.forEach((module, index) => {
      const itemIds: string[] = [];
      const items = [...module.items].sort((a, b) => a.position - b.position);
      for (const remote of items) {
        const item = this.itemFor(remote, module.name);
        if (!item) {
          if (remote.type === 'Page' || remote.type === 'Assignment' || remote.type === 'Quiz') {
            this.warn(`Module "${module.name}" references missing ${remote.type} "${remote.title}"`);
          }
          continue;
        }
        if (itemIds.includes(item.id)) {
          continue;
        }
        itemIds.push(item.id);
        item.modules.push({ module: module.name, position: itemIds.length, indent: remote.indent });
      }
      this.course.modules.push({
        id: deriveItemId(`remote/module/${module.id}`, 'm'),
        title: module.name,
        position: index + 1,
        published: module.published,
        itemIds,
      });
    });
  }
}

/**
 * Read a whole remote course into canonical form.
 */
export async function importRemoteCourse(
  reader: RemoteCourseReader,
  courseId: string,
  options: RemoteImportOptions = {}
): Promise<RemoteImportOutcome> {
  const logger = options.logger ?? createLogger('remote-importer');
  return new RemoteCourseConverter(reader, courseId, options, logger).run();
}
