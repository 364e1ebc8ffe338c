/**
 * Canvas Client Service
 *
 * REST client for a Canvas-style LMS, implementing both RemotePublisher and
 * RemoteCourseReader.
 *
 * Routes (all under /api/v1):
 * - GET/POST/PUT  /courses/{id}/pages[/{url}]
 * - GET/POST/PUT  /courses/{id}/assignments[/{id}], /assignment_groups, POST /rubrics
 * - GET/POST/PUT  /courses/{id}/quizzes[/{id}], /quizzes/{id}/questions, /quizzes/{id}/groups
 * - GET/POST/PUT  /courses/{id}/modules[/{id}], /modules/{id}/items[/{id}]
 * - POST          /courses/{id}/files (upload ticket, then the upload itself)
 *
 * Lists follow `Link: <...>; rel="next"` pagination. Every request carries
 * the bearer token and is aborted after `timeoutMs`.
 */

import { z } from 'zod';

import { RemoteOperationError, toError } from '../errors/errors';
import { AssetSource, RemoteDescriptor } from '../models/asset.model';
import {
  ContentKind,
  Question,
  QuizSettings,
  Rubric,
  toQuizType,
} from '../models/content.model';
import { QUESTION_TYPE_NAMES } from '../package/qti-codec';
import { Logger, createLogger } from '../utils/logger';

import {
  AssignmentPayload,
  LinkPayload,
  ModulePlan,
  ModulePlanItem,
  PagePayload,
  QuizPayload,
  RemoteAssignment,
  RemoteCourseInfo,
  RemoteCourseReader,
  RemoteModule,
  RemoteModuleItem,
  RemotePage,
  RemotePublisher,
  RemoteQuiz,
  RemoteQuizQuestion,
  RemoteRef,
} from './remote.types';

export interface CanvasClientConfig {
  /** Platform origin, e.g. "https://lms.example.edu" */
  baseUrl: string;
  token: string;
  /** Course the publisher writes to */
  courseId?: string;
  /** Request timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Page size for list requests (default: 100) */
  perPage?: number;
  /** Folder uploads land in (default: "course-sync") */
  uploadFolder?: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

type QueryValue = string | number | boolean | undefined;

interface RequestOptions {
  params?: Record<string, QueryValue | QueryValue[]>;
  body?: unknown;
  form?: FormData;
  /** Pre-signed upload URLs take no bearer token */
  anonymous?: boolean;
  redirect?: 'follow' | 'manual';
}

// Canvas response shapes. Unknown fields are dropped; ids arrive as numbers or strings.

const idSchema = z.union([z.number(), z.string()]).transform(String);

const courseSchema = z.object({ id: idSchema, name: z.string(), course_code: z.string().nullish() });

const pageSchema = z.object({
  page_id: idSchema,
  url: z.string(),
  title: z.string(),
  body: z.string().nullish(),
  published: z.boolean().nullish(),
});

const ratingSchema = z.object({
  description: z.string().nullish(),
  long_description: z.string().nullish(),
  points: z.number().nullish(),
});

const criterionSchema = z.object({
  description: z.string().nullish(),
  long_description: z.string().nullish(),
  points: z.number().nullish(),
  ratings: z.array(ratingSchema).nullish(),
});

const assignmentSchema = z.object({
  id: idSchema,
  name: z.string(),
  description: z.string().nullish(),
  published: z.boolean().nullish(),
  points_possible: z.number().nullish(),
  submission_types: z.array(z.string()).nullish(),
  due_at: z.string().nullish(),
  unlock_at: z.string().nullish(),
  lock_at: z.string().nullish(),
  grading_type: z.string().nullish(),
  assignment_group_id: idSchema.nullish(),
  rubric: z.array(criterionSchema).nullish(),
  rubric_settings: z
    .object({ title: z.string().nullish(), free_form_criterion_comments: z.boolean().nullish() })
    .nullish(),
});

const assignmentGroupSchema = z.object({ id: idSchema, name: z.string() });

const quizSchema = z.object({
  id: idSchema,
  title: z.string(),
  description: z.string().nullish(),
  published: z.boolean().nullish(),
  quiz_type: z.string().nullish(),
  time_limit: z.number().nullish(),
  allowed_attempts: z.number().nullish(),
  shuffle_answers: z.boolean().nullish(),
  points_possible: z.number().nullish(),
  due_at: z.string().nullish(),
});

const questionSchema = z.object({
  id: idSchema,
  position: z.number().nullish(),
  question_type: z.string().nullish(),
  question_text: z.string().nullish(),
  points_possible: z.number().nullish(),
  answers: z
    .array(z.object({ text: z.string().nullish(), html: z.string().nullish(), weight: z.number().nullish() }))
    .nullish(),
});

const moduleItemSchema = z.object({
  id: idSchema,
  title: z.string(),
  type: z.string(),
  position: z.number().nullish(),
  indent: z.number().nullish(),
  published: z.boolean().nullish(),
  content_id: idSchema.nullish(),
  page_url: z.string().nullish(),
  external_url: z.string().nullish(),
  new_tab: z.boolean().nullish(),
});

const moduleSchema = z.object({
  id: idSchema,
  name: z.string(),
  position: z.number().nullish(),
  published: z.boolean().nullish(),
  items: z.array(moduleItemSchema).nullish(),
});

const uploadTicketSchema = z.object({
  upload_url: z.string(),
  upload_params: z.record(z.union([z.string(), z.number()])).default({}),
});

const fileSchema = z.object({ id: idSchema });

const refSchema = z.object({ id: idSchema });

const MODULE_ITEM_TYPES: Record<ContentKind, string> = {
  page: 'Page',
  assignment: 'Assignment',
  quiz: 'Quiz',
  link: 'ExternalUrl',
  file: 'File',
};

/** The `rel="next"` target of a Link header */
export function nextPageUrl(linkHeader: string | null): string | undefined {
  if (!linkHeader) {
    return undefined;
  }
  for (const part of linkHeader.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="?next"?/.exec(part.trim());
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

function indexed<T>(values: T[]): Record<string, T> {
  return Object.fromEntries(values.map((value, i) => [String(i), value]));
}

function rubricPayload(rubric: Rubric) {
  return {
    title: rubric.title,
    free_form_criterion_comments: rubric.freeFormComments,
    criteria: indexed(
      rubric.criteria.map(criterion => ({
        description: criterion.description,
        long_description: criterion.longDescription,
        points: criterion.points,
        ratings: indexed(
          criterion.ratings.map(rating => ({
            description: rating.description,
            long_description: rating.longDescription,
            points: rating.points,
          }))
        ),
      }))
    ),
  };
}

function questionPayload(question: Question) {
  const choice = question.type !== 'essay' && question.type !== 'file_upload';
  return {
    question_name: `Question ${question.number}`,
    question_text: question.stem,
    question_type: QUESTION_TYPE_NAMES[question.type],
    points_possible: question.points,
    position: question.number,
    answers: choice
      ? question.answers.map(answer => ({ answer_text: answer.text, answer_weight: answer.correct ? 100 : 0 }))
      : [],
  };
}

function quizSettingsPayload(settings: QuizSettings) {
  return {
    quiz_type: settings.quizType,
    time_limit: settings.timeLimit,
    allowed_attempts: settings.allowedAttempts,
    shuffle_answers: settings.shuffleAnswers,
    points_possible: settings.pointsPossible,
    due_at: settings.dueAt,
  };
}

export class CanvasClient implements RemotePublisher, RemoteCourseReader {
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly perPage: number;

  // Title -> remote handle listings, loaded once per client
  private pageIndex?: Promise<Map<string, RemoteRef>>;
  private assignmentIndex?: Promise<Map<string, string>>;
  private quizIndex?: Promise<Map<string, string>>;
  private groupIndex?: Promise<Map<string, string>>;

  constructor(private readonly config: CanvasClientConfig) {
    this.logger = config.logger ?? createLogger('canvas-client');
    this.fetchImpl = config.fetch ?? fetch;
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.perPage = config.perPage ?? 100;
  }

  // ===========================================================================
  // RemotePublisher
  // ===========================================================================

  async uploadFile(source: AssetSource): Promise<RemoteDescriptor> {
    const courseId = this.publishCourse();
    const bytes = await source.read();
    const ticket = await this.json(uploadTicketSchema, 'POST', `/courses/${courseId}/files`, {
      body: {
        name: source.filename,
        size: bytes.length,
        parent_folder_path: this.config.uploadFolder ?? 'course-sync',
        on_duplicate: 'rename',
      },
    });

    const form = new FormData();
    for (const [key, value] of Object.entries(ticket.upload_params)) {
      form.append(key, String(value));
    }
    form.append('file', new Blob([bytes]), source.filename);

    const uploaded = await this.request('POST', ticket.upload_url, { form, anonymous: true, redirect: 'manual' });
    const location = uploaded.headers.get('location');
    const file =
      uploaded.status >= 300 && uploaded.status < 400 && location
        ? await this.json(fileSchema, 'GET', location)
        : await this.parse(fileSchema, uploaded, 'POST upload');

    this.logger.debug(`Uploaded ${source.path}`, { fileId: file.id });
    return { remoteId: file.id, locator: `/courses/${courseId}/files/${file.id}/preview` };
  }

  async upsertPage(page: PagePayload): Promise<RemoteRef> {
    const courseId = this.publishCourse();
    const index = await this.pages(courseId);
    const existing = index.get(page.title);
    const body = { wiki_page: { title: page.title, body: page.html, published: page.published } };
    const saved = existing?.url
      ? await this.json(pageSchema, 'PUT', `/courses/${courseId}/pages/${encodeURIComponent(existing.url)}`, { body })
      : await this.json(pageSchema, 'POST', `/courses/${courseId}/pages`, { body });
    const ref = { remoteId: saved.page_id, url: saved.url };
    index.set(page.title, ref);
    this.logger.info(`${existing ? 'Updated' : 'Created'} page ${page.title}`);
    return ref;
  }

  async upsertAssignment(assignment: AssignmentPayload): Promise<RemoteRef> {
    const courseId = this.publishCourse();
    const index = await this.assignments(courseId);
    const existing = index.get(assignment.title);
    const { settings } = assignment;
    const groupId = settings.assignmentGroup ? await this.assignmentGroup(courseId, settings.assignmentGroup) : undefined;
    const body = {
      assignment: {
        name: assignment.title,
        description: assignment.html,
        published: assignment.published,
        points_possible: settings.pointsPossible,
        submission_types: settings.submissionTypes,
        grading_type: settings.gradingType,
        due_at: settings.dueAt,
        unlock_at: settings.unlockAt,
        lock_at: settings.lockAt,
        assignment_group_id: groupId,
      },
    };
    const saved = existing
      ? await this.json(refSchema, 'PUT', `/courses/${courseId}/assignments/${existing}`, { body })
      : await this.json(refSchema, 'POST', `/courses/${courseId}/assignments`, { body });
    index.set(assignment.title, saved.id);

    if (assignment.rubric) {
      await this.json(refSchema.partial(), 'POST', `/courses/${courseId}/rubrics`, {
        body: {
          rubric: rubricPayload(assignment.rubric),
          rubric_association: {
            association_id: saved.id,
            association_type: 'Assignment',
            use_for_grading: true,
            purpose: 'grading',
          },
        },
      });
    }
    this.logger.info(`${existing ? 'Updated' : 'Created'} assignment ${assignment.title}`);
    return { remoteId: saved.id };
  }

  async upsertQuiz(quiz: QuizPayload): Promise<RemoteRef> {
    const courseId = this.publishCourse();
    const index = await this.quizzes(courseId);
    const existing = index.get(quiz.title);
    const body = {
      quiz: {
        title: quiz.title,
        description: quiz.descriptionHtml,
        published: quiz.published,
        ...quizSettingsPayload(quiz.settings),
      },
    };
    const saved = existing
      ? await this.json(refSchema, 'PUT', `/courses/${courseId}/quizzes/${existing}`, { body })
      : await this.json(refSchema, 'POST', `/courses/${courseId}/quizzes`, { body });
    index.set(quiz.title, saved.id);

    // Questions are replaced wholesale
    const questionsPath = `/courses/${courseId}/quizzes/${saved.id}/questions`;
    if (existing) {
      for (const old of await this.paginate(questionSchema, questionsPath)) {
        await this.request('DELETE', `${questionsPath}/${old.id}`);
      }
    }
    for (const question of quiz.questions) {
      await this.json(refSchema, 'POST', questionsPath, { body: { question: questionPayload(question) } });
    }

    // Groups cannot be listed, so they are only created with the quiz
    if (!existing && quiz.groups.length > 0) {
      await this.json(z.unknown(), 'POST', `/courses/${courseId}/quizzes/${saved.id}/groups`, {
        body: {
          quiz_groups: quiz.groups.map(group => ({
            name: group.name,
            pick_count: group.pick,
            question_points: group.pointsPerQuestion,
          })),
        },
      });
    } else if (existing && quiz.groups.length > 0) {
      this.logger.warn(`Question groups of existing quiz ${quiz.title} were left unchanged`);
    }

    this.logger.info(`${existing ? 'Updated' : 'Created'} quiz ${quiz.title}`, { questions: quiz.questions.length });
    return { remoteId: saved.id };
  }

  /** Links exist only as module items; the url is their handle */
  async upsertLink(link: LinkPayload): Promise<RemoteRef> {
    return { remoteId: link.url };
  }

  async syncModules(plans: ModulePlan[]): Promise<void> {
    const courseId = this.publishCourse();
    const existing = await this.listModules(courseId);
    const byName = new Map(existing.map(module => [module.name, module]));

    for (const plan of plans) {
      let module = byName.get(plan.title);
      if (!module) {
        const created = await this.json(moduleSchema, 'POST', `/courses/${courseId}/modules`, {
          body: { module: { name: plan.title, position: plan.position } },
        });
        module = { id: created.id, name: created.name, position: plan.position, published: false, items: [] };
        this.logger.info(`Created module ${plan.title}`);
      }
      await this.json(moduleSchema, 'PUT', `/courses/${courseId}/modules/${module.id}`, {
        body: { module: { position: plan.position, published: plan.published } },
      });

      const itemsPath = `/courses/${courseId}/modules/${module.id}/items`;
      for (const [index, item] of plan.items.entries()) {
        const position = index + 1;
        const current = module.items.find(candidate => this.sameModuleItem(candidate, item));
        if (current) {
          if (current.indent !== item.indent || current.position !== position) {
            await this.json(moduleItemSchema, 'PUT', `${itemsPath}/${current.id}`, {
              body: { module_item: { indent: item.indent, position } },
            });
          }
          continue;
        }
        await this.json(moduleItemSchema, 'POST', itemsPath, { body: { module_item: this.moduleItemPayload(item, position) } });
      }
    }
  }

  // ===========================================================================
  // RemoteCourseReader
  // ===========================================================================

  async getCourse(courseId: string): Promise<RemoteCourseInfo> {
    const course = await this.json(courseSchema, 'GET', `/courses/${courseId}`);
    return { id: course.id, name: course.name, courseCode: course.course_code ?? undefined };
  }

  async listPages(courseId: string): Promise<RemotePage[]> {
    const summaries = await this.paginate(pageSchema, `/courses/${courseId}/pages`);
    const pages: RemotePage[] = [];
    // List responses omit bodies
    for (const summary of summaries) {
      const page = await this.json(pageSchema, 'GET', `/courses/${courseId}/pages/${encodeURIComponent(summary.url)}`);
      pages.push({
        id: page.page_id,
        url: page.url,
        title: page.title,
        body: page.body ?? '',
        published: page.published ?? true,
      });
    }
    return pages;
  }

  async listAssignments(courseId: string): Promise<RemoteAssignment[]> {
    const groups = await this.paginate(assignmentGroupSchema, `/courses/${courseId}/assignment_groups`);
    const groupNames = new Map(groups.map(group => [group.id, group.name]));
    const assignments = await this.paginate(assignmentSchema, `/courses/${courseId}/assignments`);
    return assignments.map(assignment => ({
      id: assignment.id,
      name: assignment.name,
      description: assignment.description ?? '',
      published: assignment.published ?? true,
      settings: {
        pointsPossible: assignment.points_possible ?? undefined,
        submissionTypes: assignment.submission_types ?? ['online_upload'],
        gradingType: assignment.grading_type ?? 'points',
        dueAt: assignment.due_at ?? undefined,
        unlockAt: assignment.unlock_at ?? undefined,
        lockAt: assignment.lock_at ?? undefined,
        assignmentGroup: assignment.assignment_group_id ? groupNames.get(assignment.assignment_group_id) : undefined,
      },
      rubric: assignment.rubric
        ? {
            title: assignment.rubric_settings?.title ?? `${assignment.name} rubric`,
            freeFormComments: assignment.rubric_settings?.free_form_criterion_comments ?? false,
            criteria: assignment.rubric.map(criterion => ({
              description: criterion.description ?? '',
              longDescription: criterion.long_description ?? undefined,
              points: criterion.points ?? 0,
              ratings: (criterion.ratings ?? []).map(rating => ({
                description: rating.description ?? '',
                longDescription: rating.long_description ?? undefined,
                points: rating.points ?? 0,
              })),
            })),
          }
        : undefined,
    }));
  }

  async listQuizzes(courseId: string): Promise<RemoteQuiz[]> {
    const quizzes = await this.paginate(quizSchema, `/courses/${courseId}/quizzes`);
    return quizzes.map(quiz => ({
      id: quiz.id,
      title: quiz.title,
      description: quiz.description ?? '',
      published: quiz.published ?? true,
      settings: {
        quizType: toQuizType(quiz.quiz_type),
        timeLimit: quiz.time_limit ?? undefined,
        allowedAttempts: quiz.allowed_attempts ?? undefined,
        shuffleAnswers: quiz.shuffle_answers ?? false,
        pointsPossible: quiz.points_possible ?? undefined,
        dueAt: quiz.due_at ?? undefined,
      },
    }));
  }

  async listQuizQuestions(courseId: string, quizId: string): Promise<RemoteQuizQuestion[]> {
    const questions = await this.paginate(questionSchema, `/courses/${courseId}/quizzes/${quizId}/questions`);
    return questions.map((question, index) => ({
      id: question.id,
      position: question.position ?? index + 1,
      questionType: question.question_type ?? 'multiple_choice_question',
      questionText: question.question_text ?? '',
      pointsPossible: question.points_possible ?? 1,
      answers: (question.answers ?? []).map(answer => ({
        text: answer.text || answer.html || '',
        weight: answer.weight ?? 0,
      })),
    }));
  }

  async listModules(courseId: string): Promise<RemoteModule[]> {
    const modules = await this.paginate(moduleSchema, `/courses/${courseId}/modules`, { 'include[]': 'items' });
    return modules.map((module, index) => ({
      id: module.id,
      name: module.name,
      position: module.position ?? index + 1,
      published: module.published ?? true,
      items: (module.items ?? []).map(
        (item, itemIndex): RemoteModuleItem => ({
          id: item.id,
          title: item.title,
          type: item.type,
          position: item.position ?? itemIndex + 1,
          indent: item.indent ?? 0,
          published: item.published ?? true,
          contentId: item.content_id ?? undefined,
          pageUrl: item.page_url ?? undefined,
          externalUrl: item.external_url ?? undefined,
          newTab: item.new_tab ?? undefined,
        })
      ),
    }));
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private publishCourse(): string {
    if (!this.config.courseId) {
      throw new RemoteOperationError('No course id configured for publishing', 'configure');
    }
    return this.config.courseId;
  }

  private pages(courseId: string): Promise<Map<string, RemoteRef>> {
    this.pageIndex ??= this.paginate(pageSchema, `/courses/${courseId}/pages`).then(
      pages => new Map(pages.map(page => [page.title, { remoteId: page.page_id, url: page.url }]))
    );
    return this.pageIndex;
  }

  private assignments(courseId: string): Promise<Map<string, string>> {
    this.assignmentIndex ??= this.paginate(refSchema.extend({ name: z.string() }), `/courses/${courseId}/assignments`).then(
      list => new Map(list.map(entry => [entry.name, entry.id]))
    );
    return this.assignmentIndex;
  }

  private quizzes(courseId: string): Promise<Map<string, string>> {
    this.quizIndex ??= this.paginate(refSchema.extend({ title: z.string() }), `/courses/${courseId}/quizzes`).then(
      list => new Map(list.map(entry => [entry.title, entry.id]))
    );
    return this.quizIndex;
  }

  private async assignmentGroup(courseId: string, name: string): Promise<string> {
    this.groupIndex ??= this.paginate(assignmentGroupSchema, `/courses/${courseId}/assignment_groups`).then(
      list => new Map(list.map(group => [group.name, group.id]))
    );
    const groups = await this.groupIndex;
    const known = groups.get(name);
    if (known) {
      return known;
    }
    const created = await this.json(assignmentGroupSchema, 'POST', `/courses/${courseId}/assignment_groups`, {
      body: { name },
    });
    groups.set(name, created.id);
    return created.id;
  }

  private sameModuleItem(candidate: RemoteModuleItem, item: ModulePlanItem): boolean {
    switch (item.kind) {
      case 'page':
        return candidate.type === 'Page' && candidate.pageUrl === item.remote.url;
      case 'link':
        return candidate.type === 'ExternalUrl' && candidate.externalUrl === item.url;
      default:
        return candidate.type === MODULE_ITEM_TYPES[item.kind] && candidate.contentId === item.remote.remoteId;
    }
  }

  private moduleItemPayload(item: ModulePlanItem, position: number) {
    const base = { title: item.title, type: MODULE_ITEM_TYPES[item.kind], indent: item.indent, position };
    switch (item.kind) {
      case 'page':
        return { ...base, page_url: item.remote.url };
      case 'link':
        return { ...base, external_url: item.url, new_tab: item.newTab ?? true };
      default:
        return { ...base, content_id: item.remote.remoteId };
    }
  }

  private buildUrl(pathOrUrl: string, params?: RequestOptions['params']): string {
    const url = /^https?:\/\//i.test(pathOrUrl)
      ? new URL(pathOrUrl)
      : new URL(`/api/v1${pathOrUrl}`, this.config.baseUrl);
    for (const [key, value] of Object.entries(params ?? {})) {
      for (const entry of Array.isArray(value) ? value : [value]) {
        if (entry !== undefined) {
          url.searchParams.append(key, String(entry));
        }
      }
    }
    return url.toString();
  }

  /**
   * Make an HTTP request with timeout. Non-2xx (other than a manual
   * redirect) and transport failures become RemoteOperationError.
   */
  private async request(method: string, pathOrUrl: string, options: RequestOptions = {}): Promise<Response> {
    const url = this.buildUrl(pathOrUrl, options.params);
    const operation = `${method} ${pathOrUrl.split('?')[0]}`;
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (!options.anonymous) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }
    let body: string | FormData | undefined = options.form;
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.body);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body,
        redirect: options.redirect ?? 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      const cause = toError(error);
      const message = cause.name === 'AbortError' ? `timed out after ${this.timeoutMs}ms` : cause.message;
      throw new RemoteOperationError(`${operation} failed: ${message}`, operation, undefined, cause);
    } finally {
      clearTimeout(timeoutId);
    }

    const redirected = options.redirect === 'manual' && response.status >= 300 && response.status < 400;
    if (!response.ok && !redirected) {
      const errorBody = await response.text();
      let errorMessage = `HTTP ${response.status}`;
      try {
        const parsed: unknown = JSON.parse(errorBody);
        const described = z
          .object({ errors: z.array(z.object({ message: z.string() })).optional(), message: z.string().optional() })
          .safeParse(parsed);
        if (described.success) {
          errorMessage = described.data.errors?.[0]?.message ?? described.data.message ?? errorMessage;
        }
      } catch {
        errorMessage = errorBody || errorMessage;
      }
      throw new RemoteOperationError(
        `${operation} failed: ${errorMessage}`,
        operation,
        response.status
      );
    }
    this.logger.debug(operation, { status: response.status });
    return response;
  }

  private async parse<S extends z.ZodTypeAny>(schema: S, response: Response, operation: string): Promise<z.infer<S>> {
    const payload: unknown = await response.json();
    const result = schema.safeParse(payload);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new RemoteOperationError(
        `${operation} returned an unexpected response: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`,
        operation,
        response.status
      );
    }
    return result.data;
  }

  private async json<S extends z.ZodTypeAny>(
    schema: S,
    method: string,
    pathOrUrl: string,
    options: RequestOptions = {}
  ): Promise<z.infer<S>> {
    const response = await this.request(method, pathOrUrl, options);
    return this.parse(schema, response, `${method} ${pathOrUrl}`);
  }

  private async paginate<S extends z.ZodTypeAny>(
    schema: S,
    path: string,
    params: Record<string, QueryValue> = {}
  ): Promise<Array<z.infer<S>>> {
    const results: Array<z.infer<S>> = [];
    const listSchema = z.array(schema);
    let next: string | undefined = this.buildUrl(path, { ...params, per_page: this.perPage });
    while (next) {
      const response = await this.request('GET', next);
      const page = await this.parse(listSchema, response, `GET ${path}`);
      results.push(...page);
      next = nextPageUrl(response.headers.get('link'));
    }
    return results;
  }
}
