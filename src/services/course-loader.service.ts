/**
 * Course Loader Service
 *
 * Reads author source into the canonical course:
 *
 *   course.yaml
 *   content/NN-<module>.module/module.yaml
 *   content/NN-<module>.module/NN-<slug>.<kind>/index.md (+ rubric.yaml, files)
 *   question-banks/<slug>.bank.md
 *   rubrics/<name>.yaml
 *   modules/module_order.yaml
 *   assets/...
 *
 * An invalid item is skipped and reported; the rest of the course loads.
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';

import { ValidationError } from '../errors/errors';
import {
  AssetFile,
  ContentItem,
  ContentKind,
  Course,
  ModuleMembership,
  RubricCriterion,
  createEmptyCourse,
} from '../models/content.model';
import { ItemPathInfo, compareOrderable, orderModuleTitles, parseItemPath, parseModuleFolderName } from '../parsers/course-path-parser';
import { parseYamlMapping, splitFrontmatter } from '../parsers/frontmatter-parser';
import { parseQuizText } from '../parsers/quiz-text-parser';
import { parseAssignmentRubricFile, parseRubricRowYaml, parseRubricYaml } from '../parsers/rubric-parser';
import {
  PageFrontmatter,
  assignmentFrontmatterSchema,
  bankFrontmatterSchema,
  fileFrontmatterSchema,
  linkFrontmatterSchema,
  moduleFileSchema,
  moduleOrderSchema,
  pageFrontmatterSchema,
  parseWithSchema,
  quizFrontmatterSchema,
} from '../parsers/source-schemas';
import { DEFAULT_SHARED_ASSETS_DIR, toPosixPath } from '../registry/asset-registry';
import { RUBRIC_ROWS_DIR } from '../registry/rubric-store';
import {
  bankByName,
  buildAssignment,
  buildFile,
  buildLink,
  buildPage,
  buildQuestionBank,
  buildQuiz,
} from '../utils/content-item-builder';
import { deriveItemId } from '../utils/id-generator';
import { Logger, createLogger } from '../utils/logger';

export const CONTENT_DIR = 'content';
export const BANKS_DIR = 'question-banks';
export const RUBRICS_DIR = 'rubrics';
export const MODULE_ORDER_PATH = 'modules/module_order.yaml';
export const ITEM_FILE = 'index.md';
export const MODULE_FILE = 'module.yaml';
export const RUBRIC_FILE = 'rubric.yaml';

/** Per-item rendering settings that stay out of the canonical model */
export interface ItemRenderHints {
  /** Template folder name overriding the course template */
  template?: string;
  variables: Record<string, string>;
}

export interface LoadCourseOptions {
  title?: string;
  sharedAssetsDir?: string;
  logger?: Logger;
}

export interface LoadedCourse {
  course: Course;
  errors: ValidationError[];
  renderHints: Map<string, ItemRenderHints>;
}

interface ModuleFolder {
  title: string;
  orderPrefix?: number;
  published: boolean;
  relativeDir?: string;
}

const SOURCE_FILES = new Set([ITEM_FILE, MODULE_FILE, RUBRIC_FILE]);

function fileAsset(courseRoot: string, relativePath: string): AssetFile {
  return { path: relativePath, read: () => fs.promises.readFile(path.join(courseRoot, relativePath)) };
}

function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError;
}

class CourseLoader {
  private readonly course: Course;
  private readonly errors: ValidationError[] = [];
  private readonly renderHints = new Map<string, ItemRenderHints>();
  private readonly moduleFolders = new Map<string, ModuleFolder>();
  private readonly rubricRows = new Map<string, RubricCriterion>();
  private readonly sharedAssetsDir: string;

  constructor(
    private readonly courseRoot: string,
    private readonly options: LoadCourseOptions,
    private readonly logger: Logger
  ) {
    this.course = createEmptyCourse(options.title ?? path.basename(courseRoot));
    this.sharedAssetsDir = toPosixPath(options.sharedAssetsDir ?? DEFAULT_SHARED_ASSETS_DIR);
  }

  async run(): Promise<LoadedCourse> {
    await this.loadRubricRows();
    await this.loadSharedRubrics();
    await this.loadBanks();
    await this.loadModuleFolders();
    await this.loadItems();
    await this.loadAssets();
    this.buildModules();

    this.logger.info(`Loaded ${this.course.title}`, {
      items: this.course.items.length,
      modules: this.course.modules.length,
      banks: this.course.banks.length,
      errors: this.errors.length,
    });
    return { course: this.course, errors: this.errors, renderHints: this.renderHints };
  }

  private async find(pattern: string, nodir = true): Promise<string[]> {
    const matches = await glob(pattern, { cwd: this.courseRoot, posix: true, nodir });
    return matches.map(toPosixPath).sort();
  }

  private read(relativePath: string): string {
    return fs.readFileSync(path.join(this.courseRoot, relativePath), 'utf-8');
  }

  private exists(relativePath: string): boolean {
    return fs.existsSync(path.join(this.courseRoot, relativePath));
  }

  /** Run `load`, recording a ValidationError instead of throwing it */
  private attempt(load: () => void): void {
    try {
      load();
    } catch (err) {
      if (!isValidationError(err)) {
        throw err;
      }
      this.errors.push(err);
      this.logger.warn(err.message, { sourcePath: err.sourcePath });
    }
  }

  private async loadRubricRows(): Promise<void> {
    for (const file of await this.find(`${RUBRIC_ROWS_DIR}/*.{yaml,yml}`)) {
      this.attempt(() => {
        const name = path.posix.basename(file).replace(/\.ya?ml$/, '');
        this.rubricRows.set(name, parseRubricRowYaml(this.read(file), file));
      });
    }
  }

  private async loadSharedRubrics(): Promise<void> {
    for (const file of await this.find(`${RUBRICS_DIR}/*.{yaml,yml}`)) {
      this.attempt(() => {
        const name = path.posix.basename(file).replace(/\.ya?ml$/, '');
        this.course.rubrics[name] = parseRubricYaml(this.read(file), file, this.rubricRows);
      });
    }
  }

  private async loadBanks(): Promise<void> {
    for (const file of await this.find(`${BANKS_DIR}/*.bank.md`)) {
      this.attempt(() => {
        const { frontmatter, body } = splitFrontmatter(this.read(file), file);
        const meta = parseWithSchema(bankFrontmatterSchema, frontmatter, file);
        const { questions } = parseQuizText(body, { pointsPerQuestion: meta.points_per_question, sourcePath: file });
        this.course.banks.push(
          buildQuestionBank({
            id: meta.identifier ?? deriveItemId(file, 'b'),
            title: meta.name ?? path.posix.basename(file, '.bank.md'),
            questions,
            sourcePath: file,
          })
        );
      });
    }
  }

  private async loadModuleFolders(): Promise<void> {
    for (const dir of await this.find(`${CONTENT_DIR}/**/*.module`, false)) {
      if (!fs.statSync(path.join(this.courseRoot, dir)).isDirectory()) {
        continue;
      }
      const parsed = parseModuleFolderName(path.posix.basename(dir));
      if (!parsed) {
        continue;
      }
      const folder: ModuleFolder = { title: parsed.title, orderPrefix: parsed.orderPrefix, published: true, relativeDir: dir };
      const metaFile = `${dir}/${MODULE_FILE}`;
      if (this.exists(metaFile)) {
        this.attempt(() => {
          const meta = parseWithSchema(moduleFileSchema, parseYamlMapping(this.read(metaFile), metaFile), metaFile);
          folder.title = meta.name ?? folder.title;
          folder.published = meta.published;
        });
      }
      this.moduleFolders.set(dir, folder);
    }
  }

  private async loadItems(): Promise<void> {
    for (const file of await this.find(`${CONTENT_DIR}/**/${ITEM_FILE}`)) {
      const info = parseItemPath(path.posix.dirname(file));
      if (!info) {
        this.logger.debug(`Skipping ${file}: folder has no item suffix`);
        continue;
      }
      this.attempt(() => this.loadItem(info, file));
    }
  }

  private memberships(info: ItemPathInfo, meta: PageFrontmatter): ModuleMembership[] {
    const memberships: ModuleMembership[] = [];
    const add = (membership: ModuleMembership): void => {
      if (!memberships.some(m => m.module === membership.module)) {
        memberships.push(membership);
      }
    };

    if (info.module) {
      const folder = this.moduleFolders.get(info.module.relativeDir);
      add({ module: folder?.title ?? info.module.title, position: meta.position, indent: meta.indent });
    }
    for (const ref of meta.modules) {
      if (typeof ref === 'string') {
        add({ module: ref, indent: meta.indent });
      } else {
        add({ module: ref.name, position: ref.position, indent: ref.indent ?? meta.indent });
      }
    }
    return memberships;
  }

  private loadItem(info: ItemPathInfo, file: string): void {
    const dir = info.relativeDir;
    const { frontmatter, body } = splitFrontmatter(this.read(file), file);
    const base = parseWithSchema(pageFrontmatterSchema, frontmatter, file);

    if (base.type && base.type !== info.kind) {
      throw new ValidationError(`${file} declares type "${base.type}" but its folder is a ${info.kind}`, file, [
        `type: expected ${info.kind}`,
      ]);
    }
    const id = base.identifier ?? deriveItemId(dir);
    if (this.course.items.some(item => item.id === id)) {
      throw new ValidationError(`${file} reuses identifier "${id}"`, file, [`identifier: duplicate ${id}`]);
    }

    const fields = {
      id,
      title: base.name,
      body,
      published: base.published,
      modules: this.memberships(info, base),
      sourcePath: dir,
      orderPrefix: info.orderPrefix,
    };
    const item = this.buildItem(info.kind, fields, frontmatter, file);
    this.course.items.push(item);
    this.renderHints.set(id, { template: base.template, variables: base.variables });
  }

  private buildItem(
    kind: ContentKind,
    fields: Parameters<typeof buildPage>[0] & { body: string; sourcePath: string },
    frontmatter: Record<string, unknown>,
    file: string
  ): ContentItem {
    switch (kind) {
      case 'page':
        return buildPage(fields);

      case 'assignment': {
        const meta = parseWithSchema(assignmentFrontmatterSchema, frontmatter, file);
        const rubricFile = `${fields.sourcePath}/${RUBRIC_FILE}`;
        const rubric = this.exists(rubricFile) ? parseAssignmentRubricFile(this.read(rubricFile), rubricFile, this.rubricRows) : undefined;
        if (rubric?.kind === 'shared' && !this.course.rubrics[rubric.name]) {
          throw new ValidationError(`${rubricFile} uses unknown shared rubric "${rubric.name}"`, rubricFile, [
            `use_rubric: ${rubric.name} not found in ${RUBRICS_DIR}/`,
          ]);
        }
        return buildAssignment({
          ...fields,
          settings: {
            pointsPossible: meta.points_possible,
            submissionTypes: meta.submission_types,
            dueAt: meta.due_at,
            unlockAt: meta.unlock_at,
            lockAt: meta.lock_at,
            gradingType: meta.grading_type,
            assignmentGroup: meta.assignment_group,
          },
          rubric,
        });
      }

      case 'quiz': {
        const meta = parseWithSchema(quizFrontmatterSchema, frontmatter, file);
        const { description, questions } = parseQuizText(fields.body, {
          pointsPerQuestion: meta.points_per_question,
          sourcePath: file,
        });
        const missing = meta.question_groups.filter(group => !bankByName(this.course, group.bank));
        if (missing.length > 0) {
          throw new ValidationError(
            `${file} draws from unknown question banks: ${missing.map(g => g.bank).join(', ')}`,
            file,
            missing.map(g => `question_groups: ${g.bank} not found in ${BANKS_DIR}/`)
          );
        }
        return buildQuiz({
          ...fields,
          description,
          questions,
          questionGroups: meta.question_groups.map(group => ({
            bank: group.bank,
            pick: group.pick,
            pointsPerQuestion: group.points_per_question,
          })),
          settings: {
            timeLimit: meta.time_limit,
            allowedAttempts: meta.allowed_attempts,
            shuffleAnswers: meta.shuffle_answers,
            pointsPossible: meta.points_possible,
            quizType: meta.quiz_type,
            dueAt: meta.due_at,
          },
        });
      }

      case 'link': {
        const meta = parseWithSchema(linkFrontmatterSchema, frontmatter, file);
        return buildLink({ ...fields, url: meta.external_url, newTab: meta.new_tab });
      }

      case 'file': {
        const meta = parseWithSchema(fileFrontmatterSchema, frontmatter, file);
        const candidates = [
          path.posix.normalize(`${fields.sourcePath}/${meta.file}`),
          path.posix.normalize(meta.file),
          path.posix.normalize(`${this.sharedAssetsDir}/${meta.file}`),
        ];
        const filePath = candidates.find(candidate => !candidate.startsWith('..') && this.exists(candidate));
        if (!filePath) {
          throw new ValidationError(`${file} points at missing file "${meta.file}"`, file, [`file: ${meta.file} not found`]);
        }
        return buildFile({ ...fields, filePath });
      }
    }
  }

  private async loadAssets(): Promise<void> {
    const shared = await this.find(`${this.sharedAssetsDir}/**/*`);
    const beside = (await this.find(`${CONTENT_DIR}/**/*`)).filter(file => !SOURCE_FILES.has(path.posix.basename(file)));
    const seen = new Set<string>();
    for (const file of [...shared, ...beside]) {
      if (!seen.has(file)) {
        seen.add(file);
        this.course.assets.push(fileAsset(this.courseRoot, file));
      }
    }
  }

  private moduleOrder(): string[] {
    if (!this.exists(MODULE_ORDER_PATH)) {
      return [];
    }
    let order: string[] = [];
    this.attempt(() => {
      const mapping = parseYamlMapping(this.read(MODULE_ORDER_PATH), MODULE_ORDER_PATH);
      order = parseWithSchema(moduleOrderSchema, mapping, MODULE_ORDER_PATH).modules;
    });
    return order;
  }

  private buildModules(): void {
    const folders = new Map<string, ModuleFolder>();
    for (const folder of this.moduleFolders.values()) {
      folders.set(folder.title, folder);
    }
    for (const item of this.course.items) {
      for (const membership of item.modules) {
        if (!folders.has(membership.module)) {
          folders.set(membership.module, { title: membership.module, published: true });
        }
      }
    }

    const titles = orderModuleTitles(Array.from(folders.values()), this.moduleOrder());
    titles.forEach((title, index) => {
      const folder = folders.get(title);
      const members = this.course.items
        .flatMap(item => {
          const membership = item.modules.find(m => m.module === title);
          return membership ? [{ item, membership }] : [];
        })
        .sort((a, b) =>
          compareOrderable(
            { name: a.item.sourcePath ?? a.item.title, position: a.membership.position, orderPrefix: a.item.orderPrefix },
            { name: b.item.sourcePath ?? b.item.title, position: b.membership.position, orderPrefix: b.item.orderPrefix }
          )
        );
      this.course.modules.push({
        id: deriveItemId(folder?.relativeDir ?? `module/${title}`, 'm'),
        title,
        position: index + 1,
        published: folder?.published ?? true,
        itemIds: members.map(member => member.item.id),
      });
    });
  }
}

/**
 * Load a course from its author source tree.
 */
export async function loadCourse(courseRoot: string, options: LoadCourseOptions = {}): Promise<LoadedCourse> {
  const logger = options.logger ?? createLogger('course-loader');
  const root = path.resolve(courseRoot);
  if (!fs.existsSync(path.join(root, CONTENT_DIR))) {
    logger.warn(`No ${CONTENT_DIR}/ folder under ${root}`);
  }
  return new CourseLoader(root, options, logger).run();
}
