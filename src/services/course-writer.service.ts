/**
 * Course Writer Service
 *
 * Writes a canonical course out as author source (import mode). The layout
 * is the one the course loader reads, and every item keeps its id through
 * an `identifier` frontmatter field.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';

import { ValidationError } from '../errors/errors';
import { AssignmentItem, ContentItem, Course, CourseModule, RubricCriterion } from '../models/content.model';
import { isSafePath } from '../package/package-layout';
import { serializeFrontmatter } from '../parsers/frontmatter-parser';
import { renderQuizText } from '../parsers/quiz-text-parser';
import { serializeRubricRowYaml, serializeRubricYaml } from '../parsers/rubric-parser';
import { RUBRIC_ROWS_DIR, RubricRowStore, collectRubricRows } from '../registry/rubric-store';
import { SlugAllocator, isValidIdentifier, slugify } from '../utils/id-generator';
import { Logger, createLogger } from '../utils/logger';
import { positionPrefix } from '../utils/text-formatters';

import { COURSE_CONFIG_FILE } from './config.service';
import {
  BANKS_DIR,
  CONTENT_DIR,
  ITEM_FILE,
  MODULE_FILE,
  MODULE_ORDER_PATH,
  RUBRICS_DIR,
  RUBRIC_FILE,
} from './course-loader.service';

export interface WriteSourceOptions {
  logger?: Logger;
}

export interface WriteSourceResult {
  /** Course-relative paths written */
  written: string[];
}

function dumpYaml(value: Record<string, unknown>): string {
  const defined = Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
  return yaml.dump(defined, { lineWidth: -1, noRefs: true, sortKeys: false });
}

/** Readable folder name: path separators and reserved characters removed */
function folderTitle(title: string): string {
  return title.replace(/[<>:"/\\|?*\x00-\x1f]/g, '').replace(/\s+/g, ' ').trim() || 'Module';
}

/** Points per question when every question carries the same points */
function uniformPoints(quiz: { questions: Array<{ points: number }> }): number | undefined {
  const points = new Set(quiz.questions.map(q => q.points));
  const [only] = Array.from(points);
  return points.size === 1 && only !== 1 ? only : undefined;
}

class SourceWriter {
  readonly written: string[] = [];
  private readonly moduleDirs = new Map<string, string>();
  private readonly slugsByDir = new Map<string, SlugAllocator>();
  private readonly rubricRows: RubricRowStore;

  constructor(
    private readonly course: Course,
    private readonly outputDir: string,
    private readonly logger: Logger
  ) {
    this.rubricRows = collectRubricRows(course);
  }

  /** Row file name for a criterion shared by several rubric files */
  private readonly rowName = (criterion: RubricCriterion): string | undefined =>
    this.rubricRows.sharedRowFor(criterion)?.name;

  private write(relativePath: string, content: string | Buffer): void {
    if (!isSafePath(relativePath)) {
      throw new ValidationError(`Refusing to write outside the course: ${relativePath}`, relativePath);
    }
    const target = path.join(this.outputDir, relativePath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
    this.written.push(relativePath);
  }

  private slugIn(dir: string, title: string): string {
    let slugs = this.slugsByDir.get(dir);
    if (!slugs) {
      slugs = new SlugAllocator();
      this.slugsByDir.set(dir, slugs);
    }
    return slugs.allocate(title);
  }

  private orderedModules(): CourseModule[] {
    return [...this.course.modules].sort((a, b) => a.position - b.position);
  }

  writeSettings(): void {
    this.write(COURSE_CONFIG_FILE, dumpYaml({ title: this.course.title }));
    this.write(MODULE_ORDER_PATH, dumpYaml({ modules: this.orderedModules().map(m => m.title) }));
  }

  writeModules(): void {
    this.orderedModules().forEach((module, index) => {
      const dir = `${CONTENT_DIR}/${positionPrefix(index + 1)}-${folderTitle(module.title)}.module`;
      this.moduleDirs.set(module.title, dir);
      this.write(`${dir}/${MODULE_FILE}`, dumpYaml({ name: module.title, published: module.published }));
    });
  }

  writeRubrics(): void {
    const rows = this.rubricRows.shared();
    for (const row of rows) {
      this.write(`${RUBRIC_ROWS_DIR}/${row.name}.yaml`, serializeRubricRowYaml(row.criterion));
    }
    if (rows.length > 0) {
      this.logger.info(`Extracted ${rows.length} shared rubric rows`);
    }
    for (const [name, rubric] of Object.entries(this.course.rubrics)) {
      this.write(`${RUBRICS_DIR}/${slugify(name)}.yaml`, serializeRubricYaml(rubric, this.rowName));
    }
  }

  writeBanks(): void {
    const slugs = new SlugAllocator();
    for (const bank of this.course.banks) {
      const frontmatter = {
        name: bank.title,
        identifier: isValidIdentifier(bank.id) ? bank.id : undefined,
        points_per_question: uniformPoints(bank),
      };
      this.write(
        `${BANKS_DIR}/${slugs.allocate(bank.title)}.bank.md`,
        serializeFrontmatter(frontmatter, renderQuizText('', bank.questions))
      );
    }
  }

  private placement(item: ContentItem): { dir: string; prefix?: number; module?: string } {
    for (const membership of item.modules) {
      const dir = this.moduleDirs.get(membership.module);
      const module = this.course.modules.find(m => m.title === membership.module);
      if (dir && module) {
        const index = module.itemIds.indexOf(item.id);
        return { dir, prefix: index >= 0 ? index + 1 : undefined, module: membership.module };
      }
    }
    return { dir: CONTENT_DIR };
  }

  private kindFields(item: ContentItem): Record<string, unknown> {
    switch (item.kind) {
      case 'page':
        return {};
      case 'assignment':
        return {
          points_possible: item.settings.pointsPossible,
          submission_types: item.settings.submissionTypes,
          due_at: item.settings.dueAt,
          unlock_at: item.settings.unlockAt,
          lock_at: item.settings.lockAt,
          grading_type: item.settings.gradingType === 'points' ? undefined : item.settings.gradingType,
          assignment_group: item.settings.assignmentGroup,
        };
      case 'quiz':
        return {
          points_possible: item.settings.pointsPossible,
          time_limit: item.settings.timeLimit,
          allowed_attempts: item.settings.allowedAttempts,
          shuffle_answers: item.settings.shuffleAnswers || undefined,
          quiz_type: item.settings.quizType === 'assignment' ? undefined : item.settings.quizType,
          due_at: item.settings.dueAt,
          points_per_question: uniformPoints(item),
          question_groups:
            item.questionGroups.length > 0
              ? item.questionGroups.map(group => ({
                  bank: group.bank,
                  pick: group.pick,
                  points_per_question: group.pointsPerQuestion,
                }))
              : undefined,
        };
      case 'link':
        return { external_url: item.url, new_tab: item.newTab ? undefined : false };
      case 'file':
        return { file: item.filePath };
    }
  }

  private body(item: ContentItem): string {
    return item.kind === 'quiz' ? renderQuizText(item.description, item.questions) : item.body;
  }

  private writeRubricFile(dir: string, item: AssignmentItem): void {
    if (!item.rubric) {
      return;
    }
    const content =
      item.rubric.kind === 'shared'
        ? dumpYaml({ use_rubric: slugify(item.rubric.name) })
        : serializeRubricYaml(item.rubric.rubric, this.rowName);
    this.write(`${dir}/${RUBRIC_FILE}`, content);
  }

  writeItem(item: ContentItem): void {
    const place = this.placement(item);
    const name = `${place.prefix !== undefined ? `${positionPrefix(place.prefix)}-` : ''}${this.slugIn(place.dir, item.title)}`;
    const dir = `${place.dir}/${name}.${item.kind}`;

    const primary = item.modules.find(m => m.module === place.module);
    const others = item.modules
      .filter(m => m.module !== place.module)
      .map(m => {
        const module = this.course.modules.find(candidate => candidate.title === m.module);
        const index = module ? module.itemIds.indexOf(item.id) : -1;
        return { name: m.module, position: index >= 0 ? index + 1 : m.position, indent: m.indent || undefined };
      });

    const frontmatter = {
      name: item.title,
      identifier: isValidIdentifier(item.id) ? item.id : undefined,
      published: item.published,
      indent: primary && primary.indent > 0 ? primary.indent : undefined,
      modules: others.length > 0 ? others : undefined,
      ...this.kindFields(item),
    };
    this.write(`${dir}/${ITEM_FILE}`, serializeFrontmatter(frontmatter, this.body(item)));
    if (item.kind === 'assignment') {
      this.writeRubricFile(dir, item);
    }
  }

  async writeAssets(): Promise<void> {
    for (const asset of this.course.assets) {
      if (!isSafePath(asset.path)) {
        this.logger.warn(`Skipping asset with unsafe path ${asset.path}`);
        continue;
      }
      this.write(asset.path, await asset.read());
    }
  }
}

/**
 * Write `course` as author source under `outputDir`.
 */
export async function writeCourseSource(
  course: Course,
  outputDir: string,
  options: WriteSourceOptions = {}
): Promise<WriteSourceResult> {
  const logger = options.logger ?? createLogger('course-writer');
  const writer = new SourceWriter(course, path.resolve(outputDir), logger);

  writer.writeSettings();
  writer.writeModules();
  writer.writeRubrics();
  writer.writeBanks();
  for (const item of course.items) {
    writer.writeItem(item);
  }
  await writer.writeAssets();

  logger.info(`Wrote ${course.title} to ${outputDir}`, { files: writer.written.length });
  return { written: writer.written };
}
